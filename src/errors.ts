/**
 * Shared Error Factory for collidermcp domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.actorNotFound(id);
 * Library code throws `new Error(errors.x().content[0].text)` and the tool
 * handlers turn caught messages back into this shape.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The client reads the text and can self-correct.
 */
export type DomainErrorResponse = {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
};

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

/**
 * Returns the message text of a DomainErrorResponse, for throwing.
 */
export function messageOf(response: DomainErrorResponse): string {
    return response.content[0].text;
}

// ----------------------------------------------------------------------------
// project
// ----------------------------------------------------------------------------

export function noProjectLoaded(): DomainErrorResponse {
    return domainError('No project loaded. Call project init or project open first.');
}

export function projectFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Project file not found: ${path}`);
}

export function invalidProjectFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid project file: ${path}. ${detail}`);
}

export function tilemapNotDefined(name: string): DomainErrorResponse {
    return domainError(`Tilemap '${name}' is not defined in the project.`);
}

export function layoutNotDefined(tilemap: string, layout: string): DomainErrorResponse {
    return domainError(`Layout '${layout}' is not defined for tilemap '${tilemap}'.`);
}

export function actorNotDefined(name: string): DomainErrorResponse {
    return domainError(`Actor '${name}' is not defined in the project.`);
}

// ----------------------------------------------------------------------------
// layout
// ----------------------------------------------------------------------------

export function layoutFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Layout file not found: ${path}`);
}

export function invalidLayoutFile(path: string, detail: string): DomainErrorResponse {
    return domainError(`Invalid layout file: ${path}. ${detail}`);
}

export function malformedGrid(detail: string): DomainErrorResponse {
    return domainError(`Malformed grid: ${detail}`);
}

export function gridSizeMismatch(tw: number, th: number, bw: number, bh: number): DomainErrorResponse {
    return domainError(`Behavior grid (${String(bw)}×${String(bh)}) does not match tile grid (${String(tw)}×${String(th)}).`);
}

// ----------------------------------------------------------------------------
// collider & room
// ----------------------------------------------------------------------------

export function invalidCollider(detail: string): DomainErrorResponse {
    return domainError(`Invalid collider: ${detail}`);
}

export function actorNotFound(id: number): DomainErrorResponse {
    return domainError(`Actor ${String(id)} does not exist in the room.`);
}

export function noLayoutActive(): DomainErrorResponse {
    return domainError('No tilemap layout is active. Call room enter first.');
}

export function unknownBehaviorCode(code: number): DomainErrorResponse {
    return domainError(`Behavior code ${String(code)} has no collision masks in the active layout.`);
}

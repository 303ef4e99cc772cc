/**
 * Wraps a JSON-serializable payload in the MCP text content shape.
 */
export function jsonResult(payload: unknown) {
    return {
        content: [
            {
                type: 'text' as const,
                text: JSON.stringify(payload),
            },
        ],
    };
}

/**
 * Message of a caught value, for turning thrown domain errors back into responses.
 */
export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

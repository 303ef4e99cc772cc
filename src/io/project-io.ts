import * as fs from 'fs/promises';
import * as nodePath from 'node:path';
import { z } from 'zod';
import { type ProjectConfig } from '../types/project.js';
import { colliderProblem } from '../classes/collider.js';
import * as errors from '../errors.js';
import { hasErrnoCode } from './errno.js';

const colliderSchema = z.object({
    offset: z.tuple([z.number(), z.number()]),
    width: z.number().optional(),
    height: z.number().optional(),
    radius: z.number().optional(),
}).superRefine((def, ctx) => {
    const problem = colliderProblem(def);
    if (problem !== null) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: errors.messageOf(errors.invalidCollider(problem)),
        });
    }
});

/**
 * Structural schema for collidermcp.json.
 */
export const projectConfigSchema = z.object({
    collidermcp_version: z.string(),
    name: z.string(),
    created: z.string().optional(),
    tilemaps: z.record(z.object({
        tile_width: z.number().positive(),
        tile_height: z.number().positive(),
        layouts: z.record(z.string()),
    })),
    actors: z.record(z.object({
        collider: colliderSchema.optional(),
    })),
});

/**
 * Loads a project configuration from a JSON file.
 *
 * @param path - Absolute path to the collidermcp.json file
 * @returns The parsed ProjectConfig data
 */
export async function loadProjectFile(path: string): Promise<ProjectConfig> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(path, 'utf8');
    } catch (error: unknown) {
        if (hasErrnoCode(error, 'ENOENT')) {
            throw new Error(errors.messageOf(errors.projectFileNotFound(path)));
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new Error(errors.messageOf(errors.invalidProjectFile(path, `Invalid JSON. ${msg}`)));
    }

    const result = projectConfigSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(errors.messageOf(errors.invalidProjectFile(
            path,
            `${issue.path.join('.')}: ${issue.message}`,
        )));
    }
    return result.data;
}

/**
 * Saves a project configuration to a JSON file.
 * Automatically adds or preserves the creation timestamp.
 *
 * @param path - Absolute path to the collidermcp.json file
 * @param project - The ProjectConfig data to save
 */
export async function saveProjectFile(path: string, project: ProjectConfig): Promise<void> {
    const dataToSave = { ...project };
    if (!dataToSave.created) {
        dataToSave.created = new Date().toISOString();
    }

    await fs.mkdir(nodePath.dirname(path), { recursive: true });
    await fs.writeFile(path, JSON.stringify(dataToSave, null, 2), 'utf8');
}

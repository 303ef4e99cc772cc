import * as fs from 'fs/promises';
import { z } from 'zod';
import { type LayoutData } from '../types/layout.js';
import { validateGrid } from '../algorithms/collision-masks.js';
import * as errors from '../errors.js';
import { hasErrnoCode } from './errno.js';

const gridSchema = z.array(z.array(z.number().int().nonnegative()));

/**
 * Structural schema for a layout file. Row lengths are checked separately.
 */
export const layoutDataSchema = z.object({
    tiles: gridSchema,
    behaviors: gridSchema.optional(),
});

/**
 * Loads a tilemap layout from a JSON file.
 *
 * @param path - Absolute path to the layout file
 * @returns The parsed LayoutData, with rectangular grids
 */
export async function loadLayoutFile(path: string): Promise<LayoutData> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(path, 'utf8');
    } catch (error: unknown) {
        if (hasErrnoCode(error, 'ENOENT')) {
            throw new Error(errors.messageOf(errors.layoutFileNotFound(path)));
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new Error(errors.messageOf(errors.invalidLayoutFile(path, `Invalid JSON. ${msg}`)));
    }

    const result = layoutDataSchema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new Error(errors.messageOf(errors.invalidLayoutFile(
            path,
            `${issue.path.join('.')}: ${issue.message}`,
        )));
    }

    validateGrid(result.data.tiles);
    if (result.data.behaviors !== undefined) {
        validateGrid(result.data.behaviors);
    }
    return result.data;
}

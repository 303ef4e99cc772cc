import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ProjectClass } from '../classes/project.js';
import { type SessionClass } from '../classes/session.js';
import { type ColliderDefinition, type ProjectConfig } from '../types/project.js';
import { loadProjectFile, saveProjectFile } from '../io/index.js';
import { jsonResult, errorMessage } from './result.js';
import * as errors from '../errors.js';
import * as path from 'node:path';

/**
 * Zod input schema for the `project` tool.
 *
 * Uses a flat shape with an `action` enum discriminator.
 * - `init`: path required (project directory)
 * - `open`: path required (collidermcp.json file path)
 * - `define_tilemap`: name, tile_width, tile_height
 * - `add_layout`: tilemap, layout, layout_path
 * - `define_actor`: name, plus offset and width/height or radius for a collider
 */
const projectInputSchema = {
    action: z.enum(['init', 'open', 'info', 'save', 'define_tilemap', 'add_layout', 'define_actor']).describe(
        'Action to perform: init (create new project), open (load existing), info, save, define_tilemap, add_layout, define_actor'
    ),
    path: z.string().optional().describe(
        'For init: project directory path. For open: path to collidermcp.json'
    ),
    name: z.string().optional().describe(
        'Project name (init), tilemap name (define_tilemap) or actor name (define_actor)'
    ),
    tile_width: z.number().optional().describe('For define_tilemap: tile width in pixels'),
    tile_height: z.number().optional().describe('For define_tilemap: tile height in pixels'),
    tilemap: z.string().optional().describe('For add_layout: tilemap name'),
    layout: z.string().optional().describe('For add_layout: layout name'),
    layout_path: z.string().optional().describe(
        'For add_layout: layout file path, relative to collidermcp.json'
    ),
    offset_x: z.number().optional().describe('For define_actor: collider X offset from the actor origin'),
    offset_y: z.number().optional().describe('For define_actor: collider Y offset from the actor origin'),
    width: z.number().optional().describe('For define_actor: rectangle collider width'),
    height: z.number().optional().describe('For define_actor: rectangle collider height'),
    radius: z.number().optional().describe('For define_actor: circle collider radius'),
};

interface TilemapArgs {
    name?: string;
    tile_width?: number;
    tile_height?: number;
}

interface LayoutArgs {
    tilemap?: string;
    layout?: string;
    layout_path?: string;
}

interface ActorArgs {
    name?: string;
    offset_x?: number;
    offset_y?: number;
    width?: number;
    height?: number;
    radius?: number;
}

/**
 * Registers the `project` tool on the MCP server.
 */
export function registerProjectTool(server: McpServer, session: SessionClass): void {
    server.registerTool(
        'project',
        {
            title: 'Project',
            description: 'Manage the on-disk project configuration: tilemaps, layout files and actor colliders.',
            inputSchema: projectInputSchema,
        },
        async (args) => {
            switch (args.action) {
                case 'init':
                    return handleInit(session, args.path, args.name);
                case 'open':
                    return handleOpen(session, args.path);
                case 'info':
                    return handleInfo(session);
                case 'save':
                    return handleSave(session);
                case 'define_tilemap':
                    return handleDefineTilemap(session, args);
                case 'add_layout':
                    return handleAddLayout(session, args);
                case 'define_actor':
                    return handleDefineActor(session, args);
                default:
                    return errors.invalidArgument(`Unknown project action: ${String(args.action)}`);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleInit(
    session: SessionClass,
    dirPath: string | undefined,
    projectName: string | undefined,
) {
    if (!dirPath) {
        return errors.invalidArgument('project init requires a "path" (project directory).');
    }

    const resolvedDir = path.resolve(dirPath);
    const filePath = path.join(resolvedDir, 'collidermcp.json');
    const name = projectName ?? path.basename(resolvedDir);

    const project = ProjectClass.create(filePath, name);
    try {
        await saveProjectFile(filePath, project.toJSON());
    } catch (e: unknown) {
        return errors.domainError(`Failed to save project file: ${errorMessage(e)}`);
    }
    project.isDirty = false;
    session.setProject(project);

    return jsonResult({
        message: `Project '${name}' initialized.`,
        path: filePath,
    });
}

async function handleOpen(session: SessionClass, filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument('project open requires a "path" to collidermcp.json.');
    }

    const resolvedPath = path.resolve(filePath);

    let data: ProjectConfig;
    try {
        data = await loadProjectFile(resolvedPath);
    } catch (e: unknown) {
        return errors.domainError(errorMessage(e));
    }

    const project = ProjectClass.fromJSON(resolvedPath, data);
    session.setProject(project);

    return jsonResult({
        message: `Project '${project.name}' opened.`,
        path: resolvedPath,
        tilemaps: Object.keys(data.tilemaps).length,
        actors: Object.keys(data.actors).length,
    });
}

function handleInfo(session: SessionClass) {
    if (!session.project) {
        return errors.noProjectLoaded();
    }
    return jsonResult(session.project.info());
}

async function handleSave(session: SessionClass) {
    if (!session.project) {
        return errors.noProjectLoaded();
    }
    const project = session.project;
    try {
        await saveProjectFile(project.path, project.toJSON());
    } catch (e: unknown) {
        return errors.domainError(`Failed to save project file: ${errorMessage(e)}`);
    }
    project.isDirty = false;
    return jsonResult({ message: `Project '${project.name}' saved.`, path: project.path });
}

function handleDefineTilemap(session: SessionClass, args: TilemapArgs) {
    if (!session.project) {
        return errors.noProjectLoaded();
    }
    if (!args.name || args.tile_width === undefined || args.tile_height === undefined) {
        return errors.invalidArgument('project define_tilemap requires "name", "tile_width" and "tile_height".');
    }
    try {
        session.project.defineTilemap(args.name, args.tile_width, args.tile_height);
    } catch (e: unknown) {
        return errors.domainError(errorMessage(e));
    }
    return jsonResult({ message: `Tilemap '${args.name}' defined.`, tilemap: session.project.getTilemap(args.name) });
}

function handleAddLayout(session: SessionClass, args: LayoutArgs) {
    if (!session.project) {
        return errors.noProjectLoaded();
    }
    if (!args.tilemap || !args.layout || !args.layout_path) {
        return errors.invalidArgument('project add_layout requires "tilemap", "layout" and "layout_path".');
    }
    try {
        session.project.addLayout(args.tilemap, args.layout, args.layout_path);
    } catch (e: unknown) {
        return errors.domainError(errorMessage(e));
    }
    return jsonResult({
        message: `Layout '${args.layout}' added to tilemap '${args.tilemap}'.`,
        path: session.project.resolveLayoutPath(args.tilemap, args.layout),
    });
}

function handleDefineActor(session: SessionClass, args: ActorArgs) {
    if (!session.project) {
        return errors.noProjectLoaded();
    }
    if (!args.name) {
        return errors.invalidArgument('project define_actor requires "name".');
    }

    const hasCollider = args.width !== undefined || args.height !== undefined || args.radius !== undefined;
    const collider: ColliderDefinition | undefined = hasCollider
        ? {
            offset: [args.offset_x ?? 0, args.offset_y ?? 0],
            width: args.width,
            height: args.height,
            radius: args.radius,
        }
        : undefined;

    try {
        session.project.defineActor(args.name, collider ? { collider } : {});
    } catch (e: unknown) {
        return errors.domainError(errorMessage(e));
    }
    return jsonResult({ message: `Actor '${args.name}' defined.`, actor: session.project.getActor(args.name) });
}

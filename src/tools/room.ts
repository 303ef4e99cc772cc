import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type SessionClass } from '../classes/session.js';
import { type TilemapLayoutClass } from '../classes/tilemap-layout.js';
import { jsonResult, errorMessage } from './result.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `room` tool.
 *
 * Actions: enter, leave, info, masks, spawn, move, remove
 */
const roomInputSchema = {
  action: z
    .enum(['enter', 'leave', 'info', 'masks', 'spawn', 'move', 'remove'])
    .describe('Action to perform on the active room'),
  tilemap: z.string().optional().describe('Tilemap name (required for enter)'),
  layout: z.string().optional().describe('Layout name (required for enter)'),
  behavior: z.number().int().optional().describe('For masks: only list masks of this behavior code'),
  actor: z.string().optional().describe('Actor type name as defined in the project (required for spawn)'),
  actor_id: z.number().int().optional().describe('Actor instance id (required for move, remove)'),
  x: z.number().optional().describe('X position (spawn, move)'),
  y: z.number().optional().describe('Y position (spawn, move)'),
};

/**
 * Registers the `room` tool on the MCP server.
 */
export function registerRoomTool(server: McpServer, session: SessionClass): void {
  server.registerTool(
    'room',
    {
      title: 'Room',
      description:
        'Activate a tilemap layout (compiling its collision masks) and manage the actors in the room.',
      inputSchema: roomInputSchema,
    },
    async (args) => {
      switch (args.action) {
        case 'enter':
          return handleEnter(session, args.tilemap, args.layout);
        case 'leave':
          return handleLeave(session);
        case 'info':
          return jsonResult(session.info());
        case 'masks':
          return handleMasks(session, args.behavior);
        case 'spawn':
          return handleSpawn(session, args.actor, args.x, args.y);
        case 'move':
          return handleMove(session, args.actor_id, args.x, args.y);
        case 'remove':
          return handleRemove(session, args.actor_id);
        default:
          return errors.invalidArgument(`Unknown room action: ${String(args.action)}`);
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

async function handleEnter(
  session: SessionClass,
  tilemap: string | undefined,
  layout: string | undefined,
) {
  if (!tilemap || !layout) {
    return errors.invalidArgument('room enter requires "tilemap" and "layout".');
  }
  if (!session.project) {
    return errors.noProjectLoaded();
  }

  let layoutClass: TilemapLayoutClass;
  try {
    layoutClass = await session.enterLayout(tilemap, layout);
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }

  return jsonResult({
    message: `Entered layout '${layout}' of tilemap '${tilemap}'.`,
    layout: layoutClass.info(),
    behaviors: session.room.behaviorCodes(),
  });
}

function handleLeave(session: SessionClass) {
  if (session.room.layout === null) {
    return errors.noLayoutActive();
  }
  session.room.deactivateLayout();
  return jsonResult({ message: 'Layout deactivated.' });
}

function handleMasks(session: SessionClass, behavior: number | undefined) {
  const masks = session.room.masks;
  if (masks === null) {
    return errors.noLayoutActive();
  }

  const entries: Array<{ behavior: number; masks: Array<{ x: number; y: number; width: number; height: number }> }> = [];
  for (const [code, list] of masks) {
    if (behavior !== undefined && code !== behavior) continue;
    entries.push({
      behavior: code,
      masks: list.map(m => ({ x: m.x, y: m.y, width: m.width, height: m.height })),
    });
  }
  if (behavior !== undefined && entries.length === 0) {
    return errors.unknownBehaviorCode(behavior);
  }

  return jsonResult({ behaviors: entries });
}

function handleSpawn(
  session: SessionClass,
  actorName: string | undefined,
  x: number | undefined,
  y: number | undefined,
) {
  if (!actorName) {
    return errors.invalidArgument('room spawn requires "actor".');
  }
  if (!session.project) {
    return errors.noProjectLoaded();
  }

  try {
    const entry = session.project.getActor(actorName);
    const actor = session.room.spawnActor(actorName, x ?? 0, y ?? 0, entry.collider);
    return jsonResult({ message: `Actor '${actorName}' spawned.`, actor: actor.info() });
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }
}

function handleMove(
  session: SessionClass,
  actorId: number | undefined,
  x: number | undefined,
  y: number | undefined,
) {
  if (actorId === undefined) {
    return errors.invalidArgument('room move requires "actor_id".');
  }
  if (x === undefined && y === undefined) {
    return errors.invalidArgument('room move requires "x" and/or "y".');
  }

  try {
    const actor = session.room.getActor(actorId);
    actor.setPosition(x ?? actor.x, y ?? actor.y);
    return jsonResult({ actor: actor.info() });
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }
}

function handleRemove(session: SessionClass, actorId: number | undefined) {
  if (actorId === undefined) {
    return errors.invalidArgument('room remove requires "actor_id".');
  }

  try {
    session.room.removeActor(actorId);
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }
  return jsonResult({ message: `Actor ${String(actorId)} removed.` });
}

import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { type SessionClass } from '../classes/session.js';
import { jsonResult, errorMessage } from './result.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `collision` tool.
 *
 * Actions: reset_frame, test_actors, test_map, mouse_over, state
 */
const collisionInputSchema = {
  action: z
    .enum(['reset_frame', 'test_actors', 'test_map', 'mouse_over', 'state'])
    .describe('reset_frame starts a new frame and clears all flags; the test actions then accumulate flags'),
  actor_id: z.number().int().optional().describe('Actor instance id (test_actors, test_map, mouse_over)'),
  other_id: z.number().int().optional().describe('Second actor instance id (test_actors)'),
  behavior: z.number().int().optional().describe('Behavior code to test against (test_map)'),
  x: z.number().optional().describe('Cursor X (mouse_over)'),
  y: z.number().optional().describe('Cursor Y (mouse_over)'),
};

/**
 * Registers the `collision` tool on the MCP server.
 */
export function registerCollisionTool(server: McpServer, session: SessionClass): void {
  server.registerTool(
    'collision',
    {
      title: 'Collision',
      description:
        'Per-frame collision queries: actor vs actor, actor vs tilemap behavior masks, actor vs cursor point.',
      inputSchema: collisionInputSchema,
    },
    (args) => {
      switch (args.action) {
        case 'reset_frame':
          session.room.resetFrame();
          return jsonResult({ frame: session.room.frame });
        case 'test_actors':
          return handleTestActors(session, args.actor_id, args.other_id);
        case 'test_map':
          return handleTestMap(session, args.actor_id, args.behavior);
        case 'mouse_over':
          return handleMouseOver(session, args.actor_id, args.x, args.y);
        case 'state':
          return jsonResult(session.room.debugState());
        default:
          return errors.invalidArgument(`Unknown collision action: ${String(args.action)}`);
      }
    },
  );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

function handleTestActors(session: SessionClass, actorId: number | undefined, otherId: number | undefined) {
  if (actorId === undefined || otherId === undefined) {
    return errors.invalidArgument('collision test_actors requires "actor_id" and "other_id".');
  }

  try {
    const room = session.room;
    const colliding = room.testActorCollision(room.getActor(actorId), room.getActor(otherId));
    return jsonResult({ colliding });
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }
}

/**
 * With no layout active the result is an empty list, same as no overlap.
 * A code the active layout does not have comes back as a domain error.
 */
function handleTestMap(session: SessionClass, actorId: number | undefined, behavior: number | undefined) {
  if (actorId === undefined || behavior === undefined) {
    return errors.invalidArgument('collision test_map requires "actor_id" and "behavior".');
  }

  try {
    const room = session.room;
    const collisions = room.testMapCollision(room.getActor(actorId), behavior);
    return jsonResult({ collisions });
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }
}

function handleMouseOver(
  session: SessionClass,
  actorId: number | undefined,
  x: number | undefined,
  y: number | undefined,
) {
  if (actorId === undefined || x === undefined || y === undefined) {
    return errors.invalidArgument('collision mouse_over requires "actor_id", "x" and "y".');
  }

  try {
    const room = session.room;
    const over = room.mouseOverActor(room.getActor(actorId), x, y);
    return jsonResult({ over });
  } catch (e: unknown) {
    return errors.domainError(errorMessage(e));
  }
}

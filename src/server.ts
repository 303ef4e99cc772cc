import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SessionClass } from './classes/session.js';
import { registerProjectTool } from './tools/project.js';
import { registerRoomTool } from './tools/room.js';
import { registerCollisionTool } from './tools/collision.js';

/**
 * Builds the server with every tool registered against one session.
 */
export function createServer(session: SessionClass = new SessionClass()): McpServer {
  const server = new McpServer({
    name: 'collidermcp',
    version: '1.0.0',
  });

  registerProjectTool(server, session);
  registerRoomTool(server, session);
  registerCollisionTool(server, session);

  return server;
}

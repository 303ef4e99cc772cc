import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer } from '../server.js';
import { SessionClass } from '../classes/session.js';

const toolResultSchema = z.object({
    isError: z.boolean().optional(),
    content: z.array(z.object({ type: z.literal('text'), text: z.string() })).min(1),
});

export interface ToolReply {
    isError: boolean;
    text: string;
}

/**
 * An MCP client wired to a fresh server over an in-memory transport.
 * Used by the tool tests to call tools the way a real client does.
 */
export interface ToolHarness {
    session: SessionClass;
    call(tool: string, args: Record<string, unknown>): Promise<ToolReply>;
    close(): Promise<void>;
}

export async function connectHarness(session: SessionClass = new SessionClass()): Promise<ToolHarness> {
    const server = createServer(session);
    const client = new Client({ name: 'collidermcp-test', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    return {
        session,
        async call(tool, args) {
            const result = toolResultSchema.parse(await client.callTool({ name: tool, arguments: args }));
            return { isError: result.isError ?? false, text: result.content[0].text };
        },
        async close() {
            await client.close();
            await server.close();
        },
    };
}

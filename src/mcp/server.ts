import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { ConversationService } from '../bot/conversation.js';
import { debug } from '../shared/debug.js';
import { registerConversationTools } from './tools/index.js';

export const SERVER_NAME = 'stonetrail';
export const SERVER_VERSION = '0.1.0';

/** Shown to MCP clients once, on initialize. */
export const SERVER_INSTRUCTIONS = [
  'Each tool call is one chat event from a user, identified by userId.',
  'Start with submit_photo. Then answer the question in the reply with send_text,',
  'send_location or press_button, using the codes shown as "[label] -> code".',
  'The last line of every reply says what input the conversation expects next.',
].join(' ');

/** The conversation exposed as MCP tools, not yet connected. */
export function createStonetrailServer(conversation: ConversationService): McpServer {
  const server = new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} }, instructions: SERVER_INSTRUCTIONS },
  );
  registerConversationTools(server, conversation);
  return server;
}

export async function serveStdio(server: McpServer): Promise<void> {
  await server.connect(new StdioServerTransport());
  debug('mcp', 'Listening on stdio', { name: SERVER_NAME, version: SERVER_VERSION });
}

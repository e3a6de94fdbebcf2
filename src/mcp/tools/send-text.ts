import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { ConversationService } from '../../bot/conversation.js';
import { toToolResult } from '../reply.js';

/**
 * Registers the send_text tool: a typed answer to the current question
 * (a name, a description, a postal code, or a word like "skip").
 */
export function registerSendText(server: McpServer, conversation: ConversationService): void {
  server.registerTool(
    'send_text',
    {
      title: 'Send Text',
      description: 'Answer the current question with typed text.',
      inputSchema: {
        userId: z.string().min(1).describe('Identifier of the user'),
        text: z.string().max(4096).describe('The typed message'),
      },
    },
    async (args) => toToolResult(await conversation.handleText({ userId: args.userId }, args.text)),
  );
}

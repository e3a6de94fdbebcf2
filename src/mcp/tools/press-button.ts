import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { ConversationService } from '../../bot/conversation.js';
import { toToolResult } from '../reply.js';

export function registerPressButton(server: McpServer, conversation: ConversationService): void {
  server.registerTool(
    'press_button',
    {
      title: 'Press Button',
      description:
        'Press one of the buttons offered in the previous reply, by its code (e.g. intake:skip, page:1).',
      inputSchema: {
        userId: z.string().min(1).describe('Identifier of the user'),
        code: z.string().min(1).max(64).describe('Button code shown after "->"'),
      },
    },
    async (args) => toToolResult(await conversation.handleButton({ userId: args.userId }, args.code)),
  );
}

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { ConversationService } from '../../bot/conversation.js';
import { toToolResult } from '../reply.js';

export function registerSendLocation(server: McpServer, conversation: ConversationService): void {
  server.registerTool(
    'send_location',
    {
      title: 'Send Location',
      description: 'Share where the stone was found, as a coordinate pair.',
      inputSchema: {
        userId: z.string().min(1).describe('Identifier of the user'),
        latitude: z.number().min(-90).max(90),
        longitude: z.number().min(-180).max(180),
      },
    },
    async (args) =>
      toToolResult(
        await conversation.handleLocation(
          { userId: args.userId },
          { latitude: args.latitude, longitude: args.longitude },
        ),
      ),
  );
}

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { ConversationService } from '../../bot/conversation.js';
import { COMMANDS } from '../../bot/types.js';
import { toToolResult } from '../reply.js';

export function registerRunCommand(server: McpServer, conversation: ConversationService): void {
  server.registerTool(
    'run_command',
    {
      title: 'Run Command',
      description: `Run a chat command: ${COMMANDS.join(', ')}.`,
      inputSchema: {
        userId: z.string().min(1).describe('Identifier of the user'),
        command: z.enum(COMMANDS).describe('Command name without the slash'),
        args: z.array(z.string()).default([]).describe('Command arguments, e.g. ["5"] for info 5'),
      },
    },
    async (args) =>
      toToolResult(await conversation.handleCommand({ userId: args.userId }, args.command, args.args)),
  );
}

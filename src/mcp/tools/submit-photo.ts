import { readFile } from 'node:fs/promises';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { ConversationService } from '../../bot/conversation.js';
import { debug } from '../../shared/debug.js';
import { toToolResult, toolError } from '../reply.js';

/**
 * Registers the submit_photo tool on the MCP server.
 *
 * Starts an intake: the photo is analyzed, matched against known stones and
 * answered with either the stone card or the first registration question.
 */
export function registerSubmitPhoto(server: McpServer, conversation: ConversationService): void {
  server.registerTool(
    'submit_photo',
    {
      title: 'Submit Photo',
      description:
        'Submit a photo of a painted stone. Pass either a local file path or base64 image bytes.',
      inputSchema: {
        userId: z.string().min(1).describe('Identifier of the user sending the photo'),
        imagePath: z.string().min(1).optional().describe('Path of a JPEG or PNG file to read'),
        imageBase64: z.string().min(1).optional().describe('Image bytes, base64 encoded'),
      },
    },
    async (args) => {
      try {
        let image: Buffer;
        if (args.imageBase64 !== undefined) {
          image = Buffer.from(args.imageBase64, 'base64');
        } else if (args.imagePath !== undefined) {
          image = await readFile(args.imagePath);
        } else {
          return {
            content: [{ type: 'text' as const, text: 'Provide imagePath or imageBase64.' }],
            isError: true,
          };
        }

        debug('mcp', 'submit_photo', { userId: args.userId, bytes: image.length });
        return toToolResult(await conversation.handlePhoto({ userId: args.userId }, { image }));
      } catch (err) {
        return toolError('submit photo', err);
      }
    },
  );
}

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import type { Reply } from '../bot/types.js';
import { errorMessage } from '../shared/debug.js';

type Content = CallToolResult['content'][number];

/**
 * Renders a conversation reply as tool output. Buttons are listed with the
 * code to pass to `press_button`.
 */
export function toToolResult(reply: Reply): CallToolResult {
  const content: Content[] = [];

  for (const message of reply.messages) {
    if (message.kind === 'image') {
      content.push({ type: 'image' as const, data: message.data.toString('base64'), mimeType: message.mimeType });
      content.push({ type: 'text' as const, text: message.caption });
      continue;
    }

    const buttons = message.buttons.flat().map((b) => `[${b.label}] -> ${b.code}`);
    content.push({
      type: 'text' as const,
      text: buttons.length > 0 ? `${message.text}\n\n${buttons.join('\n')}` : message.text,
    });
  }

  content.push({ type: 'text' as const, text: `(expecting: ${reply.expect})` });
  return { content };
}

export function toolError(action: string, err: unknown): CallToolResult {
  return {
    content: [{ type: 'text' as const, text: `Failed to ${action}: ${errorMessage(err)}` }],
    isError: true,
  };
}

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ConversationService } from '../../bot/conversation.js';
import { registerPressButton } from './press-button.js';
import { registerRunCommand } from './run-command.js';
import { registerSendLocation } from './send-location.js';
import { registerSendText } from './send-text.js';
import { registerSubmitPhoto } from './submit-photo.js';

export function registerConversationTools(server: McpServer, conversation: ConversationService): void {
  registerSubmitPhoto(server, conversation);
  registerSendText(server, conversation);
  registerSendLocation(server, conversation);
  registerPressButton(server, conversation);
  registerRunCommand(server, conversation);
}

import type { ConversationService } from '../bot/conversation.js';
import type { Registry } from '../storage/registry.js';

/** Per-request variables the server middleware sets on the Hono context. */
export type AppEnv = {
  Variables: {
    registry: Registry;
    conversation: ConversationService;
    webhookSecret: string | null;
  };
};

/**
 * Webhook endpoint that feeds chat events into the conversation service.
 *
 * Transports post one event per request and relay the returned messages.
 * Images travel as base64 in both directions.
 *
 * @module web/routes/events
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { ConversationService } from '../../bot/conversation.js';
import type { Reply } from '../../bot/types.js';
import type { AppEnv } from '../env.js';

export const SECRET_HEADER = 'x-stonetrail-secret';

const userId = z.string().min(1).max(128);

export const InboundEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('photo'),
    userId,
    imageBase64: z.string().min(1),
    imageRef: z.string().min(1).optional(),
  }),
  z.object({ type: z.literal('text'), userId, text: z.string().max(4096) }),
  z.object({
    type: z.literal('location'),
    userId,
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  }),
  z.object({ type: z.literal('button'), userId, code: z.string().min(1).max(64) }),
  z.object({
    type: z.literal('command'),
    userId,
    command: z.string().min(1).max(32),
    args: z.array(z.string()).default([]),
  }),
]);

export type InboundEvent = z.infer<typeof InboundEventSchema>;

/** Reply with image bytes as base64, for JSON transports. */
export function serializeReply(reply: Reply) {
  return {
    expect: reply.expect,
    messages: reply.messages.map((m) =>
      m.kind === 'text'
        ? m
        : { kind: m.kind, mimeType: m.mimeType, caption: m.caption, dataBase64: m.data.toString('base64') },
    ),
  };
}

function dispatch(conversation: ConversationService, event: InboundEvent): Promise<Reply> {
  const user = { userId: event.userId };

  switch (event.type) {
    case 'photo':
      return conversation.handlePhoto(user, {
        image: Buffer.from(event.imageBase64, 'base64'),
        imageRef: event.imageRef,
      });
    case 'text':
      return conversation.handleText(user, event.text);
    case 'location':
      return conversation.handleLocation(user, {
        latitude: event.latitude,
        longitude: event.longitude,
      });
    case 'button':
      return conversation.handleButton(user, event.code);
    case 'command':
      return conversation.handleCommand(user, event.command.replace(/^\//, ''), event.args);
  }
}

export const eventRoutes = new Hono<AppEnv>();

/**
 * POST /api/events
 */
eventRoutes.post('/events', async (c) => {
  const secret = c.get('webhookSecret');
  if (secret !== null && c.req.header(SECRET_HEADER) !== secret) {
    return c.json({ error: 'Unauthorized' }, 401);
  }

  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return c.json({ error: 'Body must be JSON' }, 400);
  }

  const parsed = InboundEventSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: 'Invalid event', issues: parsed.error.issues.map((i) => i.message) }, 400);
  }

  const reply = await dispatch(c.get('conversation'), parsed.data);
  return c.json(serializeReply(reply));
});

import type { Coordinates } from '../geo/geocoder.js';

/** A tappable choice. `code` is what comes back through `handleButton`. */
export interface Button {
  label: string;
  code: string;
}

export type OutboundMessage =
  | { kind: 'text'; text: string; buttons: Button[][] }
  | { kind: 'image'; data: Buffer; mimeType: 'image/png' | 'image/jpeg'; caption: string };

/** What the conversation is waiting for next. */
export type Expectation = 'photo' | 'text' | 'location' | 'confirmation' | 'done';

export interface Reply {
  messages: OutboundMessage[];
  expect: Expectation;
}

export interface UserContext {
  userId: string;
}

export interface PhotoSubmission {
  image: Buffer;
  /** Transport handle for the photo; the image store is used when absent. */
  imageRef?: string;
}

export type LocationMessage = Coordinates;

export const COMMANDS = ['start', 'help', 'mine', 'info', 'delete', 'lang', 'cancel'] as const;

export type Command = (typeof COMMANDS)[number];

export function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

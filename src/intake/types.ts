import type { Coordinates, Geocoder } from '../geo/geocoder.js';
import type { StoneError } from '../shared/errors.js';
import type { SightingInsert, SightingLocation, StoneInsert } from '../shared/types.js';
import type { Signal, SignalMatcher } from './signals.js';

export type IntakeStateName =
  | 'initial'
  | 'awaiting_name'
  | 'awaiting_description'
  | 'awaiting_location'
  | 'committing'
  | 'terminal';

/** What completing the session will write. */
export type IntakeTarget =
  | { kind: 'new_stone' }
  | { kind: 'existing_stone'; stoneId: number; similarity: number };

/** Inbound user events, already stripped of transport details. */
export type IntakeInput =
  | { kind: 'text'; text: string }
  | { kind: 'signal'; signal: Signal }
  | ({ kind: 'location' } & Coordinates);

/** Which question the user should be (re)asked. */
export type IntakePrompt = 'name' | 'description' | 'location' | 'postal_code';

export type CommitResult =
  | { kind: 'stone_created'; stoneId: number; name: string; location: SightingLocation | null; place: string | null }
  | { kind: 'sighting_added'; stoneId: number; sightingId: number; location: SightingLocation | null; place: string | null };

/**
 * `maxLength` is set when the answer was rejected for being longer than
 * the limit it names.
 */
export type IntakeStep =
  | { kind: 'prompt'; prompt: IntakePrompt; invalid: boolean; maxLength?: number }
  | { kind: 'completed'; result: CommitResult }
  | { kind: 'cancelled' }
  | { kind: 'failed'; error: StoneError }
  | { kind: 'ignored' };

/** Final outcome recorded on the session once it reaches terminal. */
export type IntakeOutcome =
  | { kind: 'completed'; result: CommitResult }
  | { kind: 'cancelled' }
  | { kind: 'failed'; error: StoneError };

/** The Registry writes an intake performs. */
export interface IntakeCommitter {
  createStone(input: StoneInsert): number;
  appendSighting(input: SightingInsert): number;
}

export interface IntakeDeps {
  committer: IntakeCommitter;
  geocoder: Geocoder;
  signals: Pick<SignalMatcher, 'match'>;
}

/** The accepted photo an intake session is about. */
export interface IntakeSubject {
  userId: string;
  embedding: Float32Array;
  imageRef: string;
}

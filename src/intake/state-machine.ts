// ---------------------------------------------------------------------------
// Intake state machine
// ---------------------------------------------------------------------------
//   initial -> awaiting_name -> awaiting_description -> awaiting_location
//   initial -> awaiting_location                         (matched stone)
//   awaiting_location -> committing -> terminal
//   any non-terminal state --cancel--> terminal          (no writes)
//
// The accepted location input switches to `committing` before the first
// await, so a duplicated terminating event finds the session busy and is
// ignored: exactly one Registry write per session.
// ---------------------------------------------------------------------------

import type { ReverseGeocode } from '../geo/geocoder.js';
import type { Resolution } from '../matching/resolver.js';
import { debug, errorMessage } from '../shared/debug.js';
import { StoneError, isStoneError } from '../shared/errors.js';
import {
  MAX_DESCRIPTION_LENGTH,
  MAX_NAME_LENGTH,
  MIN_NAME_LENGTH,
  charLength,
  type SightingLocation,
} from '../shared/types.js';
import type { Signal } from './signals.js';
import type {
  CommitResult,
  IntakeDeps,
  IntakeInput,
  IntakeOutcome,
  IntakePrompt,
  IntakeStateName,
  IntakeStep,
  IntakeSubject,
  IntakeTarget,
} from './types.js';

const POSTAL_MIN = 3;
const POSTAL_MAX = 10;

/**
 * True for a postal-code-shaped token: 3-10 characters of letters and
 * digits, hyphens and inner spaces allowed.
 */
export function isPostalCodeToken(text: string): boolean {
  const token = text.trim();
  const length = charLength(token);
  if (length < POSTAL_MIN || length > POSTAL_MAX) return false;
  return /^[\p{L}\p{N}]+$/u.test(token.replace(/[-\s]/g, ''));
}

/** "City, postal code, country" from whichever parts are known. */
export function describePlace(found: ReverseGeocode): string | null {
  const parts = [found.city, found.postalCode, found.country].filter(
    (part): part is string => part !== null && part.length > 0,
  );
  if (parts.length > 0) return parts.join(', ');
  return found.displayName;
}

type LocationChoice =
  | { kind: 'coordinates'; latitude: number; longitude: number }
  | { kind: 'postal_code'; postalCode: string }
  | { kind: 'none' };

function prompt(p: IntakePrompt, invalid = false): IntakeStep {
  return { kind: 'prompt', prompt: p, invalid };
}

function tooLong(p: IntakePrompt, maxLength: number): IntakeStep {
  return { kind: 'prompt', prompt: p, invalid: true, maxLength };
}

export class IntakeSession {
  private stateName: IntakeStateName = 'initial';
  private targetValue: IntakeTarget | null = null;
  private name: string | null = null;
  private description: string | null = null;
  private outcomeValue: IntakeOutcome | null = null;
  private postalRequested = false;

  constructor(
    readonly subject: IntakeSubject,
    private readonly deps: IntakeDeps,
  ) {}

  get state(): IntakeStateName {
    return this.stateName;
  }

  get target(): IntakeTarget | null {
    return this.targetValue;
  }

  get outcome(): IntakeOutcome | null {
    return this.outcomeValue;
  }

  /** Name and description collected so far. */
  get answers(): { name: string | null; description: string | null } {
    return { name: this.name, description: this.description };
  }

  /**
   * Picks the first question from the resolution decision.
   * A matched stone skips straight to the location.
   */
  start(decision: Resolution): IntakeStep {
    if (this.stateName !== 'initial') {
      return { kind: 'ignored' };
    }

    if (decision.kind === 'matched') {
      this.targetValue = {
        kind: 'existing_stone',
        stoneId: decision.stoneId,
        similarity: decision.similarity,
      };
      return this.moveTo('awaiting_location', prompt('location'));
    }

    this.targetValue = { kind: 'new_stone' };
    return this.moveTo('awaiting_name', prompt('name'));
  }

  /**
   * Feeds one user event to the session. Everything up to the commit runs
   * synchronously, so a caller that does not await still sees the new state.
   */
  async handle(input: IntakeInput): Promise<IntakeStep> {
    const state = this.stateName;
    if (state === 'committing' || state === 'terminal') {
      debug('intake', 'Input ignored', { state, input: input.kind });
      return { kind: 'ignored' };
    }

    const signal = this.signalOf(input);
    if (signal === 'cancel') {
      this.finish({ kind: 'cancelled' });
      return { kind: 'cancelled' };
    }

    switch (state) {
      case 'initial':
        return { kind: 'ignored' };
      case 'awaiting_name':
        return this.onName(input, signal);
      case 'awaiting_description':
        return this.onDescription(input, signal);
      case 'awaiting_location':
        return this.onLocation(input, signal);
    }
  }

  private signalOf(input: IntakeInput): Signal | null {
    if (input.kind === 'signal') return input.signal;
    if (input.kind !== 'text') return null;

    const signal = this.deps.signals.match(input.text);
    // Typed synonyms only stand for cancel while naming: "no" is a fine name.
    if (this.stateName === 'awaiting_name' && signal !== 'cancel') return null;
    return signal;
  }

  private onName(input: IntakeInput, signal: Signal | null): IntakeStep {
    if (input.kind !== 'text' || signal !== null) {
      return prompt('name', true);
    }

    const name = input.text.trim();
    const length = charLength(name);
    if (length < MIN_NAME_LENGTH) {
      return prompt('name', true);
    }
    if (length > MAX_NAME_LENGTH) {
      return tooLong('name', MAX_NAME_LENGTH);
    }

    this.name = name;
    return this.moveTo('awaiting_description', prompt('description'));
  }

  private onDescription(input: IntakeInput, signal: Signal | null): IntakeStep {
    if (signal === 'skip') {
      this.description = null;
      return this.moveTo('awaiting_location', prompt('location'));
    }
    if (input.kind !== 'text' || signal !== null) {
      return prompt('description', true);
    }

    const description = input.text.trim();
    if (charLength(description) > MAX_DESCRIPTION_LENGTH) {
      return tooLong('description', MAX_DESCRIPTION_LENGTH);
    }
    this.description = description.length > 0 ? description : null;
    return this.moveTo('awaiting_location', prompt('location'));
  }

  private onLocation(input: IntakeInput, signal: Signal | null): Promise<IntakeStep> | IntakeStep {
    let choice: LocationChoice;

    if (signal === 'postal_code') {
      this.postalRequested = true;
      return prompt('postal_code');
    } else if (signal === 'skip') {
      choice = { kind: 'none' };
    } else if (input.kind === 'location') {
      choice = { kind: 'coordinates', latitude: input.latitude, longitude: input.longitude };
    } else if (input.kind === 'text' && isPostalCodeToken(input.text)) {
      choice = { kind: 'postal_code', postalCode: input.text.trim() };
    } else {
      return prompt(this.postalRequested ? 'postal_code' : 'location', true);
    }

    // Set before the first await: a second event during geocoding is ignored.
    this.stateName = 'committing';
    return this.commit(choice);
  }

  private async commit(choice: LocationChoice): Promise<IntakeStep> {
    const { location, place } = await this.enrich(choice);

    let result: CommitResult;
    try {
      result = this.write(location, place);
    } catch (err) {
      const error = isStoneError(err)
        ? err
        : new StoneError('PERSISTENCE_FAILURE', 'Could not save the submission', { cause: err });
      debug('intake', 'Commit failed', { code: error.code, error: errorMessage(err) });
      this.finish({ kind: 'failed', error });
      return { kind: 'failed', error };
    }

    this.finish({ kind: 'completed', result });
    return { kind: 'completed', result };
  }

  private write(location: SightingLocation | null, place: string | null): CommitResult {
    const { userId, embedding, imageRef } = this.subject;
    const target = this.targetValue;

    if (target?.kind === 'existing_stone') {
      const sightingId = this.deps.committer.appendSighting({
        stoneId: target.stoneId,
        reporter: userId,
        imageRef,
        location,
      });
      return { kind: 'sighting_added', stoneId: target.stoneId, sightingId, location, place };
    }

    if (this.name === null) {
      throw new StoneError('INVALID_INPUT', 'A new stone needs a name');
    }

    const stoneId = this.deps.committer.createStone({
      name: this.name,
      description: this.description,
      embedding,
      imageRef,
      registrant: userId,
      location,
    });
    return { kind: 'stone_created', stoneId, name: this.name, location, place };
  }

  /** Best-effort geocoding; a null from the geocoder leaves the field empty. */
  private async enrich(
    choice: LocationChoice,
  ): Promise<{ location: SightingLocation | null; place: string | null }> {
    switch (choice.kind) {
      case 'none':
        return { location: null, place: null };

      case 'coordinates': {
        const found = await this.deps.geocoder.reverse(choice.latitude, choice.longitude);
        return {
          location: {
            latitude: choice.latitude,
            longitude: choice.longitude,
            postalCode: found?.postalCode ?? null,
          },
          place: found ? describePlace(found) : null,
        };
      }

      case 'postal_code': {
        const found = await this.deps.geocoder.forward(choice.postalCode);
        return {
          location: {
            latitude: found?.latitude ?? null,
            longitude: found?.longitude ?? null,
            postalCode: choice.postalCode,
          },
          place: null,
        };
      }
    }
  }

  private moveTo(state: IntakeStateName, step: IntakeStep): IntakeStep {
    debug('intake', 'Transition', { from: this.stateName, to: state, userId: this.subject.userId });
    this.stateName = state;
    return step;
  }

  private finish(outcome: IntakeOutcome): void {
    debug('intake', 'Session finished', { outcome: outcome.kind, userId: this.subject.userId });
    this.stateName = 'terminal';
    this.outcomeValue = outcome;
  }
}

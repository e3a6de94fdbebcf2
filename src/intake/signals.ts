/**
 * Language-independent intake signals.
 *
 * Buttons carry the signal code directly; typed text is matched against
 * synonym sets from every locale, so a user typing "pomiń" under an English
 * preference still skips.
 */

export const SIGNALS = ['skip', 'cancel', 'postal_code'] as const;

export type Signal = (typeof SIGNALS)[number];

export type SignalSynonyms = Record<Signal, readonly string[]>;

export function isSignal(value: string): value is Signal {
  return (SIGNALS as readonly string[]).includes(value);
}

function normalize(text: string): string {
  return text.trim().toLocaleLowerCase();
}

export class SignalMatcher {
  private readonly lookup = new Map<string, Signal>();

  constructor(synonyms: SignalSynonyms) {
    for (const signal of SIGNALS) {
      for (const phrase of synonyms[signal]) {
        const key = normalize(phrase);
        if (key.length > 0 && !this.lookup.has(key)) {
          this.lookup.set(key, signal);
        }
      }
    }
  }

  /** The signal a typed text stands for, or null for ordinary text. */
  match(text: string): Signal | null {
    return this.lookup.get(normalize(text)) ?? null;
  }
}

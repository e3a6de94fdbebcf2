import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { SIGNALS, SignalMatcher, type Signal, type SignalSynonyms } from '../intake/signals.js';
import { dataPath } from '../shared/data-path.js';
import { debug } from '../shared/debug.js';
import { DEFAULT_LOCALE, LOCALES, type Locale } from '../shared/types.js';

const LocaleFileSchema = z.object({
  languageName: z.string().min(1),
  messages: z.record(z.string()),
  signals: z.object({
    skip: z.array(z.string()),
    cancel: z.array(z.string()),
    postal_code: z.array(z.string()),
  }),
});

type LocaleFile = z.infer<typeof LocaleFileSchema>;

export type MessageParams = Record<string, string | number>;

/** Button labels that double as typed synonyms for their signal. */
const SIGNAL_BUTTON_KEYS: Record<Signal, string> = {
  skip: 'btn_skip',
  cancel: 'btn_cancel',
  postal_code: 'btn_enter_zip',
};

function interpolate(template: string, params: MessageParams | undefined): string {
  if (!params) return template;
  return template.replace(/\{(\w+)\}/g, (whole, name: string) =>
    name in params ? String(params[name]) : whole,
  );
}

/**
 * Localized message templates, button labels and signal synonyms.
 *
 * Lookup falls back to English, then to the key itself.
 */
export class LocaleCatalog {
  private readonly signalMatcher: SignalMatcher;

  private constructor(private readonly locales: Map<Locale, LocaleFile>) {
    const synonyms: Record<Signal, string[]> = { skip: [], cancel: [], postal_code: [] };
    for (const file of locales.values()) {
      for (const signal of SIGNALS) {
        synonyms[signal].push(...file.signals[signal]);
        const label = file.messages[SIGNAL_BUTTON_KEYS[signal]];
        if (label !== undefined) synonyms[signal].push(label);
      }
    }
    this.signalMatcher = new SignalMatcher(synonyms satisfies SignalSynonyms);
  }

  /** Reads data/locales/<locale>.json for every supported locale. */
  static load(dir = dataPath('locales')): LocaleCatalog {
    const locales = new Map<Locale, LocaleFile>();
    for (const locale of LOCALES) {
      const raw: unknown = JSON.parse(readFileSync(join(dir, `${locale}.json`), 'utf-8'));
      locales.set(locale, LocaleFileSchema.parse(raw));
    }
    debug('i18n', 'Locale catalog loaded', { locales: [...locales.keys()] });
    return new LocaleCatalog(locales);
  }

  t(locale: Locale, key: string, params?: MessageParams): string {
    const template =
      this.locales.get(locale)?.messages[key] ??
      this.locales.get(DEFAULT_LOCALE)?.messages[key] ??
      key;
    return interpolate(template, params);
  }

  languageName(locale: Locale): string {
    return this.locales.get(locale)?.languageName ?? locale;
  }

  /** Maps typed text to signals using every locale's synonyms. */
  get matcher(): SignalMatcher {
    return this.signalMatcher;
  }
}

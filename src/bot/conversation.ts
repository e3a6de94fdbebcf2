import type { PhotoAnalysis } from '../analysis/pipeline.js';
import type { Coordinates, Geocoder } from '../geo/geocoder.js';
import { renderRouteMap } from '../geo/map-renderer.js';
import type { LocaleCatalog } from '../i18n/catalog.js';
import { IntakeSessionStore } from '../intake/session-store.js';
import { isSignal, type Signal } from '../intake/signals.js';
import { IntakeSession } from '../intake/state-machine.js';
import type { IntakeInput, IntakeStep } from '../intake/types.js';
import { debug, errorMessage } from '../shared/debug.js';
import { isStoneError } from '../shared/errors.js';
import { LOCALES, isLocale, type Locale, type Sighting } from '../shared/types.js';
import type { Registry } from '../storage/registry.js';
import {
  formatCommit,
  formatInfo,
  formatMatch,
  formatStonePage,
  text,
  translator,
  type Translate,
} from './formatters.js';
import {
  isCommand,
  type Button,
  type OutboundMessage,
  type PhotoSubmission,
  type Reply,
  type UserContext,
} from './types.js';

export interface PhotoAnalyzerLike {
  analyze(image: Buffer): Promise<PhotoAnalysis>;
}

export interface PreferenceStore {
  getLocale(userId: string): Locale;
  setLocale(userId: string, locale: Locale): void;
}

export interface ImageSink {
  put(bytes: Buffer): string;
}

export type MapRenderer = (sightings: Sighting[], label: string) => Promise<Buffer | null>;

export interface ConversationDeps {
  analyzer: PhotoAnalyzerLike;
  registry: Registry;
  preferences: PreferenceStore;
  images: ImageSink;
  geocoder: Geocoder;
  catalog: LocaleCatalog;
  renderMap?: MapRenderer;
}

interface Turn {
  userId: string;
  locale: Locale;
  t: Translate;
}

/**
 * Transport-independent chat front end.
 *
 * Each entry point handles one inbound event for one user and returns the
 * messages to send back. Failures never escape: they are logged and turned
 * into a localized error message.
 */
export class ConversationService {
  private readonly sessions = new IntakeSessionStore();
  /** Stone a user was asked to confirm deleting. */
  private readonly pendingDeletes = new Map<string, number>();
  private readonly renderMap: MapRenderer;

  constructor(private readonly deps: ConversationDeps) {
    this.renderMap = deps.renderMap ?? renderRouteMap;
  }

  handlePhoto(user: UserContext, photo: PhotoSubmission): Promise<Reply> {
    return this.guard(user, 'photo', (turn) => this.onPhoto(turn, photo));
  }

  handleText(user: UserContext, message: string): Promise<Reply> {
    return this.guard(user, 'text', (turn) => this.feed(turn, { kind: 'text', text: message }));
  }

  handleLocation(user: UserContext, location: Coordinates): Promise<Reply> {
    return this.guard(user, 'location', (turn) =>
      this.feed(turn, { kind: 'location', latitude: location.latitude, longitude: location.longitude }),
    );
  }

  handleButton(user: UserContext, code: string): Promise<Reply> {
    return this.guard(user, 'button', (turn) => this.onButton(turn, code));
  }

  /** `command` without the leading slash; `args` already split on whitespace. */
  handleCommand(user: UserContext, command: string, args: string[] = []): Promise<Reply> {
    return this.guard(user, 'command', (turn) => this.onCommand(turn, command.toLowerCase(), args));
  }

  /** Live intake sessions, for status reporting. */
  activeSessions(): number {
    return this.sessions.size();
  }

  // ---------------------------------------------------------------------------
  // Photo intake
  // ---------------------------------------------------------------------------

  private async onPhoto(turn: Turn, photo: PhotoSubmission): Promise<Reply> {
    const { t } = turn;
    // A new photo starts over, even when it is rejected.
    this.sessions.discard(turn.userId);

    let analysis: PhotoAnalysis;
    try {
      analysis = await this.deps.analyzer.analyze(photo.image);
    } catch (err) {
      if (isStoneError(err, 'NO_SUBJECT_DETECTED')) return this.say(t('stone_not_found'), 'photo');
      if (isStoneError(err, 'NOT_A_STONE')) return this.say(t('stone_not_recognized'), 'photo');
      if (isStoneError(err, 'EXTRACTION_FAILURE')) return this.say(t('error_photo'), 'photo');
      throw err;
    }

    const imageRef = photo.imageRef ?? this.deps.images.put(photo.image);
    const session = new IntakeSession(
      { userId: turn.userId, embedding: analysis.embedding, imageRef },
      { committer: this.deps.registry, geocoder: this.deps.geocoder, signals: this.deps.catalog.matcher },
    );
    this.sessions.begin(session);

    const messages: OutboundMessage[] = [
      { kind: 'image', data: analysis.thumbnail, mimeType: 'image/jpeg', caption: t('cropped_stone') },
    ];

    const { decision } = analysis;
    if (decision.kind === 'matched') {
      const stone = this.deps.registry.get(decision.stoneId);
      if (stone !== null) {
        messages.push(text(formatMatch(t, stone, decision.similarity)));
      }
    } else {
      messages.push(text(t('new_stone')));
    }

    const reply = this.stepReply(turn, session, session.start(decision));
    return { messages: [...messages, ...reply.messages], expect: reply.expect };
  }

  private async feed(turn: Turn, input: IntakeInput): Promise<Reply> {
    const session = this.sessions.get(turn.userId);
    if (session === null) {
      return this.say(turn.t('send_photo_first'), 'photo');
    }

    const step = await session.handle(input);
    const reply = this.stepReply(turn, session, step);

    if (step.kind === 'completed' && step.result.kind === 'sighting_added') {
      const map = await this.mapFor(turn, step.result.stoneId);
      if (map) reply.messages.push(map);
    }
    return reply;
  }

  private stepReply(turn: Turn, session: IntakeSession, step: IntakeStep): Reply {
    const { t } = turn;
    const cancel: Button = { label: t('btn_cancel'), code: 'intake:cancel' };
    const skip: Button = { label: t('btn_skip'), code: 'intake:skip' };

    if (step.kind === 'completed' || step.kind === 'cancelled' || step.kind === 'failed') {
      this.sessions.end(session);
    }

    switch (step.kind) {
      case 'ignored':
        return { messages: [], expect: session.state === 'terminal' ? 'done' : 'text' };

      case 'cancelled':
        return this.say(t('cancelled'), 'done');

      case 'failed':
        debug('bot', 'Intake failed', { userId: turn.userId, code: step.error.code });
        return this.say(t('error_save'), 'photo');

      case 'completed':
        return this.say(formatCommit(t, step.result), 'done');

      case 'prompt':
        switch (step.prompt) {
          case 'name': {
            const body =
              step.maxLength !== undefined
                ? t('name_too_long', { max: step.maxLength })
                : t(step.invalid ? 'name_too_short' : 'enter_name');
            return this.say(body, 'text', [[cancel]]);
          }
          case 'description':
            return this.say(
              step.maxLength !== undefined
                ? t('description_too_long', { max: step.maxLength })
                : t('add_description', { name: session.answers.name ?? '' }),
              'text',
              [[skip, cancel]],
            );
          case 'location':
            return this.say(t(step.invalid ? 'location_invalid' : 'location_prompt'), 'location', [
              [{ label: t('btn_enter_zip'), code: 'intake:postal_code' }],
              [skip, cancel],
            ]);
          case 'postal_code':
            return this.say(
              step.invalid ? `${t('location_invalid')}\n${t('enter_zip')}` : t('enter_zip'),
              'text',
              [[skip, cancel]],
            );
        }
    }
  }

  private async mapFor(turn: Turn, stoneId: number): Promise<OutboundMessage | null> {
    const stone = this.deps.registry.get(stoneId);
    if (stone === null) return null;

    try {
      const png = await this.renderMap(stone.sightings, stone.name);
      if (png === null) return null;
      return { kind: 'image', data: png, mimeType: 'image/png', caption: turn.t('map_caption') };
    } catch (err) {
      // The sighting is already saved; a missing map is not worth failing the reply.
      debug('bot', 'Route map failed', { stoneId, error: errorMessage(err) });
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Buttons
  // ---------------------------------------------------------------------------

  private async onButton(turn: Turn, code: string): Promise<Reply> {
    const [scope, value, extra] = code.split(':');

    switch (scope) {
      case 'intake':
        if (value !== undefined && isSignal(value)) {
          return this.feedSignal(turn, value);
        }
        break;

      case 'page':
        return this.listStones(turn, Number(value));

      case 'delete':
        if (value === 'confirm') return this.confirmDelete(turn, Number(extra));
        if (value === 'cancel') return this.cancelDelete(turn);
        break;

      case 'lang':
        if (value !== undefined && isLocale(value)) return this.setLanguage(turn, value);
        break;
    }

    debug('bot', 'Unknown button', { code });
    return { messages: [], expect: 'done' };
  }

  private feedSignal(turn: Turn, signal: Signal): Promise<Reply> {
    return this.feed(turn, { kind: 'signal', signal });
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  private async onCommand(turn: Turn, command: string, args: string[]): Promise<Reply> {
    const { t } = turn;
    if (!isCommand(command)) {
      return this.say(t('unknown_command'), 'done');
    }

    switch (command) {
      case 'start':
        return this.say(t('start'), 'photo');

      case 'help':
        return this.say(t('help'), 'photo');

      case 'mine': {
        const page = args[0] === undefined ? 1 : Number.parseInt(args[0], 10);
        return this.listStones(turn, Number.isNaN(page) ? 0 : page - 1);
      }

      case 'info':
        return this.showInfo(turn, parseId(args[0]));

      case 'delete':
        return this.askDelete(turn, parseId(args[0]));

      case 'lang': {
        const code = args[0]?.toLowerCase();
        if (code !== undefined && isLocale(code)) return this.setLanguage(turn, code);
        const buttons = LOCALES.map((locale) => ({
          label: this.deps.catalog.languageName(locale),
          code: `lang:${locale}`,
        }));
        return this.say(t('lang_select'), 'confirmation', [buttons]);
      }

      case 'cancel':
        return this.cancel(turn);
    }
  }

  private listStones(turn: Turn, page: number): Reply {
    const result = this.deps.registry.listByRegistrant(turn.userId, Number.isFinite(page) ? page : 0);
    if (result.total === 0) {
      return this.say(turn.t('no_stones'), 'photo');
    }
    return { messages: [formatStonePage(turn.t, result)], expect: 'done' };
  }

  private async showInfo(turn: Turn, stoneId: number | null): Promise<Reply> {
    const { t } = turn;
    if (stoneId === null) return this.say(t('info_usage'), 'done');

    const stone = this.deps.registry.get(stoneId);
    if (stone === null) return this.say(t('info_not_found', { id: stoneId }), 'done');

    const messages: OutboundMessage[] = [text(formatInfo(t, stone))];
    const map = await this.mapFor(turn, stoneId);
    if (map) messages.push(map);
    return { messages, expect: 'done' };
  }

  private askDelete(turn: Turn, stoneId: number | null): Reply {
    const { t } = turn;
    if (stoneId === null) return this.say(t('delete_usage'), 'done');

    try {
      const stone = this.deps.registry.findOwned(stoneId, turn.userId);
      this.pendingDeletes.set(turn.userId, stoneId);
      return this.say(t('delete_confirm', { name: stone.name, id: stone.id }), 'confirmation', [
        [
          { label: t('btn_confirm_delete'), code: `delete:confirm:${stone.id}` },
          { label: t('btn_cancel_delete'), code: 'delete:cancel' },
        ],
      ]);
    } catch (err) {
      if (isStoneError(err, 'NOT_FOUND') || isStoneError(err, 'NOT_OWNER')) {
        return this.say(t('delete_not_found', { id: stoneId }), 'done');
      }
      throw err;
    }
  }

  private confirmDelete(turn: Turn, stoneId: number): Reply {
    const { t } = turn;
    // Only the stone the user was just asked about; stale buttons do nothing.
    if (this.pendingDeletes.get(turn.userId) !== stoneId) {
      return this.say(t('delete_cancelled'), 'done');
    }
    this.pendingDeletes.delete(turn.userId);

    try {
      const name = this.deps.registry.delete(stoneId, turn.userId);
      return this.say(t('delete_success', { name }), 'done');
    } catch (err) {
      if (isStoneError(err, 'NOT_FOUND') || isStoneError(err, 'NOT_OWNER')) {
        return this.say(t('delete_not_found', { id: stoneId }), 'done');
      }
      throw err;
    }
  }

  private cancelDelete(turn: Turn): Reply {
    this.pendingDeletes.delete(turn.userId);
    return this.say(turn.t('delete_cancelled'), 'done');
  }

  private async cancel(turn: Turn): Promise<Reply> {
    if (this.pendingDeletes.delete(turn.userId)) {
      return this.say(turn.t('delete_cancelled'), 'done');
    }
    if (this.sessions.get(turn.userId) !== null) {
      return this.feedSignal(turn, 'cancel');
    }
    return this.say(turn.t('nothing_to_cancel'), 'done');
  }

  private setLanguage(turn: Turn, locale: Locale): Reply {
    this.deps.preferences.setLocale(turn.userId, locale);
    return this.say(this.deps.catalog.t(locale, 'lang_changed'), 'done');
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private say(body: string, expect: Reply['expect'], buttons: Button[][] = []): Reply {
    return { messages: [text(body, buttons)], expect };
  }

  private async guard(
    user: UserContext,
    event: string,
    fn: (turn: Turn) => Promise<Reply> | Reply,
  ): Promise<Reply> {
    const locale = this.deps.preferences.getLocale(user.userId);
    const turn: Turn = { userId: user.userId, locale, t: translator(this.deps.catalog, locale) };

    try {
      return await fn(turn);
    } catch (err) {
      debug('bot', `Failed to handle ${event}`, {
        userId: user.userId,
        code: isStoneError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
      return this.say(turn.t('error_generic'), 'done');
    }
  }
}

function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !/^#?\d+$/.test(raw)) return null;
  const id = Number.parseInt(raw.replace('#', ''), 10);
  return id > 0 ? id : null;
}

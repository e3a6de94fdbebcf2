import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { PhotoAnalysis } from '../../analysis/pipeline.js';
import { LocaleCatalog } from '../../i18n/catalog.js';
import { createIdentityIndex } from '../../matching/identity-index.js';
import type { Resolution } from '../../matching/resolver.js';
import { StoneError } from '../../shared/errors.js';
import { openDatabase, type StonetrailDatabase } from '../../storage/database.js';
import { PreferenceRepository } from '../../storage/preferences.js';
import { Registry } from '../../storage/registry.js';
import { createTempDb, randomUnitVector, seededRandom } from '../../storage/__tests__/test-utils.js';
import { ConversationService } from '../conversation.js';
import type { OutboundMessage, Reply } from '../types.js';

const catalog = LocaleCatalog.load();
const alice = { userId: 'alice' };
const bob = { userId: 'bob' };
const thumbnail = Buffer.from('thumb');
const mapPng = Buffer.from('png');

function texts(reply: Reply): string[] {
  return reply.messages.flatMap((m) => (m.kind === 'text' ? [m.text] : []));
}

function lastText(reply: Reply): string {
  const all = texts(reply);
  return all[all.length - 1] ?? '';
}

function buttonCodes(reply: Reply): string[] {
  return reply.messages.flatMap((m: OutboundMessage) =>
    m.kind === 'text' ? m.buttons.flat().map((b) => b.code) : [],
  );
}

describe('ConversationService', () => {
  let ldb: StonetrailDatabase;
  let cleanup: () => void;
  let registry: Registry;
  let preferences: PreferenceRepository;
  let service: ConversationService;
  const rng = seededRandom(5);

  const analyzer = { analyze: vi.fn<(image: Buffer) => Promise<PhotoAnalysis>>() };
  const geocoder = { reverse: vi.fn(), forward: vi.fn() };
  const images = { put: vi.fn().mockReturnValue('sha256:abc') };
  const renderMap = vi.fn().mockResolvedValue(mapPng);

  function analysis(decision: Resolution, embedding = randomUnitVector(rng)): PhotoAnalysis {
    return { embedding, crop: Buffer.from('crop'), thumbnail, score: 0.12, decision };
  }

  async function registerViaChat(name: string, user = alice): Promise<number> {
    analyzer.analyze.mockResolvedValueOnce(analysis({ kind: 'no_match', bestSimilarity: null }));
    await service.handlePhoto(user, { image: Buffer.from('photo'), imageRef: `tg-${name}` });
    await service.handleText(user, name);
    await service.handleButton(user, 'intake:skip');
    await service.handleButton(user, 'intake:skip');
    return registry.count();
  }

  beforeEach(() => {
    const tmp = createTempDb();
    cleanup = tmp.cleanup;
    ldb = openDatabase(tmp.config);
    registry = new Registry(ldb, createIdentityIndex(ldb, 'linear'));
    preferences = new PreferenceRepository(ldb.db);
    analyzer.analyze.mockReset();
    geocoder.reverse.mockReset().mockResolvedValue(null);
    geocoder.forward.mockReset().mockResolvedValue(null);
    images.put.mockClear();
    renderMap.mockClear();
    service = new ConversationService({
      analyzer,
      registry,
      preferences,
      images,
      geocoder,
      catalog,
      renderMap,
    });
  });

  afterEach(() => {
    ldb.close();
    cleanup();
  });

  describe('photo intake', () => {
    it('walks a new stone from photo to registration', async () => {
      analyzer.analyze.mockResolvedValue(analysis({ kind: 'no_match', bestSimilarity: null }));

      const photo = await service.handlePhoto(alice, { image: Buffer.from('photo') });
      expect(photo.messages[0]).toEqual({
        kind: 'image',
        data: thumbnail,
        mimeType: 'image/jpeg',
        caption: '📷 Recognized stone',
      });
      expect(texts(photo)).toEqual(['🆕 New stone!', 'Enter a name for the stone:']);
      expect(photo.expect).toBe('text');
      expect(images.put).toHaveBeenCalledTimes(1);

      const short = await service.handleText(alice, 'D');
      expect(lastText(short)).toBe('Name too short. Enter a name (minimum 2 characters):');

      const named = await service.handleText(alice, 'Dragonfly');
      expect(lastText(named)).toBe('Name: Dragonfly\n\nAdd a description? (or press «Skip»)');
      expect(buttonCodes(named)).toEqual(['intake:skip', 'intake:cancel']);

      const described = await service.handleButton(alice, 'intake:skip');
      expect(described.expect).toBe('location');
      expect(buttonCodes(described)).toEqual(['intake:postal_code', 'intake:skip', 'intake:cancel']);

      const done = await service.handleButton(alice, 'intake:skip');
      expect(lastText(done)).toBe('✅ Stone «Dragonfly» registered! ID: 1');
      expect(done.expect).toBe('done');
      expect(service.activeSessions()).toBe(0);

      const stone = registry.get(1);
      expect(stone?.registrant).toBe('alice');
      expect(stone?.sightings[0].imageRef).toBe('sha256:abc');
    });

    it('adds a sighting to a recognized stone and attaches the route map', async () => {
      await registerViaChat('Dragonfly');

      analyzer.analyze.mockResolvedValue(
        analysis({ kind: 'matched', stoneId: 1, similarity: 0.91 }),
      );
      const photo = await service.handlePhoto(bob, { image: Buffer.from('photo'), imageRef: 'tg-2' });
      expect(texts(photo)[0]).toBe(
        '✅ Stone found!\n\n🔢 ID: 1\n📛 Name: Dragonfly\n📍 Seen 1 time(s)\n🎯 Match: 91%',
      );
      expect(photo.expect).toBe('location');

      geocoder.reverse.mockResolvedValue({
        postalCode: '00-277',
        city: 'Warszawa',
        country: 'Polska',
        displayName: null,
      });
      const done = await service.handleLocation(bob, { latitude: 52.2478, longitude: 21.0136 });

      expect(texts(done)).toEqual([
        '✅ Saved to history!\n🗺 Location: Warszawa, 00-277, Polska\n📮 ZIP: 00-277\n📍 Coordinates: 52.2478, 21.0136',
      ]);
      expect(done.messages[1]).toEqual({
        kind: 'image',
        data: mapPng,
        mimeType: 'image/png',
        caption: '🗺 Journey map\n🟢 start → 🔴 finish',
      });
      expect(renderMap).toHaveBeenCalledTimes(1);
      expect(registry.get(1)?.sightings.map((s) => s.reporter)).toEqual(['alice', 'bob']);
    });

    it('takes a typed postal code after the postal code button', async () => {
      await registerViaChat('Dragonfly');
      analyzer.analyze.mockResolvedValue(analysis({ kind: 'matched', stoneId: 1, similarity: 0.9 }));
      await service.handlePhoto(alice, { image: Buffer.from('p'), imageRef: 'tg-3' });

      const asked = await service.handleButton(alice, 'intake:postal_code');
      expect(lastText(asked)).toBe('Enter ZIP code:');

      const done = await service.handleText(alice, '00-001');
      expect(lastText(done)).toBe('✅ Saved to history!\n📮 ZIP: 00-001');
      expect(geocoder.forward).toHaveBeenCalledWith('00-001');
    });

    it('explains why a photo was rejected', async () => {
      analyzer.analyze.mockRejectedValueOnce(new StoneError('NOT_A_STONE', 'nope'));
      const rejected = await service.handlePhoto(alice, { image: Buffer.from('x') });
      expect(lastText(rejected)).toBe(
        '❌ This does not look like a painted stone.\n\nMake sure it is a flat painted stone and try again.',
      );
      expect(rejected.expect).toBe('photo');

      analyzer.analyze.mockRejectedValueOnce(new StoneError('EXTRACTION_FAILURE', 'down'));
      const failed = await service.handlePhoto(alice, { image: Buffer.from('x') });
      expect(lastText(failed)).toBe('❌ Error processing photo. Please try again.');
      expect(service.activeSessions()).toBe(0);
    });

    it('drops the unfinished intake when a new photo is rejected', async () => {
      analyzer.analyze.mockResolvedValueOnce(analysis({ kind: 'no_match', bestSimilarity: null }));
      await service.handlePhoto(alice, { image: Buffer.from('first') });
      expect(service.activeSessions()).toBe(1);

      analyzer.analyze.mockRejectedValueOnce(new StoneError('NOT_A_STONE', 'nope'));
      await service.handlePhoto(alice, { image: Buffer.from('second') });
      expect(service.activeSessions()).toBe(0);

      const reply = await service.handleText(alice, 'Rocky');
      expect(lastText(reply)).toBe('Send me a photo of a stone to begin.');
      expect(registry.count()).toBe(0);
    });

    it('keeps asking when an answer is too long, then saves', async () => {
      analyzer.analyze.mockResolvedValue(analysis({ kind: 'no_match', bestSimilarity: null }));
      await service.handlePhoto(alice, { image: Buffer.from('photo') });

      const longName = await service.handleText(alice, 'x'.repeat(256));
      expect(lastText(longName)).toBe('Name too long. Enter a name of at most 255 characters:');
      expect(longName.expect).toBe('text');

      await service.handleText(alice, 'Rocky');
      const longDescription = await service.handleText(alice, 'd'.repeat(2001));
      expect(lastText(longDescription)).toBe(
        'Description too long (maximum 2000 characters). Send a shorter one or press «Skip».',
      );
      expect(buttonCodes(longDescription)).toEqual(['intake:skip', 'intake:cancel']);

      await service.handleButton(alice, 'intake:skip');
      const done = await service.handleButton(alice, 'intake:skip');
      expect(lastText(done)).toBe('✅ Stone «Rocky» registered! ID: 1');
      expect(registry.get(1)?.description).toBeNull();
    });

    it('treats a one-emoji name as too short', async () => {
      analyzer.analyze.mockResolvedValue(analysis({ kind: 'no_match', bestSimilarity: null }));
      await service.handlePhoto(alice, { image: Buffer.from('photo') });

      const reply = await service.handleText(alice, '🪨');
      expect(lastText(reply)).toBe('Name too short. Enter a name (minimum 2 characters):');
      expect(service.activeSessions()).toBe(1);
    });

    it('asks for a photo when text arrives with no session', async () => {
      const reply = await service.handleText(alice, 'hello');
      expect(reply).toEqual({
        messages: [{ kind: 'text', text: 'Send me a photo of a stone to begin.', buttons: [] }],
        expect: 'photo',
      });
    });

    it('cancels an intake from the cancel command', async () => {
      analyzer.analyze.mockResolvedValue(analysis({ kind: 'no_match', bestSimilarity: 0.3 }));
      await service.handlePhoto(alice, { image: Buffer.from('photo') });
      await service.handleText(alice, 'Owl');

      const cancelled = await service.handleCommand(alice, 'cancel');
      expect(lastText(cancelled)).toBe('Operation cancelled.');
      expect(registry.count()).toBe(0);

      const again = await service.handleCommand(alice, 'cancel');
      expect(lastText(again)).toBe('Nothing to cancel.');
    });

    it('replies in the user language and accepts typed synonyms from any language', async () => {
      preferences.setLocale('alice', 'pl');
      analyzer.analyze.mockResolvedValue(analysis({ kind: 'no_match', bestSimilarity: null }));
      await service.handlePhoto(alice, { image: Buffer.from('photo') });
      await service.handleText(alice, 'Sowa');
      await service.handleText(alice, 'skip');
      const done = await service.handleText(alice, 'ПРОПУСТИТЬ');

      expect(lastText(done)).toBe('✅ Kamyk «Sowa» zarejestrowany! ID: 1');
    });
  });

  describe('commands', () => {
    it('pages through the stones a user registered', async () => {
      for (let i = 1; i <= 12; i++) {
        await registerViaChat(`Stone ${i}`);
      }

      const first = await service.handleCommand(alice, 'mine');
      const firstText = lastText(first);
      expect(firstText.startsWith('🪨 Your stones:\n\n#1 Stone 1 (seen 1)\n')).toBe(true);
      expect(firstText.endsWith('\n\n📄 Page 1/2 (stones: 12)')).toBe(true);
      expect(buttonCodes(first)).toEqual(['page:1']);

      const second = await service.handleButton(alice, 'page:1');
      expect(lastText(second)).toBe(
        '🪨 Your stones:\n\n#11 Stone 11 (seen 1)\n#12 Stone 12 (seen 1)\n\n📄 Page 2/2 (stones: 12)',
      );
      expect(buttonCodes(second)).toEqual(['page:0']);

      const empty = await service.handleCommand(bob, 'mine');
      expect(lastText(empty)).toBe(
        "You don't have any registered stones yet.\n\nSend a photo of a stone to register one!",
      );
    });

    it('shows stone details with the route map', async () => {
      await registerViaChat('Dragonfly');
      const info = await service.handleCommand(alice, 'info', ['1']);

      expect(lastText(info).split('\n').slice(0, 3)).toEqual([
        '🔢 ID: 1',
        '📛 Name: Dragonfly',
        '📍 Seen 1 time(s)',
      ]);
      expect(info.messages[1]?.kind).toBe('image');

      expect(lastText(await service.handleCommand(alice, 'info'))).toBe(
        'Usage: /info <id>\nExample: /info 5',
      );
      expect(lastText(await service.handleCommand(alice, 'info', ['9']))).toBe(
        '❌ Stone #9 not found.',
      );
    });

    it('deletes only after confirmation', async () => {
      await registerViaChat('Dragonfly');

      const ask = await service.handleCommand(alice, 'delete', ['1']);
      expect(ask.expect).toBe('confirmation');
      expect(buttonCodes(ask)).toEqual(['delete:confirm:1', 'delete:cancel']);
      expect(registry.count()).toBe(1);

      const done = await service.handleButton(alice, 'delete:confirm:1');
      expect(lastText(done)).toBe('✅ Stone «Dragonfly» has been deleted.');
      expect(registry.get(1)).toBeNull();
    });

    it('refuses to delete another user stone', async () => {
      await registerViaChat('Dragonfly');

      const ask = await service.handleCommand(bob, 'delete', ['1']);
      expect(lastText(ask)).toBe("❌ Stone #1 not found or doesn't belong to you.");

      const forged = await service.handleButton(bob, 'delete:confirm:1');
      expect(lastText(forged)).toBe('Deletion cancelled.');
      expect(registry.count()).toBe(1);
    });

    it('keeps the stone when the deletion is cancelled', async () => {
      await registerViaChat('Dragonfly');
      await service.handleCommand(alice, 'delete', ['1']);

      const cancelled = await service.handleButton(alice, 'delete:cancel');
      expect(lastText(cancelled)).toBe('Deletion cancelled.');

      const stale = await service.handleButton(alice, 'delete:confirm:1');
      expect(lastText(stale)).toBe('Deletion cancelled.');
      expect(registry.count()).toBe(1);
    });

    it('stores the chosen language', async () => {
      const menu = await service.handleCommand(alice, 'lang');
      expect(buttonCodes(menu)).toEqual(['lang:en', 'lang:pl', 'lang:ru']);

      const changed = await service.handleButton(alice, 'lang:ru');
      expect(lastText(changed)).toBe(catalog.t('ru', 'lang_changed'));
      expect(preferences.getLocale('alice')).toBe('ru');

      await service.handleCommand(alice, 'lang', ['PL']);
      expect(preferences.getLocale('alice')).toBe('pl');
    });

    it('answers unknown commands', async () => {
      expect(lastText(await service.handleCommand(alice, 'frobnicate'))).toBe(
        'Unknown command. Send /help to see what I can do.',
      );
    });
  });

  it('turns unexpected failures into a generic error', async () => {
    analyzer.analyze.mockRejectedValueOnce(new Error('boom'));
    const reply = await service.handlePhoto(alice, { image: Buffer.from('x') });
    expect(lastText(reply)).toBe('❌ An error occurred. Please try again.');
  });
});

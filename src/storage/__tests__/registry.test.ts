import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { openDatabase } from '../database.js';
import type { StonetrailDatabase } from '../database.js';
import { Registry } from '../registry.js';
import { createIdentityIndex, type IdentityIndex, type IndexKind } from '../../matching/identity-index.js';
import { Resolver } from '../../matching/resolver.js';
import { isStoneError } from '../../shared/errors.js';
import { createTempDb, randomUnitVector, seededRandom } from './test-utils.js';

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isStoneError(err) ? err.code : 'UNEXPECTED';
  }
  return undefined;
}

describe('Registry', () => {
  let ldb: StonetrailDatabase;
  let cleanup: () => void;
  let index: IdentityIndex;
  let registry: Registry;
  const rng = seededRandom(7);

  function register(name: string, registrant = 'alice'): number {
    return registry.createStone({
      name,
      embedding: randomUnitVector(rng),
      imageRef: `file-${name}`,
      registrant,
    });
  }

  beforeEach(() => {
    const tmp = createTempDb();
    cleanup = tmp.cleanup;
    ldb = openDatabase(tmp.config);
    index = createIdentityIndex(ldb, 'linear');
    registry = new Registry(ldb, index);
  });

  afterEach(() => {
    try {
      ldb?.close();
    } catch {
      // already closed
    }
    cleanup();
  });

  it('creates a stone together with its first sighting', () => {
    const id = registry.createStone({
      name: '  Dragonfly ',
      description: null,
      embedding: randomUnitVector(rng),
      imageRef: 'file-1',
      registrant: 'alice',
    });

    const stone = registry.get(id);
    expect(stone).not.toBeNull();
    expect(stone!.name).toBe('Dragonfly');
    expect(stone!.description).toBeNull();
    expect(stone!.registrant).toBe('alice');
    expect(stone!.sightings).toHaveLength(1);
    expect(stone!.sightings[0].reporter).toBe('alice');
    expect(stone!.sightings[0].imageRef).toBe('file-1');
    expect(stone!.sightings[0].location).toEqual({
      latitude: null,
      longitude: null,
      postalCode: null,
    });
  });

  it('stores an empty description as absent', () => {
    const id = registry.createStone({
      name: 'Owl',
      description: '   ',
      embedding: randomUnitVector(rng),
      imageRef: 'file-owl',
      registrant: 'alice',
    });

    expect(registry.get(id)!.description).toBeNull();
  });

  it('round-trips the embedding exactly', () => {
    const embedding = randomUnitVector(rng);
    const id = registry.createStone({
      name: 'Comet',
      embedding,
      imageRef: 'file-comet',
      registrant: 'alice',
    });

    expect(Array.from(registry.get(id)!.embedding)).toEqual(Array.from(embedding));
  });

  it('rejects a name shorter than two characters', () => {
    expect(errorCode(() => register(' A '))).toBe('INVALID_INPUT');
    expect(registry.count()).toBe(0);
  });

  it('measures name bounds in characters, not UTF-16 units', () => {
    expect(errorCode(() => register('🪨'))).toBe('INVALID_INPUT');
    expect(errorCode(() => register('x'.repeat(256)))).toBe('INVALID_INPUT');
    expect(registry.count()).toBe(0);

    const id = register('🪨'.repeat(255));
    expect(registry.get(id)?.name).toBe('🪨'.repeat(255));
  });

  it('rejects an embedding with the wrong dimensionality', () => {
    const code = errorCode(() =>
      registry.createStone({
        name: 'Short',
        embedding: new Float32Array(8).fill(0.5),
        imageRef: 'file-short',
        registrant: 'alice',
      }),
    );
    expect(code).toBe('INVALID_INPUT');
  });

  it('rolls back the stone when the first sighting cannot be written', () => {
    ldb.db.exec('DROP TABLE sightings');

    expect(errorCode(() => register('Doomed'))).toBe('PERSISTENCE_FAILURE');
    expect(registry.count()).toBe(0);
    expect(index.size()).toBe(0);
  });

  it('appends sightings in chronological order', () => {
    const id = register('Turtle');
    registry.appendSighting({
      stoneId: id,
      reporter: 'bob',
      imageRef: 'file-b',
      location: { latitude: 52.23, longitude: 21.01, postalCode: '00-001' },
    });
    registry.appendSighting({ stoneId: id, reporter: 'carol', imageRef: 'file-c' });

    const sightings = registry.get(id)!.sightings;
    expect(sightings.map((s) => s.reporter)).toEqual(['alice', 'bob', 'carol']);
    for (let i = 1; i < sightings.length; i++) {
      expect(sightings[i].observedAt >= sightings[i - 1].observedAt).toBe(true);
      expect(sightings[i].id).toBeGreaterThan(sightings[i - 1].id);
    }
    expect(sightings[1].location).toEqual({
      latitude: 52.23,
      longitude: 21.01,
      postalCode: '00-001',
    });
  });

  it('refuses a sighting for an unknown stone', () => {
    const code = errorCode(() =>
      registry.appendSighting({ stoneId: 999, reporter: 'bob', imageRef: 'file-x' }),
    );
    expect(code).toBe('NOT_FOUND');
  });

  it('returns null for an unknown stone', () => {
    expect(registry.get(42)).toBeNull();
  });

  describe('listByRegistrant', () => {
    beforeEach(() => {
      for (let i = 1; i <= 23; i++) {
        register(`Stone ${i}`);
      }
      register('Not mine', 'bob');
    });

    it('pages ten at a time in id order', () => {
      const first = registry.listByRegistrant('alice', 0);
      expect(first.items).toHaveLength(10);
      expect(first.page).toBe(0);
      expect(first.totalPages).toBe(3);
      expect(first.total).toBe(23);
      expect(first.items[0].stone.name).toBe('Stone 1');
      expect(first.items[0].sightingCount).toBe(1);

      const last = registry.listByRegistrant('alice', 2);
      expect(last.items).toHaveLength(3);
      expect(last.items.map((i) => i.stone.name)).toEqual(['Stone 21', 'Stone 22', 'Stone 23']);
    });

    it('clamps out-of-range pages', () => {
      const beyond = registry.listByRegistrant('alice', 5);
      expect(beyond.page).toBe(2);
      expect(beyond.items).toHaveLength(3);

      const negative = registry.listByRegistrant('alice', -3);
      expect(negative.page).toBe(0);
      expect(negative.items).toHaveLength(10);
    });

    it('returns an empty first page for a user with no stones', () => {
      const page = registry.listByRegistrant('nobody', 4);
      expect(page).toEqual({ items: [], page: 0, totalPages: 0, total: 0 });
    });
  });

  describe('delete', () => {
    it('refuses a requester who is not the registrant', () => {
      const id = register('Ladybird', 'alice');
      registry.appendSighting({ stoneId: id, reporter: 'bob', imageRef: 'file-b' });

      expect(errorCode(() => registry.delete(id, 'bob'))).toBe('NOT_OWNER');

      const stone = registry.get(id);
      expect(stone).not.toBeNull();
      expect(stone!.sightings).toHaveLength(2);
    });

    it('reports NOT_FOUND for a missing stone', () => {
      expect(errorCode(() => registry.delete(404, 'alice'))).toBe('NOT_FOUND');
    });

    it('removes the stone and all of its sightings', () => {
      const id = register('Snail', 'alice');
      registry.appendSighting({ stoneId: id, reporter: 'bob', imageRef: 'file-b' });

      expect(registry.delete(id, 'alice')).toBe('Snail');
      expect(registry.get(id)).toBeNull();

      const orphans = ldb.db
        .prepare('SELECT COUNT(*) AS count FROM sightings WHERE stone_id = ?')
        .get(id) as { count: number };
      expect(orphans.count).toBe(0);
    });
  });

  it('findOwned returns the stone only to its registrant', () => {
    const id = register('Bee', 'alice');
    expect(registry.findOwned(id, 'alice').name).toBe('Bee');
    expect(errorCode(() => registry.findOwned(id, 'bob'))).toBe('NOT_OWNER');
    expect(errorCode(() => registry.findOwned(id + 1, 'alice'))).toBe('NOT_FOUND');
  });

  it('listAll reports the latest located sighting', () => {
    const id = register('Fox');
    registry.appendSighting({
      stoneId: id,
      reporter: 'bob',
      imageRef: 'file-b',
      location: { latitude: 50.06, longitude: 19.94, postalCode: null },
    });
    registry.appendSighting({ stoneId: id, reporter: 'carol', imageRef: 'file-c' });
    register('Hedgehog');

    const all = registry.listAll();
    expect(all).toHaveLength(2);
    expect(all[0].sightingCount).toBe(3);
    expect(all[0].latestLocated?.reporter).toBe('bob');
    expect(all[0].latestLocated?.location.latitude).toBe(50.06);
    expect(all[1].latestLocated).toBeNull();
  });
});

describe('Registry with each identity index', () => {
  const kinds: IndexKind[] = ['linear', 'hnsw', 'vec'];

  for (const kind of kinds) {
    it(`${kind}: a registered embedding resolves back to its stone`, () => {
      const tmp = createTempDb();
      const ldb = openDatabase(tmp.config);
      try {
        if (kind === 'vec' && !ldb.hasVectorSupport) return;

        const index = createIdentityIndex(ldb, kind);
        const registry = new Registry(ldb, index);
        const resolver = new Resolver(index);
        const rng = seededRandom(11);

        const embeddings = Array.from({ length: 5 }, () => randomUnitVector(rng));
        const ids = embeddings.map((embedding, i) =>
          registry.createStone({
            name: `Stone ${i}`,
            embedding,
            imageRef: `file-${i}`,
            registrant: 'alice',
          }),
        );

        const result = resolver.resolve(embeddings[3]);
        expect(result.kind).toBe('matched');
        if (result.kind === 'matched') {
          expect(result.stoneId).toBe(ids[3]);
          expect(result.similarity).toBeCloseTo(1, 4);
        }

        registry.delete(ids[3], 'alice');
        const after = resolver.resolve(embeddings[3]);
        if (after.kind === 'matched') {
          expect(after.stoneId).not.toBe(ids[3]);
        }
        // Random 512-dim vectors are nearly orthogonal.
        expect(after.kind).toBe('no_match');
      } finally {
        ldb.close();
        tmp.cleanup();
      }
    });
  }
});

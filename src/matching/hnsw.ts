// ---------------------------------------------------------------------------
// Hierarchical Navigable Small World graph
// ---------------------------------------------------------------------------
// Approximate nearest-neighbour search over unit-norm vectors with cosine
// distance (1 - dot). Each node lives on layers 0..level; upper layers are
// sparse express lanes, layer 0 holds every node. Search descends greedily
// from the entry point and runs a bounded best-first search on layer 0.
//
// Removal is a tombstone: the node keeps routing traffic but never appears
// in results.
// ---------------------------------------------------------------------------

import { dot, normalize } from '../shared/vector.js';

export interface HnswOptions {
  /** Max neighbours per node on layers above 0 (layer 0 allows 2*m). */
  m: number;
  /** Candidate list size while inserting. */
  efConstruction: number;
  /** Candidate list size while searching. */
  efSearch: number;
  /** Seed for level assignment, so a given insertion order builds the same graph. */
  seed: number;
}

export const DEFAULT_HNSW_OPTIONS: HnswOptions = {
  m: 16,
  efConstruction: 100,
  efSearch: 64,
  seed: 0x5eed,
};

interface GraphNode {
  vector: Float32Array;
  level: number;
  /** neighbours[layer] = node ids */
  neighbours: number[][];
}

interface Candidate {
  id: number;
  distance: number;
}

/** mulberry32 -- small deterministic PRNG for level assignment. */
function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function insertSorted(list: Candidate[], item: Candidate): void {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid].distance <= item.distance) lo = mid + 1;
    else hi = mid;
  }
  list.splice(lo, 0, item);
}

export class HnswGraph {
  private readonly nodes = new Map<number, GraphNode>();
  private readonly deleted = new Set<number>();
  private readonly options: HnswOptions;
  private readonly levelMultiplier: number;
  private readonly random: () => number;
  private entryPoint: number | null = null;
  private maxLevel = -1;

  constructor(options?: Partial<HnswOptions>) {
    this.options = { ...DEFAULT_HNSW_OPTIONS, ...options };
    if (this.options.m < 2) {
      throw new Error('HNSW m must be at least 2');
    }
    this.levelMultiplier = 1 / Math.log(this.options.m);
    this.random = createRng(this.options.seed);
  }

  /** Number of live (non-removed) vectors. */
  get size(): number {
    return this.nodes.size - this.deleted.size;
  }

  has(id: number): boolean {
    return this.nodes.has(id) && !this.deleted.has(id);
  }

  add(id: number, vector: ArrayLike<number>): void {
    if (this.nodes.has(id)) {
      // Re-adding a tombstoned id revives it; ids are never reused for other vectors.
      this.deleted.delete(id);
      return;
    }

    const unit = normalize(vector);
    const level = Math.floor(-Math.log(1 - this.random()) * this.levelMultiplier);
    const node: GraphNode = {
      vector: unit,
      level,
      neighbours: Array.from({ length: level + 1 }, () => []),
    };
    this.nodes.set(id, node);

    if (this.entryPoint === null) {
      this.entryPoint = id;
      this.maxLevel = level;
      return;
    }

    let entry = this.entryPoint;
    for (let layer = this.maxLevel; layer > level; layer--) {
      entry = this.searchLayer(unit, [entry], 1, layer)[0].id;
    }

    for (let layer = Math.min(level, this.maxLevel); layer >= 0; layer--) {
      const found = this.searchLayer(unit, [entry], this.options.efConstruction, layer);
      const limit = this.maxNeighbours(layer);
      const selected = found.filter((c) => c.id !== id).slice(0, limit);

      node.neighbours[layer] = selected.map((c) => c.id);
      for (const neighbour of selected) {
        this.connect(neighbour.id, id, layer);
      }
      entry = found[0].id;
    }

    if (level > this.maxLevel) {
      this.maxLevel = level;
      this.entryPoint = id;
    }
  }

  remove(id: number): void {
    if (this.nodes.has(id)) {
      this.deleted.add(id);
    }
  }

  /**
   * Returns the closest live vector, or null when the graph holds none.
   */
  nearest(query: ArrayLike<number>): Candidate | null {
    if (this.entryPoint === null || this.size === 0) {
      return null;
    }

    const unit = normalize(query);
    let entry = this.entryPoint;
    for (let layer = this.maxLevel; layer > 0; layer--) {
      entry = this.searchLayer(unit, [entry], 1, layer)[0].id;
    }

    const ef = Math.max(this.options.efSearch, 1);
    const live = this.searchLayer(unit, [entry], ef, 0).filter((c) => !this.deleted.has(c.id));
    if (live.length > 0) {
      return live[0];
    }

    // Every candidate in the beam was a tombstone; widen to the whole graph.
    const widened = this.searchLayer(unit, [entry], this.nodes.size, 0).filter(
      (c) => !this.deleted.has(c.id),
    );
    return widened[0] ?? null;
  }

  private maxNeighbours(layer: number): number {
    return layer === 0 ? this.options.m * 2 : this.options.m;
  }

  private distance(query: Float32Array, id: number): number {
    const node = this.nodes.get(id);
    if (!node) {
      throw new Error(`HNSW node ${id} missing`);
    }
    return 1 - dot(query, node.vector);
  }

  private connect(from: number, to: number, layer: number): void {
    const node = this.nodes.get(from);
    if (!node) return;

    const links = node.neighbours[layer];
    links.push(to);
    const limit = this.maxNeighbours(layer);
    if (links.length <= limit) return;

    // Keep the closest `limit` links.
    const ranked = links
      .map((id) => ({ id, distance: 1 - dot(node.vector, this.vectorOf(id)) }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, limit);
    node.neighbours[layer] = ranked.map((c) => c.id);
  }

  private vectorOf(id: number): Float32Array {
    const node = this.nodes.get(id);
    if (!node) {
      throw new Error(`HNSW node ${id} missing`);
    }
    return node.vector;
  }

  private searchLayer(
    query: Float32Array,
    entries: number[],
    ef: number,
    layer: number,
  ): Candidate[] {
    const visited = new Set<number>(entries);
    const candidates: Candidate[] = [];
    const results: Candidate[] = [];

    for (const id of entries) {
      const c = { id, distance: this.distance(query, id) };
      insertSorted(candidates, c);
      insertSorted(results, c);
    }

    while (candidates.length > 0) {
      const current = candidates.shift();
      if (current === undefined) break;
      if (current.distance > results[results.length - 1].distance) break;

      const node = this.nodes.get(current.id);
      const links = node?.neighbours[layer] ?? [];
      for (const next of links) {
        if (visited.has(next)) continue;
        visited.add(next);

        const distance = this.distance(query, next);
        if (results.length < ef || distance < results[results.length - 1].distance) {
          const c = { id: next, distance };
          insertSorted(candidates, c);
          insertSorted(results, c);
          if (results.length > ef) results.pop();
        }
      }
    }

    return results;
  }
}

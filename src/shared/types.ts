import { z } from 'zod';

/**
 * Dimensionality of the stone embeddings (CLIP ViT-B/32 image features).
 * The vec0 table is declared with this width, so it is fixed per database.
 */
export const EMBEDDING_DIMENSIONS = 512;

/** Stone name bounds after trimming, in characters (code points). */
export const MIN_NAME_LENGTH = 2;
export const MAX_NAME_LENGTH = 255;
export const MAX_DESCRIPTION_LENGTH = 2000;

/**
 * Length in code points, the way SQLite's `length()` counts text.
 * An emoji is one character here but two UTF-16 units in `.length`.
 */
export function charLength(text: string): number {
  return [...text].length;
}

// =============================================================================
// Database Layer Types (snake_case, matches SQL columns)
// =============================================================================

export interface StoneRow {
  id: number;
  name: string;
  description: string | null;
  image_ref: string;
  embedding: Buffer;
  registrant: string;
  created_at: string;
}

export interface SightingRow {
  id: number;
  stone_id: number;
  reporter: string;
  image_ref: string;
  latitude: number | null;
  longitude: number | null;
  postal_code: string | null;
  observed_at: string;
}

// =============================================================================
// Application Layer Types (camelCase)
// =============================================================================

/**
 * Where a sighting happened. Every field is independently optional:
 * a typed postal code may never resolve to coordinates, and a shared
 * location may never resolve to a postal code.
 */
export interface SightingLocation {
  latitude: number | null;
  longitude: number | null;
  postalCode: string | null;
}

export interface Stone {
  id: number;
  name: string;
  description: string | null;
  imageRef: string;
  embedding: Float32Array;
  registrant: string;
  createdAt: string;
}

export interface Sighting {
  id: number;
  stoneId: number;
  reporter: string;
  imageRef: string;
  location: SightingLocation;
  observedAt: string;
}

/** A stone with its sightings in chronological order (first = origin). */
export interface StoneWithSightings extends Stone {
  sightings: Sighting[];
}

export interface StoneSummary {
  stone: Stone;
  sightingCount: number;
}

/** Listing entry for the map API: the stone plus where it was last seen. */
export interface StoneOverview extends StoneSummary {
  latestLocated: Sighting | null;
}

export interface StonePage {
  items: StoneSummary[];
  /** Zero-based page actually returned, after clamping. */
  page: number;
  totalPages: number;
  total: number;
}

// =============================================================================
// Input Types (validated with Zod)
// =============================================================================

const LocationSchema = z.object({
  latitude: z.number().min(-90).max(90).nullable().default(null),
  longitude: z.number().min(-180).max(180).nullable().default(null),
  postalCode: z.string().max(20).nullable().default(null),
});

export const StoneInsertSchema = z.object({
  name: z
    .string()
    .trim()
    .refine((v) => charLength(v) >= MIN_NAME_LENGTH && charLength(v) <= MAX_NAME_LENGTH, {
      message: `name must be ${MIN_NAME_LENGTH}-${MAX_NAME_LENGTH} characters`,
    }),
  description: z
    .string()
    .trim()
    .refine((v) => charLength(v) <= MAX_DESCRIPTION_LENGTH, {
      message: `description must be at most ${MAX_DESCRIPTION_LENGTH} characters`,
    })
    .nullable()
    .default(null),
  embedding: z
    .instanceof(Float32Array)
    .refine((v) => v.length === EMBEDDING_DIMENSIONS, {
      message: `embedding must have ${EMBEDDING_DIMENSIONS} dimensions`,
    }),
  imageRef: z.string().min(1),
  registrant: z.string().min(1),
  location: LocationSchema.nullable().default(null),
});

export type StoneInsert = z.input<typeof StoneInsertSchema>;

export const SightingInsertSchema = z.object({
  stoneId: z.number().int().positive(),
  reporter: z.string().min(1),
  imageRef: z.string().min(1),
  location: LocationSchema.nullable().default(null),
});

export type SightingInsert = z.input<typeof SightingInsertSchema>;

// =============================================================================
// Configuration Types
// =============================================================================

export interface DatabaseConfig {
  dbPath: string;
  busyTimeout: number;
}

// =============================================================================
// Mapping Helpers
// =============================================================================

/**
 * Copies a BLOB into a Float32Array.
 * SQLite buffers are not guaranteed to be 4-byte aligned, so the bytes are
 * copied rather than viewed in place.
 */
export function bufferToVector(buf: Buffer): Float32Array {
  const out = new Float32Array(buf.byteLength / 4);
  new Uint8Array(out.buffer).set(buf);
  return out;
}

export function vectorToBuffer(vec: Float32Array): Buffer {
  return Buffer.from(vec.buffer, vec.byteOffset, vec.byteLength);
}

export function rowToStone(row: StoneRow): Stone {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    imageRef: row.image_ref,
    embedding: bufferToVector(row.embedding),
    registrant: row.registrant,
    createdAt: row.created_at,
  };
}

export function rowToSighting(row: SightingRow): Sighting {
  return {
    id: row.id,
    stoneId: row.stone_id,
    reporter: row.reporter,
    imageRef: row.image_ref,
    location: {
      latitude: row.latitude,
      longitude: row.longitude,
      postalCode: row.postal_code,
    },
    observedAt: row.observed_at,
  };
}

/** True when the sighting carries a full coordinate pair. */
export function hasCoordinates(
  location: SightingLocation,
): location is SightingLocation & { latitude: number; longitude: number } {
  return location.latitude !== null && location.longitude !== null;
}

// =============================================================================
// Locale
// =============================================================================

export const LOCALES = ['en', 'pl', 'ru'] as const;

export type Locale = (typeof LOCALES)[number];

export const DEFAULT_LOCALE: Locale = 'en';

export function isLocale(value: string): value is Locale {
  return (LOCALES as readonly string[]).includes(value);
}

import type { LocaleCatalog, MessageParams } from '../i18n/catalog.js';
import type { CommitResult } from '../intake/types.js';
import type { Locale, SightingLocation, StonePage, StoneWithSightings } from '../shared/types.js';
import type { Button, OutboundMessage } from './types.js';

export type Translate = (key: string, params?: MessageParams) => string;

export function translator(catalog: LocaleCatalog, locale: Locale): Translate {
  return (key, params) => catalog.t(locale, key, params);
}

export function text(body: string, buttons: Button[][] = []): OutboundMessage {
  return { kind: 'text', text: body, buttons };
}

/** `2026-03-01T09:30:00.000Z` -> `2026-03-01 09:30` */
export function formatDate(iso: string): string {
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

export function formatCoordinates(t: Translate, latitude: number, longitude: number): string {
  return t('coords_label', { lat: latitude.toFixed(4), lon: longitude.toFixed(4) });
}

function hasAnyLocation(location: SightingLocation | null): location is SightingLocation {
  return (
    location !== null &&
    (location.postalCode !== null || (location.latitude !== null && location.longitude !== null))
  );
}

function locationLines(t: Translate, location: SightingLocation | null, place: string | null): string[] {
  const lines: string[] = [];
  if (place) lines.push(t('location_label', { location: place }));
  if (location?.postalCode) lines.push(t('zip_label', { zip: location.postalCode }));
  if (location && location.latitude !== null && location.longitude !== null) {
    lines.push(formatCoordinates(t, location.latitude, location.longitude));
  }
  return lines;
}

export function formatCommit(t: Translate, result: CommitResult): string {
  const header =
    result.kind === 'stone_created'
      ? t('stone_registered', { name: result.name, id: result.stoneId })
      : t(hasAnyLocation(result.location) ? 'saved_to_history' : 'saved_no_location');
  return [header, ...locationLines(t, result.location, result.place)].join('\n');
}

function stoneLines(t: Translate, stone: StoneWithSightings): string[] {
  const lines = [t('stone_id', { id: stone.id }), t('stone_name', { name: stone.name })];
  if (stone.description) {
    lines.push(t('stone_description', { description: stone.description }));
  }
  lines.push(t('stone_seen', { count: stone.sightings.length }));
  return lines;
}

/** Card shown when a photo matched a registered stone. */
export function formatMatch(t: Translate, stone: StoneWithSightings, similarity: number): string {
  return [
    t('stone_found'),
    '',
    ...stoneLines(t, stone),
    t('stone_similarity', { percent: Math.round(similarity * 100) }),
  ].join('\n');
}

export function formatInfo(t: Translate, stone: StoneWithSightings): string {
  const lines = stoneLines(t, stone);
  const first = stone.sightings[0];
  const last = stone.sightings[stone.sightings.length - 1];
  if (first) lines.push(t('info_first_seen', { date: formatDate(first.observedAt) }));
  if (last && last !== first) lines.push(t('info_last_seen', { date: formatDate(last.observedAt) }));
  return lines.join('\n');
}

/** Page numbers are one-based for people and zero-based in button codes. */
export function formatStonePage(t: Translate, page: StonePage): OutboundMessage {
  const lines = [t('my_stones'), ''];
  for (const { stone, sightingCount } of page.items) {
    lines.push(t('stone_list_item', { id: stone.id, name: stone.name, count: sightingCount }));
  }
  lines.push('', t('page_info', { page: page.page + 1, total: page.totalPages, count: page.total }));

  const nav: Button[] = [];
  if (page.page > 0) {
    nav.push({ label: t('btn_prev_page'), code: `page:${page.page - 1}` });
  }
  if (page.page < page.totalPages - 1) {
    nav.push({ label: t('btn_next_page'), code: `page:${page.page + 1}` });
  }

  return text(lines.join('\n'), nav.length > 0 ? [nav] : []);
}

// ---------------------------------------------------------------------------
// Route map rendering
// ---------------------------------------------------------------------------
// Draws a stone's journey as an SVG (markers plus connecting polyline) and
// rasterizes it to PNG with sharp. No tiles are fetched: points are
// projected with Web Mercator and fitted into the frame.
//
// First sighting is green, the latest red, everything between blue.
// ---------------------------------------------------------------------------

import sharp from 'sharp';

import { debug } from '../shared/debug.js';
import { hasCoordinates, type Sighting } from '../shared/types.js';

export const MAP_WIDTH = 800;
export const MAP_HEIGHT = 600;

const PADDING = 60;
const CAPTION_HEIGHT = 40;

export const MARKER_COLORS = {
  first: '#22c55e',
  last: '#ef4444',
  middle: '#3b82f6',
} as const;

const ROUTE_COLOR = '#3b82f6';

export interface RoutePoint {
  latitude: number;
  longitude: number;
}

/** Located sightings, earliest first (observedAt, then id). */
export function routePoints(sightings: Sighting[]): RoutePoint[] {
  return [...sightings]
    .sort((a, b) =>
      a.observedAt === b.observedAt ? a.id - b.id : a.observedAt < b.observedAt ? -1 : 1,
    )
    .flatMap(({ location }) =>
      hasCoordinates(location)
        ? [{ latitude: location.latitude, longitude: location.longitude }]
        : [],
    );
}

function mercatorY(latitude: number): number {
  const clamped = Math.max(-85, Math.min(85, latitude));
  const rad = (clamped * Math.PI) / 180;
  return Math.log(Math.tan(Math.PI / 4 + rad / 2));
}

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Pixel positions of the points within the drawing area (caption excluded). */
export function projectPoints(points: RoutePoint[]): Array<{ x: number; y: number }> {
  const xs = points.map((p) => (p.longitude * Math.PI) / 180);
  const ys = points.map((p) => mercatorY(p.latitude));

  const minX = Math.min(...xs);
  const maxX = Math.max(...xs);
  const minY = Math.min(...ys);
  const maxY = Math.max(...ys);

  const innerWidth = MAP_WIDTH - 2 * PADDING;
  const innerHeight = MAP_HEIGHT - CAPTION_HEIGHT - 2 * PADDING;
  const spanX = maxX - minX;
  const spanY = maxY - minY;
  // One scale for both axes keeps the route's shape; a single point sits centered.
  const scale =
    spanX === 0 && spanY === 0
      ? 0
      : Math.min(
          spanX === 0 ? Infinity : innerWidth / spanX,
          spanY === 0 ? Infinity : innerHeight / spanY,
        );

  const centerX = (minX + maxX) / 2;
  const centerY = (minY + maxY) / 2;
  const frameCenterX = MAP_WIDTH / 2;
  const frameCenterY = CAPTION_HEIGHT + (MAP_HEIGHT - CAPTION_HEIGHT) / 2;

  return xs.map((x, i) => ({
    x: Math.round((frameCenterX + (x - centerX) * scale) * 10) / 10,
    y: Math.round((frameCenterY - (ys[i] - centerY) * scale) * 10) / 10,
  }));
}

export function buildRouteSvg(points: RoutePoint[], label: string): string {
  const projected = projectPoints(points);
  const last = projected.length - 1;

  const line =
    projected.length > 1
      ? `<polyline points="${projected.map((p) => `${p.x},${p.y}`).join(' ')}" fill="none" stroke="${ROUTE_COLOR}" stroke-width="3" stroke-linejoin="round"/>`
      : '';

  const markers = projected.map((p, i) => {
    const color =
      i === 0 ? MARKER_COLORS.first : i === last ? MARKER_COLORS.last : MARKER_COLORS.middle;
    const radius = i === 0 || i === last ? 12 : 8;
    return `<circle cx="${p.x}" cy="${p.y}" r="${radius}" fill="${color}" stroke="#ffffff" stroke-width="2"/>`;
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${MAP_WIDTH}" height="${MAP_HEIGHT}" viewBox="0 0 ${MAP_WIDTH} ${MAP_HEIGHT}">`,
    `<rect width="100%" height="100%" fill="#f8fafc"/>`,
    `<rect width="100%" height="${CAPTION_HEIGHT}" fill="#1e293b"/>`,
    `<text x="16" y="26" font-family="sans-serif" font-size="18" fill="#ffffff">${escapeXml(label)}</text>`,
    line,
    // Drawn last-to-first so the origin marker stays on top where they overlap.
    ...markers.reverse(),
    `</svg>`,
  ].join('');
}

/**
 * PNG of the stone's route, or null when no sighting has coordinates.
 */
export async function renderRouteMap(sightings: Sighting[], label: string): Promise<Buffer | null> {
  const points = routePoints(sightings);
  if (points.length === 0) {
    return null;
  }

  const png = await sharp(Buffer.from(buildRouteSvg(points, label))).png().toBuffer();
  debug('map', 'Route map rendered', { points: points.length, bytes: png.length });
  return png;
}

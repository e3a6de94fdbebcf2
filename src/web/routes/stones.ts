/**
 * Read-only stone API backing the route map page.
 *
 * @module web/routes/stones
 */

import { Hono } from 'hono';

import { formatDate } from '../../bot/formatters.js';
import { renderRouteMap } from '../../geo/map-renderer.js';
import { hasCoordinates } from '../../shared/types.js';
import type { AppEnv } from '../env.js';

function parseStoneId(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number(raw) : null;
}

export const stoneRoutes = new Hono<AppEnv>();

/**
 * GET /api/stones
 *
 * Every stone with its sighting count and latest located sighting.
 */
stoneRoutes.get('/stones', (c) => {
  const stones = c.get('registry').listAll().map(({ stone, sightingCount, latestLocated }) => {
    const location = latestLocated?.location;
    return {
      id: stone.id,
      name: stone.name,
      historyCount: sightingCount,
      latestLocation:
        location && hasCoordinates(location)
          ? { lat: location.latitude, lon: location.longitude }
          : null,
    };
  });

  return c.json({ stones });
});

/**
 * GET /api/stones/:id/map-data
 *
 * The stone plus its located sightings in chronological order.
 */
stoneRoutes.get('/stones/:id/map-data', (c) => {
  const id = parseStoneId(c.req.param('id'));
  const stone = id === null ? null : c.get('registry').get(id);
  if (stone === null) {
    return c.json({ error: 'Stone not found' }, 404);
  }

  const points = stone.sightings.flatMap(({ location, observedAt }) =>
    hasCoordinates(location)
      ? [
          {
            lat: location.latitude,
            lon: location.longitude,
            date: formatDate(observedAt),
            postalCode: location.postalCode,
          },
        ]
      : [],
  );

  return c.json({
    stone: { id: stone.id, name: stone.name, description: stone.description },
    points,
  });
});

/**
 * GET /api/stones/:id/map.png
 *
 * Rendered route map. 404 when the stone is unknown or was never located.
 */
stoneRoutes.get('/stones/:id/map.png', async (c) => {
  const id = parseStoneId(c.req.param('id'));
  const stone = id === null ? null : c.get('registry').get(id);
  if (stone === null) {
    return c.json({ error: 'Stone not found' }, 404);
  }

  const png = await renderRouteMap(stone.sightings, stone.name);
  if (png === null) {
    return c.json({ error: 'Stone has no located sightings' }, 404);
  }

  return c.body(new Uint8Array(png), 200, { 'Content-Type': 'image/png' });
});

#!/usr/bin/env node

// stonetrail entry point: MCP stdio server plus the webhook/map HTTP server.

import { ClipFeatureExtractor } from './analysis/clip-extractor.js';
import { loadClassifierPrompts } from './analysis/classifier.js';
import { PhotoAnalyzer } from './analysis/pipeline.js';
import { ConversationService } from './bot/conversation.js';
import { loadExtractorConfig } from './config/extractor-config.js';
import { loadGeocodingConfig } from './config/geocoding-config.js';
import { loadResolutionConfig } from './config/resolution-config.js';
import { loadServerConfig } from './config/server-config.js';
import { NominatimGeocoder } from './geo/geocoder.js';
import { LocaleCatalog } from './i18n/catalog.js';
import { createIdentityIndex } from './matching/identity-index.js';
import { Resolver } from './matching/resolver.js';
import { createStonetrailServer, serveStdio } from './mcp/server.js';
import { getDatabaseConfig, getImageDir } from './shared/config.js';
import { debug, errorMessage } from './shared/debug.js';
import { openDatabase } from './storage/database.js';
import { ImageStore } from './storage/image-store.js';
import { PreferenceRepository } from './storage/preferences.js';
import { Registry } from './storage/registry.js';
import { createWebServer, startWebServer } from './web/server.js';

const db = openDatabase(getDatabaseConfig());

// ---------------------------------------------------------------------------
// Identity resolution
// ---------------------------------------------------------------------------

const resolution = loadResolutionConfig();
const index = createIdentityIndex(db, resolution.indexKind, resolution.hnsw);
const registry = new Registry(db, index);
const resolver = new Resolver(index, resolution.similarityThreshold);

const extractor = new ClipFeatureExtractor(
  loadExtractorConfig(),
  loadClassifierPrompts(),
  resolution.decisionMargin,
);
const analyzer = new PhotoAnalyzer(extractor, resolver);

debug('mcp', 'Identity resolution ready', {
  index: index.name(),
  stones: index.size(),
  threshold: resolver.similarityThreshold,
  extractor: extractor.name(),
});

// ---------------------------------------------------------------------------
// Conversation service
// ---------------------------------------------------------------------------

const conversation = new ConversationService({
  analyzer,
  registry,
  preferences: new PreferenceRepository(db.db),
  images: new ImageStore(getImageDir()),
  geocoder: new NominatimGeocoder(loadGeocodingConfig()),
  catalog: LocaleCatalog.load(),
});

// ---------------------------------------------------------------------------
// Transports
// ---------------------------------------------------------------------------

serveStdio(createStonetrailServer(conversation)).catch((err: unknown) => {
  debug('mcp', 'Fatal: failed to start MCP server', { error: errorMessage(err) });
  db.close();
  process.exit(1);
});

const serverConfig = loadServerConfig();
const webApp = createWebServer({
  registry,
  conversation,
  webhookSecret: serverConfig.webhookSecret,
});
const httpServer = startWebServer(webApp, serverConfig.webPort);

// ---------------------------------------------------------------------------
// Shutdown handlers
// ---------------------------------------------------------------------------

function shutdown(code: number): void {
  httpServer.close();
  db.close();
  process.exit(code);
}

process.on('SIGINT', () => shutdown(0));
process.on('SIGTERM', () => shutdown(0));
process.on('uncaughtException', (err) => {
  debug('mcp', 'Uncaught exception', { error: err.message });
  shutdown(1);
});

#!/usr/bin/env node

/**
 * CLI entry point for Crowdmark.
 * Usage: crowdmark [--port 9988] [--host 0.0.0.0] [--data-dir DIR] [--sources-dir DIR]
 *
 * Config resolution (first wins):
 *   1. CLI flags
 *   2. PORT, HOST, CROWDMARK_DATA_DIR, CROWDMARK_SOURCES_DIR environment variables
 *   3. Saved in ~/.crowdmark/config.json (from a previous --data-dir / --sources-dir)
 *   4. Defaults
 */

import { resolve } from 'path';
import { readConfig, saveConfig, resolveConfig, configFilePath, type ServerConfig, type SavedConfig } from '../server/helpers.js';
import { startServer } from '../server/index.js';

function parseArgs(args: string[]): Partial<ServerConfig> {
  const overrides: Partial<ServerConfig> = {};
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--port' && value) {
      const port = parseInt(value, 10);
      if (!Number.isNaN(port)) overrides.port = port;
      i++;
    } else if (args[i] === '--host' && value) {
      overrides.host = value;
      i++;
    } else if (args[i] === '--data-dir' && value) {
      overrides.dataDir = resolve(value);
      i++;
    } else if (args[i] === '--sources-dir' && value) {
      overrides.sourcesDir = resolve(value);
      i++;
    }
  }
  return overrides;
}

const overrides = parseArgs(process.argv.slice(2));
const saved = readConfig();
const config = resolveConfig(overrides, process.env, saved);

// Persist new directories so future starts don't need the flags
const updates: SavedConfig = {};
if (overrides.dataDir && overrides.dataDir !== saved.dataDir) updates.dataDir = overrides.dataDir;
if (overrides.sourcesDir && overrides.sourcesDir !== saved.sourcesDir) updates.sourcesDir = overrides.sourcesDir;
if (Object.keys(updates).length > 0) {
  saveConfig(updates);
  console.log(`[Server] Config saved to ${configFilePath()}`);
}

const running = await startServer(config);

const shutdown = (signal: string): void => {
  console.log(`[Server] ${signal} received, shutting down`);
  running.close().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error('[Server] Shutdown failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    },
  );
};
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

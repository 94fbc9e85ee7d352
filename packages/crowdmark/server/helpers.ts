/**
 * Shared constants, identifier sanitizers and config persistence for the Crowdmark server.
 * Stores and routes import from here so the id rules live in one place.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join, basename } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ResourceError } from './errors.js';

export const HOME_DIR = join(homedir(), '.crowdmark');
export const DEFAULT_DATA_DIR = join(HOME_DIR, 'data');
export const DEFAULT_SOURCES_DIR = join(HOME_DIR, 'sources');
export const DEFAULT_PORT = 9988;
export const DEFAULT_HOST = '0.0.0.0';

export const DEFAULT_DOC_ID = 'doc1';
export const DEFAULT_SOURCE_NAME = 'text.txt';
export const DEFAULT_FORM_ID = 'feedback';
export const DEFAULT_PANEL_ID = 'main';
export const SOURCE_EXTENSIONS = new Set(['.txt', '.md', '.html']);

const DOC_ID_RE = /^[A-Za-z0-9_.-]{1,128}$/;
const SHORT_ID_RE = /^[A-Za-z0-9_.-]{1,64}$/;
const MAX_CLIENT_ID_LENGTH = 128;

export function ensureDir(dir: string): void {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

// ============================================================================
// IDENTIFIERS
// ============================================================================

/** Document ids are validated strictly: anything outside the allowed set is rejected. */
export function sanitizeDocId(raw: string | undefined): string {
  const docId = raw || DEFAULT_DOC_ID;
  if (!DOC_ID_RE.test(docId)) {
    throw new ResourceError('invalid_doc', 'Invalid doc id', 400);
  }
  return docId;
}

function sanitizeShortId(raw: string | undefined, fallback: string): string {
  const id = (raw || fallback).trim();
  if (SHORT_ID_RE.test(id)) return id;
  const cleaned = id.replace(/[^A-Za-z0-9_.-]/g, '').slice(0, 64);
  return cleaned || fallback;
}

export function sanitizeFormId(raw: string | undefined): string {
  return sanitizeShortId(raw, DEFAULT_FORM_ID);
}

export function sanitizePanelId(raw: string | undefined): string {
  return sanitizeShortId(raw, DEFAULT_PANEL_ID);
}

/** Drop any directory components so a source name can never escape the sources dir. */
export function sanitizeSourceName(name: string | null | undefined): string {
  if (!name) return DEFAULT_SOURCE_NAME;
  return basename(name.replace(/\\/g, '/')) || DEFAULT_SOURCE_NAME;
}

export function requireClientId(raw: string | undefined): string {
  const clientId = (raw || '').trim();
  if (!clientId) {
    throw new ResourceError('invalid_client', 'clientId cannot be empty', 400);
  }
  if (clientId.length > MAX_CLIENT_ID_LENGTH) {
    throw new ResourceError('invalid_client', `clientId must be ${MAX_CLIENT_ID_LENGTH} characters or fewer`, 400);
  }
  return clientId;
}

/** Parse the optional `since` query parameter used by the polling endpoints. */
export function parseSince(raw: unknown): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const value = typeof raw === 'string' ? Number(raw) : NaN;
  if (!Number.isInteger(value)) {
    throw new ResourceError('invalid_since', 'since must be an integer', 400);
  }
  return value;
}

export function queryString(raw: unknown): string | undefined {
  return typeof raw === 'string' && raw !== '' ? raw : undefined;
}

// ============================================================================
// CONFIG PERSISTENCE
// ============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  sourcesDir: string;
}

const savedConfigSchema = z.object({
  port: z.number().int().positive().optional(),
  host: z.string().optional(),
  dataDir: z.string().optional(),
  sourcesDir: z.string().optional(),
});

export type SavedConfig = z.infer<typeof savedConfigSchema>;

export function configFilePath(home: string = HOME_DIR): string {
  return join(home, 'config.json');
}

export function readConfig(file: string = configFilePath()): SavedConfig {
  if (!existsSync(file)) return {};
  try {
    const parsed = savedConfigSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function saveConfig(updates: SavedConfig, file: string = configFilePath()): void {
  const current = readConfig(file);
  const merged = { ...current, ...updates };
  ensureDir(join(file, '..'));
  writeFileSync(file, JSON.stringify(merged, null, 2), 'utf-8');
}

/**
 * Resolve the effective server config. First wins: explicit overrides (CLI flags),
 * environment, saved config.json, defaults.
 */
export function resolveConfig(
  overrides: Partial<ServerConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
  saved: SavedConfig = readConfig(),
): ServerConfig {
  const envPort = env.PORT ? parseInt(env.PORT, 10) : NaN;
  return {
    port: overrides.port ?? (Number.isNaN(envPort) ? undefined : envPort) ?? saved.port ?? DEFAULT_PORT,
    host: overrides.host || env.HOST || saved.host || DEFAULT_HOST,
    dataDir: overrides.dataDir || env.CROWDMARK_DATA_DIR || saved.dataDir || DEFAULT_DATA_DIR,
    sourcesDir: overrides.sourcesDir || env.CROWDMARK_SOURCES_DIR || saved.sourcesDir || DEFAULT_SOURCES_DIR,
  };
}

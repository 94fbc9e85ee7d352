/**
 * Per-document vote state: tokens + one vote bucket per token.
 * Each document has its own lock; every mutation persists before the cached
 * state is replaced. Snapshots live in <dataDir>/state_<docId>.json.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { readFile } from 'fs/promises';
import { join, extname } from 'path';
import { KeyedLock } from './keyed-lock.js';
import { writeJsonAtomic, writeFileAtomic, readJsonSnapshot, listSnapshotIds } from './persistence.js';
import { docSnapshotSchema, type DocExport, type VoteBucketJson } from './schemas.js';
import { tokenizeSource, stripBom } from './tokenizer.js';
import type { VoteBucket } from './aggregate.js';
import { ResourceError } from './errors.js';
import { DEFAULT_DOC_ID, DEFAULT_SOURCE_NAME, SOURCE_EXTENSIONS, ensureDir, sanitizeSourceName } from './helpers.js';

const STATE_PREFIX = 'state_';

export interface DocState {
  tokens: string[];
  votes: VoteBucket[];
  updated: number | null;
  sourceName: string;
}

export interface DocExportPayload {
  docId: string;
  locked: boolean;
  tokens: string[];
  votes: Array<[string, string]>[];
  updated: number | null;
  sourceName: string;
}

export interface DocumentStoreOptions {
  dataDir: string;
  sourcesDir: string;
  /** Epoch milliseconds. Injectable for tests. */
  now?: () => number;
}

function emptyState(): DocState {
  return { tokens: [], votes: [], updated: null, sourceName: DEFAULT_SOURCE_NAME };
}

function cloneState(state: DocState): DocState {
  return {
    tokens: state.tokens,
    votes: state.votes.map((bucket) => new Map(bucket)),
    updated: state.updated,
    sourceName: state.sourceName,
  };
}

/** Pad with empty buckets or truncate so there is exactly one bucket per token. */
export function ensureVotesLength(state: DocState): void {
  const target = state.tokens.length;
  if (state.votes.length < target) {
    for (let i = state.votes.length; i < target; i++) state.votes.push(new Map());
  } else if (state.votes.length > target) {
    state.votes.length = target;
  }
}

// Buckets are stored as pair lists: object keys that look like integers
// would lose their insertion order, and with it the tie-break.
function bucketsFromJson(votes: VoteBucketJson[]): VoteBucket[] {
  return votes.map((entry) => new Map(Array.isArray(entry) ? entry : Object.entries(entry)));
}

function bucketsToJson(votes: readonly VoteBucket[]): Array<[string, string]>[] {
  return votes.map((bucket) => [...bucket]);
}

export class DocumentStore {
  private states = new Map<string, DocState>();
  private lockFlags = new Map<string, boolean>();
  private locks = new KeyedLock();
  private readonly dataDir: string;
  private readonly sourcesDir: string;
  private readonly now: () => number;

  constructor(options: DocumentStoreOptions) {
    this.dataDir = options.dataDir;
    this.sourcesDir = options.sourcesDir;
    this.now = options.now ?? Date.now;
    ensureDir(this.dataDir);
    ensureDir(this.sourcesDir);
  }

  statePath(docId: string): string {
    return join(this.dataDir, `${STATE_PREFIX}${docId}.json`);
  }

  jsonlPath(docId: string): string {
    return join(this.dataDir, `${STATE_PREFIX}${docId}.jsonl`);
  }

  // ============================================================================
  // LOAD / SAVE
  // ============================================================================

  /** Cached state, loaded from disk on first access. Never takes the lock. */
  async getState(docId: string): Promise<DocState> {
    const cached = this.states.get(docId);
    if (cached) return cached;
    const loaded = await this.loadFromDisk(docId);
    // Another caller may have populated the cache while we were reading
    const raced = this.states.get(docId);
    if (raced) return raced;
    this.states.set(docId, loaded);
    return loaded;
  }

  private async loadFromDisk(docId: string): Promise<DocState> {
    const raw = await readJsonSnapshot(this.statePath(docId), docSnapshotSchema, `state for ${docId}`);
    if (!raw) return emptyState();
    const state: DocState = {
      tokens: raw.tokens,
      votes: bucketsFromJson(raw.votes),
      updated: raw.updated,
      sourceName: raw.sourceName ? sanitizeSourceName(raw.sourceName) : DEFAULT_SOURCE_NAME,
    };
    ensureVotesLength(state);
    return state;
  }

  private async save(docId: string, state: DocState): Promise<void> {
    ensureVotesLength(state);
    await writeJsonAtomic(this.statePath(docId), {
      tokens: state.tokens,
      votes: bucketsToJson(state.votes),
      updated: state.updated,
      sourceName: state.sourceName,
    });
    this.states.set(docId, state);
  }

  // ============================================================================
  // SOURCES
  // ============================================================================

  async readSourceText(sourceName?: string | null): Promise<string> {
    const name = sanitizeSourceName(sourceName);
    const path = join(this.sourcesDir, name);
    if (!existsSync(path) || !statSync(path).isFile()) {
      throw new ResourceError('source_not_found', `Source '${name}' not found`, 404);
    }
    return stripBom(await readFile(path, 'utf-8'));
  }

  private async tokenizeFromSource(sourceName: string): Promise<string[]> {
    const text = await this.readSourceText(sourceName);
    return tokenizeSource(sourceName, text);
  }

  listSources(): string[] {
    if (!existsSync(this.sourcesDir)) return [];
    return readdirSync(this.sourcesDir)
      .filter((f) => SOURCE_EXTENSIONS.has(extname(f).toLowerCase()))
      .filter((f) => statSync(join(this.sourcesDir, f)).isFile())
      .sort();
  }

  listDocumentIds(): string[] {
    const ids = new Set(this.states.keys());
    ids.add(DEFAULT_DOC_ID);
    for (const id of listSnapshotIds(this.dataDir, STATE_PREFIX)) ids.add(id);
    return [...ids].sort();
  }

  // ============================================================================
  // MUTATIONS
  // ============================================================================

  async ensureTokens(docId: string, sourceName?: string | null): Promise<DocState> {
    return this.locks.run(docId, () => this.ensureTokensLocked(docId, sourceName));
  }

  private async ensureTokensLocked(docId: string, sourceName?: string | null): Promise<DocState> {
    const current = await this.getState(docId);
    if (current.tokens.length > 0) return current;
    // Explicit override > previously stored name > default
    const resolved = sanitizeSourceName(sourceName || current.sourceName);
    const tokens = await this.tokenizeFromSource(resolved);
    const next = cloneState(current);
    next.tokens = tokens;
    next.sourceName = resolved;
    next.updated = next.updated ?? this.now();
    await this.save(docId, next);
    return next;
  }

  /** Re-read the source and start over: new tokens, no votes. */
  async retokenize(docId: string, sourceName?: string | null): Promise<DocState> {
    const resolved = sanitizeSourceName(sourceName);
    const tokens = await this.tokenizeFromSource(resolved);
    return this.locks.run(docId, async () => {
      const next: DocState = {
        tokens,
        votes: tokens.map(() => new Map()),
        updated: this.now(),
        sourceName: resolved,
      };
      await this.save(docId, next);
      return next;
    });
  }

  async clearVotes(docId: string): Promise<DocState> {
    return this.locks.run(docId, async () => {
      const current = await this.ensureTokensLocked(docId, null);
      const next = cloneState(current);
      next.votes = next.tokens.map(() => new Map());
      next.updated = this.now();
      await this.save(docId, next);
      return next;
    });
  }

  /**
   * Set (or with an empty color, remove) one client's vote over an inclusive
   * token range. Returns whether anything changed.
   */
  async applyHighlight(
    docId: string,
    clientId: string,
    start: number,
    end: number,
    color: string,
    timestamp?: number | null,
  ): Promise<boolean> {
    if (this.isLocked(docId)) return false;
    return this.locks.run(docId, async () => {
      const current = await this.ensureTokensLocked(docId, null);
      const n = current.tokens.length;
      if (n === 0) return false;
      let from = Math.max(0, Math.min(start, n - 1));
      let to = Math.max(0, Math.min(end, n - 1));
      if (from > to) [from, to] = [to, from];

      const next = cloneState(current);
      ensureVotesLength(next);
      let changed = false;
      for (let idx = from; idx <= to; idx++) {
        const bucket = next.votes[idx];
        if (color) {
          if (bucket.get(clientId) !== color) {
            bucket.set(clientId, color);
            changed = true;
          }
        } else if (bucket.delete(clientId)) {
          changed = true;
        }
      }
      if (changed) {
        next.updated = timestamp || this.now();
        await this.save(docId, next);
      }
      return changed;
    });
  }

  /** Remove every vote of one client. Returns whether anything changed. */
  async clearClient(docId: string, clientId: string, timestamp?: number | null): Promise<boolean> {
    if (this.isLocked(docId)) return false;
    return this.locks.run(docId, async () => {
      const current = await this.ensureTokensLocked(docId, null);
      const next = cloneState(current);
      let changed = false;
      for (const bucket of next.votes) {
        if (bucket.delete(clientId)) changed = true;
      }
      if (changed) {
        next.updated = timestamp || this.now();
        await this.save(docId, next);
      }
      return changed;
    });
  }

  /** Fully replace a document with an exported snapshot. */
  async replaceState(docId: string, snapshot: DocExport): Promise<DocState> {
    return this.locks.run(docId, async () => {
      const next: DocState = {
        tokens: [...snapshot.tokens],
        votes: bucketsFromJson(snapshot.votes),
        updated: snapshot.updated,
        sourceName: sanitizeSourceName(snapshot.sourceName),
      };
      ensureVotesLength(next);
      await this.save(docId, next);
      if (snapshot.locked !== undefined) this.setLocked(docId, snapshot.locked);
      return next;
    });
  }

  // ============================================================================
  // LOCK FLAG
  // ============================================================================

  setLocked(docId: string, value: boolean): void {
    this.lockFlags.set(docId, value);
  }

  isLocked(docId: string): boolean {
    return this.lockFlags.get(docId) ?? false;
  }

  // ============================================================================
  // EXPORT
  // ============================================================================

  async exportSnapshot(docId: string): Promise<DocExportPayload> {
    const state = await this.ensureTokens(docId, null);
    return {
      docId,
      locked: this.isLocked(docId),
      tokens: state.tokens,
      votes: bucketsToJson(state.votes),
      updated: state.updated,
      sourceName: state.sourceName,
    };
  }

  /** Write the export snapshot as a single JSON line; returns the file path. */
  async writeJsonlExport(docId: string): Promise<string> {
    const payload = await this.exportSnapshot(docId);
    const path = this.jsonlPath(docId);
    await writeFileAtomic(path, JSON.stringify(payload) + '\n');
    return path;
  }
}

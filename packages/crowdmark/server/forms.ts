/**
 * Feedback forms: one question, sequence-numbered responses, per-client cooldown.
 * Snapshots live in <dataDir>/form_<formId>.json.
 */

import { join } from 'path';
import { KeyedLock } from './keyed-lock.js';
import { writeJsonAtomic, readJsonSnapshot, listSnapshotIds } from './persistence.js';
import { formSnapshotSchema, type FormResponse } from './schemas.js';
import { ResourceError } from './errors.js';
import { DEFAULT_FORM_ID, ensureDir } from './helpers.js';

const FORM_PREFIX = 'form_';

export const DEFAULT_FORM_QUESTION = 'Share your thoughts with us.';
export const MAX_FORM_ANSWER_LENGTH = 1024;
export const MAX_FORM_RESPONSES = 2000;
export const MAX_QUESTION_LENGTH = 280;

export interface FormState {
  formId: string;
  question: string;
  /** Seconds between submissions from one client; 0 disables. */
  cooldown: number;
  allowRepeat: boolean;
  locked: boolean;
  responses: FormResponse[];
  lastByClient: Record<string, number>;
  nextSeq: number;
  updated: number | null;
}

export interface FormConfig {
  formId: string;
  question: string;
  cooldown: number;
  allowRepeat: boolean;
  locked: boolean;
  nextSeq: number;
  responseCount: number;
}

export interface FormResults {
  formId: string;
  results: FormResponse[];
  nextSeq: number;
  updated: number | null;
  cooldown: number;
  allowRepeat: boolean;
  locked: boolean;
}

export interface FormConfigUpdate {
  question?: string | null;
  cooldown?: number | null;
  allowRepeat?: boolean | null;
  locked?: boolean | null;
}

function defaultState(formId: string): FormState {
  return {
    formId,
    question: DEFAULT_FORM_QUESTION,
    cooldown: 0,
    allowRepeat: true,
    locked: false,
    responses: [],
    lastByClient: {},
    nextSeq: 1,
    updated: null,
  };
}

function cloneState(state: FormState): FormState {
  return { ...state, responses: [...state.responses], lastByClient: { ...state.lastByClient } };
}

/** Seconds left before this client may act again, or 0. */
export function cooldownRemaining(cooldown: number, last: number | undefined, now: number): number {
  if (cooldown <= 0 || last === undefined) return 0;
  const elapsed = (now - last) / 1000;
  return elapsed < cooldown ? Math.max(0, cooldown - elapsed) : 0;
}

export class FormManager {
  private states = new Map<string, FormState>();
  private locks = new KeyedLock();
  private readonly dataDir: string;
  private readonly now: () => number;

  constructor(options: { dataDir: string; now?: () => number }) {
    this.dataDir = options.dataDir;
    this.now = options.now ?? Date.now;
    ensureDir(this.dataDir);
  }

  private path(formId: string): string {
    return join(this.dataDir, `${FORM_PREFIX}${formId}.json`);
  }

  private async ensureLoaded(formId: string): Promise<FormState> {
    const cached = this.states.get(formId);
    if (cached) return cached;
    const state = await this.load(formId);
    this.states.set(formId, state);
    return state;
  }

  private async load(formId: string): Promise<FormState> {
    const raw = await readJsonSnapshot(this.path(formId), formSnapshotSchema, `form ${formId}`);
    if (!raw) return defaultState(formId);
    const responses = raw.responses.map((item, idx) => ({ ...item, seq: item.seq ?? idx + 1 }));
    return {
      formId,
      question: raw.question?.trim() || DEFAULT_FORM_QUESTION,
      cooldown: Math.max(0, raw.cooldown ?? 0),
      allowRepeat: raw.allowRepeat,
      locked: raw.locked,
      responses,
      lastByClient: raw.lastByClient,
      nextSeq: raw.nextSeq || responses.length + 1,
      updated: raw.updated,
    };
  }

  private async save(state: FormState): Promise<void> {
    await writeJsonAtomic(this.path(state.formId), state);
    this.states.set(state.formId, state);
  }

  private configSnapshot(state: FormState): FormConfig {
    return {
      formId: state.formId,
      question: state.question,
      cooldown: state.cooldown,
      allowRepeat: state.allowRepeat,
      locked: state.locked,
      nextSeq: state.nextSeq,
      responseCount: state.responses.length,
    };
  }

  async getConfig(formId: string): Promise<FormConfig> {
    return this.locks.run(formId, async () => this.configSnapshot(await this.ensureLoaded(formId)));
  }

  async updateConfig(formId: string, update: FormConfigUpdate): Promise<FormConfig> {
    return this.locks.run(formId, async () => {
      const next = cloneState(await this.ensureLoaded(formId));
      if (update.question !== undefined && update.question !== null) {
        const question = update.question.trim();
        if (!question) {
          throw new ResourceError('invalid_question', 'Question cannot be empty', 400);
        }
        if (question.length > MAX_QUESTION_LENGTH) {
          throw new ResourceError('invalid_question', `Question must be ${MAX_QUESTION_LENGTH} characters or fewer`, 400);
        }
        next.question = question;
      }
      if (update.cooldown !== undefined && update.cooldown !== null) next.cooldown = Math.max(0, update.cooldown);
      if (update.allowRepeat !== undefined && update.allowRepeat !== null) next.allowRepeat = update.allowRepeat;
      if (update.locked !== undefined && update.locked !== null) next.locked = update.locked;
      next.updated = this.now();
      await this.save(next);
      return this.configSnapshot(next);
    });
  }

  async submit(formId: string, clientId: string, answer: string): Promise<FormResponse> {
    let trimmed = answer.trim();
    if (!trimmed) {
      throw new ResourceError('empty_answer', 'Answer cannot be empty', 400);
    }
    if (trimmed.length > MAX_FORM_ANSWER_LENGTH) trimmed = trimmed.slice(0, MAX_FORM_ANSWER_LENGTH);
    // Fast reject without queueing on the lock
    if (this.states.get(formId)?.locked) {
      throw new ResourceError('locked', 'Form is locked', 423);
    }

    return this.locks.run(formId, async () => {
      const current = await this.ensureLoaded(formId);
      const now = this.now();
      if (current.locked) {
        throw new ResourceError('locked', 'Form is locked', 423);
      }
      const retryIn = cooldownRemaining(current.cooldown, current.lastByClient[clientId], now);
      if (retryIn > 0) {
        throw new ResourceError('cooldown', 'Cooldown is active', 429, { retry_in: retryIn });
      }
      if (!current.allowRepeat && current.responses.some((r) => r.clientId === clientId)) {
        throw new ResourceError('repeat_not_allowed', 'Repeat submissions are disabled', 409);
      }

      const next = cloneState(current);
      const record: FormResponse = {
        seq: next.nextSeq,
        clientId,
        answer: trimmed,
        question: next.question,
        submitted: now,
      };
      next.responses.push(record);
      if (next.responses.length > MAX_FORM_RESPONSES) {
        next.responses = next.responses.slice(-MAX_FORM_RESPONSES);
      }
      next.lastByClient[clientId] = now;
      next.nextSeq = record.seq + 1;
      next.updated = now;
      await this.save(next);
      return record;
    });
  }

  /** Responses with seq > since, or all of them. */
  async results(formId: string, since?: number): Promise<FormResults> {
    return this.locks.run(formId, async () => {
      const state = await this.ensureLoaded(formId);
      const results = since === undefined
        ? state.responses.map((r) => ({ ...r }))
        : state.responses.filter((r) => r.seq > since).map((r) => ({ ...r }));
      return {
        formId,
        results,
        nextSeq: state.nextSeq,
        updated: state.updated,
        cooldown: state.cooldown,
        allowRepeat: state.allowRepeat,
        locked: state.locked,
      };
    });
  }

  async clear(formId: string): Promise<FormConfig> {
    return this.locks.run(formId, async () => {
      const next = cloneState(await this.ensureLoaded(formId));
      next.responses = [];
      next.lastByClient = {};
      next.nextSeq = 1;
      next.updated = this.now();
      await this.save(next);
      return this.configSnapshot(next);
    });
  }

  listFormIds(): string[] {
    const ids = new Set(this.states.keys());
    ids.add(DEFAULT_FORM_ID);
    for (const id of listSnapshotIds(this.dataDir, FORM_PREFIX)) ids.add(id);
    return [...ids].sort();
  }
}

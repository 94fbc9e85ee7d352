/**
 * Button panels: named buttons with independent minus/plus counters and an event log.
 * Snapshots live in <dataDir>/buttons_<panelId>.json.
 */

import { join } from 'path';
import { KeyedLock } from './keyed-lock.js';
import { writeJsonAtomic, readJsonSnapshot, listSnapshotIds } from './persistence.js';
import { buttonSnapshotSchema, type ButtonEvent } from './schemas.js';
import { ResourceError } from './errors.js';
import { cooldownRemaining } from './forms.js';
import { DEFAULT_PANEL_ID, ensureDir } from './helpers.js';

const PANEL_PREFIX = 'buttons_';

export const MAX_BUTTON_EVENTS = 1000;

export const BUTTON_DEFINITIONS: ReadonlyArray<{ id: string; label: string }> = [
  { id: 'suspension', label: 'Suspension' },
  { id: 'extension', label: 'Extension' },
  { id: 'reversal', label: 'Reversal' },
  { id: 'speed', label: 'Speed' },
];

const BUTTON_ORDER = new Map(BUTTON_DEFINITIONS.map((b, idx) => [b.id, idx]));

export type Direction = 'minus' | 'plus';

export interface ButtonCounters {
  label: string;
  minus: number;
  plus: number;
}

export interface PanelState {
  panelId: string;
  buttons: Record<string, ButtonCounters>;
  events: ButtonEvent[];
  locked: boolean;
  /** Seconds between presses from one client; 0 disables. */
  cooldown: number;
  lastByClient: Record<string, number>;
  nextSeq: number;
  updated: number | null;
}

export interface PanelConfig {
  panelId: string;
  buttons: Array<{ id: string } & ButtonCounters>;
  locked: boolean;
  cooldown: number;
  nextSeq: number;
  eventCount: number;
}

export interface PanelSnapshot {
  panelId: string;
  buttons: Record<string, ButtonCounters>;
  events: ButtonEvent[];
  nextSeq: number;
  locked: boolean;
  cooldown: number;
  updated: number | null;
}

function titleCase(id: string): string {
  return id.charAt(0).toUpperCase() + id.slice(1).toLowerCase();
}

function defaultButtons(): Record<string, ButtonCounters> {
  const buttons: Record<string, ButtonCounters> = {};
  for (const { id, label } of BUTTON_DEFINITIONS) buttons[id] = { label, minus: 0, plus: 0 };
  return buttons;
}

function defaultState(panelId: string): PanelState {
  return {
    panelId,
    buttons: defaultButtons(),
    events: [],
    locked: false,
    cooldown: 0,
    lastByClient: {},
    nextSeq: 1,
    updated: null,
  };
}

function cloneButtons(buttons: Record<string, ButtonCounters>): Record<string, ButtonCounters> {
  const copy: Record<string, ButtonCounters> = {};
  for (const [id, info] of Object.entries(buttons)) copy[id] = { ...info };
  return copy;
}

function cloneState(state: PanelState): PanelState {
  return {
    ...state,
    buttons: cloneButtons(state.buttons),
    events: [...state.events],
    lastByClient: { ...state.lastByClient },
  };
}

export function parseDirection(raw: string): Direction {
  const direction = raw.trim().toLowerCase();
  if (direction === 'minus' || direction === 'plus') return direction;
  throw new ResourceError('invalid_direction', "Direction must be 'minus' or 'plus'", 400);
}

export class ButtonManager {
  private states = new Map<string, PanelState>();
  private locks = new KeyedLock();
  private readonly dataDir: string;
  private readonly now: () => number;

  constructor(options: { dataDir: string; now?: () => number }) {
    this.dataDir = options.dataDir;
    this.now = options.now ?? Date.now;
    ensureDir(this.dataDir);
  }

  private path(panelId: string): string {
    return join(this.dataDir, `${PANEL_PREFIX}${panelId}.json`);
  }

  private async ensureLoaded(panelId: string): Promise<PanelState> {
    const cached = this.states.get(panelId);
    if (cached) return cached;
    const state = await this.load(panelId);
    this.states.set(panelId, state);
    return state;
  }

  private async load(panelId: string): Promise<PanelState> {
    const raw = await readJsonSnapshot(this.path(panelId), buttonSnapshotSchema, `buttons ${panelId}`);
    const state = defaultState(panelId);
    if (!raw) return state;
    // Default buttons always exist; buttons only found on disk are kept too
    for (const [buttonId, info] of Object.entries(raw.buttons)) {
      const entry = state.buttons[buttonId] ?? { label: titleCase(buttonId), minus: 0, plus: 0 };
      state.buttons[buttonId] = { label: info.label ?? entry.label, minus: info.minus, plus: info.plus };
    }
    state.locked = raw.locked;
    state.cooldown = Math.max(0, raw.cooldown ?? 0);
    state.events = raw.events.map((item, idx) => ({ ...item, seq: item.seq ?? idx + 1 }));
    state.nextSeq = raw.nextSeq || state.events.length + 1;
    state.lastByClient = raw.lastByClient;
    state.updated = raw.updated;
    return state;
  }

  private async save(state: PanelState): Promise<void> {
    await writeJsonAtomic(this.path(state.panelId), state);
    this.states.set(state.panelId, state);
  }

  private configSnapshot(state: PanelState): PanelConfig {
    const buttons = Object.entries(state.buttons).map(([id, info]) => ({ id, ...info }));
    const unknown = BUTTON_ORDER.size;
    buttons.sort((a, b) => (BUTTON_ORDER.get(a.id) ?? unknown) - (BUTTON_ORDER.get(b.id) ?? unknown));
    return {
      panelId: state.panelId,
      buttons,
      locked: state.locked,
      cooldown: state.cooldown,
      nextSeq: state.nextSeq,
      eventCount: state.events.length,
    };
  }

  async getConfig(panelId: string): Promise<PanelConfig> {
    return this.locks.run(panelId, async () => this.configSnapshot(await this.ensureLoaded(panelId)));
  }

  async updateConfig(panelId: string, update: { cooldown?: number | null; locked?: boolean | null }): Promise<PanelConfig> {
    return this.locks.run(panelId, async () => {
      const next = cloneState(await this.ensureLoaded(panelId));
      if (update.cooldown !== undefined && update.cooldown !== null) next.cooldown = Math.max(0, update.cooldown);
      if (update.locked !== undefined && update.locked !== null) next.locked = update.locked;
      next.updated = this.now();
      await this.save(next);
      return this.configSnapshot(next);
    });
  }

  async fire(panelId: string, clientId: string, buttonId: string, rawDirection: string): Promise<ButtonEvent> {
    const direction = parseDirection(rawDirection);
    if (this.states.get(panelId)?.locked) {
      throw new ResourceError('locked', 'Panel is locked', 423);
    }

    return this.locks.run(panelId, async () => {
      const current = await this.ensureLoaded(panelId);
      const now = this.now();
      if (current.locked) {
        throw new ResourceError('locked', 'Panel is locked', 423);
      }
      if (!Object.hasOwn(current.buttons, buttonId)) {
        throw new ResourceError('unknown_button', `Button '${buttonId}' is not defined`, 404);
      }
      const retryIn = cooldownRemaining(current.cooldown, current.lastByClient[clientId], now);
      if (retryIn > 0) {
        throw new ResourceError('cooldown', 'Cooldown is active', 429, { retry_in: retryIn });
      }

      const next = cloneState(current);
      const info = next.buttons[buttonId];
      info[direction] += 1;
      const event: ButtonEvent = {
        seq: next.nextSeq,
        buttonId,
        label: info.label,
        direction,
        clientId,
        timestamp: now,
      };
      next.events.push(event);
      if (next.events.length > MAX_BUTTON_EVENTS) {
        next.events = next.events.slice(-MAX_BUTTON_EVENTS);
      }
      next.lastByClient[clientId] = now;
      next.nextSeq = event.seq + 1;
      next.updated = now;
      await this.save(next);
      return event;
    });
  }

  /** Counters plus events with seq > since (or all events). */
  async state(panelId: string, since?: number): Promise<PanelSnapshot> {
    return this.locks.run(panelId, async () => {
      const state = await this.ensureLoaded(panelId);
      const events = since === undefined ? state.events : state.events.filter((e) => e.seq > since);
      return {
        panelId,
        buttons: cloneButtons(state.buttons),
        events: events.map((e) => ({ ...e })),
        nextSeq: state.nextSeq,
        locked: state.locked,
        cooldown: state.cooldown,
        updated: state.updated,
      };
    });
  }

  async reset(panelId: string): Promise<PanelConfig> {
    return this.locks.run(panelId, async () => {
      const next = cloneState(await this.ensureLoaded(panelId));
      for (const info of Object.values(next.buttons)) {
        info.minus = 0;
        info.plus = 0;
      }
      next.events = [];
      next.lastByClient = {};
      next.nextSeq = 1;
      next.updated = this.now();
      await this.save(next);
      return this.configSnapshot(next);
    });
  }

  listPanelIds(): string[] {
    const ids = new Set(this.states.keys());
    ids.add(DEFAULT_PANEL_ID);
    for (const id of listSnapshotIds(this.dataDir, PANEL_PREFIX)) ids.add(id);
    return [...ids].sort();
  }
}

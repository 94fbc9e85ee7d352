/**
 * Navigation channel: group-addressed navigate/reload commands for /control sockets.
 */

import { fanOut, type Subscriber } from './realtime-hub.js';

export const ALL_GROUP = 'all';

export interface NavigateCommand {
  type: 'navigate';
  target: string;
  preserveClient: boolean;
  preserveParams: string[];
}

export interface ReloadCommand {
  type: 'reload';
  target?: string;
}

export type NavigationCommand = NavigateCommand | ReloadCommand;

export interface LastCommand {
  group: string;
  message: NavigationCommand;
  ts: number;
}

export interface NavigationStatus {
  groups: Record<string, number>;
  last: LastCommand | null;
  default: string | null;
}

export class NavigationHub {
  private groups = new Map<string, Set<Subscriber>>();
  private assignments = new Map<Subscriber, string>();
  private lastCommand: LastCommand | null = null;
  private defaultTarget: string | null = null;
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  register(group: string, sub: Subscriber): void {
    const name = group || ALL_GROUP;
    // A socket lives in one group at a time
    this.unregister(sub);
    let set = this.groups.get(name);
    if (!set) {
      set = new Set();
      this.groups.set(name, set);
    }
    set.add(sub);
    this.assignments.set(sub, name);
  }

  unregister(sub: Subscriber): void {
    const group = this.assignments.get(sub);
    if (group === undefined) return;
    this.assignments.delete(sub);
    const set = this.groups.get(group);
    if (!set) return;
    set.delete(sub);
    if (set.size === 0) this.groups.delete(group);
  }

  /** "all" (or empty) reaches every group; any other name only that group. */
  broadcast(group: string | null | undefined, message: NavigationCommand): number {
    const name = group || ALL_GROUP;
    const targets = new Set<Subscriber>();
    if (name === ALL_GROUP) {
      for (const set of this.groups.values()) {
        for (const sub of set) targets.add(sub);
      }
    } else {
      for (const sub of this.groups.get(name) ?? []) targets.add(sub);
    }
    this.lastCommand = { group: name, message, ts: this.now() };

    const { delivered, dead } = fanOut(targets, JSON.stringify(message));
    for (const sub of dead) this.unregister(sub);
    if (dead.length > 0) console.log(`[Nav] Dropped ${dead.length} dead subscriber(s)`);
    return delivered;
  }

  status(): NavigationStatus {
    const groups: Record<string, number> = {};
    for (const [name, set] of this.groups) groups[name] = set.size;
    return { groups, last: this.lastCommand, default: this.defaultTarget };
  }

  setDefault(target: string | null | undefined): void {
    this.defaultTarget = target || null;
  }

  getDefault(): string | null {
    return this.defaultTarget;
  }
}

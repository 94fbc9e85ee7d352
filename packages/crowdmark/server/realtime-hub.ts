/**
 * Live subscriber registry with fire-and-forget fan-out.
 * Delivery is at-most-once to whoever is connected and healthy at broadcast time.
 */

import { WebSocket } from 'ws';

/** The slice of a WebSocket the hubs need. */
export interface Subscriber {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * Push one serialized message to every target. Subscribers that are not open,
 * or whose send throws, are returned as dead; the caller unregisters them.
 */
export function fanOut(targets: Iterable<Subscriber>, data: string): { delivered: number; dead: Subscriber[] } {
  let delivered = 0;
  const dead: Subscriber[] = [];
  for (const sub of targets) {
    if (sub.readyState !== WebSocket.OPEN) {
      dead.push(sub);
      continue;
    }
    try {
      sub.send(data);
      delivered++;
    } catch {
      dead.push(sub);
    }
  }
  return { delivered, dead };
}

export class RealtimeHub {
  private channels = new Map<string, Set<Subscriber>>();

  register(key: string, sub: Subscriber): void {
    let set = this.channels.get(key);
    if (!set) {
      set = new Set();
      this.channels.set(key, set);
    }
    set.add(sub);
  }

  unregister(key: string, sub: Subscriber): void {
    const set = this.channels.get(key);
    if (!set) return;
    set.delete(sub);
    if (set.size === 0) this.channels.delete(key);
  }

  /** Returns the number of subscribers the message reached. */
  broadcast(key: string, message: object): number {
    const set = this.channels.get(key);
    if (!set) return 0;
    const { delivered, dead } = fanOut([...set], JSON.stringify(message));
    for (const sub of dead) this.unregister(key, sub);
    return delivered;
  }

  count(key: string): number {
    return this.channels.get(key)?.size ?? 0;
  }

  keys(): string[] {
    return [...this.channels.keys()];
  }
}

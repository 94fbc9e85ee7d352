import { describe, it, expect } from 'vitest';
import { WebSocket } from 'ws';
import { NavigationHub, type NavigateCommand } from '../server/navigation.js';
import { FakeSubscriber, fakeClock, START_TIME } from './helpers/fixtures.js';

const navigate: NavigateCommand = { type: 'navigate', target: '/slides/2', preserveClient: true, preserveParams: [] };

function setup() {
  const nav = new NavigationHub({ now: fakeClock().now });
  const stage = new FakeSubscriber();
  const audience = new FakeSubscriber();
  nav.register('stage', stage);
  nav.register('audience', audience);
  return { nav, stage, audience };
}

describe('NavigationHub', () => {
  it('reaches every group when addressed to all', () => {
    const { nav, stage, audience } = setup();
    expect(nav.broadcast('all', navigate)).toBe(2);
    expect(stage.messages()).toEqual([navigate]);
    expect(audience.messages()).toEqual([navigate]);
  });

  it('treats an empty group as all', () => {
    const { nav } = setup();
    expect(nav.broadcast('', { type: 'reload' })).toBe(2);
    expect(nav.status().last?.group).toBe('all');
  });

  it('reaches only the named group otherwise', () => {
    const { nav, stage, audience } = setup();
    expect(nav.broadcast('stage', { type: 'reload' })).toBe(1);
    expect(stage.messages()).toEqual([{ type: 'reload' }]);
    expect(audience.sent).toEqual([]);
    expect(nav.broadcast('nobody', { type: 'reload' })).toBe(0);
  });

  it('keeps a socket in one group at a time', () => {
    const { nav, stage } = setup();
    nav.register('audience', stage);
    expect(nav.status().groups).toEqual({ audience: 2 });
  });

  it('records the last command', () => {
    const { nav } = setup();
    nav.broadcast('stage', navigate);
    expect(nav.status()).toEqual({
      groups: { stage: 1, audience: 1 },
      last: { group: 'stage', message: navigate, ts: START_TIME },
      default: null,
    });
  });

  it('drops subscribers that are no longer open', () => {
    const { nav, stage } = setup();
    stage.readyState = WebSocket.CLOSED;
    expect(nav.broadcast('all', { type: 'reload' })).toBe(1);
    expect(nav.status().groups).toEqual({ audience: 1 });
  });

  it('stores the default target', () => {
    const { nav } = setup();
    expect(nav.getDefault()).toBeNull();
    nav.setDefault('/slides/3');
    expect(nav.getDefault()).toBe('/slides/3');
    nav.setDefault('');
    expect(nav.getDefault()).toBeNull();
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { ButtonManager, parseDirection } from '../server/buttons.js';
import { makeTempDirs, removeTempDirs, fakeClock, START_TIME, type TempDirs } from './helpers/fixtures.js';

describe('parseDirection', () => {
  it('accepts minus and plus in any case', () => {
    expect(parseDirection('PLUS')).toBe('plus');
    expect(parseDirection(' minus ')).toBe('minus');
  });

  it('rejects anything else', () => {
    expect(() => parseDirection('up')).toThrow("Direction must be 'minus' or 'plus'");
  });
});

describe('ButtonManager', () => {
  let dirs: TempDirs;
  let clock: ReturnType<typeof fakeClock>;
  let buttons: ButtonManager;

  beforeEach(async () => {
    dirs = await makeTempDirs();
    clock = fakeClock();
    buttons = new ButtonManager({ dataDir: dirs.dataDir, now: clock.now });
  });

  afterEach(async () => {
    await removeTempDirs(dirs);
  });

  it('starts with the default buttons in order', async () => {
    const config = await buttons.getConfig('main');
    expect(config.buttons.map((b) => b.id)).toEqual(['suspension', 'extension', 'reversal', 'speed']);
    expect(config.buttons[3]).toEqual({ id: 'speed', label: 'Speed', minus: 0, plus: 0 });
    expect(config.nextSeq).toBe(1);
    expect(config.eventCount).toBe(0);
  });

  it('counts a press and records the event', async () => {
    const event = await buttons.fire('main', 'c1', 'speed', 'PLUS');
    expect(event).toEqual({
      seq: 1,
      buttonId: 'speed',
      label: 'Speed',
      direction: 'plus',
      clientId: 'c1',
      timestamp: START_TIME,
    });
    const state = await buttons.state('main');
    expect(state.buttons.speed).toEqual({ label: 'Speed', minus: 0, plus: 1 });
    expect(state.nextSeq).toBe(2);
  });

  it('rejects an unknown button without touching the counters', async () => {
    await buttons.fire('main', 'c1', 'reversal', 'minus');
    const before = await buttons.state('main');

    await expect(buttons.fire('main', 'c2', 'warp', 'plus')).rejects.toMatchObject({
      status: 404,
      code: 'unknown_button',
    });
    await expect(buttons.fire('main', 'c2', 'constructor', 'plus')).rejects.toMatchObject({ status: 404 });

    expect(await buttons.state('main')).toEqual(before);
  });

  it('rejects a bad direction before anything else', async () => {
    await expect(buttons.fire('main', 'c1', 'speed', 'sideways')).rejects.toMatchObject({
      status: 400,
      code: 'invalid_direction',
    });
  });

  it('rejects presses while locked', async () => {
    await buttons.updateConfig('main', { locked: true });
    await expect(buttons.fire('main', 'c1', 'speed', 'plus')).rejects.toMatchObject({ status: 423, code: 'locked' });
  });

  it('enforces the cooldown per client', async () => {
    await buttons.updateConfig('main', { cooldown: 10 });
    await buttons.fire('main', 'c1', 'speed', 'plus');
    clock.advance(4000);
    await expect(buttons.fire('main', 'c1', 'speed', 'minus')).rejects.toMatchObject({
      status: 429,
      payload: { retry_in: 6 },
    });
    clock.advance(6000);
    expect((await buttons.fire('main', 'c1', 'speed', 'minus')).seq).toBe(2);
  });

  it('returns only events after since', async () => {
    await buttons.fire('main', 'a', 'speed', 'plus');
    await buttons.fire('main', 'b', 'speed', 'plus');
    await buttons.fire('main', 'c', 'extension', 'minus');
    const state = await buttons.state('main', 2);
    expect(state.events.map((e) => e.buttonId)).toEqual(['extension']);
    expect(state.buttons.speed.plus).toBe(2);
    expect(state.buttons.extension.minus).toBe(1);
  });

  it('resets counters, events and the sequence', async () => {
    await buttons.fire('main', 'a', 'speed', 'plus');
    const config = await buttons.reset('main');
    expect(config.buttons.every((b) => b.minus === 0 && b.plus === 0)).toBe(true);
    expect(config.nextSeq).toBe(1);
    expect(config.eventCount).toBe(0);
  });

  it('keeps buttons found on disk after the defaults', async () => {
    await writeFile(
      join(dirs.dataDir, 'buttons_stage.json'),
      JSON.stringify({ buttons: { custom: { minus: 1, plus: 2 }, speed: { label: 'Tempo', minus: 0, plus: 4 } } }),
      'utf-8',
    );
    const config = await buttons.getConfig('stage');
    expect(config.buttons.map((b) => b.id)).toEqual(['suspension', 'extension', 'reversal', 'speed', 'custom']);
    expect(config.buttons[3]).toEqual({ id: 'speed', label: 'Tempo', minus: 0, plus: 4 });
    expect(config.buttons[4]).toEqual({ id: 'custom', label: 'Custom', minus: 1, plus: 2 });
  });

  it('lists known panels', async () => {
    await buttons.fire('stage', 'a', 'speed', 'plus');
    expect(buttons.listPanelIds()).toEqual(['main', 'stage']);
  });
});

import { describe, test, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { AnsiRenderer, KeypressInput, renderFrame, toKeyEvent } from './terminal.js';
import { stripAnsi } from '../lib/output.js';
import type { TowerView } from '../core/tower.js';

function makeView(overrides?: Partial<TowerView>): TowerView {
  return {
    sessionName: 'crewmux-abcd1234',
    projectRoot: '/tmp/project',
    selected: 1,
    message: 'frontend ready',
    mode: 'normal',
    input: '',
    experts: [
      { id: 0, name: 'architect', color: 'red', role: 'architect', status: 'busy' },
      { id: 1, name: 'frontend', color: 'blue', role: 'frontend', status: 'ready', branch: 'feat-x', activity: 'working' },
    ],
    ...overrides,
  };
}

async function nextTurn(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

describe('renderFrame', () => {
  test('given a view, should draw one row per expert with the cursor on the selection', () => {
    const lines = stripAnsi(renderFrame(makeView())).split('\n');

    expect(lines).toEqual([
      'crewmux crewmux-abcd1234  /tmp/project',
      '',
      '  0  architect  architect  ● busy',
      '› 1  frontend   frontend   ◎ ready  ⎇ feat-x  (working)',
      '',
      'frontend ready',
      'j/k select  l launch  w worktree  r root  x reset  c role  q quit',
    ]);
  });

  test('given branch input mode, should show the typed branch', () => {
    const lines = stripAnsi(renderFrame(makeView({ mode: 'branch-input', input: 'feat' }))).split('\n');

    expect(lines.at(-2)).toBe('Branch: feat_');
  });

  test('given a long message, should truncate it to the width', () => {
    const lines = stripAnsi(renderFrame(makeView({ message: 'x'.repeat(30) }), 10)).split('\n');

    expect(lines[5]).toBe('xxxxxxx...');
  });
});

describe('toKeyEvent', () => {
  test('given ctrl-c, should mark ctrl and drop the character', () => {
    expect(toKeyEvent('\x03', { name: 'c', ctrl: true, meta: false, shift: false, sequence: '\x03' })).toEqual({
      name: 'c',
      ctrl: true,
    });
  });

  test('given a printable key, should keep its character', () => {
    expect(toKeyEvent('A', { name: 'a', ctrl: false, meta: false, shift: true, sequence: 'A' })).toEqual({
      name: 'a',
      char: 'A',
    });
  });

  test('given neither a string nor a key, should return null', () => {
    expect(toKeyEvent(undefined, undefined)).toBeNull();
  });
});

describe('KeypressInput', () => {
  test('given keys written to the stream, should queue them until drained', async () => {
    const stream = new PassThrough();
    const input = new KeypressInput(stream);
    input.start();

    stream.write('j');
    stream.write('\x1b[A');
    await nextTurn();

    expect(input.drain()).toEqual([
      { name: 'j', char: 'j' },
      { name: 'up', char: undefined },
    ]);
    expect(input.drain()).toEqual([]);
    input.stop();
  });

  test('given stop, should ignore later keys', async () => {
    const stream = new PassThrough();
    const input = new KeypressInput(stream);
    input.start();
    input.stop();

    stream.write('q');
    await nextTurn();

    expect(input.drain()).toEqual([]);
  });
});

describe('AnsiRenderer', () => {
  test('given two identical frames, should draw once and restore the screen', () => {
    const written: string[] = [];
    const renderer = new AnsiRenderer((text) => written.push(text), () => 80);

    renderer.render(makeView());
    renderer.render(makeView());
    renderer.restore();

    expect(written).toHaveLength(3);
    expect(written[0]).toBe('\x1b[?1049h\x1b[?25l');
    expect(written[1]?.startsWith('\x1b[H\x1b[2J')).toBe(true);
    expect(written[2]).toBe('\x1b[?1049l\x1b[?25h');
  });

  test('given restore before any render, should write nothing', () => {
    const written: string[] = [];
    new AnsiRenderer((text) => written.push(text)).restore();

    expect(written).toEqual([]);
  });
});

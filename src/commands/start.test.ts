import { describe, test, expect } from 'vitest';
import { initialRequests, summarizeLaunches } from './start.js';
import { buildSessionConfig } from '../core/session.js';
import { defaultConfig } from '../core/config.js';
import { createSessionRoles, setRole } from '../core/context.js';
import type { LaunchRequest } from '../core/launch.js';
import type { TerminalOutcome } from './common.js';

const config = buildSessionConfig('/tmp/project', defaultConfig());

describe('initialRequests', () => {
  test('given saved roles, should use them over the configured role', () => {
    const roles = setRole(createSessionRoles('f630ad93', '2026-01-01T00:00:00.000Z'), 2, 'planner');

    const requests = initialRequests(config, roles, false);

    expect(requests.map((r) => r.role)).toEqual(['architect', 'frontend', 'planner', 'tester']);
    expect(requests[0]).toEqual({ expertId: 0, expertName: 'architect', role: 'architect' });
  });

  test('given a reused session, should ask every expert to restart', () => {
    const requests = initialRequests(config, null, true);

    expect(requests.every((r) => r.restart === true)).toBe(true);
  });
});

describe('summarizeLaunches', () => {
  const requests: LaunchRequest[] = initialRequests(config, null, false).slice(0, 3);

  test('given ready, timed out and failed launches, should describe each', () => {
    const outcomes = new Map<number, TerminalOutcome>([
      [0, {
        kind: 'completed',
        label: 'Launch',
        value: { expertId: 0, expertName: 'architect', workingDir: '/tmp/project', ready: true, instructionSent: true },
      }],
      [1, {
        kind: 'completed',
        label: 'Launch',
        value: { expertId: 1, expertName: 'frontend', workingDir: '/tmp/project', ready: false, instructionSent: false },
      }],
      [2, { kind: 'failed', label: 'Launch', error: new Error('pane missing') }],
    ]);

    expect(summarizeLaunches(config, requests, outcomes)).toEqual([
      { id: 0, name: 'architect', role: 'architect', state: 'ready', workingDir: '/tmp/project', detail: 'instructions sent' },
      { id: 1, name: 'frontend', role: 'frontend', state: 'timeout', workingDir: '/tmp/project', detail: 'not ready after 30s' },
      { id: 2, name: 'backend', role: 'backend', state: 'failed', workingDir: '/tmp/project', detail: 'pane missing' },
    ]);
  });

  test('given a result carrying an error, should report it as failed in its directory', () => {
    const outcomes = new Map<number, TerminalOutcome>([
      [0, {
        kind: 'completed',
        label: 'Launch',
        value: {
          expertId: 0,
          expertName: 'architect',
          workingDir: '/tmp/wt',
          ready: false,
          instructionSent: false,
          error: new Error('lock busy'),
        },
      }],
    ]);

    const [row] = summarizeLaunches(config, requests.slice(0, 1), outcomes);

    expect(row).toMatchObject({ state: 'failed', workingDir: '/tmp/wt', detail: 'lock busy' });
  });
});

import { describe, test, expect } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import {
  dataDir,
  configPath,
  globalConfigPath,
  queueDir,
  statusDir,
  statusFile,
  reportsDir,
  reportFile,
  renderedInstructionFile,
  expertContextFile,
  sharedContextFile,
  sessionRolesFile,
  instructionsDir,
  logFile,
  worktreeBaseDir,
  worktreePath,
  worktreeAliasPath,
} from './paths.js';

const ROOT = '/tmp/project';
const QUEUE = path.join(ROOT, '.crewmux', 'queue');

describe('paths', () => {
  test('dataDir', () => {
    expect(dataDir(ROOT)).toBe(path.join(ROOT, '.crewmux'));
  });

  test('configPath', () => {
    expect(configPath(ROOT)).toBe(path.join(ROOT, '.crewmux', 'config.yaml'));
  });

  test('globalConfigPath', () => {
    expect(globalConfigPath()).toBe(path.join(os.homedir(), '.config', 'crewmux', 'config.yaml'));
  });

  test('queueDir', () => {
    expect(queueDir(ROOT)).toBe(QUEUE);
  });

  test('statusDir and statusFile', () => {
    expect(statusDir(ROOT)).toBe(path.join(QUEUE, 'status'));
    expect(statusFile(ROOT, 2)).toBe(path.join(QUEUE, 'status', 'expert2'));
  });

  test('reportsDir', () => {
    expect(reportsDir(ROOT)).toBe(path.join(QUEUE, 'reports'));
    expect(reportFile(ROOT, 3)).toBe(path.join(QUEUE, 'reports', 'expert3_report.yaml'));
  });

  test('renderedInstructionFile', () => {
    expect(renderedInstructionFile(ROOT, 1)).toBe(path.join(QUEUE, 'instructions', 'expert1.md'));
  });

  test('expertContextFile', () => {
    expect(expertContextFile(QUEUE, 'abcd1234', 3)).toBe(
      path.join(QUEUE, 'sessions', 'abcd1234', 'experts', 'expert3', 'context.yaml'),
    );
  });

  test('sharedContextFile', () => {
    expect(sharedContextFile(QUEUE, 'abcd1234')).toBe(
      path.join(QUEUE, 'sessions', 'abcd1234', 'shared', 'decisions.yaml'),
    );
  });

  test('sessionRolesFile', () => {
    expect(sessionRolesFile(QUEUE, 'abcd1234')).toBe(
      path.join(QUEUE, 'sessions', 'abcd1234', 'expert_roles.yaml'),
    );
  });

  test('instructionsDir', () => {
    expect(instructionsDir(ROOT)).toBe(path.join(ROOT, '.crewmux', 'instructions'));
  });

  test('logFile', () => {
    expect(logFile(ROOT, 'tower')).toBe(path.join(ROOT, '.crewmux', 'logs', 'tower.log'));
  });

  test('worktreeBaseDir', () => {
    expect(worktreeBaseDir(ROOT)).toBe(path.join(ROOT, '.crewmux', 'worktrees'));
  });

  test('worktreePath', () => {
    expect(worktreePath(ROOT, 'feature-x')).toBe(path.join(ROOT, '.crewmux', 'worktrees', 'feature-x'));
  });

  test('worktreeAliasPath', () => {
    const wt = worktreePath(ROOT, 'feature-x');
    expect(worktreeAliasPath(wt)).toBe(path.join(wt, '.crewmux'));
  });
});

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  loadRoleTemplate,
  renderRoleInstruction,
  renderTemplate,
  writeRenderedInstruction,
  type InstructionVars,
} from './instructions.js';

let root: string;

const vars: InstructionVars = {
  EXPERT_ID: '1',
  EXPERT_NAME: 'frontend',
  ROLE: 'frontend',
  WORKING_DIR: '/repo/.crewmux/worktrees/ui',
  STATUS_FILE: '/repo/.crewmux/queue/status/expert1',
  REPORT_FILE: '/repo/.crewmux/queue/reports/expert1_report.yaml',
  PROJECT_ROOT: '/repo',
};

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'crewmux-instr-'));
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe('renderTemplate', () => {
  test('given known and unknown variables, should replace only the known ones', () => {
    expect(renderTemplate('{{EXPERT_NAME}} in {{WORKING_DIR}} {{OTHER}}', vars)).toBe(
      'frontend in /repo/.crewmux/worktrees/ui {{OTHER}}',
    );
  });
});

describe('loadRoleTemplate', () => {
  test('given a project override, should prefer it', async () => {
    await fs.mkdir(path.join(root, '.crewmux', 'instructions'), { recursive: true });
    await fs.writeFile(path.join(root, '.crewmux', 'instructions', 'frontend.md'), 'custom {{ROLE}}', 'utf-8');

    const template = await loadRoleTemplate(root, 'frontend');

    expect(template).toEqual({ content: 'custom {{ROLE}}', source: 'project' });
  });

  test('given no override for a bundled role, should use the bundled template', async () => {
    const template = await loadRoleTemplate(root, 'tester');

    expect(template.source).toBe('bundled');
    expect(template.content).toContain('(tester)');
  });

  test('given an unknown role, should fall back to general', async () => {
    const template = await loadRoleTemplate(root, 'astronaut');

    expect(template.source).toBe('general');
  });
});

describe('renderRoleInstruction', () => {
  test('given the bundled template, should fill the status and report file paths', async () => {
    const text = await renderRoleInstruction(root, 'frontend', vars);

    expect(text.startsWith('# Expert 1: frontend (frontend)')).toBe(true);
    expect(text).toContain('echo pending > /repo/.crewmux/queue/status/expert1');
    expect(text).toContain('write a YAML report to /repo/.crewmux/queue/reports/expert1_report.yaml with the fields');
  });

  test('given a whitespace-only override, should return the empty instruction', async () => {
    await fs.mkdir(path.join(root, '.crewmux', 'instructions'), { recursive: true });
    await fs.writeFile(path.join(root, '.crewmux', 'instructions', 'frontend.md'), '  \n\n', 'utf-8');

    expect(await renderRoleInstruction(root, 'frontend', vars)).toBe('');
  });
});

describe('writeRenderedInstruction', () => {
  test('given content, should write it under queue/instructions', async () => {
    const file = await writeRenderedInstruction(root, 2, 'hello');

    expect(file).toBe(path.join(root, '.crewmux', 'queue', 'instructions', 'expert2.md'));
    expect(await fs.readFile(file, 'utf-8')).toBe('hello');
  });
});

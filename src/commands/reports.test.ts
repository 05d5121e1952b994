import { describe, test, expect } from 'vitest';
import { buildReportRows } from './reports.js';
import { buildSessionConfig } from '../core/session.js';
import { defaultConfig, withNumExperts } from '../core/config.js';
import type { Report } from '../types/report.js';

function makeReport(overrides?: Partial<Report>): Report {
  return {
    taskId: 'task-1',
    expertId: 1,
    expertName: 'ui',
    status: 'done',
    startedAt: '2026-01-10T10:00:00.000Z',
    completedAt: '2026-01-10T10:30:00.000Z',
    summary: 'Built the form.',
    details: { findings: [], recommendations: [], filesModified: [], filesCreated: [] },
    errors: [],
    ...overrides,
  };
}

describe('buildReportRows', () => {
  test('given a configured expert, should use its configured name', () => {
    const config = buildSessionConfig('/tmp/project', defaultConfig());

    expect(buildReportRows(config, [makeReport()])).toEqual([
      {
        expertId: 1,
        expert: 'frontend',
        taskId: 'task-1',
        status: 'done',
        completedAt: '2026-01-10T10:30:00.000Z',
        summary: 'Built the form.',
        findings: 0,
        warnings: [],
      },
    ]);
  });

  test('given an expert outside the crew and a failed report without errors, should keep its name and warn', () => {
    const config = buildSessionConfig('/tmp/project', withNumExperts(defaultConfig(), 1));

    const [row] = buildReportRows(config, [makeReport({ status: 'failed', summary: '' })]);

    expect(row?.expert).toBe('ui');
    expect(row?.warnings).toEqual(['a failed report needs at least one error']);
  });
});

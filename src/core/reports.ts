import fs from 'node:fs/promises';
import YAML from 'yaml';
import type { Finding, Report, ReportStatus } from '../types/report.js';
import { reportFile, reportsDir } from '../lib/paths.js';
import { ReportInvalidError, errorMessage } from '../lib/errors.js';
import { FieldReader } from './context.js';

const reportStatuses: readonly ReportStatus[] = ['pending', 'in_progress', 'done', 'failed'];
const reportName = /^expert(\d+)_report\.yaml$/;

function isReportStatus(value: string): value is ReportStatus {
  return reportStatuses.some((s) => s === value);
}

export function parseReport(file: string, raw: unknown): Report {
  const r = new FieldReader(file, (f, d) => new ReportInvalidError(f, d));
  const obj = r.record(raw, 'report');
  const status = r.string(obj, 'status');
  if (!isReportStatus(status)) {
    throw new ReportInvalidError(file, `status must be one of ${reportStatuses.join(', ')}`);
  }
  const details = obj.details === undefined || obj.details === null ? {} : r.record(obj.details, 'details');

  const report: Report = {
    taskId: r.string(obj, 'taskId'),
    expertId: r.number(obj, 'expertId'),
    expertName: r.string(obj, 'expertName'),
    status,
    startedAt: r.string(obj, 'startedAt'),
    summary: r.optionalString(obj, 'summary') ?? '',
    details: {
      findings: r.list(details, 'findings', (e): Finding => {
        const finding: Finding = { description: r.string(e, 'description'), severity: r.string(e, 'severity') };
        const findingFile = r.optionalString(e, 'file');
        const line = r.optionalNumber(e, 'line');
        if (findingFile !== undefined) finding.file = findingFile;
        if (line !== undefined) finding.line = line;
        return finding;
      }),
      recommendations: r.strings(details, 'recommendations'),
      filesModified: r.strings(details, 'filesModified'),
      filesCreated: r.strings(details, 'filesCreated'),
    },
    errors: r.strings(obj, 'errors'),
  };
  const completedAt = r.optionalString(obj, 'completedAt');
  if (completedAt !== undefined) report.completedAt = completedAt;
  return report;
}

/** Problems a report must not have even though it parsed. */
export function validateReport(report: Report): string[] {
  const problems: string[] = [];
  if (!report.taskId.trim()) problems.push('taskId is empty');
  if (report.status === 'done' && !report.summary.trim()) problems.push('a done report needs a summary');
  if (report.status === 'failed' && report.errors.length === 0) problems.push('a failed report needs at least one error');
  if ((report.status === 'done' || report.status === 'failed') && report.completedAt === undefined) {
    problems.push('a finished report needs completedAt');
  }
  return problems;
}

export interface ReportListing {
  reports: Report[];
  /** Files that could not be read or parsed, with the reason. */
  skipped: { file: string; reason: string }[];
}

/**
 * Reads the report each expert leaves in `queue/reports`. Only the top level
 * of that directory is listed.
 */
export class ReportStore {
  constructor(readonly projectRoot: string) {}

  async read(expertId: number): Promise<Report | null> {
    const file = reportFile(this.projectRoot, expertId);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (err) {
      throw new ReportInvalidError(file, errorMessage(err));
    }
    return parseReport(file, parsed);
  }

  async list(): Promise<ReportListing> {
    let names: string[];
    try {
      names = await fs.readdir(reportsDir(this.projectRoot));
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { reports: [], skipped: [] };
      throw err;
    }

    const ids = names
      .map((name) => reportName.exec(name)?.[1])
      .filter((id): id is string => id !== undefined)
      .map(Number)
      .sort((a, b) => a - b);

    const listing: ReportListing = { reports: [], skipped: [] };
    for (const id of ids) {
      try {
        const report = await this.read(id);
        if (report) listing.reports.push(report);
      } catch (err) {
        listing.skipped.push({ file: reportFile(this.projectRoot, id), reason: errorMessage(err) });
      }
    }
    return listing;
  }

  async clear(expertId: number): Promise<void> {
    await fs.rm(reportFile(this.projectRoot, expertId), { force: true });
  }
}

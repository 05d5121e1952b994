import type { SessionConfig } from '../types/config.js';
import type { Report, ReportStatus } from '../types/report.js';
import { formatTable, output, truncate, warn, DIM, GREEN, RED, RESET, YELLOW, type Column } from '../lib/output.js';
import { ReportStore, validateReport } from '../core/reports.js';
import { resolveProjectConfig, type ProjectOptions } from './common.js';

export interface ReportsOptions extends Pick<ProjectOptions, 'config'> {
  json?: boolean;
}

export interface ReportRow {
  expertId: number;
  expert: string;
  taskId: string;
  status: ReportStatus;
  completedAt: string;
  summary: string;
  findings: number;
  warnings: string[];
}

/** One row per report; an expert id past the configured crew keeps the name the report gives. */
export function buildReportRows(config: SessionConfig, reports: Report[]): ReportRow[] {
  return reports.map((report) => ({
    expertId: report.expertId,
    expert: config.experts[report.expertId]?.name ?? report.expertName,
    taskId: report.taskId,
    status: report.status,
    completedAt: report.completedAt ?? '',
    summary: report.summary,
    findings: report.details.findings.length,
    warnings: validateReport(report),
  }));
}

const statusColors: Record<ReportStatus, string> = {
  pending: DIM,
  in_progress: YELLOW,
  done: GREEN,
  failed: RED,
};

const columns: Column<ReportRow>[] = [
  { header: 'ID', key: 'expertId' },
  { header: 'Expert', key: 'expert' },
  { header: 'Task', key: 'taskId' },
  { header: 'Status', key: 'status', format: (_v, row) => `${statusColors[row.status]}${row.status}${RESET}` },
  { header: 'Findings', key: 'findings' },
  { header: 'Summary', key: 'summary', format: (_v, row) => truncate(row.summary, 60) },
];

export async function reportsCommand(projectPath: string | undefined, options: ReportsOptions): Promise<void> {
  const config = await resolveProjectConfig(projectPath, options);
  const { reports, skipped } = await new ReportStore(config.projectRoot).list();
  const rows = buildReportRows(config, reports);

  if (options.json) {
    output({ reports, skipped }, true);
    return;
  }
  for (const { reason } of skipped) warn(reason);
  for (const row of rows) {
    for (const warning of row.warnings) warn(`${row.expert}: ${warning}`);
  }
  if (rows.length === 0) {
    console.log('No reports yet.');
    return;
  }
  console.log(formatTable(rows, columns));
}

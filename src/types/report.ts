export type ReportStatus = 'pending' | 'in_progress' | 'done' | 'failed';

export interface Finding {
  description: string;
  severity: string;
  file?: string;
  line?: number;
}

export interface ReportDetails {
  findings: Finding[];
  recommendations: string[];
  filesModified: string[];
  filesCreated: string[];
}

/** What an expert writes to `queue/reports/expert<N>_report.yaml` when it finishes a task. */
export interface Report {
  taskId: string;
  expertId: number;
  expertName: string;
  status: ReportStatus;
  startedAt: string;
  completedAt?: string;
  summary: string;
  details: ReportDetails;
  errors: string[];
}

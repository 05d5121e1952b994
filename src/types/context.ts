export interface FileAnalysis {
  path: string;
  summary: string;
  lastRead: string;
}

export interface Pattern {
  patternType: string;
  pattern: string;
}

export interface Knowledge {
  filesAnalyzed: FileAnalysis[];
  patternsDiscovered: Pattern[];
}

/** Durable per-expert record, keyed by (sessionHash, expertId). */
export interface ExpertContext {
  expertId: number;
  expertName: string;
  sessionHash: string;
  role: string;
  resumeToken?: string;
  worktreeBranch?: string;
  worktreePath?: string;
  knowledge: Knowledge;
  createdAt: string;
  updatedAt: string;
}

export interface Decision {
  id: string;
  madeBy: number;
  timestamp: string;
  topic: string;
  decision: string;
  rationale: string;
  affectsExperts: number[];
}

export interface Convention {
  pattern: string;
  description: string;
  discoveredAt: string;
  discoveredBy: number;
}

export interface SharedContext {
  decisions: Decision[];
  conventions: Convention[];
}

export interface RoleAssignment {
  expertId: number;
  role: string;
  assignedAt: string;
}

export interface SessionRoles {
  sessionHash: string;
  createdAt: string;
  updatedAt: string;
  assignments: RoleAssignment[];
}

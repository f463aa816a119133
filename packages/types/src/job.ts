export type JobStatus = "running" | "completed" | "failed" | "cancelled";

export interface JobSnapshot<TResult = unknown> {
  id: string;
  status: JobStatus;
  startedAt: Date;
  finishedAt?: Date;
  progress: JobProgress;
  result?: TResult;
  error?: string;
}

export interface JobProgress {
  completed: number;
  total: number;
  current?: string;
}

export interface ResearchRequest {
  connectorId: string;
  connectorName: string;
  description?: string;
  apiDocsUrl?: string;
}

export interface ResearchSection {
  number: number;
  title: string;
  phase: number;
  phaseName: string;
  /** Web search query template; `{connector}` is replaced by the connector name. */
  searchQuery: string;
  questions: string[];
}

export interface ResearchReport {
  connectorId: string;
  connectorName: string;
  markdown: string;
  sectionsCompleted: number;
  sectionsFailed: number;
  generatedAt: string;
}

export interface ResearchJobResult {
  report: ResearchReport;
  vectorsUpserted: number;
}

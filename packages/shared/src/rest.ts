/**
 * REST DTO contracts served by the lazythumb server.
 */

import type { IsoDateTime, MediaKey } from "./models.ts";

export interface JobCounts {
  queued: number;
  inProgress: number;
  ready: number;
  failed: number;
}

export interface JobGroupSummary extends JobCounts {
  group: string;
}

export interface JobsDashboardResponse {
  generatedAt: IsoDateTime;
  openBatches: number;
  totals: JobCounts;
  groups: JobGroupSummary[];
}

export type JobStatus = keyof JobCounts;

export interface JobRow {
  mediaKey: MediaKey;
  status: JobStatus;
  attempts: number;
  error: string | null;
  createdAt: IsoDateTime;
  updatedAt: IsoDateTime;
}

export interface SourceJobsResponse {
  sourceId: string;
  pageNumber: number;
  pageCount: number;
  totalJobs: number;
  jobs: JobRow[];
}

export interface HealthResponse {
  ok: boolean;
  service: string;
  timestamp: IsoDateTime;
}

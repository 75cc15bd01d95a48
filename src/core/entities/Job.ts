/**
 * Video job domain entities
 */

/**
 * Closed view of the remote status label. The service sends free-form strings,
 * anything unrecognised maps to 'unknown' and is treated as still running.
 */
export type JobPhase =
  | 'queued'
  | 'in_progress'
  | 'completed'
  | 'failed'
  | 'cancelled'
  | 'rejected'
  | 'expired'
  | 'unknown';

export interface JobError {
  message: string;
  type?: string;
  code?: string;
}

export interface VideoJob {
  id: string;
  status: string; // raw label as sent by the service
  phase: JobPhase;
  progress: number; // 0-100
  rawProgress?: number;
  model?: string;
  seconds?: number;
  size?: string;
  quality?: string;
  createdAt?: Date;
  completedAt?: Date;
  expiresAt?: Date;
  remixedFromVideoId?: string;
  error?: JobError;
}

export interface SubmissionRequest {
  prompt: string;
  model?: string;
  seconds?: number;
  size?: string;
  attachmentPath?: string;
}

export type SortOrder = 'asc' | 'desc';

export interface ListQuery {
  limit?: number;
  after?: string;
  order?: SortOrder;
}

export interface ListPage {
  jobs: VideoJob[];
  hasMore: boolean;
  nextCursor?: string;
}

const PHASE_BY_LABEL = new Map<string, JobPhase>([
  ['queued', 'queued'],
  ['in_progress', 'in_progress'],
  ['running', 'in_progress'],
  ['completed', 'completed'],
  ['failed', 'failed'],
  ['canceled', 'cancelled'],
  ['cancelled', 'cancelled'],
  ['rejected', 'rejected'],
  ['expired', 'expired'],
]);

export function toJobPhase(status: string): JobPhase {
  return PHASE_BY_LABEL.get(status.trim().toLowerCase()) ?? 'unknown';
}

export type PhaseBucket = 'running' | 'succeeded' | 'failed';

export function phaseBucket(phase: JobPhase): PhaseBucket {
  switch (phase) {
    case 'completed':
      return 'succeeded';
    case 'failed':
    case 'cancelled':
    case 'rejected':
    case 'expired':
      return 'failed';
    default:
      return 'running';
  }
}

import { z } from 'zod';
import { toJobPhase, type ListPage, type VideoJob } from '../../core/entities/Job.js';
import { normalizeProgress, type ProgressBoundaryPolicy } from '../../core/progress.js';

// Wire shapes. Every field is optional here; required-ness is checked by the caller.
const JobErrorPayloadSchema = z.object({
  message: z.string().nullish(),
  type: z.string().nullish(),
  code: z.union([z.string(), z.number()]).nullish(),
});

export const VideoJobPayloadSchema = z
  .object({
    id: z.string().optional(),
    object: z.string().optional(),
    status: z.string().optional(),
    progress: z.number().nullish(),
    model: z.string().nullish(),
    seconds: z.union([z.string(), z.number()]).nullish(),
    size: z.string().nullish(),
    quality: z.string().nullish(),
    created_at: z.number().nullish(),
    completed_at: z.number().nullish(),
    expires_at: z.number().nullish(),
    remixed_from_video_id: z.string().nullish(),
    error: JobErrorPayloadSchema.nullish(),
  })
  .passthrough();

export type VideoJobPayload = z.infer<typeof VideoJobPayloadSchema>;

export const VideoListPayloadSchema = z.object({
  object: z.string().optional(),
  data: z.array(VideoJobPayloadSchema).nullish(),
  has_more: z.boolean().nullish(),
  next: z.string().nullish(),
  next_cursor: z.string().nullish(),
});

export type VideoListPayload = z.infer<typeof VideoListPayloadSchema>;

/**
 * Structured error body: {"error": {"message": "..."}}
 */
export const ApiErrorPayloadSchema = z.object({
  error: z.object({
    message: z.string().min(1),
  }),
});

function fromUnixSeconds(value: number | null | undefined): Date | undefined {
  return value && value > 0 ? new Date(value * 1000) : undefined;
}

function toSeconds(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Map a job payload to the domain entity. Status is classified and progress
 * normalized here, at the transport boundary.
 */
export function toVideoJob(payload: VideoJobPayload, boundary: ProgressBoundaryPolicy): VideoJob {
  const status = payload.status ?? '';
  const rawProgress = payload.progress ?? undefined;

  const job: VideoJob = {
    id: payload.id ?? '',
    status,
    phase: toJobPhase(status),
    progress: rawProgress === undefined ? 0 : normalizeProgress(rawProgress, boundary),
    rawProgress,
    model: payload.model || undefined,
    seconds: toSeconds(payload.seconds),
    size: payload.size || undefined,
    quality: payload.quality || undefined,
    createdAt: fromUnixSeconds(payload.created_at),
    completedAt: fromUnixSeconds(payload.completed_at),
    expiresAt: fromUnixSeconds(payload.expires_at),
    remixedFromVideoId: payload.remixed_from_video_id || undefined,
  };

  if (payload.error) {
    job.error = {
      message: payload.error.message ?? '',
      type: payload.error.type ?? undefined,
      code: payload.error.code === null || payload.error.code === undefined ? undefined : String(payload.error.code),
    };
  }

  return job;
}

export function toListPage(payload: VideoListPayload, boundary: ProgressBoundaryPolicy): ListPage {
  const nextCursor = payload.next || payload.next_cursor || undefined;
  return {
    jobs: (payload.data ?? []).map((item) => toVideoJob(item, boundary)),
    hasMore: payload.has_more ?? false,
    nextCursor,
  };
}

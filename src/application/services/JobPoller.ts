import { phaseBucket, type VideoJob } from '../../core/entities/Job.js';
import { JobFailedError, TimeoutError } from '../../core/errors.js';
import type { IVideoClient } from '../../core/interfaces/IVideoClient.js';
import { abortError, sleep as defaultSleep, type SleepFn } from '../../utils/abort.js';
import { createLogger } from '../../utils/logger.js';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_WAIT_MS = 30 * 60 * 1000;

export interface PollerOptions {
  intervalMs: number;
  timeoutMs: number;
  sleep?: SleepFn;
  now?: () => number;
}

/**
 * A poll tick whose status or progress differs from the previous one
 */
export interface StatusUpdate {
  tick: number;
  job: VideoJob;
}

export interface WaitOptions {
  signal?: AbortSignal;
  onUpdate?: (update: StatusUpdate) => void;
}

export function failureMessage(job: VideoJob): string {
  return job.error?.message ? job.error.message : `job ${job.status}`;
}

/**
 * Polls a job at a fixed cadence until it reaches a terminal state.
 *
 * The first status request goes out one interval after the call. There is no
 * backoff and no tick cap; the loop ends on a terminal state, the deadline,
 * or the caller's signal.
 */
export class JobPoller {
  private sleep: SleepFn;
  private now: () => number;
  private logger = createLogger('JobPoller');

  constructor(
    private client: Pick<IVideoClient, 'getVideo'>,
    private options: PollerOptions = { intervalMs: DEFAULT_POLL_INTERVAL_MS, timeoutMs: DEFAULT_MAX_WAIT_MS }
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async waitForCompletion(jobId: string, { signal, onUpdate }: WaitOptions = {}): Promise<VideoJob> {
    const { intervalMs, timeoutMs } = this.options;
    const deadline = this.now() + timeoutMs;
    let last: { status: string; progress: number } | null = null;
    let tick = 0;

    for (;;) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw new TimeoutError(timeoutMs);
      }
      await this.sleep(Math.min(intervalMs, remaining), signal);
      if (signal?.aborted) {
        throw abortError(signal);
      }
      if (this.now() >= deadline) {
        throw new TimeoutError(timeoutMs);
      }

      tick++;
      const job = await this.client.getVideo(jobId, signal);

      if (!last || job.status !== last.status || job.progress !== last.progress) {
        last = { status: job.status, progress: job.progress };
        onUpdate?.({ tick, job });
      }

      switch (phaseBucket(job.phase)) {
        case 'succeeded':
          this.logger.debug(`Job ${jobId} completed after ${tick} polls`);
          return job;
        case 'failed':
          throw new JobFailedError(job.status, failureMessage(job));
        case 'running':
          if (job.phase === 'unknown') {
            this.logger.debug(`Job ${jobId} reported unrecognised status "${job.status}", still polling`);
          }
          break;
      }
    }
  }
}

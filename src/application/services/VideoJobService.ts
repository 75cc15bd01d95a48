import { mkdir } from 'fs/promises';
import { z } from 'zod';
import type { ListPage, ListQuery, SubmissionRequest, VideoJob } from '../../core/entities/Job.js';
import { ALLOWED_DURATIONS } from '../../core/entities/Model.js';
import { FileOperationError, InvalidSubmissionError } from '../../core/errors.js';
import type { IAttachmentSource } from '../../core/interfaces/IAttachmentSource.js';
import type { IVideoClient } from '../../core/interfaces/IVideoClient.js';
import { writeArtifact } from '../../infrastructure/files/ArtifactWriter.js';
import { classifyAttachment, type AttachmentContentType } from '../../infrastructure/files/AttachmentClassifier.js';
import { FileAttachmentSource } from '../../infrastructure/files/FileAttachmentSource.js';
import { abortError, createDeadline } from '../../utils/abort.js';
import { createLogger } from '../../utils/logger.js';
import { artifactPath, expandPath } from '../../utils/paths.js';
import type { JobPoller, WaitOptions } from './JobPoller.js';

export type AttachmentOpener = (filePath: string) => Promise<IAttachmentSource>;

const SubmissionRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
  model: z.string().trim().optional(),
  seconds: z
    .number()
    .int()
    .refine((value) => ALLOWED_DURATIONS.some((allowed) => allowed === value), {
      message: `seconds must be one of ${ALLOWED_DURATIONS.join(', ')}`,
    })
    .optional(),
  size: z
    .string()
    .trim()
    .refine((value) => value === '' || /^\d+x\d+$/.test(value), { message: 'size must look like WIDTHxHEIGHT' })
    .optional(),
  attachmentPath: z.string().trim().optional(),
});

/**
 * Validate and normalise a submission before anything touches the network
 */
export function validateSubmission(input: SubmissionRequest): SubmissionRequest {
  const result = SubmissionRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidSubmissionError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`)
    );
  }
  const { prompt, model, seconds, size, attachmentPath } = result.data;
  return {
    prompt,
    model: model || undefined,
    seconds,
    size: size || undefined,
    attachmentPath: attachmentPath ? expandPath(attachmentPath) : undefined,
  };
}

export interface LifecycleOptions extends WaitOptions {
  destinationDir: string;
  timeoutMs: number;
  onQueued?: (job: VideoJob) => void;
  onDownloading?: (job: VideoJob) => void;
}

export interface LifecycleResult {
  job: VideoJob;
  outputPath: string;
}

/**
 * Drives one video job end to end: submit, poll, download
 */
export class VideoJobService {
  private logger = createLogger('VideoJobService');

  constructor(
    private client: IVideoClient,
    private poller: JobPoller,
    private openAttachment: AttachmentOpener = FileAttachmentSource.open
  ) {}

  /**
   * Open and classify an attachment without uploading it
   */
  async inspectAttachment(filePath: string): Promise<AttachmentContentType> {
    const source = await this.openAttachment(expandPath(filePath));
    try {
      return await classifyAttachment(source);
    } finally {
      await source.close();
    }
  }

  async submit(input: SubmissionRequest, signal?: AbortSignal): Promise<VideoJob> {
    const request = validateSubmission(input);

    if (!request.attachmentPath) {
      return this.client.createVideo({ request }, signal);
    }

    const source = await this.openAttachment(request.attachmentPath);
    try {
      const contentType = await classifyAttachment(source);
      await source.rewind();
      this.logger.debug(`Uploading ${source.name} as ${contentType} (${source.size} bytes)`);
      return await this.client.createVideo({ request, attachment: { source, contentType } }, signal);
    } finally {
      await source.close();
    }
  }

  async remix(videoId: string, prompt: string, signal?: AbortSignal): Promise<VideoJob> {
    const id = videoId.trim();
    const text = prompt.trim();
    const issues: string[] = [];
    if (!id) issues.push('videoId: video ID must not be empty');
    if (!text) issues.push('prompt: prompt must not be empty');
    if (issues.length > 0) {
      throw new InvalidSubmissionError(issues);
    }
    return this.client.remixVideo(id, text, signal);
  }

  getStatus(videoId: string, signal?: AbortSignal): Promise<VideoJob> {
    return this.client.getVideo(videoId.trim(), signal);
  }

  list(query: ListQuery, signal?: AbortSignal): Promise<ListPage> {
    return this.client.listVideos(query, signal);
  }

  waitForCompletion(jobId: string, options: WaitOptions = {}): Promise<VideoJob> {
    return this.poller.waitForCompletion(jobId, options);
  }

  /**
   * Stream the artifact of a completed job to `targetPath`
   */
  async download(videoId: string, targetPath: string, signal?: AbortSignal): Promise<void> {
    const content = await this.client.downloadContent(videoId, signal);
    try {
      await writeArtifact(content, targetPath);
    } catch (error) {
      // a stream torn down by the signal surfaces as a write failure
      if (signal?.aborted) {
        throw abortError(signal);
      }
      throw error;
    }
  }

  async prepareDestination(directory: string): Promise<string> {
    const expanded = expandPath(directory);
    try {
      await mkdir(expanded, { recursive: true });
    } catch (error) {
      throw new FileOperationError('create directory', expanded, error);
    }
    return expanded;
  }

  /**
   * Submit a new job and follow it through to a saved file
   */
  generate(request: SubmissionRequest, options: LifecycleOptions): Promise<LifecycleResult> {
    return this.runLifecycle((signal) => this.submit(request, signal), options);
  }

  /**
   * Remix an existing video and follow it through to a saved file
   */
  generateRemix(videoId: string, prompt: string, options: LifecycleOptions): Promise<LifecycleResult> {
    return this.runLifecycle((signal) => this.remix(videoId, prompt, signal), options);
  }

  private async runLifecycle(
    start: (signal: AbortSignal) => Promise<VideoJob>,
    options: LifecycleOptions
  ): Promise<LifecycleResult> {
    const deadline = createDeadline(options.timeoutMs, options.signal);
    const { signal } = deadline;

    try {
      const queued = await start(signal);
      this.logger.debug(`Job ${queued.id} queued (${queued.status})`);
      options.onQueued?.(queued);

      const outputPath = artifactPath(options.destinationDir, queued.id);
      const job = await this.poller.waitForCompletion(queued.id, { signal, onUpdate: options.onUpdate });

      options.onDownloading?.(job);
      await this.download(job.id, outputPath, signal);
      return { job, outputPath };
    } finally {
      deadline.dispose();
    }
  }
}

import { Readable } from 'stream';
import { toJobPhase, type ListPage, type ListQuery, type VideoJob } from '../../src/core/entities/Job.js';
import type { CreateVideoInput, IVideoClient } from '../../src/core/interfaces/IVideoClient.js';
import { normalizeProgress } from '../../src/core/progress.js';

export function makeJob(id: string, status: string, rawProgress = 0, extra: Partial<VideoJob> = {}): VideoJob {
  return {
    id,
    status,
    phase: toJobPhase(status),
    progress: normalizeProgress(rawProgress),
    rawProgress,
    ...extra,
  };
}

/**
 * In-memory video API: status reads replay a script, the last entry repeats
 */
export class FakeVideoClient implements IVideoClient {
  created: CreateVideoInput[] = [];
  remixed: Array<{ videoId: string; prompt: string }> = [];
  listQueries: ListQuery[] = [];
  downloads: string[] = [];
  uploadedBytes: Buffer | undefined;

  statusScript: VideoJob[] = [];
  content = Buffer.from('fake-mp4-bytes');
  page: ListPage = { jobs: [], hasMore: false };
  failWith: Partial<Record<keyof IVideoClient, Error>> = {};

  constructor(private jobId = 'video_fake') {}

  async createVideo(input: CreateVideoInput): Promise<VideoJob> {
    this.fail('createVideo');
    this.created.push(input);
    if (input.attachment) {
      const chunks: Buffer[] = [];
      for await (const chunk of input.attachment.source.stream()) {
        chunks.push(Buffer.from(chunk));
      }
      this.uploadedBytes = Buffer.concat(chunks);
    }
    return makeJob(this.jobId, 'queued');
  }

  async remixVideo(videoId: string, prompt: string): Promise<VideoJob> {
    this.fail('remixVideo');
    this.remixed.push({ videoId, prompt });
    return makeJob(this.jobId, 'queued', 0, { remixedFromVideoId: videoId });
  }

  async getVideo(videoId: string): Promise<VideoJob> {
    this.fail('getVideo');
    const next = this.statusScript.length > 1 ? this.statusScript.shift() : this.statusScript[0];
    return next ?? makeJob(videoId, 'completed', 1);
  }

  async downloadContent(videoId: string): Promise<Readable> {
    this.fail('downloadContent');
    this.downloads.push(videoId);
    return Readable.from([this.content]);
  }

  async listVideos(query: ListQuery): Promise<ListPage> {
    this.fail('listVideos');
    this.listQueries.push(query);
    return this.page;
  }

  private fail(operation: keyof IVideoClient): void {
    const error = this.failWith[operation];
    if (error) throw error;
  }
}

/**
 * Sleep that resolves at once, for pollers under test
 */
export async function instantSleep(): Promise<void> {}

import type { Readable } from 'stream';
import type { ListPage, ListQuery, SubmissionRequest, VideoJob } from '../entities/Job.js';
import type { IAttachmentSource } from './IAttachmentSource.js';

export interface ClassifiedAttachment {
  source: IAttachmentSource;
  contentType: string;
}

export interface CreateVideoInput {
  request: SubmissionRequest;
  attachment?: ClassifiedAttachment;
}

/**
 * Interface for the remote video job API
 */
export interface IVideoClient {
  /**
   * Submit a new generation job
   */
  createVideo(input: CreateVideoInput, signal?: AbortSignal): Promise<VideoJob>;

  /**
   * Submit a remix of an existing video
   */
  remixVideo(videoId: string, prompt: string, signal?: AbortSignal): Promise<VideoJob>;

  /**
   * Fetch the current state of a job
   */
  getVideo(videoId: string, signal?: AbortSignal): Promise<VideoJob>;

  /**
   * Open the rendered artifact as a byte stream
   */
  downloadContent(videoId: string, signal?: AbortSignal): Promise<Readable>;

  /**
   * List jobs, newest first unless `order` says otherwise
   */
  listVideos(query: ListQuery, signal?: AbortSignal): Promise<ListPage>;
}

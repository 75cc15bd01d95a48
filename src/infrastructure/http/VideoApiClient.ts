import fetch, { type RequestInit, type Response } from 'node-fetch';
import { Readable } from 'stream';
import type { z } from 'zod';
import type { ListPage, ListQuery, VideoJob } from '../../core/entities/Job.js';
import { CancelledError, MalformedResponseError, RemoteApiError } from '../../core/errors.js';
import type { CreateVideoInput, IVideoClient } from '../../core/interfaces/IVideoClient.js';
import { DEFAULT_PROGRESS_BOUNDARY, type ProgressBoundaryPolicy } from '../../core/progress.js';
import { abortError } from '../../utils/abort.js';
import { createLogger } from '../../utils/logger.js';
import { encodeCreateRequest, encodeRemixRequest, type EncodedBody } from './SubmissionEncoder.js';
import {
  ApiErrorPayloadSchema,
  VideoJobPayloadSchema,
  VideoListPayloadSchema,
  toListPage,
  toVideoJob,
} from './payloads.js';

export const VIDEOS_PATH = '/v1/videos';
export const MAX_LIST_LIMIT = 100;

export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export interface VideoApiClientOptions {
  apiKey: string;
  baseUrl: string;
  organization?: string;
  project?: string;
  progressBoundary?: ProgressBoundaryPolicy;
}

/**
 * Rethrow a failed fetch or body read as the cancellation it was, if it was one
 */
function throwIfAborted(error: unknown, operation: string, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortError(signal);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    throw new CancelledError(`${operation} aborted`);
  }
}

/**
 * Decode a non-2xx body: the structured error message when there is one,
 * else the trimmed body text, else "unknown error".
 * An abort while the body is read surfaces as TimeoutError or CancelledError.
 */
export async function readApiError(response: Response, signal?: AbortSignal): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throwIfAborted(error, 'read error body', signal);
    return error instanceof Error ? error.message : String(error);
  }

  const trimmed = text.trim();
  if (trimmed === '') {
    return 'unknown error';
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
  const structured = ApiErrorPayloadSchema.safeParse(parsed);
  return structured.success ? structured.data.error.message : trimmed;
}

/**
 * Client for the remote video job API
 */
export class VideoApiClient implements IVideoClient {
  private baseUrl: string;
  private boundary: ProgressBoundaryPolicy;
  private logger = createLogger('VideoApiClient');

  constructor(
    private options: VideoApiClientOptions,
    private fetchImpl: FetchFunction = fetch
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.boundary = options.progressBoundary ?? DEFAULT_PROGRESS_BOUNDARY;
  }

  async createVideo(input: CreateVideoInput, signal?: AbortSignal): Promise<VideoJob> {
    const encoded = await encodeCreateRequest(input.request, input.attachment);
    const response = await this.send('create video', `${this.baseUrl}${VIDEOS_PATH}`, 'POST', encoded, 'application/json', signal);
    return this.decodeCreatedJob(response, 'create video', signal);
  }

  async remixVideo(videoId: string, prompt: string, signal?: AbortSignal): Promise<VideoJob> {
    const url = `${this.videoUrl(videoId)}/remix`;
    const response = await this.send('remix video', url, 'POST', encodeRemixRequest(prompt), 'application/json', signal);
    return this.decodeCreatedJob(response, 'remix video', signal);
  }

  async getVideo(videoId: string, signal?: AbortSignal): Promise<VideoJob> {
    const response = await this.send('get video', this.videoUrl(videoId), 'GET', undefined, 'application/json', signal);
    const payload = await this.decode(response, VideoJobPayloadSchema, 'get video', signal);
    const job = toVideoJob(payload, this.boundary);
    return job.id ? job : { ...job, id: videoId };
  }

  async downloadContent(videoId: string, signal?: AbortSignal): Promise<Readable> {
    const url = `${this.videoUrl(videoId)}/content`;
    const response = await this.send('download video', url, 'GET', undefined, 'video/mp4', signal);
    const body = response.body;
    return body instanceof Readable ? body : Readable.from(body);
  }

  async listVideos(query: ListQuery, signal?: AbortSignal): Promise<ListPage> {
    const params = new URLSearchParams();
    if (query.limit !== undefined && Number.isInteger(query.limit) && query.limit > 0) {
      params.set('limit', String(Math.min(query.limit, MAX_LIST_LIMIT)));
    }
    if (query.after) {
      params.set('after', query.after);
    }
    if (query.order) {
      params.set('order', query.order);
    }

    const search = params.toString();
    const url = `${this.baseUrl}${VIDEOS_PATH}${search ? `?${search}` : ''}`;
    const response = await this.send('list videos', url, 'GET', undefined, 'application/json', signal);
    const payload = await this.decode(response, VideoListPayloadSchema, 'list videos', signal);
    return toListPage(payload, this.boundary);
  }

  private videoUrl(videoId: string): string {
    return `${this.baseUrl}${VIDEOS_PATH}/${encodeURIComponent(videoId)}`;
  }

  private headers(accept: string, extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiKey}`,
      Accept: accept,
      ...extra,
    };
    if (this.options.organization) {
      headers['OpenAI-Organization'] = this.options.organization;
    }
    if (this.options.project) {
      headers['OpenAI-Project'] = this.options.project;
    }
    return headers;
  }

  private async send(
    operation: string,
    url: string,
    method: 'GET' | 'POST',
    encoded: EncodedBody | undefined,
    accept: string,
    signal?: AbortSignal
  ): Promise<Response> {
    this.logger.debug(`${operation}: ${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers(accept, encoded?.headers),
        body: encoded?.body,
        signal,
      });
    } catch (error) {
      throwIfAborted(error, operation, signal);
      throw error;
    }

    if (!response.ok) {
      const message = await readApiError(response, signal);
      this.logger.debug(`${operation} failed with ${response.status}: ${message}`);
      throw new RemoteApiError(response.status, message);
    }

    return response;
  }

  private async decode<T extends z.ZodTypeAny>(
    response: Response,
    schema: T,
    operation: string,
    signal?: AbortSignal
  ): Promise<z.infer<T>> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throwIfAborted(error, operation, signal);
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new MalformedResponseError(`${operation}: response is not valid JSON`, { cause: error });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue?.path.join('.') || 'body';
      throw new MalformedResponseError(`${operation}: unexpected ${where} in response`);
    }
    return result.data;
  }

  private async decodeCreatedJob(response: Response, operation: string, signal?: AbortSignal): Promise<VideoJob> {
    const payload = await this.decode(response, VideoJobPayloadSchema, operation, signal);
    if (!payload.id) {
      throw new MalformedResponseError('response missing job ID');
    }
    return toVideoJob(payload, this.boundary);
  }
}

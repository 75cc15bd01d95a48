import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { VideoJobService } from '../../application/services/VideoJobService.js';
import type { ListPage, VideoJob } from '../../core/entities/Job.js';
import { MODEL_OPTIONS } from '../../core/entities/Model.js';
import { describeError } from '../../core/errors.js';
import { createDeadline } from '../../utils/abort.js';
import { artifactPath } from '../../utils/paths.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface VideoToolOptions {
  defaultDirectory: string;
  requestTimeoutMs: number;
}

// Tool argument shapes, shared by registration and the handlers' types
export const createVideoShape = {
  prompt: z.string().min(1).describe('Text description of the video to generate'),
  model: z
    .string()
    .optional()
    .describe(`Model name (${MODEL_OPTIONS.map((option) => option.name).join(', ')})`),
  seconds: z.number().int().optional().describe('Clip duration in seconds: 4, 8 or 12'),
  size: z.string().optional().describe('Output resolution as WIDTHxHEIGHT, e.g. 1280x720'),
  input_reference_path: z
    .string()
    .optional()
    .describe('Optional local path of a reference image or video (jpeg, png, webp, mp4)'),
};

export const remixVideoShape = {
  video_id: z.string().min(1).describe('ID of the completed video to remix'),
  prompt: z.string().min(1).describe('Description of the change to apply'),
};

export const videoIdShape = {
  video_id: z.string().min(1).describe('The ID of the video job'),
};

export const listVideosShape = {
  limit: z.number().int().min(1).max(100).optional().describe('Number of videos to return (1-100)'),
  after: z.string().optional().describe('Pagination cursor from a previous call'),
  order: z.enum(['asc', 'desc']).optional().describe('Sort order by creation time'),
};

export const downloadVideoShape = {
  ...videoIdShape,
  destination_dir: z.string().optional().describe('Directory to save the video in (defaults to the configured output directory)'),
};

type Args<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape>>;

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function failure(action: string, error: unknown): ToolResult {
  return { isError: true, content: [{ type: 'text', text: `Error ${action}: ${describeError(error)}` }] };
}

export function formatJob(job: VideoJob): string {
  const lines = [
    `# Video job ${job.id}`,
    '',
    `- **Status**: ${job.status}`,
    `- **Progress**: ${job.progress.toFixed(0)}%`,
  ];
  if (job.model) lines.push(`- **Model**: ${job.model}`);
  if (job.seconds !== undefined) lines.push(`- **Duration**: ${job.seconds}s`);
  if (job.size) lines.push(`- **Size**: ${job.size}`);
  if (job.createdAt) lines.push(`- **Created**: ${job.createdAt.toISOString()}`);
  if (job.completedAt) lines.push(`- **Completed**: ${job.completedAt.toISOString()}`);
  if (job.remixedFromVideoId) lines.push(`- **Remixed from**: ${job.remixedFromVideoId}`);
  if (job.error?.message) lines.push(`- **Error**: ${job.error.message}`);
  return lines.join('\n');
}

export function formatPage(page: ListPage): string {
  if (page.jobs.length === 0) {
    return 'No videos found';
  }
  const rows = page.jobs.map(
    (job) => `- \`${job.id}\` ${job.status} (${job.progress.toFixed(0)}%)${job.model ? ` ${job.model}` : ''}`
  );
  const more = page.hasMore || page.nextCursor ? `\n\nMore videos available. Next cursor: ${page.nextCursor ?? '(none)'}` : '';
  return `# Videos (${page.jobs.length})\n\n${rows.join('\n')}${more}`;
}

/**
 * Tool handlers over the video job service. None of them waits on the poll loop.
 */
export function createVideoToolHandlers(service: VideoJobService, options: VideoToolOptions) {
  const withDeadline = async <T>(signal: AbortSignal | undefined, run: (signal: AbortSignal) => Promise<T>) => {
    const deadline = createDeadline(options.requestTimeoutMs, signal);
    try {
      return await run(deadline.signal);
    } finally {
      deadline.dispose();
    }
  };

  return {
    async createVideo(args: Args<typeof createVideoShape>, signal?: AbortSignal): Promise<ToolResult> {
      try {
        const job = await withDeadline(signal, (s) =>
          service.submit(
            {
              prompt: args.prompt,
              model: args.model,
              seconds: args.seconds,
              size: args.size,
              attachmentPath: args.input_reference_path,
            },
            s
          )
        );
        return text(`${formatJob(job)}\n\nUse get-video-status to follow progress, then download-video.`);
      } catch (error) {
        return failure('creating video', error);
      }
    },

    async remixVideo(args: Args<typeof remixVideoShape>, signal?: AbortSignal): Promise<ToolResult> {
      try {
        const job = await withDeadline(signal, (s) => service.remix(args.video_id, args.prompt, s));
        return text(formatJob(job));
      } catch (error) {
        return failure('remixing video', error);
      }
    },

    async getVideoStatus(args: Args<typeof videoIdShape>, signal?: AbortSignal): Promise<ToolResult> {
      try {
        const job = await withDeadline(signal, (s) => service.getStatus(args.video_id, s));
        return text(formatJob(job));
      } catch (error) {
        return failure('fetching video status', error);
      }
    },

    async listVideos(args: Args<typeof listVideosShape>, signal?: AbortSignal): Promise<ToolResult> {
      try {
        const page = await withDeadline(signal, (s) =>
          service.list({ limit: args.limit, after: args.after, order: args.order }, s)
        );
        return text(formatPage(page));
      } catch (error) {
        return failure('listing videos', error);
      }
    },

    async downloadVideo(args: Args<typeof downloadVideoShape>, signal?: AbortSignal): Promise<ToolResult> {
      try {
        const outputPath = await withDeadline(signal, async (s) => {
          const job = await service.getStatus(args.video_id, s);
          if (job.phase !== 'completed') {
            throw new Error(`video ${job.id} is not ready (status: ${job.status}, ${job.progress.toFixed(0)}%)`);
          }
          const directory = await service.prepareDestination(args.destination_dir || options.defaultDirectory);
          const target = artifactPath(directory, job.id);
          await service.download(job.id, target, s);
          return target;
        });
        return text(`Video saved to ${outputPath}`);
      } catch (error) {
        return failure('downloading video', error);
      }
    },
  };
}

export type VideoToolHandlers = ReturnType<typeof createVideoToolHandlers>;

/**
 * Register all video job tools
 */
export function registerVideoJobTools(server: McpServer, handlers: VideoToolHandlers) {
  server.tool(
    'create-video',
    'Submit a new video generation job and return its ID without waiting for it to finish',
    createVideoShape,
    async (args, extra) => handlers.createVideo(args, extra.signal)
  );

  server.tool(
    'remix-video',
    'Submit a remix of an existing video and return the new job ID',
    remixVideoShape,
    async (args, extra) => handlers.remixVideo(args, extra.signal)
  );

  server.tool(
    'get-video-status',
    'Get the status and progress of a video job',
    videoIdShape,
    async (args, extra) => handlers.getVideoStatus(args, extra.signal)
  );

  server.tool(
    'list-videos',
    'List recent video jobs with pagination',
    listVideosShape,
    async (args, extra) => handlers.listVideos(args, extra.signal)
  );

  server.tool(
    'download-video',
    'Download a completed video to a local directory',
    downloadVideoShape,
    async (args, extra) => handlers.downloadVideo(args, extra.signal)
  );
}

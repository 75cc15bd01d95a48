/**
 * Tests for the MCP tool handlers
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { JobPoller } from '../src/application/services/JobPoller.js';
import { VideoJobService } from '../src/application/services/VideoJobService.js';
import { RemoteApiError } from '../src/core/errors.js';
import { createVideoToolHandlers, formatJob, formatPage } from '../src/presentation/tools/VideoJobTools.js';
import { FakeVideoClient, instantSleep, makeJob } from './helpers/fakeVideoClient.js';

describe('Video job tools', () => {
  let dir: string;
  let client: FakeVideoClient;
  let handlers: ReturnType<typeof createVideoToolHandlers>;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'tools-test-'));
    client = new FakeVideoClient('video_tool');
    const service = new VideoJobService(
      client,
      new JobPoller(client, { intervalMs: 1, timeoutMs: 1_000, sleep: instantSleep })
    );
    handlers = createVideoToolHandlers(service, { defaultDirectory: dir, requestTimeoutMs: 5_000 });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should format a job as markdown', () => {
    const text = formatJob(
      makeJob('video_1', 'in_progress', 0.42, { model: 'sora-2', seconds: 8, size: '1280x720' })
    );
    expect(text).toBe(
      [
        '# Video job video_1',
        '',
        '- **Status**: in_progress',
        '- **Progress**: 42%',
        '- **Model**: sora-2',
        '- **Duration**: 8s',
        '- **Size**: 1280x720',
      ].join('\n')
    );
  });

  it('should create a video without waiting for it', async () => {
    const getVideo = jest.spyOn(client, 'getVideo');

    const result = await handlers.createVideo({ prompt: 'a paper boat', seconds: 4 });

    expect(result.isError).toBeUndefined();
    expect(result.content[0].text).toContain('# Video job video_tool');
    expect(client.created[0].request).toMatchObject({ prompt: 'a paper boat', seconds: 4 });
    expect(getVideo).not.toHaveBeenCalled();
  });

  it('should report validation errors as tool errors', async () => {
    const result = await handlers.createVideo({ prompt: 'p', seconds: 5 });

    expect(result).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Error creating video: invalid submission: seconds: seconds must be one of 4, 8, 12' }],
    });
  });

  it('should describe remote errors with their status', async () => {
    client.failWith.getVideo = new RemoteApiError(404, 'Video not found');

    const result = await handlers.getVideoStatus({ video_id: 'video_x' });

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('Error fetching video status: API error (404): Video not found');
  });

  it('should remix a video', async () => {
    const result = await handlers.remixVideo({ video_id: 'video_src', prompt: 'at dusk' });

    expect(client.remixed).toEqual([{ videoId: 'video_src', prompt: 'at dusk' }]);
    expect(result.content[0].text).toContain('- **Remixed from**: video_src');
  });

  it('should list videos with the cursor', async () => {
    client.page = { jobs: [makeJob('video_a', 'completed', 1, { model: 'sora-2' })], hasMore: true, nextCursor: 'video_a' };

    const result = await handlers.listVideos({ limit: 5, order: 'asc' });

    expect(client.listQueries).toEqual([{ limit: 5, after: undefined, order: 'asc' }]);
    expect(result.content[0].text).toBe(formatPage(client.page));
    expect(result.content[0].text).toBe(
      '# Videos (1)\n\n- `video_a` completed (100%) sora-2\n\nMore videos available. Next cursor: video_a'
    );
  });

  it('should download only completed videos', async () => {
    client.statusScript = [makeJob('video_tool', 'in_progress', 0.3)];

    const pending = await handlers.downloadVideo({ video_id: 'video_tool' });

    expect(pending.isError).toBe(true);
    expect(pending.content[0].text).toBe(
      'Error downloading video: video video_tool is not ready (status: in_progress, 30%)'
    );
    expect(client.downloads).toEqual([]);
  });

  it('should save a completed video to the default directory', async () => {
    client.statusScript = [makeJob('video_tool', 'completed', 1)];

    const result = await handlers.downloadVideo({ video_id: 'video_tool' });

    const target = path.join(dir, 'video_tool.mp4');
    expect(result.content[0].text).toBe(`Video saved to ${target}`);
    expect(await readFile(target, 'utf8')).toBe('fake-mp4-bytes');
  });
});

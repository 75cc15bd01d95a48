/**
 * Tests for the video job lifecycle
 */

import { mkdtemp, readFile, readdir, rm, stat, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { JobPoller, type StatusUpdate } from '../src/application/services/JobPoller.js';
import { VideoJobService, validateSubmission } from '../src/application/services/VideoJobService.js';
import { CancelledError, InvalidSubmissionError, JobFailedError, RemoteApiError } from '../src/core/errors.js';
import { FakeVideoClient, instantSleep, makeJob } from './helpers/fakeVideoClient.js';

const PNG = Buffer.concat([Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]), Buffer.alloc(2048, 1)]);

describe('VideoJobService', () => {
  let dir: string;
  let client: FakeVideoClient;
  let service: VideoJobService;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'service-test-'));
    client = new FakeVideoClient();
    const poller = new JobPoller(client, { intervalMs: 1, timeoutMs: 60_000, sleep: instantSleep });
    service = new VideoJobService(client, poller);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('validateSubmission', () => {
    it('should trim values and drop empty optional fields', () => {
      expect(validateSubmission({ prompt: '  a fox  ', model: ' ', size: '', seconds: 8 })).toEqual({
        prompt: 'a fox',
        model: undefined,
        seconds: 8,
        size: undefined,
        attachmentPath: undefined,
      });
    });

    it('should expand ~ in the attachment path', () => {
      expect(validateSubmission({ prompt: 'p', attachmentPath: '~/ref.png' }).attachmentPath).toBe(
        path.join(os.homedir(), 'ref.png')
      );
    });

    it('should report every problem at once', () => {
      const error = (() => {
        try {
          validateSubmission({ prompt: '   ', seconds: 5, size: 'wide' });
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(InvalidSubmissionError);
      if (!(error instanceof InvalidSubmissionError)) return;
      expect(error.issues).toEqual([
        'prompt: prompt must not be empty',
        'seconds: seconds must be one of 4, 8, 12',
        'size: size must look like WIDTHxHEIGHT',
      ]);
    });
  });

  describe('submit', () => {
    it('should not call the API for an invalid request', async () => {
      await expect(service.submit({ prompt: '' })).rejects.toBeInstanceOf(InvalidSubmissionError);
      expect(client.created).toHaveLength(0);
    });

    it('should upload the whole reference file after classifying it', async () => {
      const reference = path.join(dir, 'reference.bin');
      await writeFile(reference, PNG);

      const job = await service.submit({ prompt: 'a fox', attachmentPath: reference });

      expect(job.id).toBe('video_fake');
      expect(client.created[0].attachment?.contentType).toBe('image/png');
      expect(client.uploadedBytes?.equals(PNG)).toBe(true);
    });

    it('should reject an unsupported reference before submitting', async () => {
      const reference = path.join(dir, 'notes.txt');
      await writeFile(reference, 'hello');

      await expect(service.submit({ prompt: 'p', attachmentPath: reference })).rejects.toThrow(
        'unsupported reference file type'
      );
      expect(client.created).toHaveLength(0);
    });
  });

  describe('remix', () => {
    it('should trim the ID and prompt', async () => {
      await service.remix('  video_src ', ' add rain ');
      expect(client.remixed).toEqual([{ videoId: 'video_src', prompt: 'add rain' }]);
    });

    it('should reject a blank ID or prompt', async () => {
      await expect(service.remix(' ', '')).rejects.toThrow(
        'invalid submission: videoId: video ID must not be empty; prompt: prompt must not be empty'
      );
      expect(client.remixed).toHaveLength(0);
    });
  });

  describe('generate', () => {
    it('should submit, poll and save the video under the job ID', async () => {
      client.statusScript = [
        makeJob('video_fake', 'queued', 0),
        makeJob('video_fake', 'in_progress', 0.5),
        makeJob('video_fake', 'completed', 1),
      ];
      const queued: string[] = [];
      const updates: StatusUpdate[] = [];
      const onDownloading = jest.fn();

      const result = await service.generate(
        { prompt: 'a fox', seconds: 4 },
        {
          destinationDir: dir,
          timeoutMs: 60_000,
          onQueued: (job) => queued.push(job.id),
          onUpdate: (update) => updates.push(update),
          onDownloading,
        }
      );

      expect(result.outputPath).toBe(path.join(dir, 'video_fake.mp4'));
      expect(result.job.phase).toBe('completed');
      expect(queued).toEqual(['video_fake']);
      expect(updates.map((u) => u.job.progress)).toEqual([0, 50, 100]);
      expect(onDownloading).toHaveBeenCalledTimes(1);
      expect(await readFile(result.outputPath, 'utf8')).toBe('fake-mp4-bytes');
    });

    it('should not download a failed job', async () => {
      client.statusScript = [makeJob('video_fake', 'failed', 0, { error: { message: 'content policy' } })];

      await expect(
        service.generate({ prompt: 'a fox' }, { destinationDir: dir, timeoutMs: 60_000 })
      ).rejects.toBeInstanceOf(JobFailedError);
      expect(client.downloads).toEqual([]);
      expect(await readdir(dir)).toEqual([]);
    });

    it('should surface a create failure without polling', async () => {
      client.failWith.createVideo = new RemoteApiError(400, 'Invalid model');
      const getVideo = jest.spyOn(client, 'getVideo');

      await expect(service.generate({ prompt: 'a fox' }, { destinationDir: dir, timeoutMs: 60_000 })).rejects.toThrow(
        'Invalid model'
      );
      expect(getVideo).not.toHaveBeenCalled();
    });

    it('should stop when the caller cancels', async () => {
      const poller = new JobPoller(client, { intervalMs: 1, timeoutMs: 60_000 });
      const cancellable = new VideoJobService(client, poller);
      const controller = new AbortController();
      client.statusScript = [makeJob('video_fake', 'queued', 0)];

      const pending = cancellable.generateRemix('video_src', 'night', {
        destinationDir: dir,
        timeoutMs: 60_000,
        signal: controller.signal,
        onQueued: () => controller.abort(new CancelledError('cancelled by user')),
      });

      await expect(pending).rejects.toThrow('cancelled by user');
      expect(client.downloads).toEqual([]);
    });
  });

  describe('prepareDestination', () => {
    it('should create missing directories', async () => {
      const nested = path.join(dir, 'a', 'b');
      await expect(service.prepareDestination(nested)).resolves.toBe(nested);
      expect((await stat(nested)).isDirectory()).toBe(true);
    });

    it('should fail when a file is in the way', async () => {
      const blocker = path.join(dir, 'file');
      await writeFile(blocker, 'x');
      await expect(service.prepareDestination(path.join(blocker, 'sub'))).rejects.toThrow(
        `create directory ${path.join(blocker, 'sub')}`
      );
    });
  });
});

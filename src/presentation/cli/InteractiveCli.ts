import type { LifecycleOptions, LifecycleResult, VideoJobService } from '../../application/services/VideoJobService.js';
import type { StatusUpdate } from '../../application/services/JobPoller.js';
import type { Config } from '../../config.js';
import type { ListPage, SortOrder, SubmissionRequest } from '../../core/entities/Job.js';
import {
  ALLOWED_DURATIONS,
  DEFAULT_DURATION_SECONDS,
  MODEL_OPTIONS,
  estimateCost,
  type ModelOption,
  type ResolutionOption,
} from '../../core/entities/Model.js';
import {
  CancelledError,
  FileOperationError,
  UnsupportedAttachmentTypeError,
  describeError,
} from '../../core/errors.js';
import { createDeadline } from '../../utils/abort.js';
import { createLogger } from '../../utils/logger.js';
import { expandPath } from '../../utils/paths.js';
import { Prompts, type LineReader, type Printer } from './prompts.js';

type JobAction = 'create' | 'remix' | 'list';
type FlowOutcome = 'continue' | 'done' | 'failed';

const DEFAULT_LIST_LIMIT = 20;
const SEPARATOR = '----------------------------------------';

export function formatStatusLine(update: StatusUpdate): string {
  return `Status: ${update.job.status} (${update.job.progress.toFixed(0)}%)`;
}

/**
 * Menu-driven front end: create, remix or list videos, one job at a time
 */
export class InteractiveCli {
  private prompts: Prompts;
  private activeJob: AbortController | null = null;
  private logger = createLogger('InteractiveCli');
  private flows: Record<JobAction, () => Promise<FlowOutcome>> = {
    create: () => this.runCreateFlow(),
    remix: () => this.runRemixFlow(),
    list: () => this.runListFlow(),
  };

  constructor(
    private service: VideoJobService,
    private config: Config,
    reader: LineReader,
    private print: Printer = (line = '') => console.log(line),
    private cwd: () => string = () => process.cwd()
  ) {
    this.prompts = new Prompts(reader, print);
  }

  /**
   * Run the menu loop; resolves with the process exit code
   */
  async run(): Promise<number> {
    this.print('Video Generator');
    this.print('========================');

    for (;;) {
      const action = await this.selectAction();
      const outcome = await this.flows[action]();

      if (outcome === 'failed') return 1;
      if (outcome === 'done') return 0;
      this.print();
    }
  }

  /**
   * Cancel the job in flight, if any. Returns false when there was none.
   */
  cancel(): boolean {
    if (!this.activeJob) return false;
    this.activeJob.abort(new CancelledError('cancelled by user'));
    return true;
  }

  private selectAction(): Promise<JobAction> {
    return this.prompts.choose<JobAction>('Select action:', [
      { label: 'Create a new video', value: 'create', aliases: ['create', 'new', 'c'] },
      { label: 'Remix an existing video', value: 'remix', aliases: ['remix', 'r'] },
      { label: 'List recent videos', value: 'list', aliases: ['list', 'l'] },
    ]);
  }

  private async runCreateFlow(): Promise<FlowOutcome> {
    const model = await this.promptModel();
    const prompt = await this.prompts.required('Prompt');
    const seconds = await this.promptDuration();
    const resolution = await this.promptResolution(model.resolutions);
    const attachmentPath = await this.promptReference();
    const destination = await this.promptDestination();
    if (destination === null) return 'failed';

    this.print();
    this.print('Configuration summary:');
    this.print('  Action: Create new video');
    this.print(`  Model: ${model.name}`);
    this.print(`  Duration: ${seconds} seconds`);
    this.print(`  Resolution: ${resolution.label}`);
    if (attachmentPath) {
      this.print(`  Reference image: ${attachmentPath}`);
    }
    this.print(`  Destination: ${destination} (filename will match job ID)`);
    this.print(
      `  Estimated cost: $${estimateCost(model, seconds).toFixed(2)} (${seconds}s @ $${model.ratePerSecond.toFixed(2)}/s)`
    );
    this.print();

    if (!(await this.prompts.confirm('Proceed with generation?'))) {
      this.print('Aborted by user.');
      return 'done';
    }

    const request: SubmissionRequest = {
      prompt,
      model: model.name,
      seconds,
      size: resolution.value,
      attachmentPath,
    };

    this.print();
    this.print('Submitting generation request...');
    const saved = await this.followJob(
      destination,
      (options) => this.service.generate(request, options),
      {
        queued: 'Job queued with ID',
        submit: 'failed to create video job',
        poll: 'generation failed',
        download: 'failed to download video',
        finished: 'Job completed. Downloading video...',
      }
    );
    if (!saved) return 'failed';

    this.print(`Video saved to ${saved}`);
    return this.askToContinue('Generate another video?');
  }

  private async runRemixFlow(): Promise<FlowOutcome> {
    const videoId = await this.prompts.required('Existing video ID to remix');
    const prompt = await this.prompts.required('Remix prompt (describe the change)');
    const destination = await this.promptDestination();
    if (destination === null) return 'failed';

    this.print();
    this.print('Configuration summary:');
    this.print('  Action: Remix existing video');
    this.print(`  Source video ID: ${videoId}`);
    this.print(`  Remix prompt: ${prompt}`);
    this.print(`  Destination: ${destination} (filename will match job ID)`);
    this.print();

    if (!(await this.prompts.confirm('Proceed with remix generation?'))) {
      this.print('Aborted by user.');
      return 'done';
    }

    this.print();
    this.print('Submitting remix request...');
    const saved = await this.followJob(
      destination,
      (options) => this.service.generateRemix(videoId, prompt, options),
      {
        queued: 'Remix job queued with ID',
        submit: 'failed to create remix job',
        poll: 'remix failed',
        download: 'failed to download remix video',
        finished: 'Remix completed. Downloading video...',
      }
    );
    if (!saved) return 'failed';

    this.print(`Remixed video saved to ${saved}`);
    return this.askToContinue('Perform another action?');
  }

  private async runListFlow(): Promise<FlowOutcome> {
    let limit = DEFAULT_LIST_LIMIT;
    for (;;) {
      const input = await this.prompts.optional(`Number of videos to list (1-100, leave blank for ${DEFAULT_LIST_LIMIT})`);
      if (input === '') break;
      const value = Number(input);
      if (Number.isInteger(value) && value > 0 && value <= 100) {
        limit = value;
        break;
      }
      this.print(`Please enter a whole number between 1 and 100, or leave blank for ${DEFAULT_LIST_LIMIT}.`);
    }

    let order: SortOrder = 'desc';
    for (;;) {
      const input = (await this.prompts.optional('Sort order (asc/desc, leave blank for desc)')).toLowerCase();
      if (input === '') break;
      if (input === 'asc' || input === 'desc') {
        order = input;
        break;
      }
      this.print("Please enter 'asc', 'desc', or leave blank.");
    }

    this.print();
    this.print('Fetching videos...');
    const deadline = createDeadline(this.config.listTimeoutMs);
    let page: ListPage;
    try {
      page = await this.service.list({ limit, order }, deadline.signal);
    } catch (error) {
      this.print(`ERROR: failed to list videos: ${describeError(error)}`);
      return this.askToContinue('Try another action?');
    } finally {
      deadline.dispose();
    }

    this.printPage(page);
    return this.askToContinue('Perform another action?');
  }

  private printPage(page: ListPage): void {
    if (page.jobs.length === 0) {
      this.print('No videos found.');
      return;
    }

    this.print();
    this.print(`Showing ${page.jobs.length} video(s):`);
    this.print(SEPARATOR);
    for (const job of page.jobs) {
      this.print(`ID: ${job.id}`);
      this.print(`  Status: ${job.status}`);
      if (job.model) this.print(`  Model: ${job.model}`);
      if (job.seconds !== undefined) this.print(`  Duration: ${job.seconds} seconds`);
      if (job.size) this.print(`  Size: ${job.size}`);
      this.print(`  Created: ${job.createdAt ? job.createdAt.toISOString() : '(unknown)'}`);
      if (job.progress > 0 && job.progress <= 100) {
        this.print(`  Progress: ${job.progress.toFixed(0)}%`);
      }
      this.print(SEPARATOR);
    }

    if (page.hasMore || page.nextCursor) {
      this.print("More videos available. Use the 'after' cursor to continue pagination.");
      if (page.nextCursor) {
        this.print(`Next cursor: ${page.nextCursor}`);
      }
    }
  }

  /**
   * Run one lifecycle and report each stage. Returns the saved path, or null
   * after printing the error of the stage that failed.
   */
  private async followJob(
    destinationDir: string,
    run: (options: LifecycleOptions) => Promise<LifecycleResult>,
    messages: { queued: string; submit: string; poll: string; download: string; finished: string }
  ): Promise<string | null> {
    let stage: 'submit' | 'poll' | 'download' = 'submit';
    this.activeJob = new AbortController();

    try {
      const { outputPath } = await run({
        destinationDir,
        timeoutMs: this.config.polling.timeoutMs,
        signal: this.activeJob.signal,
        onQueued: (job) => {
          stage = 'poll';
          this.print(`${messages.queued}: ${job.id}`);
        },
        onUpdate: (update) => this.print(formatStatusLine(update)),
        onDownloading: () => {
          stage = 'download';
          this.print(messages.finished);
        },
      });
      return outputPath;
    } catch (error) {
      this.logger.debug(`Job failed during ${stage}: ${error instanceof Error ? error.name : 'unknown'}`);
      this.print(`ERROR: ${messages[stage]}: ${describeError(error)}`);
      return null;
    } finally {
      this.activeJob = null;
    }
  }

  private promptModel(): Promise<ModelOption> {
    return this.prompts.choose(
      'Select model:',
      MODEL_OPTIONS.map((option) => ({
        label: `${option.name} ($${option.ratePerSecond.toFixed(2)} per second)`,
        value: option,
        aliases: [option.name],
      }))
    );
  }

  private promptDuration(): Promise<number> {
    const defaultIndex = Math.max(0, ALLOWED_DURATIONS.findIndex((seconds) => seconds === DEFAULT_DURATION_SECONDS));
    return this.prompts.choose(
      'Select clip duration:',
      ALLOWED_DURATIONS.map((seconds) => ({
        label: `${seconds} seconds`,
        value: seconds,
        aliases: [String(seconds)],
      })),
      defaultIndex
    );
  }

  private promptResolution(options: ResolutionOption[]): Promise<ResolutionOption> {
    return this.prompts.choose(
      'Select output resolution:',
      options.map((option) => ({ label: option.label, value: option, aliases: [option.value] }))
    );
  }

  /**
   * Optional reference file; asks again until the file is readable and of a supported type
   */
  private async promptReference(): Promise<string | undefined> {
    for (;;) {
      const input = await this.prompts.optional('Path to reference image (optional)');
      if (input === '') return undefined;

      const filePath = expandPath(input);
      try {
        const contentType = await this.service.inspectAttachment(filePath);
        this.logger.debug(`Reference ${filePath} detected as ${contentType}`);
        return filePath;
      } catch (error) {
        if (error instanceof UnsupportedAttachmentTypeError || error instanceof FileOperationError) {
          this.print(`ERROR: ${describeError(error)}`);
          continue;
        }
        throw error;
      }
    }
  }

  /**
   * Destination directory, created when missing. Null when it cannot be used.
   */
  private async promptDestination(): Promise<string | null> {
    const fallback = this.config.output.directory ?? this.cwd();
    const input = await this.prompts.optional(
      'Destination directory for the video (leave blank to use current directory)'
    );
    try {
      return await this.service.prepareDestination(input || fallback);
    } catch (error) {
      this.print(`ERROR: ${describeError(error)}`);
      return null;
    }
  }

  private async askToContinue(label: string): Promise<FlowOutcome> {
    if (await this.prompts.confirm(label)) return 'continue';
    this.print('Done.');
    return 'done';
  }
}

/**
 * Ask for an API key until one is given; offers to store it in the .env file
 */
export async function promptForApiKey(
  reader: LineReader,
  print: Printer,
  save: (apiKey: string) => Promise<void>,
  envFile: string
): Promise<string> {
  const prompts = new Prompts(reader, print);
  print('OPENAI_API_KEY not found in environment or .env');
  const apiKey = await prompts.secret('Enter OpenAI API key');

  if (await prompts.confirm('Save API key to .env for future runs?')) {
    try {
      await save(apiKey);
      print(`Saved API key to ${envFile}`);
    } catch (error) {
      print(`WARNING: unable to write ${envFile}: ${describeError(error)}`);
    }
  }
  return apiKey;
}

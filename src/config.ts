import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_MAX_WAIT_MS, DEFAULT_POLL_INTERVAL_MS } from './application/services/JobPoller.js';
import type { ProgressBoundaryPolicy } from './core/progress.js';

export const DEFAULT_BASE_URL = 'https://api.openai.com';
export const DEFAULT_LIST_TIMEOUT_MS = 2 * 60 * 1000;
export const API_KEY_ENV = 'OPENAI_API_KEY';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  api: {
    apiKey?: string;
    baseUrl: string;
    organization?: string;
    project?: string;
  };
  polling: {
    intervalMs: number;
    timeoutMs: number;
    progressBoundary: ProgressBoundaryPolicy;
  };
  listTimeoutMs: number;
  output: {
    directory?: string;
  };
  mode: 'interactive' | 'mcp';
  envFile: string;
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  api: z.object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url('Invalid base URL format'),
    organization: z.string().min(1).optional(),
    project: z.string().min(1).optional(),
  }),
  polling: z.object({
    intervalMs: z.number().int().min(100, 'Poll interval must be at least 100ms').max(600_000),
    timeoutMs: z.number().int().min(1_000).max(24 * 60 * 60 * 1000),
    progressBoundary: z.enum(['fraction', 'percent']),
  }),
  listTimeoutMs: z.number().int().min(1_000),
  output: z.object({
    directory: z.string().min(1).optional(),
  }),
  mode: z.enum(['interactive', 'mcp']),
  envFile: z.string().min(1),
});

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse command line arguments
 * Usage: video-job-cli --base-url https://api.example.com --poll-interval 5000 --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const [key, inline] = arg.slice(2).split(/=(.*)/s, 2);

      if (inline !== undefined) {
        args[key] = inline;
      } else if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Location of the .env file: --env-file, else the working directory
 */
export function resolveEnvPath(argv: string[] = process.argv, cwd: string = process.cwd()): string {
  const explicit = parseArgs(argv)['env-file'];
  return typeof explicit === 'string' ? path.resolve(cwd, explicit) : path.join(cwd, '.env');
}

/**
 * Build the configuration from CLI arguments and environment.
 * Throws ConfigError when the result does not validate.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const cliArgs = parseArgs(argv);

  // Helper to get value from CLI args or env, with type conversion
  const getString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string' && cliValue.trim()) return cliValue.trim();
    const envValue = env[envKey]?.trim();
    return envValue ? envValue : undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = getString(cliKey, envKey);
    return value === undefined ? defaultValue : Number(value);
  };

  const rawConfig = {
    server: {
      name: 'video-job-cli',
      version: '1.0.0',
      debug: getBoolean('debug', 'DEBUG', false),
    },
    api: {
      apiKey: getString('api-key', API_KEY_ENV),
      baseUrl: getString('base-url', 'OPENAI_BASE_URL') ?? DEFAULT_BASE_URL,
      organization: getString('organization', 'OPENAI_ORG_ID'),
      project: getString('project', 'OPENAI_PROJECT_ID'),
    },
    polling: {
      intervalMs: getNumber('poll-interval', 'POLL_INTERVAL_MS', DEFAULT_POLL_INTERVAL_MS),
      timeoutMs: getNumber('max-wait', 'MAX_WAIT_MS', DEFAULT_MAX_WAIT_MS),
      progressBoundary: getString('progress-boundary', 'PROGRESS_BOUNDARY') ?? 'fraction',
    },
    listTimeoutMs: getNumber('list-timeout', 'LIST_TIMEOUT_MS', DEFAULT_LIST_TIMEOUT_MS),
    output: {
      directory: getString('output-dir', 'OUTPUT_DIR'),
    },
    mode: getBoolean('mcp', 'MCP_MODE', false) ? 'mcp' : 'interactive',
    envFile: resolveEnvPath(argv, cwd),
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

/**
 * Load .env, then the configuration; prints the problems and exits on failure
 */
export function getConfig(): Config {
  // existing environment variables take precedence over the file
  dotenv.config({ path: resolveEnvPath() });

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Base URL must be valid (e.g., https://api.openai.com)');
      console.error('  - --progress-boundary takes "fraction" or "percent"');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

export function maskSecret(secret: string | undefined): string {
  if (!secret) return '(not set)';
  return secret.length <= 8 ? '****' : `${secret.slice(0, 3)}…${secret.slice(-4)}`;
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error(`\n📊 ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`🔗 API: ${config.api.baseUrl}`);
  console.error(`🔑 Key: ${maskSecret(config.api.apiKey)}`);
  if (config.api.organization) console.error(`🏢 Organization: ${config.api.organization}`);
  if (config.api.project) console.error(`📁 Project: ${config.api.project}`);
  console.error(
    `⏱️  Polling: every ${config.polling.intervalMs}ms, up to ${Math.round(config.polling.timeoutMs / 60000)}m (progress 1.0 read as ${config.polling.progressBoundary})`
  );
  console.error(`📡 Mode: ${config.mode === 'mcp' ? 'MCP (stdio)' : 'interactive'}`);
  console.error('─'.repeat(68));
}

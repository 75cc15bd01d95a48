#!/usr/bin/env node

/**
 * Video job CLI - Entry Point
 *
 * Interactive menu by default; `--mcp` serves the same operations over stdio.
 */

import { JobPoller } from './application/services/JobPoller.js';
import { VideoJobService } from './application/services/VideoJobService.js';
import { API_KEY_ENV, getConfig, printConfigInfo, type Config } from './config.js';
import { CancelledError } from './core/errors.js';
import { upsertEnvValue } from './infrastructure/env/EnvFile.js';
import { VideoApiClient } from './infrastructure/http/VideoApiClient.js';
import { InteractiveCli, promptForApiKey } from './presentation/cli/InteractiveCli.js';
import { TerminalLineReader } from './presentation/cli/prompts.js';
import { VideoMcpServer } from './presentation/McpServer.js';
import { createLogger, setDebugLogging } from './utils/logger.js';

const logger = createLogger('Main');

function buildService(config: Config, apiKey: string): VideoJobService {
  const client = new VideoApiClient({
    ...config.api,
    apiKey,
    progressBoundary: config.polling.progressBoundary,
  });
  const poller = new JobPoller(client, config.polling);
  return new VideoJobService(client, poller);
}

async function runMcp(config: Config): Promise<void> {
  if (!config.api.apiKey) {
    logger.error(`${API_KEY_ENV} is required in MCP mode`);
    process.exitCode = 1;
    return;
  }

  const server = new VideoMcpServer(config, buildService(config, config.api.apiKey));
  await server.start();

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    try {
      await server.shutdown();
    } catch (error) {
      logger.error('shutdown failed', error);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

async function runInteractive(config: Config): Promise<number> {
  const reader = new TerminalLineReader();
  let cli: InteractiveCli | null = null;

  // first Ctrl+C cancels the running job; otherwise it ends input
  process.on('SIGINT', () => {
    if (!cli?.cancel()) {
      reader.close();
    }
  });

  try {
    const apiKey =
      config.api.apiKey ??
      (await promptForApiKey(
        reader,
        (line = '') => console.log(line),
        (key) => upsertEnvValue(config.envFile, API_KEY_ENV, key),
        config.envFile
      ));

    cli = new InteractiveCli(buildService(config, apiKey), config, reader);
    return await cli.run();
  } catch (error) {
    if (error instanceof CancelledError) {
      console.log('\nAborted by user.');
      return 130;
    }
    throw error;
  } finally {
    reader.close();
  }
}

async function main() {
  try {
    const config = getConfig();
    setDebugLogging(config.server.debug);
    printConfigInfo(config);

    if (config.mode === 'mcp') {
      await runMcp(config);
    } else {
      process.exitCode = await runInteractive(config);
    }
  } catch (error) {
    logger.error('Fatal error in main()', error);
    process.exit(1);
  }
}

void main();

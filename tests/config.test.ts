/**
 * Tests for configuration loading
 */

import path from 'path';
import { ConfigError, loadConfig, maskSecret, parseArgs } from '../src/config.js';

const ARGV = ['node', 'video-job-cli'];
const CWD = '/work';

describe('Configuration', () => {
  describe('parseArgs', () => {
    it('should read flags, values and inline values', () => {
      expect(parseArgs([...ARGV, '--debug', '--base-url', 'https://x.test', '--max-wait=60000'])).toEqual({
        debug: true,
        'base-url': 'https://x.test',
        'max-wait': '60000',
      });
    });
  });

  describe('loadConfig', () => {
    it('should apply defaults', () => {
      const config = loadConfig(ARGV, {}, CWD);

      expect(config.api).toEqual({
        apiKey: undefined,
        baseUrl: 'https://api.openai.com',
        organization: undefined,
        project: undefined,
      });
      expect(config.polling).toEqual({ intervalMs: 5_000, timeoutMs: 1_800_000, progressBoundary: 'fraction' });
      expect(config.listTimeoutMs).toBe(120_000);
      expect(config.mode).toBe('interactive');
      expect(config.server.debug).toBe(false);
      expect(config.envFile).toBe(path.join(CWD, '.env'));
    });

    it('should read the environment', () => {
      const config = loadConfig(
        ARGV,
        {
          OPENAI_API_KEY: ' test-secret ',
          OPENAI_BASE_URL: 'https://proxy.example.test',
          OPENAI_PROJECT_ID: 'proj-test',
          POLL_INTERVAL_MS: '2000',
          PROGRESS_BOUNDARY: 'percent',
          OUTPUT_DIR: '/videos',
          MCP_MODE: 'true',
          DEBUG: 'true',
        },
        CWD
      );

      expect(config.api.apiKey).toBe('test-secret');
      expect(config.api.baseUrl).toBe('https://proxy.example.test');
      expect(config.api.project).toBe('proj-test');
      expect(config.polling.intervalMs).toBe(2_000);
      expect(config.polling.progressBoundary).toBe('percent');
      expect(config.output.directory).toBe('/videos');
      expect(config.mode).toBe('mcp');
      expect(config.server.debug).toBe(true);
    });

    it('should let CLI arguments win over the environment', () => {
      const config = loadConfig(
        [...ARGV, '--api-key', 'cli-secret', '--poll-interval=750', '--env-file', 'conf/.env'],
        { OPENAI_API_KEY: 'env-secret', POLL_INTERVAL_MS: '2000' },
        CWD
      );

      expect(config.api.apiKey).toBe('cli-secret');
      expect(config.polling.intervalMs).toBe(750);
      expect(config.envFile).toBe(path.resolve(CWD, 'conf/.env'));
    });

    it('should reject invalid values with every issue', () => {
      const error = (() => {
        try {
          loadConfig(ARGV, { POLL_INTERVAL_MS: 'soon', PROGRESS_BOUNDARY: 'ratio', OPENAI_BASE_URL: 'not a url' }, CWD);
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toBeInstanceOf(ConfigError);
      if (!(error instanceof ConfigError)) return;
      expect(error.issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
        'api.baseUrl',
        'polling.intervalMs',
        'polling.progressBoundary',
      ]);
    });
  });

  describe('maskSecret', () => {
    it('should hide all but the edges of a key', () => {
      expect(maskSecret(undefined)).toBe('(not set)');
      expect(maskSecret('short')).toBe('****');
      expect(maskSecret('test-secret-value')).toBe('tes…alue');
    });
  });
});

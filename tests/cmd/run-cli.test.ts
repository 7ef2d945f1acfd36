import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
/**
 * runCli: .env loading, config errors, summary output and exit codes
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { transports } from 'winston';
import { runCli, type CliOptions } from '../../cmd/cli';
import { NoopDiagnosticsReporter } from '../../core/diagnostics';
import { SearchErrors } from '../../core/errors';
import { logger, setLogLevel } from '../../utils/logger';
import { ScriptedEndpoint, makePage } from '../helpers/fake-endpoint';

const NOW = new Date('2024-03-15T12:00:00Z');
const OUTPUT_FILE = 'tweets_20240315_120000.csv';

function cliOptions(overrides: Partial<CliOptions> = {}): CliOptions {
  return { hashtags: ['#a'], limit: 10, format: 'csv', wait: true, debug: false, ...overrides };
}

function fileTransportsIn(dir: string) {
  return logger.transports.filter(
    (transport): transport is InstanceType<typeof transports.File> =>
      transport instanceof transports.File && transport.dirname === dir
  );
}

describe('runCli', () => {
  let workDir: string;
  let outputDir: string;
  let stdout: string[];
  let stderr: string[];
  let keepWorkDir: boolean;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tagsweep-cli-'));
    outputDir = path.join(workDir, 'out');
    stdout = [];
    stderr = [];
    keepWorkDir = false;
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      stdout.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
      stderr.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setLogLevel('info');
    // an open log file keeps its directory
    await fs.rm(keepWorkDir ? outputDir : workDir, { recursive: true, force: true });
  });

  async function writeEnvFile(lines: string[]): Promise<string> {
    const envPath = path.join(workDir, '.env');
    await fs.writeFile(envPath, `${lines.join('\n')}\n`);
    return envPath;
  }

  test('should load .env before reading the config and print the summary', async () => {
    const envPath = await writeEnvFile(['X_BEARER_TOKEN=test-secret']);
    const env: NodeJS.ProcessEnv = {};
    const endpoint = new ScriptedEndpoint([makePage(1, 2, null)]);

    const exitCode = await runCli(cliOptions({ outputDir }), {
      env,
      envPath,
      endpoint,
      diagnostics: new NoopDiagnosticsReporter(),
      now: () => NOW,
    });

    expect(exitCode).toBe(0);
    expect(env.X_BEARER_TOKEN).toBe('test-secret');
    expect(endpoint.requests).toHaveLength(1);
    expect(stdout).toEqual([`✅ Saved 2 posts to ${path.join(outputDir, OUTPUT_FILE)}`]);
    expect(stderr).toEqual([]);
  });

  test('should enable file logging when LOG_DIR comes from .env', async () => {
    const logDir = path.join(workDir, 'logs');
    const envPath = await writeEnvFile(['X_BEARER_TOKEN=test-secret', `LOG_DIR=${logDir}`]);
    const endpoint = new ScriptedEndpoint([makePage(1, 1, null)]);
    keepWorkDir = true;

    try {
      await runCli(cliOptions({ outputDir }), {
        env: {},
        envPath,
        endpoint,
        diagnostics: new NoopDiagnosticsReporter(),
        now: () => NOW,
      });

      expect(fileTransportsIn(logDir).map((transport) => transport.filename).sort()).toEqual([
        'combined.log',
        'error.log',
      ]);
    } finally {
      for (const transport of fileTransportsIn(logDir)) {
        logger.remove(transport);
      }
    }
  });

  test('should keep variables that are already set over .env values', async () => {
    const envPath = await writeEnvFile(['X_BEARER_TOKEN=test-secret', 'OUTPUT_DIR=ignored-dir']);
    const env: NodeJS.ProcessEnv = { OUTPUT_DIR: outputDir };

    const exitCode = await runCli(cliOptions(), {
      env,
      envPath,
      endpoint: new ScriptedEndpoint([makePage(1, 1, null)]),
      diagnostics: new NoopDiagnosticsReporter(),
      now: () => NOW,
    });

    expect(exitCode).toBe(0);
    expect(env.OUTPUT_DIR).toBe(outputDir);
    expect(await fs.readdir(outputDir)).toEqual([OUTPUT_FILE]);
  });

  test('should return 1 and print the config error when no token is set', async () => {
    const endpoint = new ScriptedEndpoint([]);

    const exitCode = await runCli(cliOptions({ outputDir }), {
      env: {},
      envPath: path.join(workDir, 'missing.env'),
      endpoint,
    });

    expect(exitCode).toBe(1);
    expect(stderr).toEqual(['❌ Missing X_BEARER_TOKEN in .env']);
    expect(stdout).toEqual([]);
    expect(endpoint.requests).toHaveLength(0);
  });

  test('should return 1 for an empty query without sending a request', async () => {
    const envPath = await writeEnvFile(['X_BEARER_TOKEN=test-secret']);
    const endpoint = new ScriptedEndpoint([]);

    const exitCode = await runCli(cliOptions({ hashtags: undefined, outputDir }), { env: {}, envPath, endpoint });

    expect(exitCode).toBe(1);
    expect(stderr).toEqual(['❌ No hashtags or terms supplied']);
    expect(endpoint.requests).toHaveLength(0);
  });

  test('should pass the exit code of an aborted run through', async () => {
    const envPath = await writeEnvFile(['X_BEARER_TOKEN=test-secret']);
    const endpoint = new ScriptedEndpoint([
      SearchErrors.authenticationFailed('Authentication failed: Unauthorized', 401),
    ]);

    const exitCode = await runCli(cliOptions({ outputDir }), {
      env: {},
      envPath,
      endpoint,
      diagnostics: new NoopDiagnosticsReporter(),
      now: () => NOW,
    });

    expect(exitCode).toBe(1);
    expect(stdout).toEqual([
      '❌ Run aborted after 0 page(s): Authentication failed. Check X_BEARER_TOKEN in your .env file.',
      '💾 Nothing was saved',
    ]);
  });
});

import { jest } from '@jest/globals';
import { loadHarnessConfig } from 'App/config/config';
import type { Logger } from 'App/logger';
import ProcessHealthProbe from 'App/services/ProcessHealthProbe';
import type { CommandResult } from 'App/utils/commandRunner';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';

type LogFn = (msg: string, meta?: Record<string, unknown>) => void;

/** Logger whose calls are recorded instead of written anywhere. */
export function createTestLogger() {
  const debug = jest.fn<LogFn>();
  const info = jest.fn<LogFn>();
  const warn = jest.fn<LogFn>();
  const error = jest.fn<LogFn>();
  const logger: Logger = {
    child: () => logger,
    debug,
    info,
    warn,
    error,
    getLogPaths: () => ({ normal: '', debug: '' }),
  };
  return { logger, debug, info, warn, error };
}

export const messages = (fn: { mock: { calls: unknown[][] } }): unknown[] =>
  fn.mock.calls.map(call => call[0]);

export function testConfig(env: Record<string, string> = {}) {
  return loadHarnessConfig({ LOG_LEVEL_CONSOLE: 'silent', ...env });
}

export async function makeTempDir(prefix = 'fault-harness-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' });

export const fail = (stderr: string, exitCode = 1): CommandResult => ({
  exitCode,
  stdout: '',
  stderr,
});

export function errnoError(code: string): Error {
  return Object.assign(new Error(`kill ${code}`), { code });
}

/**
 * Probe whose notion of "alive" is the `alive` set instead of real signals.
 */
export function createFakeProbe() {
  const alive = new Set<number>();
  const probe = new ProcessHealthProbe({
    network: 'regtest',
    pidFileName: 'bitcoind.pid',
    signalZero: pid => {
      if (!alive.has(pid)) throw errnoError('ESRCH');
    },
  });
  return { probe, alive };
}

export async function writePid(dataDir: string, pid: number): Promise<void> {
  await fs.outputFile(path.join(dataDir, 'regtest', 'bitcoind.pid'), `${pid}\n`);
}

/** First positional (non `-option`) argument of a bitcoin-cli call. */
export function cliCommand(args: readonly string[]): string {
  return args.find(arg => !arg.startsWith('-')) ?? '';
}

export function dataDirOf(args: readonly string[]): string {
  const flag = args.find(arg => arg.startsWith('-datadir='));
  return flag ? flag.slice('-datadir='.length) : '';
}

export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 2000,
  stepMs = 5,
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('waitFor: condition not met in time');
    await new Promise(resolve => setTimeout(resolve, stepMs));
  }
}

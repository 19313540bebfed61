import { spawn } from 'node:child_process';

export interface CommandResult {
  /** `null` when the process was killed after exceeding `timeoutMs`. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  timeoutMs?: number;
}

/** Runs an external program to completion and captures its output. */
export interface CommandRunner {
  run(file: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

const MAX_OUTPUT_CHARS = 1_000_000;

function append(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > MAX_OUTPUT_CHARS ? next.slice(-MAX_OUTPUT_CHARS) : next;
}

/**
 * Spawns without a shell. Rejects only when the program cannot be started
 * at all (missing binary, permissions); a non-zero exit resolves normally.
 */
export const spawnCommandRunner: CommandRunner = {
  run(file, args, options = {}) {
    return new Promise((resolve, reject) => {
      const child = spawn(file, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeoutMs && options.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGKILL');
        }, options.timeoutMs);
      }

      // decode through the streams so a character split across chunks stays whole
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout = append(stdout, chunk);
      });
      child.stderr.on('data', (chunk: string) => {
        stderr = append(stderr, chunk);
      });

      child.on('error', err => {
        if (timer) clearTimeout(timer);
        reject(err);
      });

      child.on('close', code => {
        if (timer) clearTimeout(timer);
        resolve({
          exitCode: timedOut ? null : code,
          stdout,
          stderr: timedOut ? `${stderr}\nKilled after ${options.timeoutMs}ms` : stderr,
        });
      });
    });
  },
};

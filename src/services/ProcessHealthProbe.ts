// src/services/ProcessHealthProbe.ts
import fs from 'fs-extra';
import path from 'node:path';

export interface ProbeOptions {
  /** Chain sub-directory bitcoind writes its PID file into, e.g. `regtest`. */
  network: string;
  pidFileName: string;
  /** Liveness check for a PID; defaults to `process.kill(pid, 0)`. */
  signalZero?: (pid: number) => void;
}

const PID_PATTERN = /^\d+$/;

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Decides whether a node is alive from the PID record under its data dir.
 *
 * A missing or unreadable record and a PID the OS does not know are both
 * plain "not running" answers; after a crash that is the normal state.
 * None of the checks throw.
 */
class ProcessHealthProbe {
  private readonly signalZero: (pid: number) => void;

  constructor(private readonly options: ProbeOptions) {
    this.signalZero = options.signalZero ?? (pid => process.kill(pid, 0));
  }

  pidFilePath(dataDir: string): string {
    return path.join(dataDir, this.options.network, this.options.pidFileName);
  }

  /** Returns the recorded PID, or `null` when the record is absent or malformed. */
  async readPid(dataDir: string): Promise<number | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.pidFilePath(dataDir), 'utf8');
    } catch {
      // missing, looping or unreadable record: nothing to check against
      return null;
    }
    const trimmed = raw.trim();
    if (!PID_PATTERN.test(trimmed)) return null;
    const pid = Number(trimmed);
    return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
  }

  /**
   * Sends signal 0 to the PID. EPERM still means a process holds the PID
   * (possibly another user's after PID reuse); every other failure means
   * not running.
   */
  isPidAlive(pid: number): boolean {
    try {
      this.signalZero(pid);
      return true;
    } catch (err) {
      return errnoCode(err) === 'EPERM';
    }
  }

  async isRunning(dataDir: string): Promise<boolean> {
    const pid = await this.readPid(dataDir);
    return pid !== null && this.isPidAlive(pid);
  }

  async hasExited(dataDir: string): Promise<boolean> {
    return !(await this.isRunning(dataDir));
  }
}

export default ProcessHealthProbe;

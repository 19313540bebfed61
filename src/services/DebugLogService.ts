// src/services/DebugLogService.ts
import type { Logger } from 'App/logger';
import fs from 'fs-extra';
import path from 'node:path';

export const DEBUG_LOG_NOT_FOUND = 'Debug log not found';

export interface DebugLogOptions {
  network: string;
  logger: Logger;
  defaultTailLines?: number;
}

/** Access to bitcoind's own `debug.log` inside a node's data dir. */
class DebugLogService {
  private readonly network: string;
  private readonly logger: Logger;
  private readonly defaultTailLines: number;

  constructor(options: DebugLogOptions) {
    this.network = options.network;
    this.logger = options.logger;
    this.defaultTailLines = options.defaultTailLines ?? 50;
  }

  getDebugLogPath(dataDir: string): string {
    return path.join(dataDir, this.network, 'debug.log');
  }

  /** Last `lines` lines of the debug log, or {@link DEBUG_LOG_NOT_FOUND}. */
  async tail(dataDir: string, lines: number = this.defaultTailLines): Promise<string> {
    const logPath = this.getDebugLogPath(dataDir);
    if (!(await fs.pathExists(logPath))) {
      return DEBUG_LOG_NOT_FOUND;
    }
    const content = await fs.readFile(logPath, 'utf8');
    const all = content.split(/\r?\n/);
    if (all[all.length - 1] === '') all.pop();
    const tail = lines > 0 ? all.slice(-lines) : [];
    this.logger.debug(`=== Last ${tail.length} lines of ${logPath} ===`);
    return tail.join('\n');
  }

  /** Copies the debug log to `destination`; false when there is no log yet. */
  async copyTo(dataDir: string, destination: string): Promise<boolean> {
    const logPath = this.getDebugLogPath(dataDir);
    if (!(await fs.pathExists(logPath))) {
      this.logger.warn(`Debug log not found at ${logPath}`);
      return false;
    }
    await fs.ensureDir(path.dirname(destination));
    await fs.copy(logPath, destination, { preserveTimestamps: true });
    this.logger.info(`Copied debug.log to ${destination}`);
    return true;
  }
}

export default DebugLogService;

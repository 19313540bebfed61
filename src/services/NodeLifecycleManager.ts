// src/services/NodeLifecycleManager.ts
import type { HarnessConfig, RetryPolicy } from 'App/config/config';
import {
  CommandError,
  ConflictError,
  LaunchError,
  TimeoutError,
  TransientLaunchError,
  ValidationError,
} from 'App/errors/CustomError';
import type { Logger } from 'App/logger';
import type { CommandRunner } from 'App/utils/commandRunner';
import { withRetry } from 'App/utils/retry';
import { sleep as defaultSleep, type Sleep } from 'App/utils/sleep';
import fs from 'fs-extra';
import type ProcessHealthProbe from './ProcessHealthProbe';

/* -------------------------------------------------------------------------------------------------
 * Types
 * ------------------------------------------------------------------------------------------------- */

export type NodeState =
  | 'unstarted'
  | 'starting'
  | 'running'
  | 'stopping'
  | 'stopped'
  | 'failed';

export interface NodeStartOptions {
  /** Data directory; identifies the node. */
  dataDir: string;
  port: number;
  rpcPort?: number;
  /** `host:port` of a peer to connect to exclusively. */
  connectTo?: string;
}

export interface FaultInjectedStartOptions extends NodeStartOptions {
  /** Probability (0..1) that an I/O call matching the fault pattern fails. */
  probability?: number;
}

/** What the metrics sampler needs from a node: run one CLI command, get its output. */
export interface NodeCommandInterface {
  executeCommand(
    dataDir: string,
    command: string,
    rpcPort?: number,
    rpcWallet?: string,
  ): Promise<string>;
}

export type LifecycleConfig = Pick<
  HarnessConfig,
  'bitcoin' | 'network' | 'settle' | 'timeouts' | 'faultInjection'
>;

export interface NodeLifecycleDeps {
  config: LifecycleConfig;
  runner: CommandRunner;
  probe: ProcessHealthProbe;
  logger: Logger;
  sleep?: Sleep;
  /** Sends SIGTERM to a PID; defaults to `process.kill`. */
  terminate?: (pid: number) => void;
  /** Clock for wait deadlines, in ms; defaults to `Date.now`. */
  now?: () => number;
}

const POLL_INTERVAL_MS = 1000;

/* -------------------------------------------------------------------------------------------------
 * Implementation
 * ------------------------------------------------------------------------------------------------- */

/**
 * Starts, stops and talks to bitcoind nodes, optionally under libfiu fault injection.
 *
 * Per data dir the node moves through
 * unstarted -> starting -> running -> stopping -> stopped. A fault-injected
 * launch that dies during the settle delay drops back to unstarted and is
 * retried; once retries run out the node ends in failed.
 */
class NodeLifecycleManager implements NodeCommandInterface {
  private readonly config: LifecycleConfig;
  private readonly runner: CommandRunner;
  private readonly probe: ProcessHealthProbe;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly terminate: (pid: number) => void;
  private readonly now: () => number;

  private readonly states = new Map<string, NodeState>();
  // data dirs with a start sequence in flight (retry delays included)
  private readonly claimed = new Set<string>();

  constructor(deps: NodeLifecycleDeps) {
    this.config = deps.config;
    this.runner = deps.runner;
    this.probe = deps.probe;
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.terminate = deps.terminate ?? (pid => process.kill(pid, 'SIGTERM'));
    this.now = deps.now ?? Date.now;
  }

  getState(dataDir: string): NodeState {
    return this.states.get(dataDir) ?? 'unstarted';
  }

  get retryPolicy(): RetryPolicy {
    return this.config.faultInjection.retry;
  }

  /**
   * Launches bitcoind directly (no fault injection) and waits the start
   * settle delay.
   */
  async startPlain(options: NodeStartOptions): Promise<void> {
    const { dataDir, port } = options;
    await this.claim(dataDir);
    try {
      this.setState(dataDir, 'starting');
      this.logger.info(`Starting node with datadir=${dataDir}, port=${port}`);

      const args = [
        ...this.daemonArgs(options),
        `-bind=${this.config.network.bindAddress}`,
        '-daemon',
      ];
      const result = await this.runner.run(this.config.bitcoin.bitcoindPath, args);
      if (result.exitCode !== 0) {
        this.logger.error(`Failed to start node: ${result.stderr.trim()}`, { dataDir });
        throw new LaunchError(`Failed to start node: ${result.stderr.trim()}`, {
          dataDir,
          exitCode: result.exitCode,
        });
      }

      await this.sleep(this.config.settle.startMs);
      if (await this.probe.hasExited(dataDir)) {
        this.logger.error(`Node exited shortly after start`, { dataDir });
        throw new LaunchError(`Node exited shortly after start`, { dataDir });
      }

      this.setState(dataDir, 'running');
      this.logger.debug(`Node started successfully`, { dataDir });
    } catch (err) {
      this.setState(dataDir, 'failed');
      throw err;
    } finally {
      this.claimed.delete(dataDir);
    }
  }

  /**
   * Launches bitcoind through `fiu-run` with random failures on the
   * configured I/O fault pattern. The launch-and-verify sequence is retried
   * under the fault-injection retry policy.
   */
  async startWithFaultInjection(options: FaultInjectedStartOptions): Promise<void> {
    const probability = options.probability ?? this.config.faultInjection.probabilityLow;
    if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
      throw new ValidationError('probability must be between 0 and 1', { probability });
    }

    const { dataDir } = options;
    await this.claim(dataDir);
    try {
      await withRetry(() => this.launchWithFaultInjection(options, probability), this.retryPolicy, {
        logger: this.logger,
        name: 'startWithFaultInjection',
        retryIf: err => err instanceof LaunchError,
        sleep: this.sleep,
      });
    } catch (err) {
      this.setState(dataDir, 'failed');
      throw err;
    } finally {
      this.claimed.delete(dataDir);
    }
  }

  /**
   * Requests termination of the process named by the PID record, then waits
   * the stop settle delay. Stopping a node that is not running is fine;
   * stopping one whose start sequence is still in flight is refused.
   */
  async stop(dataDir: string): Promise<void> {
    if (this.claimed.has(dataDir)) {
      this.logger.warn(`Stop requested while node is starting`, { dataDir });
      throw new ConflictError(`Node ${dataDir} is still starting`);
    }
    this.logger.info(`Stopping node with datadir=${dataDir}`);
    this.setState(dataDir, 'stopping');

    const pid = await this.probe.readPid(dataDir);
    if (pid === null) {
      this.logger.debug(`No PID record at ${this.probe.pidFilePath(dataDir)}`);
    } else {
      this.signalTerminate(pid, dataDir);
    }

    await this.sleep(this.config.settle.stopMs);
    this.setState(dataDir, 'stopped');
  }

  /** Runs one bitcoin-cli command and returns its trimmed stdout. */
  executeCommand(
    dataDir: string,
    command: string,
    rpcPort?: number,
    rpcWallet?: string,
  ): Promise<string> {
    return this.runCli(dataDir, command, this.config.timeouts.commandSec, rpcPort, rpcWallet);
  }

  /**
   * Polls `getblockchaininfo` once per second until it answers. The timeout
   * is a deadline: time spent inside slow CLI calls counts against it.
   */
  async waitUntilResponsive(
    dataDir: string,
    rpcPort?: number,
    timeoutSeconds: number = this.config.timeouts.nodeStartSec,
  ): Promise<void> {
    let attempts = 0;
    const responsive = await this.pollUntil(timeoutSeconds, async () => {
      attempts += 1;
      try {
        await this.executeCommand(dataDir, 'getblockchaininfo', rpcPort);
        return true;
      } catch (err) {
        if (!(err instanceof CommandError)) throw err;
        this.logger.debug(`Node not responsive yet: ${err.stderr.trim()}`, { dataDir });
        return null;
      }
    });
    if (responsive) {
      this.logger.debug(`Node responsive after ${attempts} attempt(s)`, { dataDir });
      return;
    }
    this.logger.error(`Node did not start within ${timeoutSeconds} seconds`, { dataDir });
    throw new TimeoutError(
      `Node did not start within ${timeoutSeconds} seconds`,
      timeoutSeconds * 1000,
    );
  }

  /** Polls the PID record once per second until the process is gone. */
  async waitForExit(
    dataDir: string,
    timeoutSeconds: number = this.config.timeouts.nodeStopSec,
  ): Promise<void> {
    const exited = await this.pollUntil(timeoutSeconds, async () =>
      (await this.probe.hasExited(dataDir)) ? true : null,
    );
    if (exited) return;
    this.logger.error(`Node did not exit within ${timeoutSeconds} seconds`, { dataDir });
    throw new TimeoutError(
      `Node did not exit within ${timeoutSeconds} seconds`,
      timeoutSeconds * 1000,
    );
  }

  /* --------------------------- Node commands --------------------------- */

  async getBlockCount(dataDir: string, rpcPort?: number): Promise<number> {
    const output = await this.executeCommand(dataDir, 'getblockcount', rpcPort);
    const count = Number(output);
    if (!Number.isInteger(count)) {
      throw new CommandError('getblockcount', 0, `Unexpected output: ${output}`);
    }
    return count;
  }

  async createWallet(dataDir: string, walletName: string, rpcPort?: number): Promise<void> {
    const output = await this.executeCommand(dataDir, `createwallet ${walletName}`, rpcPort);
    this.logger.info(`Wallet created: ${walletName}`, { dataDir, output });
  }

  /** Mines `count` blocks to a fresh address of `walletName`; returns the block hashes. */
  async generateBlocks(
    dataDir: string,
    walletName: string,
    count: number,
    rpcPort?: number,
  ): Promise<string[]> {
    const address = await this.executeCommand(dataDir, 'getnewaddress', rpcPort, walletName);
    const command = `generatetoaddress ${count} ${address}`;
    const output = await this.runCli(
      dataDir,
      command,
      this.config.timeouts.blockGenerationSec,
      rpcPort,
      walletName,
    );

    let hashes: unknown;
    try {
      hashes = JSON.parse(output);
    } catch {
      throw new CommandError(command, 0, `Unexpected output: ${output}`);
    }
    if (!Array.isArray(hashes) || !hashes.every((h): h is string => typeof h === 'string')) {
      throw new CommandError(command, 0, `Unexpected output: ${output}`);
    }
    this.logger.info(`Generated ${count} blocks`, { dataDir });
    return hashes;
  }

  /** Polls `getblockcount` once per second until it reaches `target`; returns the height seen. */
  async waitForBlockCount(
    dataDir: string,
    target: number,
    timeoutSeconds: number,
    rpcPort?: number,
  ): Promise<number> {
    let last: number | null = null;
    const reached = await this.pollUntil(timeoutSeconds, async () => {
      try {
        last = await this.getBlockCount(dataDir, rpcPort);
        return last >= target ? last : null;
      } catch (err) {
        if (!(err instanceof CommandError)) throw err;
        this.logger.debug(`getblockcount failed while waiting: ${err.stderr.trim()}`, { dataDir });
        return null;
      }
    });
    if (reached !== null) return reached;
    this.logger.error(
      `Node did not reach height ${target} within ${timeoutSeconds} seconds (last=${last ?? 'n/a'})`,
      { dataDir },
    );
    throw new TimeoutError(
      `Node did not reach height ${target} within ${timeoutSeconds} seconds`,
      timeoutSeconds * 1000,
    );
  }

  /** Removes everything under `dataDir` and recreates it empty. */
  async cleanNodeDirectory(dataDir: string): Promise<void> {
    if (this.claimed.has(dataDir) || (await this.probe.isRunning(dataDir))) {
      throw new ConflictError(`Refusing to clean ${dataDir}: node is running`);
    }
    this.logger.info(`Cleaning directory ${dataDir}`);
    await fs.remove(dataDir);
    await fs.ensureDir(dataDir);
    this.states.delete(dataDir);
  }

  /* -------------------------------------------------------------------------------------------------
   * Internals
   * ------------------------------------------------------------------------------------------------- */

  private async launchWithFaultInjection(
    options: FaultInjectedStartOptions,
    probability: number,
  ): Promise<void> {
    const { dataDir } = options;
    this.setState(dataDir, 'starting');
    this.logger.info(`Starting victim node with fault injection (probability=${probability})`, {
      dataDir,
    });

    const faultSpec = `enable_random name=${this.config.faultInjection.faultPattern},probability=${probability}`;
    const args = [
      '-x',
      '-c',
      faultSpec,
      this.config.bitcoin.bitcoindPath,
      ...this.daemonArgs(options),
      '-daemon',
    ];

    const result = await this.runner.run(this.config.bitcoin.fiuRunPath, args);
    if (result.exitCode !== 0) {
      this.setState(dataDir, 'unstarted');
      this.logger.error(`Failed to start victim node: ${result.stderr.trim()}`, { dataDir });
      throw new LaunchError(`Failed to start victim node: ${result.stderr.trim()}`, {
        dataDir,
        exitCode: result.exitCode,
      });
    }

    await this.sleep(this.config.settle.faultStartMs);

    if (await this.probe.hasExited(dataDir)) {
      this.setState(dataDir, 'unstarted');
      this.logger.warn(
        'Victim node exited shortly after start (likely due to fault injection)',
        { dataDir },
      );
      throw new TransientLaunchError(
        'Victim node exited shortly after start (likely due to fault injection)',
      );
    }

    this.setState(dataDir, 'running');
    this.logger.info('Victim node started successfully', { dataDir });
  }

  /**
   * Runs `attempt` at least once, then once per poll interval until it yields
   * a non-null value or `timeoutSeconds` have passed on the clock.
   */
  private async pollUntil<T>(
    timeoutSeconds: number,
    attempt: () => Promise<T | null>,
  ): Promise<T | null> {
    const deadline = this.now() + timeoutSeconds * 1000;
    do {
      const value = await attempt();
      if (value !== null) return value;
      const remaining = deadline - this.now();
      if (remaining <= 0) break;
      await this.sleep(Math.min(POLL_INTERVAL_MS, remaining));
    } while (this.now() < deadline);
    return null;
  }

  private async runCli(
    dataDir: string,
    command: string,
    timeoutSeconds: number,
    rpcPort?: number,
    rpcWallet?: string,
  ): Promise<string> {
    const args = [`-${this.config.bitcoin.network}`, `-datadir=${dataDir}`];
    if (rpcPort) args.push(`-rpcport=${rpcPort}`);
    if (rpcWallet) args.push(`-rpcwallet=${rpcWallet}`);
    args.push(...command.trim().split(/\s+/));

    const result = await this.runner.run(this.config.bitcoin.bitcoinCliPath, args, {
      timeoutMs: timeoutSeconds * 1000,
    });
    if (result.exitCode !== 0) {
      const error = new CommandError(command, result.exitCode, result.stderr);
      this.logger.debug(error.message, { dataDir });
      throw error;
    }
    return result.stdout.trim();
  }

  private daemonArgs({ dataDir, port, rpcPort, connectTo }: NodeStartOptions): string[] {
    const args = [`-${this.config.bitcoin.network}`, `-datadir=${dataDir}`, `-port=${port}`];
    if (rpcPort) args.push(`-rpcport=${rpcPort}`);
    if (connectTo) args.push(`-connect=${connectTo}`);
    return args;
  }

  /** Reserves `dataDir` for a start sequence; at most one live process per data dir. */
  private async claim(dataDir: string): Promise<void> {
    if (this.claimed.has(dataDir)) {
      throw new ConflictError(`Node ${dataDir} is already starting`);
    }
    this.claimed.add(dataDir);
    let alive: boolean;
    try {
      alive = await this.probe.isRunning(dataDir);
    } catch (err) {
      this.claimed.delete(dataDir);
      throw err;
    }
    if (alive) {
      this.claimed.delete(dataDir);
      this.setState(dataDir, 'running');
      throw new ConflictError(`A live process is already recorded for ${dataDir}`);
    }
  }

  private signalTerminate(pid: number, dataDir: string): void {
    try {
      this.terminate(pid);
      this.logger.debug(`Sent SIGTERM to ${pid}`, { dataDir });
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ESRCH') {
        this.logger.debug(`Process ${pid} already gone`, { dataDir });
        return;
      }
      this.logger.error(`Failed to signal process ${pid}`, { dataDir, error: String(err) });
      throw err;
    }
  }

  private setState(dataDir: string, state: NodeState): void {
    const previous = this.getState(dataDir);
    if (previous === state) return;
    this.states.set(dataDir, state);
    this.logger.debug(`Node state ${previous} -> ${state}`, { dataDir });
  }
}

export default NodeLifecycleManager;

// src/services/MetricsSampler.ts
import { CommandError, ValidationError } from 'App/errors/CustomError';
import type { Logger } from 'App/logger';
import { waitOrAbort } from 'App/utils/sleep';
import fs from 'fs-extra';
import path from 'node:path';
import pidusage from 'pidusage';
import type { NodeCommandInterface } from './NodeLifecycleManager';
import type ProcessHealthProbe from './ProcessHealthProbe';

/* -------------------------------------------------------------------------------------------------
 * Types
 * ------------------------------------------------------------------------------------------------- */

/** Parsed `getblockchaininfo`; only `blocks` is relied upon. */
export interface ChainState {
  blocks: number;
  [key: string]: unknown;
}

export interface ProcessStats {
  pid: number;
  cpu: number; // %, from pidusage
  memoryMB: number;
}

export interface MetricsSnapshot {
  timestamp: string; // ISO, UTC
  nodeName: string;
  chainState: ChainState;
  /** Parsed `getpeerinfo`; its length is the peer count. */
  peerList: unknown[];
  processStats?: ProcessStats;
}

export interface MetricsSummary {
  totalSnapshots: number;
  firstSnapshot: string | null;
  lastSnapshot: string | null;
  initialBlockCount: number;
  finalBlockCount: number;
  blocksSynced: number;
  avgPeerCount: number;
  maxPeerCount: number;
}

export type ProcessStatsReader = (dataDir: string) => Promise<ProcessStats | null>;

export interface MetricsSamplerDeps {
  logger: Logger;
  /** Upper bound on how long stopSampling waits for a loop to exit. */
  joinTimeoutMs: number;
  readProcessStats?: ProcessStatsReader;
  now?: () => Date;
}

interface SamplingSession {
  nodeName: string;
  dataDir: string;
  rpcPort?: number;
  intervalMs: number;
  startedAt: string;
  commands: NodeCommandInterface;
  controller: AbortController;
  done: Promise<void>;
}

export const EMPTY_SUMMARY: Readonly<MetricsSummary> = Object.freeze({
  totalSnapshots: 0,
  firstSnapshot: null,
  lastSnapshot: null,
  initialBlockCount: 0,
  finalBlockCount: 0,
  blocksSynced: 0,
  avgPeerCount: 0,
  maxPeerCount: 0,
});

/* -------------------------------------------------------------------------------------------------
 * Parsing
 * ------------------------------------------------------------------------------------------------- */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isChainState(value: unknown): value is ChainState {
  return isRecord(value) && typeof value.blocks === 'number' && Number.isFinite(value.blocks);
}

function isSnapshot(value: unknown): value is MetricsSnapshot {
  return (
    isRecord(value) &&
    typeof value.timestamp === 'string' &&
    typeof value.nodeName === 'string' &&
    isChainState(value.chainState) &&
    Array.isArray(value.peerList)
  );
}

function parseChainState(raw: string): ChainState {
  const parsed: unknown = JSON.parse(raw);
  if (!isChainState(parsed)) {
    throw new ValidationError('getblockchaininfo returned no numeric "blocks"');
  }
  return parsed;
}

function parsePeerList(raw: string): unknown[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new ValidationError('getpeerinfo did not return an array');
  }
  return parsed;
}

/** Reads CPU/memory of the PID recorded under `dataDir`. */
export function createProcessStatsReader(probe: ProcessHealthProbe): ProcessStatsReader {
  return async dataDir => {
    const pid = await probe.readPid(dataDir);
    if (pid === null) return null;
    const usage = await pidusage(pid);
    return { pid, cpu: usage.cpu, memoryMB: usage.memory / 1024 / 1024 };
  };
}

/** Loads a file written by {@link MetricsSampler.exportToFile}. */
export async function readMetricsFile(filePath: string): Promise<MetricsSnapshot[]> {
  const parsed: unknown = await fs.readJSON(filePath);
  if (!Array.isArray(parsed) || !parsed.every(isSnapshot)) {
    throw new ValidationError(`Not a metrics snapshot file: ${filePath}`);
  }
  return parsed;
}

export function summarize(snapshots: readonly MetricsSnapshot[]): MetricsSummary {
  if (snapshots.length === 0) return { ...EMPTY_SUMMARY };

  const blockCounts = snapshots.map(s => s.chainState.blocks);
  const peerCounts = snapshots.map(s => s.peerList.length);
  const first = snapshots[0];
  const last = snapshots[snapshots.length - 1];
  const initialBlockCount = blockCounts[0] ?? 0;
  const finalBlockCount = blockCounts[blockCounts.length - 1] ?? 0;

  return {
    totalSnapshots: snapshots.length,
    firstSnapshot: first?.timestamp ?? null,
    lastSnapshot: last?.timestamp ?? null,
    initialBlockCount,
    finalBlockCount,
    blocksSynced: finalBlockCount - initialBlockCount,
    avgPeerCount: peerCounts.reduce((a, b) => a + b, 0) / peerCounts.length,
    maxPeerCount: Math.max(...peerCounts),
  };
}

/* -------------------------------------------------------------------------------------------------
 * Implementation
 * ------------------------------------------------------------------------------------------------- */

/**
 * One background sampling loop per node name. Each loop pulls
 * `getblockchaininfo` and `getpeerinfo` through the node's command interface,
 * appends a timestamped snapshot, then waits for the interval or the stop
 * signal, whichever comes first.
 *
 * Contract:
 * - Starting a name that is already sampled is a logged no-op.
 * - A failed sample is logged and skipped; it never ends the loop.
 * - Collected snapshots outlive the session until exported or discarded.
 *
 * Snapshot lists are only mutated synchronously by their own loop, and
 * readers copy them synchronously, so a reader never sees a half-written list.
 */
class MetricsSampler {
  private readonly logger: Logger;
  private readonly joinTimeoutMs: number;
  private readonly readProcessStats?: ProcessStatsReader;
  private readonly now: () => Date;

  private readonly sessions = new Map<string, SamplingSession>();
  private readonly data = new Map<string, MetricsSnapshot[]>();

  constructor(deps: MetricsSamplerDeps) {
    this.logger = deps.logger;
    this.joinTimeoutMs = deps.joinTimeoutMs;
    this.readProcessStats = deps.readProcessStats;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Starts a background loop for `nodeName` and returns immediately.
   */
  startSampling(
    nodeName: string,
    dataDir: string,
    commands: NodeCommandInterface,
    intervalSeconds: number,
    rpcPort?: number,
  ): void {
    if (this.sessions.has(nodeName)) {
      this.logger.warn(`Metrics collection already running for ${nodeName}`);
      return;
    }
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new ValidationError('intervalSeconds must be > 0', { intervalSeconds });
    }

    this.logger.info(`Starting metrics collection for ${nodeName} (interval: ${intervalSeconds}s)`);
    this.data.set(nodeName, []);

    const session: SamplingSession = {
      nodeName,
      dataDir,
      rpcPort,
      intervalMs: intervalSeconds * 1000,
      startedAt: this.now().toISOString(),
      commands,
      controller: new AbortController(),
      done: Promise.resolve(),
    };
    session.done = this.runLoop(session);
    this.sessions.set(nodeName, session);

    this.logger.debug(`Metrics collection loop started for ${nodeName}`);
  }

  /**
   * Signals the loop for `nodeName` and waits (bounded) for it to exit.
   */
  async stopSampling(nodeName: string): Promise<void> {
    const session = this.sessions.get(nodeName);
    if (!session) {
      this.logger.warn(`No metrics collection running for ${nodeName}`);
      return;
    }

    this.logger.info(`Stopping metrics collection for ${nodeName}`);
    session.controller.abort();

    let timer: NodeJS.Timeout | undefined;
    const joined = await Promise.race([
      session.done.then(() => true),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(false), this.joinTimeoutMs);
      }),
    ]);
    if (timer) clearTimeout(timer);

    if (!joined) {
      this.logger.warn(
        `Metrics loop for ${nodeName} did not exit within ${this.joinTimeoutMs}ms; it will finish its in-flight sample and stop`,
      );
    }
    this.sessions.delete(nodeName);
    this.logger.debug(`Metrics collection stopped for ${nodeName}`);
  }

  async stopAll(): Promise<void> {
    this.logger.info('Stopping all metrics collection');
    await Promise.all([...this.sessions.keys()].map(name => this.stopSampling(name)));
  }

  listActiveSessions(): string[] {
    return [...this.sessions.keys()];
  }

  isSampling(nodeName: string): boolean {
    return this.sessions.has(nodeName);
  }

  hasData(nodeName: string): boolean {
    return this.data.has(nodeName);
  }

  /** Copy of the snapshots collected for `nodeName` (empty when none). */
  getSnapshots(nodeName: string): MetricsSnapshot[] {
    return [...(this.data.get(nodeName) ?? [])];
  }

  getSummary(nodeName: string): MetricsSummary {
    return summarize(this.getSnapshots(nodeName));
  }

  /** Drops collected data; an active session keeps sampling into an empty list. */
  discardData(nodeName: string): void {
    if (this.sessions.has(nodeName)) {
      this.data.set(nodeName, []);
    } else {
      this.data.delete(nodeName);
    }
  }

  /**
   * Writes the snapshots for `nodeName` as an indented JSON array.
   * Returns false (and writes nothing) when there is no data for the name.
   */
  async exportToFile(nodeName: string, filePath: string): Promise<boolean> {
    if (!this.data.has(nodeName)) {
      this.logger.warn(`No metrics data found for ${nodeName}`);
      return false;
    }
    const snapshots = this.getSnapshots(nodeName);

    await fs.ensureDir(path.dirname(filePath));
    await fs.writeJSON(filePath, snapshots, { spaces: 2 });

    this.logger.info(
      `Saved ${snapshots.length} metrics snapshots for ${nodeName} to ${filePath}`,
    );
    return true;
  }

  /* -------------------------------------------------------------------------------------------------
   * Internals
   * ------------------------------------------------------------------------------------------------- */

  private async runLoop(session: SamplingSession): Promise<void> {
    const { signal } = session.controller;
    while (!signal.aborted) {
      try {
        const snapshot = await this.sampleOnce(session);
        if (!signal.aborted) this.append(session.nodeName, snapshot);
      } catch (err) {
        if (err instanceof CommandError) {
          this.logger.warn(`Skipping metrics sample for ${session.nodeName}: ${err.message}`);
        } else {
          this.logger.error(`Error collecting metrics for ${session.nodeName}: ${String(err)}`);
        }
      }
      await waitOrAbort(session.intervalMs, signal);
    }
  }

  private async sampleOnce(session: SamplingSession): Promise<MetricsSnapshot> {
    const { commands, dataDir, rpcPort, nodeName } = session;
    const chainState = parseChainState(
      await commands.executeCommand(dataDir, 'getblockchaininfo', rpcPort),
    );
    const peerList = parsePeerList(await commands.executeCommand(dataDir, 'getpeerinfo', rpcPort));

    const snapshot: MetricsSnapshot = {
      timestamp: this.now().toISOString(),
      nodeName,
      chainState,
      peerList,
    };

    if (this.readProcessStats) {
      try {
        const stats = await this.readProcessStats(dataDir);
        if (stats) snapshot.processStats = stats;
      } catch (err) {
        this.logger.debug(`Process stats unavailable for ${nodeName}: ${String(err)}`);
      }
    }
    return snapshot;
  }

  private append(nodeName: string, snapshot: MetricsSnapshot): void {
    const list = this.data.get(nodeName);
    if (!list) return;
    const previous = list[list.length - 1];
    // keep per-node timestamps non-decreasing even if the wall clock steps back
    if (previous && snapshot.timestamp < previous.timestamp) {
      snapshot.timestamp = previous.timestamp;
    }
    list.push(snapshot);
    this.logger.debug(
      `Collected metrics for ${nodeName}: blocks=${snapshot.chainState.blocks}, peers=${snapshot.peerList.length}`,
    );
  }
}

export default MetricsSampler;

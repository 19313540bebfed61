import type { HarnessConfig } from 'App/config/config';
import { createLogger, type Logger } from 'App/logger';
import DebugLogService from 'App/services/DebugLogService';
import MetricsSampler, { createProcessStatsReader } from 'App/services/MetricsSampler';
import NodeLifecycleManager from 'App/services/NodeLifecycleManager';
import ProcessHealthProbe from 'App/services/ProcessHealthProbe';
import { spawnCommandRunner, type CommandRunner } from 'App/utils/commandRunner';
import type { Sleep } from 'App/utils/sleep';

export interface Harness {
  config: Readonly<HarnessConfig>;
  logger: Logger;
  probe: ProcessHealthProbe;
  nodes: NodeLifecycleManager;
  sampler: MetricsSampler;
  debugLogs: DebugLogService;
}

export interface HarnessOverrides {
  runner?: CommandRunner;
  logger?: Logger;
  sleep?: Sleep;
  signalZero?: (pid: number) => void;
  terminate?: (pid: number) => void;
  now?: () => number;
}

/** Wires every component from one configuration struct. */
export function createHarness(
  config: Readonly<HarnessConfig>,
  overrides: HarnessOverrides = {},
): Harness {
  const logger = overrides.logger ?? createLogger('robustness', config.logging);
  const probe = new ProcessHealthProbe({
    network: config.bitcoin.network,
    pidFileName: config.bitcoin.pidFileName,
    signalZero: overrides.signalZero,
  });

  const nodes = new NodeLifecycleManager({
    config,
    runner: overrides.runner ?? spawnCommandRunner,
    probe,
    logger: logger.child({ component: 'node_lifecycle' }),
    sleep: overrides.sleep,
    terminate: overrides.terminate,
    now: overrides.now,
  });

  const sampler = new MetricsSampler({
    logger: logger.child({ component: 'metrics_collector' }),
    joinTimeoutMs: config.metrics.joinTimeoutSec * 1000,
    readProcessStats: config.metrics.collectProcessStats
      ? createProcessStatsReader(probe)
      : undefined,
  });

  const debugLogs = new DebugLogService({
    network: config.bitcoin.network,
    logger: logger.child({ component: 'debug_log' }),
    defaultTailLines: config.logging.debugLogTailLines,
  });

  return { config, logger, probe, nodes, sampler, debugLogs };
}

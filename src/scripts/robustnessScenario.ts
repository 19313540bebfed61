/*
 Robustness scenario: a generator node mines a chain, a victim node running
 under libfiu fault injection syncs from it while both are sampled.
 Outputs go to ./results/<timestamp>/<suite>/{metrics_*.json, *_debug.log}.
*/

import { startMonitorServer, stopMonitorServer } from 'App/app';
import { loadHarnessConfig, type HarnessConfig } from 'App/config/config';
import { createHarness, type Harness } from 'App/harness';
import type { MetricsSummary } from 'App/services/MetricsSampler';
import { setupResultsDirectory } from 'App/utils/resultsDirectory';
import type http from 'node:http';
import path from 'node:path';

export const GENERATOR = 'generator';
export const VICTIM = 'victim';

export interface ScenarioOptions {
  suiteName?: string;
  /** Fault probability for the victim; defaults to the configured low probability. */
  probability?: number;
  now?: () => Date;
}

export interface ScenarioResult {
  resultsDir: string;
  synced: boolean;
  generatorHeight: number;
  victimHeight: number;
  summaries: Record<string, MetricsSummary>;
}

export async function runRobustnessScenario(
  harness: Harness,
  options: ScenarioOptions = {},
): Promise<ScenarioResult> {
  const { config, logger, nodes, sampler, debugLogs } = harness;
  const { generatorDir, victimDir } = config.directories;
  const { generatorPort, victimPort, victimRpcPort, bindAddress } = config.network;
  const probability = options.probability ?? config.faultInjection.probabilityLow;
  const now = options.now ?? (() => new Date());

  const resultsDir = await setupResultsDirectory(
    options.suiteName ?? 'robustness',
    config.directories.resultsDir,
    now(),
  );
  logger.info(`Results directory: ${resultsDir}`);

  const result: ScenarioResult = {
    resultsDir,
    synced: false,
    generatorHeight: 0,
    victimHeight: 0,
    summaries: {},
  };
  let server: http.Server | undefined;

  try {
    await nodes.cleanNodeDirectory(generatorDir);
    await nodes.cleanNodeDirectory(victimDir);

    await nodes.startPlain({ dataDir: generatorDir, port: generatorPort });
    await nodes.waitUntilResponsive(generatorDir, undefined, config.timeouts.nodeStartSec);
    await nodes.createWallet(generatorDir, config.wallet.name);
    await nodes.generateBlocks(generatorDir, config.wallet.name, config.blocks.initialCount);

    await nodes.startWithFaultInjection({
      dataDir: victimDir,
      port: victimPort,
      rpcPort: victimRpcPort,
      connectTo: `${bindAddress}:${generatorPort}`,
      probability,
    });
    await nodes.waitUntilResponsive(victimDir, victimRpcPort, config.timeouts.nodeStartSec);

    if (config.metrics.enabled) {
      sampler.startSampling(GENERATOR, generatorDir, nodes, config.metrics.intervalSec);
      sampler.startSampling(VICTIM, victimDir, nodes, config.metrics.intervalSec, victimRpcPort);
    }
    if (config.monitor.port > 0) {
      server = await startMonitorServer(sampler, config.monitor.port, logger);
    }

    await nodes.generateBlocks(generatorDir, config.wallet.name, config.blocks.additionalCount);
    result.generatorHeight = await nodes.getBlockCount(generatorDir);
    result.victimHeight = await nodes.waitForBlockCount(
      victimDir,
      result.generatorHeight,
      config.timeouts.syncSec,
      victimRpcPort,
    );
    result.synced = true;
    logger.info(`Victim synced to height ${result.victimHeight}`);
  } catch (err) {
    logger.error(`Scenario failed: ${err instanceof Error ? err.message : String(err)}`);
    logger.info(await debugLogs.tail(victimDir));
    throw err;
  } finally {
    await teardown(harness, resultsDir, result, server);
  }

  return result;
}

async function teardown(
  harness: Harness,
  resultsDir: string,
  result: ScenarioResult,
  server: http.Server | undefined,
): Promise<void> {
  const { config, logger, nodes, sampler, debugLogs } = harness;
  const { generatorDir, victimDir } = config.directories;

  // Each step runs even when an earlier one failed; failures are logged.
  const step = async (label: string, fn: () => Promise<unknown>) => {
    try {
      await fn();
    } catch (err) {
      logger.error(`Teardown step "${label}" failed: ${String(err)}`);
    }
  };

  await step('stop metrics', () => sampler.stopAll());
  for (const name of [GENERATOR, VICTIM]) {
    if (!sampler.hasData(name)) continue;
    await step(`export ${name} metrics`, () =>
      sampler.exportToFile(name, path.join(resultsDir, `metrics_${name}.json`)),
    );
    const summary = sampler.getSummary(name);
    result.summaries[name] = summary;
    logger.info(`Metrics summary for ${name}`, { ...summary });
  }

  await step('copy generator debug.log', () =>
    debugLogs.copyTo(generatorDir, path.join(resultsDir, 'generator_debug.log')),
  );
  await step('copy victim debug.log', () =>
    debugLogs.copyTo(victimDir, path.join(resultsDir, 'victim_debug.log')),
  );

  await step('stop victim', () => nodes.stop(victimDir));
  await step('stop generator', () => nodes.stop(generatorDir));
  await step('wait for victim exit', () => nodes.waitForExit(victimDir));
  await step('wait for generator exit', () => nodes.waitForExit(generatorDir));

  if (server) {
    const running = server;
    await step('close monitor', () => stopMonitorServer(running));
  }
}

/** `low` / `high` pick the configured probabilities; anything else is read as a number. */
export function parseProbability(
  arg: string | undefined,
  faultInjection: HarnessConfig['faultInjection'],
): number | undefined {
  if (!arg) return undefined;
  if (arg === 'low') return faultInjection.probabilityLow;
  if (arg === 'high') return faultInjection.probabilityHigh;
  return Number(arg);
}

// usage: robustnessScenario [suiteName] [low|high|<probability>]
export async function main(): Promise<void> {
  const config = loadHarnessConfig();
  const harness = createHarness(config);
  const result = await runRobustnessScenario(harness, {
    suiteName: process.argv[2],
    probability: parseProbability(process.argv[3], config.faultInjection),
  });
  harness.logger.info(
    `Scenario finished: synced=${result.synced}, generator=${result.generatorHeight}, victim=${result.victimHeight}`,
  );
  harness.logger.info(`Results saved to ${result.resultsDir}`);
}

if (require.main === module) {
  main().catch(err => {
    console.error('[Scenario] Error:', err);
    process.exit(1);
  });
}

import { jest } from '@jest/globals';
import fs from 'fs-extra';
import path from 'node:path';
import { TransientLaunchError } from '../errors/CustomError';
import { createHarness } from '../harness';
import { parseProbability, runRobustnessScenario } from '../scripts/robustnessScenario';
import type { CommandRunner } from '../utils/commandRunner';
import type { Sleep } from '../utils/sleep';
import {
  cliCommand,
  createTestLogger,
  dataDirOf,
  errnoError,
  makeTempDir,
  messages,
  ok,
  testConfig,
  writePid,
} from './helpers';

/**
 * In-process stand-in for bitcoind, bitcoin-cli and fiu-run: a generator
 * that mines on demand and a victim that follows it instantly.
 */
function createFakeCluster(dirs: { generator: string; victim: string }, victimLaunchesToSurvive: number[]) {
  const alive = new Set<number>();
  let height = 0;
  let victimLaunches = 0;

  const run = jest.fn<CommandRunner['run']>(async (file, args) => {
    if (file.endsWith('bitcoind')) {
      await writePid(dirs.generator, 1001);
      await fs.outputFile(path.join(dirs.generator, 'regtest', 'debug.log'), 'UpdateTip: height=0\n');
      alive.add(1001);
      return ok();
    }
    if (file === 'fiu-run') {
      victimLaunches += 1;
      if (victimLaunchesToSurvive.includes(victimLaunches)) {
        await writePid(dirs.victim, 1002);
        alive.add(1002);
      }
      return ok();
    }

    const command = cliCommand(args);
    switch (command) {
      case 'getblockchaininfo':
        return ok(JSON.stringify({ chain: 'regtest', blocks: height }));
      case 'getpeerinfo':
        return ok(dataDirOf(args) === dirs.victim ? '[{"id":0}]' : '[]');
      case 'createwallet':
        return ok('{"name":"miner"}');
      case 'getnewaddress':
        return ok('bcrt1qminer');
      case 'generatetoaddress': {
        const count = Number(args[args.indexOf(command) + 1]);
        height += count;
        return ok(JSON.stringify(Array.from({ length: count }, (_, i) => `hash${height - count + i}`)));
      }
      case 'getblockcount':
        return ok(String(height));
      default:
        return { exitCode: 1, stdout: '', stderr: `unknown command ${command}` };
    }
  });

  const signalZero = (pid: number) => {
    if (!alive.has(pid)) throw errnoError('ESRCH');
  };
  const terminate = jest.fn((pid: number) => {
    alive.delete(pid);
  });

  return { run, signalZero, terminate, alive };
}

describe('runRobustnessScenario', () => {
  let root: string;
  let dirs: { generator: string; victim: string };
  const startedAt = new Date(Date.UTC(2024, 4, 6, 7, 8, 9));

  beforeEach(async () => {
    root = await makeTempDir('scenario-');
    dirs = { generator: path.join(root, 'gen'), victim: path.join(root, 'victim') };
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  const harnessFor = (cluster: ReturnType<typeof createFakeCluster>, env: Record<string, string> = {}) => {
    const log = createTestLogger();
    const clock = { ms: 0 };
    const sleep = jest.fn<Sleep>(async ms => {
      clock.ms += ms;
    });
    const config = testConfig({
      DEFAULT_GENERATOR_DIR: dirs.generator,
      DEFAULT_VICTIM_DIR: dirs.victim,
      RESULTS_DIR: path.join(root, 'results'),
      METRICS_COLLECTION_INTERVAL: '0.05',
      METRICS_PROCESS_STATS: 'false',
      ...env,
    });
    const harness = createHarness(config, {
      runner: { run: cluster.run },
      logger: log.logger,
      sleep,
      signalZero: cluster.signalZero,
      terminate: cluster.terminate,
      now: () => clock.ms,
    });
    return { harness, sleep, ...log };
  };

  it('syncs the victim through a transient fault-injected launch', async () => {
    const cluster = createFakeCluster(dirs, [2]);
    const { harness, sleep } = harnessFor(cluster);

    const result = await runRobustnessScenario(harness, { now: () => startedAt });

    const resultsDir = path.join(root, 'results', '2024-05-06-07-08-09', 'robustness');
    expect(result.resultsDir).toBe(resultsDir);
    expect(result.synced).toBe(true);
    expect(result.generatorHeight).toBe(160);
    expect(result.victimHeight).toBe(160);
    expect(sleep.mock.calls.filter(([ms]) => ms === 5000)).toHaveLength(1);

    expect(Object.keys(result.summaries).sort()).toEqual(['generator', 'victim']);
    await expect(fs.pathExists(path.join(resultsDir, 'metrics_generator.json'))).resolves.toBe(true);
    await expect(fs.pathExists(path.join(resultsDir, 'metrics_victim.json'))).resolves.toBe(true);
    await expect(fs.readFile(path.join(resultsDir, 'generator_debug.log'), 'utf8')).resolves.toBe(
      'UpdateTip: height=0\n',
    );
    await expect(fs.pathExists(path.join(resultsDir, 'victim_debug.log'))).resolves.toBe(false);

    expect(cluster.terminate.mock.calls).toEqual([[1002], [1001]]);
    expect(cluster.alive.size).toBe(0);
    expect(harness.sampler.listActiveSessions()).toEqual([]);
  });

  it('connects the victim to the generator on the configured ports', async () => {
    const cluster = createFakeCluster(dirs, [1]);
    const { harness } = harnessFor(cluster, { METRICS_ENABLED: 'false' });

    await runRobustnessScenario(harness, { now: () => startedAt, probability: 0.01 });

    const launch = cluster.run.mock.calls.find(([file]) => file === 'fiu-run');
    expect(launch?.[1]).toEqual(
      expect.arrayContaining([
        'enable_random name=posix/io/*,probability=0.01',
        `-datadir=${dirs.victim}`,
        '-port=18445',
        '-rpcport=18446',
        '-connect=127.0.0.1:18444',
      ]),
    );
  });

  it('tears everything down when the victim never stays up', async () => {
    const cluster = createFakeCluster(dirs, []);
    const { harness, error } = harnessFor(cluster, { FAULT_INJECTION_RETRY_MAX: '1' });

    await expect(
      runRobustnessScenario(harness, { now: () => startedAt }),
    ).rejects.toBeInstanceOf(TransientLaunchError);

    expect(messages(error)).toContain(
      'Scenario failed: Victim node exited shortly after start (likely due to fault injection)',
    );
    expect(cluster.terminate.mock.calls).toEqual([[1001]]);
    expect(harness.nodes.getState(dirs.generator)).toBe('stopped');
  });
});

describe('parseProbability', () => {
  const faultInjection = testConfig().faultInjection;

  it('maps named levels to the configured probabilities', () => {
    expect(parseProbability('low', faultInjection)).toBe(0.005);
    expect(parseProbability('high', faultInjection)).toBe(0.01);
  });

  it('reads other values as numbers and leaves a missing one unset', () => {
    expect(parseProbability('0.2', faultInjection)).toBe(0.2);
    expect(parseProbability(undefined, faultInjection)).toBeUndefined();
  });
});

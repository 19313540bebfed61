import { ConfigError } from 'App/errors/CustomError';
import { isConsoleLevel, type ConsoleLevel } from 'App/logger';
import * as dotenv from 'dotenv';
import path from 'path';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

type Env = Record<string, string | undefined>;

export interface RetryPolicy {
  maxRetries: number;
  /** Fixed delay between attempts. When omitted, a random 10–20 s delay is picked. */
  waitSeconds?: number;
}

export interface HarnessConfig {
  bitcoin: {
    version: string;
    binDir: string;
    bitcoindPath: string;
    bitcoinCliPath: string;
    fiuRunPath: string;
    network: string;
    pidFileName: string;
  };
  network: {
    generatorPort: number;
    victimPort: number;
    victimRpcPort: number;
    bindAddress: string;
  };
  timeouts: {
    nodeStartSec: number;
    nodeStopSec: number;
    blockGenerationSec: number;
    syncSec: number;
    commandSec: number;
  };
  settle: {
    startMs: number;
    faultStartMs: number;
    stopMs: number;
  };
  faultInjection: {
    probabilityLow: number;
    probabilityHigh: number;
    faultPattern: string;
    retry: RetryPolicy;
  };
  blocks: {
    initialCount: number;
    additionalCount: number;
  };
  metrics: {
    intervalSec: number;
    enabled: boolean;
    joinTimeoutSec: number;
    collectProcessStats: boolean;
  };
  directories: {
    generatorDir: string;
    victimDir: string;
    resultsDir: string;
  };
  wallet: {
    name: string;
  };
  logging: {
    logDir: string;
    consoleLevel: ConsoleLevel;
    debugLogTailLines: number;
  };
  monitor: {
    port: number;
  };
}

/* -------------------------------------------------------------------------------------------------
 * Env readers
 * ------------------------------------------------------------------------------------------------- */

export const getEnvVariable = (
  env: Env,
  key: string,
  defaultValue?: string,
): string => {
  const value = env[key];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigError(key, `Missing environment variable: ${key}`);
  }
  return value;
};

export const getNumberVariable = (
  env: Env,
  key: string,
  defaultValue: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER, integer = false } = {},
): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new ConfigError(key, `${key} must be a${integer ? 'n integer' : ' number'}, got "${raw}"`);
  }
  if (value < min || value > max) {
    throw new ConfigError(key, `${key} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
};

export const getBooleanVariable = (
  env: Env,
  key: string,
  defaultValue: boolean,
): boolean => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigError(key, `${key} must be a boolean, got "${raw}"`);
};

/* -------------------------------------------------------------------------------------------------
 * Loader
 * ------------------------------------------------------------------------------------------------- */

const PORT_RANGE = { min: 1, max: 65535, integer: true };
const PROBABILITY_RANGE = { min: 0, max: 1 };
const COUNT = { integer: true };

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object') deepFreeze(nested);
  }
  return Object.freeze(value);
}

/**
 * Reads the whole harness configuration once. Components receive the
 * resulting struct (or the section they need) through their constructors.
 */
export function loadHarnessConfig(env: Env = process.env): Readonly<HarnessConfig> {
  const version = getEnvVariable(env, 'BITCOIN_VERSION', '30.2');
  const binDir = getEnvVariable(env, 'BITCOIN_BIN_DIR', path.join(`bitcoin-${version}`, 'bin'));
  const consoleLevel = getEnvVariable(env, 'LOG_LEVEL_CONSOLE', 'info').toLowerCase();
  if (!isConsoleLevel(consoleLevel)) {
    throw new ConfigError('LOG_LEVEL_CONSOLE', `Unknown console log level: ${consoleLevel}`);
  }

  const config: HarnessConfig = {
    bitcoin: {
      version,
      binDir,
      bitcoindPath: getEnvVariable(env, 'BITCOIND_PATH', path.join(binDir, 'bitcoind')),
      bitcoinCliPath: getEnvVariable(env, 'BITCOIN_CLI_PATH', path.join(binDir, 'bitcoin-cli')),
      fiuRunPath: getEnvVariable(env, 'FIU_RUN_PATH', 'fiu-run'),
      network: getEnvVariable(env, 'BITCOIN_NETWORK', 'regtest'),
      pidFileName: getEnvVariable(env, 'BITCOIN_PID_FILE', 'bitcoind.pid'),
    },
    network: {
      generatorPort: getNumberVariable(env, 'DEFAULT_GENERATOR_PORT', 18444, PORT_RANGE),
      victimPort: getNumberVariable(env, 'DEFAULT_VICTIM_PORT', 18445, PORT_RANGE),
      victimRpcPort: getNumberVariable(env, 'DEFAULT_VICTIM_RPC_PORT', 18446, PORT_RANGE),
      bindAddress: getEnvVariable(env, 'DEFAULT_BIND_ADDRESS', '127.0.0.1'),
    },
    timeouts: {
      nodeStartSec: getNumberVariable(env, 'NODE_START_TIMEOUT', 30, COUNT),
      nodeStopSec: getNumberVariable(env, 'NODE_STOP_TIMEOUT', 10, COUNT),
      blockGenerationSec: getNumberVariable(env, 'BLOCK_GENERATION_TIMEOUT', 60, COUNT),
      syncSec: getNumberVariable(env, 'SYNC_TIMEOUT', 120, COUNT),
      commandSec: getNumberVariable(env, 'COMMAND_TIMEOUT', 10, COUNT),
    },
    settle: {
      startMs: getNumberVariable(env, 'NODE_START_SETTLE_MS', 2000, COUNT),
      faultStartMs: getNumberVariable(env, 'FAULT_START_SETTLE_MS', 3000, COUNT),
      stopMs: getNumberVariable(env, 'NODE_STOP_SETTLE_MS', 1000, COUNT),
    },
    faultInjection: {
      probabilityLow: getNumberVariable(env, 'DEFAULT_FAULT_PROBABILITY_LOW', 0.005, PROBABILITY_RANGE),
      probabilityHigh: getNumberVariable(env, 'DEFAULT_FAULT_PROBABILITY_HIGH', 0.01, PROBABILITY_RANGE),
      faultPattern: getEnvVariable(env, 'FAULT_PATTERN', 'posix/io/*'),
      retry: {
        maxRetries: getNumberVariable(env, 'FAULT_INJECTION_RETRY_MAX', 3, COUNT),
        waitSeconds: getNumberVariable(env, 'FAULT_INJECTION_RETRY_WAIT', 5),
      },
    },
    blocks: {
      initialCount: getNumberVariable(env, 'INITIAL_BLOCK_COUNT', 150, COUNT),
      additionalCount: getNumberVariable(env, 'ADDITIONAL_BLOCK_COUNT', 10, COUNT),
    },
    metrics: {
      intervalSec: getNumberVariable(env, 'METRICS_COLLECTION_INTERVAL', 10, { min: 0.01 }),
      enabled: getBooleanVariable(env, 'METRICS_ENABLED', true),
      joinTimeoutSec: getNumberVariable(env, 'METRICS_JOIN_TIMEOUT', 5),
      collectProcessStats: getBooleanVariable(env, 'METRICS_PROCESS_STATS', true),
    },
    directories: {
      generatorDir: getEnvVariable(env, 'DEFAULT_GENERATOR_DIR', '/tmp/node_generator'),
      victimDir: getEnvVariable(env, 'DEFAULT_VICTIM_DIR', '/tmp/node_victim'),
      resultsDir: getEnvVariable(env, 'RESULTS_DIR', 'results'),
    },
    wallet: {
      name: getEnvVariable(env, 'DEFAULT_WALLET_NAME', 'miner'),
    },
    logging: {
      logDir: getEnvVariable(env, 'LOG_DIR', path.join('results', 'logs')),
      consoleLevel,
      debugLogTailLines: getNumberVariable(env, 'DEBUG_LOG_TAIL_LINES', 50, COUNT),
    },
    monitor: {
      port: getNumberVariable(env, 'MONITOR_PORT', 0, { min: 0, max: 65535, integer: true }),
    },
  };

  return deepFreeze(config);
}

import {
  DEFAULT_LISTENING_DURATION_MS,
  DEFAULT_LOOKBACK_MS,
  DEFAULT_OBSERVATION_MAX_AGE_MS,
  DEFAULT_OBSERVATION_MAX_ENTRIES,
  DEFAULT_PATH_BYTES_PER_HOP,
  MAX_REPLY_LENGTH,
  PathwatchError,
} from 'pathwatch';

export interface BotConfig {
  listeningDurationMs: number;
  lookbackMs: number;
  /** How long heard frames stay in the observation buffer */
  observationMaxAgeMs: number;
  observationMaxEntries: number;
  maxReplyLength: number;
  txCooldownMs: number;
  pathBytesPerHop: 1 | 2;
}

export const DEFAULT_BOT_CONFIG: BotConfig = {
  listeningDurationMs: DEFAULT_LISTENING_DURATION_MS,
  lookbackMs: DEFAULT_LOOKBACK_MS,
  observationMaxAgeMs: DEFAULT_OBSERVATION_MAX_AGE_MS,
  observationMaxEntries: DEFAULT_OBSERVATION_MAX_ENTRIES,
  maxReplyLength: MAX_REPLY_LENGTH,
  txCooldownMs: 1000,
  pathBytesPerHop: DEFAULT_PATH_BYTES_PER_HOP,
};

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const value = env[name];
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new PathwatchError('INVALID_CONFIG', `${name} must be an integer >= ${min}, got "${value}"`, {
      name,
      value,
    });
  }
  return parsed;
}

function readBytesPerHop(env: Env, fallback: 1 | 2): 1 | 2 {
  const value = readInteger(env, 'PATHWATCH_PATH_BYTES_PER_HOP', fallback, 1);
  if (value === 1 || value === 2) return value;
  throw new PathwatchError('INVALID_CONFIG', `PATHWATCH_PATH_BYTES_PER_HOP must be 1 or 2, got "${value}"`, {
    name: 'PATHWATCH_PATH_BYTES_PER_HOP',
    value,
  });
}

/**
 * Bot settings from environment variables, falling back to defaults.
 * @throws PathwatchError INVALID_CONFIG on malformed or out-of-range values
 */
export function loadBotConfig(env: Env = process.env): BotConfig {
  const config: BotConfig = {
    listeningDurationMs: readInteger(env, 'PATHWATCH_LISTEN_MS', DEFAULT_BOT_CONFIG.listeningDurationMs, 1),
    lookbackMs: readInteger(env, 'PATHWATCH_LOOKBACK_MS', DEFAULT_BOT_CONFIG.lookbackMs, 0),
    observationMaxAgeMs: readInteger(env, 'PATHWATCH_RF_TIMEOUT_MS', DEFAULT_BOT_CONFIG.observationMaxAgeMs, 1),
    observationMaxEntries: readInteger(env, 'PATHWATCH_BUFFER_SIZE', DEFAULT_BOT_CONFIG.observationMaxEntries, 1),
    maxReplyLength: readInteger(env, 'PATHWATCH_MAX_REPLY_LENGTH', DEFAULT_BOT_CONFIG.maxReplyLength, 20),
    txCooldownMs: readInteger(env, 'PATHWATCH_TX_COOLDOWN_MS', DEFAULT_BOT_CONFIG.txCooldownMs, 0),
    pathBytesPerHop: readBytesPerHop(env, DEFAULT_BOT_CONFIG.pathBytesPerHop),
  };

  // The closing scan reads the buffer back to startedAt - lookbackMs.
  if (config.observationMaxAgeMs < config.listeningDurationMs + config.lookbackMs) {
    throw new PathwatchError(
      'INVALID_CONFIG',
      'PATHWATCH_RF_TIMEOUT_MS must cover PATHWATCH_LISTEN_MS plus PATHWATCH_LOOKBACK_MS',
      { observationMaxAgeMs: config.observationMaxAgeMs },
    );
  }
  return config;
}

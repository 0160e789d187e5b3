import { ConfigurationError, isLogLevel, type LogLevel } from '@nfse-reader/shared';

/**
 * Settings of one batch run
 */
export interface BatchConfig {
  /** Number of files processed at the same time */
  concurrency: number;
  /** Files larger than this fail with IoError without being read */
  maxFileBytes: number;
  /** Whether symbolic links inside directories are followed */
  followSymlinks: boolean;
  /** Directory nesting levels visited below each entry */
  maxDepth: number;
  /** Minimum level written to stderr */
  logLevel: LogLevel;
}

/**
 * Default batch configuration.
 */
export const DEFAULT_BATCH_CONFIG: Readonly<BatchConfig> = Object.freeze({
  concurrency: 4,
  maxFileBytes: 10 * 1024 * 1024, // 10MB
  followSymlinks: true,
  maxDepth: 32,
  logLevel: 'warn',
});

/**
 * Environment variables read by `configFromEnv`
 */
export const CONFIG_ENV_VARS = {
  concurrency: 'NFSE_READER_CONCURRENCY',
  maxFileBytes: 'NFSE_READER_MAX_FILE_BYTES',
  logLevel: 'NFSE_READER_LOG_LEVEL',
  followSymlinks: 'NFSE_READER_FOLLOW_SYMLINKS',
} as const;

/**
 * Effective configuration result.
 */
export interface EffectiveConfig {
  /** Merged configuration */
  config: BatchConfig;
  /** Sources that contributed to this config */
  sources: ('default' | 'env' | 'cli')[];
}

function parseInteger(name: string, raw: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`, { name });
  }
  return Number(raw.trim());
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${name} must be true or false, got "${raw}"`, { name });
  }
}

/**
 * Read batch settings from environment variables.
 * Unset or empty variables contribute nothing.
 *
 * @throws ConfigurationError when a set variable cannot be parsed
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BatchConfig> {
  const config: Partial<BatchConfig> = {};

  const concurrency = env[CONFIG_ENV_VARS.concurrency];
  if (concurrency) {
    config.concurrency = parseInteger(CONFIG_ENV_VARS.concurrency, concurrency);
  }

  const maxFileBytes = env[CONFIG_ENV_VARS.maxFileBytes];
  if (maxFileBytes) {
    config.maxFileBytes = parseInteger(CONFIG_ENV_VARS.maxFileBytes, maxFileBytes);
  }

  const logLevel = env[CONFIG_ENV_VARS.logLevel];
  if (logLevel) {
    const level = logLevel.trim().toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`${CONFIG_ENV_VARS.logLevel} must be one of debug, info, warn, error`, {
        name: CONFIG_ENV_VARS.logLevel,
      });
    }
    config.logLevel = level;
  }

  const followSymlinks = env[CONFIG_ENV_VARS.followSymlinks];
  if (followSymlinks) {
    config.followSymlinks = parseBoolean(CONFIG_ENV_VARS.followSymlinks, followSymlinks);
  }

  return config;
}

function applyLayer(merged: BatchConfig, layer: Partial<BatchConfig>): void {
  if (layer.concurrency !== undefined) {
    merged.concurrency = layer.concurrency;
  }
  if (layer.maxFileBytes !== undefined) {
    merged.maxFileBytes = layer.maxFileBytes;
  }
  if (layer.followSymlinks !== undefined) {
    merged.followSymlinks = layer.followSymlinks;
  }
  if (layer.maxDepth !== undefined) {
    merged.maxDepth = layer.maxDepth;
  }
  if (layer.logLevel !== undefined) {
    merged.logLevel = layer.logLevel;
  }
}

/**
 * Check the ranges of a merged configuration.
 *
 * @throws ConfigurationError naming the first invalid setting
 */
export function validateBatchConfig(config: BatchConfig): void {
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    throw new ConfigurationError(`concurrency must be an integer >= 1, got ${config.concurrency}`, {
      setting: 'concurrency',
    });
  }
  if (!Number.isInteger(config.maxFileBytes) || config.maxFileBytes < 1) {
    throw new ConfigurationError(`maxFileBytes must be an integer >= 1, got ${config.maxFileBytes}`, {
      setting: 'maxFileBytes',
    });
  }
  if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
    throw new ConfigurationError(`maxDepth must be an integer >= 0, got ${config.maxDepth}`, {
      setting: 'maxDepth',
    });
  }
}

/**
 * Build effective configuration by merging:
 * 1. System defaults
 * 2. Environment configuration (if provided)
 * 3. Command-line overrides (if provided)
 *
 * The merge follows precedence: cli > env > system defaults.
 *
 * @param envConfig - Settings read by `configFromEnv` (optional)
 * @param cliOverrides - Settings given as flags (optional)
 * @returns Merged, validated configuration and the layers that contributed
 * @throws ConfigurationError when a merged setting is out of range
 */
export function buildEffectiveConfig(
  envConfig?: Partial<BatchConfig>,
  cliOverrides?: Partial<BatchConfig>,
): EffectiveConfig {
  const sources: EffectiveConfig['sources'] = ['default'];
  const merged: BatchConfig = { ...DEFAULT_BATCH_CONFIG };

  if (envConfig && Object.keys(envConfig).length > 0) {
    sources.push('env');
    applyLayer(merged, envConfig);
  }

  if (cliOverrides && Object.keys(cliOverrides).length > 0) {
    sources.push('cli');
    applyLayer(merged, cliOverrides);
  }

  validateBatchConfig(merged);

  return { config: merged, sources };
}

import { ConfigurationError } from '../../shared/errors/AppError';

/**
 * Tuning surface of the download governor. Delays are in seconds.
 */
export interface GovernorConfig {
  maxWorkers: number;
  initialWorkers: number;
  minDelay: number;
  maxDelay: number;
  initialDelay: number;
  maxRetries: number;
  cacheTTLSeconds: number;
  cacheCapacity: number;
}

export const DEFAULT_GOVERNOR_CONFIG: Readonly<GovernorConfig> = {
  maxWorkers: 8,
  initialWorkers: 4,
  minDelay: 0.1,
  maxDelay: 3.0,
  initialDelay: 0.5,
  maxRetries: 3,
  cacheTTLSeconds: 300,
  cacheCapacity: 100
};

export const WORKER_LIMITS = {
  maxWorkers: { min: 1, max: 32 },
  initialWorkers: { min: 1, max: 16 }
} as const;

/**
 * Merge overrides onto the defaults and validate the result.
 * Out-of-range values raise ConfigurationError instead of being clamped.
 */
export function resolveGovernorConfig(overrides: Partial<GovernorConfig> = {}): GovernorConfig {
  const defaults = DEFAULT_GOVERNOR_CONFIG;
  const maxWorkers = overrides.maxWorkers ?? defaults.maxWorkers;
  const minDelay = overrides.minDelay ?? defaults.minDelay;
  const maxDelay = overrides.maxDelay ?? defaults.maxDelay;

  // Derived defaults follow the explicit bounds; explicit values are checked below.
  const config: GovernorConfig = {
    maxWorkers,
    initialWorkers: overrides.initialWorkers ?? Math.min(defaults.initialWorkers, maxWorkers),
    minDelay,
    maxDelay,
    initialDelay: overrides.initialDelay ?? Math.min(Math.max(defaults.initialDelay, minDelay), maxDelay),
    maxRetries: overrides.maxRetries ?? defaults.maxRetries,
    cacheTTLSeconds: overrides.cacheTTLSeconds ?? defaults.cacheTTLSeconds,
    cacheCapacity: overrides.cacheCapacity ?? defaults.cacheCapacity
  };

  validateGovernorConfig(config);
  return config;
}

export function validateGovernorConfig(config: GovernorConfig): void {
  requireIntegerInRange(config.maxWorkers, 'maxWorkers', WORKER_LIMITS.maxWorkers);
  requireIntegerInRange(config.initialWorkers, 'initialWorkers', WORKER_LIMITS.initialWorkers);

  if (config.initialWorkers > config.maxWorkers) {
    throw new ConfigurationError(
      `initialWorkers (${config.initialWorkers}) cannot exceed maxWorkers (${config.maxWorkers})`,
      'initialWorkers'
    );
  }

  requireFinite(config.minDelay, 'minDelay');
  requireFinite(config.maxDelay, 'maxDelay');
  requireFinite(config.initialDelay, 'initialDelay');

  if (config.minDelay < 0) {
    throw new ConfigurationError(`minDelay must be non-negative, got: ${config.minDelay}`, 'minDelay');
  }
  if (config.maxDelay < config.minDelay) {
    throw new ConfigurationError(
      `maxDelay (${config.maxDelay}) must not be below minDelay (${config.minDelay})`,
      'maxDelay'
    );
  }
  if (config.initialDelay < config.minDelay || config.initialDelay > config.maxDelay) {
    throw new ConfigurationError(
      `initialDelay must lie within [${config.minDelay}, ${config.maxDelay}], got: ${config.initialDelay}`,
      'initialDelay'
    );
  }

  requireIntegerInRange(config.maxRetries, 'maxRetries', { min: 1, max: Number.MAX_SAFE_INTEGER });

  requireFinite(config.cacheTTLSeconds, 'cacheTTLSeconds');
  if (config.cacheTTLSeconds <= 0) {
    throw new ConfigurationError(
      `cacheTTLSeconds must be positive, got: ${config.cacheTTLSeconds}`,
      'cacheTTLSeconds'
    );
  }

  requireIntegerInRange(config.cacheCapacity, 'cacheCapacity', { min: 2, max: Number.MAX_SAFE_INTEGER });
}

function requireFinite(value: number, field: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${field} must be a finite number, got: ${value}`, field);
  }
}

function requireIntegerInRange(
  value: number,
  field: string,
  range: { min: number; max: number }
): void {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigurationError(
      `${field} must be an integer in [${range.min}, ${range.max}], got: ${value}`,
      field
    );
  }
}

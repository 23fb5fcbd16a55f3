/// <reference types="node" />
import { z } from 'zod';
import { isLogLevel, LogLevel } from '../utils/logger';

// =============================================================================
// DISPATCH CONFIGURATION
// =============================================================================

export const DispatchConfigSchema = z.object({
  /** Search radius when neither the query nor the worker profile gives one */
  defaultSearchRadiusKm: z.number().positive(),

  /** Upper bound applied to every radius, whatever its source */
  maxSearchRadiusKm: z.number().positive(),

  /** Distance limit for a customer's worker search that gives none */
  workerSearchRadiusKm: z.number().positive(),

  /** How many of the newest requests the admin dashboard lists */
  recentRequestsLimit: z.number().int().nonnegative(),

  /** How many workers the "top workers" leaderboard shows */
  topWorkersLimit: z.number().int().nonnegative(),

  defaultEstimatedDurationMinutes: z.number().int().positive()
}).refine(c => c.defaultSearchRadiusKm <= c.maxSearchRadiusKm, {
  message: 'defaultSearchRadiusKm must not exceed maxSearchRadiusKm',
  path: ['defaultSearchRadiusKm']
});

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

export const DEFAULT_CONFIG: DispatchConfig = {
  defaultSearchRadiusKm: 20,
  maxSearchRadiusKm: 100,
  workerSearchRadiusKm: 50,
  recentRequestsLimit: 10,
  topWorkersLimit: 5,
  defaultEstimatedDurationMinutes: 60
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws if the merged configuration is inconsistent.
 */
export function resolveDispatchConfig(overrides: Partial<DispatchConfig> = {}): DispatchConfig {
  const merged = { ...DEFAULT_CONFIG, ...overrides };
  const parsed = DispatchConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid dispatch configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Clamp a requested search radius into the configured bounds.
 */
export function effectiveRadius(config: DispatchConfig, ...candidates: Array<number | undefined>): number {
  const requested = candidates.find((r): r is number => r !== undefined && r > 0);
  return Math.min(requested ?? config.defaultSearchRadiusKm, config.maxSearchRadiusKm);
}

// =============================================================================
// ENVIRONMENT CONFIGURATION
// =============================================================================

export interface EnvironmentConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  googleMapsApiKey: string;
  allowedOrigins: string[];
  dispatch: DispatchConfig;
}

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const nodeEnv = parseNodeEnv(env.NODE_ENV);
  const logLevel = env.LOG_LEVEL;
  const overrides: Partial<DispatchConfig> = {};

  const defaultRadius = parseOptionalNumber(env.DISPATCH_DEFAULT_RADIUS_KM);
  if (defaultRadius !== undefined) overrides.defaultSearchRadiusKm = defaultRadius;

  const maxRadius = parseOptionalNumber(env.DISPATCH_MAX_RADIUS_KM);
  if (maxRadius !== undefined) overrides.maxSearchRadiusKm = maxRadius;

  return {
    port: parseInt(env.PORT || '3001', 10),
    nodeEnv,
    logLevel: isLogLevel(logLevel) ? logLevel : nodeEnv === 'development' ? 'debug' : 'info',
    googleMapsApiKey: env.GOOGLE_MAPS_API_KEY || '',
    allowedOrigins: (env.ALLOWED_ORIGINS || 'http://localhost:5173').split(',').map(o => o.trim()),
    dispatch: resolveDispatchConfig(overrides)
  };
}

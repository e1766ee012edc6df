/**
 * Configuration Service
 *
 * Manages application configuration stored in ~/.libris/config.json
 * Holds thumbnail, cache, network and backfill tuning.
 *
 * Values in the file are merged over the defaults and validated with zod.
 * A handful of environment variables override the file without being persisted.
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { z } from 'zod';
import { getConfigPath, ensureAppDirectories } from './app-paths.service.js';
import { logError, logWarn } from './logger.service.js';
import { CoverError } from '../types/errors.js';

// =============================================================================
// Schema
// =============================================================================

const ThumbnailSettingsSchema = z.object({
  /** Longest edge of a synced thumbnail, in pixels */
  maxPixelDimension: z.number().int().min(16).max(4096),
  /** Lossy quality for synced thumbnails (0-1) */
  quality: z.number().gt(0).max(1),
  /** Lossy quality for full-resolution user photos (0-1) */
  fullResolutionQuality: z.number().gt(0).max(1),
  /** Thumbnails whose longest edge is below this are refreshed in the background */
  lowResolutionFloor: z.number().int().min(1),
});

const CacheSettingsSchema = z.object({
  /** Byte budget of the in-memory image cache */
  memoryMaxBytes: z.number().int().min(0),
  /** Entry ceiling of the in-memory image cache */
  memoryMaxEntries: z.number().int().min(1),
  /** Maximum size in MB of the on-disk cover cache */
  diskMaxSizeMb: z.number().int().min(1),
});

const NetworkSettingsSchema = z.object({
  requestTimeoutMs: z.number().int().min(100),
  userAgent: z.string().min(1),
});

const BackfillSettingsSchema = z.object({
  /** Books processed between pauses */
  batchSize: z.number().int().min(1),
  /** Pause between batches */
  batchDelayMs: z.number().int().min(0),
  /** Start a library backfill when the server boots */
  runOnStartup: z.boolean(),
});

const DisplaySettingsSchema = z.object({
  /** Surfaces whose longer side reaches this prefer the full-resolution user photo */
  fullResolutionMinSide: z.number().int().min(1),
  /** Longest edge of covers resolved for large display surfaces */
  maxPixelDimension: z.number().int().min(16).max(8192),
});

const ServerSettingsSchema = z.object({
  port: z.number().int().min(0).max(65535),
});

export const AppConfigSchema = z.object({
  version: z.string(),
  thumbnail: ThumbnailSettingsSchema,
  cache: CacheSettingsSchema,
  network: NetworkSettingsSchema,
  backfill: BackfillSettingsSchema,
  display: DisplaySettingsSchema,
  server: ServerSettingsSchema,
});

// =============================================================================
// Type Definitions
// =============================================================================

export type ThumbnailSettings = z.infer<typeof ThumbnailSettingsSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
export type NetworkSettings = z.infer<typeof NetworkSettingsSchema>;
export type BackfillSettings = z.infer<typeof BackfillSettingsSchema>;
export type DisplaySettings = z.infer<typeof DisplaySettingsSchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface ConfigUpdate {
  thumbnail?: Partial<ThumbnailSettings>;
  cache?: Partial<CacheSettings>;
  network?: Partial<NetworkSettings>;
  backfill?: Partial<BackfillSettings>;
  display?: Partial<DisplaySettings>;
  server?: Partial<ServerSettings>;
}

// =============================================================================
// Default Configuration
// =============================================================================

export const DEFAULT_CONFIG: AppConfig = {
  version: '1.0.0',
  thumbnail: {
    maxPixelDimension: 600,
    quality: 0.82,
    fullResolutionQuality: 0.95,
    lowResolutionFloor: 420,
  },
  cache: {
    memoryMaxBytes: 64 * 1024 * 1024,
    memoryMaxEntries: 300,
    diskMaxSizeMb: 200,
  },
  network: {
    requestTimeoutMs: 15_000,
    userAgent: 'Libris/1.0',
  },
  backfill: {
    batchSize: 6,
    batchDelayMs: 120,
    runOnStartup: true,
  },
  display: {
    fullResolutionMinSide: 110,
    maxPixelDimension: 1200,
  },
  server: {
    port: 3011,
  },
};

// =============================================================================
// Configuration State
// =============================================================================

let cachedConfig: AppConfig | null = null;

// =============================================================================
// Core Functions
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/**
 * Merge a parsed config file over the defaults, section by section.
 */
export function mergeWithDefaults(parsed: unknown): AppConfig {
  const source = isRecord(parsed) ? parsed : {};
  const merged = {
    version: typeof source.version === 'string' ? source.version : DEFAULT_CONFIG.version,
    thumbnail: { ...DEFAULT_CONFIG.thumbnail, ...section(source, 'thumbnail') },
    cache: { ...DEFAULT_CONFIG.cache, ...section(source, 'cache') },
    network: { ...DEFAULT_CONFIG.network, ...section(source, 'network') },
    backfill: { ...DEFAULT_CONFIG.backfill, ...section(source, 'backfill') },
    display: { ...DEFAULT_CONFIG.display, ...section(source, 'display') },
    server: { ...DEFAULT_CONFIG.server, ...section(source, 'server') },
  };

  const result = AppConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new CoverError('INVALID_CONFIG', 'Configuration file contains invalid values', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}

function readIntegerEnv(name: string): number | undefined {
  const raw = process.env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logWarn('config', `Ignoring ${name}: expected a positive integer`, { value: raw });
    return undefined;
  }
  return value;
}

/**
 * Apply environment overrides. Overrides are never written back to disk.
 */
function applyEnvOverrides(config: AppConfig): AppConfig {
  const port = readIntegerEnv('PORT');
  const maxPixel = readIntegerEnv('LIBRIS_THUMBNAIL_MAX_PX');
  const lowResFloor = readIntegerEnv('LIBRIS_LOW_RES_FLOOR');

  return {
    ...config,
    thumbnail: {
      ...config.thumbnail,
      maxPixelDimension: maxPixel ?? config.thumbnail.maxPixelDimension,
      lowResolutionFloor: lowResFloor ?? config.thumbnail.lowResolutionFloor,
    },
    server: {
      ...config.server,
      port: port ?? config.server.port,
    },
  };
}

function readConfigFile(): AppConfig {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    // Create default config if it doesn't exist
    const defaults = structuredClone(DEFAULT_CONFIG);
    saveConfig(defaults);
    return defaults;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    return mergeWithDefaults(JSON.parse(content));
  } catch (error) {
    logError('config', error, { action: 'load-config', path: configPath });
    return structuredClone(DEFAULT_CONFIG);
  }
}

/**
 * Load configuration from disk
 * Returns cached config if available
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = applyEnvOverrides(readConfigFile());
  return cachedConfig;
}

/**
 * Save configuration to disk
 */
export function saveConfig(config: AppConfig): void {
  ensureAppDirectories();
  const configPath = getConfigPath();

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
    cachedConfig = null;
  } catch (error) {
    logError('config', error, { action: 'save-config' });
    throw new CoverError('STORAGE_FAILED', `Failed to save configuration: ${String(error)}`);
  }
}

/**
 * Update specific configuration values
 */
export function updateConfig(updates: ConfigUpdate): AppConfig {
  const current = readConfigFile();
  const updated = mergeWithDefaults({
    version: current.version,
    thumbnail: { ...current.thumbnail, ...updates.thumbnail },
    cache: { ...current.cache, ...updates.cache },
    network: { ...current.network, ...updates.network },
    backfill: { ...current.backfill, ...updates.backfill },
    display: { ...current.display, ...updates.display },
    server: { ...current.server, ...updates.server },
  });
  saveConfig(updated);
  return loadConfig();
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

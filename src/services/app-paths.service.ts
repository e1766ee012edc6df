/**
 * Application Paths Service
 *
 * Manages the ~/.libris/ application data directory structure.
 * All application state (book records, config, caches, user photos) is stored here.
 * Set LIBRIS_DATA_DIR to relocate it.
 */

import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';

// Application data root directory
const APP_DIR_NAME = '.libris';

/**
 * Get the application data directory path
 * Default: ~/.libris/
 */
export function getAppDataDir(): string {
  const override = process.env.LIBRIS_DATA_DIR?.trim();
  if (override) {
    return override;
  }
  return join(homedir(), APP_DIR_NAME);
}

/**
 * Get the path to the book record store
 */
export function getLibraryStorePath(): string {
  return join(getAppDataDir(), 'library.json');
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
  return join(getAppDataDir(), 'config.json');
}

/**
 * Get the path to the cache directory
 */
export function getCacheDir(): string {
  return join(getAppDataDir(), 'cache');
}

/**
 * Get the path to the remote cover byte cache.
 * Local-only: never synced, safe to delete at any time.
 */
export function getCoverCacheDir(): string {
  return join(getCacheDir(), 'cover-cache');
}

/**
 * Get the path to the full-resolution user photo directory.
 * This is user data, not cache.
 */
export function getUserCoversDir(): string {
  return join(getAppDataDir(), 'user-covers');
}

/**
 * Ensure all application directories exist
 * Creates the directory structure if it doesn't exist
 */
export function ensureAppDirectories(): void {
  const directories = [
    getAppDataDir(),
    getCacheDir(),
    getCoverCacheDir(),
    getUserCoversDir(),
  ];

  for (const dir of directories) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

/**
 * Get all application paths for debugging/logging
 */
export function getAllPaths(): Record<string, string> {
  return {
    appDataDir: getAppDataDir(),
    library: getLibraryStorePath(),
    config: getConfigPath(),
    cache: getCacheDir(),
    coverCache: getCoverCacheDir(),
    userCovers: getUserCoversDir(),
  };
}

/**
 * Configuration Service
 *
 * Loads scanner settings from ~/.series-scanner/config.json.
 * Missing or invalid files fall back to defaults; environment variables win
 * over the file.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { getConfigPath } from './app-paths.service.js';
import { configLogger as logger, errorMessage } from './logger.service.js';

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_IGNORE_FILE_NAME = '.scanignore';
export const DEFAULT_EXCLUDED_DIRECTORIES = ['@eaDir', '__MACOSX', '.DS_Store'];

const ScannerSettingsSchema = z.object({
  /** Name of the per-folder ignore-rules file */
  ignoreFileName: z.string().min(1).default(DEFAULT_IGNORE_FILE_NAME),
  /** Worker pool size for file parsing; auto-detected when unset */
  concurrency: z.number().int().min(1).max(64).optional(),
  /** Folder names never descended into */
  excludedDirectories: z.array(z.string().min(1)).default(DEFAULT_EXCLUDED_DIRECTORIES),
});

const ParserSettingsSchema = z.object({
  /** Extra volume patterns; a `volume` named group or the first group is the volume */
  volumePatterns: z.array(z.string()).default([]),
  /** Extra series patterns; a `series` named group or the first group is the series */
  seriesPatterns: z.array(z.string()).default([]),
});

export const AppConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  scanner: ScannerSettingsSchema.default({}),
  parser: ParserSettingsSchema.default({}),
});

export type ScannerSettings = z.infer<typeof ScannerSettingsSchema>;
export type ParserSettings = z.infer<typeof ParserSettingsSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// =============================================================================
// Configuration State
// =============================================================================

let cachedConfig: AppConfig | null = null;

function defaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

function applyEnvironment(config: AppConfig): AppConfig {
  const raw = process.env.SCANNER_CONCURRENCY;
  if (!raw) return config;

  const concurrency = parseInt(raw, 10);
  if (isNaN(concurrency) || concurrency < 1) {
    logger.warn({ value: raw }, 'Ignoring invalid SCANNER_CONCURRENCY');
    return config;
  }

  return { ...config, scanner: { ...config.scanner, concurrency } };
}

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Load configuration from disk
 * Returns cached config if available
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    cachedConfig = applyEnvironment(defaultConfig());
    return cachedConfig;
  }

  try {
    const content = readFileSync(configPath, 'utf-8');
    const result = AppConfigSchema.safeParse(JSON.parse(content));

    if (!result.success) {
      logger.error(
        { configPath, issues: result.error.issues },
        'Invalid configuration file, using defaults'
      );
      cachedConfig = applyEnvironment(defaultConfig());
      return cachedConfig;
    }

    cachedConfig = applyEnvironment(result.data);
    return cachedConfig;
  } catch (error) {
    logger.error({ configPath, error: errorMessage(error) }, 'Failed to load configuration');
    cachedConfig = applyEnvironment(defaultConfig());
    return cachedConfig;
  }
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

export function getScannerSettings(): ScannerSettings {
  return loadConfig().scanner;
}

export function getParserSettings(): ParserSettings {
  return loadConfig().parser;
}

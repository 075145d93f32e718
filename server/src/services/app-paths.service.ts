/**
 * Application Paths Service
 *
 * Manages the ~/.series-scanner/ application data directory.
 * The location can be moved with SERIES_SCANNER_HOME.
 */

import { homedir } from 'os';
import { join, resolve } from 'path';

// Application data root directory
const APP_DIR_NAME = '.series-scanner';

/**
 * Get the application data directory path
 * Default: ~/.series-scanner/
 */
export function getAppDataDir(): string {
  const override = process.env.SERIES_SCANNER_HOME;
  if (override) {
    return resolve(override);
  }
  return join(homedir(), APP_DIR_NAME);
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
  return join(getAppDataDir(), 'config.json');
}

/**
 * @fileoverview Resolves the filesystem path of Zotero's zotero.sqlite
 *
 * Explicit configuration is authoritative: a configured path that does not
 * exist fails immediately instead of falling through to auto-detection.
 * Auto-detection then walks every known platform location.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DatabaseNotFoundError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';

export const DATABASE_FILENAME = 'zotero.sqlite';
export const DATABASE_PATH_VARIABLE = 'ZOTERO_DATABASE_PATH';
export const DATA_DIR_VARIABLE = 'ZOTERO_DATA_DIR';

export interface DatabaseLocatorOptions {
  /** Value of ZOTERO_DATABASE_PATH */
  databasePath?: string;
  /** Value of ZOTERO_DATA_DIR */
  dataDir?: string;
  /** Value of %APPDATA% (Windows only) */
  appDataDir?: string;
  platform?: NodeJS.Platform;
  homeDir?: string;
}

function isExistingPath(candidate: string): boolean {
  try {
    return fs.existsSync(candidate);
  } catch {
    return false;
  }
}

/**
 * Legacy (Zotero 6 and earlier) Linux profiles live in
 * ~/.zotero/zotero/<profile>/zotero.sqlite.
 */
function listLegacyProfileCandidates(homeDir: string): string[] {
  const profilesRoot = path.join(homeDir, '.zotero', 'zotero');
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(profilesRoot, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(profilesRoot, entry.name, DATABASE_FILENAME));
}

/**
 * Platform search locations in priority order. Existence is not checked.
 */
export function listCandidatePaths(options: DatabaseLocatorOptions = {}): string[] {
  const homeDir = options.homeDir ?? os.homedir();
  const platform = options.platform ?? process.platform;

  // Zotero 7+ default, all platforms
  const candidates = [path.join(homeDir, 'Zotero', DATABASE_FILENAME)];

  if (platform === 'win32') {
    if (options.appDataDir) {
      candidates.push(path.join(options.appDataDir, 'Zotero', 'Zotero', DATABASE_FILENAME));
    }
  } else if (platform === 'linux') {
    candidates.push(...listLegacyProfileCandidates(homeDir));
    candidates.push(path.join(homeDir, 'snap', 'zotero-snap', 'common', 'Zotero', DATABASE_FILENAME));
    candidates.push(path.join(homeDir, '.var', 'app', 'org.zotero.Zotero', 'data', 'zotero', DATABASE_FILENAME));
  }

  return candidates;
}

/**
 * @throws DatabaseNotFoundError naming the override variable when an explicit
 * setting points nowhere, or listing every searched path otherwise
 */
export function locateDatabase(options: DatabaseLocatorOptions = {}): string {
  if (options.databasePath) {
    if (isExistingPath(options.databasePath)) {
      return options.databasePath;
    }
    throw new DatabaseNotFoundError(
      `${DATABASE_PATH_VARIABLE} set but file not found: ${options.databasePath}`,
      [options.databasePath],
      DATABASE_PATH_VARIABLE
    );
  }

  if (options.dataDir) {
    const candidate = path.join(options.dataDir, DATABASE_FILENAME);
    if (isExistingPath(candidate)) {
      return candidate;
    }
    throw new DatabaseNotFoundError(
      `${DATA_DIR_VARIABLE} set but database not found: ${candidate}`,
      [candidate],
      DATA_DIR_VARIABLE
    );
  }

  const candidates = listCandidatePaths(options);
  for (const candidate of candidates) {
    if (isExistingPath(candidate)) {
      logDebug('[zotero-db] located database', { path: candidate });
      return candidate;
    }
  }

  const searched = candidates.map((candidate) => `  - ${candidate}`).join('\n');
  throw new DatabaseNotFoundError(
    `Zotero database not found. Searched locations:\n${searched}\n` +
      `Set ${DATA_DIR_VARIABLE} or ${DATABASE_PATH_VARIABLE} environment variable to specify a custom location.`,
    candidates
  );
}

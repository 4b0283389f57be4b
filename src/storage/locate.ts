import { existsSync, readdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Group container of the desktop client (App Store build)
 */
export const DEFAULT_CONTAINER_PATH = join(
  homedir(),
  'Library',
  'Group Containers',
  '6N38VWS5BX.ru.keepcoder.Telegram'
);

export const KEY_FILE_NAME = '.tempkeyEncrypted';

const VARIANTS = ['appstore', ''];

/**
 * fs error codes for a directory that is missing, not a directory or not readable
 */
const UNREADABLE_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM']);

function isUnreadable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && UNREADABLE_CODES.has(String(error.code));
}

/**
 * Sorted `account-*` entries of `base`; none when `base` cannot be listed
 */
function accountEntries(base: string): string[] {
  try {
    return readdirSync(base)
      .filter((name) => name.startsWith('account-'))
      .sort();
  } catch (error) {
    if (isUnreadable(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Container root: config, then $CHAT_ARCHIVE_CONTAINER, then the default
 */
export function resolveContainerPath(configured?: string): string {
  return configured ?? process.env['CHAT_ARCHIVE_CONTAINER'] ?? DEFAULT_CONTAINER_PATH;
}

/**
 * Find the encrypted store under `account-*` directories of the container.
 * Returns null if none exists.
 */
export function findDatabasePath(containerPath: string): string | null {
  for (const variant of VARIANTS) {
    const base = variant ? join(containerPath, variant) : containerPath;
    for (const account of accountEntries(base)) {
      const dbPath = join(base, account, 'postbox', 'db', 'db_sqlite');
      if (existsSync(dbPath)) {
        return dbPath;
      }
    }
  }
  return null;
}

/**
 * Find the wrapped key file in the container. Returns null if none exists.
 */
export function findKeyPath(containerPath: string): string | null {
  for (const variant of VARIANTS) {
    const base = variant ? join(containerPath, variant) : containerPath;
    const keyPath = join(base, KEY_FILE_NAME);
    if (existsSync(keyPath)) {
      return keyPath;
    }
  }
  return null;
}

/**
 * Token Storage Utility
 *
 * Token file operations for the B2C OAuth client.
 * The file holds the token set as JSON, readable by the owner only.
 */

import * as fs from 'node:fs';
import type { TokenSet } from './flameconnect-types';
import { TokenSetSchema } from './flameconnect-schemas';

/** File permissions: owner read/write only */
const TOKEN_FILE_MODE = 0o600;

/**
 * Load a token set from a file.
 * A missing, unreadable or malformed file yields null; the cause goes to onError.
 */
export function loadTokenFromFile(filePath: string, onError?: (error: Error) => void): TokenSet | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    const result = TokenSetSchema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }
    onError?.(new Error(`Token file ${filePath} has an invalid structure`));
  } catch (error) {
    onError?.(error instanceof Error ? error : new Error(String(error)));
  }
  return null;
}

/**
 * Save a token set to a file with restricted permissions.
 */
export function saveTokenToFile(filePath: string, tokenSet: TokenSet): void {
  fs.writeFileSync(
    filePath,
    JSON.stringify(tokenSet, null, 2),
    { encoding: 'utf8', mode: TOKEN_FILE_MODE },
  );
}

/**
 * Delete a token file if it exists.
 */
export function deleteTokenFile(filePath: string): void {
  if (fs.existsSync(filePath)) {
    fs.unlinkSync(filePath);
  }
}

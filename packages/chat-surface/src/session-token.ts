/**
 * Session token file
 *
 * The saved browser storage state (cookies and local storage) that lets a
 * run skip the login page. Its content is opaque; it only counts as present
 * when it parses and holds at least one cookie.
 */

import { existsSync, readFileSync, rmSync } from 'fs';
import { z } from 'zod';

const StorageStateSchema = z.object({
  cookies: z.array(z.unknown()),
});

export const DEFAULT_SESSION_PATH = '.session-state.json';

/**
 * Check if session file exists and is valid
 */
export function hasValidSession(sessionPath: string = DEFAULT_SESSION_PATH): boolean {
  if (!existsSync(sessionPath)) {
    return false;
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(sessionPath, 'utf-8'));
  } catch {
    return false;
  }

  const parsed = StorageStateSchema.safeParse(data);
  return parsed.success && parsed.data.cookies.length > 0;
}

export class SessionTokenStore {
  constructor(readonly path: string = DEFAULT_SESSION_PATH) {}

  present(): boolean {
    return hasValidSession(this.path);
  }

  /** Forget the saved session */
  clear(): void {
    rmSync(this.path, { force: true });
  }
}

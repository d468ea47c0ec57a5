import { rename } from 'node:fs/promises';
import type { ClaimStrategy } from './types.js';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Whether an error means "no such file or directory" */
export function isNotFoundError(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT';
}

/**
 * Claim by renaming the draft into the inbox.
 *
 * Only one rename of the same source can succeed on storage with atomic
 * rename; the losers see ENOENT.
 */
export class RenameClaimStrategy implements ClaimStrategy {
  async claim(draftPath: string, inboxPath: string): Promise<boolean> {
    try {
      await rename(draftPath, inboxPath);
      return true;
    } catch (err) {
      if (isNotFoundError(err)) {
        return false;
      }
      throw err;
    }
  }
}

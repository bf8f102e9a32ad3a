/**
 * Atomic file write utilities.
 *
 * Writes to a `.tmp` sibling first, then renames into place.  If the
 * process crashes mid-write, the original file is untouched.
 */

import * as fs from 'fs';

// ---------------------------------------------------------------------------
// File sets
// ---------------------------------------------------------------------------

export interface PendingWrite {
  filePath: string;
  data: string;
}

/**
 * Replace a group of files so that readers see either all of the old
 * contents or all of the new ones.
 *
 * Every file is staged as `.tmp` before anything at a final path changes.
 * Existing targets are copied to `.bak` and renamed back if a later rename in
 * the group fails. Staging files are removed on every path out; backups are
 * removed unless restoring one of them failed, in which case they stay on disk.
 */
export async function atomicWriteFiles(writes: readonly PendingWrite[]): Promise<void> {
  const staged: string[] = [];
  const backups = new Map<string, string>();
  const committed: string[] = [];
  let keepBackups = false;

  try {
    for (const { filePath, data } of writes) {
      const tmp = filePath + '.tmp';
      staged.push(tmp);
      await fs.promises.writeFile(tmp, data, 'utf-8');
    }

    for (const { filePath } of writes) {
      if (await exists(filePath)) {
        const bak = filePath + '.bak';
        await fs.promises.copyFile(filePath, bak);
        backups.set(filePath, bak);
      }
    }

    for (const { filePath } of writes) {
      await fs.promises.rename(filePath + '.tmp', filePath);
      committed.push(filePath);
    }
  } catch (err) {
    try {
      await rollback(committed, backups);
    } catch (restoreErr) {
      keepBackups = true;
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`${reason} (restoring previous files failed, backups kept as .bak)`, { cause: restoreErr });
    }
    throw err;
  } finally {
    for (const tmp of staged) await removeQuietly(tmp);
    if (!keepBackups) {
      for (const bak of backups.values()) await removeQuietly(bak);
    }
  }
}

/** Put committed files back: rename each backup over it, or remove a file that did not exist before. */
async function rollback(committed: readonly string[], backups: Map<string, string>): Promise<void> {
  for (const filePath of committed) {
    const bak = backups.get(filePath);
    if (bak) {
      await fs.promises.rename(bak, filePath);
      backups.delete(filePath);
    } else {
      await removeQuietly(filePath);
    }
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.promises.unlink(filePath);
  } catch {
    /* ignore cleanup failure: the file was already renamed or never written */
  }
}

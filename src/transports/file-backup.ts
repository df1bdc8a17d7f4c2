/**
 * Numbered backup rotation: `name` becomes `name.1`, `name.1` becomes
 * `name.2` and so on. The oldest slot beyond the limit is deleted.
 */

import fs from 'node:fs';
import path from 'node:path';
import { backupFileName } from './file-policies.js';

function backupPath(filePath: string, index: number): string {
  return path.join(path.dirname(filePath), backupFileName(path.basename(filePath), index));
}

/**
 * Move `filePath` into backup slot 1, shifting older backups up.
 *
 * @param maxBackups - Number of slots to keep, 0 to keep every backup
 * @throws If a delete or rename fails; `filePath` is renamed last, so it
 *         stays in place on failure
 */
export function rotateBackups(filePath: string, maxBackups: number): void {
  let highest: number;

  if (maxBackups > 0) {
    const oldest = backupPath(filePath, maxBackups);
    if (fs.existsSync(oldest)) {
      fs.unlinkSync(oldest);
    }
    highest = maxBackups - 1;
  } else {
    highest = 0;
    while (fs.existsSync(backupPath(filePath, highest + 1))) {
      highest++;
    }
  }

  for (let index = highest; index > 0; index--) {
    const from = backupPath(filePath, index);
    if (fs.existsSync(from)) {
      fs.renameSync(from, backupPath(filePath, index + 1));
    }
  }

  fs.renameSync(filePath, backupPath(filePath, 1));
}

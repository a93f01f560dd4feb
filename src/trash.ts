import trash from 'trash';
import { TrashError } from './errors.js';
import { describeError, logger } from './logger.js';
import type { ProjectItem } from './types.js';

export interface TrashBin {
  send(target: string): Promise<void>;
}

export const systemTrash: TrashBin = {
  async send(target: string): Promise<void> {
    await trash(target, { glob: false });
  },
};

/**
 * Send each item to the trash in order. The first failure aborts the rest.
 * Returns how many items were trashed.
 */
export async function deleteToTrash(items: readonly ProjectItem[], bin: TrashBin = systemTrash): Promise<number> {
  let trashed = 0;

  for (const item of items) {
    try {
      await bin.send(item.path);
    } catch (error) {
      throw new TrashError(item.path, describeError(error));
    }
    trashed += 1;
    logger.info(`Moved to trash: ${item.path}`, undefined, 'Trash');
  }

  return trashed;
}

import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { createWriteError, type WriteError } from '../core/errors.js';
import { VIEWS_DIR } from '../core/tables.js';

import type { ArtifactStore } from '../core/ports.js';
import type { ArtifactFile, PublishSummary } from '../core/types.js';

export interface FsArtifactStoreOptions {
  rootDir: string;
}

const TEMP_SUFFIX = '.tmp';
const BACKUP_SUFFIX = '.bak';

interface StagedFile {
  path: string;
  temp: string;
  target: string;
  backup: string | null;
}

const removeQuietly = async (filePath: string): Promise<void> => {
  await fs.rm(filePath, { force: true });
};

const isExistingFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

/**
 * Puts back the files an interrupted commit already replaced.
 */
const rollBack = async (committed: readonly StagedFile[]): Promise<void> => {
  for (const entry of [...committed].reverse()) {
    if (entry.backup === null) {
      await removeQuietly(entry.target);
    } else {
      await fs.rename(entry.backup, entry.target);
    }
  }
};

/**
 * Writes every file beside its target first and renames only once all
 * writes have succeeded. Replaced files are kept as backups until the whole
 * set is in place, so a failed run leaves the previous set in place.
 */
export const createFsArtifactStore = (options: FsArtifactStoreOptions): ArtifactStore => {
  const resolve = (relativePath: string): string =>
    path.join(options.rootDir, ...relativePath.split('/'));

  const removeStaleViews = async (published: ReadonlySet<string>): Promise<string[]> => {
    const viewsDir = path.join(options.rootDir, VIEWS_DIR);
    const names = await fs.readdir(viewsDir);
    const removed: string[] = [];

    for (const name of names.sort()) {
      const relativePath = `${VIEWS_DIR}/${name}`;
      if (!name.endsWith('.json') || published.has(relativePath)) continue;
      await fs.rm(path.join(viewsDir, name), { force: true });
      removed.push(relativePath);
    }

    return removed;
  };

  return {
    async publish(files: readonly ArtifactFile[]): Promise<Result<PublishSummary, WriteError>> {
      try {
        await fs.mkdir(path.join(options.rootDir, VIEWS_DIR), { recursive: true });
      } catch (error) {
        return err(
          createWriteError(
            options.rootDir,
            `Failed to prepare output directory ${options.rootDir}: ${(error as Error).message}`,
            error
          )
        );
      }

      const staged: StagedFile[] = [];

      for (const file of files) {
        const target = resolve(file.path);
        const temp = `${target}${TEMP_SUFFIX}`;
        staged.push({ path: file.path, temp, target, backup: null });

        try {
          await fs.writeFile(temp, file.contents, 'utf8');
        } catch (error) {
          await Promise.all(staged.map((entry) => removeQuietly(entry.temp)));
          return err(
            createWriteError(
              file.path,
              `Failed to write ${file.path}: ${(error as Error).message}`,
              error
            )
          );
        }
      }

      const committed: StagedFile[] = [];

      for (const [index, entry] of staged.entries()) {
        try {
          if (await isExistingFile(entry.target)) {
            const backup = `${entry.target}${BACKUP_SUFFIX}`;
            await fs.rename(entry.target, backup);
            entry.backup = backup;
          }
          await fs.rename(entry.temp, entry.target);
          committed.push(entry);
        } catch (error) {
          await Promise.all(staged.slice(index).map((pending) => removeQuietly(pending.temp)));
          try {
            await rollBack(entry.backup === null ? committed : [...committed, entry]);
          } catch (rollBackError) {
            return err(
              createWriteError(
                entry.path,
                `Failed to restore the previous output after ${entry.path} failed: ${(rollBackError as Error).message}`,
                rollBackError
              )
            );
          }
          return err(
            createWriteError(
              entry.path,
              `Failed to replace ${entry.path}: ${(error as Error).message}`,
              error
            )
          );
        }
      }

      await Promise.all(
        committed.map((entry) =>
          entry.backup === null ? Promise.resolve() : removeQuietly(entry.backup)
        )
      );

      const written = files.map((file) => file.path);
      let removed: string[];
      try {
        removed = await removeStaleViews(new Set(written));
      } catch (error) {
        return err(
          createWriteError(
            VIEWS_DIR,
            `Failed to clean up stale views: ${(error as Error).message}`,
            error
          )
        );
      }

      return ok({ written, removed });
    },
  };
};

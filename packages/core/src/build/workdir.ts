/**
 * Scoped working directory
 *
 * The directory exists only for the duration of the callback and is removed
 * with everything in it once the callback settles, whether it resolved or threw.
 */

import { copyFile, mkdir, rename, rm, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ArtifactError, errorCode, errorMessage } from '../utils/errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';

export async function withWorkDir<T>(
  dir: string,
  fn: (dir: string) => Promise<T>,
  logger: Logger = silentLogger
): Promise<T> {
  await mkdir(dir, { recursive: true });
  logger.debug(`Created working directory ${dir}`);

  let result: T;
  try {
    result = await fn(dir);
  } catch (error) {
    // Keep the original failure; a cleanup problem here is only reported
    try {
      await rm(dir, { recursive: true, force: true });
      logger.debug(`Removed working directory ${dir}`);
    } catch (cleanupError) {
      logger.warn(`Failed to remove working directory ${dir}: ${errorMessage(cleanupError)}`);
    }
    throw error;
  }

  await rm(dir, { recursive: true, force: true });
  logger.debug(`Removed working directory ${dir}`);
  return result;
}

/**
 * Move the engine's output to its final location
 *
 * Falls back to copy + unlink when source and destination are on different devices.
 */
export async function moveArtifact(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true });

  try {
    await rename(from, to);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new ArtifactError(`Engine did not produce ${from}`, from, { cause: error });
    }
    if (code !== 'EXDEV') {
      throw error;
    }
    await copyFile(from, to);
    await unlink(from);
  }
}

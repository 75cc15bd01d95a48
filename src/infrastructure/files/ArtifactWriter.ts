import { createWriteStream } from 'fs';
import { rename, rm } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { FileOperationError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('ArtifactWriter');

async function removeTemporary(tmpPath: string): Promise<void> {
  try {
    await rm(tmpPath, { force: true });
  } catch (error) {
    logger.warn(`Could not remove ${tmpPath}`, error);
  }
}

/**
 * Write a stream to `<targetPath>.tmp` and rename it into place once the stream
 * is drained and the file closed. On any failure the temporary file is removed
 * and nothing appears under `targetPath`.
 */
export async function writeArtifact(source: NodeJS.ReadableStream, targetPath: string): Promise<void> {
  const tmpPath = `${targetPath}.tmp`;

  try {
    await pipeline(source, createWriteStream(tmpPath));
  } catch (error) {
    await removeTemporary(tmpPath);
    throw new FileOperationError('write', tmpPath, error);
  }

  try {
    await rename(tmpPath, targetPath);
  } catch (error) {
    await removeTemporary(tmpPath);
    throw new FileOperationError('rename', tmpPath, error);
  }

  logger.debug(`Saved ${targetPath}`);
}

import { unlink } from 'fs/promises';
import { join } from 'path';
import type { Logger, MediaToolkit } from '@threadcast/shared';
import { errorMessage } from '@threadcast/shared';
import { chunkText } from './chunker.js';

export interface SplitOptions {
  workDir: string;
  /** Output is written to `<unitId>.mp3`, chunks to `<unitId>-<n>.part.mp3`. */
  unitId: string;
  maxChars: number;
  /** Gap inserted between consecutive chunks, in seconds. */
  silenceDuration: number;
}

export interface SplitDeps {
  media: MediaToolkit;
  logger: Logger;
  prepareText: (text: string) => Promise<string>;
  synthesize: (text: string, outputPath: string) => Promise<void>;
}

/**
 * Narrate text longer than the engine limit: synthesize each chunk, join the
 * chunks with silence in between, and remove the intermediates.
 * Returns the joined file, or null when every chunk was blank.
 */
export async function splitLongText(
  text: string,
  options: SplitOptions,
  deps: SplitDeps,
): Promise<string | null> {
  const { workDir, unitId, maxChars, silenceDuration } = options;
  const { media, logger } = deps;
  const chunks = chunkText(text, maxChars);
  const outputPath = join(workDir, `${unitId}.mp3`);
  const parts: string[] = [];
  const intermediates: string[] = [];

  try {
    for (const [idy, chunk] of chunks.entries()) {
      const prepared = await deps.prepareText(chunk);
      if (!prepared.trim()) {
        logger.warn({ unitId, chunk: idy }, 'Chunk is blank after sanitizing, skipping');
        continue;
      }

      const partPath = join(workDir, `${unitId}-${idy}.part.mp3`);
      intermediates.push(partPath);
      await deps.synthesize(prepared, partPath);
      parts.push(partPath);
    }

    if (parts.length === 0) {
      logger.warn({ unitId, chunks: chunks.length }, 'No speakable chunks, nothing to join');
      return null;
    }

    let inputs = parts;
    if (parts.length > 1 && silenceDuration > 0) {
      const silencePath = join(workDir, `${unitId}-silence.mp3`);
      intermediates.push(silencePath);
      await media.createSilence(silencePath, silenceDuration);
      inputs = interleave(parts, silencePath);
    }

    const listPath = join(workDir, `${unitId}-list.txt`);
    intermediates.push(listPath);
    await media.concat(inputs, outputPath, listPath);

    logger.debug({ unitId, chunks: chunks.length, parts: parts.length }, 'Joined split narration');
    return outputPath;
  } finally {
    await removeIntermediates(intermediates, logger);
  }
}

/** [a, b, c] with s → [a, s, b, s, c] */
export function interleave<T>(items: T[], separator: T): T[] {
  return items.flatMap((item, i) => (i === 0 ? [item] : [separator, item]));
}

async function removeIntermediates(files: string[], logger: Logger): Promise<void> {
  for (const file of files) {
    try {
      await unlink(file);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        logger.warn({ file }, 'Intermediate file not found');
      } else {
        logger.warn({ file, error: errorMessage(err) }, 'Could not remove intermediate file');
      }
    }
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

import { stat } from 'fs/promises';
import type { DurationMeasurement, Logger, MediaToolkit } from '@threadcast/shared';
import { errorMessage } from '@threadcast/shared';

export const WORDS_PER_MINUTE = 150;

/** Reading-rate estimate, never below one second. */
export function estimateSpeechDuration(text: string, speed = 1.0): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.max(1, ((words / WORDS_PER_MINUTE) * 60) / speed);
}

/**
 * Measure a synthesized clip: container probe, then a full decode, then a
 * word-count estimate. A file that was never written is unmeasured.
 */
export async function measureClipDuration(
  filePath: string,
  text: string,
  media: MediaToolkit,
  logger: Logger,
): Promise<DurationMeasurement> {
  if (!(await fileExists(filePath))) {
    logger.error({ file: filePath }, 'Clip was not written, duration unknown');
    return { kind: 'unmeasured' };
  }

  try {
    const seconds = await media.probeDuration(filePath);
    if (seconds > 0) {
      logger.debug({ file: filePath, seconds }, 'Probed clip duration');
      return { kind: 'measured', seconds, method: 'probe' };
    }
  } catch (err) {
    logger.warn({ file: filePath, error: errorMessage(err) }, 'Probe failed, decoding clip');
  }

  try {
    const seconds = await media.decodeDuration(filePath);
    if (seconds > 0) {
      logger.debug({ file: filePath, seconds }, 'Decoded clip duration');
      return { kind: 'measured', seconds, method: 'decode' };
    }
  } catch (err) {
    logger.error({ file: filePath, error: errorMessage(err) }, 'Decode failed, estimating from text');
  }

  const seconds = estimateSpeechDuration(text);
  logger.warn({ file: filePath, seconds }, 'Using estimated clip duration');
  return { kind: 'estimated', seconds };
}

export function measuredSeconds(measurement: DurationMeasurement): number {
  return measurement.kind === 'unmeasured' ? 0 : measurement.seconds;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

import { mkdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import type {
  BackgroundKind,
  BackgroundSource,
  ExtractionStrategy,
  Logger,
  MediaToolkit,
  SelectedWindow,
} from '@threadcast/shared';
import {
  BackgroundExtractionError,
  BackgroundNotFoundError,
  BackgroundProbeError,
  BackgroundTooShortError,
  documentWorkDir,
  errorMessage,
  forDocument,
} from '@threadcast/shared';
import { resolveBackgroundPath } from './catalog.js';
import { getStartAndEndTimes } from './window.js';

/** Seconds of source needed beyond the narration before a window is attempted. */
export const SOURCE_HEADROOM = 2;

const VIDEO_STRATEGIES: ExtractionStrategy[] = ['fast', 'tolerant'];

export interface ChopperOptions {
  tempDir: string;
  assetsDir: string;
  /** Mix level of the background audio. 0 disables it. */
  audioVolume: number;
}

export interface ChopperDeps {
  media: MediaToolkit;
  logger: Logger;
  random?: () => number;
}

export interface ChopSelection {
  video: BackgroundSource;
  audio: BackgroundSource;
}

export interface AudioChop {
  path: string;
  /** Null when the output is a silent placeholder. */
  window: SelectedWindow | null;
  placeholder: boolean;
  volume: number;
}

export interface ChopResult {
  video: { path: string; window: SelectedWindow; strategy: ExtractionStrategy };
  /** Null when background audio is disabled. */
  audio: AudioChop | null;
  credit: string;
}

/** Cuts random windows of the requested length out of the background sources. */
export class BackgroundChopper {
  constructor(
    private options: ChopperOptions,
    private deps: ChopperDeps,
  ) {}

  async chop(documentId: string, duration: number, selection: ChopSelection): Promise<ChopResult> {
    const workDir = documentWorkDir(this.options.tempDir, documentId);
    await mkdir(workDir, { recursive: true });
    const logger = forDocument(this.deps.logger, documentId);

    const audio = await this.chopAudio(join(workDir, 'background.mp3'), duration, selection.audio, logger);
    const video = await this.chopVideo(join(workDir, 'background.mp4'), duration, selection.video, logger);

    logger.info(
      { duration, video: selection.video.key, audio: audio ? selection.audio.key : null, placeholder: audio?.placeholder },
      'Background video chopped',
    );
    return { video, audio, credit: selection.video.credit };
  }

  private async chopAudio(
    outputPath: string,
    duration: number,
    source: BackgroundSource,
    logger: Logger,
  ): Promise<AudioChop | null> {
    const { media } = this.deps;
    const volume = this.options.audioVolume;

    if (volume === 0) {
      logger.info('Background audio volume is 0, skipping audio');
      return null;
    }

    let sourcePath: string;
    try {
      sourcePath = await resolveBackgroundPath(this.options.assetsDir, 'audio', source, duration);
    } catch (err) {
      if (!(err instanceof BackgroundNotFoundError)) throw err;
      logger.warn({ source: err.source, error: err.message }, 'Background audio missing, using silence');
      return this.silentAudio(outputPath, duration, volume, logger);
    }

    let length: number;
    try {
      length = await media.probeDuration(sourcePath);
    } catch (err) {
      logger.warn({ source: sourcePath, error: errorMessage(err) }, 'Could not read background audio, using silence');
      return this.silentAudio(outputPath, duration, volume, logger);
    }

    if (length < duration + SOURCE_HEADROOM) {
      logger.warn({ source: sourcePath, length, duration }, 'Background audio too short, using silence');
      return this.silentAudio(outputPath, duration, volume, logger);
    }

    const window = this.selectWindow(duration, length, sourcePath, 'audio', logger);
    try {
      await media.extractWindow(sourcePath, window.start, window.end - window.start, outputPath, 'fast', 'audio');
    } catch (err) {
      logger.warn({ source: sourcePath, error: errorMessage(err) }, 'Audio extraction failed, using silence');
      return this.silentAudio(outputPath, duration, volume, logger);
    }

    if (!(await nonEmptyFile(outputPath))) {
      logger.warn({ output: outputPath }, 'Audio extraction produced no output, using silence');
      return this.silentAudio(outputPath, duration, volume, logger);
    }

    return { path: outputPath, window, placeholder: false, volume };
  }

  private async silentAudio(outputPath: string, duration: number, volume: number, logger: Logger): Promise<AudioChop> {
    await this.deps.media.createSilence(outputPath, duration);
    logger.debug({ output: outputPath, duration }, 'Wrote silent background audio');
    return { path: outputPath, window: null, placeholder: true, volume };
  }

  private async chopVideo(
    outputPath: string,
    duration: number,
    source: BackgroundSource,
    logger: Logger,
  ): Promise<ChopResult['video']> {
    const { media } = this.deps;
    const sourcePath = await resolveBackgroundPath(this.options.assetsDir, 'video', source, duration);

    let length: number;
    try {
      length = await media.probeDuration(sourcePath);
    } catch (err) {
      throw new BackgroundProbeError(sourcePath, duration, 'video', errorMessage(err));
    }
    if (length < duration + SOURCE_HEADROOM) {
      throw new BackgroundTooShortError(sourcePath, duration, length, 'video');
    }

    const window = this.selectWindow(duration, length, sourcePath, 'video', logger);
    const attempts: string[] = [];

    for (const strategy of VIDEO_STRATEGIES) {
      try {
        await media.extractWindow(sourcePath, window.start, window.end - window.start, outputPath, strategy, 'video');
        await this.verifyVideo(outputPath);
        logger.debug({ output: outputPath, strategy }, 'Video window extracted');
        return { path: outputPath, window, strategy };
      } catch (err) {
        attempts.push(`${strategy}: ${errorMessage(err)}`);
        logger.warn({ source: sourcePath, strategy, error: errorMessage(err) }, 'Video extraction attempt failed');
      }
    }

    await rm(outputPath, { force: true });
    throw new BackgroundExtractionError(sourcePath, duration, 'video', attempts);
  }

  private async verifyVideo(outputPath: string): Promise<void> {
    if (!(await nonEmptyFile(outputPath))) {
      throw new Error('output file is missing or empty');
    }
    const seconds = await this.deps.media.probeDuration(outputPath);
    if (!(seconds > 0)) {
      throw new Error(`output probes to ${seconds}s`);
    }
  }

  private selectWindow(
    duration: number,
    length: number,
    source: string,
    kind: BackgroundKind,
    logger: Logger,
  ): SelectedWindow {
    const window = getStartAndEndTimes(duration, length, { random: this.deps.random, source, kind });
    if (window.degraded) {
      logger.warn({ source, kind, length, duration, ...window }, 'Background window shorter than requested');
    } else {
      logger.debug({ source, kind, start: window.start, end: window.end }, 'Selected background window');
    }
    return window;
  }
}

async function nonEmptyFile(filePath: string): Promise<boolean> {
  return stat(filePath).then(
    (s) => s.isFile() && s.size > 0,
    () => false,
  );
}

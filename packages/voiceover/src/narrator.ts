import { mkdir } from 'fs/promises';
import { basename, join } from 'path';
import type {
  Logger,
  MediaToolkit,
  NarrationDocument,
  NarrationResult,
  Translator,
  VoiceProvider,
} from '@threadcast/shared';
import { documentWorkDir, forDocument, isRetryableError, withRetry } from '@threadcast/shared';
import { normalizeNarrationText, sanitizeSpeechText } from './normalize.js';
import { splitLongText } from './splitter.js';
import { measureClipDuration, measuredSeconds } from './duration.js';
import { RunningBudget } from './budget.js';

export interface NarratorOptions {
  /** Root of per-document working directories. */
  tempDir: string;
  /** Budget in seconds. Comments stop being added once the total passes it. */
  maxLength: number;
  storyMode: boolean;
  /** 0: one story body. 1: the body arrives as a list of parts. */
  storyModeMethod: number;
  silenceDuration: number;
  randomVoice: boolean;
  /** Language code to translate into before synthesis; empty to keep the thread's language. */
  postLang?: string;
  retryDelayMs?: number;
}

export interface NarratorDeps {
  provider: VoiceProvider;
  media: MediaToolkit;
  logger: Logger;
  translator?: Translator;
}

/** Turns a thread into one speech clip per unit, honoring the total length budget. */
export class Narrator {
  constructor(
    private options: NarratorOptions,
    private deps: NarratorDeps,
  ) {}

  /** Directory the clips of a document are written to. */
  workDirFor(documentId: string): string {
    return join(documentWorkDir(this.options.tempDir, documentId), 'mp3');
  }

  async run(document: NarrationDocument): Promise<NarrationResult> {
    const workDir = this.workDirFor(document.id);
    await mkdir(workDir, { recursive: true });

    const run = new NarrationRun(workDir, this.options, {
      ...this.deps,
      logger: forDocument(this.deps.logger, document.id),
    });
    const result = await run.narrate(document);

    this.deps.logger.info(
      {
        documentId: document.id,
        totalDuration: Number(result.totalDuration.toFixed(3)),
        segments: result.segments.length,
        commentCount: result.commentCount,
      },
      'Narration saved',
    );
    return result;
  }
}

/** State of a single document's narration. Owns the budget for that run only. */
class NarrationRun {
  private budget = new RunningBudget();

  constructor(
    private workDir: string,
    private options: NarratorOptions,
    private deps: NarratorDeps,
  ) {}

  async narrate(document: NarrationDocument): Promise<NarrationResult> {
    await this.speakUnit('title', document.title);

    const commentCount = this.options.storyMode
      ? await this.narrateStory(document.post)
      : await this.narrateComments(document);

    return {
      totalDuration: this.budget.totalDuration,
      commentCount,
      segments: this.budget.segments,
    };
  }

  private async narrateStory(post: string | string[]): Promise<number> {
    if (this.options.storyModeMethod === 0) {
      const body = Array.isArray(post) ? post.join(' ') : post;
      await this.speakUnit('postaudio', body);
      return 1;
    }

    const parts = Array.isArray(post) ? post : [post];
    for (const [i, part] of parts.entries()) {
      await this.speakUnit(`postaudio-${i}`, part);
    }
    return parts.length;
  }

  private async narrateComments(document: NarrationDocument): Promise<number> {
    const { comments } = document;
    const { logger } = this.deps;
    let idx = 0;

    for (; idx < comments.length; idx++) {
      // Budget is first checked once two comments are spoken; rollback drops the second
      if (this.budget.exceeds(this.options.maxLength) && idx > 1) {
        const dropped = this.budget.rollback();
        idx -= 1;
        logger.info(
          { droppedSegment: dropped?.id, droppedDuration: dropped?.duration, kept: idx },
          'Narration budget exceeded, stopping',
        );
        break;
      }
      await this.speakUnit(String(idx), comments[idx].body);
    }

    return idx;
  }

  /** Synthesize one unit and commit exactly one segment for it. */
  private async speakUnit(unitId: string, rawText: string): Promise<void> {
    const { provider, media, logger } = this.deps;
    const text = normalizeNarrationText(rawText);
    const outputPath = join(this.workDir, `${unitId}.mp3`);

    let produced: string | null;
    if (text.length > provider.maxChars) {
      produced = await splitLongText(
        text,
        {
          workDir: this.workDir,
          unitId,
          maxChars: provider.maxChars,
          silenceDuration: this.options.silenceDuration,
        },
        {
          media,
          logger,
          prepareText: (chunk) => this.prepareText(chunk),
          synthesize: (chunk, path) => this.synthesize(chunk, path),
        },
      );
    } else {
      const prepared = await this.prepareText(text);
      if (prepared.trim()) {
        await this.synthesize(prepared, outputPath);
        produced = outputPath;
      } else {
        logger.warn({ unitId }, 'Text is blank after sanitizing, nothing to synthesize');
        produced = null;
      }
    }

    const measurement = produced
      ? await measureClipDuration(produced, text, media, logger)
      : { kind: 'unmeasured' as const };

    this.budget.commit({
      id: unitId,
      path: outputPath,
      duration: measuredSeconds(measurement),
      position: this.budget.size,
      measurement,
    });

    logger.debug({ unitId, total: this.budget.totalDuration, measurement: measurement.kind }, 'Segment committed');
  }

  private async prepareText(text: string): Promise<string> {
    const { translator, logger } = this.deps;
    const lang = this.options.postLang;
    if (!lang || !translator) {
      return sanitizeSpeechText(text);
    }

    logger.debug({ lang }, 'Translating text');
    return sanitizeSpeechText(await translator.translate(text, lang));
  }

  private synthesize(text: string, outputPath: string): Promise<void> {
    const { provider, logger } = this.deps;
    return withRetry(
      () => provider.synthesize(text, outputPath, { randomVoice: this.options.randomVoice }),
      logger,
      `tts:${basename(outputPath)}`,
      { retryOn: isRetryableError, initialDelayMs: this.options.retryDelayMs ?? 1000 },
    );
  }
}

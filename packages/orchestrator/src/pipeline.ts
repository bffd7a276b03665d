import type {
  Config,
  Logger,
  MediaToolkit,
  NarrationDocument,
  NarrationResult,
  Translator,
  VoiceProvider,
} from '@threadcast/shared';
import { FfmpegToolkit, assertVoiceCredentials, forDocument } from '@threadcast/shared';
import { GeminiTranslator, Narrator, createVoiceProvider } from '@threadcast/voiceover';
import {
  BackgroundChopper,
  loadBackgroundCatalog,
  pickBackground,
  type BackgroundCatalog,
  type ChopResult,
} from '@threadcast/background';
import type { Job } from 'bullmq';
import type { JobData, NarrateThreadJobResult } from './jobs.js';

export interface PipelineResult {
  documentId: string;
  /** Whole seconds of background cut for the narration. */
  duration: number;
  narration: NarrationResult;
  background: ChopResult;
}

export interface PipelineDeps {
  narrator: Narrator;
  chopper: BackgroundChopper;
  videoCatalog: BackgroundCatalog;
  audioCatalog: BackgroundCatalog;
  logger: Logger;
  random?: () => number;
}

export interface BackgroundChoice {
  /** Catalog key; empty picks at random. */
  video: string;
  audio: string;
}

/** Narrate a thread, then cut backgrounds as long as the narration. */
export class ThreadPipeline {
  constructor(
    private choice: BackgroundChoice,
    private deps: PipelineDeps,
  ) {}

  async run(document: NarrationDocument): Promise<PipelineResult> {
    const { narrator, chopper, logger } = this.deps;
    const log = forDocument(logger, document.id);
    log.info({ comments: document.comments.length }, 'Narrating thread');

    const narration = await narrator.run(document);
    const duration = Math.max(1, Math.ceil(narration.totalDuration));

    const video = pickBackground(this.deps.videoCatalog, this.choice.video, this.deps.random);
    const audio = pickBackground(this.deps.audioCatalog, this.choice.audio, this.deps.random);
    if (video.randomPick || audio.randomPick) {
      log.info({ video: video.source.key, audio: audio.source.key }, 'Picked random background');
    }

    const background = await chopper.chop(document.id, duration, { video: video.source, audio: audio.source });
    log.info({ duration, commentCount: narration.commentCount }, 'Thread ready');
    return { documentId: document.id, duration, narration, background };
  }
}

export function summarizeResult(result: PipelineResult): NarrateThreadJobResult {
  return {
    documentId: result.documentId,
    duration: result.duration,
    commentCount: result.narration.commentCount,
    segments: result.narration.segments.length,
    videoPath: result.background.video.path,
    audioPath: result.background.audio?.path ?? null,
    credit: result.background.credit,
  };
}

/** Queue processor that runs one narrate-thread job through the pipeline. */
export function createNarrateProcessor(
  pipeline: Pick<ThreadPipeline, 'run'>,
): (job: Job<JobData>) => Promise<NarrateThreadJobResult> {
  return async (job) => {
    const result = await pipeline.run(job.data.document);
    await job.updateProgress(100);
    return summarizeResult(result);
  };
}

export interface PipelineOverrides {
  media?: MediaToolkit;
  provider?: VoiceProvider;
  translator?: Translator;
  catalogDir?: string;
}

/** Wire a pipeline from configuration. */
export async function createPipeline(
  config: Config,
  logger: Logger,
  overrides: PipelineOverrides = {},
): Promise<ThreadPipeline> {
  if (!overrides.provider) assertVoiceCredentials(config);

  const media = overrides.media ?? new FfmpegToolkit(logger);
  const provider =
    overrides.provider ??
    createVoiceProvider(config.voiceProvider, {
      apiKey: config.voiceProvider === 'elevenlabs' ? config.elevenlabsApiKey : config.openaiApiKey,
      voice: config.ttsVoice,
      media,
    });
  const translator =
    overrides.translator ?? (config.postLang ? new GeminiTranslator({ apiKey: config.googleApiKey }) : undefined);

  const narrator = new Narrator(
    {
      tempDir: config.tempDir,
      maxLength: config.maxNarrationSeconds,
      storyMode: config.storyMode,
      storyModeMethod: config.storyModeMethod,
      silenceDuration: config.silenceDuration,
      randomVoice: config.randomVoice,
      postLang: config.postLang,
    },
    { provider, media, logger, translator },
  );

  const chopper = new BackgroundChopper(
    { tempDir: config.tempDir, assetsDir: config.assetsDir, audioVolume: config.backgroundAudioVolume },
    { media, logger },
  );

  const [videoCatalog, audioCatalog] = await Promise.all([
    loadBackgroundCatalog('video', overrides.catalogDir),
    loadBackgroundCatalog('audio', overrides.catalogDir),
  ]);

  return new ThreadPipeline(
    { video: config.backgroundVideo, audio: config.backgroundAudio },
    { narrator, chopper, videoCatalog, audioCatalog, logger },
  );
}

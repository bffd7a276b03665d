import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';
import { ConfigError } from './errors.js';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const VOICE_PROVIDERS = ['openai', 'elevenlabs', 'mock'] as const;
export type VoiceProviderName = (typeof VOICE_PROVIDERS)[number];

// z.coerce.boolean() turns "false" into true
const envBoolean = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  // Logging
  logLevel: z.enum(LOG_LEVELS).default('info'),

  // Text-to-speech
  voiceProvider: z.enum(VOICE_PROVIDERS).default('mock'),
  openaiApiKey: z.string().default(''),
  elevenlabsApiKey: z.string().default(''),
  ttsVoice: z.string().default(''),
  randomVoice: envBoolean,
  silenceDuration: z.coerce.number().min(0).default(0.3),

  // Translation (Gemini)
  googleApiKey: z.string().default(''),
  postLang: z.string().default(''),

  // Narration
  maxNarrationSeconds: z.coerce.number().positive().default(50),
  storyMode: envBoolean,
  storyModeMethod: z.coerce.number().int().min(0).max(1).default(0),

  // Backgrounds
  backgroundVideo: z.string().default(''),
  backgroundAudio: z.string().default(''),
  backgroundAudioVolume: z.coerce.number().min(0).max(1).default(0.15),
  assetsDir: z.string().default('assets'),
  tempDir: z.string().default('assets/temp'),

  // Queue
  redisUrl: z.string().default('redis://localhost:6379'),
  workerConcurrency: z.coerce.number().int().positive().default(1),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

/** Read and validate configuration from the environment. */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse({
    logLevel: env.LOG_LEVEL || undefined,
    voiceProvider: env.VOICE_PROVIDER || undefined,
    openaiApiKey: env.OPENAI_API_KEY,
    elevenlabsApiKey: env.ELEVENLABS_API_KEY,
    ttsVoice: env.TTS_VOICE,
    randomVoice: env.TTS_RANDOM_VOICE,
    silenceDuration: env.TTS_SILENCE_DURATION || undefined,
    googleApiKey: env.GOOGLE_API_KEY,
    postLang: env.POST_LANG,
    maxNarrationSeconds: env.MAX_NARRATION_SECONDS || undefined,
    storyMode: env.STORY_MODE,
    storyModeMethod: env.STORY_MODE_METHOD || undefined,
    backgroundVideo: env.BACKGROUND_VIDEO,
    backgroundAudio: env.BACKGROUND_AUDIO,
    backgroundAudioVolume: env.BACKGROUND_AUDIO_VOLUME || undefined,
    assetsDir: env.ASSETS_DIR || undefined,
    tempDir: env.TEMP_DIR || undefined,
    redisUrl: env.REDIS_URL || undefined,
    workerConcurrency: env.WORKER_CONCURRENCY || undefined,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const invalid = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${invalid}`);
  }

  return result.data;
}

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}

/** Check the API key the selected voice provider needs. */
export function assertVoiceCredentials(config: Config): void {
  if (config.voiceProvider === 'openai' && !config.openaiApiKey) {
    throw new ConfigError('OPENAI_API_KEY is required when VOICE_PROVIDER=openai');
  }
  if (config.voiceProvider === 'elevenlabs' && !config.elevenlabsApiKey) {
    throw new ConfigError('ELEVENLABS_API_KEY is required when VOICE_PROVIDER=elevenlabs');
  }
  if (config.postLang && !config.googleApiKey) {
    throw new ConfigError('GOOGLE_API_KEY is required when POST_LANG is set');
  }
}

import { describe, it, expect } from 'vitest';
import { parseConfig, assertVoiceCredentials } from './config.js';
import { ConfigError } from './errors.js';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = parseConfig({});

    expect(config.logLevel).toBe('info');
    expect(config.voiceProvider).toBe('mock');
    expect(config.maxNarrationSeconds).toBe(50);
    expect(config.silenceDuration).toBe(0.3);
    expect(config.storyMode).toBe(false);
    expect(config.storyModeMethod).toBe(0);
    expect(config.backgroundAudioVolume).toBe(0.15);
    expect(config.assetsDir).toBe('assets');
    expect(config.tempDir).toBe('assets/temp');
    expect(config.workerConcurrency).toBe(1);
  });

  it('reads numbers and booleans from strings', () => {
    const config = parseConfig({
      MAX_NARRATION_SECONDS: '75',
      STORY_MODE: 'true',
      STORY_MODE_METHOD: '1',
      TTS_RANDOM_VOICE: '1',
      BACKGROUND_AUDIO_VOLUME: '0',
    });

    expect(config.maxNarrationSeconds).toBe(75);
    expect(config.storyMode).toBe(true);
    expect(config.storyModeMethod).toBe(1);
    expect(config.randomVoice).toBe(true);
    expect(config.backgroundAudioVolume).toBe(0);
  });

  it('treats "false" as false', () => {
    expect(parseConfig({ STORY_MODE: 'false' }).storyMode).toBe(false);
  });

  it('lists every invalid field', () => {
    expect(() => parseConfig({ VOICE_PROVIDER: 'polly', STORY_MODE_METHOD: '2' })).toThrow(
      /voiceProvider[\s\S]*storyModeMethod|storyModeMethod[\s\S]*voiceProvider/,
    );
  });

  it('throws ConfigError for a negative budget', () => {
    expect(() => parseConfig({ MAX_NARRATION_SECONDS: '-5' })).toThrow(ConfigError);
  });
});

describe('assertVoiceCredentials', () => {
  it('requires an OpenAI key for the openai provider', () => {
    const config = parseConfig({ VOICE_PROVIDER: 'openai' });
    expect(() => assertVoiceCredentials(config)).toThrow('OPENAI_API_KEY');
  });

  it('requires a Google key when translating', () => {
    const config = parseConfig({ POST_LANG: 'es' });
    expect(() => assertVoiceCredentials(config)).toThrow('GOOGLE_API_KEY');
  });

  it('passes for the mock provider without keys', () => {
    expect(() => assertVoiceCredentials(parseConfig({}))).not.toThrow();
  });
});

import { writeFile } from 'fs/promises';
import { z } from 'zod';
import type { MediaToolkit, SynthesisOptions, VoiceProvider, VoiceProviderName } from '@threadcast/shared';
import { estimateSpeechDuration } from '../duration.js';

// ─── OpenAI TTS ───

export const OPENAI_VOICES = [
  { id: 'alloy', name: 'Alloy', description: 'Neutral, warm' },
  { id: 'echo', name: 'Echo', description: 'Calm, clear' },
  { id: 'fable', name: 'Fable', description: 'Expressive, storytelling' },
  { id: 'onyx', name: 'Onyx', description: 'Deep, authoritative' },
  { id: 'nova', name: 'Nova', description: 'Friendly, upbeat' },
  { id: 'shimmer', name: 'Shimmer', description: 'Bright, cheerful' },
] as const;

export type OpenAIVoiceId = (typeof OPENAI_VOICES)[number]['id'];

export interface OpenAITTSOptions {
  apiKey: string;
  model?: 'tts-1' | 'tts-1-hd';
  defaultVoice?: OpenAIVoiceId;
  /** Playback speed: 0.25 to 4.0. */
  speed?: number;
  random?: () => number;
}

/** OpenAI speech endpoint. Writes mp3 to the output path. */
export class OpenAITTSProvider implements VoiceProvider {
  readonly name = 'openai';
  readonly maxChars = 4096;
  private apiKey: string;
  private model: 'tts-1' | 'tts-1-hd';
  private defaultVoice: OpenAIVoiceId;
  private speed: number;
  private random: () => number;

  constructor(options: OpenAITTSOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'tts-1';
    this.defaultVoice = options.defaultVoice ?? 'onyx';
    this.speed = options.speed ?? 1.0;
    this.random = options.random ?? Math.random;
  }

  async synthesize(text: string, outputPath: string, options: SynthesisOptions = {}): Promise<void> {
    const voice = options.randomVoice ? pickRandom(OPENAI_VOICES, this.random).id : this.defaultVoice;

    const response = await fetch('https://api.openai.com/v1/audio/speech', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: text,
        voice,
        speed: this.speed,
        response_format: 'mp3',
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`OpenAI TTS API error ${response.status}: ${body}`);
    }

    await writeFile(outputPath, Buffer.from(await response.arrayBuffer()));
  }

  async listVoices(): Promise<{ id: string; name: string; preview: string }[]> {
    return OPENAI_VOICES.map((v) => ({
      id: v.id,
      name: `${v.name} (${v.description})`,
      preview: '',
    }));
  }
}

export function isOpenAIVoice(voice: string): voice is OpenAIVoiceId {
  return OPENAI_VOICES.some((v) => v.id === voice);
}

// ─── ElevenLabs ───

export interface ElevenLabsTTSOptions {
  apiKey: string;
  /** Voice id; required unless every call asks for a random voice. */
  voiceId?: string;
  modelId?: string;
  random?: () => number;
}

const elevenLabsVoicesSchema = z.object({
  voices: z.array(
    z.object({
      voice_id: z.string(),
      name: z.string(),
      preview_url: z.string().nullish(),
    }),
  ),
});

const ELEVENLABS_API = 'https://api.elevenlabs.io/v1';

export class ElevenLabsTTSProvider implements VoiceProvider {
  readonly name = 'elevenlabs';
  readonly maxChars = 2500;
  private apiKey: string;
  private voiceId: string;
  private modelId: string;
  private random: () => number;

  constructor(options: ElevenLabsTTSOptions) {
    this.apiKey = options.apiKey;
    this.voiceId = options.voiceId ?? '';
    this.modelId = options.modelId ?? 'eleven_multilingual_v2';
    this.random = options.random ?? Math.random;
  }

  async synthesize(text: string, outputPath: string, options: SynthesisOptions = {}): Promise<void> {
    const voice = options.randomVoice ? pickRandom(await this.listVoices(), this.random).id : this.voiceId;
    if (!voice) {
      throw new Error('ElevenLabs needs a voice id (TTS_VOICE) or random voices enabled');
    }

    const response = await fetch(
      `${ELEVENLABS_API}/text-to-speech/${encodeURIComponent(voice)}?output_format=mp3_44100_128`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'xi-api-key': this.apiKey,
        },
        body: JSON.stringify({ text, model_id: this.modelId }),
      },
    );

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`ElevenLabs API error ${response.status}: ${body}`);
    }

    await writeFile(outputPath, Buffer.from(await response.arrayBuffer()));
  }

  async listVoices(): Promise<{ id: string; name: string; preview: string }[]> {
    const response = await fetch(`${ELEVENLABS_API}/voices`, {
      headers: { 'xi-api-key': this.apiKey },
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`ElevenLabs API error ${response.status}: ${body}`);
    }

    const { voices } = elevenLabsVoicesSchema.parse(await response.json());
    return voices.map((v) => ({ id: v.voice_id, name: v.name, preview: v.preview_url ?? '' }));
  }
}

// ─── Mock ───

/** Writes silence as long as the text would take to read. For dry runs without an engine. */
export class MockVoiceProvider implements VoiceProvider {
  readonly name = 'mock';

  constructor(
    private media: MediaToolkit,
    readonly maxChars = 4096,
  ) {}

  async synthesize(text: string, outputPath: string): Promise<void> {
    await this.media.createSilence(outputPath, estimateSpeechDuration(text));
  }

  async listVoices(): Promise<{ id: string; name: string; preview: string }[]> {
    return [{ id: 'silence', name: 'Silence matching the reading time', preview: '' }];
  }
}

// ─── Factory ───

export interface VoiceProviderFactoryOptions {
  apiKey: string;
  voice?: string;
  media: MediaToolkit;
}

export function createVoiceProvider(
  provider: VoiceProviderName,
  options: VoiceProviderFactoryOptions,
): VoiceProvider {
  switch (provider) {
    case 'openai':
      return new OpenAITTSProvider({
        apiKey: options.apiKey,
        defaultVoice: options.voice && isOpenAIVoice(options.voice) ? options.voice : undefined,
      });
    case 'elevenlabs':
      return new ElevenLabsTTSProvider({ apiKey: options.apiKey, voiceId: options.voice || undefined });
    case 'mock':
      return new MockVoiceProvider(options.media);
    default:
      throw new Error(`Unknown voice provider: ${String(provider)}`);
  }
}

export function pickRandom<T>(items: readonly T[], random: () => number = Math.random): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}

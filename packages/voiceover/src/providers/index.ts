export {
  OpenAITTSProvider,
  ElevenLabsTTSProvider,
  MockVoiceProvider,
  OPENAI_VOICES,
  createVoiceProvider,
  isOpenAIVoice,
  pickRandom,
  type OpenAITTSOptions,
  type ElevenLabsTTSOptions,
  type OpenAIVoiceId,
  type VoiceProviderFactoryOptions,
} from './voice.js';

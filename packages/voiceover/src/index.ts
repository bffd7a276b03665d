export { Narrator, type NarratorOptions, type NarratorDeps } from './narrator.js';
export { normalizeNarrationText, sanitizeSpeechText } from './normalize.js';
export { chunkText } from './chunker.js';
export { splitLongText, interleave, type SplitOptions, type SplitDeps } from './splitter.js';
export {
  measureClipDuration,
  measuredSeconds,
  estimateSpeechDuration,
  WORDS_PER_MINUTE,
} from './duration.js';
export { RunningBudget } from './budget.js';
export { GeminiTranslator, type GeminiTranslatorOptions } from './translate.js';
export * from './providers/index.js';

// ─── Documents ───

export interface NarrationComment {
  id: string;
  body: string;
}

/** A thread to narrate. `post` is one story body, or a list of story parts already split upstream. */
export interface NarrationDocument {
  id: string;
  title: string;
  post: string | string[];
  comments: NarrationComment[];
}

// ─── Speech ───

export type DurationMeasurement =
  | { kind: 'measured'; seconds: number; method: 'probe' | 'decode' }
  | { kind: 'estimated'; seconds: number }
  | { kind: 'unmeasured' };

export interface SpeechSegment {
  /** Unit id: "title", a comment index, "postaudio" or "postaudio-<n>". */
  id: string;
  path: string;
  duration: number;
  position: number;
  measurement: DurationMeasurement;
}

export interface NarrationResult {
  totalDuration: number;
  /** Comments (or story parts) present in the output. */
  commentCount: number;
  segments: SpeechSegment[];
}

export interface SynthesisOptions {
  randomVoice?: boolean;
}

export interface VoiceProvider {
  readonly name: string;
  /** Longest text accepted in a single call. */
  readonly maxChars: number;
  synthesize(text: string, outputPath: string, options?: SynthesisOptions): Promise<void>;
  listVoices(): Promise<{ id: string; name: string; preview: string }[]>;
}

export interface Translator {
  translate(text: string, targetLanguage: string): Promise<string>;
}

// ─── Media ───

export type ExtractionStrategy = 'fast' | 'tolerant';
export type MediaKind = 'audio' | 'video';

/** Duration probing and time-ranged extraction. Implemented over ffmpeg by FfmpegToolkit. */
export interface MediaToolkit {
  /** Container metadata duration in seconds. Rejects when unreadable or missing. */
  probeDuration(filePath: string): Promise<number>;
  /** Decode the whole file and return the decoded duration in seconds. */
  decodeDuration(filePath: string): Promise<number>;
  extractWindow(
    inputPath: string,
    start: number,
    duration: number,
    outputPath: string,
    strategy: ExtractionStrategy,
    kind: MediaKind,
  ): Promise<void>;
  createSilence(outputPath: string, seconds: number): Promise<void>;
  concat(inputPaths: string[], outputPath: string, listPath: string): Promise<void>;
}

// ─── Backgrounds ───

export type BackgroundPosition = { kind: 'center' } | { kind: 'scroll'; offset: number };

export interface BackgroundSource {
  key: string;
  uri: string;
  filename: string;
  credit: string;
  position: BackgroundPosition;
}

export interface SelectedWindow {
  start: number;
  end: number;
  /** The source was no longer than requested and the whole of it was returned. */
  degraded: boolean;
}

/** Error types shared by the narration and background packages. */

export type BackgroundKind = 'audio' | 'video';

/** Base for fatal background failures. Carries the source file and the duration that was needed. */
export class BackgroundError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly requiredDuration: number,
    public readonly kind: BackgroundKind,
  ) {
    super(message);
    this.name = 'BackgroundError';
  }
}

export class BackgroundTooShortError extends BackgroundError {
  constructor(
    source: string,
    requiredDuration: number,
    public readonly sourceDuration: number,
    kind: BackgroundKind = 'video',
  ) {
    super(
      `Background source ${source} (${sourceDuration}s) is too short for required length (${requiredDuration}s)`,
      source,
      requiredDuration,
      kind,
    );
    this.name = 'BackgroundTooShortError';
  }
}

export class WindowSelectionError extends BackgroundError {
  constructor(
    source: string,
    requiredDuration: number,
    public readonly sourceDuration: number,
    kind: BackgroundKind = 'video',
  ) {
    super(
      `Unable to create a valid time range from ${sourceDuration}s of ${source} for ${requiredDuration}s`,
      source,
      requiredDuration,
      kind,
    );
    this.name = 'WindowSelectionError';
  }
}

export class BackgroundExtractionError extends BackgroundError {
  constructor(
    source: string,
    requiredDuration: number,
    kind: BackgroundKind,
    public readonly attempts: string[],
  ) {
    super(
      `All extraction strategies failed for ${kind} background ${source}: ${attempts.join('; ')}`,
      source,
      requiredDuration,
      kind,
    );
    this.name = 'BackgroundExtractionError';
  }
}

export class BackgroundProbeError extends BackgroundError {
  constructor(source: string, requiredDuration: number, kind: BackgroundKind, cause: string) {
    super(`Could not read the duration of ${kind} background ${source}: ${cause}`, source, requiredDuration, kind);
    this.name = 'BackgroundProbeError';
  }
}

export class BackgroundNotFoundError extends BackgroundError {
  constructor(source: string, requiredDuration: number, kind: BackgroundKind) {
    super(
      `Background ${kind} file ${source} is missing; download it into the assets directory first`,
      source,
      requiredDuration,
      kind,
    );
    this.name = 'BackgroundNotFoundError';
  }
}

/** An ffmpeg or ffprobe invocation failed. */
export class MediaToolError extends Error {
  constructor(
    message: string,
    public readonly file: string,
    public readonly stderr = '',
  ) {
    super(stderr ? `${message}: ${stderr}` : message);
    this.name = 'MediaToolError';
  }
}

export class DocumentValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  ${i}`).join('\n')}` : message);
    this.name = 'DocumentValidationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

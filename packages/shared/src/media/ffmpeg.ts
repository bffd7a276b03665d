import ffmpeg from 'fluent-ffmpeg';
import { writeFile } from 'fs/promises';
import type { ExtractionStrategy, MediaKind, MediaToolkit } from '../types.js';
import type { Logger } from '../logger.js';
import { MediaToolError } from '../errors.js';

export interface FfmpegToolkitOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Sample rate for generated silence. Matches what the TTS engines return. */
  sampleRate?: number;
}

const STDERR_TAIL = 400;

/** MediaToolkit over ffmpeg/ffprobe via fluent-ffmpeg. */
export class FfmpegToolkit implements MediaToolkit {
  private sampleRate: number;

  constructor(
    private logger: Logger,
    options: FfmpegToolkitOptions = {},
  ) {
    if (options.ffmpegPath) ffmpeg.setFfmpegPath(options.ffmpegPath);
    if (options.ffprobePath) ffmpeg.setFfprobePath(options.ffprobePath);
    this.sampleRate = options.sampleRate ?? 44_100;
  }

  probeDuration(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, data) => {
        if (err) {
          reject(new MediaToolError('ffprobe failed', filePath, tail(errorText(err))));
          return;
        }
        const duration = Number(data?.format?.duration);
        if (!Number.isFinite(duration) || duration <= 0) {
          reject(new MediaToolError('ffprobe reported no duration', filePath));
          return;
        }
        resolve(duration);
      });
    });
  }

  async decodeDuration(filePath: string): Promise<number> {
    let lastTimemark = '';
    const command = ffmpeg(filePath)
      .noVideo()
      .format('null')
      .output('-')
      .on('progress', (progress: { timemark?: string }) => {
        if (progress.timemark) lastTimemark = progress.timemark;
      });

    const stderr = await this.run(command, filePath, 'decode');
    const seconds = parseLastTime(stderr) ?? parseTimemark(lastTimemark);
    if (seconds === null || seconds <= 0) {
      throw new MediaToolError('decoded stream has no duration', filePath);
    }
    return seconds;
  }

  async extractWindow(
    inputPath: string,
    start: number,
    duration: number,
    outputPath: string,
    strategy: ExtractionStrategy,
    kind: MediaKind,
  ): Promise<void> {
    const command = ffmpeg();

    if (strategy === 'fast') {
      // Input-side seek: jumps to the nearest keyframe, no decoding before `start`
      command.input(inputPath).inputOptions(['-ss', String(start)]);
      command.outputOptions(['-y', '-t', String(duration), ...encoderOptions(kind, 'fast')]);
    } else {
      // Output-side seek decodes from the beginning and drops damaged packets
      command
        .input(inputPath)
        .inputOptions(['-fflags', '+discardcorrupt+genpts', '-err_detect', 'ignore_err']);
      command.outputOptions([
        '-y',
        '-ss',
        String(start),
        '-t',
        String(duration),
        '-avoid_negative_ts',
        'make_zero',
        ...encoderOptions(kind, 'tolerant'),
      ]);
    }

    await this.run(command.output(outputPath), inputPath, `extract-${kind}-${strategy}`);
  }

  async createSilence(outputPath: string, seconds: number): Promise<void> {
    const command = ffmpeg()
      .input(`anullsrc=r=${this.sampleRate}:cl=stereo`)
      .inputFormat('lavfi')
      .outputOptions(['-y', '-t', String(seconds), '-c:a', 'libmp3lame', '-q:a', '4'])
      .output(outputPath);

    await this.run(command, outputPath, 'silence');
  }

  async concat(inputPaths: string[], outputPath: string, listPath: string): Promise<void> {
    const listContent = inputPaths.map((p) => `file '${escapeConcatPath(p)}'`).join('\n');
    await writeFile(listPath, `${listContent}\n`);

    const command = ffmpeg()
      .input(listPath)
      .inputOptions(['-f', 'concat', '-safe', '0'])
      .outputOptions(['-y', '-c', 'copy'])
      .output(outputPath);

    await this.run(command, outputPath, 'concat');
  }

  private run(command: ffmpeg.FfmpegCommand, file: string, label: string): Promise<string> {
    return new Promise((resolve, reject) => {
      command
        .on('start', (commandLine: string) => {
          this.logger.debug({ label, commandLine }, 'ffmpeg started');
        })
        .on('end', (_stdout: string | null, stderr: string | null) => {
          resolve(stderr ?? '');
        })
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          reject(new MediaToolError(`ffmpeg ${label} failed: ${err.message}`, file, tail(stderr ?? '')));
        })
        .run();
    });
  }
}

function encoderOptions(kind: MediaKind, strategy: ExtractionStrategy): string[] {
  if (kind === 'audio') {
    return ['-vn', '-c:a', 'libmp3lame', '-q:a', '0'];
  }
  return strategy === 'fast'
    ? ['-c:v', 'libx264', '-preset', 'fast', '-crf', '22']
    : ['-c:v', 'libx264', '-preset', 'ultrafast', '-crf', '23', '-pix_fmt', 'yuv420p'];
}

/** Escape a path for a line of an ffmpeg concat list. */
export function escapeConcatPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/'/g, "'\\''");
}

/** Seconds from a "HH:MM:SS.xx" timemark, or null. */
export function parseTimemark(timemark: string): number | null {
  const match = /^(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/.exec(timemark.trim());
  if (!match) return null;
  return Number(match[1]) * 3600 + Number(match[2]) * 60 + Number(match[3]);
}

/** The final `time=` value ffmpeg printed to stderr. */
export function parseLastTime(stderr: string): number | null {
  const matches = [...stderr.matchAll(/time=\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/g)];
  const last = matches.at(-1);
  return last ? parseTimemark(last[1]) : null;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL ? trimmed.slice(-STDERR_TAIL) : trimmed;
}

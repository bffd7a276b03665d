import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { access, mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  BackgroundExtractionError,
  BackgroundError,
  BackgroundNotFoundError,
  BackgroundProbeError,
  BackgroundTooShortError,
  MediaToolError,
} from '@threadcast/shared';
import type { BackgroundSource, Logger } from '@threadcast/shared';
import { FakeMediaToolkit } from '@threadcast/shared/testing';
import { BackgroundChopper, type ChopperOptions } from './chopper.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
  child: vi.fn(() => mockLogger),
} as unknown as Logger;

const VIDEO: BackgroundSource = {
  key: 'parkour',
  uri: 'https://media.example.com/backgrounds/parkour-run.mp4',
  filename: 'parkour-run.mp4',
  credit: 'blockrunner',
  position: { kind: 'center' },
};

const AUDIO: BackgroundSource = {
  key: 'lofi',
  uri: 'https://media.example.com/audio/lofi-evening.mp3',
  filename: 'lofi-evening.mp3',
  credit: 'quietbeats',
  position: { kind: 'center' },
};

const VIDEO_FILE = 'blockrunner-parkour-run.mp4';
const AUDIO_FILE = 'quietbeats-lofi-evening.mp3';

describe('BackgroundChopper', () => {
  let root: string;
  let options: ChopperOptions;
  let media: FakeMediaToolkit;
  let workDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    root = await mkdtemp(join(tmpdir(), 'threadcast-chop-'));
    options = { tempDir: join(root, 'temp'), assetsDir: join(root, 'assets'), audioVolume: 0.15 };
    media = new FakeMediaToolkit();
    workDir = join(options.tempDir, 't3_doc');

    for (const kind of ['video', 'audio'] as const) {
      await mkdir(join(options.assetsDir, 'backgrounds', kind), { recursive: true });
    }
    await writeFile(join(options.assetsDir, 'backgrounds', 'video', VIDEO_FILE), 'video');
    await writeFile(join(options.assetsDir, 'backgrounds', 'audio', AUDIO_FILE), 'audio');
    media.probed.set(VIDEO_FILE, 300);
    media.probed.set(AUDIO_FILE, 200);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function chopper(opts: Partial<ChopperOptions> = {}) {
    return new BackgroundChopper({ ...options, ...opts }, { media, logger: mockLogger, random: () => 0 });
  }

  it('cuts matching windows of audio and video', async () => {
    const result = await chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO });

    expect(result).toEqual({
      video: { path: join(workDir, 'background.mp4'), window: { start: 0, end: 30, degraded: false }, strategy: 'fast' },
      audio: {
        path: join(workDir, 'background.mp3'),
        window: { start: 0, end: 30, degraded: false },
        placeholder: false,
        volume: 0.15,
      },
      credit: 'blockrunner',
    });
    expect(media.extractCalls.map((c) => [c.kind, c.strategy, c.start, c.duration])).toEqual([
      ['audio', 'fast', 0, 30],
      ['video', 'fast', 0, 30],
    ]);
  });

  it('skips audio when the volume is zero', async () => {
    const result = await chopper({ audioVolume: 0 }).chop('t3_doc', 30, { video: VIDEO, audio: AUDIO });

    expect(result.audio).toBeNull();
    expect(media.extractCalls.map((c) => c.kind)).toEqual(['video']);
    await expect(access(join(workDir, 'background.mp3'))).rejects.toThrow();
  });

  describe('audio fallbacks', () => {
    async function expectSilence() {
      const result = await chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO });
      expect(result.audio).toEqual({
        path: join(workDir, 'background.mp3'),
        window: null,
        placeholder: true,
        volume: 0.15,
      });
      expect(media.silenceCalls).toEqual([{ outputPath: join(workDir, 'background.mp3'), seconds: 30 }]);
    }

    it('uses silence when the source cannot be probed', async () => {
      media.probed.delete(AUDIO_FILE);
      await expectSilence();
    });

    it('uses silence when the source file is missing', async () => {
      await rm(join(options.assetsDir, 'backgrounds', 'audio', AUDIO_FILE));

      await expectSilence();
      expect(media.extractCalls.map((c) => c.kind)).toEqual(['video']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.objectContaining({ source: join(options.assetsDir, 'backgrounds', 'audio', AUDIO_FILE) }),
        'Background audio missing, using silence',
      );
    });

    it('uses silence when the source is too short', async () => {
      media.probed.set(AUDIO_FILE, 31);
      await expectSilence();
      expect(media.extractCalls.map((c) => c.kind)).toEqual(['video']);
    });

    it('uses silence when extraction fails', async () => {
      media.extractBehavior.set('audio:fast', 'throw');
      await expectSilence();
    });

    it('uses silence when extraction writes nothing', async () => {
      media.extractBehavior.set('audio:fast', 'empty');
      await expectSilence();
    });

    it('fails when the placeholder cannot be written', async () => {
      media.probed.delete(AUDIO_FILE);
      media.failSilence = true;

      await expect(chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO })).rejects.toThrow(MediaToolError);
    });
  });

  describe('video', () => {
    it('retries with the tolerant strategy', async () => {
      media.extractBehavior.set('video:fast', 'unreadable');

      const result = await chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO });

      expect(result.video.strategy).toBe('tolerant');
      expect(media.extractCalls.filter((c) => c.kind === 'video').map((c) => c.strategy)).toEqual([
        'fast',
        'tolerant',
      ]);
    });

    it('removes the partial output when every strategy fails', async () => {
      media.extractBehavior.set('video:fast', 'throw');
      media.extractBehavior.set('video:tolerant', 'empty');

      const error = await chopper()
        .chop('t3_doc', 30, { video: VIDEO, audio: AUDIO })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackgroundExtractionError);
      expect(error).toMatchObject({
        kind: 'video',
        requiredDuration: 30,
        attempts: [
          'fast: ffmpeg extract-video-fast failed: Conversion failed!',
          'tolerant: output file is missing or empty',
        ],
      });
      await expect(access(join(workDir, 'background.mp4'))).rejects.toThrow();
    });

    it('rejects a source without two seconds to spare', async () => {
      media.probed.set(VIDEO_FILE, 31);

      await expect(chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO })).rejects.toThrow(
        BackgroundTooShortError,
      );
    });

    it('accepts a source with exactly two seconds to spare', async () => {
      media.probed.set(VIDEO_FILE, 32);

      const result = await chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO });
      expect(result.video.window).toEqual({ start: 0, end: 30, degraded: false });
    });

    it('fails when the source cannot be probed', async () => {
      media.probed.delete(VIDEO_FILE);

      const error = await chopper()
        .chop('t3_doc', 30, { video: VIDEO, audio: AUDIO })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(BackgroundProbeError);
      expect(error).toBeInstanceOf(BackgroundError);
      expect(error).toMatchObject({
        kind: 'video',
        source: join(options.assetsDir, 'backgrounds', 'video', VIDEO_FILE),
        requiredDuration: 30,
        message: expect.stringContaining('ffprobe reported no duration'),
      });
    });

    it('fails when the source was never downloaded', async () => {
      await rm(join(options.assetsDir, 'backgrounds', 'video', VIDEO_FILE));

      await expect(chopper().chop('t3_doc', 30, { video: VIDEO, audio: AUDIO })).rejects.toThrow(
        BackgroundNotFoundError,
      );
    });
  });
});

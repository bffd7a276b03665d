import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Logger } from '@threadcast/shared';
import { FakeMediaToolkit } from '@threadcast/shared/testing';
import { estimateSpeechDuration, measureClipDuration, measuredSeconds } from './duration.js';

const mockLogger: Logger = {
  info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(),
} as unknown as Logger;

describe('estimateSpeechDuration', () => {
  it('reads 150 words per minute', () => {
    expect(estimateSpeechDuration('word '.repeat(75))).toBe(30);
    expect(estimateSpeechDuration('word '.repeat(300))).toBe(120);
  });

  it('never goes below one second', () => {
    expect(estimateSpeechDuration('Hi.')).toBe(1);
    expect(estimateSpeechDuration('')).toBe(1);
  });

  it('scales with speed', () => {
    expect(estimateSpeechDuration('word '.repeat(150), 2)).toBe(30);
  });
});

describe('measureClipDuration', () => {
  let dir: string;
  let media: FakeMediaToolkit;
  let clip: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'threadcast-duration-'));
    media = new FakeMediaToolkit();
    clip = join(dir, '0.mp3');
    await writeFile(clip, 'audio');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses the probed duration first', async () => {
    media.probed.set('0.mp3', 4.2);
    media.decoded.set('0.mp3', 9);

    await expect(measureClipDuration(clip, 'text', media, mockLogger)).resolves.toEqual({
      kind: 'measured',
      seconds: 4.2,
      method: 'probe',
    });
  });

  it('decodes when the probe fails', async () => {
    media.decoded.set('0.mp3', 3.5);

    await expect(measureClipDuration(clip, 'text', media, mockLogger)).resolves.toEqual({
      kind: 'measured',
      seconds: 3.5,
      method: 'decode',
    });
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ file: clip }),
      'Probe failed, decoding clip',
    );
  });

  it('decodes when the probe reports zero', async () => {
    media.probed.set('0.mp3', 0);
    media.decoded.set('0.mp3', 2);

    const result = await measureClipDuration(clip, 'text', media, mockLogger);
    expect(result).toEqual({ kind: 'measured', seconds: 2, method: 'decode' });
  });

  it('estimates from the text when probe and decode both fail', async () => {
    const text = 'word '.repeat(300);
    await expect(measureClipDuration(clip, text, media, mockLogger)).resolves.toEqual({
      kind: 'estimated',
      seconds: 120,
    });
  });

  it('reports a clip that was never written as unmeasured', async () => {
    const result = await measureClipDuration(join(dir, 'missing.mp3'), 'text', media, mockLogger);
    expect(result).toEqual({ kind: 'unmeasured' });
    expect(measuredSeconds(result)).toBe(0);
  });
});

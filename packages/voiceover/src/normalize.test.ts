import { describe, it, expect } from 'vitest';
import { normalizeNarrationText, sanitizeSpeechText } from './normalize.js';

describe('normalizeNarrationText', () => {
  it('replaces links with a space', () => {
    expect(normalizeNarrationText('Check https://example.com/page for details')).toBe('Check   for details.');
  });

  it('removes bare domains as well', () => {
    expect(normalizeNarrationText('Go to example.org now')).toBe('Go to   now.');
  });

  it('turns newlines into sentence breaks', () => {
    expect(normalizeNarrationText('First line\nSecond line')).toBe('First line. Second line.');
  });

  it('spells out AI and AGI as whole words only', () => {
    expect(normalizeNarrationText('AI and AGI beat MAIL')).toBe('A.I and A.G.I beat MAIL.');
    expect(normalizeNarrationText('ai is lowercase')).toBe('ai is lowercase.');
  });

  it('keeps an existing final period', () => {
    expect(normalizeNarrationText('Hello.')).toBe('Hello.');
  });

  it('collapses spaced ellipses', () => {
    expect(normalizeNarrationText('Wait. . . what')).toBe('Wait. what.');
    expect(normalizeNarrationText('Done.\n\nNext')).toBe('Done.Next.');
    expect(normalizeNarrationText('end. . start')).toBe('end.start.');
  });

  it('moves the period outside a closing quote', () => {
    expect(normalizeNarrationText('He said "stop."')).toBe('He said "stop".');
  });

  it('is a no-op on text it already normalized', () => {
    const samples = [
      'AI models are great',
      'Line one\nLine two',
      'He said "stop."',
      'See https://x.io/a now',
      'Plain sentence.',
    ];
    for (const sample of samples) {
      const once = normalizeNarrationText(sample);
      expect(normalizeNarrationText(once)).toBe(once);
    }
  });
});

describe('sanitizeSpeechText', () => {
  it('drops symbols but keeps apostrophes inside words', () => {
    expect(sanitizeSpeechText('Hello (world) & "friends" - it\'s fine!')).toBe("Hello world friends it's fine");
  });

  it('drops quotes that touch whitespace', () => {
    expect(sanitizeSpeechText("say 'yes' now")).toBe('say yes now');
  });

  it('returns an empty string when nothing speakable is left', () => {
    expect(sanitizeSpeechText('!!! --- https://example.com')).toBe('');
  });

  it('collapses whitespace and newlines', () => {
    expect(sanitizeSpeechText('  one\n\ttwo   three ')).toBe('one two three');
  });
});

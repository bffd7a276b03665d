import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DocumentValidationError } from '@threadcast/shared';
import { loadThreadDocument, parseThreadDocument } from './document.js';

describe('parseThreadDocument', () => {
  it('converts a thread to a narration document', () => {
    const document = parseThreadDocument({
      thread_id: 't3_abc',
      thread_title: 'What did you learn too late?',
      thread_post: 'Asking for a friend',
      comments: [{ comment_body: 'Sleep matters.', comment_id: 'k1' }, { comment_body: 'Stretch daily.' }],
    });

    expect(document).toEqual({
      id: 't3_abc',
      title: 'What did you learn too late?',
      post: 'Asking for a friend',
      comments: [
        { id: 'k1', body: 'Sleep matters.' },
        { id: '1', body: 'Stretch daily.' },
      ],
    });
  });

  it('defaults the post and comments', () => {
    const document = parseThreadDocument({ thread_id: 't3_abc', thread_title: 'Title' });
    expect(document.post).toBe('');
    expect(document.comments).toEqual([]);
  });

  it('keeps story parts as a list', () => {
    const document = parseThreadDocument({ thread_id: 't3_abc', thread_title: 'Title', thread_post: ['one', 'two'] });
    expect(document.post).toEqual(['one', 'two']);
  });

  it('lists every problem with the thread', () => {
    let error: unknown;
    try {
      parseThreadDocument({ thread_title: 5, comments: [{}] });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(DocumentValidationError);
    expect(error).toMatchObject({
      issues: [
        'thread_id: Required',
        'thread_title: Expected string, received number',
        'comments.0.comment_body: Required',
      ],
    });
  });

  it('rejects a value that is not an object', () => {
    expect(() => parseThreadDocument('thread')).toThrow('(root): Expected object, received string');
  });
});

describe('loadThreadDocument', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'threadcast-doc-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads a thread file', async () => {
    const file = join(dir, 'thread.json');
    await writeFile(file, JSON.stringify({ thread_id: 't3_file', thread_title: 'From disk', comments: [] }));

    await expect(loadThreadDocument(file)).resolves.toMatchObject({ id: 't3_file', title: 'From disk' });
  });

  it('reports malformed JSON', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ "thread_id": ');

    await expect(loadThreadDocument(file)).rejects.toThrow(`${file} is not valid JSON`);
  });
});

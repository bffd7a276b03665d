import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DocumentValidationError, errorMessage } from '@threadcast/shared';
import type { NarrationDocument } from '@threadcast/shared';

const threadSchema = z.object({
  thread_id: z.string().min(1),
  thread_title: z.string(),
  thread_post: z.union([z.string(), z.array(z.string())]).default(''),
  comments: z
    .array(
      z.object({
        comment_body: z.string(),
        comment_id: z.string().optional(),
      }),
    )
    .default([]),
});

export type ThreadJson = z.input<typeof threadSchema>;

/** Validate a thread object and convert it to a narration document. */
export function parseThreadDocument(raw: unknown): NarrationDocument {
  const result = threadSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new DocumentValidationError('Invalid thread document', issues);
  }

  const thread = result.data;
  return {
    id: thread.thread_id,
    title: thread.thread_title,
    post: thread.thread_post,
    comments: thread.comments.map((c, i) => ({ id: c.comment_id ?? String(i), body: c.comment_body })),
  };
}

export async function loadThreadDocument(filePath: string): Promise<NarrationDocument> {
  const text = await readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DocumentValidationError(`${filePath} is not valid JSON`, [errorMessage(err)]);
  }
  return parseThreadDocument(raw);
}

import { join } from 'path';

/** Keep word characters, whitespace and hyphens so the id is safe as a directory name. */
export function sanitizeDocumentId(id: string): string {
  return id.replace(/[^\p{L}\p{N}_\s-]/gu, '');
}

export function documentWorkDir(tempDir: string, documentId: string): string {
  return join(tempDir, sanitizeDocumentId(documentId));
}

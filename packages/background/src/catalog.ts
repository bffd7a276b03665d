import { readFile, stat } from 'fs/promises';
import { fileURLToPath } from 'url';
import { join } from 'path';
import { z } from 'zod';
import { BackgroundNotFoundError, ConfigError } from '@threadcast/shared';
import type { BackgroundKind, BackgroundPosition, BackgroundSource } from '@threadcast/shared';

export const DEFAULT_CATALOG_DIR = fileURLToPath(new URL('../data/', import.meta.url));

const CATALOG_FILES: Record<BackgroundKind, string> = {
  video: 'background_videos.json',
  audio: 'background_audios.json',
};

const positionSchema = z.union([z.literal('center'), z.number()]);

const videoEntrySchema = z.tuple([z.string().min(1), z.string().min(1), z.string().min(1), positionSchema]);
const audioEntrySchema = z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)]);

/** Background entries of one kind, by key. */
export type BackgroundCatalog = Map<string, BackgroundSource>;

export async function loadBackgroundCatalog(
  kind: BackgroundKind,
  dir: string = DEFAULT_CATALOG_DIR,
): Promise<BackgroundCatalog> {
  const file = join(dir, CATALOG_FILES[kind]);
  return parseBackgroundCatalog(kind, JSON.parse(await readFile(file, 'utf8')), file);
}

/** Validate raw catalog JSON. The `__comment` key is documentation and is skipped. */
export function parseBackgroundCatalog(kind: BackgroundKind, raw: unknown, file = CATALOG_FILES[kind]): BackgroundCatalog {
  const top = z.record(z.unknown()).safeParse(raw);
  if (!top.success) {
    throw new ConfigError(`Background catalog ${file} must be a JSON object`);
  }

  const catalog: BackgroundCatalog = new Map();
  const issues: string[] = [];

  for (const [key, value] of Object.entries(top.data)) {
    if (key === '__comment') continue;

    if (kind === 'video') {
      const entry = videoEntrySchema.safeParse(value);
      if (!entry.success) {
        issues.push(`${key}: expected [uri, filename, credit, position]`);
        continue;
      }
      const [uri, filename, credit, position] = entry.data;
      catalog.set(key, { key, uri, filename, credit, position: toPosition(position) });
    } else {
      const entry = audioEntrySchema.safeParse(value);
      if (!entry.success) {
        issues.push(`${key}: expected [uri, filename, credit]`);
        continue;
      }
      const [uri, filename, credit] = entry.data;
      catalog.set(key, { key, uri, filename, credit, position: { kind: 'center' } });
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid background catalog ${file}:\n${issues.map((i) => `  ${i}`).join('\n')}`);
  }
  if (catalog.size === 0) {
    throw new ConfigError(`Background catalog ${file} has no entries`);
  }
  return catalog;
}

function toPosition(position: 'center' | number): BackgroundPosition {
  return position === 'center' ? { kind: 'center' } : { kind: 'scroll', offset: position };
}

/**
 * Entry for the configured choice, compared case-insensitively. An empty or
 * unknown choice gets a random entry.
 */
export function pickBackground(
  catalog: BackgroundCatalog,
  choice: string | undefined,
  random: () => number = Math.random,
): { source: BackgroundSource; randomPick: boolean } {
  const wanted = choice?.trim().toLowerCase();
  if (wanted) {
    for (const source of catalog.values()) {
      if (source.key.toLowerCase() === wanted) return { source, randomPick: false };
    }
  }

  const sources = [...catalog.values()];
  const index = Math.min(sources.length - 1, Math.floor(random() * sources.length));
  return { source: sources[index], randomPick: true };
}

/** Where a catalog entry lives once downloaded: `<assetsDir>/backgrounds/<kind>/<credit>-<filename>`. */
export function backgroundPath(assetsDir: string, kind: BackgroundKind, source: BackgroundSource): string {
  return join(assetsDir, 'backgrounds', kind, `${source.credit}-${source.filename}`);
}

/** Local file for an entry; throws when it has not been downloaded. */
export async function resolveBackgroundPath(
  assetsDir: string,
  kind: BackgroundKind,
  source: BackgroundSource,
  requiredDuration: number,
): Promise<string> {
  const path = backgroundPath(assetsDir, kind, source);
  const found = await stat(path).then(
    (s) => s.isFile(),
    () => false,
  );
  if (!found) {
    throw new BackgroundNotFoundError(path, requiredDuration, kind);
  }
  return path;
}

import 'dotenv/config';
import { existsSync, readFileSync } from 'node:fs';
import { ConfigError } from './errors';
import { imageMapSchema } from './schemas';
import { DEFAULT_IMAGE_DIR } from './shared/constants';
import type { ImageFileMap } from './shared/types';

export type ChapterConfig = {
  outputDir: string;
  imageDir: string;
  imageMapPath: string | null;
  inspectHtmlPath: string;
  inspectJsonPath: string;
};

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  if (!value || value.trim() === '') return undefined;
  return value.trim();
}

export function loadConfig(env: Env = process.env): ChapterConfig {
  const outputDir = readEnv(env, 'CHAPTER_OUTPUT_DIR') ?? 'output';
  return {
    outputDir,
    imageDir: readEnv(env, 'CHAPTER_IMAGE_DIR') ?? DEFAULT_IMAGE_DIR,
    imageMapPath: readEnv(env, 'CHAPTER_IMAGE_MAP') ?? null,
    inspectHtmlPath: readEnv(env, 'INSPECT_HTML_PATH') ?? 'tmp.html',
    inspectJsonPath: readEnv(env, 'INSPECT_JSON_PATH') ?? 'output/chapter.json',
  };
}

/**
 * Parse JSON text, naming the source in the error when it is malformed.
 */
export function parseJson(raw: string, source: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid JSON in ${source}: ${reason}`, { cause: error });
  }
}

export function parseImageMap(data: unknown, source = 'image map'): ImageFileMap {
  const result = imageMapSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${issues}`);
  }
  return new Map(Object.entries(result.data));
}

export function loadImageMap(path: string): ImageFileMap {
  if (!existsSync(path)) {
    throw new ConfigError(`Image map not found: ${path}`);
  }
  return parseImageMap(parseJson(readFileSync(path, 'utf-8'), path), path);
}

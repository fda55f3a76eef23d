/**
 * Chapter Build Script
 *
 * Turns one already-decrypted chapter markup file into chapter.json and
 * chapter.md. Nothing is fetched: images are linked through an optional
 * URL -> file name map produced by the downloader.
 *
 * Usage:
 *   npm run chapter -- <markup.html> [--id <chapterId>] [--images <map.json>] [--out <dir>]
 *
 * Environment (see .env.example):
 *   CHAPTER_OUTPUT_DIR, CHAPTER_IMAGE_DIR, CHAPTER_IMAGE_MAP
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig, loadImageMap } from '../lib/config';
import { processChapter } from '../lib/pipeline';
import type { ImageFileMap } from '../lib/shared/types';

// ANSI color codes for better terminal output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function main() {
  try {
    const { values, positionals } = parseArgs({
      allowPositionals: true,
      options: {
        id: { type: 'string' },
        images: { type: 'string' },
        out: { type: 'string' },
      },
    });
    const config = loadConfig();
    const markupPath = positionals[0];
    if (!markupPath) {
      throw new Error('Usage: build-chapter <markup.html> [--id <chapterId>] [--images <map.json>] [--out <dir>]');
    }
    if (!existsSync(markupPath)) {
      throw new Error(`Markup file not found: ${markupPath}`);
    }

    const chapterId = values.id ?? basename(markupPath, extname(markupPath));
    const outputDir = values.out ?? config.outputDir;
    const imageMapPath = values.images ?? config.imageMapPath;

    log(`📖 Building chapter ${colors.bright}${chapterId}${colors.reset}${colors.cyan} from ${markupPath}`, colors.cyan);

    let imageFiles: ImageFileMap = new Map();
    if (imageMapPath) {
      imageFiles = loadImageMap(imageMapPath);
      log(`✓ Loaded ${imageFiles.size} image file(s) from ${imageMapPath}`, colors.green);
    }

    const markup = readFileSync(markupPath, 'utf-8');
    const { chapter, imageUrls, markdown } = processChapter(markup, chapterId, imageFiles, {
      imageDir: config.imageDir,
    });

    mkdirSync(outputDir, { recursive: true });
    const jsonPath = join(outputDir, 'chapter.json');
    const markdownPath = join(outputDir, 'chapter.md');
    writeFileSync(jsonPath, `${JSON.stringify(chapter, null, 2)}\n`, 'utf-8');
    writeFileSync(markdownPath, `${markdown}\n`, 'utf-8');

    const questions = chapter.sections
      .flatMap(section => section.items)
      .filter(item => item.type === 'qa').length;
    const unresolved = imageUrls.filter(url => !imageFiles.has(url)).length;

    log(`✓ ${chapter.sections.length} section(s), ${questions} question(s), ${imageUrls.length} image(s)`, colors.green);
    if (unresolved > 0) {
      log(`⚠️  ${unresolved} image(s) have no local file and link to their source URL`, colors.yellow);
    }
    log(`✓ Wrote ${jsonPath}`, colors.green);
    log(`✓ Wrote ${markdownPath}\n`, colors.green);
  } catch (error) {
    log(`\n❌ Build failed: ${error instanceof Error ? error.message : String(error)}`, colors.red);
    process.exit(1);
  }
}

main();

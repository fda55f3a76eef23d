import { parseChapter } from './classify';
import { enrichImages } from './enrich';
import { finalizeChapter } from './finalize';
import { applyLatexMarkup } from './latex';
import { renderMarkdown } from './render';
import type { Chapter, ImageFileMap, Logger, ProcessedChapter } from './shared/types';

export type PipelineOptions = {
  logger?: Logger;
  imageDir?: string;
};

/**
 * Normalize, finalize and attach image files to a parsed chapter, in place.
 */
export function completeChapter(
  chapter: Chapter,
  imageFiles: ImageFileMap = new Map(),
  options: PipelineOptions = {}
): Chapter {
  applyLatexMarkup(chapter);
  finalizeChapter(chapter, options.logger ?? console);
  enrichImages(chapter, imageFiles);
  return chapter;
}

export function processChapter(
  markup: string,
  chapterId: string,
  imageFiles: ImageFileMap = new Map(),
  options: PipelineOptions = {}
): ProcessedChapter {
  const { chapter, imageUrls } = parseChapter(markup, chapterId, { logger: options.logger });
  completeChapter(chapter, imageFiles, options);
  const markdown = renderMarkdown(chapter, { imageDir: options.imageDir });
  return { chapter, imageUrls, markdown };
}

import { resolveChapterImages } from './images';
import type {
  Chapter,
  ImageContext,
  ImageFileMap,
  ImageRef,
  ImageUsage,
  QAItem,
  RichPart
} from './shared/types';
import { isImagePart } from './shared/utils';

/**
 * Collects where each image of one question is used, keyed by URL in
 * first-seen order.
 */
class ImageUsageRecorder {
  private readonly usage = new Map<string, ImageUsage>();

  constructor(private readonly files: ImageFileMap) { }

  record(image: ImageRef, context: ImageContext): void {
    image.file = this.files.get(image.url) ?? null;

    let entry = this.usage.get(image.url);
    if (!entry) {
      entry = {
        url: image.url,
        width: image.width,
        height: image.height,
        file: image.file,
        contexts: [],
      };
      this.usage.set(image.url, entry);
    } else {
      entry.file ??= image.file;
      entry.width ??= image.width;
      entry.height ??= image.height;
    }

    if (!entry.contexts.includes(context)) {
      entry.contexts.push(context);
    }
  }

  recordAll(parts: RichPart[], context: ImageContext): void {
    for (const part of parts) {
      if (isImagePart(part)) this.record(part, context);
    }
  }

  list(): ImageUsage[] {
    return Array.from(this.usage.values());
  }
}

export function collectImageUsage(item: QAItem, files: ImageFileMap): ImageUsage[] {
  const recorder = new ImageUsageRecorder(files);

  recorder.recordAll(item.question_rich, 'question');
  recorder.recordAll(item.question_extra, 'question');
  recorder.recordAll(item.analysis_lines, 'analysis');
  for (const choice of item.choices) {
    recorder.recordAll(choice.content, `choice:${choice.label}`);
    choice.images = choice.content.filter(isImagePart);
  }

  return recorder.list();
}

/**
 * Attach local file names to every image reference in the chapter and build
 * each question's image usage list.
 */
export function enrichImages(chapter: Chapter, files: ImageFileMap): void {
  for (const section of chapter.sections) {
    for (const item of section.items) {
      if (item.type === 'image') {
        item.image.file = files.get(item.image.url) ?? null;
      } else if (item.type === 'qa') {
        item.images = collectImageUsage(item, files);
      }
    }
  }

  chapter.images = resolveChapterImages(chapter.images, files);
}

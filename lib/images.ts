import type { ChapterImage, ImageFileMap, ImageRef } from './shared/types';

export type RawImageAttrs = {
  src?: string | null;
  width?: string | null;
  height?: string | null;
};

/**
 * Turn a raw image marker into an ImageRef, or null when it carries no URL.
 */
export function resolveImageRef(attrs: RawImageAttrs): ImageRef | null {
  const url = attrs.src?.trim();
  if (!url) return null;
  return {
    type: 'image',
    url,
    width: attrs.width || null,
    height: attrs.height || null,
    file: null,
  };
}

/**
 * Chapter-wide record of every image seen, deduplicated by URL.
 * The first reference fixes the order; later references only fill in
 * dimensions the earlier ones lacked.
 */
export class ImageLedger {
  private readonly entries = new Map<string, ChapterImage>();

  register(ref: ImageRef): void {
    const existing = this.entries.get(ref.url);
    if (!existing) {
      this.entries.set(ref.url, { url: ref.url, width: ref.width, height: ref.height, file: null });
      return;
    }
    if (!existing.width && ref.width) existing.width = ref.width;
    if (!existing.height && ref.height) existing.height = ref.height;
  }

  has(url: string): boolean {
    return this.entries.has(url);
  }

  get size(): number {
    return this.entries.size;
  }

  urls(): string[] {
    return Array.from(this.entries.keys());
  }

  images(): ChapterImage[] {
    return Array.from(this.entries.values(), image => ({ ...image }));
  }
}

/**
 * Attach resolved file names to a chapter image list. Unresolved images keep file = null.
 */
export function resolveChapterImages(images: ChapterImage[], files: ImageFileMap): ChapterImage[] {
  return images.map(image => ({ ...image, file: files.get(image.url) ?? null }));
}

import type { ImageRef, RichPart } from './types';

export function normaliseWhitespace(text: string, keepNewLines = false): string {
  const withoutNbsp = text.replace(/\u00a0/g, ' ');
  if (keepNewLines) {
    return withoutNbsp
      .replace(/\r/g, '')
      .replace(/[^\S\n]+/g, ' ') // collapse horizontal whitespace
      .replace(/ *\n */g, '\n') // remove spaces around newlines
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
  return withoutNbsp.replace(/\s+/g, ' ').trim();
}

export function isImagePart(part: RichPart): part is ImageRef {
  return part.type === 'image';
}

/**
 * Append a text run, merging it into the previous run when that one is text too.
 */
export function appendTextPart(parts: RichPart[], text: string): void {
  if (!text) return;
  const last = parts[parts.length - 1];
  if (last && last.type === 'text') {
    last.text += text;
  } else {
    parts.push({ type: 'text', text });
  }
}

/**
 * Trim text runs, drop the empty ones and keep images in place.
 */
export function compactParts(parts: RichPart[]): RichPart[] {
  const compacted: RichPart[] = [];
  for (const part of parts) {
    if (part.type === 'image') {
      compacted.push(part);
      continue;
    }
    const text = part.text.trim();
    if (text) {
      compacted.push({ type: 'text', text });
    }
  }
  return compacted;
}

/**
 * Join parts with single spaces, replacing the Nth image with "[图N]".
 */
export function joinWithImagePlaceholders(parts: RichPart[]): string {
  let imageIndex = 0;
  const segments: string[] = [];
  for (const part of parts) {
    if (part.type === 'image') {
      imageIndex++;
      segments.push(`[图${imageIndex}]`);
    } else if (part.text) {
      segments.push(part.text);
    }
  }
  return segments.join(' ').trim();
}

export function textOf(parts: RichPart[]): string[] {
  const texts: string[] = [];
  for (const part of parts) {
    if (part.type === 'text') texts.push(part.text);
  }
  return texts;
}

import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { encode } from 'html-entities';
import { resolveImageRef } from './images';
import {
  IMAGE_CLASS,
  IMAGE_HEIGHT_ATTR,
  IMAGE_SRC_ATTRS,
  IMAGE_WIDTH_ATTR
} from './shared/constants';
import type { ImageRef, RichPart } from './shared/types';
import { appendTextPart, normaliseWhitespace } from './shared/utils';

const ROOT_ID = '__chapter_root__';
const SCRIPT_MARKUP = new Set(['sub', 'sup']);
const DROPPED_TAGS = new Set(['script', 'style', 'noscript']);

export type LoadedFragment = {
  $: cheerio.CheerioAPI;
  root: cheerio.Cheerio<Element>;
};

/**
 * Load a markup fragment inside a wrapper so its top-level nodes can be walked in order.
 */
export function loadFragment(markup: string): LoadedFragment {
  const $ = cheerio.load(`<div id="${ROOT_ID}">${markup}</div>`);
  return { $, root: $<Element, string>(`#${ROOT_ID}`) };
}

/**
 * Flatten a node to text, keeping line breaks and sub/superscripts as markup
 * (<br>, <sub>..</sub>, <sup>..</sup>) for the math normalizer. Literal text is
 * entity-escaped so it can never be mistaken for a tag later on.
 */
export function stringifyWithMarkup(node: AnyNode): string {
  if (isText(node)) {
    return encode(node.data);
  }
  if (!isTag(node)) {
    return '';
  }

  const name = node.name.toLowerCase();
  if (name === 'br') return '<br>';
  if (DROPPED_TAGS.has(name)) return '';

  const inner = node.children.map(stringifyWithMarkup).join('');
  if (SCRIPT_MARKUP.has(name)) {
    const trimmed = inner.trim();
    return trimmed ? `<${name}>${trimmed}</${name}>` : '';
  }
  return inner;
}

export function nodeText(node: AnyNode): string {
  return normaliseWhitespace(stringifyWithMarkup(node));
}

export function classesOf(element: Element): Set<string> {
  const raw = element.attribs.class ?? '';
  return new Set(raw.split(/\s+/).filter(Boolean));
}

export function hasClass(element: Element, className: string): boolean {
  return classesOf(element).has(className);
}

/**
 * Read an inline image marker (span.img) into an ImageRef.
 */
export function readImage(element: Element): ImageRef | null {
  if (!hasClass(element, IMAGE_CLASS)) return null;

  let src: string | undefined;
  for (const attr of IMAGE_SRC_ATTRS) {
    src = element.attribs[attr];
    if (src) break;
  }

  return resolveImageRef({
    src,
    width: element.attribs[IMAGE_WIDTH_ATTR],
    height: element.attribs[IMAGE_HEIGHT_ATTR],
  });
}

/**
 * All inline images below an element, in document order.
 */
export function findImages($: cheerio.CheerioAPI, element: Element): ImageRef[] {
  const images: ImageRef[] = [];
  $(element).find(`span.${IMAGE_CLASS}`).each((_, span) => {
    const image = readImage(span);
    if (image) images.push(image);
  });
  return images;
}

/**
 * Append a node's text and inline images to parts in document order, walking
 * into plain wrapper elements so nested images are kept as image parts.
 */
export function collectRichParts(node: AnyNode, parts: RichPart[]): void {
  if (isTag(node)) {
    const image = readImage(node);
    if (image) {
      parts.push(image);
      return;
    }
    if (hasClass(node, IMAGE_CLASS)) return;

    const name = node.name.toLowerCase();
    if (name !== 'br' && !SCRIPT_MARKUP.has(name) && !DROPPED_TAGS.has(name)) {
      for (const child of node.children) {
        collectRichParts(child, parts);
      }
      return;
    }
  }
  appendTextPart(parts, stringifyWithMarkup(node));
}

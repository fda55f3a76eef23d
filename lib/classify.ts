import type * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { ChapterParseError } from './errors';
import { ImageLedger } from './images';
import {
  classesOf,
  collectRichParts,
  findImages,
  loadFragment,
  nodeText,
  type LoadedFragment,
  readImage
} from './markup';
import { QuestionAccumulator, cleanQuestionNumber, createQAItem } from './question';
import {
  ANALYSIS_PREFIX,
  ANSWER_PREFIX,
  ANSWER_TAG_CLASS,
  BLOCK_CLASS,
  HEADING_LEVEL,
  IMAGE_CLASS,
  QUESTION_NUMBER_CLASSES,
  RESOLVE_TAG_CLASS
} from './shared/constants';
import type {
  Chapter,
  ImageRef,
  Logger,
  ParsedChapter,
  RichPart,
  Section,
  SectionItem
} from './shared/types';
import { joinWithImagePlaceholders, normaliseWhitespace } from './shared/utils';

// ============================================================================
// CHAPTER BUILDER
// ============================================================================

/**
 * Mutable chapter under construction: the current section, the open question
 * and the chapter-wide image ledger. Only the block rules write to it, one
 * block at a time in document order.
 */
export class ChapterBuilder {
  readonly chapter: Chapter;
  readonly ledger = new ImageLedger();
  private section: Section | null = null;
  private question: QuestionAccumulator | null = null;

  constructor(chapterId: string) {
    this.chapter = { id: chapterId, title: '', sections: [], images: [] };
  }

  get openQuestion(): QuestionAccumulator | null {
    return this.question;
  }

  setTitle(title: string): void {
    this.closeQuestion();
    this.chapter.title = title;
  }

  openSection(title: string | null): void {
    this.closeQuestion();
    this.section = { title, items: [] };
    this.chapter.sections.push(this.section);
  }

  addItem(item: SectionItem): void {
    if (!this.section) {
      this.openSection(null);
    }
    this.section?.items.push(item);
  }

  addHeading(text: string): void {
    this.closeQuestion();
    this.addItem({ type: 'heading', level: HEADING_LEVEL, text });
  }

  startQuestion(question: QuestionAccumulator): void {
    this.closeQuestion();
    this.addItem(question.item);
    this.question = question;
  }

  closeQuestion(): void {
    this.question?.close();
    this.question = null;
  }

  /** Free text: into the open question, or a text block of its own. */
  addText(text: string): void {
    if (!text) return;
    if (this.question) {
      this.question.addText(text);
    } else {
      this.addItem({ type: 'text', text });
    }
  }

  /** Inline image: always recorded in the ledger, then placed like free text. */
  addImage(image: ImageRef): void {
    this.ledger.register(image);
    if (this.question) {
      this.question.addImage(image);
    } else {
      this.addItem({ type: 'image', image });
    }
  }

  /** Image that belongs to an analysis line, whatever the question's state. */
  addAnalysisImage(image: ImageRef): void {
    this.ledger.register(image);
    if (this.question) {
      this.question.addAnalysis(image);
    } else {
      this.addItem({ type: 'image', image });
    }
  }

  finish(): ParsedChapter {
    this.closeQuestion();
    this.chapter.images = this.ledger.images();
    return { chapter: this.chapter, imageUrls: this.ledger.urls() };
  }
}

// ============================================================================
// BLOCK RULES
// ============================================================================

export type BlockKind =
  | 'chapter-title'
  | 'section-title'
  | 'split'
  | 'tag-box'
  | 'heading'
  | 'question-start'
  | 'answer-prefix'
  | 'analysis-prefix'
  | 'image'
  | 'free-text';

export type BlockContext = {
  $: cheerio.CheerioAPI;
  node: AnyNode;
  element: Element | null; // null for a bare top-level text node
  tag: string | null;
  classes: Set<string>;
  text: string;
};

export type BlockRule = {
  kind: BlockKind;
  matches(ctx: BlockContext, builder: ChapterBuilder): boolean;
  apply(ctx: BlockContext, builder: ChapterBuilder): void;
};

function isParagraph(ctx: BlockContext): ctx is BlockContext & { element: Element; } {
  return ctx.element !== null && ctx.tag === 'p';
}

// Free-text lines: p blocks and bare top-level text
function isParagraphOrText(ctx: BlockContext): boolean {
  return isParagraph(ctx) || ctx.element === null;
}

function paragraphWithClass(className: string) {
  return (ctx: BlockContext): boolean => isParagraph(ctx) && ctx.classes.has(className);
}

function routeBlockImages(ctx: BlockContext, builder: ChapterBuilder): void {
  if (!ctx.element) return;
  for (const image of findImages(ctx.$, ctx.element)) {
    builder.addImage(image);
  }
}

function findChildWithClass($: cheerio.CheerioAPI, element: Element, className: string): Element | null {
  return $(element).find(`span.${className}`).toArray()[0] ?? null;
}

/**
 * Pull the question number marker out of a question block, removing it from the DOM.
 */
function extractQuestionNumber($: cheerio.CheerioAPI, element: Element): string | null {
  for (const className of QUESTION_NUMBER_CLASSES) {
    const span = findChildWithClass($, element, className);
    if (!span) continue;
    const number = cleanQuestionNumber($(span).text());
    $(span).remove();
    return number;
  }
  return null;
}

function readQuestionParts(element: Element): RichPart[] {
  const parts: RichPart[] = [];
  for (const child of element.children) {
    collectRichParts(child, parts);
  }

  const cleaned: RichPart[] = [];
  for (const part of parts) {
    if (part.type === 'image') {
      cleaned.push(part);
      continue;
    }
    const text = normaliseWhitespace(part.text);
    if (text) cleaned.push({ type: 'text', text });
  }
  return cleaned;
}

// Order is significant: the first matching rule handles the block.
export const BLOCK_RULES: readonly BlockRule[] = [
  {
    kind: 'chapter-title',
    matches: paragraphWithClass(BLOCK_CLASS.chapterTitle),
    apply: (ctx, builder) => builder.setTitle(ctx.text),
  },
  {
    kind: 'section-title',
    matches: paragraphWithClass(BLOCK_CLASS.sectionTitle),
    apply: (ctx, builder) => builder.openSection(ctx.text),
  },
  {
    kind: 'split',
    matches: ctx => paragraphWithClass(BLOCK_CLASS.split)(ctx) && !ctx.text,
    apply: () => undefined,
  },
  {
    kind: 'tag-box',
    matches: (ctx, builder) => {
      if (!isParagraph(ctx) || !ctx.classes.has(BLOCK_CLASS.tagBox) || !builder.openQuestion) {
        return false;
      }
      return findChildWithClass(ctx.$, ctx.element, ANSWER_TAG_CLASS) !== null
        || findChildWithClass(ctx.$, ctx.element, RESOLVE_TAG_CLASS) !== null;
    },
    apply: (ctx, builder) => {
      const question = builder.openQuestion;
      if (!ctx.element || !question) return;

      const answerSpan = findChildWithClass(ctx.$, ctx.element, ANSWER_TAG_CLASS);
      if (answerSpan) {
        question.addAnswer(nodeText(answerSpan));
        routeBlockImages(ctx, builder);
        return;
      }

      const resolveSpan = findChildWithClass(ctx.$, ctx.element, RESOLVE_TAG_CLASS);
      if (resolveSpan) {
        ctx.$(resolveSpan).remove();
        question.addAnalysis(nodeText(ctx.element));
        for (const image of findImages(ctx.$, ctx.element)) {
          builder.addAnalysisImage(image);
        }
      }
    },
  },
  {
    kind: 'heading',
    matches: paragraphWithClass(BLOCK_CLASS.heading),
    apply: (ctx, builder) => builder.addHeading(ctx.text),
  },
  {
    kind: 'question-start',
    matches: paragraphWithClass(BLOCK_CLASS.questionTitle),
    apply: (ctx, builder) => {
      if (!ctx.element) return;
      const number = extractQuestionNumber(ctx.$, ctx.element);
      const parts = readQuestionParts(ctx.element);
      const question = joinWithImagePlaceholders(parts) || nodeText(ctx.element);

      builder.startQuestion(new QuestionAccumulator(createQAItem(number, question, parts)));
      for (const part of parts) {
        if (part.type === 'image') builder.ledger.register(part);
      }
    },
  },
  {
    kind: 'answer-prefix',
    matches: ctx => isParagraphOrText(ctx) && ctx.text.startsWith(ANSWER_PREFIX),
    apply: (ctx, builder) => {
      const question = builder.openQuestion;
      if (question) {
        question.addAnswer(ctx.text.slice(ANSWER_PREFIX.length).trim());
      } else {
        builder.addItem({ type: 'text', text: ctx.text });
      }
      routeBlockImages(ctx, builder);
    },
  },
  {
    kind: 'analysis-prefix',
    matches: ctx => isParagraphOrText(ctx) && ctx.text.startsWith(ANALYSIS_PREFIX),
    apply: (ctx, builder) => {
      const question = builder.openQuestion;
      if (question) {
        question.addAnalysis(ctx.text.slice(ANALYSIS_PREFIX.length).trim());
      } else {
        builder.addItem({ type: 'text', text: ctx.text });
      }
      if (!ctx.element) return;
      for (const image of findImages(ctx.$, ctx.element)) {
        builder.addAnalysisImage(image);
      }
    },
  },
  {
    kind: 'image',
    matches: ctx => ctx.element !== null && ctx.tag === 'span' && ctx.classes.has(IMAGE_CLASS),
    apply: (ctx, builder) => {
      const image = ctx.element ? readImage(ctx.element) : null;
      if (image) builder.addImage(image);
    },
  },
  {
    kind: 'free-text',
    matches: ctx => isParagraphOrText(ctx) && (ctx.element !== null || ctx.text.length > 0),
    apply: (ctx, builder) => {
      builder.addText(ctx.text);
      routeBlockImages(ctx, builder);
    },
  },
];

function blockContext($: cheerio.CheerioAPI, node: AnyNode): BlockContext | null {
  if (isText(node)) {
    return { $, node, element: null, tag: null, classes: new Set(), text: nodeText(node) };
  }
  if (!isTag(node)) return null;
  return {
    $,
    node,
    element: node,
    tag: node.name.toLowerCase(),
    classes: classesOf(node),
    text: nodeText(node),
  };
}

/**
 * Apply the first matching rule to one top-level node.
 * Returns the kind of rule used, or null when the node was skipped.
 */
export function classifyBlock(ctx: BlockContext, builder: ChapterBuilder): BlockKind | null {
  const rule = BLOCK_RULES.find(candidate => candidate.matches(ctx, builder));
  if (!rule) return null;
  rule.apply(ctx, builder);
  return rule.kind;
}

// ============================================================================
// ENTRY POINT
// ============================================================================

export type ParseOptions = {
  logger?: Logger;
};

/**
 * Build the chapter tree from decrypted chapter markup.
 *
 * Nodes no rule recognises are skipped; only markup that cannot be loaded at
 * all raises a ChapterParseError.
 */
export function parseChapter(markup: string, chapterId: string, options: ParseOptions = {}): ParsedChapter {
  const logger = options.logger ?? console;

  if (typeof markup !== 'string') {
    throw new ChapterParseError(chapterId, `expected markup string, got ${typeof markup}`);
  }
  if (!markup.trim()) {
    throw new ChapterParseError(chapterId, 'markup is empty');
  }

  let fragment: LoadedFragment;
  try {
    fragment = loadFragment(markup);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ChapterParseError(chapterId, reason, { cause: error });
  }

  const { $, root } = fragment;
  const builder = new ChapterBuilder(chapterId);
  let skipped = 0;

  root.contents().each((_, node) => {
    const ctx = blockContext($, node);
    if (!ctx) return;
    if (ctx.element === null && !ctx.text) return; // whitespace between blocks
    if (classifyBlock(ctx, builder) === null) {
      skipped++;
    }
  });

  if (skipped > 0) {
    logger.warn(`Chapter ${chapterId}: skipped ${skipped} unrecognised top-level node(s)`);
  }

  return builder.finish();
}

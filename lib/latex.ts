import { decode as htmlDecode } from 'html-entities';
import {
  FULLWIDTH_REPLACEMENTS,
  MATH_CONNECTOR_PATTERN,
  MATH_DELIMITER,
  MATH_SPAN_PATTERN,
  MATH_TOUCHING_CHAR
} from './shared/constants';
import type { Chapter, RichPart } from './shared/types';
import { normaliseWhitespace } from './shared/utils';

type Segment = {
  kind: 'math' | 'text';
  content: string;
};

/**
 * Split text into literal and $..$ math segments. An unmatched $ and
 * everything after it stays literal.
 */
function splitMathSegments(text: string): Segment[] {
  const segments: Segment[] = [];
  let i = 0;

  while (i < text.length) {
    if (text[i] === MATH_DELIMITER) {
      const close = text.indexOf(MATH_DELIMITER, i + 1);
      if (close === -1) {
        segments.push({ kind: 'text', content: text.slice(i) });
        break;
      }
      segments.push({ kind: 'math', content: text.slice(i + 1, close) });
      i = close + 1;
    } else {
      let next = text.indexOf(MATH_DELIMITER, i);
      if (next === -1) next = text.length;
      segments.push({ kind: 'text', content: text.slice(i, next) });
      i = next;
    }
  }

  return segments;
}

// ============================================================================
// STAGE A: MARKUP LOWERING
// ============================================================================

export function lowerMarkup(text: string): string {
  let core = text
    .replace(/\u00a0/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/<\s*br\s*\/?>/gi, '\n')
    .replace(/<\s*sub\s*>/gi, '_{')
    .replace(/<\s*\/\s*sub\s*>/gi, '}')
    .replace(/<\s*sup\s*>/gi, '^{')
    .replace(/<\s*\/\s*sup\s*>/gi, '}')
    .replace(/<[^>]+>/g, '');

  core = htmlDecode(core);

  for (const [fullwidth, ascii] of FULLWIDTH_REPLACEMENTS) {
    core = core.replaceAll(fullwidth, ascii);
  }

  return core
    .replace(/\{\s+/g, '{')
    .replace(/\s+\}/g, '}')
    .replace(/[^\S\n]+(?=[\^_]\{)/g, ''); // a script group binds to the token before it
}

// ============================================================================
// STAGE B: SCRIPT MERGING
// ============================================================================

const ADJACENT_SCRIPTS: ReadonlyArray<readonly [string, RegExp]> = [
  ['^', /\^\{([^}]+)\}\^\{([^}]+)\}/g],
  ['_', /_\{([^}]+)\}_\{([^}]+)\}/g],
];

/**
 * ^{a}^{b} -> ^{ab} and _{a}_{b} -> _{ab}, repeated until nothing changes.
 */
export function mergeAdjacentScripts(text: string): string {
  let merged = text;
  for (const [marker, pattern] of ADJACENT_SCRIPTS) {
    let previous: string;
    do {
      previous = merged;
      merged = merged.replace(pattern, `${marker}{$1$2}`);
    } while (merged !== previous);
  }
  return merged;
}

// ============================================================================
// STAGE C: MATH SPAN DETECTION
// ============================================================================

function joinSegments(segments: Segment[]): string {
  let out = '';
  let previous: Segment['kind'] | null = null;

  for (const segment of segments) {
    if (segment.kind === 'math') {
      const before = out.slice(-1);
      if (previous === 'math' || (before && MATH_TOUCHING_CHAR.test(before))) {
        out += ' ';
      }
      out += `${MATH_DELIMITER}${segment.content}${MATH_DELIMITER}`;
    } else {
      const after = segment.content.charAt(0);
      if (previous === 'math' && after && MATH_TOUCHING_CHAR.test(after)) {
        out += ' ';
      }
      out += segment.content;
    }
    previous = segment.kind;
  }

  return out;
}

/**
 * Wrap script-carrying expressions and \command{..} runs in $..$. Text that
 * is already inside a math span, or follows an unmatched $, is left alone.
 */
export function wrapMathSpans(text: string): string {
  const segments: Segment[] = [];

  for (const segment of splitMathSegments(text)) {
    // an unmatched $ tail stays as typed
    if (segment.kind === 'math' || segment.content.startsWith(MATH_DELIMITER)) {
      segments.push(segment);
      continue;
    }

    let last = 0;
    for (const match of segment.content.matchAll(MATH_SPAN_PATTERN)) {
      const start = match.index ?? 0;
      if (start > last) {
        segments.push({ kind: 'text', content: segment.content.slice(last, start) });
      }
      segments.push({ kind: 'math', content: match[0] });
      last = start + match[0].length;
    }
    if (last < segment.content.length) {
      segments.push({ kind: 'text', content: segment.content.slice(last) });
    }
  }

  return joinSegments(segments);
}

// ============================================================================
// STAGE D: SPAN COALESCING
// ============================================================================

/**
 * Canonical spacing inside one math span: " = ", tight + - * /, ", ",
 * no padding inside parentheses, scripts and braces.
 */
export function formatMathExpression(expression: string): string {
  const trimmed = expression.trim();
  if (!trimmed) return trimmed;

  return trimmed
    .replace(/\s+/g, ' ')
    .replace(/\s*([+\-*/])\s*/g, '$1')
    .replace(/\s*=\s*/g, ' = ')
    .replace(/\s*,\s*/g, ', ')
    .replace(/\(\s+/g, '(')
    .replace(/\s+\)/g, ')')
    .replace(/\s*\^\s*/g, '^')
    .replace(/\s*_\s*/g, '_')
    .replace(/([\^_])\{\s*-\s*([^{}]+?)\s*\}/g, (_match: string, marker: string, body: string) => {
      return `${marker}{-${body.replace(/\s+/g, '')}}`;
    })
    .replace(/\{\s*([^{}]*?)\s*\}/g, (_match: string, body: string) => {
      return `{${body.replace(/\s+/g, ' ').trim()}}`;
    })
    .replace(/ ,/g, ',')
    .trim();
}

/**
 * Merge math spans separated only by connector text (whitespace, digits,
 * punctuation, operators) into one span and reformat it. Running this on its
 * own output changes nothing.
 */
export function coalesceMathSpans(text: string): string {
  if (!text.includes(MATH_DELIMITER)) return text;

  const out: string[] = [];
  let buffer: string | null = null;
  let pending = '';

  const flush = () => {
    if (buffer !== null) {
      const formatted = formatMathExpression(buffer + pending);
      if (formatted) out.push(`${MATH_DELIMITER}${formatted}${MATH_DELIMITER}`);
    }
    buffer = null;
    pending = '';
  };

  for (const segment of splitMathSegments(text)) {
    if (segment.kind === 'math') {
      buffer = buffer === null ? segment.content : buffer + pending + segment.content;
      pending = '';
      continue;
    }
    if (buffer !== null && MATH_CONNECTOR_PATTERN.test(segment.content)) {
      pending += segment.content;
      continue;
    }
    flush();
    out.push(segment.content);
  }
  flush();

  return out.join('');
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Markup lowering, script merging, span detection and coalescing, in that order.
 */
export function normalizeMath(text: string): string {
  if (!text) return text;
  let core = lowerMarkup(text);
  core = mergeAdjacentScripts(core);
  core = normaliseWhitespace(core, true);
  core = wrapMathSpans(core);
  return coalesceMathSpans(core);
}

function normalizeParts(parts: RichPart[]): void {
  for (const part of parts) {
    if (part.type === 'text') {
      part.text = normalizeMath(part.text);
    }
  }
}

/**
 * Normalize every leaf string of the chapter in place. Each string is handled
 * on its own; nothing is merged across items.
 */
export function applyLatexMarkup(chapter: Chapter): void {
  chapter.title = normalizeMath(chapter.title);

  for (const section of chapter.sections) {
    if (section.title) {
      section.title = normalizeMath(section.title);
    }

    for (const item of section.items) {
      switch (item.type) {
        case 'heading':
        case 'text':
          item.text = normalizeMath(item.text);
          break;
        case 'qa':
          item.question = normalizeMath(item.question);
          normalizeParts(item.question_rich);
          normalizeParts(item.question_extra);
          normalizeParts(item.analysis_lines);
          for (const choice of item.choices) {
            normalizeParts(choice.content);
          }
          item.answer_lines = item.answer_lines.map(normalizeMath);
          break;
        case 'image':
          break;
      }
    }
  }
}

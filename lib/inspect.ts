import { decode } from 'html-entities';
import { NoMatchingQuestionError } from './errors';
import { loadFragment, stringifyWithMarkup } from './markup';
import { cleanQuestionNumber } from './question';
import { chapterFileSchema, structuredQuestionSchema, type StructuredQuestion } from './schemas';
import { BLOCK_CLASS, QUESTION_NUMBER_CLASSES } from './shared/constants';
import { normaliseWhitespace } from './shared/utils';

export type QuestionNode = {
  index: number; // 1-based position among question blocks
  number: string | null;
  occurrence: number | null; // nth block carrying this number
  html: string;
  text: string; // flattened, number marker removed
};

export type QuestionFilter = {
  number?: string;
  index?: number;
  limit?: number;
};

export type StructuredLookup = Map<string, StructuredQuestion[]>;

const NUMBER_SELECTOR = QUESTION_NUMBER_CLASSES.map(className => `span.${className}`).join(', ');

/**
 * Every question block of a chapter, in document order.
 */
export function listQuestionNodes(markup: string): QuestionNode[] {
  const { $, root } = loadFragment(markup);
  const counts = new Map<string, number>();
  const nodes: QuestionNode[] = [];

  root.find(`p.${BLOCK_CLASS.questionTitle}`).each((i, element) => {
    let number: string | null = null;
    for (const className of QUESTION_NUMBER_CLASSES) {
      const span = $(element).find(`span.${className}`).first();
      if (span.length > 0) {
        number = cleanQuestionNumber(span.text());
        break;
      }
    }

    let occurrence: number | null = null;
    if (number) {
      occurrence = (counts.get(number) ?? 0) + 1;
      counts.set(number, occurrence);
    }

    const clone = $(element).clone();
    clone.find(NUMBER_SELECTOR).remove();
    const cleaned = clone.get(0);

    nodes.push({
      index: i + 1,
      number,
      occurrence,
      html: $.html(element),
      text: cleaned ? flattenMarkup(stringifyWithMarkup(cleaned)) : '',
    });
  });

  return nodes;
}

/**
 * Readable form of stringified block markup: <br> becomes a newline, sub/sup
 * tags stay, entities are decoded.
 */
export function flattenMarkup(markup: string): string {
  return normaliseWhitespace(decode(markup.replace(/<br>/g, '\n')), true);
}

export function selectQuestions(nodes: QuestionNode[], filter: QuestionFilter = {}): QuestionNode[] {
  let matches = nodes;
  if (filter.index !== undefined) {
    matches = nodes.filter(node => node.index === filter.index);
  } else if (filter.number !== undefined) {
    matches = nodes.filter(node => node.number === filter.number);
  }

  if (matches.length === 0) {
    const available = nodes.map(node => node.number).filter((n): n is string => n !== null);
    throw new NoMatchingQuestionError(available);
  }

  return filter.limit !== undefined && filter.limit > 0 ? matches.slice(0, filter.limit) : matches;
}

/**
 * Index the question entries of a parsed chapter.json by number. Entries that
 * do not look like questions are ignored.
 */
export function buildStructuredLookup(data: unknown): StructuredLookup {
  const lookup: StructuredLookup = new Map();
  const parsed = chapterFileSchema.safeParse(data);
  if (!parsed.success) return lookup;

  for (const section of parsed.data.sections) {
    for (const item of section.items) {
      const question = structuredQuestionSchema.safeParse(item);
      if (!question.success || !question.data.number) continue;
      const list = lookup.get(question.data.number) ?? [];
      list.push(question.data);
      lookup.set(question.data.number, list);
    }
  }
  return lookup;
}

export function matchStructured(node: QuestionNode, lookup: StructuredLookup): StructuredQuestion | null {
  if (!node.number || !node.occurrence) return null;
  return lookup.get(node.number)?.[node.occurrence - 1] ?? null;
}

export function describeQuestion(node: QuestionNode, structured: StructuredQuestion | null): string[] {
  const rule = '='.repeat(72);
  const label = node.number ?? `#${node.index}`;
  const lines = [rule, `Question ${label}`, rule];

  if (node.occurrence) {
    lines.push(`(Occurrence ${node.occurrence} among question blocks numbered ${label})`);
  }
  lines.push('Raw HTML block:', node.html, '', 'Flattened text (markup preserved):', node.text);

  if (!structured) {
    lines.push('', 'Structured JSON entry not found.');
    return lines;
  }

  lines.push('', 'Structured JSON fields:', `- question: ${JSON.stringify(structured.question)}`);
  if (structured.question_rich.length > 0) {
    lines.push('- question_rich:');
    for (const part of structured.question_rich) {
      lines.push(part.type === 'image'
        ? `    • [image] url=${part.url} file=${part.file} size=${part.width}x${part.height}`
        : `    • ${JSON.stringify(part.text)}`);
    }
  }
  if (structured.analysis_lines.length > 0) {
    lines.push('- analysis_lines:');
    for (const part of structured.analysis_lines) {
      lines.push(part.type === 'image'
        ? `    • [image] url=${part.url} file=${part.file}`
        : `    • ${JSON.stringify(part.text)}`);
    }
  }
  if (structured.answer_lines.length > 0) {
    lines.push(`- answer_lines: ${JSON.stringify(structured.answer_lines)}`);
  }
  return lines;
}

import type { Chapter, Logger, QAItem } from './shared/types';
import { compactParts, isImagePart, joinWithImagePlaceholders, textOf } from './shared/utils';

/**
 * Resolve raw answer captures into the final answer lines.
 *
 * A raw line equal to one of the item's choice labels is an echo. Echoes are
 * never emitted in place: the first one seen (the preferred echo) is appended
 * once after all other lines, the rest are dropped. Every other line is kept
 * once, in order.
 */
export function resolveAnswerLines(rawLines: string[], labels: ReadonlySet<string>): string[] {
  const raw = rawLines.map(line => line.trim()).filter(Boolean);
  const preferred = raw.find(line => labels.has(line)) ?? null;

  const lines: string[] = [];
  const seen = new Set<string>();
  for (const line of raw) {
    if (labels.has(line) || seen.has(line)) continue;
    seen.add(line);
    lines.push(line);
  }

  if (preferred !== null && !seen.has(preferred)) {
    lines.push(preferred);
  }
  return lines;
}

function warnOnRepeatedEchoes(item: QAItem, labels: ReadonlySet<string>, logger: Logger): void {
  const counts = new Map<string, number>();
  for (const line of item.answer_lines) {
    const trimmed = line.trim();
    if (labels.has(trimmed)) {
      counts.set(trimmed, (counts.get(trimmed) ?? 0) + 1);
    }
  }
  for (const [label, count] of counts) {
    if (count > 2) {
      logger.warn(`Question ${item.number ?? '(unnumbered)'}: choice label ${label} appears ${count} times in raw answer lines`);
    }
  }
}

export function finalizeQaItem(item: QAItem, logger: Logger = console): void {
  item.question_rich = compactParts(item.question_rich);
  item.question = item.question_rich.length > 0
    ? joinWithImagePlaceholders(item.question_rich)
    : item.question.trim();

  const labels = new Set(item.choices.map(choice => choice.label).filter(Boolean));
  warnOnRepeatedEchoes(item, labels, logger);
  item.answer_lines = resolveAnswerLines(item.answer_lines, labels);
  item.answer = item.answer_lines.length > 0 ? item.answer_lines.join(' ') : null;

  item.analysis_lines = compactParts(item.analysis_lines);
  const analysisText = textOf(item.analysis_lines);
  item.analysis = analysisText.length > 0 ? analysisText.join('\n') : null;

  item.question_extra = compactParts(item.question_extra);

  for (const choice of item.choices) {
    choice.content = compactParts(choice.content);
    choice.images = choice.content.filter(isImagePart);
  }
}

export function finalizeChapter(chapter: Chapter, logger: Logger = console): void {
  for (const section of chapter.sections) {
    for (const item of section.items) {
      if (item.type === 'qa') {
        finalizeQaItem(item, logger);
      }
    }
  }
}

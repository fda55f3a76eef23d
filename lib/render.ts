import {
  ANALYSIS_IMAGE_ALT,
  ANALYSIS_LABEL,
  ANSWER_LABEL,
  BLOCK_IMAGE_ALT,
  CHOICE_IMAGE_ALT,
  DEFAULT_IMAGE_DIR,
  HEADING_LEVEL,
  MISSING_IMAGE_LABEL,
  QUESTION_IMAGE_ALT
} from './shared/constants';
import type { Chapter, Choice, ImageRef, QAItem, SectionItem } from './shared/types';
import { isImagePart, textOf } from './shared/utils';

export type RenderOptions = {
  imageDir?: string;
};

type ImageRenderer = (image: ImageRef, alt: string) => string;

function imageRenderer(imageDir: string): ImageRenderer {
  const prefix = imageDir.replace(/\/+$/, '');
  return (image, alt) => image.file
    ? `![${alt}](${prefix ? `${prefix}/` : ''}${image.file})`
    : `[${MISSING_IMAGE_LABEL}](${image.url})`;
}

function renderChoice(choice: Choice, renderImage: ImageRenderer): string[] {
  const text = textOf(choice.content);
  const [firstImage, ...restImages] = choice.content.filter(isImagePart);

  let line = `- ${choice.label}.`;
  if (text.length > 0) line += ` ${text.join(' ')}`;
  if (firstImage) line += ` ${renderImage(firstImage, CHOICE_IMAGE_ALT)}`;

  return [line, ...restImages.map(image => `  ${renderImage(image, CHOICE_IMAGE_ALT)}`)];
}

function renderQuestion(item: QAItem, renderImage: ImageRenderer): string {
  const lines: string[] = [];
  const prefix = item.number ? `${item.number}. ` : '';

  const stem = item.question_rich.length > 0
    ? item.question_rich
      .map(part => isImagePart(part) ? renderImage(part, QUESTION_IMAGE_ALT) : part.text)
      .filter(Boolean)
      .join(' ')
      .trim()
    : item.question;
  lines.push(`**${prefix}${stem}**`);

  for (const extra of item.question_extra) {
    lines.push(isImagePart(extra) ? renderImage(extra, QUESTION_IMAGE_ALT) : extra.text);
  }

  const choices = item.choices.filter(choice => choice.label);
  if (choices.length > 0) {
    lines.push('');
    for (const choice of choices) {
      lines.push(...renderChoice(choice, renderImage));
    }
  }

  const answers = item.answer_lines.filter(Boolean);
  if (answers.length === 1) {
    lines.push(`- **${ANSWER_LABEL}** ${answers[0]}`);
  } else if (answers.length > 1) {
    lines.push(`- **${ANSWER_LABEL}**`);
    for (const answer of answers) lines.push(`  - ${answer}`);
  }

  const analysis = item.analysis_lines;
  const [onlyEntry] = analysis;
  if (analysis.length === 1 && onlyEntry && !isImagePart(onlyEntry)) {
    lines.push(`- **${ANALYSIS_LABEL}** ${onlyEntry.text}`);
  } else if (analysis.length > 0) {
    lines.push(`- **${ANALYSIS_LABEL}**`);
    for (const entry of analysis) {
      lines.push(isImagePart(entry)
        ? `  - ${renderImage(entry, ANALYSIS_IMAGE_ALT)}`
        : `  - ${entry.text}`);
    }
  }

  return lines.join('\n');
}

function renderItem(item: SectionItem, renderImage: ImageRenderer): string | null {
  switch (item.type) {
    case 'heading':
      return `${'#'.repeat(Math.max(HEADING_LEVEL, item.level))} ${item.text}`;
    case 'text':
      return item.text || null;
    case 'image':
      return renderImage(item.image, BLOCK_IMAGE_ALT);
    case 'qa':
      return renderQuestion(item, renderImage);
  }
}

/**
 * Render a completed chapter as Markdown. Blocks are separated by one blank
 * line and the result carries no leading or trailing whitespace.
 */
export function renderMarkdown(chapter: Chapter, options: RenderOptions = {}): string {
  const renderImage = imageRenderer(options.imageDir ?? DEFAULT_IMAGE_DIR);
  const blocks: string[] = [];

  if (chapter.title) blocks.push(`# ${chapter.title}`);

  for (const section of chapter.sections) {
    if (section.title) blocks.push(`## ${section.title}`);
    for (const item of section.items) {
      const block = renderItem(item, renderImage);
      if (block) blocks.push(block);
    }
  }

  return blocks.join('\n\n').trim();
}

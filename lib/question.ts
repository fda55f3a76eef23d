import { QuestionClosedError } from './errors';
import {
  ASCII_CHOICE_LABELS,
  CHOICE_DELIMITERS,
  FULLWIDTH_CHOICE_LABELS
} from './shared/constants';
import type { Choice, ImageRef, QAItem, RichPart } from './shared/types';

export type QuestionState = 'pre-answer' | 'post-answer' | 'closed';

export type ChoiceSplit = {
  label: string;
  remainder: string;
};

function isChoiceLabel(char: string): boolean {
  return ASCII_CHOICE_LABELS.includes(char) || FULLWIDTH_CHOICE_LABELS.includes(char);
}

/**
 * Recognise a choice line such as "A．red", "Ｂ、blue" or a bare "C".
 */
export function splitChoice(text: string): ChoiceSplit | null {
  const stripped = text.trim();
  if (!stripped) return null;

  const label = stripped[0];
  if (!isChoiceLabel(label)) return null;
  if (stripped.length === 1) return { label, remainder: '' };
  if (!CHOICE_DELIMITERS.includes(stripped[1])) return null;

  let start = 2;
  while (start < stripped.length && CHOICE_DELIMITERS.includes(stripped[start])) {
    start++;
  }
  return { label, remainder: stripped.slice(start) };
}

/**
 * "4．" -> "4". Returns null when nothing is left.
 */
export function cleanQuestionNumber(raw: string): string | null {
  return raw.trim().replace(/[\s．.、:：)）]+$/u, '') || null;
}

export function createQAItem(number: string | null, question: string, questionRich: RichPart[]): QAItem {
  return {
    type: 'qa',
    number,
    question,
    question_rich: questionRich,
    question_extra: [],
    choices: [],
    answer_lines: [],
    answer: null,
    analysis_lines: [],
    analysis: null,
    images: [],
  };
}

/**
 * The open question while its following blocks are read.
 *
 * Before the first answer line, free text is split into choices (continuation
 * lines go to the active choice, or to question_extra when there is none).
 * Once an answer has been recorded every further free line is analysis.
 * The active choice is kept as an index into item.choices and never leaves
 * this object.
 */
export class QuestionAccumulator {
  readonly item: QAItem;
  private activeChoice: number | null = null;
  private closed = false;

  constructor(item: QAItem) {
    this.item = item;
  }

  get state(): QuestionState {
    if (this.closed) return 'closed';
    return this.item.answer_lines.length > 0 ? 'post-answer' : 'pre-answer';
  }

  get activeChoiceLabel(): string | null {
    return this.currentChoice()?.label ?? null;
  }

  addText(text: string): void {
    this.assertOpen();
    if (!text) return;

    if (this.state === 'post-answer') {
      this.item.analysis_lines.push({ type: 'text', text });
      return;
    }

    const split = splitChoice(text);
    if (split && !this.hasChoice(split.label)) {
      const choice: Choice = {
        label: split.label,
        content: split.remainder ? [{ type: 'text', text: split.remainder }] : [],
        images: [],
      };
      this.item.choices.push(choice);
      this.activeChoice = this.item.choices.length - 1;
      return;
    }

    const active = this.currentChoice();
    if (active) {
      active.content.push({ type: 'text', text });
    } else {
      this.item.question_extra.push({ type: 'text', text });
    }
  }

  addImage(image: ImageRef): void {
    this.assertOpen();

    if (this.state === 'post-answer') {
      this.item.analysis_lines.push(image);
      return;
    }

    const active = this.currentChoice();
    if (active) {
      active.content.push(image);
      active.images.push(image);
    } else {
      this.item.question_extra.push(image);
    }
  }

  addAnswer(line: string): void {
    this.assertOpen();
    if (!line) return;
    this.item.answer_lines.push(line);
    this.activeChoice = null;
  }

  addAnalysis(part: string | ImageRef): void {
    this.assertOpen();
    if (typeof part === 'string') {
      if (part) this.item.analysis_lines.push({ type: 'text', text: part });
    } else {
      this.item.analysis_lines.push(part);
    }
  }

  close(): void {
    this.closed = true;
    this.activeChoice = null;
  }

  private currentChoice(): Choice | null {
    if (this.activeChoice === null || this.state !== 'pre-answer') return null;
    return this.item.choices[this.activeChoice] ?? null;
  }

  private hasChoice(label: string): boolean {
    return this.item.choices.some(choice => choice.label === label);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new QuestionClosedError(this.item.number);
    }
  }
}

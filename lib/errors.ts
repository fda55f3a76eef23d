/**
 * Raised when a chapter's markup cannot be parsed at all. The parser does not
 * try to salvage partial output from such input.
 */
export class ChapterParseError extends Error {
  readonly chapterId: string;

  constructor(chapterId: string, message: string, options?: { cause?: unknown; }) {
    super(`Failed to parse chapter ${chapterId}: ${message}`, options);
    this.name = 'ChapterParseError';
    this.chapterId = chapterId;
  }
}

/**
 * Raised when something is written to a question after it was closed.
 */
export class QuestionClosedError extends Error {
  constructor(number: string | null) {
    super(`Question ${number ?? '(unnumbered)'} is already closed`);
    this.name = 'QuestionClosedError';
  }
}

/**
 * Raised for configuration or input files that fail validation.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown; }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised by the question inspector when no question block matches the filters.
 */
export class NoMatchingQuestionError extends Error {
  readonly available: string[];

  constructor(available: string[]) {
    const hint = available.length > 0 ? ` Available question numbers: ${available.join(', ')}` : '';
    super(`No matching questions found.${hint}`);
    this.name = 'NoMatchingQuestionError';
    this.available = available;
  }
}

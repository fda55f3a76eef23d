// ============================================================================
// SOURCE MARKUP VOCABULARY
// ============================================================================

// Block classes emitted by the reader. Changing any of these is a breaking
// change in the source markup, not something the parser should guess around.
export const BLOCK_CLASS = {
  chapterTitle: 'ArtH1',
  sectionTitle: 'ArtH2',
  split: 'PSplit',
  heading: 'TiXing',
  questionTitle: 'QuestionTitle',
  tagBox: 'TagBoxP',
} as const;

export const QUESTION_NUMBER_CLASSES = ['QuestionNum1', 'QuestionNum2'] as const;
export const ANSWER_TAG_CLASS = 'answer';
export const RESOLVE_TAG_CLASS = 'ResolveTag';

export const IMAGE_CLASS = 'img';
export const IMAGE_SRC_ATTRS = ['data-src', 'data-sr'] as const;
export const IMAGE_WIDTH_ATTR = 'data-width';
export const IMAGE_HEIGHT_ATTR = 'data-height';

export const ANSWER_PREFIX = '【答案】';
export const ANALYSIS_PREFIX = '【解析】';

export const HEADING_LEVEL = 3;

// ============================================================================
// CHOICE LABELS
// ============================================================================

export const ASCII_CHOICE_LABELS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ';
export const FULLWIDTH_CHOICE_LABELS = 'ＡＢＣＤＥＦＧＨＩＪＫＬＭＮＯＰＱＲＳＴＵＶＷＸＹＺ';
export const CHOICE_DELIMITERS = '．.、)）：: ';

// ============================================================================
// MATH NORMALIZATION
// ============================================================================

export const FULLWIDTH_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['（', '('],
  ['）', ')'],
  ['，', ', '],
  ['。', '. '],
  ['．', '. '],
  ['；', '; '],
  ['：', ': '],
  ['＋', '+'],
  ['－', '-'],
  ['＝', '='],
  ['＜', '<'],
  ['＞', '>'],
];

// \cmd{..}{..} runs, or an identifier / parenthesised group carrying one or more script groups
export const MATH_SPAN_PATTERN =
  /\\[A-Za-z]+(?:\{[^}]+\})+|(?:\([^)]+\)|[A-Za-zΑ-Ωα-ω][A-Za-z0-9Α-Ωα-ω]*)(?:_\{[^}]+\}|\^\{[^}]+\})+/gu;

// Characters that must not touch a $ delimiter
export const MATH_TOUCHING_CHAR = /[0-9A-Za-zΑ-Ωα-ω=+\-*/]/u;

// Text allowed between two math spans for them to be merged into one
export const MATH_CONNECTOR_PATTERN = /^[\s,;:+\-*/=0-9.·，。．]+$/u;

export const MATH_DELIMITER = '$';

// ============================================================================
// RENDERING
// ============================================================================

export const DEFAULT_IMAGE_DIR = 'images';
export const MISSING_IMAGE_LABEL = '图像未下载';
export const QUESTION_IMAGE_ALT = '题图';
export const CHOICE_IMAGE_ALT = '选项图';
export const ANALYSIS_IMAGE_ALT = '解析图';
export const BLOCK_IMAGE_ALT = '图';
export const ANSWER_LABEL = '答案：';
export const ANALYSIS_LABEL = '解析：';

export { parseChapter, classifyBlock, BLOCK_RULES, ChapterBuilder } from './lib/classify';
export type { BlockContext, BlockKind, BlockRule, ParseOptions } from './lib/classify';
export { completeChapter, processChapter } from './lib/pipeline';
export type { PipelineOptions } from './lib/pipeline';
export { renderMarkdown } from './lib/render';
export type { RenderOptions } from './lib/render';
export { applyLatexMarkup, normalizeMath, coalesceMathSpans } from './lib/latex';
export { finalizeChapter, finalizeQaItem, resolveAnswerLines } from './lib/finalize';
export { enrichImages, collectImageUsage } from './lib/enrich';
export { QuestionAccumulator, splitChoice } from './lib/question';
export { ImageLedger, resolveImageRef } from './lib/images';
export { loadConfig, loadImageMap, parseImageMap } from './lib/config';
export type { ChapterConfig } from './lib/config';
export {
  listQuestionNodes,
  selectQuestions,
  buildStructuredLookup,
  matchStructured,
  describeQuestion
} from './lib/inspect';
export { ChapterParseError, ConfigError, NoMatchingQuestionError, QuestionClosedError } from './lib/errors';
export type * from './lib/shared/types';

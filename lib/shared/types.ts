// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export type ChapterID = string;

export type ImageRef = {
  type: 'image';
  url: string; // identity of the image within a chapter
  width: string | null; // raw data-width attribute
  height: string | null; // raw data-height attribute
  file: string | null; // local file name, filled in once images are resolved
};

export type TextSegment = {
  type: 'text';
  text: string;
};

// Ordered mix of text runs and images, e.g. a question stem with an inline figure
export type RichPart = TextSegment | ImageRef;

export type ImageContext = 'question' | 'analysis' | `choice:${string}`;

export type ImageUsage = {
  url: string;
  width: string | null;
  height: string | null;
  file: string | null;
  contexts: ImageContext[];
};

export type ChapterImage = {
  url: string;
  width: string | null;
  height: string | null;
  file: string | null;
};

export type Choice = {
  label: string; // A-Z or full-width Ａ-Ｚ
  content: RichPart[];
  images: ImageRef[]; // the image parts of content, in order
};

export type QAItem = {
  type: 'qa';
  number: string | null;
  question: string;
  question_rich: RichPart[];
  question_extra: RichPart[];
  choices: Choice[];
  answer_lines: string[];
  answer: string | null;
  analysis_lines: RichPart[];
  analysis: string | null;
  images: ImageUsage[];
};

export type HeadingItem = {
  type: 'heading';
  level: number;
  text: string;
};

export type TextItem = {
  type: 'text';
  text: string;
};

export type ImageItem = {
  type: 'image';
  image: ImageRef;
};

export type SectionItem = HeadingItem | TextItem | ImageItem | QAItem;
export type ItemKind = SectionItem['type'];

export type Section = {
  title: string | null; // null for content that appears before any section title
  items: SectionItem[];
};

export type Chapter = {
  id: ChapterID;
  title: string; // empty when the markup has no chapter title
  sections: Section[];
  images: ChapterImage[];
};

// URL -> local file name, supplied by whoever downloaded the images
export type ImageFileMap = ReadonlyMap<string, string>;

export type ParsedChapter = {
  chapter: Chapter;
  imageUrls: string[]; // every image URL in first-seen order
};

export type ProcessedChapter = ParsedChapter & {
  markdown: string;
};

export interface Logger {
  warn(message: string): void;
}

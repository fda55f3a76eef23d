import { z } from 'zod';

// URL -> local file name, as written by the image downloader
export const imageMapSchema = z.record(z.string().min(1), z.string().min(1));
export type ImageMapFile = z.infer<typeof imageMapSchema>;

export const imagePartSchema = z.object({
  type: z.literal('image'),
  url: z.string(),
  width: z.string().nullable().default(null),
  height: z.string().nullable().default(null),
  file: z.string().nullable().default(null),
});

export const textPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const richPartSchema = z.discriminatedUnion('type', [textPartSchema, imagePartSchema]);

// The fields of a chapter.json question entry the inspector prints
export const structuredQuestionSchema = z.object({
  type: z.literal('qa'),
  number: z.string().nullable(),
  question: z.string().default(''),
  question_rich: z.array(richPartSchema).default([]),
  answer_lines: z.array(z.string()).default([]),
  analysis_lines: z.array(richPartSchema).default([]),
});
export type StructuredQuestion = z.infer<typeof structuredQuestionSchema>;

export const chapterFileSchema = z.object({
  sections: z.array(z.object({
    items: z.array(z.unknown()),
  })).default([]),
});

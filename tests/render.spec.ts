import { describe, expect, it } from 'vitest';
import { renderMarkdown } from '../lib/render';
import type { Chapter, ImageRef } from '../lib/shared/types';

function image(url: string, file: string | null): ImageRef {
  return { type: 'image', url, width: null, height: null, file };
}

describe('renderMarkdown', () => {
  it('renders headings, text, questions and image blocks', () => {
    const questionImage = image('http://img.test/q.png', 'q.png');
    const first = image('http://img.test/c1.png', 'c1.png');
    const second = image('http://img.test/c2.png', null);

    const chapter: Chapter = {
      id: 'c1',
      title: 'Unit 1',
      images: [],
      sections: [
        {
          title: 'Practice',
          items: [
            { type: 'heading', level: 3, text: 'Warm-up' },
            { type: 'text', text: 'Read first.' },
            { type: 'text', text: '' },
            {
              type: 'qa',
              number: '1',
              question: 'Pick one [图1]',
              question_rich: [{ type: 'text', text: 'Pick one' }, questionImage],
              question_extra: [{ type: 'text', text: 'Note here' }],
              choices: [
                { label: 'A', content: [{ type: 'text', text: 'red' }, first, second], images: [first, second] },
                { label: 'B', content: [{ type: 'text', text: 'blue' }], images: [] },
              ],
              answer_lines: ['A'],
              answer: 'A',
              analysis_lines: [{ type: 'text', text: 'because' }],
              analysis: 'because',
              images: [],
            },
          ],
        },
        {
          title: null,
          items: [{ type: 'image', image: image('http://img.test/z.png', null) }],
        },
      ],
    };

    expect(renderMarkdown(chapter)).toBe([
      '# Unit 1',
      '',
      '## Practice',
      '',
      '### Warm-up',
      '',
      'Read first.',
      '',
      '**1. Pick one ![题图](images/q.png)**',
      'Note here',
      '',
      '- A. red ![选项图](images/c1.png)',
      '  [图像未下载](http://img.test/c2.png)',
      '- B. blue',
      '- **答案：** A',
      '- **解析：** because',
      '',
      '[图像未下载](http://img.test/z.png)',
    ].join('\n'));
  });

  it('nests multi-line answers and mixed analysis', () => {
    const chapter: Chapter = {
      id: 'c2',
      title: '',
      images: [],
      sections: [{
        title: null,
        items: [{
          type: 'qa',
          number: null,
          question: 'Plain',
          question_rich: [],
          question_extra: [],
          choices: [],
          answer_lines: ['x', 'y'],
          answer: 'x y',
          analysis_lines: [{ type: 'text', text: 'first' }, image('http://img.test/a.png', 'a.png')],
          analysis: 'first',
          images: [],
        }],
      }],
    };

    expect(renderMarkdown(chapter, { imageDir: 'assets/' })).toBe([
      '**Plain**',
      '- **答案：**',
      '  - x',
      '  - y',
      '- **解析：**',
      '  - first',
      '  - ![解析图](assets/a.png)',
    ].join('\n'));
  });

  it('never renders a heading above level 3', () => {
    const chapter: Chapter = {
      id: 'c3',
      title: '',
      images: [],
      sections: [{
        title: null,
        items: [
          { type: 'heading', level: 1, text: 'Low' },
          { type: 'heading', level: 4, text: 'Deep' },
        ],
      }],
    };
    expect(renderMarkdown(chapter)).toBe('### Low\n\n#### Deep');
  });
});

import { describe, expect, it, vi } from 'vitest';
import { finalizeQaItem, resolveAnswerLines } from '../lib/finalize';
import { createQAItem } from '../lib/question';
import type { ImageRef, QAItem } from '../lib/shared/types';

const figure: ImageRef = { type: 'image', url: 'http://img.test/f.png', width: null, height: null, file: null };

function withChoices(labels: string[]): QAItem {
  const item = createQAItem('7', 'Q', [{ type: 'text', text: 'Q' }]);
  item.choices = labels.map(label => ({ label, content: [], images: [] }));
  return item;
}

describe('resolveAnswerLines', () => {
  it('defers the preferred echo to the end', () => {
    expect(resolveAnswerLines(['A', 'A,C explanation'], new Set(['A', 'B']))).toEqual(['A,C explanation', 'A']);
  });

  it('keeps a lone echo', () => {
    expect(resolveAnswerLines(['A'], new Set(['A', 'B']))).toEqual(['A']);
  });

  it('drops other echoes and duplicate lines', () => {
    expect(resolveAnswerLines(['B', 'x', 'x', 'A', 'B'], new Set(['A', 'B']))).toEqual(['x', 'B']);
  });

  it('drops blank lines', () => {
    expect(resolveAnswerLines([' ', 'text'], new Set())).toEqual(['text']);
  });
});

describe('finalizeQaItem', () => {
  it('rebuilds the question from text-only parts', () => {
    const item = createQAItem('1', 'stale', [
      { type: 'text', text: ' a ' },
      { type: 'text', text: 'b' },
    ]);
    finalizeQaItem(item, { warn: vi.fn() });
    expect(item.question).toBe('a b');
  });

  it('numbers image placeholders within the question', () => {
    const item = createQAItem('1', 'stale', [{ type: 'text', text: 'See' }, figure, { type: 'text', text: 'and' }, figure]);
    finalizeQaItem(item, { warn: vi.fn() });
    expect(item.question).toBe('See [图1] and [图2]');
  });

  it('joins analysis text and leaves empty fields null', () => {
    const item = withChoices(['A']);
    item.analysis_lines = [{ type: 'text', text: 'one' }, figure, { type: 'text', text: ' two ' }, { type: 'text', text: ' ' }];
    finalizeQaItem(item, { warn: vi.fn() });

    expect(item.analysis_lines).toEqual([{ type: 'text', text: 'one' }, figure, { type: 'text', text: 'two' }]);
    expect(item.analysis).toBe('one\ntwo');
    expect(item.answer).toBeNull();
  });

  it('derives choice images from content', () => {
    const item = withChoices(['A']);
    const choice = item.choices[0];
    if (!choice) throw new Error('missing choice');
    choice.content = [{ type: 'text', text: ' red ' }, figure];
    finalizeQaItem(item, { warn: vi.fn() });

    expect(choice.content).toEqual([{ type: 'text', text: 'red' }, figure]);
    expect(choice.images).toEqual([figure]);
  });

  it('warns when a label is echoed more than twice', () => {
    const logger = { warn: vi.fn() };
    const item = withChoices(['A', 'B']);
    item.answer_lines = ['A', 'A', 'A'];

    finalizeQaItem(item, logger);

    expect(logger.warn).toHaveBeenCalledWith('Question 7: choice label A appears 3 times in raw answer lines');
    expect(item.answer_lines).toEqual(['A']);
    expect(item.answer).toBe('A');
  });

  it('does not warn for two echoes', () => {
    const logger = { warn: vi.fn() };
    const item = withChoices(['A']);
    item.answer_lines = ['A', 'A'];
    finalizeQaItem(item, logger);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

import { describe, expect, it } from 'vitest';
import {
  applyLatexMarkup,
  coalesceMathSpans,
  formatMathExpression,
  lowerMarkup,
  mergeAdjacentScripts,
  normalizeMath,
  wrapMathSpans
} from '../lib/latex';
import type { Chapter } from '../lib/shared/types';

describe('lowerMarkup', () => {
  it('turns sub/sup markup into script groups', () => {
    expect(lowerMarkup('x<sup>2</sup>+y<sup>2</sup>=1')).toBe('x^{2}+y^{2}=1');
    expect(lowerMarkup('H<sub>2</sub>O')).toBe('H_{2}O');
  });

  it('turns line breaks into newlines', () => {
    expect(lowerMarkup('a<br>b')).toBe('a\nb');
  });

  it('replaces full-width punctuation', () => {
    expect(lowerMarkup('（1，2）')).toBe('(1, 2)');
  });

  it('binds script groups to the preceding token and trims brace padding', () => {
    expect(lowerMarkup('x <sup> 2 </sup>')).toBe('x^{2}');
  });

  it('decodes entities only after tags are stripped', () => {
    expect(lowerMarkup('a &lt; b')).toBe('a < b');
  });
});

describe('mergeAdjacentScripts', () => {
  it('merges repeated groups until nothing changes', () => {
    expect(mergeAdjacentScripts('x^{a}^{b}^{c}')).toBe('x^{abc}');
    expect(mergeAdjacentScripts('a_{1}_{2}')).toBe('a_{12}');
  });
});

describe('wrapMathSpans', () => {
  it('wraps script-carrying identifiers', () => {
    expect(wrapMathSpans('x^{2}')).toBe('$x^{2}$');
  });

  it('keeps letters from touching a delimiter', () => {
    expect(wrapMathSpans('area x^{2}m')).toBe('area $x^{2}$ m');
  });

  it('wraps backslash commands', () => {
    expect(wrapMathSpans('\\frac{1}{2}')).toBe('$\\frac{1}{2}$');
  });

  it('leaves existing math spans alone', () => {
    expect(wrapMathSpans('$x^{2}$ and y')).toBe('$x^{2}$ and y');
  });
});

describe('formatMathExpression', () => {
  it('pads equals and binds arithmetic operators', () => {
    expect(formatMathExpression('x^{2} + y^{2} =1')).toBe('x^{2}+y^{2} = 1');
  });

  it('removes padding inside parentheses and after commas', () => {
    expect(formatMathExpression('f( x , y )')).toBe('f(x, y)');
  });

  it('attaches a leading minus inside a script group', () => {
    expect(formatMathExpression('x^{ - 1}')).toBe('x^{-1}');
  });
});

describe('coalesceMathSpans', () => {
  it('merges spans separated by connectors', () => {
    expect(coalesceMathSpans('$x^{2}$ + $y^{2}$ =1')).toBe('$x^{2}+y^{2} = 1$');
  });

  it('does not merge across words', () => {
    expect(coalesceMathSpans('$a^{2}$ and $b^{2}$')).toBe('$a^{2}$ and $b^{2}$');
  });

  it('keeps an unmatched delimiter as text', () => {
    expect(coalesceMathSpans('cost $5')).toBe('cost $5');
  });
});

describe('normalizeMath', () => {
  it('produces a single merged span for a superscript equation', () => {
    expect(normalizeMath('x<sup>2</sup>+y<sup>2</sup>=1')).toBe('$x^{2}+y^{2} = 1$');
  });

  it('is idempotent on its own output', () => {
    const once = normalizeMath('Solve x<sup>2</sup>+y<sup>2</sup>=1');
    expect(once).toBe('Solve $x^{2}+y^{2} = 1$');
    expect(normalizeMath(once)).toBe(once);
  });

  it('does not pair a new span with a stray dollar sign', () => {
    expect(normalizeMath('cost $5 and x<sup>2</sup>')).toBe('cost $5 and x^{2}');
    expect(normalizeMath('x<sup>2</sup> costs $5')).toBe('$x^{2}$ costs $5');
  });

  it('leaves plain prose untouched', () => {
    expect(normalizeMath('no maths here')).toBe('no maths here');
  });
});

describe('applyLatexMarkup', () => {
  it('normalizes leaf strings in place', () => {
    const chapter: Chapter = {
      id: 'c1',
      title: 'Water H<sub>2</sub>O',
      images: [],
      sections: [{ title: null, items: [{ type: 'text', text: 'H<sub>2</sub>O' }] }],
    };

    applyLatexMarkup(chapter);

    expect(chapter.title).toBe('Water $H_{2}$ O');
    expect(chapter.sections[0]?.items[0]).toEqual({ type: 'text', text: '$H_{2}$ O' });
  });
});

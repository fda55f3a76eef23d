import { describe, expect, it } from 'vitest';
import { ImageLedger, resolveChapterImages, resolveImageRef } from '../lib/images';

describe('resolveImageRef', () => {
  it('trims the URL and nulls empty dimensions', () => {
    expect(resolveImageRef({ src: ' http://img.test/a.png ', width: '', height: '20' })).toEqual({
      type: 'image',
      url: 'http://img.test/a.png',
      width: null,
      height: '20',
      file: null,
    });
  });

  it('returns null without a URL', () => {
    expect(resolveImageRef({ src: '  ' })).toBeNull();
    expect(resolveImageRef({})).toBeNull();
  });
});

describe('ImageLedger', () => {
  it('deduplicates by URL and fills missing dimensions', () => {
    const ledger = new ImageLedger();
    ledger.register({ type: 'image', url: 'u1', width: '10', height: null, file: null });
    ledger.register({ type: 'image', url: 'u2', width: null, height: null, file: null });
    ledger.register({ type: 'image', url: 'u1', width: '99', height: '5', file: null });

    expect(ledger.size).toBe(2);
    expect(ledger.has('u2')).toBe(true);
    expect(ledger.urls()).toEqual(['u1', 'u2']);
    expect(ledger.images()).toEqual([
      { url: 'u1', width: '10', height: '5', file: null },
      { url: 'u2', width: null, height: null, file: null },
    ]);
  });

  it('resolves files for chapter images', () => {
    const images = [{ url: 'u1', width: null, height: null, file: null }];
    expect(resolveChapterImages(images, new Map([['u1', 'one.png']]))).toEqual([
      { url: 'u1', width: null, height: null, file: 'one.png' },
    ]);
  });
});

import { describe, it, expect } from 'vitest';
import { getCacheKey } from '../lib/hash';
import { sanitizeSnippet, sourceOf } from '../lib/sanitize';
import { fillTemplate } from '../lib/template';
import { findPhrase, normalizeText, tokenize } from '../lib/text';
import { AbortedError, TimeoutError, withTimeout } from '../lib/timeout';

describe('normalizeText', () => {
  it('lower-cases, strips accents and collapses punctuation', () => {
    expect(normalizeText('  Héllo, WORLD!! ')).toBe('hello world');
  });

  it('folds chandrabindu into anusvara', () => {
    expect(normalizeText('कहाँ')).toBe(normalizeText('कहां'));
  });

  it('drops the nukta', () => {
    expect(normalizeText('गुड़ी')).toBe(normalizeText('गुडी'));
  });

  it('tokenizes blank text to an empty list', () => {
    expect(tokenize(' ?! ')).toEqual([]);
    expect(tokenize('दिवाली की सफाई')).toEqual(['दिवाली', 'की', 'सफाई']);
  });
});

describe('findPhrase', () => {
  it('requires a word boundary after Latin phrases', () => {
    expect(findPhrase('holiday holi', 'holi')).toBe(8);
    expect(findPhrase('holiday', 'holi')).toBe(-1);
  });

  it('lets Indic phrases carry inflection suffixes', () => {
    expect(findPhrase('दिवालीच्या सुट्टी', 'दिवाली')).toBe(0);
  });

  it('holds Indic phrases to whole words on request', () => {
    expect(findPhrase('आज का तापमान', 'ताप', true)).toBe(-1);
    expect(findPhrase('मला ताप आहे', 'ताप', true)).toBe(4);
  });

  it('requires a word boundary before every phrase', () => {
    expect(findPhrase('xdiwali', 'diwali')).toBe(-1);
    expect(findPhrase('abc', '')).toBe(-1);
  });
});

describe('fillTemplate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(fillTemplate('{name} on {day} {missing}', { name: 'Holi', day: 3 })).toBe('Holi on 3 {missing}');
  });
});

describe('sanitizeSnippet', () => {
  it('returns an empty string for missing text', () => {
    expect(sanitizeSnippet(null)).toBe('');
    expect(sanitizeSnippet(undefined)).toBe('');
  });

  it('strips markup, entities and URLs', () => {
    expect(sanitizeSnippet('<b>Diwali</b> &amp; Lights')).toBe('Diwali & Lights');
    expect(sanitizeSnippet('Visit https://x.com/page now')).toBe('Visit now');
  });

  it('normalizes typographic punctuation', () => {
    expect(sanitizeSnippet('“Diwali” — lights…')).toBe('"Diwali" - lights...');
  });
});

describe('sourceOf', () => {
  it('returns the host without www', () => {
    expect(sourceOf('https://www.example.org/path?q=1')).toBe('example.org');
    expect(sourceOf('not a url')).toBe('unknown');
  });
});

describe('getCacheKey', () => {
  it('ignores case, punctuation and spacing but not language', () => {
    expect(getCacheKey('Diwali!', 'english')).toBe(getCacheKey('  diwali ', 'english'));
    expect(getCacheKey('diwali', 'english')).not.toBe(getCacheKey('diwali', 'hindi'));
    expect(getCacheKey('diwali', 'english')).toMatch(/^english:[0-9a-f]{40}$/);
  });
});

describe('withTimeout', () => {
  it('resolves with the work result', async () => {
    await expect(withTimeout(async () => 42, 50, 'fast')).resolves.toBe(42);
  });

  it('rejects and aborts the work signal on timeout', async () => {
    let workSignal: AbortSignal | undefined;
    const pending = withTimeout(
      (signal) => {
        workSignal = signal;
        return new Promise<never>(() => undefined);
      },
      10,
      'slow'
    );
    await expect(pending).rejects.toThrow(new TimeoutError('slow', 10));
    expect(workSignal?.aborted).toBe(true);
  });

  it('rejects when the parent signal aborts', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => undefined), 1000, 'child', parent.signal);
    parent.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects immediately when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    await expect(withTimeout(async () => 1, 1000, 'late', parent.signal)).rejects.toThrow('late aborted');
  });
});

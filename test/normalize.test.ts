// test/normalize.test.ts
import { describe, it, expect } from 'vitest';
import {
  normalizeText,
  splitCamelCase,
  stripNoise,
  quotedPhraseTokens,
  bigramTokens,
  halfSplitTokens,
} from '../src/text/normalize.ts';

describe('normalizeText', () => {
  it('splits CamelCase and re-merges the parts as a bigram', () => {
    expect(normalizeText('HuggingFace')).toBe('hugging face huggingface');
  });

  it('appends both halves of tokens longer than eight characters', () => {
    const out = normalizeText('internationalization');
    expect(out).toBe('internationalization internatio nalization');
    const [, left = '', right = ''] = out.split(' ');
    expect(left.length).toBe(10);
    expect(right.length).toBe(10);
    expect(left + right).toBe('internationalization');
  });

  it('splits odd-length tokens with the shorter half first', () => {
    expect(halfSplitTokens(['abcdefghi'])).toEqual(['abcd', 'efghi']);
    expect(halfSplitTokens(['abcdefgh'])).toEqual([]);
  });

  it('repairs .net, drops e-mails and URLs, then augments', () => {
    const input = 'Senior .NET developer, contact me@example.com or https://example.com/x';
    expect(normalizeText(input)).toBe(
      'senior dotnet developer contact or seniordotnet dotnetdeveloper developercontact contactor deve loper',
    );
  });

  it('leaves .net alone when it is part of a word or followed by a dot', () => {
    expect(normalizeText('ASP.NET')).toBe('asp net aspnet');
    expect(normalizeText('Knows .net.')).toBe('knows net knowsnet');
  });

  it('appends the unspaced form of quoted phrases in the source text', () => {
    expect(normalizeText('Skilled in "Machine Learning" and NLP')).toBe(
      'skilled in machine learning and nlp machinelearning ' +
        'skilledin inmachine machinelearning learningand andnlp nlpmachinelearning ' +
        'machine learning',
    );
  });

  it('keeps non-ASCII letters', () => {
    expect(normalizeText('Café Müller')).toBe('café müller cafémüller');
  });

  it('removes www links', () => {
    expect(normalizeText('see www.example.org now')).toBe('see now seenow');
  });

  it('returns an empty string for blank input', () => {
    expect(normalizeText('')).toBe('');
    expect(normalizeText('  \n\t ')).toBe('');
  });

  it('is not a fixed point when applied twice', () => {
    const once = normalizeText('HuggingFace');
    expect(normalizeText(once)).toBe('hugging face huggingface huggingface facehuggingface huggi ngface');
  });
});

describe('normalizer steps', () => {
  it('splitCamelCase only splits lowercase-to-uppercase boundaries', () => {
    expect(splitCamelCase('MachineLearningEngineer')).toBe('Machine Learning Engineer');
    expect(splitCamelCase('NLP and AWS')).toBe('NLP and AWS');
  });

  it('stripNoise removes e-mail and URL tokens entirely', () => {
    expect(stripNoise('mail a@b.c visit http://x.y/z')).toBe('mail  visit ');
  });

  it('quotedPhraseTokens removes spaces inside each phrase', () => {
    expect(quotedPhraseTokens('"deep learning" and "computer vision"')).toEqual(['deeplearning', 'computervision']);
  });

  it('bigramTokens joins each adjacent pair', () => {
    expect(bigramTokens(['a', 'b', 'c'])).toEqual(['ab', 'bc']);
    expect(bigramTokens(['solo'])).toEqual([]);
  });
});

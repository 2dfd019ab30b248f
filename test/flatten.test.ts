// test/flatten.test.ts
import { describe, it, expect } from 'vitest';
import { collectStringLeaves, flattenDocument } from '../src/text/flatten.ts';

describe('flattenDocument', () => {
  it('joins string leaves depth-first in value order', () => {
    expect(flattenDocument({ a: 'x', b: ['y', 'z'] })).toBe('x y z');
  });

  it('walks nested objects and arrays of objects', () => {
    const doc = {
      name: 'Candidate',
      skills: ['Python', 'Django'],
      experience: [{ title: 'Dev', years: 3 }, { title: 'Lead', company: { name: 'Example Co' } }],
    };
    expect(flattenDocument(doc)).toBe('Candidate Python Django Dev Lead Example Co');
  });

  it('skips non-string scalars instead of stringifying them', () => {
    expect(flattenDocument({ n: 1, b: true, z: null, s: 'keep', u: undefined })).toBe('keep');
  });

  it('visits Map values in insertion order', () => {
    const doc = new Map<string, unknown>([['a', 'x'], ['b', { c: 'y' }]]);
    expect(flattenDocument(doc)).toBe('x y');
  });

  it('skips dates and class instances', () => {
    class ObjectIdLike {
      hex = 'abc';
    }
    expect(flattenDocument({ d: new Date(0), id: new ObjectIdLike(), s: 'ok' })).toBe('ok');
  });

  it('stops at cycles but revisits shared branches', () => {
    const doc: Record<string, unknown> = { name: 'loop' };
    doc['self'] = doc;
    expect(flattenDocument(doc)).toBe('loop');

    const shared = ['x'];
    expect(flattenDocument({ a: shared, b: shared })).toBe('x x');
  });

  it('accepts scalar documents', () => {
    expect(flattenDocument('just text')).toBe('just text');
    expect(flattenDocument(42)).toBe('');
    expect(flattenDocument(null)).toBe('');
  });

  it('keeps empty strings as leaves', () => {
    expect(collectStringLeaves({ a: '', b: 'y' })).toEqual(['', 'y']);
    expect(flattenDocument({ a: '', b: 'y' })).toBe(' y');
  });
});

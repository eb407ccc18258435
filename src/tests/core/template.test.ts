import { describe, it, expect } from 'vitest';
import { chunkText, renderTemplate } from '../../core/utils/template';

describe('renderTemplate', () => {
  it('fills placeholders and leaves unknown ones untouched', () => {
    expect(renderTemplate('Hi {{ name }}, flat {{flat}}, {{missing}}', { name: 'Ivan', flat: 42 })).toBe(
      'Hi Ivan, flat 42, {{missing}}',
    );
  });

  it('returns the template as is without data', () => {
    expect(renderTemplate('Hi {{name}}')).toBe('Hi {{name}}');
  });
});

describe('chunkText', () => {
  it('packs whole lines up to the limit', () => {
    expect(chunkText('aaa\nbbb\nccc', 7)).toEqual(['aaa\nbbb', 'ccc']);
  });

  it('cuts a line that is longer than the limit', () => {
    expect(chunkText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('never splits an emoji across two pieces', () => {
    expect(chunkText('ab😀cd', 3)).toEqual(['ab', '😀c', 'd']);
  });

  it('keeps short text in one piece', () => {
    expect(chunkText('one\ntwo', 4096)).toEqual(['one\ntwo']);
  });
});

import { describe, it, expect } from 'vitest';
import {
  applyEdits,
  describeEdit,
  findProtectedZones,
  planLinkInsertions,
} from '../src/linker/textEdits.js';

function link(text: string, targets: string[]): string {
  return applyEdits(text, planLinkInsertions(text, targets));
}

describe('planLinkInsertions', () => {
  it('should link every whole-word mention', () => {
    expect(link('Docker is great. I love Docker.', ['Docker']))
      .toBe('[[Docker]] is great. I love [[Docker]].');
  });

  it('should keep the matched text as alias when case differs', () => {
    expect(link('see docker here', ['Docker'])).toBe('see [[Docker|docker]] here');
  });

  it('should not match inside longer words', () => {
    expect(link('Dockerfile and docker-compose', ['Docker'])).toBe('Dockerfile and [[Docker|docker]]-compose');
  });

  it('should skip targets that are already linked', () => {
    expect(planLinkInsertions('[[Docker]] and Docker', ['Docker'])).toEqual([]);
  });

  it('should leave frontmatter and code untouched', () => {
    const text = [
      '---',
      'title: Docker',
      '---',
      'Docker text `Docker` here',
      '```',
      'Docker',
      '```',
    ].join('\n');

    expect(link(text, ['Docker'])).toBe([
      '---',
      'title: Docker',
      '---',
      '[[Docker]] text `Docker` here',
      '```',
      'Docker',
      '```',
    ].join('\n'));
  });

  it('should leave markdown links and URLs untouched', () => {
    const text = 'A [Docker guide](https://example.com/Docker) and https://docker.example.com';
    expect(planLinkInsertions(text, ['Docker'])).toEqual([]);
  });

  it('should not link text that sits inside an existing wikilink alias', () => {
    expect(planLinkInsertions('[[Other|about Docker]]', ['Docker'])).toEqual([]);
  });

  it('should let earlier targets win overlapping matches', () => {
    expect(link('Use Docker Compose daily', ['Docker Compose', 'Docker', 'Compose']))
      .toBe('Use [[Docker Compose]] daily');
  });

  it('should escape regular expression characters in names', () => {
    expect(link('I write C++ code', ['C++'])).toBe('I write [[C++]] code');
  });

  it('should produce edits sorted by position', () => {
    const edits = planLinkInsertions('Beta then Alpha', ['Alpha', 'Beta']);
    expect(edits.map(edit => [edit.target, edit.start])).toEqual([['Beta', 0], ['Alpha', 10]]);
  });

  it('should be idempotent', () => {
    const once = link('Docker and docker', ['Docker']);
    expect(planLinkInsertions(once, ['Docker'])).toEqual([]);
  });
});

describe('findProtectedZones', () => {
  it('should cover frontmatter from the start', () => {
    const text = '---\na: 1\n---\nbody';
    expect(findProtectedZones(text)[0]).toEqual({ start: 0, end: text.indexOf('body') });
  });
});

describe('applyEdits', () => {
  it('should reject overlapping edits', () => {
    const edit = { start: 0, end: 4, target: 'Abcd', replacement: '[[Abcd]]' };
    expect(() => applyEdits('abcdef', [edit, { ...edit, start: 2, end: 5 }])).toThrow('Invalid edit');
  });

  it('should reject edits past the end of the text', () => {
    expect(() => applyEdits('abc', [{ start: 1, end: 9, target: 'x', replacement: 'y' }])).toThrow('Invalid edit');
  });
});

describe('describeEdit', () => {
  it('should name the target and position', () => {
    expect(describeEdit({ start: 7, end: 13, target: 'Docker', replacement: '[[Docker]]' }))
      .toBe("Linked 'Docker' at position 7");
  });
});

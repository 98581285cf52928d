import { describe, it, expect } from 'vitest';
import { GENERAL_ISSUE_KEY, IssueLog, issue, sectionPrefix } from '../issue_log.js';

describe('IssueLog', () => {
  it('keeps every message for a key in insertion order', () => {
    const log = new IssueLog();
    log.log('b', 'one');
    log.log('a', 'x');
    log.log('b', 'two');

    expect(log.messagesFor('b')).toEqual(['one', 'two']);
    expect(log.messagesFor('a')).toEqual(['x']);
  });

  it('lists keys lexicographically and treats keys case-sensitively', () => {
    const log = new IssueLog();
    log.log('b', 'm');
    log.log('a', 'm');
    log.log('A', 'm');

    expect(log.allKeys()).toEqual(['A', 'a', 'b']);
  });

  it('does not deduplicate repeated findings', () => {
    const log = new IssueLog();
    log.record([issue('k', 'same'), issue('k', 'same')]);

    expect(log.messagesFor('k')).toEqual(['same', 'same']);
    expect(log.size).toBe(2);
  });

  it('returns copies so callers cannot rewrite logged messages', () => {
    const log = new IssueLog();
    log.log('k', 'original');
    log.messagesFor('k').push('injected');

    expect(log.messagesFor('k')).toEqual(['original']);
  });

  it('returns an empty list for unknown keys', () => {
    const log = new IssueLog();
    expect(log.messagesFor('missing')).toEqual([]);
    expect(log.has('missing')).toBe(false);
  });

  it('groups keys by the part before the first slash', () => {
    const log = new IssueLog();
    log.log('p2/x', 'm');
    log.log('p1/problem_statement/problem.tex', 'm');
    log.log('p1', 'm');
    log.log('p1/problem.yaml', 'm');
    log.log(GENERAL_ISSUE_KEY, 'm');

    expect(log.sections()).toEqual([
      { prefix: '_general_', keys: ['_general_'] },
      { prefix: 'p1', keys: ['p1', 'p1/problem.yaml', 'p1/problem_statement/problem.tex'] },
      { prefix: 'p2', keys: ['p2/x'] },
    ]);
  });

  it('serializes to a key-sorted record', () => {
    const log = new IssueLog();
    log.log('z', 'last');
    log.log('a', 'first');

    expect(JSON.stringify(log)).toBe('{"a":["first"],"z":["last"]}');
  });
});

describe('sectionPrefix', () => {
  it('returns the whole key when it has no slash', () => {
    expect(sectionPrefix('hello')).toBe('hello');
    expect(sectionPrefix('hello/problem.yaml')).toBe('hello');
  });
});

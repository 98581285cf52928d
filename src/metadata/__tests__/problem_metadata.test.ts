import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import {
  checkProblemNameTitle,
  readDeclaredMetadata,
  resolveProblemTitle,
  shortTitle,
} from '../problem_metadata.js';

describe('readDeclaredMetadata', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'problemset-audit-meta-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses problem.yaml', async () => {
    await writeFile(path.join(dir, 'problem.yaml'), 'name: Hello\nlimits:\n  memory: 256\n', 'utf8');
    expect(await readDeclaredMetadata(dir)).toEqual({ name: 'Hello', limits: { memory: 256 } });
  });

  it('returns null for an empty file', async () => {
    await writeFile(path.join(dir, 'problem.yaml'), '', 'utf8');
    expect(await readDeclaredMetadata(dir)).toBeNull();
  });

  it('throws when problem.yaml is missing', async () => {
    await expect(readDeclaredMetadata(dir)).rejects.toThrow(/ENOENT/);
  });
});

describe('resolveProblemTitle', () => {
  it('prefers the declared name', () => {
    expect(resolveProblemTitle({ name: 'Hello' }, new Map([['en', 'Other']]))).toBe('Hello');
  });

  it('prefers English in a per-language name', () => {
    expect(resolveProblemTitle({ name: { sv: 'Hej', en: 'Hello' } })).toBe('Hello');
    expect(resolveProblemTitle({ name: { sv: 'Hej' } })).toBe('Hej');
  });

  it('falls back to the statement titles', () => {
    expect(resolveProblemTitle({ license: 'cc by-sa' }, new Map([['sv', 'Hej'], ['en', 'Hello']]))).toBe('Hello');
    expect(resolveProblemTitle(null, new Map([['sv', 'Hej']]))).toBe('Hej');
    expect(resolveProblemTitle(null)).toBeUndefined();
  });
});

describe('checkProblemNameTitle', () => {
  it('accepts a directory name matching the stripped title', () => {
    expect(shortTitle('Hello, World!')).toBe('helloworld');
    expect(checkProblemNameTitle('helloworld', 'Hello, World!')).toEqual([]);
  });

  it('warns on a mismatch', () => {
    expect(checkProblemNameTitle('hello', 'Goodbye')).toEqual([
      { key: 'hello', message: 'use matching directory name and title: hello "Goodbye"' },
    ]);
  });

  it('warns when no title is known', () => {
    expect(checkProblemNameTitle('hello', undefined)).toEqual([
      { key: 'hello', message: 'could not determine the problem title' },
    ]);
  });
});

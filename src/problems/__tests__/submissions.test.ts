import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import {
  checkSubmissions,
  emptyInventory,
  languageForFile,
  loadSubmissionsInventory,
  type SubmissionsInventory,
} from '../submissions.js';

function messages(inventory: SubmissionsInventory): string[] {
  return checkSubmissions('hello', inventory).map((entry) => entry.message);
}

describe('languageForFile', () => {
  it('maps source extensions to languages', () => {
    expect(languageForFile('sol.cpp')).toBe('C++');
    expect(languageForFile('Sol.PY')).toBe('Python 3');
    expect(languageForFile('notes.txt')).toBeUndefined();
  });
});

describe('loadSubmissionsInventory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'problemset-audit-subs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('groups submissions by verdict directory', async () => {
    const subs = path.join(dir, 'submissions');
    await mkdir(path.join(subs, 'accepted', 'multi'), { recursive: true });
    await mkdir(path.join(subs, 'wrong_answer'), { recursive: true });
    await mkdir(path.join(subs, 'other'), { recursive: true });
    await writeFile(path.join(subs, 'accepted', 'fast.cpp'), '', 'utf8');
    await writeFile(path.join(subs, 'accepted', 'multi', 'README'), '', 'utf8');
    await writeFile(path.join(subs, 'accepted', 'multi', 'Main.java'), '', 'utf8');
    await writeFile(path.join(subs, 'wrong_answer', 'greedy.py'), '', 'utf8');
    await writeFile(path.join(subs, 'wrong_answer', 'notes.txt'), '', 'utf8');
    await writeFile(path.join(subs, 'other', 'x.py'), '', 'utf8');

    expect(await loadSubmissionsInventory(dir)).toEqual({
      AC: [
        { name: 'fast.cpp', language: 'C++' },
        { name: 'multi', language: 'Java' },
      ],
      WA: [{ name: 'greedy.py', language: 'Python 3' }],
      TLE: [],
      RTE: [],
    });
  });

  it('is empty without a submissions directory', async () => {
    expect(await loadSubmissionsInventory(dir)).toEqual(emptyInventory());
  });
});

describe('checkSubmissions', () => {
  it('asks for wrong-answer, time-limit and slow accepted submissions', () => {
    const inventory = emptyInventory();
    inventory.AC.push({ name: 'a.cpp', language: 'C++' });

    expect(messages(inventory)).toEqual([
      'has no WA submissions',
      'has no TLE submissions',
      'has only one AC submission',
      'there are no "slow" accepted submissions (only: C++)',
    ]);
  });

  it('counts C, C++ and C# as fast languages', () => {
    const inventory = emptyInventory();
    inventory.AC.push({ name: 'a.c', language: 'C' }, { name: 'b.cs', language: 'C#' });
    inventory.WA.push({ name: 'w.py', language: 'Python 3' });
    inventory.TLE.push({ name: 't.py', language: 'Python 3' });

    expect(messages(inventory)).toEqual(['there are no "slow" accepted submissions (only: C, C#)']);
  });

  it('is satisfied by a robust set of submissions', () => {
    const inventory = emptyInventory();
    inventory.AC.push({ name: 'a.cpp', language: 'C++' }, { name: 'b.py', language: 'Python 3' });
    inventory.WA.push({ name: 'w.cpp', language: 'C++' });
    inventory.TLE.push({ name: 't.py', language: 'Python 3' });

    expect(messages(inventory)).toEqual([]);
  });
});

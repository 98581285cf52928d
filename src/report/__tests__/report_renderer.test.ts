import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { IssueLog } from '../../issues/issue_log.js';
import { readGitShortHash, renderReport, reportFileName, writeReport } from '../report_renderer.js';

const NOW = new Date(2024, 2, 5, 7, 8, 9);

function sampleLog(): IssueLog {
  const log = new IssueLog();
  log.log('hello/problem_statement/problem.tex', 'uses \\times; use \\cdot instead');
  log.log('_general_', 'could not check whether problem names are already used');
  log.log('hello', 'has no TLE submissions');
  log.log('hello', 'has no WA submissions');
  return log;
}

describe('reportFileName', () => {
  it('stamps the local time and appends the hash', () => {
    expect(reportFileName(NOW, 'abc1234')).toBe('problem-check-log-20240305-070809-abc1234.txt');
  });

  it('omits the hash suffix when there is none', () => {
    expect(reportFileName(NOW, '')).toBe('problem-check-log-20240305-070809.txt');
  });
});

describe('renderReport', () => {
  it('groups keys by prefix as a checklist', () => {
    const lines = renderReport(sampleLog(), {
      logFileName: 'log.txt',
      workingDirectory: '/problems',
      gitHash: 'abc1234',
    });

    expect(lines).toEqual([
      'logfile is log.txt, working directory is /problems, git hash is "abc1234"',
      '',
      '',
      '* _general_',
      '    * [ ] _general_: could not check whether problem names are already used',
      '',
      '* hello',
      '    * [ ] hello: has no TLE submissions',
      '    * [ ] hello: has no WA submissions',
      '    * [ ] hello/problem_statement/problem.tex: uses \\times; use \\cdot instead',
    ]);
  });

  it('renders only the header for an empty log', () => {
    expect(renderReport(new IssueLog(), { logFileName: 'log.txt', workingDirectory: '/p', gitHash: '' })).toEqual([
      'logfile is log.txt, working directory is /p, git hash is ""',
      '',
    ]);
  });
});

describe('writeReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'problemset-audit-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the rendered lines to a timestamped file', async () => {
    const report = await writeReport(sampleLog(), {
      reportDir: path.join(dir, 'logs'),
      workingDirectory: '/problems',
      now: NOW,
      gitHash: '',
    });

    expect(report.path).toBe(path.join(dir, 'logs', 'problem-check-log-20240305-070809.txt'));
    expect(await readFile(report.path, 'utf8')).toBe(`${report.lines.join('\n')}\n`);
    expect(report.lines[0]).toBe(
      'logfile is problem-check-log-20240305-070809.txt, working directory is /problems, git hash is ""',
    );
  });
});

describe('readGitShortHash', () => {
  it('is empty outside a git checkout', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'problemset-audit-nogit-'));
    try {
      expect(await readGitShortHash(dir)).toBe('');
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

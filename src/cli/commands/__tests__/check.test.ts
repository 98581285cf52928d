import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { tmpdir } from 'node:os';
import { CliError } from '../../errors.js';
import { checkCommand } from '../check.js';

describe('checkCommand', () => {
  let workspace: string;
  let reportDir: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'problemset-audit-cli-'));
    reportDir = path.join(workspace, '.logs');
    await mkdir(path.join(workspace, 'hello'));
    await writeFile(path.join(workspace, 'hello', 'problem.yaml'), 'name: Hello\nlicense: cc by-sa\n', 'utf8');
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(workspace, { recursive: true, force: true });
  });

  function run(...args: string[]) {
    return checkCommand({
      workspace,
      rawArgs: [
        'check',
        '--report-dir', reportDir,
        '--dictionaries', path.join(workspace, 'no-dictionaries'),
        ...args,
      ],
    });
  }

  it('discovers problems, prints the report and keeps a copy', async () => {
    const result = await run();

    expect(result.problems).toEqual(['hello']);
    expect(result.summary.checked).toEqual(['hello']);
    expect(result.issues.toJSON()).toEqual({
      _general_: ['could not check whether problem names are already used'],
      hello: [
        'has no WA submissions',
        'has no TLE submissions',
        'there are no "slow" accepted submissions (only: )',
      ],
    });
    expect(path.dirname(result.report.path)).toBe(reportDir);
    expect(await readFile(result.report.path, 'utf8')).toBe(`${result.report.lines.join('\n')}\n`);
    expect(console.log).toHaveBeenCalledTimes(result.report.lines.length);
    expect(console.log).toHaveBeenLastCalledWith('    * [ ] hello: there are no "slow" accepted submissions (only: )');
  });

  it('prints a JSON summary with --json', async () => {
    const result = await run('--json', '--skip-redundant-defaults', 'hello');

    expect(result.config.flagRedundantDefaults).toBe(false);
    expect(console.log).toHaveBeenCalledTimes(1);
    const [printed] = vi.mocked(console.log).mock.calls[0] ?? [];
    expect(JSON.parse(String(printed))).toEqual({
      reportFile: result.report.path,
      checked: ['hello'],
      failed: [],
      issues: result.issues.toJSON(),
    });
  });

  it('fails when there is nothing to check', async () => {
    await rm(path.join(workspace, 'hello'), { recursive: true, force: true });

    await expect(run()).rejects.toBeInstanceOf(CliError);
  });

  it('rejects unknown options', async () => {
    await expect(run('--no-such-flag')).rejects.toMatchObject({ code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });
  });
});

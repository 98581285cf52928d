/**
 * @fileoverview Report rendering
 *
 * Renders the Issue Log as a checklist grouped by the part of each key before
 * its first `/` (normally the problem name), prints it, and keeps a copy in a
 * timestamped log file.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { execa } from 'execa';
import type { IssueLog } from '../issues/issue_log.js';
import { logDebug } from '../telemetry/logger.js';

export interface ReportHeader {
  logFileName: string;
  workingDirectory: string;
  gitHash: string;
}

export interface WrittenReport {
  path: string;
  lines: string[];
}

export interface WriteReportOptions {
  reportDir: string;
  workingDirectory?: string;
  now?: Date;
  gitHash?: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `problem-check-log-YYYYMMDD-HHMMSS[-<hash>].txt`, local time. */
export function reportFileName(now: Date, gitHash: string): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  const suffix = gitHash ? `-${gitHash}` : '';
  return `problem-check-log-${date}-${time}${suffix}.txt`;
}

/**
 * Short hash of HEAD in `cwd`, or an empty string outside a git checkout.
 */
export async function readGitShortHash(cwd: string): Promise<string> {
  try {
    const result = await execa('git', ['rev-parse', '--short', 'HEAD'], { cwd, reject: false });
    return result.exitCode === 0 ? result.stdout.trim() : '';
  } catch (error) {
    logDebug('[report] git is not available', {
      error: error instanceof Error ? error.message : String(error),
    });
    return '';
  }
}

export function renderReport(issues: IssueLog, header: ReportHeader): string[] {
  const lines: string[] = [
    `logfile is ${header.logFileName}, working directory is ${header.workingDirectory}, git hash is "${header.gitHash}"`,
    '',
  ];

  for (const section of issues.sections()) {
    lines.push('');
    lines.push(`* ${section.prefix}`);
    for (const key of section.keys) {
      for (const message of issues.messagesFor(key)) {
        lines.push(`    * [ ] ${key}: ${message}`);
      }
    }
  }

  return lines;
}

export async function writeReport(issues: IssueLog, options: WriteReportOptions): Promise<WrittenReport> {
  const workingDirectory = options.workingDirectory ?? process.cwd();
  const gitHash = options.gitHash ?? await readGitShortHash(workingDirectory);
  const logFileName = reportFileName(options.now ?? new Date(), gitHash);
  const lines = renderReport(issues, { logFileName, workingDirectory, gitHash });

  const resolved = path.resolve(options.reportDir, logFileName);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, `${lines.join('\n')}\n`, 'utf8');

  return { path: resolved, lines };
}

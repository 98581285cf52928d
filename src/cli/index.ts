#!/usr/bin/env node
/**
 * @fileoverview problemset-audit CLI
 *
 * Commands:
 *   problemset-audit check [problem...]  - Audit problem packages and write a report
 *   problemset-audit help [command]      - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { showHelp } from './help.js';
import { checkCommand } from './commands/check.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'check' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  check: {
    description: 'Audit problem packages and write a report',
    usage: 'problemset-audit check [problem...] [--dictionaries <dir>] [--problem-name-cache <file>] [--json]',
  },
  help: {
    description: 'Show help for a command',
    usage: 'problemset-audit help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

function hasJsonFlag(args: string[]): boolean {
  return args.includes('--json');
}

function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w', default: process.cwd() },
      verbose: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    const { PROBLEMSET_AUDIT_VERSION } = await import('../version.js');
    console.log(`problemset-audit ${PROBLEMSET_AUDIT_VERSION.string}`);
    return;
  }

  const command = positionals[0];
  if (values.verbose === true) {
    process.env.PROBLEMSET_AUDIT_VERBOSE = '1';
  }

  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return;
  }

  const jsonMode = hasJsonFlag(args);
  // stdout carries the JSON payload; keep logs quiet unless asked for
  if (jsonMode && !process.env.PROBLEMSET_AUDIT_LOG_LEVEL) {
    process.env.PROBLEMSET_AUDIT_LOG_LEVEL = 'silent';
  }

  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [
        `Run 'problemset-audit help' for usage information`,
        `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
      ],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
    return;
  }

  const workspace = typeof values.workspace === 'string' ? values.workspace : process.cwd();

  try {
    switch (command) {
      case 'check':
        await checkCommand({ workspace, rawArgs: args.slice(args.indexOf(command)) });
        break;
    }
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    process.exitCode = getExitCode(envelope);
  }
}

main()
  .catch((error: unknown) => {
    const envelope = classifyError(error);
    outputStructuredError(envelope, process.argv.includes('--json'));
    process.exitCode = getExitCode(envelope);
  });

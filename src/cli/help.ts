/**
 * @fileoverview Help text for the problemset-audit CLI
 */

const HELP_TEXT = {
  main: `
problemset-audit

USAGE:
    problemset-audit <command> [options]

COMMANDS:
    check [problem...]  Audit problem packages and write a report
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help
    -v, --version       Show version
    -w, --workspace     Directory holding the problem packages (default: cwd)
    --verbose           Log progress to stderr

ENVIRONMENT:
    PROBLEMSET_AUDIT_LOG_LEVEL   debug | info | warn | error | silent
    PROBLEMSET_AUDIT_VERBOSE     1 to log progress
`,

  check: `
problemset-audit check - Audit problem packages

USAGE:
    problemset-audit check [problem...] [options]

Without problem names, every subdirectory of the workspace that contains a
problem.yaml is checked.

OPTIONS:
    --dictionaries <dir>        Word lists, one directory per language
                                (default: ~/etc/dictionaries,
                                env PROBLEMSET_AUDIT_DICTIONARIES)
    --problem-name-cache <file> Names already in use, one per line
                                (env PROBLEMSET_AUDIT_NAME_CACHE)
    --defaults <file>           Default metadata schema (JSON or YAML)
                                (env PROBLEMSET_AUDIT_DEFAULTS)
    --report-dir <dir>          Where the report log file is written
                                (default: cwd, env PROBLEMSET_AUDIT_REPORT_DIR)
    --skip-redundant-defaults   Do not warn about values equal to the default
                                (env PROBLEMSET_AUDIT_FLAG_REDUNDANT_DEFAULTS=0)
    --max-image-kb <n>          Large statement image threshold (default: 200,
                                env PROBLEMSET_AUDIT_MAX_IMAGE_KB)
    --json                      Print findings as JSON instead of the checklist

EXAMPLES:
    problemset-audit check
    problemset-audit check hello twosum --dictionaries ./dictionaries
    problemset-audit check --json --report-dir ./logs
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  const topic = command && isHelpTopic(command) ? command : 'main';
  return HELP_TEXT[topic];
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}

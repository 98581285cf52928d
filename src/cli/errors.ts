/**
 * @fileoverview CLI error types and structured error envelopes
 */

export type CliErrorCode = 'INVALID_ARGUMENT' | 'IO_ERROR' | 'INTERNAL';

export type ErrorEnvelopeCode = `E${CliErrorCode}`;

export interface ErrorEnvelope {
  code: ErrorEnvelopeCode;
  message: string;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export class CliError extends Error {
  public readonly code: CliErrorCode;
  public readonly recoveryHints: string[];

  constructor(message: string, code: CliErrorCode, recoveryHints: string[] = []) {
    super(message);
    this.name = 'CliError';
    this.code = code;
    this.recoveryHints = recoveryHints;
  }
}

export function createErrorEnvelope(
  code: ErrorEnvelopeCode,
  message: string,
  extras: { recoveryHints?: string[]; context?: Record<string, unknown> } = {},
): ErrorEnvelope {
  return {
    code,
    message,
    recoveryHints: extras.recoveryHints ?? [],
    context: extras.context ?? {},
  };
}

function isNodeSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    return createErrorEnvelope(`E${error.code}`, error.message, {
      recoveryHints: error.recoveryHints,
    });
  }
  if (error instanceof RangeError) {
    return createErrorEnvelope('EINVALID_ARGUMENT', error.message, {
      recoveryHints: [`Run 'problemset-audit help' for usage information`],
    });
  }
  if (isNodeSystemError(error) && error.code?.startsWith('ERR_PARSE_ARGS')) {
    return createErrorEnvelope('EINVALID_ARGUMENT', error.message, {
      recoveryHints: [`Run 'problemset-audit help check' for the accepted options`],
    });
  }
  if (isNodeSystemError(error)) {
    return createErrorEnvelope('EIO_ERROR', error.message, {
      context: { errno: error.code, path: error.path },
    });
  }
  return createErrorEnvelope(
    'EINTERNAL',
    error instanceof Error ? error.message : String(error),
  );
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  for (const hint of envelope.recoveryHints) {
    lines.push(`  hint: ${hint}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return envelope.code === 'EINVALID_ARGUMENT' ? 2 : 1;
}

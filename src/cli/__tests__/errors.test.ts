import { describe, expect, it } from 'vitest';
import {
  classifyError,
  CliError,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
} from '../errors.js';

describe('classifyError', () => {
  it('keeps the code and hints of a CliError', () => {
    const envelope = classifyError(new CliError('nothing to check', 'INVALID_ARGUMENT', ['name a problem']));
    expect(envelope).toEqual({
      code: 'EINVALID_ARGUMENT',
      message: 'nothing to check',
      recoveryHints: ['name a problem'],
      context: {},
    });
    expect(getExitCode(envelope)).toBe(2);
  });

  it('treats range errors and argument parse errors as invalid arguments', () => {
    expect(classifyError(new RangeError('bad size')).code).toBe('EINVALID_ARGUMENT');
    const parseError = Object.assign(new TypeError("Unknown option '--x'"), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });
    expect(classifyError(parseError).code).toBe('EINVALID_ARGUMENT');
  });

  it('reports system errors with their errno and path', () => {
    const error = Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT', path: '/missing' });
    const envelope = classifyError(error);
    expect(envelope.code).toBe('EIO_ERROR');
    expect(envelope.context).toEqual({ errno: 'ENOENT', path: '/missing' });
    expect(getExitCode(envelope)).toBe(1);
  });

  it('falls back to an internal error', () => {
    expect(classifyError('boom')).toMatchObject({ code: 'EINTERNAL', message: 'boom' });
  });
});

describe('formatting', () => {
  const envelope = classifyError(new CliError('nothing to check', 'INVALID_ARGUMENT', ['name a problem']));

  it('renders hints under the message', () => {
    expect(formatErrorWithHints(envelope)).toBe('Error [EINVALID_ARGUMENT]: nothing to check\n  hint: name a problem');
  });

  it('wraps the envelope for JSON output', () => {
    expect(JSON.parse(formatErrorJson(envelope))).toEqual({ error: envelope });
  });
});

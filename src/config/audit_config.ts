/**
 * @fileoverview Audit configuration
 *
 * Settings resolve from command-line flags, then PROBLEMSET_AUDIT_* environment
 * variables, then built-in defaults.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { BUNDLED_DEFAULTS_PATH } from '../metadata/default_schema.js';
import { DEFAULT_IMAGE_SIZE_CONFIG } from '../quality/image_size_guard.js';
import { isFalsyFlag } from '../utils/runtime_controls.js';

export interface AuditConfig {
  /** Directory holding the problem packages. */
  workspace: string;
  dictionariesDir: string;
  problemNameCache?: string;
  defaultsFile: string;
  reportDir: string;
  flagRedundantDefaults: boolean;
  maxImageKilobytes: number;
}

export interface AuditConfigFlags {
  workspace?: string;
  dictionaries?: string;
  problemNameCache?: string;
  defaults?: string;
  reportDir?: string;
  skipRedundantDefaults?: boolean;
  maxImageKb?: string;
}

const PositiveKilobytesSchema = z.coerce.number().int().positive();

export function defaultDictionariesDir(): string {
  return path.join(os.homedir(), 'etc', 'dictionaries');
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function resolveMaxImageKilobytes(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_IMAGE_SIZE_CONFIG.maxKilobytes;
  const parsed = PositiveKilobytesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RangeError(`max image size must be a positive whole number of kB, got "${raw}"`);
  }
  return parsed.data;
}

export function resolveAuditConfig(
  flags: AuditConfigFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AuditConfig {
  const workspace = path.resolve(cwd, flags.workspace ?? '.');
  const problemNameCache = nonEmpty(flags.problemNameCache) ?? nonEmpty(env.PROBLEMSET_AUDIT_NAME_CACHE);

  return {
    workspace,
    dictionariesDir: path.resolve(
      cwd,
      nonEmpty(flags.dictionaries) ?? nonEmpty(env.PROBLEMSET_AUDIT_DICTIONARIES) ?? defaultDictionariesDir(),
    ),
    problemNameCache: problemNameCache ? path.resolve(cwd, problemNameCache) : undefined,
    defaultsFile: path.resolve(
      cwd,
      nonEmpty(flags.defaults) ?? nonEmpty(env.PROBLEMSET_AUDIT_DEFAULTS) ?? BUNDLED_DEFAULTS_PATH,
    ),
    reportDir: path.resolve(cwd, nonEmpty(flags.reportDir) ?? nonEmpty(env.PROBLEMSET_AUDIT_REPORT_DIR) ?? '.'),
    flagRedundantDefaults: flags.skipRedundantDefaults
      ? false
      : !isFalsyFlag(env.PROBLEMSET_AUDIT_FLAG_REDUNDANT_DEFAULTS),
    maxImageKilobytes: resolveMaxImageKilobytes(
      nonEmpty(flags.maxImageKb) ?? nonEmpty(env.PROBLEMSET_AUDIT_MAX_IMAGE_KB),
    ),
  };
}

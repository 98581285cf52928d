/**
 * @fileoverview Image Size Guard
 *
 * Flags statement images that are large enough to slow down the rendered
 * problem page. Only files directly inside problem_statement/ are checked.
 */

import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { minimatch } from 'minimatch';
import { issue, type Issue } from '../issues/issue_log.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ImageSizeConfig {
  /** Maximum size in kB (1 kB = 1024 bytes). */
  maxKilobytes?: number;
  /** Patterns of files treated as images. */
  imagePatterns?: string[];
}

export interface ImageSizeResult {
  /** Path relative to the workspace, also the issue key. */
  key: string;
  bytes: number;
  passed: boolean;
}

// ============================================================================
// DEFAULT CONFIG
// ============================================================================

export const DEFAULT_IMAGE_SIZE_CONFIG: Required<ImageSizeConfig> = {
  maxKilobytes: 200,
  imagePatterns: ['*.jpg', '*.jpeg', '*.png', '*.pdf', '*.svg'],
};

// ============================================================================
// CORE FUNCTIONS
// ============================================================================

export function isImageFile(fileName: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(fileName, pattern, { nocase: true, matchBase: true }));
}

/**
 * Sizes of the images in a problem's statement directory, sorted by path.
 */
export async function checkStatementImages(
  workspace: string,
  problem: string,
  config?: ImageSizeConfig,
): Promise<ImageSizeResult[]> {
  const cfg = { ...DEFAULT_IMAGE_SIZE_CONFIG, ...config };
  const limitBytes = cfg.maxKilobytes * 1024;

  const files = await glob('problem_statement/*', {
    cwd: path.join(workspace, problem),
    nodir: true,
    posix: true,
  });

  const results: ImageSizeResult[] = [];
  for (const file of files.sort()) {
    if (!isImageFile(path.posix.basename(file), cfg.imagePatterns)) {
      continue;
    }
    const info = await stat(path.join(workspace, problem, file));
    results.push({
      key: path.posix.join(problem, file),
      bytes: info.size,
      passed: info.size <= limitBytes,
    });
  }
  return results;
}

export async function checkLargeImages(
  workspace: string,
  problem: string,
  config?: ImageSizeConfig,
): Promise<Issue[]> {
  const cfg = { ...DEFAULT_IMAGE_SIZE_CONFIG, ...config };
  const results = await checkStatementImages(workspace, problem, cfg);
  return results
    .filter((result) => !result.passed)
    .map((result) => issue(
      result.key,
      `image is large (${Math.floor(result.bytes / 1024)} kB); try to keep images under ${cfg.maxKilobytes} kB`,
    ));
}

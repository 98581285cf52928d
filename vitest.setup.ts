/**
 * Centralized Vitest Setup for problemset-audit
 *
 * Operational logging goes to stderr through src/telemetry/logger.ts. Keep it
 * quiet during tests unless the caller explicitly set a log level.
 */

if (!process.env.PROBLEMSET_AUDIT_LOG_LEVEL) {
  process.env.PROBLEMSET_AUDIT_LOG_LEVEL = 'silent';
}

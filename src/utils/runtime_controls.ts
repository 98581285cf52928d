export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isFalsyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off';
}

export function isVerboseLoggingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.PROBLEMSET_AUDIT_VERBOSE);
}

export function isLoggingDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const level = String(env.PROBLEMSET_AUDIT_LOG_LEVEL ?? '').toLowerCase().trim();
  return level === 'silent' || level === 'none' || level === 'off' || level === 'quiet';
}

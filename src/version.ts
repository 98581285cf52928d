export const PROBLEMSET_AUDIT_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;

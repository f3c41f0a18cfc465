const REDACT_KEYS = ['responses', 'password', 'passwordHash', 'email', 'registryNumber'];

type LogMeta = Record<string, unknown>;

function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value && typeof value === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      copy[k] = REDACT_KEYS.includes(k) ? '[REDACTED]' : redact(v);
    }
    return copy;
  }
  return value;
}

/* eslint-disable no-console */
export const safeLogger = {
  info(event: string, meta: LogMeta = {}) {
    console.info(event, redact(meta));
  },
  warn(event: string, meta: LogMeta = {}) {
    console.warn(event, redact(meta));
  },
  error(event: string, meta: LogMeta = {}) {
    console.error(event, redact(meta));
  },
};

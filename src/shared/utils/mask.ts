/**
 * Secret masking for display.
 */

/**
 * Mask a secret, keeping the first `keepPrefix` characters visible.
 *
 * Values no longer than `keepPrefix` are returned unchanged, so very short
 * secrets stay readable. With `keepPrefix <= 0` nothing is left visible.
 */
export function maskSecret(value: unknown, keepPrefix = 3, maskChar = '*'): string {
  const secret = typeof value === 'string' ? value : String(value);
  const keep = Number.isNaN(keepPrefix) ? 0 : Math.trunc(keepPrefix);
  if (keep <= 0) {
    return maskChar.repeat(secret.length);
  }
  if (secret.length <= keep) {
    return secret;
  }
  return secret.slice(0, keep) + maskChar.repeat(secret.length - keep);
}

/**
 * Token expiry in the two shapes it arrives in.
 *
 * Owned tokens carry `expires_at` ("2025-10-22T23:53:05Z"); rclone tokens carry
 * `expiry` with fractional seconds and a zone offset
 * ("2025-10-31T01:22:03.598349702+10:00"). The field present decides the format.
 */
import { StaticTypeCompanion } from './companion.js';

export type TokenExpiry =
  | { format: 'expires_at'; raw: string; at: Date }
  | { format: 'expiry'; raw: string; at: Date }
  | { format: 'none'; raw?: string };

const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/;

function parseTimestamp(raw: string): Date | undefined {
  const m = TIMESTAMP.exec(raw.trim());
  if (!m) return undefined;
  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(Number);
  // Go's zero time.Time, written by rclone for tokens that never expire
  if (year <= 1) return undefined;
  let offsetMinutes = 0;
  const zone = m[7];
  if (zone && zone !== 'Z') {
    const digits = zone.replace(':', '');
    const sign = digits.startsWith('-') ? -1 : 1;
    offsetMinutes = sign * (Number(digits.slice(1, 3)) * 60 + Number(digits.slice(3, 5)));
  }
  const utc = Date.UTC(year, month - 1, day, hour, minute, second) - offsetMinutes * 60_000;
  return new Date(utc);
}

function humanDuration(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  if (seconds < 86_400) return `${Math.floor(seconds / 3600)}h ${Math.floor((seconds % 3600) / 60)}m`;
  return `${Math.floor(seconds / 86_400)}d`;
}

export const TokenExpiry = StaticTypeCompanion({
  /** Detect the expiry field of a decoded token blob. Unparseable timestamps count as no expiry. */
  detect(blob: { expires_at?: unknown; expiry?: unknown }): TokenExpiry {
    if (typeof blob.expires_at === 'string') {
      const at = parseTimestamp(blob.expires_at);
      return at ? { format: 'expires_at', raw: blob.expires_at, at } : { format: 'none', raw: blob.expires_at };
    }
    if (typeof blob.expiry === 'string') {
      const at = parseTimestamp(blob.expiry);
      return at ? { format: 'expiry', raw: blob.expiry, at } : { format: 'none', raw: blob.expiry };
    }
    return { format: 'none' };
  },

  /** undefined when the expiry is not known */
  isExpired(expiry: TokenExpiry, now: Date): boolean | undefined {
    if (expiry.format === 'none') return undefined;
    return now.getTime() >= expiry.at.getTime();
  },

  /** The owned file's timestamp format: whole seconds, UTC, "Z" suffix */
  formatOwned(at: Date): string {
    return at.toISOString().replace(/\.\d{3}Z$/, 'Z');
  },

  describe(expiry: TokenExpiry, now: Date): string {
    if (expiry.format === 'none') return 'no expiry recorded';
    const diff = Math.round((expiry.at.getTime() - now.getTime()) / 1000);
    return diff > 0 ? `expires in ${humanDuration(diff)}` : `expired ${humanDuration(-diff)} ago`;
  },
});

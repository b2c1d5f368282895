import type { TokenExpiry } from '../core/token-expiry.js';

export type { Capability } from '../core/capability.js';
export type { TokenExpiry } from '../core/token-expiry.js';

export type TokenSource = 'owned' | 'foreign';

export interface Token {
  accessToken: string;
  refreshToken?: string;
  tokenType: string;
  scope: string;
  expiry: TokenExpiry;
}

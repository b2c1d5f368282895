/**
 * Standard facets and the domain-owned error definitions.
 *
 * Facets are reusable markers/data traits composed into any ErrorDef.
 * Callers that only care about the kind of failure test the facet
 * (`AclError.has(err, NotFound)`), callers that care about the exact
 * failure test the definition (`ErrCredentialExpired.is(err)`).
 */

import { AclError, ErrFacet } from './acl-error.js';
import type { Capability, TokenSource } from '../types/token.js';

// ============================================================================
// Boundaries
// ============================================================================

export const Credential = AclError.boundary('credential');
export const Remote = AclError.boundary('remote');
export const Config = AclError.boundary('config');
export const Cli = AclError.boundary('cli');

// ============================================================================
// Standard Facets
// ============================================================================

/** Something expected was not found */
export const NotFound = ErrFacet.marker('NotFound');

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker('BadInput');

/** A precondition (usually a credential) is not available */
export const NotAvailable = ErrFacet.marker('NotAvailable');

/** The caller lacks the rights for the operation */
export const Forbidden = ErrFacet.marker('Forbidden');

/** The request did not complete, or its response could not be understood */
export const Transport = ErrFacet.marker('Transport');

export const RateLimited = ErrFacet.marker('RateLimited');

/** Carries the HTTP status the remote answered with */
export const HasStatus = ErrFacet.data<{ status: number }>('HasStatus');

/** A 401; `tokenExpired` when the provider said the token expired or is invalid */
export const Unauthorized = ErrFacet.data<{ tokenExpired: boolean }>('Unauthorized');

// ============================================================================
// Credential Errors
// ============================================================================

export const ErrCredentialMissing = Credential.define('missing', {
  customProps: ErrFacet.props<{ remote: string; reason: string }>(),
  facets: [NotAvailable],
  message: (d) => `No usable token for remote "${d.remote}": ${d.reason}`,
});

export const ErrCredentialExpired = Credential.define('expired', {
  customProps: ErrFacet.props<{ remote: string; remedy: string }>(),
  facets: [NotAvailable],
  message: (d) => `Token for remote "${d.remote}" has expired and could not be refreshed. Run: ${d.remedy}`,
});

export const ErrInsufficientCapability = Credential.define('insufficient_capability', {
  customProps: ErrFacet.props<{ required: Capability; actual: Capability; source: TokenSource | 'none' }>(),
  facets: [Forbidden],
  message: (d) =>
    `Operation requires ${d.required} permissions (Files.ReadWrite.All), ` +
    `but the available ${d.source === 'none' ? '' : `${d.source} `}token is ${d.actual}. ` +
    `Run "acl-inspector login" to authorize write access.`,
});

export const ErrRefreshFailed = Credential.define('refresh_failed', {
  customProps: ErrFacet.props<{ detail: string }>(),
  facets: [NotAvailable],
  message: (d) => `Token refresh failed: ${d.detail}`,
});

// ============================================================================
// Remote Errors
// ============================================================================

export const ErrRemoteNotFound = Remote.define('not_found', {
  customProps: ErrFacet.props<{ resource: string }>(),
  facets: [NotFound, HasStatus],
  message: (d) => `Not found: ${d.resource}`,
});

export const ErrRemoteForbidden = Remote.define('forbidden', {
  customProps: ErrFacet.props<{ resource: string }>(),
  facets: [Forbidden, HasStatus],
  message: (d) => `Access denied: ${d.resource}`,
});

export const ErrRemoteUnauthorized = Remote.define('unauthorized', {
  customProps: ErrFacet.props<{ resource: string }>(),
  facets: [Unauthorized, HasStatus],
  message: (d) => (d.tokenExpired ? `Token expired or invalid: ${d.resource}` : `Unauthorized: ${d.resource}`),
});

export const ErrRateLimited = Remote.define('rate_limited', {
  customProps: ErrFacet.props<{ resource: string; retryAfter?: string }>(),
  facets: [RateLimited, HasStatus],
  message: (d) =>
    `Rate limited by the remote: ${d.resource}` + (d.retryAfter ? ` (retry after ${d.retryAfter}s)` : ''),
});

/** Any other non-success status */
export const ErrRemoteHttp = Remote.define('http', {
  customProps: ErrFacet.props<{ resource: string; detail: string }>(),
  facets: [HasStatus],
  message: (d) => `HTTP ${d.status} from ${d.resource}: ${d.detail}`,
});

export const ErrTransport = Remote.define('transport', {
  customProps: ErrFacet.props<{ resource: string; detail: string; causeCode?: string }>(),
  facets: [Transport],
  message: (d) => `Request failed: ${d.resource} (${d.detail})`,
});

/** A response body that does not decode. Propagates like a transport failure. */
export const ErrMalformedResponse = Remote.define('malformed_response', {
  customProps: ErrFacet.props<{ resource: string; detail: string }>(),
  facets: [Transport],
  message: (d) => `Malformed response from ${d.resource}: ${d.detail}`,
});

// ============================================================================
// Config / CLI Errors
// ============================================================================

export const ErrInvalidConfig = Config.define('invalid', {
  customProps: ErrFacet.props<{ path: string; detail: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid configuration in ${d.path}: ${d.detail}`,
});

export const ErrInvalidArgument = Cli.define('invalid_argument', {
  customProps: ErrFacet.props<{ detail: string }>(),
  facets: [BadInput],
  message: (d) => d.detail,
});

export const ErrLoginFailed = Cli.define('login_failed', {
  customProps: ErrFacet.props<{ detail: string }>(),
  facets: [NotAvailable],
  message: (d) => `Authorization failed: ${d.detail}`,
});

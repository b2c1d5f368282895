/**
 * AclError - Composable error system with facets and boundaries.
 *
 * Errors are composed from facets (marker traits and data traits) instead of
 * class inheritance. Three discrimination axes: exact type (code), facet, domain.
 *
 *   const Remote = AclError.boundary("remote");
 *   const ErrNotFound = Remote.define("not_found", {
 *     customProps: ErrFacet.props<{ resource: string }>(),
 *     facets: [NotFound],
 *     message: (d) => `Not found: ${d.resource}`,
 *   });
 */

import { StaticTypeCompanion } from '../core/companion.js';

// ============================================================================
// Facet Types
// ============================================================================

export interface ErrMarkerFacet {
  readonly kind: 'marker';
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: 'data';
  readonly name: string;
  readonly _data?: TData; // phantom type for compile-time inference
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Phantom type carrier for error-local custom props */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: 'props';
  readonly _phantom?: T;
}

export type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

// ============================================================================
// Facet Companion
// ============================================================================

export const ErrFacet = StaticTypeCompanion({
  /** Create a marker facet (no associated data) */
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: 'marker' as const, name });
  },

  /** Create a data facet with typed associated data */
  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    return Object.freeze({ kind: 'data' as const, name });
  },

  /** Declare error-local custom props (phantom type only) */
  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: 'props' };
  },
});

// ============================================================================
// Type Utilities
// ============================================================================

type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (x: infer I) => void
  ? I
  : never;

/** Markers contribute {} */
export type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

export type MergeFacetProps<Fs extends readonly ErrFacetAny[]> = UnionToIntersection<FacetProps<Fs[number]>>;

// ============================================================================
// Interfaces
// ============================================================================

export interface AclError extends Error {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: Readonly<Record<string, unknown>>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: AclError;
  toJSON(): AclErrorJSON;
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

export interface AclErrorJSON {
  code: string;
  domain: string;
  message: string;
  context?: string;
  data: Record<string, unknown>;
  facets: string[];
  cause?: AclErrorJSON;
}

export interface ErrorDef<D> {
  readonly code: string;
  readonly domain: string;
  readonly facets: readonly ErrFacetAny[];
  create(data: D, context?: string, cause?: unknown): AclError;
  is(err: unknown): err is AclError & { readonly data: D };
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error within this boundary. Code is prefixed with the domain. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
  ): ErrorDef<MergeFacetProps<Fs> & InferPropsData<P>>;
  /** Check if an error belongs to this boundary's domain */
  is(err: unknown): err is AclError;
}

// ============================================================================
// Implementation (internal)
// ============================================================================

function toRecord(value: unknown): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (typeof value === 'object' && value !== null) {
    for (const [key, entry] of Object.entries(value)) {
      out[key] = entry;
    }
  }
  return out;
}

class AclErrorImpl extends Error implements AclError {
  readonly code: string;
  readonly domain: string;
  readonly context?: string;
  readonly data: Readonly<Record<string, unknown>>;
  readonly facetNames: ReadonlySet<string>;
  override cause?: AclErrorImpl;

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: Record<string, unknown>,
    context?: string,
    cause?: AclErrorImpl,
  ) {
    super(context ? `${message}: ${context}` : message);
    this.name = `AclError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.context = context;
    this.data = Object.freeze(data);
    this.facetNames = facetNames;
    if (cause) this.cause = cause;
  }

  toJSON(): AclErrorJSON {
    const json: AclErrorJSON = {
      code: this.code,
      domain: this.domain,
      message: this.message,
      data: { ...this.data },
      facets: [...this.facetNames],
    };
    if (this.context !== undefined) {
      json.context = this.context;
    }
    if (this.cause) {
      json.cause = this.cause.toJSON();
    }
    return json;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const color = opts?.color ?? false;
    const red = color ? '\x1b[31m' : '';
    const dim = color ? '\x1b[2m' : '';
    const reset = color ? '\x1b[0m' : '';

    const lines = [`AclError: ${red}${this.code}${reset}: ${this.message}`];

    let current = this.cause;
    let indent = '  ';
    while (current) {
      lines.push(`${indent}${dim}└ caused by:${reset} ${red}${current.code}${reset}: ${current.message}`);
      current = current.cause;
      indent += '  ';
    }

    if (opts?.includeStackTrace && this.stack) {
      const frames = this.stack.split('\n').filter((line) => line.trimStart().startsWith('at '));
      if (frames.length > 0) {
        lines.push(`  ${dim}➝ Stack trace:${reset}`);
        for (const frame of frames) lines.push(`${dim}${frame}${reset}`);
      }
    }

    return lines.join('\n');
  }
}

/** Convert any thrown value to an AclError, preserving stack */
function asAclError(thrown: unknown): AclErrorImpl {
  if (thrown instanceof AclErrorImpl) return thrown;
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  const wrapped = new AclErrorImpl('unknown', 'unknown', message, new Set<string>(), {});
  if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
  return wrapped;
}

function defineError<D>(
  code: string,
  domain: string,
  facets: readonly ErrFacetAny[],
  message: (data: D) => string,
): ErrorDef<D> {
  const facetNames: ReadonlySet<string> = new Set(facets.map((f) => f.name));

  function create(data: D, context?: string, cause?: unknown): AclError {
    const err = new AclErrorImpl(
      code,
      domain,
      message(data),
      facetNames,
      toRecord(data),
      context,
      cause === undefined ? undefined : asAclError(cause),
    );
    Error.captureStackTrace(err, create);
    return err;
  }

  return Object.freeze({
    code,
    domain,
    facets,
    create,
    is(err: unknown): err is AclError & { readonly data: D } {
      return err instanceof AclErrorImpl && err.code === code;
    },
  });
}

// ============================================================================
// AclError Companion
// ============================================================================

export const AclError = StaticTypeCompanion({
  /** Create an error boundary for a domain. Errors defined on it are prefixed with the domain. */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,
      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: MergeFacetProps<Fs> & InferPropsData<P>) => string },
      ): ErrorDef<MergeFacetProps<Fs> & InferPropsData<P>> {
        return defineError(`${domain}.${code}`, domain, opts.facets, opts.message);
      },
      is(err: unknown): err is AclError {
        return err instanceof AclErrorImpl && err.domain === domain;
      },
    };
  },

  isAclError(err: unknown): err is AclError {
    return err instanceof AclErrorImpl;
  },

  /**
   * Check if an error has a specific facet.
   * For a data facet, narrows err.data to include its data.
   */
  has<F extends ErrFacetAny>(err: unknown, facet: F): err is AclError & { readonly data: FacetProps<F> } {
    return err instanceof AclErrorImpl && err.facetNames.has(facet.name);
  },

  /** Convert any value to an AclError. Returns AclErrors unchanged. */
  wrap(err: unknown): AclError {
    return asAclError(err);
  },
});

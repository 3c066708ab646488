/**
 * Shared types used across the engine. Grouping these definitions keeps the
 * error catalogue and the failure payload consistent between the library and
 * the CLI.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Keeping a single source of truth ensures every surface emits consistent codes
 * which simplifies documentation and client handling.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    SHAPE: "E-GRAPH-SHAPE",
    INDEX: "E-GRAPH-INDEX",
    LOAD: "E-GRAPH-LOAD",
    UNEXPECTED: "E-GRAPH-UNEXPECTED",
  },
  CLI: {
    INVALID_ARGS: "E-CLI-INVALID-ARGS",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_SHAPE`). The helper keeps runtime data immutable while
 * preserving the strongly typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_INDEX`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the engine. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 120;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. If the provided text is empty once trimmed a generic
 * fallback is returned so callers never receive an empty string.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Normalises the optional hint attached to an error. Empty strings collapse to
 * `undefined` while overly long hints are truncated.
 */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/**
 * Canonical failure payload printed by the CLI. Library callers receive typed
 * exceptions instead and only meet this shape through {@link fail}.
 */
export interface GraphFailure<Code extends string = string> {
  /** Marker discriminating failures from successful payloads. */
  ok: false;
  /** Stable error code helping clients branch on the failure kind. */
  code: Code;
  /** Human readable message after normalisation and truncation. */
  message: string;
  /** Optional hint containing actionable remediation guidance. */
  hint?: string;
  /** Structured details copied from the originating error. */
  details?: unknown;
}

/**
 * Builds a {@link GraphFailure} using the canonical error normalisation rules.
 * The hint is removed entirely when it collapses to an empty string so JSON
 * payloads never expose `undefined` values.
 */
export function fail<Code extends string>(
  code: Code,
  message: string,
  hint?: string | null,
  details?: unknown,
): GraphFailure<Code> {
  const failure: GraphFailure<Code> = {
    ok: false,
    code,
    message: normaliseErrorMessage(message),
  };
  const normalisedHint = normaliseErrorHint(hint ?? undefined);
  if (normalisedHint) {
    failure.hint = normalisedHint;
  }
  if (details !== undefined) {
    failure.details = details;
  }
  return failure;
}

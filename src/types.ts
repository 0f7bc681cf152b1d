/**
 * Shared types used across pathlab. Grouping the error catalogue here keeps
 * the codes consistent between the graph model, the algorithms and the CLI.
 */
import { z } from "zod";

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Callers branch on these codes rather than on messages.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    INVALID_EDGE: "E-GRAPH-INVALID-EDGE",
    DUPLICATE_NODE: "E-GRAPH-DUPLICATE-NODE",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
  PATH: {
    INVALID_ARGUMENT: "E-PATH-INVALID-ARGUMENT",
  },
  CLI: {
    USAGE: "E-CLI-USAGE",
    UNEXPECTED: "E-CLI-UNEXPECTED",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

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

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_INVALID_EDGE`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units kept in a normalised error message. */
export const ERROR_TEXT_MAX_LENGTH = 160;

/**
 * Collapses whitespace and enforces the maximum length of an error message.
 * Empty input falls back to a generic text so reports never print a blank.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Base class of every error raised by pathlab. */
export class PathlabError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "PathlabError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/** Normalised representation of a thrown value, used by logs and the CLI. */
export interface DescribedError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Normalises an arbitrary thrown value. Zod validation errors are mapped to
 * the graph invalid-input code so document problems read like other failures.
 */
export function describeError(error: unknown, fallbackCode: string = ERROR_CODES.CLI_UNEXPECTED): DescribedError {
  if (error instanceof PathlabError) {
    return {
      code: error.code,
      message: normaliseErrorMessage(error.message),
      ...(error.details === undefined ? {} : { details: error.details }),
    };
  }
  if (error instanceof z.ZodError) {
    return {
      code: ERROR_CODES.GRAPH_INVALID_INPUT,
      message: normaliseErrorMessage(error.issues.map((issue) => issue.message).join("; ")),
      details: { issues: error.issues },
    };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: fallbackCode, message: normaliseErrorMessage(message) };
}

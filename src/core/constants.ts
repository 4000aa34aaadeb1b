/**
 * Core constants for the record command tree.
 *
 * CATEGORIES group commands in help output:
 *   PROPERTIES: one node per visible record field
 *   ITEMS:      one node per element of an ordered collection
 *   ACTIONS:    leaves that read or write the bound value
 */

export const CATEGORY = {
  PROPERTIES: "PROPERTIES",
  ITEMS: "ITEMS",
  ACTIONS: "ACTIONS",
} as const;
export type Category = (typeof CATEGORY)[keyof typeof CATEGORY];

export const INT_WIDTHS = [
  "int8",
  "int16",
  "int32",
  "int64",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
] as const;
export type IntWidth = (typeof INT_WIDTHS)[number];

/**
 * Inclusive range for each integer width.
 * Values live in a JS number, so the 64-bit widths stop at the
 * safe-integer bounds.
 */
export const INT_RANGE: Record<IntWidth, { min: bigint; max: bigint }> = {
  int8: { min: -128n, max: 127n },
  int16: { min: -32768n, max: 32767n },
  int32: { min: -2147483648n, max: 2147483647n },
  int64: {
    min: BigInt(Number.MIN_SAFE_INTEGER),
    max: BigInt(Number.MAX_SAFE_INTEGER),
  },
  uint8: { min: 0n, max: 255n },
  uint16: { min: 0n, max: 65535n },
  uint32: { min: 0n, max: 4294967295n },
  uint64: { min: 0n, max: BigInt(Number.MAX_SAFE_INTEGER) },
};

/** Separator for multi-value tags and list defaults. */
export const LIST_SEPARATOR = ",";

/** Exit codes for the CLI. */
export const EXIT = {
  SUCCESS: 0,
  VALIDATION_ERROR: 1,
  FILESYSTEM_ERROR: 2,
  BAD_INPUT: 3,
} as const;

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal module classifying code points against the XML 1.0 grammar.
 *
 * @see {@link https://www.w3.org/TR/xml/#charsets | XML 1.0 §2.2 Characters}
 * @see {@link https://www.w3.org/TR/xml/#NT-Name | XML 1.0 §2.3 Names}
 *
 * @module
 */

/**
 * Checks if a code point is a valid XML 1.0 Char per §2.2.
 *
 *   Char ::= #x9 | #xA | #xD | [#x20-#xD7FF] | [#xE000-#xFFFD] | [#x10000-#x10FFFF]
 *
 * Lone surrogates (#xD800-#xDFFF) and the non-characters #xFFFE-#xFFFF
 * are excluded.
 */
export function isXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xA ||
    codePoint === 0xD ||
    (codePoint >= 0x20 && codePoint <= 0xD7FF) ||
    (codePoint >= 0xE000 && codePoint <= 0xFFFD) ||
    (codePoint >= 0x10000 && codePoint <= 0x10FFFF)
  );
}

/**
 * Checks if a code point may start an XML name (`NameStartChar`).
 *
 * The colon is accepted; where a name must not contain one, the caller
 * checks for it separately.
 */
export function isNameStartChar(codePoint: number): boolean {
  return (
    codePoint === 0x3A || // :
    codePoint === 0x5F || // _
    (codePoint >= 0x61 && codePoint <= 0x7A) || // a-z
    (codePoint >= 0x41 && codePoint <= 0x5A) || // A-Z
    (codePoint >= 0xC0 && codePoint <= 0xD6) ||
    (codePoint >= 0xD8 && codePoint <= 0xF6) ||
    (codePoint >= 0xF8 && codePoint <= 0x2FF) ||
    (codePoint >= 0x370 && codePoint <= 0x37D) ||
    (codePoint >= 0x37F && codePoint <= 0x1FFF) ||
    (codePoint >= 0x200C && codePoint <= 0x200D) ||
    (codePoint >= 0x2070 && codePoint <= 0x218F) ||
    (codePoint >= 0x2C00 && codePoint <= 0x2FEF) ||
    (codePoint >= 0x3001 && codePoint <= 0xD7FF) ||
    (codePoint >= 0xF900 && codePoint <= 0xFDCF) ||
    (codePoint >= 0xFDF0 && codePoint <= 0xFFFD) ||
    (codePoint >= 0x10000 && codePoint <= 0xEFFFF)
  );
}

/**
 * Checks if a code point may continue an XML name (`NameChar`).
 */
export function isNameChar(codePoint: number): boolean {
  return (
    isNameStartChar(codePoint) ||
    codePoint === 0x2D || // -
    codePoint === 0x2E || // .
    codePoint === 0xB7 ||
    (codePoint >= 0x30 && codePoint <= 0x39) || // 0-9
    (codePoint >= 0x300 && codePoint <= 0x36F) ||
    (codePoint >= 0x203F && codePoint <= 0x2040)
  );
}

/** Where a string breaks the `Name` production. */
export interface InvalidNameChar {
  /** The offending character, or `""` for an empty name. */
  readonly char: string;
  /** Whether it is the first character of the name. */
  readonly leading: boolean;
}

/**
 * Finds the first character of `name` that breaks the `Name` production.
 * The empty string is not a name.
 *
 * @example Usage
 * ```ts
 * import { findInvalidNameChar } from "./_chars.ts";
 *
 * findInvalidNameChar("item-1"); // undefined
 * findInvalidNameChar("1item");  // { char: "1", leading: true }
 * ```
 *
 * @returns `undefined` when the whole string is a name.
 */
export function findInvalidNameChar(name: string): InvalidNameChar | undefined {
  if (name === "") return { char: "", leading: true };
  let leading = true;
  for (const char of name) {
    // for...of yields whole code points
    const codePoint = char.codePointAt(0) ?? 0;
    const valid = leading ? isNameStartChar(codePoint) : isNameChar(codePoint);
    if (!valid) return { char, leading };
    leading = false;
  }
  return undefined;
}

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal shared utilities for the XML module.
 *
 * @module
 */

/** The namespace bound to the `xml` prefix by definition. */
export const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace";

/** The namespace of `xmlns` and `xmlns:*` attributes. */
export const XMLNS_NAMESPACE = "http://www.w3.org/2000/xmlns/";

/** The XHTML namespace, whose void elements are written as `<br />`. */
export const HTML_NAMESPACE = "http://www.w3.org/1999/xhtml";

/**
 * HTML elements that never have content.
 *
 * @see {@link https://html.spec.whatwg.org/multipage/syntax.html#void-elements | HTML void elements}
 */
const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area",
  "base",
  "basefont",
  "bgsound",
  "br",
  "col",
  "embed",
  "frame",
  "hr",
  "img",
  "input",
  "keygen",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr",
]);

/**
 * Checks whether an element is one of the HTML void elements.
 *
 * @example Usage
 * ```ts
 * import { isVoidElement, HTML_NAMESPACE } from "./_common.ts";
 *
 * isVoidElement(HTML_NAMESPACE, "br"); // true
 * isVoidElement(null, "br");           // false
 * ```
 *
 * @param namespace The element's namespace.
 * @param local The element's local name.
 * @returns `true` for a void element in the HTML namespace.
 */
export function isVoidElement(namespace: string | null, local: string): boolean {
  return namespace === HTML_NAMESPACE && VOID_ELEMENTS.has(local);
}

/**
 * Normalizes the optional namespace of a name: `undefined`, `null` and the
 * empty string all become `null`.
 */
export function toNamespace(namespace: string | null | undefined): string | null {
  return namespace === undefined || namespace === "" ? null : namespace;
}

/**
 * Normalizes the optional prefix of a name: `undefined`, `null` and the
 * empty string all mean "no prefix".
 */
export function toPrefix(prefix: string | null | undefined): string | null {
  return prefix === undefined || prefix === "" ? null : prefix;
}

/**
 * Joins a prefix and a local name.
 *
 * @example Usage
 * ```ts
 * import { formatName } from "./_common.ts";
 *
 * formatName("ns", "element"); // "ns:element"
 * formatName(null, "element"); // "element"
 * ```
 */
export function formatName(prefix: string | null, local: string): string {
  return prefix === null ? local : `${prefix}:${local}`;
}

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal module for escaping character data and validating the content
 * of comments, processing instructions, CDATA sections and declarations.
 *
 * @module
 */

import { XmlSerializationError, type XmlDeclaration } from "./types.ts";

/**
 * Mapping for text content.
 */
const TEXT_CHAR_MAP = {
  "<": "&lt;",
  ">": "&gt;",
  "&": "&amp;",
} as const;

/**
 * Extended mapping for attribute value encoding (includes whitespace, which
 * a parser would otherwise normalize to spaces per XML 1.0 §3.3.3).
 */
const ATTR_CHAR_MAP: Record<string, string> = {
  "<": "&lt;",
  ">": "&gt;",
  "&": "&amp;",
  '"': "&quot;",
  "\t": "&#9;",
  "\n": "&#10;",
  "\r": "&#13;",
};

// Hoisted regex patterns for performance
const TEXT_ENCODE_RE = /[<>&]/g;
const ATTR_ENCODE_RE = /[<>&"\t\n\r]/g;
const VERSION_NUM_RE = /^1\.[0-9]+$/;

/**
 * Matches the first code point outside the XML 1.0 `Char` production.
 * With the `u` flag a lone surrogate is a code point of its own and falls
 * outside every range below.
 */
const INVALID_CHAR_RE =
  /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u;

function formatCodePoint(char: string): string {
  const hex = (char.codePointAt(0) ?? 0).toString(16).toUpperCase();
  return `U+${hex.padStart(4, "0")}`;
}

/**
 * Throws if `text` contains a character that is not an XML 1.0 `Char`.
 *
 * @param text The text to check.
 * @param context What the text is, for the error message.
 * @throws {XmlSerializationError} With kind `invalid_character`.
 */
export function assertXmlChars(text: string, context: string): void {
  const match = INVALID_CHAR_RE.exec(text);
  if (match) {
    throw new XmlSerializationError(
      "invalid_character",
      `Invalid character ${formatCodePoint(match[0])} in ${context}`,
    );
  }
}

/**
 * Escapes character data for use between tags.
 *
 * @param text The text to escape.
 * @param requireWellFormed Whether to reject characters outside `Char`.
 * @returns The text with `&`, `<` and `>` replaced by entity references.
 */
export function escapeText(text: string, requireWellFormed: boolean): string {
  if (requireWellFormed) assertXmlChars(text, "text");
  // Fast path: no special characters means nothing to encode
  if (!/[<>&]/.test(text)) return text;
  return text.replace(
    TEXT_ENCODE_RE,
    (char) => TEXT_CHAR_MAP[char as keyof typeof TEXT_CHAR_MAP],
  );
}

/**
 * Escapes a value for use inside a double-quoted attribute.
 *
 * @param value The attribute value to encode.
 * @param requireWellFormed Whether to reject characters outside `Char`.
 * @returns The encoded attribute value.
 */
export function escapeAttributeValue(
  value: string,
  requireWellFormed: boolean,
): string {
  if (requireWellFormed) assertXmlChars(value, "attribute value");
  if (!/[<>&"\t\n\r]/.test(value)) return value;
  return value.replace(ATTR_ENCODE_RE, (c) => ATTR_CHAR_MAP[c] ?? c);
}

/**
 * Serializes CDATA content, escaping any `]]>` sequences.
 *
 * Per XML 1.0 §2.7, CDATA sections cannot contain `]]>`.
 * The standard approach is to split at each occurrence:
 * `a]]>b` becomes `<![CDATA[a]]]]><![CDATA[>b]]>`
 */
export function escapeCData(text: string, requireWellFormed: boolean): string {
  if (requireWellFormed) assertXmlChars(text, "CDATA section");
  // Fast path: no ]]> means no escaping needed
  if (!text.includes("]]>")) {
    return `<![CDATA[${text}]]>`;
  }

  // Replace each ]]> with ]]]]><![CDATA[>
  // This ends the current CDATA at ]] and starts a new one with >
  const escaped = text.replaceAll("]]>", "]]]]><![CDATA[>");
  return `<![CDATA[${escaped}]]>`;
}

/**
 * Validates comment text.
 *
 * Per XML 1.0 §2.5, comments cannot contain `--` and cannot end with `-`.
 * Every character must also be an XML `Char`.
 *
 * @throws {XmlSerializationError} If the comment text contains invalid sequences.
 */
export function validateComment(text: string, requireWellFormed: boolean): void {
  if (!requireWellFormed) return;
  if (text.includes("--")) {
    throw new XmlSerializationError(
      "invalid_comment",
      `Invalid comment: contains "--" which is forbidden in XML comments`,
    );
  }
  if (text.endsWith("-")) {
    throw new XmlSerializationError(
      "invalid_comment",
      `Invalid comment: ends with "-" which would produce invalid "--->"`,
    );
  }
  assertXmlChars(text, "comment");
}

/**
 * Validates a processing instruction per XML 1.0 §2.6.
 *
 * @throws {XmlSerializationError} If the target is reserved or contains a
 * colon, or the data contains `?>` or a character outside `Char`.
 */
export function validateProcessingInstruction(
  target: string,
  data: string,
  requireWellFormed: boolean,
): void {
  if (!requireWellFormed) return;
  if (target.toLowerCase() === "xml") {
    throw new XmlSerializationError(
      "invalid_processing_instruction",
      `Invalid processing instruction: target "${target}" is reserved`,
    );
  }
  if (target.includes(":")) {
    throw new XmlSerializationError(
      "invalid_processing_instruction",
      `Invalid processing instruction: target "${target}" contains ":"`,
    );
  }
  if (data.includes("?>")) {
    throw new XmlSerializationError(
      "invalid_processing_instruction",
      `Invalid processing instruction: data contains "?>"`,
    );
  }
  assertXmlChars(target, "processing instruction target");
  assertXmlChars(data, "processing instruction data");
}

/**
 * Serializes an XML declaration to a string.
 *
 * @throws {XmlSerializationError} If `requireWellFormed` is set and the
 * version is not of the form `1.x`.
 */
export function formatDeclaration(
  decl: XmlDeclaration,
  requireWellFormed: boolean,
): string {
  if (requireWellFormed && !VERSION_NUM_RE.test(decl.version)) {
    throw new XmlSerializationError(
      "invalid_declaration",
      `Invalid XML declaration: version "${decl.version}" is not 1.x`,
    );
  }
  let result = `<?xml version="${decl.version}"`;
  if (decl.encoding !== undefined) {
    result += ` encoding="${decl.encoding}"`;
  }
  if (decl.standalone !== undefined) {
    result += ` standalone="${decl.standalone}"`;
  }
  result += "?>";
  return result;
}

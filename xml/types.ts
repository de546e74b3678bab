// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

import type { NamespacePrefixMap } from "./namespace_prefix_map.ts";

/**
 * The categories of input rejected by the serializer.
 *
 * - `invalid_name`: a local name is empty or has a character outside the
 *   XML `Name` production.
 * - `colon_in_local_name`: a local name contains `:`.
 * - `duplicate_attribute`: two attributes of one element share a namespace
 *   and local name.
 * - `invalid_character`: text, an attribute value, a comment, a CDATA section
 *   or a processing instruction contains a character outside `Char`.
 * - `invalid_comment`: comment text contains `--` or ends with `-`.
 * - `invalid_processing_instruction`: the target is `xml` or contains `:`,
 *   or the data contains `?>`.
 * - `invalid_declaration`: the XML declaration has a malformed version.
 * - `reserved_prefix`: an element uses the `xmlns` prefix.
 * - `reserved_attribute_name`: an attribute in no namespace is named `xmlns`.
 * - `invalid_namespace_declaration`: a prefix declaration binds the XMLNS
 *   namespace or undeclares a prefix with an empty value.
 */
export type XmlSerializationErrorKind =
  | "invalid_name"
  | "colon_in_local_name"
  | "duplicate_attribute"
  | "invalid_character"
  | "invalid_comment"
  | "invalid_processing_instruction"
  | "invalid_declaration"
  | "reserved_prefix"
  | "reserved_attribute_name"
  | "invalid_namespace_declaration";

/**
 * Error thrown when the serializer is asked to write markup that would not
 * be well-formed XML.
 *
 * @example Usage
 * ```ts
 * import { XmlSerializationError } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const error = new XmlSerializationError("invalid_comment", "Bad comment");
 * assert.ok(error instanceof TypeError);
 * assert.equal(error.kind, "invalid_comment");
 * ```
 */
export class XmlSerializationError extends TypeError {
  /** What kind of input was rejected. */
  readonly kind: XmlSerializationErrorKind;

  /**
   * Constructs a new XmlSerializationError.
   *
   * @param kind The category of the failure.
   * @param message The error message describing what went wrong.
   */
  constructor(kind: XmlSerializationErrorKind, message: string) {
    super(message);
    this.name = "XmlSerializationError";
    this.kind = kind;
  }
}

/**
 * A namespace-qualified XML name.
 *
 * Two names are the same name when their `namespace` and `local` parts are
 * equal; `prefix` is only the prefix the caller would like to see written.
 *
 * @example Usage
 * ```ts
 * import type { XmlQualifiedName } from "xml-ns-serializer";
 *
 * const name: XmlQualifiedName = {
 *   prefix: "svg",
 *   local: "rect",
 *   namespace: "http://www.w3.org/2000/svg",
 * };
 * ```
 */
export interface XmlQualifiedName {
  /** The local part of the name. */
  readonly local: string;
  /** The preferred namespace prefix, if any. */
  readonly prefix?: string | null;
  /** The namespace URI. Absent, `null` and `""` all mean no namespace. */
  readonly namespace?: string | null;
}

/**
 * An XML attribute with its qualified name and value.
 *
 * Namespace declarations are attributes too: `xmlns="..."` has the local
 * name `xmlns` and `xmlns:p="..."` has the prefix `xmlns` and the local name
 * `p`, both in the {@linkcode XMLNS_NAMESPACE}.
 */
export interface XmlAttribute {
  /** The qualified name of the attribute. */
  readonly name: XmlQualifiedName;
  /** The unescaped attribute value. */
  readonly value: string;
}

/**
 * The XML declaration written at the start of a document.
 */
export interface XmlDeclaration {
  /** The XML version, usually "1.0". */
  readonly version: string;
  /** The declared character encoding, if any. */
  readonly encoding?: string;
  /** Whether the document is standalone (§2.9). */
  readonly standalone?: "yes" | "no";
}

/**
 * An append-only destination for serialized markup.
 *
 * The serializer only ever appends; it never reads back what it wrote.
 * Anything thrown by `write` propagates out of the serializer call.
 */
export interface XmlSink {
  /** Appends a chunk of markup. */
  write(chunk: string): void;
}

/**
 * Which part of a node the tree walker writes.
 *
 * - `include_node`: the node itself, its tags included.
 * - `children_only`: only the node's children.
 */
export type TraversalScope = "include_node" | "children_only";

/**
 * Options for {@linkcode XmlSerializer} and {@linkcode serialize}.
 *
 * @example Usage
 * ```ts
 * import type { SerializeOptions } from "xml-ns-serializer";
 *
 * const options: SerializeOptions = {
 *   requireWellFormed: false,
 *   contextNamespace: "http://www.w3.org/1999/xhtml",
 * };
 * ```
 */
export interface SerializeOptions {
  /**
   * Whether the walker writes the node it was given or only its children.
   * Has no effect on a document, which has no tags of its own.
   *
   * @default {"children_only"}
   */
  readonly traversalScope?: TraversalScope;

  /**
   * If true, names, characters, comments and processing instructions are
   * checked and the first violation throws an
   * {@linkcode XmlSerializationError}.
   *
   * @default {true}
   */
  readonly requireWellFormed?: boolean;

  /**
   * The namespace the outermost element inherits. An element in this
   * namespace is written without a prefix or declaration.
   *
   * @default {null}
   */
  readonly contextNamespace?: string | null;

  /**
   * The prefix bindings in scope before the first element. The serializer
   * copies the map; the caller's instance is never modified.
   *
   * @default {NamespacePrefixMap.withDefaults()}
   */
  readonly prefixMap?: NamespacePrefixMap;

  /**
   * The number used for the first generated prefix (`ns1`, `ns2`, ...).
   *
   * @default {1}
   */
  readonly prefixIndex?: number;

  /**
   * Receives diagnostics about call sequences the serializer tolerates, such
   * as a close call with no element open.
   *
   * @default {console.warn}
   */
  readonly warn?: (message: string) => void;
}

/**
 * The push-style event interface a tree walker drives.
 *
 * Calls must arrive in document order: every `startElement` is matched by
 * exactly one `endElement`, with the element's content in between.
 */
export interface Serializer {
  /**
   * Opens an element.
   *
   * @param name The element's qualified name.
   * @param attributes The element's attributes, in the order to write them.
   * @param isChildless Whether no content follows before the matching close.
   */
  startElement(
    name: XmlQualifiedName,
    attributes: Iterable<XmlAttribute>,
    isChildless: boolean,
  ): void;
  /** Closes the most recently opened element. */
  endElement(name: XmlQualifiedName): void;
  /** Writes character data. */
  writeText(text: string): void;
  /** Writes a CDATA section. */
  writeCData(text: string): void;
  /** Writes a comment. */
  writeComment(text: string): void;
  /** Writes a processing instruction. */
  writeProcessingInstruction(target: string, data: string): void;
  /** Writes a document type declaration verbatim. */
  writeDoctype(text: string): void;
  /** Writes the XML declaration. */
  writeXmlDeclaration(declaration: XmlDeclaration): void;
}

/**
 * A caller-owned tree that knows how to walk itself into a
 * {@linkcode Serializer}.
 */
export interface Serializable {
  /**
   * Emits this node's events.
   *
   * @param serializer The event interface to drive.
   * @param scope Whether to emit this node's own tags.
   */
  serialize(serializer: Serializer, scope: TraversalScope): void;
}

// ============================================================================
// Node Types (for the tree walker)
// ============================================================================

/**
 * A text node.
 */
export interface XmlTextNode {
  /** The node type discriminant. */
  readonly type: "text";
  /** The unescaped text content. */
  readonly text: string;
}

/**
 * A CDATA section node.
 */
export interface XmlCDataNode {
  /** The node type discriminant. */
  readonly type: "cdata";
  /** The raw CDATA content. */
  readonly text: string;
}

/**
 * A comment node.
 */
export interface XmlCommentNode {
  /** The node type discriminant. */
  readonly type: "comment";
  /** The comment text. */
  readonly text: string;
}

/**
 * A processing instruction node.
 */
export interface XmlProcessingInstructionNode {
  /** The node type discriminant. */
  readonly type: "processing_instruction";
  /** The PI target (e.g., "xml-stylesheet"). */
  readonly target: string;
  /** The PI content after the target. */
  readonly content: string;
}

/**
 * A document type declaration, kept as the text between `<!DOCTYPE ` and `>`.
 */
export interface XmlDoctypeNode {
  /** The node type discriminant. */
  readonly type: "doctype";
  /** The declaration body, e.g. `html` or `note SYSTEM "note.dtd"`. */
  readonly text: string;
}

/**
 * An element node.
 */
export interface XmlElement {
  /** The node type discriminant. */
  readonly type: "element";
  /** The qualified name of the element. */
  readonly name: XmlQualifiedName;
  /** The attributes, in document order. */
  readonly attributes: ReadonlyArray<XmlAttribute>;
  /** The child nodes of this element. */
  readonly children: ReadonlyArray<XmlNode>;
}

/**
 * Discriminated union of all node types that can appear in a tree.
 */
export type XmlNode =
  | XmlElement
  | XmlTextNode
  | XmlCDataNode
  | XmlCommentNode
  | XmlProcessingInstructionNode
  | XmlDoctypeNode;

/**
 * A document: an optional XML declaration followed by its top-level nodes.
 */
export interface XmlDocument {
  /** The node type discriminant. */
  readonly type: "document";
  /** The XML declaration, if one should be written. */
  readonly declaration?: XmlDeclaration;
  /** The doctype, comments, processing instructions and root element. */
  readonly children: ReadonlyArray<XmlNode>;
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Type guard to check if a node is an element.
 *
 * @example Usage
 * ```ts
 * import { isElement } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const node = { type: "text" as const, text: "Hello" };
 * assert.equal(isElement(node), false);
 * ```
 *
 * @param node The node to check.
 * @returns `true` if the node is an element, `false` otherwise.
 */
export function isElement(node: XmlNode): node is XmlElement {
  return node.type === "element";
}

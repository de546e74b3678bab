// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Tree walker driving an {@linkcode XmlSerializer} over an in-memory tree.
 *
 * @module
 */

import { XmlSerializer } from "./serializer.ts";
import { StringSink } from "./sinks.ts";
import {
  isElement,
  type Serializable,
  type SerializeOptions,
  type Serializer,
  type TraversalScope,
  type XmlDocument,
  type XmlNode,
  type XmlSink,
} from "./types.ts";

/**
 * Serializes a tree into a sink.
 *
 * Elements are walked depth-first, start tag before content. With the
 * default `traversalScope` of `"children_only"` the tags of the node passed
 * in are left out; a document has no tags, so its declaration and children
 * are always written.
 *
 * @example Usage
 * ```ts
 * import { serialize, StringSink } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const sink = new StringSink();
 * serialize(sink, {
 *   type: "document",
 *   children: [{
 *     type: "element",
 *     name: { local: "greeting" },
 *     attributes: [],
 *     children: [{ type: "text", text: "Hello!" }],
 *   }],
 * });
 *
 * assert.equal(sink.toString(), "<greeting>Hello!</greeting>");
 * ```
 *
 * @param sink Where the markup goes.
 * @param node The document, node or caller-owned tree to serialize.
 * @param options Options to control serialization behavior.
 * @throws {XmlSerializationError} If well-formedness is required and the
 * tree cannot be written as well-formed XML.
 */
export function serialize(
  sink: XmlSink,
  node: XmlDocument | XmlNode | Serializable,
  options?: SerializeOptions,
): void {
  const scope = options?.traversalScope ?? "children_only";
  const serializer = new XmlSerializer(sink, options);

  if ("serialize" in node) {
    node.serialize(serializer, scope);
  } else if (node.type === "document") {
    if (node.declaration !== undefined) {
      serializer.writeXmlDeclaration(node.declaration);
    }
    serializeChildren(serializer, node.children);
  } else if (isElement(node) && scope === "children_only") {
    serializeChildren(serializer, node.children);
  } else {
    serializeNode(serializer, node);
  }
}

/**
 * Converts an XML document or node to an XML string.
 *
 * Unlike {@linkcode serialize}, the `traversalScope` defaults to
 * `"include_node"`, so an element comes out with its own tags.
 *
 * @example Basic usage
 * ```ts
 * import { stringify } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const element = {
 *   type: "element" as const,
 *   name: { local: "greeting" },
 *   attributes: [],
 *   children: [{ type: "text" as const, text: "Hello!" }],
 * };
 *
 * assert.equal(stringify(element), "<greeting>Hello!</greeting>");
 * ```
 *
 * @example With namespaces
 * ```ts
 * import { stringify } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const element = {
 *   type: "element" as const,
 *   name: { prefix: "p", local: "root", namespace: "urn:x" },
 *   attributes: [{ name: { local: "id", namespace: "urn:y" }, value: "1" }],
 *   children: [],
 * };
 *
 * assert.equal(
 *   stringify(element),
 *   '<p:root xmlns:p="urn:x" xmlns:ns1="urn:y" ns1:id="1"/>',
 * );
 * ```
 *
 * @param node The XML document or node to serialize.
 * @param options Options to control serialization behavior.
 * @returns The serialized XML string.
 */
export function stringify(
  node: XmlDocument | XmlNode | Serializable,
  options?: SerializeOptions,
): string {
  const sink = new StringSink();
  serialize(sink, node, {
    ...options,
    traversalScope: options?.traversalScope ?? "include_node",
  });
  return sink.toString();
}

function serializeChildren(
  serializer: Serializer,
  children: ReadonlyArray<XmlNode>,
): void {
  for (const child of children) {
    serializeNode(serializer, child);
  }
}

/**
 * Emits the events for one node and everything below it.
 */
function serializeNode(serializer: Serializer, node: XmlNode): void {
  switch (node.type) {
    case "element":
      serializer.startElement(
        node.name,
        node.attributes,
        node.children.length === 0,
      );
      serializeChildren(serializer, node.children);
      serializer.endElement(node.name);
      return;
    case "text":
      serializer.writeText(node.text);
      return;
    case "cdata":
      serializer.writeCData(node.text);
      return;
    case "comment":
      serializer.writeComment(node.text);
      return;
    case "processing_instruction":
      serializer.writeProcessingInstruction(node.target, node.content);
      return;
    case "doctype":
      serializer.writeDoctype(node.text);
      return;
  }
}

/**
 * Adapts a walk function into a {@linkcode Serializable}, for trees that are
 * not built from {@linkcode XmlNode}s.
 *
 * @example Usage
 * ```ts
 * import { fromWalker, stringify } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const tree = fromWalker((serializer) => {
 *   serializer.startElement({ local: "empty" }, [], true);
 *   serializer.endElement({ local: "empty" });
 * });
 *
 * assert.equal(stringify(tree), "<empty/>");
 * ```
 */
export function fromWalker(
  walk: (serializer: Serializer, scope: TraversalScope) => void,
): Serializable {
  return { serialize: walk };
}

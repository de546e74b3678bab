// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Namespace-aware XML serialization.
 *
 * This module writes XML 1.0 from a stream of element, attribute and content
 * events, choosing namespace prefixes and declarations the way the
 * {@link https://w3c.github.io/DOM-Parsing/#xml-serialization | W3C DOM Parsing}
 * XML serialization algorithm does.
 *
 * ## Well-formedness
 *
 * With `requireWellFormed` (the default) every name and every piece of
 * character data is checked, and the first problem throws an
 * {@linkcode XmlSerializationError}. Markup already written stays in the
 * sink. With the check off, only `&`, `<`, `>` and `"` are still escaped.
 *
 * ```ts
 * import { stringify, XmlSerializer, StringSink } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * // Tree-style
 * const xml = stringify({
 *   type: "element",
 *   name: { local: "root", namespace: "urn:example" },
 *   attributes: [],
 *   children: [{ type: "text", text: "a < b" }],
 * });
 * assert.equal(xml, '<root xmlns="urn:example">a &lt; b</root>');
 *
 * // Event-style
 * const sink = new StringSink();
 * const serializer = new XmlSerializer(sink);
 * serializer.startElement({ local: "item" }, [], true);
 * serializer.endElement({ local: "item" });
 * assert.equal(sink.toString(), "<item/>");
 * ```
 *
 * @module
 */

export * from "./types.ts";
export { HTML_NAMESPACE, XML_NAMESPACE, XMLNS_NAMESPACE } from "./_common.ts";
export * from "./namespace_prefix_map.ts";
export * from "./serializer.ts";
export * from "./sinks.ts";
export * from "./stringify.ts";

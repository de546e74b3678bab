// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * The event-driven XML serializer.
 *
 * Prefix resolution follows the XML serialization algorithm of the
 * {@link https://w3c.github.io/DOM-Parsing/#xml-serialization | W3C DOM Parsing}
 * specification, so that any conforming parser reads back the same
 * namespaces the caller supplied.
 *
 * @module
 */

import {
  formatName,
  isVoidElement,
  toNamespace,
  toPrefix,
  XML_NAMESPACE,
  XMLNS_NAMESPACE,
} from "./_common.ts";
import { findInvalidNameChar } from "./_chars.ts";
import { ElementStack } from "./_element_stack.ts";
import {
  escapeAttributeValue,
  escapeCData,
  escapeText,
  formatDeclaration,
  validateComment,
  validateProcessingInstruction,
} from "./_entities.ts";
import { NamespacePrefixMap } from "./namespace_prefix_map.ts";
import {
  type SerializeOptions,
  type Serializer,
  type XmlAttribute,
  XmlSerializationError,
  type XmlDeclaration,
  type XmlQualifiedName,
  type XmlSink,
} from "./types.ts";

/** Prefixes bound by the attributes of the element being opened. */
type LocalPrefixMap = Map<string, string>;

/**
 * Writes XML markup to a sink, one event at a time.
 *
 * One instance is one serialization run: it owns the prefix bindings and
 * the counter for generated prefixes, and must not be shared between runs.
 *
 * @example Usage
 * ```ts
 * import { StringSink, XmlSerializer } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const sink = new StringSink();
 * const serializer = new XmlSerializer(sink);
 * serializer.startElement({ local: "a" }, [], false);
 * serializer.writeText("hi");
 * serializer.endElement({ local: "a" });
 *
 * assert.equal(sink.toString(), "<a>hi</a>");
 * ```
 */
export class XmlSerializer implements Serializer {
  #sink: XmlSink;
  #requireWellFormed: boolean;
  #rootMap: NamespacePrefixMap;
  #rootNamespace: string | null;
  #prefixIndex: number;
  #warn: (message: string) => void;
  #stack = new ElementStack();

  /**
   * Constructs a new XmlSerializer.
   *
   * @param sink Where the markup goes.
   * @param options Options to control serialization behavior.
   */
  constructor(sink: XmlSink, options?: SerializeOptions) {
    const {
      requireWellFormed = true,
      contextNamespace = null,
      prefixMap,
      prefixIndex = 1,
      warn = console.warn,
    } = options ?? {};
    this.#sink = sink;
    this.#requireWellFormed = requireWellFormed;
    this.#rootMap = prefixMap?.clone() ?? NamespacePrefixMap.withDefaults();
    this.#rootNamespace = toNamespace(contextNamespace);
    this.#prefixIndex = prefixIndex;
    this.#warn = warn;
  }

  /** The number of elements opened and not yet closed. */
  get depth(): number {
    return this.#stack.depth;
  }

  /** The number the next generated prefix will carry. */
  get prefixIndex(): number {
    return this.#prefixIndex;
  }

  /**
   * Writes a start tag, with whatever namespace declarations are needed for
   * the element and its attributes to resolve to their namespaces.
   *
   * @see {@link https://w3c.github.io/DOM-Parsing/#xml-serializing-an-element-node | XML serializing an Element node}
   *
   * @throws {XmlSerializationError} If well-formedness is required and the
   * element or one of its attributes cannot be written as well-formed XML.
   */
  startElement(
    name: XmlQualifiedName,
    attributes: Iterable<XmlAttribute>,
    isChildless: boolean,
  ): void {
    const { local } = name;
    const ns = toNamespace(name.namespace);
    const prefix = toPrefix(name.prefix);

    if (this.#requireWellFormed) validateLocalName(local, "Element");

    const attrs = [...attributes];
    const parent = this.#stack.peek();
    const map = (parent?.map ?? this.#rootMap).clone();
    const localPrefixes: LocalPrefixMap = new Map();
    const localDefaultNamespace = recordNamespaceInformation(
      attrs,
      map,
      localPrefixes,
    );
    let inheritedNamespace = parent === undefined
      ? this.#rootNamespace
      : parent.inheritedNamespace;
    let ignoreNamespaceDefinition = false;
    let qualifiedName: string;
    let declaration = "";

    if (inheritedNamespace === ns) {
      if (localDefaultNamespace !== null) ignoreNamespaceDefinition = true;
      qualifiedName = ns === XML_NAMESPACE ? `xml:${local}` : local;
    } else {
      let candidatePrefix = map.retrievePreferredPrefix(ns, prefix);
      if (prefix === "xmlns") {
        if (this.#requireWellFormed) {
          throw new XmlSerializationError(
            "reserved_prefix",
            `Element "${local}" has the prefix "xmlns", which cannot be read back by a conforming parser`,
          );
        }
        candidatePrefix = prefix;
      }

      if (candidatePrefix !== undefined) {
        qualifiedName = `${candidatePrefix}:${local}`;
        if (
          localDefaultNamespace !== null &&
          localDefaultNamespace !== XML_NAMESPACE
        ) {
          inheritedNamespace = toNamespace(localDefaultNamespace);
        }
      } else if (prefix !== null) {
        let chosen = prefix;
        if (localPrefixes.has(prefix)) {
          // The element's own attributes bind this prefix elsewhere
          chosen = this.#generatePrefix(map, ns);
        } else {
          map.add(ns, prefix);
        }
        qualifiedName = `${chosen}:${local}`;
        declaration = ` xmlns:${chosen}="${this.#escapeAttribute(ns ?? "")}"`;
        if (localDefaultNamespace !== null) {
          inheritedNamespace = toNamespace(localDefaultNamespace);
        }
      } else if (
        localDefaultNamespace === null ||
        localDefaultNamespace !== ns
      ) {
        ignoreNamespaceDefinition = true;
        qualifiedName = local;
        inheritedNamespace = ns;
        declaration = ` xmlns="${this.#escapeAttribute(ns ?? "")}"`;
      } else {
        qualifiedName = local;
        inheritedNamespace = ns;
      }
    }

    this.#sink.write(`<${qualifiedName}${declaration}`);
    this.#serializeAttributes(
      attrs,
      map,
      localPrefixes,
      ignoreNamespaceDefinition,
    );

    let skipEndTag = false;
    if (isChildless && isVoidElement(ns, local)) {
      this.#sink.write(" /");
      skipEndTag = true;
    } else if (isChildless) {
      this.#sink.write("/");
      skipEndTag = true;
    }

    this.#stack.push({
      skipEndTag,
      qualifiedName,
      map,
      inheritedNamespace,
    });
    this.#sink.write(">");
  }

  /**
   * Writes the end tag of the innermost open element, using the qualified
   * name its start tag was written with. Writes nothing for an element that
   * was written as an empty-element tag.
   */
  endElement(name: XmlQualifiedName): void {
    const frame = this.#stack.pop();
    if (frame === undefined) {
      this.#warn(`endElement() called for "${name.local}" with no open element`);
      return;
    }
    if (frame.skipEndTag) return;
    this.#sink.write(`</${frame.qualifiedName}>`);
  }

  /**
   * Writes character data, escaping `&`, `<` and `>`.
   *
   * @throws {XmlSerializationError} If well-formedness is required and the
   * text contains a character outside the XML `Char` production.
   */
  writeText(text: string): void {
    this.#sink.write(escapeText(text, this.#requireWellFormed));
  }

  /** Writes a CDATA section, splitting it wherever the text contains `]]>`. */
  writeCData(text: string): void {
    this.#sink.write(escapeCData(text, this.#requireWellFormed));
  }

  /**
   * Writes a comment.
   *
   * @throws {XmlSerializationError} If well-formedness is required and the
   * text contains `--`, ends with `-`, or has a character outside `Char`.
   */
  writeComment(text: string): void {
    validateComment(text, this.#requireWellFormed);
    this.#sink.write(`<!--${escapeText(text, false)}-->`);
  }

  /**
   * Writes a processing instruction. Neither part is escaped.
   *
   * @throws {XmlSerializationError} If well-formedness is required and the
   * target is `xml` in any case or contains `:`, or the data contains `?>`.
   */
  writeProcessingInstruction(target: string, data: string): void {
    validateProcessingInstruction(target, data, this.#requireWellFormed);
    this.#sink.write(`<?${target} ${data}?>`);
  }

  /** Writes `<!DOCTYPE text>` without looking at `text`. */
  writeDoctype(text: string): void {
    this.#sink.write(`<!DOCTYPE ${text}>`);
  }

  writeXmlDeclaration(declaration: XmlDeclaration): void {
    this.#sink.write(formatDeclaration(declaration, this.#requireWellFormed));
  }

  /**
   * Writes the attributes of the element being opened, declaring a
   * generated prefix for every namespace that has none in scope.
   *
   * @see {@link https://w3c.github.io/DOM-Parsing/#serializing-an-element-s-attributes | serializing an Element's attributes}
   */
  #serializeAttributes(
    attrs: readonly XmlAttribute[],
    map: NamespacePrefixMap,
    localPrefixes: LocalPrefixMap,
    ignoreNamespaceDefinition: boolean,
  ): void {
    const seen = new Map<string | null, Set<string>>();

    for (const attr of attrs) {
      const { local } = attr.name;
      const attrNamespace = toNamespace(attr.name.namespace);
      const attrPrefix = toPrefix(attr.name.prefix);

      let locals = seen.get(attrNamespace);
      if (locals === undefined) {
        locals = new Set();
        seen.set(attrNamespace, locals);
      }
      if (this.#requireWellFormed && locals.has(local)) {
        throw new XmlSerializationError(
          "duplicate_attribute",
          `Duplicate attribute "${formatName(attrPrefix, local)}"`,
        );
      }
      locals.add(local);

      let candidatePrefix: string | null = null;
      if (attrNamespace !== null) {
        candidatePrefix = map.retrievePreferredPrefix(attrNamespace, attrPrefix) ??
          null;

        if (attrNamespace === XMLNS_NAMESPACE) {
          if (
            attr.value === XML_NAMESPACE ||
            (attrPrefix === null && ignoreNamespaceDefinition) ||
            (attrPrefix !== null &&
              localPrefixes.get(local) !== attr.value &&
              map.findPrefix(toNamespace(attr.value), local))
          ) {
            continue;
          }
          if (this.#requireWellFormed && attr.value === XMLNS_NAMESPACE) {
            throw new XmlSerializationError(
              "invalid_namespace_declaration",
              `Namespace declaration "${formatName(attrPrefix, local)}" cannot bind the XMLNS namespace`,
            );
          }
          if (this.#requireWellFormed && attr.value === "") {
            throw new XmlSerializationError(
              "invalid_namespace_declaration",
              `Namespace declaration "${formatName(attrPrefix, local)}" cannot undeclare a namespace`,
            );
          }
          candidatePrefix = attrPrefix === null ? null : "xmlns";
        } else if (candidatePrefix === null) {
          candidatePrefix = this.#generatePrefix(map, attrNamespace);
          this.#sink.write(
            ` xmlns:${candidatePrefix}="${this.#escapeAttribute(attrNamespace)}"`,
          );
        }
      }

      if (this.#requireWellFormed) {
        validateLocalName(local, "Attribute");
        if (local === "xmlns" && attrNamespace === null) {
          throw new XmlSerializationError(
            "reserved_attribute_name",
            `Attribute "xmlns" must be in the XMLNS namespace`,
          );
        }
      }

      const value = this.#escapeAttribute(attr.value);
      this.#sink.write(` ${formatName(candidatePrefix, local)}="${value}"`);
    }
  }

  /**
   * Creates the next `nsN` prefix and binds it to `namespace` in `map`.
   *
   * @see {@link https://w3c.github.io/DOM-Parsing/#dfn-generating-a-prefix | generating a prefix}
   */
  #generatePrefix(map: NamespacePrefixMap, namespace: string | null): string {
    const prefix = `ns${this.#prefixIndex}`;
    this.#prefixIndex++;
    map.add(namespace, prefix);
    return prefix;
  }

  #escapeAttribute(value: string): string {
    return escapeAttributeValue(value, this.#requireWellFormed);
  }
}

/**
 * Collects the namespace declarations among an element's attributes.
 * Prefix declarations that are new in scope are added to `map` and to
 * `localPrefixes`.
 *
 * @see {@link https://w3c.github.io/DOM-Parsing/#recording-the-namespace-information | recording the namespace information}
 *
 * @returns The value of the element's `xmlns` attribute, or `null`.
 */
function recordNamespaceInformation(
  attrs: readonly XmlAttribute[],
  map: NamespacePrefixMap,
  localPrefixes: LocalPrefixMap,
): string | null {
  let defaultNamespace: string | null = null;

  for (const attr of attrs) {
    if (toNamespace(attr.name.namespace) !== XMLNS_NAMESPACE) continue;

    if (toPrefix(attr.name.prefix) === null) {
      defaultNamespace = attr.value;
      continue;
    }

    const prefixDefinition = attr.name.local;
    if (attr.value === XML_NAMESPACE) continue;
    const namespaceDefinition = toNamespace(attr.value);
    if (map.findPrefix(namespaceDefinition, prefixDefinition)) continue;

    map.add(namespaceDefinition, prefixDefinition);
    localPrefixes.set(prefixDefinition, attr.value);
  }

  return defaultNamespace;
}

/**
 * @throws {XmlSerializationError} If `local` contains a colon or does not
 * match the XML `Name` production.
 */
function validateLocalName(local: string, what: "Element" | "Attribute"): void {
  if (local.includes(":")) {
    throw new XmlSerializationError(
      "colon_in_local_name",
      `${what} local name "${local}" cannot contain ":"`,
    );
  }
  const invalid = findInvalidNameChar(local);
  if (invalid === undefined) return;
  if (invalid.char === "") {
    throw new XmlSerializationError(
      "invalid_name",
      `${what} local name cannot be empty`,
    );
  }
  throw new XmlSerializationError(
    "invalid_name",
    invalid.leading
      ? `${what} local name "${local}" cannot start with "${invalid.char}"`
      : `${what} local name "${local}" cannot contain "${invalid.char}"`,
  );
}

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * The namespace prefix map used while serializing.
 *
 * @see {@link https://w3c.github.io/DOM-Parsing/#the-namespace-prefix-map | DOM Parsing: the namespace prefix map}
 *
 * @module
 */

import { XML_NAMESPACE } from "./_common.ts";

/**
 * Records which prefixes have been used for which namespaces.
 *
 * Keys are namespace URIs, with `null` standing for "no namespace". Each key
 * owns the list of prefixes recorded for it, oldest first; a key is only
 * present once it has at least one prefix.
 *
 * @example Usage
 * ```ts
 * import { NamespacePrefixMap } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const map = new NamespacePrefixMap();
 * map.add("urn:a", "a");
 * map.add("urn:a", "b");
 *
 * assert.equal(map.retrievePreferredPrefix("urn:a", "a"), "a");
 * assert.equal(map.retrievePreferredPrefix("urn:a", "z"), "b");
 * assert.equal(map.retrievePreferredPrefix("urn:other", "a"), undefined);
 * ```
 */
export class NamespacePrefixMap {
  #map: Map<string | null, string[]>;

  /**
   * Creates an empty map.
   *
   * @param entries Initial contents, used by {@linkcode NamespacePrefixMap.clone}.
   */
  constructor(entries?: Iterable<readonly [string | null, readonly string[]]>) {
    this.#map = new Map();
    if (entries === undefined) return;
    for (const [namespace, prefixes] of entries) {
      if (prefixes.length > 0) this.#map.set(namespace, [...prefixes]);
    }
  }

  /**
   * Creates the map a serialization starts from: the `xml` prefix bound to
   * the XML namespace.
   */
  static withDefaults(): NamespacePrefixMap {
    const map = new NamespacePrefixMap();
    map.add(XML_NAMESPACE, "xml");
    return map;
  }

  /**
   * Retrieves the preferred prefix for a namespace.
   *
   * @see {@link https://w3c.github.io/DOM-Parsing/#dfn-retrieving-a-preferred-prefix-string | retrieving a preferred prefix string}
   *
   * @param namespace The namespace to look up.
   * @param preferred The prefix the caller would like.
   * @returns `preferred` if it was recorded for `namespace`, otherwise the
   * most recently recorded prefix, or `undefined` if there is none.
   */
  retrievePreferredPrefix(
    namespace: string | null,
    preferred: string | null,
  ): string | undefined {
    const candidates = this.#map.get(namespace);
    if (candidates === undefined) return undefined;
    if (preferred !== null && candidates.includes(preferred)) return preferred;
    return candidates.at(-1);
  }

  /**
   * Checks whether `prefix` was recorded for `namespace`.
   *
   * @see {@link https://w3c.github.io/DOM-Parsing/#dfn-found | found}
   */
  findPrefix(namespace: string | null, prefix: string): boolean {
    return this.#map.get(namespace)?.includes(prefix) ?? false;
  }

  /**
   * Appends `prefix` to the list recorded for `namespace`.
   *
   * The list is not deduplicated; check with
   * {@linkcode NamespacePrefixMap.findPrefix} first where that matters.
   *
   * @see {@link https://w3c.github.io/DOM-Parsing/#dfn-add | add}
   */
  add(namespace: string | null, prefix: string): void {
    const candidates = this.#map.get(namespace);
    if (candidates === undefined) {
      this.#map.set(namespace, [prefix]);
    } else {
      candidates.push(prefix);
    }
  }

  /** The prefixes recorded for `namespace`, oldest first. */
  candidates(namespace: string | null): readonly string[] {
    return this.#map.get(namespace) ?? [];
  }

  /** Copies the map. Changes to the copy never reach the original. */
  clone(): NamespacePrefixMap {
    return new NamespacePrefixMap(this.#map);
  }
}

// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal record of the elements currently open in a serialization run.
 *
 * @module
 */

import type { NamespacePrefixMap } from "./namespace_prefix_map.ts";

/**
 * One open element.
 */
export interface ElementFrame {
  /** If true, the matching close call writes nothing. */
  readonly skipEndTag: boolean;
  /** The qualified name exactly as written in the start tag. */
  readonly qualifiedName: string;
  /** The prefix bindings visible to the element's content. */
  readonly map: NamespacePrefixMap;
  /** The namespace the element's children inherit. */
  readonly inheritedNamespace: string | null;
}

/**
 * A last-in-first-out stack of {@linkcode ElementFrame}s whose depth is the
 * current depth in the tree.
 */
export class ElementStack {
  #frames: ElementFrame[] = [];

  /** The number of open elements. */
  get depth(): number {
    return this.#frames.length;
  }

  push(frame: ElementFrame): void {
    this.#frames.push(frame);
  }

  /** Removes and returns the innermost frame, if any. */
  pop(): ElementFrame | undefined {
    return this.#frames.pop();
  }

  /** Returns the innermost frame without removing it. */
  peek(): ElementFrame | undefined {
    return this.#frames.at(-1);
  }
}

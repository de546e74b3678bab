// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Ready-made {@linkcode XmlSink} implementations.
 *
 * @module
 */

import type { XmlSink } from "./types.ts";

/**
 * Collects serialized markup into a string.
 *
 * @example Usage
 * ```ts
 * import { StringSink } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const sink = new StringSink();
 * sink.write("<a>");
 * sink.write("</a>");
 * assert.equal(sink.toString(), "<a></a>");
 * ```
 */
export class StringSink implements XmlSink {
  #chunks: string[] = [];

  write(chunk: string): void {
    this.#chunks.push(chunk);
  }

  /** Everything written so far. */
  toString(): string {
    return this.#chunks.join("");
  }
}

/**
 * Collects serialized markup as UTF-8 bytes.
 *
 * @example Usage
 * ```ts
 * import { ByteSink } from "xml-ns-serializer";
 * import assert from "node:assert/strict";
 *
 * const sink = new ByteSink();
 * sink.write("é");
 * assert.deepEqual(sink.bytes(), new Uint8Array([0xc3, 0xa9]));
 * ```
 */
export class ByteSink implements XmlSink {
  #encoder = new TextEncoder();
  #chunks: Uint8Array[] = [];
  #length = 0;

  write(chunk: string): void {
    const bytes = this.#encoder.encode(chunk);
    this.#chunks.push(bytes);
    this.#length += bytes.length;
  }

  /** The number of bytes written so far. */
  get length(): number {
    return this.#length;
  }

  /** Everything written so far, as one buffer. */
  bytes(): Uint8Array {
    const result = new Uint8Array(this.#length);
    let offset = 0;
    for (const chunk of this.#chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}

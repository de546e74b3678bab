// Copyright 2018-2026 the Deno authors. MIT license.

import { test } from "node:test";
import assert from "node:assert/strict";
import { ByteSink, StringSink } from "./sinks.ts";

test("StringSink joins chunks in order", () => {
  const sink = new StringSink();
  sink.write("<a>");
  sink.write("x");
  sink.write("</a>");

  assert.equal(sink.toString(), "<a>x</a>");
});

test("StringSink starts empty", () => {
  assert.equal(new StringSink().toString(), "");
});

test("ByteSink encodes chunks as UTF-8", () => {
  const sink = new ByteSink();
  sink.write("<é>");
  sink.write("€");

  assert.equal(sink.length, 7);
  assert.deepEqual(
    sink.bytes(),
    new Uint8Array([0x3c, 0xc3, 0xa9, 0x3e, 0xe2, 0x82, 0xac]),
  );
});

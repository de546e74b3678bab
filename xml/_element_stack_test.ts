// Copyright 2018-2026 the Deno authors. MIT license.

import { test } from "node:test";
import assert from "node:assert/strict";
import { ElementStack } from "./_element_stack.ts";
import { NamespacePrefixMap } from "./namespace_prefix_map.ts";

function frame(qualifiedName: string, skipEndTag = false) {
  return {
    skipEndTag,
    qualifiedName,
    map: new NamespacePrefixMap(),
    inheritedNamespace: null,
  };
}

test("ElementStack starts empty", () => {
  const stack = new ElementStack();

  assert.equal(stack.depth, 0);
  assert.equal(stack.peek(), undefined);
  assert.equal(stack.pop(), undefined);
});

test("ElementStack pops frames in reverse order", () => {
  const stack = new ElementStack();
  stack.push(frame("a"));
  stack.push(frame("ns1:b", true));

  assert.equal(stack.depth, 2);
  assert.equal(stack.peek()?.qualifiedName, "ns1:b");
  assert.equal(stack.pop()?.skipEndTag, true);
  assert.equal(stack.pop()?.qualifiedName, "a");
  assert.equal(stack.depth, 0);
});

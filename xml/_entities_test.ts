// Copyright 2018-2026 the Deno authors. MIT license.

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  assertXmlChars,
  escapeAttributeValue,
  escapeCData,
  escapeText,
  formatDeclaration,
  validateComment,
  validateProcessingInstruction,
} from "./_entities.ts";
import { XmlSerializationError } from "./types.ts";

// =============================================================================
// escapeText()
// =============================================================================

test("escapeText() encodes markup characters", () => {
  assert.equal(escapeText("<a & b>", true), "&lt;a &amp; b&gt;");
});

test("escapeText() leaves quotes and whitespace alone", () => {
  assert.equal(escapeText(`"it's"\n\t`, true), `"it's"\n\t`);
});

test("escapeText() returns plain text unchanged", () => {
  assert.equal(escapeText("hello world", true), "hello world");
  assert.equal(escapeText("", true), "");
});

test("escapeText() rejects characters outside Char when well-formed", () => {
  assert.throws(
    () => escapeText("a\u0001b", true),
    { kind: "invalid_character", message: "Invalid character U+0001 in text" },
  );
  assert.throws(
    () => escapeText("\uFFFE", true),
    { kind: "invalid_character" },
  );
});

test("escapeText() rejects lone surrogates when well-formed", () => {
  assert.throws(
    () => escapeText("x\uD800", true),
    { kind: "invalid_character", message: "Invalid character U+D800 in text" },
  );
});

test("escapeText() accepts surrogate pairs", () => {
  assert.equal(escapeText("😀 & 😀", true), "😀 &amp; 😀");
});

test("escapeText() passes invalid characters through when not well-formed", () => {
  assert.equal(escapeText("a\u0001<", false), "a\u0001&lt;");
});

// =============================================================================
// escapeAttributeValue()
// =============================================================================

test("escapeAttributeValue() encodes quotes and markup characters", () => {
  assert.equal(
    escapeAttributeValue(`say "<hi>" & go`, true),
    "say &quot;&lt;hi&gt;&quot; &amp; go",
  );
});

test("escapeAttributeValue() keeps apostrophes", () => {
  assert.equal(escapeAttributeValue("it's", true), "it's");
});

test("escapeAttributeValue() encodes whitespace that parsers normalize", () => {
  assert.equal(escapeAttributeValue("a\tb\nc\rd", true), "a&#9;b&#10;c&#13;d");
});

test("escapeAttributeValue() rejects characters outside Char when well-formed", () => {
  assert.throws(
    () => escapeAttributeValue("\u0000", true),
    {
      kind: "invalid_character",
      message: "Invalid character U+0000 in attribute value",
    },
  );
  assert.equal(escapeAttributeValue("\u0000", false), "\u0000");
});

// =============================================================================
// escapeCData()
// =============================================================================

test("escapeCData() wraps text in a CDATA section", () => {
  assert.equal(escapeCData("<script>", true), "<![CDATA[<script>]]>");
});

test("escapeCData() splits at every ]]>", () => {
  assert.equal(escapeCData("a]]>b", true), "<![CDATA[a]]]]><![CDATA[>b]]>");
  assert.equal(
    escapeCData("]]>]]>", true),
    "<![CDATA[]]]]><![CDATA[>]]]]><![CDATA[>]]>",
  );
});

test("escapeCData() rejects characters outside Char when well-formed", () => {
  assert.throws(() => escapeCData("\u0008", true), XmlSerializationError);
});

// =============================================================================
// validateComment()
// =============================================================================

test("validateComment() accepts ordinary comments", () => {
  validateComment(" a - b ", true);
  validateComment("", true);
});

test("validateComment() rejects a double hyphen", () => {
  assert.throws(
    () => validateComment("a--b", true),
    { kind: "invalid_comment", message: /contains "--"/ },
  );
});

test("validateComment() rejects a trailing hyphen", () => {
  assert.throws(
    () => validateComment("a-", true),
    { kind: "invalid_comment", message: /ends with "-"/ },
  );
});

test("validateComment() rejects a character outside Char", () => {
  assert.throws(
    () => validateComment("a\u0001b", true),
    {
      kind: "invalid_character",
      message: "Invalid character U+0001 in comment",
    },
  );
});

test("validateComment() accepts anything when not well-formed", () => {
  validateComment("a--b-", false);
});

// =============================================================================
// validateProcessingInstruction()
// =============================================================================

test("validateProcessingInstruction() accepts a stylesheet instruction", () => {
  validateProcessingInstruction(
    "xml-stylesheet",
    'href="style.css" type="text/css"',
    true,
  );
});

test("validateProcessingInstruction() rejects the xml target in any case", () => {
  for (const target of ["xml", "XML", "Xml"]) {
    assert.throws(
      () => validateProcessingInstruction(target, "", true),
      { kind: "invalid_processing_instruction" },
    );
  }
});

test("validateProcessingInstruction() rejects a colon in the target", () => {
  assert.throws(
    () => validateProcessingInstruction("a:b", "", true),
    {
      kind: "invalid_processing_instruction",
      message: 'Invalid processing instruction: target "a:b" contains ":"',
    },
  );
});

test("validateProcessingInstruction() rejects ?> in the data", () => {
  assert.throws(
    () => validateProcessingInstruction("pi", "a ?> b", true),
    {
      kind: "invalid_processing_instruction",
      message: 'Invalid processing instruction: data contains "?>"',
    },
  );
});

test("validateProcessingInstruction() rejects characters outside Char", () => {
  assert.throws(
    () => validateProcessingInstruction("pi", "\u0002", true),
    {
      kind: "invalid_character",
      message: "Invalid character U+0002 in processing instruction data",
    },
  );
});

test("validateProcessingInstruction() accepts anything when not well-formed", () => {
  validateProcessingInstruction("xml", "?>", false);
});

// =============================================================================
// assertXmlChars()
// =============================================================================

test("assertXmlChars() names the first offending code point", () => {
  assert.throws(
    () => assertXmlChars("ok\u000Bno\u000C", "text"),
    { message: "Invalid character U+000B in text" },
  );
});

// =============================================================================
// formatDeclaration()
// =============================================================================

test("formatDeclaration() writes the version only", () => {
  assert.equal(formatDeclaration({ version: "1.0" }, true), '<?xml version="1.0"?>');
});

test("formatDeclaration() writes encoding and standalone", () => {
  assert.equal(
    formatDeclaration(
      { version: "1.0", encoding: "UTF-8", standalone: "yes" },
      true,
    ),
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
  );
});

test("formatDeclaration() rejects a malformed version when well-formed", () => {
  assert.throws(
    () => formatDeclaration({ version: "2.0" }, true),
    { kind: "invalid_declaration" },
  );
  assert.equal(
    formatDeclaration({ version: "2.0" }, false),
    '<?xml version="2.0"?>',
  );
});

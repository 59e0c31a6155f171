import {
  CellwidthError,
  assertCodePoint,
  formatCodePoint,
  fromCodePoints,
  isCellwidthError,
  isCodePoint,
  iterateCodePoints,
  parseUnicodeVersion,
  toCodePoints,
  toEmojiVersion,
} from "../../mod.ts";
import { canonicalStringify } from "../../src/core/canonical.ts";
import { hashCanonicalSync } from "../../src/core/hash.ts";
import type { TestApi } from "../suite.ts";

export function registerCoreTests(api: TestApi): void {
  api.test("formatCodePoint pads to four hex digits", () => {
    api.assertEqual(formatCodePoint(0x41), "U+0041");
    api.assertEqual(formatCodePoint(0xfe0f), "U+FE0F");
    api.assertEqual(formatCodePoint(0x1f600), "U+1F600");
  });

  api.test("isCodePoint accepts scalar values only", () => {
    api.assertEqual(isCodePoint(0), true);
    api.assertEqual(isCodePoint(0x10ffff), true);
    api.assertEqual(isCodePoint(0xd7ff), true);
    api.assertEqual(isCodePoint(0xd800), false);
    api.assertEqual(isCodePoint(0xdfff), false);
    api.assertEqual(isCodePoint(0x110000), false);
    api.assertEqual(isCodePoint(-1), false);
    api.assertEqual(isCodePoint(65.5), false);
  });

  api.test("assertCodePoint reports the offending value and index", () => {
    try {
      assertCodePoint(0xd800, 3);
      api.assertOk(false, "expected INVALID_CODE_POINT");
    } catch (error) {
      api.assertOk(error instanceof CellwidthError);
      if (isCellwidthError(error, "INVALID_CODE_POINT")) {
        api.assertEqual(error.message, "U+D800 at index 3 is not a Unicode scalar value");
        api.assertDeepEqual(error.details, { value: 0xd800, index: 3 });
      }
    }
  });

  api.test("iterateCodePoints reports UTF-16 offsets", () => {
    api.assertDeepEqual(
      [...iterateCodePoints("a\u{1f600}b")],
      [
        { codePoint: 0x61, indexCU: 0, sizeCU: 1 },
        { codePoint: 0x1f600, indexCU: 1, sizeCU: 2 },
        { codePoint: 0x62, indexCU: 3, sizeCU: 1 },
      ],
    );
  });

  api.test("toCodePoints and fromCodePoints convert between forms", () => {
    api.assertDeepEqual(toCodePoints("a\u{1f600}"), [0x61, 0x1f600]);
    api.assertDeepEqual(toCodePoints(new Uint8Array([0xe4, 0xb8, 0xad])), [0x4e2d]);
    api.assertDeepEqual(toCodePoints([0x41, 0x42]), [0x41, 0x42]);
    api.assertEqual(fromCodePoints([0x61, 0x1f600]), "a\u{1f600}");
    api.assertThrowsCode(() => toCodePoints([0x41, 1.5]), "INVALID_CODE_POINT");
  });

  api.test("toEmojiVersion maps UCD releases to emoji releases", () => {
    const emoji = (version: string) => toEmojiVersion(parseUnicodeVersion(version));
    api.assertDeepEqual(emoji("6.3"), { major: 0, minor: 6, patch: 0 });
    api.assertDeepEqual(emoji("7.0"), { major: 0, minor: 7, patch: 0 });
    api.assertDeepEqual(emoji("8.0"), { major: 1, minor: 0, patch: 0 });
    api.assertDeepEqual(emoji("9.0"), { major: 3, minor: 0, patch: 0 });
    api.assertDeepEqual(emoji("10.0"), { major: 5, minor: 0, patch: 0 });
    api.assertDeepEqual(emoji("13.0"), { major: 13, minor: 0, patch: 0 });
    api.assertDeepEqual(emoji("15.1"), { major: 15, minor: 1, patch: 0 });
  });

  api.test("canonical hashing ignores key order and undefined members", () => {
    api.assertEqual(canonicalStringify({ b: 1, a: [true, undefined] }), '{"a":[true,null],"b":1}');
    api.assertEqual(
      hashCanonicalSync({ ruleSet: "uax29-15.1", extra: undefined }),
      hashCanonicalSync({ ruleSet: "uax29-15.1" }),
    );
    api.assertEqual(hashCanonicalSync(""), "fnv1a32:ffcaaa85");
  });
}

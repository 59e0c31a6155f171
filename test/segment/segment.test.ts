import type { ClusterSpan } from "../../mod.ts";
import {
  GraphemeCursor,
  clusterText,
  explainGraphemeBreaks,
  graphemeBoundaries,
  isGraphemeCluster,
  segmentGraphemes,
} from "../../mod.ts";
import { loadFixtureDatabase } from "../_support/fixtures.ts";
import type { TestApi } from "../suite.ts";

function spans(iterable: Iterable<ClusterSpan>): [number, number][] {
  return Array.from(iterable, (span): [number, number] => [span.start, span.end]);
}

export function registerSegmentTests(api: TestApi): void {
  api.test("segmentGraphemes keeps CR LF together", async () => {
    const database = await loadFixtureDatabase();
    const clusters = [...segmentGraphemes("\r\n", { database })];
    api.assertDeepEqual(clusters, [{ start: 0, end: 2, codePoints: [0x0d, 0x0a] }]);
  });

  api.test("segmentGraphemes breaks around controls", async () => {
    const database = await loadFixtureDatabase();
    api.assertDeepEqual(spans(segmentGraphemes([0x41, 0x00, 0x41], { database })), [
      [0, 1],
      [1, 2],
      [2, 3],
    ]);
    api.assertDeepEqual(spans(segmentGraphemes("\n\r", { database })), [
      [0, 1],
      [1, 2],
    ]);
  });

  api.test("segmentGraphemes joins Hangul syllable sequences", async () => {
    const database = await loadFixtureDatabase();
    api.assertDeepEqual(graphemeBoundaries([0x1100, 0x1161, 0x11a8], { database }), [0, 3]);
    api.assertDeepEqual(graphemeBoundaries([0xac00, 0x11a8, 0x1100], { database }), [0, 2, 3]);
  });

  api.test("segmentGraphemes attaches extenders, spacing marks and prepends", async () => {
    const database = await loadFixtureDatabase();
    api.assertDeepEqual(graphemeBoundaries("e\u0301\u0308x", { database }), [0, 3, 4]);
    api.assertDeepEqual(graphemeBoundaries([0x0915, 0x093f], { database }), [0, 2]);
    api.assertDeepEqual(graphemeBoundaries([0x0600, 0x0041], { database }), [0, 2]);
    api.assertDeepEqual(graphemeBoundaries([0x1f466, 0x1f3fd], { database }), [0, 2]);
  });

  api.test("segmentGraphemes pairs regional indicators", async () => {
    const database = await loadFixtureDatabase();
    api.assertDeepEqual(graphemeBoundaries([0x1f1fa, 0x1f1f8], { database }), [0, 2]);
    api.assertDeepEqual(graphemeBoundaries([0x1f1fa, 0x1f1f8, 0x1f1e6], { database }), [0, 2, 3]);
    api.assertDeepEqual(
      graphemeBoundaries([0x1f1fa, 0x1f1f8, 0x1f1e6, 0x1f1e8, 0x1f1e9], { database }),
      [0, 2, 4, 5],
    );
  });

  api.test("segmentGraphemes joins emoji ZWJ sequences only after a pictograph", async () => {
    const database = await loadFixtureDatabase();
    const family = [0x1f469, 0x200d, 0x1f469, 0x200d, 0x1f466];
    api.assertDeepEqual(graphemeBoundaries(family, { database }), [0, 5]);
    api.assertDeepEqual(graphemeBoundaries([0x41, 0x200d, 0x1f600], { database }), [0, 2, 3]);
    api.assertDeepEqual(
      graphemeBoundaries([0x1f466, 0x1f3fd, 0x200d, 0x1f466], { database }),
      [0, 4],
    );
  });

  api.test("Indic conjuncts join under the 15.1 rules only", async () => {
    const current = await loadFixtureDatabase("15.1.0");
    const previous = await loadFixtureDatabase("15.0.0");
    const conjunct = [0x0915, 0x094d, 0x0937];
    api.assertDeepEqual(graphemeBoundaries(conjunct, { database: current }), [0, 3]);
    api.assertDeepEqual(graphemeBoundaries(conjunct, { database: previous }), [0, 2, 3]);
    api.assertDeepEqual(
      graphemeBoundaries([0x0915, 0x093c, 0x094d, 0x0924], { database: current }),
      [0, 4],
    );
    api.assertDeepEqual(
      graphemeBoundaries([0x0b95, 0x0bcd, 0x0b95], { database: current }),
      [0, 2, 3],
    );
  });

  api.test("segmentGraphemes accepts strings, bytes and code point arrays alike", async () => {
    const database = await loadFixtureDatabase();
    const text = "e\u0301\u4e2d";
    const fromText = [...segmentGraphemes(text, { database })];
    const fromBytes = [...segmentGraphemes(new TextEncoder().encode(text), { database })];
    const fromArray = [...segmentGraphemes([0x65, 0x301, 0x4e2d], { database })];
    api.assertDeepEqual(fromBytes, fromText);
    api.assertDeepEqual(fromArray, fromText);
    api.assertDeepEqual(fromText.map(clusterText), ["e\u0301", "\u4e2d"]);
  });

  api.test("segmentGraphemes validates the whole input up front", async () => {
    const database = await loadFixtureDatabase();
    api.assertThrowsCode(() => segmentGraphemes([0x41, 0xd800], { database }), "INVALID_CODE_POINT");
    api.assertThrowsCode(() => segmentGraphemes("a\udc00", { database }), "INVALID_CODE_POINT");
    api.assertThrowsCode(() => segmentGraphemes([0x110000], { database }), "INVALID_CODE_POINT");
    api.assertThrowsCode(() => segmentGraphemes([-1], { database }), "INVALID_CODE_POINT");
    api.assertThrowsCode(
      () => segmentGraphemes(new Uint8Array([0x41, 0xff]), { database }),
      "INVALID_UTF8",
    );
  });

  api.test("segmentGraphemes of empty input yields nothing", async () => {
    const database = await loadFixtureDatabase();
    api.assertDeepEqual([...segmentGraphemes("", { database })], []);
    api.assertDeepEqual(graphemeBoundaries("", { database }), [0]);
    api.assertEqual(isGraphemeCluster("", { database }), false);
  });

  api.test("cluster iterables restart from the beginning", async () => {
    const database = await loadFixtureDatabase();
    const iterable = segmentGraphemes("a\r\n\u4e2d", { database });
    const first = spans(iterable);
    api.assertDeepEqual(first, [
      [0, 1],
      [1, 3],
      [3, 4],
    ]);
    api.assertDeepEqual(spans(iterable), first);

    const cursor = iterable.cursor();
    api.assertEqual(cursor.next()?.end, 1);
    api.assertEqual(cursor.offset, 1);
    api.assertEqual(cursor.next()?.end, 3);
    cursor.reset();
    api.assertEqual(cursor.offset, 0);
    api.assertDeepEqual(cursor.next(), { start: 0, end: 1, codePoints: [0x61] });
    cursor.next();
    cursor.next();
    api.assertEqual(cursor.done, true);
    api.assertEqual(cursor.next(), undefined);
  });

  api.test("GraphemeCursor can be driven directly", async () => {
    const database = await loadFixtureDatabase();
    const cursor = new GraphemeCursor([0x1f1fa, 0x1f1f8, 0x41], database, "uax29-15.1");
    api.assertDeepEqual(cursor.next(), { start: 0, end: 2, codePoints: [0x1f1fa, 0x1f1f8] });
    api.assertDeepEqual(cursor.next(), { start: 2, end: 3, codePoints: [0x41] });
    api.assertEqual(cursor.next(), undefined);
  });

  api.test("isGraphemeCluster is true for exactly one cluster", async () => {
    const database = await loadFixtureDatabase();
    api.assertEqual(isGraphemeCluster("\r\n", { database }), true);
    api.assertEqual(isGraphemeCluster([0x31, 0xfe0f, 0x20e3], { database }), true);
    api.assertEqual(isGraphemeCluster("ab", { database }), false);
  });

  api.test("explainGraphemeBreaks names the deciding rule", async () => {
    const database = await loadFixtureDatabase();
    api.assertDeepEqual(explainGraphemeBreaks([0x0d, 0x0a, 0x41], { database }), [
      { position: 1, rule: "GB3", breaks: false },
      { position: 2, rule: "GB4", breaks: true },
    ]);
    api.assertDeepEqual(explainGraphemeBreaks([0x0915, 0x094d, 0x0937], { database }), [
      { position: 1, rule: "GB9", breaks: false },
      { position: 2, rule: "GB9c", breaks: false },
    ]);
    api.assertDeepEqual(explainGraphemeBreaks([0x1f469, 0x200d, 0x1f466, 0x41], { database }), [
      { position: 1, rule: "GB9", breaks: false },
      { position: 2, rule: "GB11", breaks: false },
      { position: 3, rule: "GB999", breaks: true },
    ]);
    api.assertDeepEqual(explainGraphemeBreaks("a", { database }), []);
  });

  api.test("provenance records the data version and rule set", async () => {
    const current = await loadFixtureDatabase("15.1.0");
    const previous = await loadFixtureDatabase("15.0.0");
    const provenance = segmentGraphemes("a", { database: current }).provenance;
    api.assertEqual(provenance.unicodeVersion, "15.1.0");
    api.assertEqual(provenance.ruleSet, "uax29-15.1");
    api.assertEqual(provenance.algorithm.name, "UAX29.Grapheme");
    api.assertEqual(provenance.algorithm.revisionOrDate, "Unicode 15.1.0");
    api.assertDeepEqual(provenance.units, {
      offset: "unicode-code-point",
      cluster: "uax29-grapheme",
    });
    api.assertOk(provenance.configHash.startsWith("fnv1a32:"));
    api.assertEqual(
      segmentGraphemes("xyz", { database: current }).provenance.configHash,
      provenance.configHash,
    );
    const older = segmentGraphemes("a", { database: previous }).provenance;
    api.assertEqual(older.ruleSet, "uax29-pre15.1");
    api.assertOk(older.configHash !== provenance.configHash);
  });
}

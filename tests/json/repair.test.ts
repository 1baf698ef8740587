import test from "node:test";
import assert from "node:assert/strict";

import { extractJsonBlock, removeTrailingCommas, repairTruncatedJson, safeParseJson } from "../../src/json/repair.ts";

test("valid JSON parses without repair", () => {
  const result = safeParseJson('{"a": 1}');
  assert.equal(result.success, true);
  assert.equal(result.repairApplied, false);
  assert.deepEqual(result.data, { a: 1 });
});

test("fenced block with a trailing comma parses with repair applied", () => {
  const response = 'Here you go:\n```json\n{"samples": [{"id": "a", "persona": "P"},]}\n```\nThanks';
  const result = safeParseJson(response);
  assert.equal(result.success, true);
  assert.equal(result.repairApplied, true);
  assert.equal(result.rawExtracted, '{"samples": [{"id": "a", "persona": "P"},]}');
  assert.deepEqual(result.data, { samples: [{ id: "a", persona: "P" }] });
});

test("first balanced object is extracted from surrounding prose", () => {
  const text = 'Result: {"a": {"b": "x}"}} and then some commentary {"c": 2}';
  assert.equal(extractJsonBlock(text), '{"a": {"b": "x}"}}');
  assert.deepEqual(safeParseJson(text).data, { a: { b: "x}" } });
});

test("fenced array without a language tag is extracted", () => {
  const result = safeParseJson("```\n[1, 2,]\n```");
  assert.equal(result.success, true);
  assert.deepEqual(result.data, [1, 2]);
});

test("truncated JSON missing one to three closers is completed innermost first", () => {
  const cases: Array<[string, unknown]> = [
    ['{"a": [1, 2]', { a: [1, 2] }],
    ['{"a": [1, 2', { a: [1, 2] }],
    ['{"a": {"b": [1', { a: { b: [1] } }],
  ];
  for (const [input, expected] of cases) {
    const result = safeParseJson(input);
    assert.equal(result.success, true, input);
    assert.equal(result.repairApplied, true, input);
    assert.deepEqual(result.data, expected);
  }
});

test("an unterminated string is closed before the closers", () => {
  assert.equal(repairTruncatedJson('{"name": "Warm Co'), '{"name": "Warm Co"}');
  assert.deepEqual(safeParseJson('{"name": "Warm Co').data, { name: "Warm Co" });
});

test("a dangling comma or colon at the cut point is handled", () => {
  assert.deepEqual(safeParseJson('{"a": 1, "b": [2, 3,').data, { a: 1, b: [2, 3] });
  assert.deepEqual(safeParseJson('{"a": 1, "b":').data, { a: 1, b: null });
});

test("trailing comma removal ignores commas inside strings", () => {
  assert.equal(removeTrailingCommas('{"a": ",}"}'), '{"a": ",}"}');
  assert.equal(removeTrailingCommas('{"a": [1, 2, ], }'), '{"a": [1, 2 ] }');
});

test("unrecoverable text fails without throwing", () => {
  const result = safeParseJson("no json here");
  assert.equal(result.success, false);
  assert.equal(result.data, null);
  assert.equal(result.repairApplied, false);
  assert.ok(result.error?.startsWith("JSON parse error after repairs: "));
});

test("strict mode skips repairs", () => {
  const result = safeParseJson('{"a": 1,}', { strict: true });
  assert.equal(result.success, false);
  assert.ok(result.error?.startsWith("JSON parse error: "));
});

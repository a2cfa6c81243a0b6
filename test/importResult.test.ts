import test from "node:test";
import assert from "node:assert/strict";
import { combine, combineAll, ImportResult, isAtLeast } from "../src/import/importResult.js";

const ordered = [ImportResult.SUCCESS, ImportResult.INCOMPLETE, ImportResult.FAILURE, ImportResult.ERROR];

test("combine keeps the more severe result", () => {
  assert.equal(combine(ImportResult.SUCCESS, ImportResult.INCOMPLETE), ImportResult.INCOMPLETE);
  assert.equal(combine(ImportResult.FAILURE, ImportResult.INCOMPLETE), ImportResult.FAILURE);
  assert.equal(combine(ImportResult.ERROR, ImportResult.SUCCESS), ImportResult.ERROR);
});

test("combine is commutative, associative and has success as identity", () => {
  for (const a of ordered) {
    assert.equal(combine(a, ImportResult.SUCCESS), a);
    assert.equal(combine(a, a), a);
    for (const b of ordered) {
      assert.equal(combine(a, b), combine(b, a));
      for (const c of ordered) {
        assert.equal(combine(combine(a, b), c), combine(a, combine(b, c)));
      }
    }
  }
});

test("combineAll folds from success", () => {
  assert.equal(combineAll([]), ImportResult.SUCCESS);
  assert.equal(combineAll([ImportResult.INCOMPLETE, ImportResult.SUCCESS]), ImportResult.INCOMPLETE);
  assert.equal(combineAll(ordered), ImportResult.ERROR);
});

test("isAtLeast compares by severity", () => {
  assert.equal(isAtLeast(ImportResult.FAILURE, ImportResult.INCOMPLETE), true);
  assert.equal(isAtLeast(ImportResult.INCOMPLETE, ImportResult.FAILURE), false);
  assert.equal(isAtLeast(ImportResult.ERROR, ImportResult.ERROR), true);
});

import assert from "node:assert/strict";
import test from "node:test";
import { chunk, dot, l2Normalize } from "../../matching/vector-math";

test("l2Normalize scales to unit length", () => {
  assert.deepEqual(l2Normalize([3, 4]), [0.6, 0.8]);
});

test("l2Normalize leaves a zero vector at zero", () => {
  assert.deepEqual(l2Normalize([0, 0, 0]), [0, 0, 0]);
});

test("dot multiplies pairwise and sums", () => {
  assert.equal(dot([1, 2, 3], [4, 5, 6]), 32);
});

test("dot rejects vectors of different length", () => {
  assert.throws(() => dot([1, 2], [1, 2, 3]), /Vector length mismatch: 2 vs 3/);
});

test("chunk splits into fixed-size batches with a short tail", () => {
  assert.deepEqual(chunk([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
  assert.deepEqual(chunk(["a", "b"], 0), [["a"], ["b"]]);
  assert.deepEqual(chunk([], 4), []);
});

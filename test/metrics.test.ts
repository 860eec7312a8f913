import { expect, test } from "vitest";
import { ConfusionMatrix, logSumExp, normalizeLogScores } from "../index";

test("logSumExp shifts by the maximum", () => {
  expect(logSumExp([-1000, -1000])).toBeCloseTo(-1000 + Math.log(2), 10);
  expect(logSumExp([0, Math.log(3)])).toBeCloseTo(Math.log(4), 12);
  expect(logSumExp([])).toBe(Number.NEGATIVE_INFINITY);
  expect(logSumExp([Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY])).toBe(Number.NEGATIVE_INFINITY);
});

test("normalizeLogScores handles very negative scores", () => {
  const out = normalizeLogScores(
    new Map([
      ["hillary", -5000],
      ["trump", -5000 + Math.log(3)],
    ]),
  );
  expect(out.get("hillary")).toBeCloseTo(0.25, 12);
  expect(out.get("trump")).toBeCloseTo(0.75, 12);
});

test("confusion matrix counts predicted/actual pairs", () => {
  const matrix = new ConfusionMatrix(["hillary", "trump"]);
  matrix.record("hillary", "hillary");
  matrix.record("trump", "trump");
  matrix.record("trump", "hillary");
  matrix.record("trump", "trump");

  expect(matrix.total).toBe(4);
  expect(matrix.correct).toBe(3);
  expect(matrix.accuracy).toBe(0.75);
  expect(matrix.count("trump", "hillary")).toBe(1);
  expect(matrix.count("hillary", "trump")).toBe(0);
  expect(matrix.toRows()).toEqual([
    { predicted: "hillary", actual: "hillary", count: 1 },
    { predicted: "hillary", actual: "trump", count: 0 },
    { predicted: "trump", actual: "hillary", count: 1 },
    { predicted: "trump", actual: "trump", count: 2 },
  ]);
});

test("confusion matrix appends labels seen only in records", () => {
  const matrix = new ConfusionMatrix(["a", "b"]);
  expect(matrix.accuracy).toBe(0);
  matrix.record("a", "c");
  expect(matrix.labels()).toEqual(["a", "b", "c"]);
  expect(matrix.accuracy).toBe(0);
});

test("confusion matrix keeps labels with control characters apart", () => {
  const matrix = new ConfusionMatrix(["a", "b\u0001c"]);
  matrix.record("a\u0001b", "c");
  expect(matrix.count("a", "b\u0001c")).toBe(0);
  expect(matrix.count("a\u0001b", "c")).toBe(1);
  expect(matrix.correct).toBe(0);
});

import { expect, test } from "vitest";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  LabelMismatchError,
  UnknownLabelError,
  pairParallelCorpus,
  parseLabelMap,
  readParallelCorpus,
  splitLines,
  trainNaiveBayesTextClassifier,
} from "../index";

const fixtures = resolve(dirname(fileURLToPath(import.meta.url)), "fixtures");

test("splitLines keeps interior blank lines and drops the trailing newline", () => {
  expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
  expect(splitLines("a\r\n\r\nb")).toEqual(["a", "", "b"]);
  expect(splitLines("")).toEqual([]);
});

test("parseLabelMap reads symbol=label pairs", () => {
  expect([...parseLabelMap("0=hillary, 1=trump")]).toEqual([
    ["0", "hillary"],
    ["1", "trump"],
  ]);
  expect(() => parseLabelMap("0hillary")).toThrow(RangeError);
  expect(() => parseLabelMap("=trump")).toThrow(RangeError);
});

test("pairParallelCorpus maps label symbols", () => {
  const map = parseLabelMap("0=hillary,1=trump");
  expect(pairParallelCorpus(["first", "second"], ["1", " 0 "], map)).toEqual([
    { text: "first", label: "trump" },
    { text: "second", label: "hillary" },
  ]);
  expect(pairParallelCorpus(["first"], ["raw"])).toEqual([{ text: "first", label: "raw" }]);
  expect(() => pairParallelCorpus(["first", "second"], ["1"], map)).toThrow(LabelMismatchError);
  expect(() => pairParallelCorpus(["first"], ["2"], map)).toThrow(UnknownLabelError);
});

test("readParallelCorpus loads fixture files for training", () => {
  const rows = readParallelCorpus(
    resolve(fixtures, "tweets_train.txt"),
    resolve(fixtures, "tweets_train_labels.txt"),
    parseLabelMap("0=hillary,1=trump"),
  );
  expect(rows.length).toBe(6);
  expect(rows[1]).toEqual({ text: "Tremendous crowd tonight, thank you!", label: "trump" });

  const clf = trainNaiveBayesTextClassifier(rows, { classes: ["hillary", "trump"] });
  expect(clf.vocabulary().length).toBe(24);
  expect(clf.classify("Stronger together")).toBe("hillary");
  expect(clf.classify("Tremendous win!")).toBe("trump");
});

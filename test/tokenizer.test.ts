import { expect, test } from "vitest";
import { stripPunctuation, tokenize } from "../index";

test("tokenize lowercases and drops punctuation", () => {
  expect(tokenize("Hello, World!")).toEqual(["hello", "world"]);
  expect(tokenize("a--b")).toEqual(["a", "b"]);
  expect(tokenize("#MAGA @user: Thank you!!!")).toEqual(["maga", "user", "thank", "you"]);
});

test("tokenize returns empty for blank or punctuation-only input", () => {
  expect(tokenize("")).toEqual([]);
  expect(tokenize("   \t\n")).toEqual([]);
  expect(tokenize("?!...,;")).toEqual([]);
});

test("tokenize splits on whitespace runs and underscores", () => {
  expect(tokenize("one\ttwo\n\nthree")).toEqual(["one", "two", "three"]);
  expect(tokenize("snake_case")).toEqual(["snake", "case"]);
});

test("tokenize keeps non-ascii letters", () => {
  expect(tokenize("Café ÜBER naïve")).toEqual(["café", "über", "naïve"]);
});

test("tokenize is idempotent over its own output", () => {
  const text = "Don't STOP believing... 2016 is (almost) here -- vote!";
  const once = tokenize(text);
  expect(tokenize(once.join(" "))).toEqual(once);
  expect(once).toEqual(["don", "t", "stop", "believing", "2016", "is", "almost", "here", "vote"]);
});

test("stripPunctuation replaces every ascii punctuation character", () => {
  expect(stripPunctuation("a.b,c")).toBe("a b c");
  expect(stripPunctuation("!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~").trim()).toBe("");
});

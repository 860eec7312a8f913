import { readFileSync } from "node:fs";
import { LabelMismatchError, UnknownLabelError } from "./errors";
import type { NaiveBayesExample } from "./naive_bayes";

export type LabelMap = Map<string, string>;

export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/g);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function parseLabelMap(source: string): LabelMap {
  const out: LabelMap = new Map();
  for (const raw of source.split(",")) {
    const item = raw.trim();
    if (!item) continue;
    const eq = item.indexOf("=");
    const symbol = eq > 0 ? item.slice(0, eq).trim() : "";
    const label = eq > 0 ? item.slice(eq + 1).trim() : "";
    if (!symbol || !label) {
      throw new RangeError(`invalid label map entry "${item}", expected symbol=label`);
    }
    out.set(symbol, label);
  }
  return out;
}

export function pairParallelCorpus(texts: string[], symbols: string[], labelMap?: LabelMap): NaiveBayesExample[] {
  if (texts.length !== symbols.length) {
    throw new LabelMismatchError(texts.length, symbols.length);
  }
  return texts.map((text, idx) => {
    const symbol = symbols[idx]!.trim();
    if (!labelMap) return { text, label: symbol };
    const label = labelMap.get(symbol);
    if (label === undefined) throw new UnknownLabelError(symbol, "mapped label symbols");
    return { text, label };
  });
}

export function readLines(path: string): string[] {
  return splitLines(readFileSync(path, "utf8"));
}

export function readParallelCorpus(textPath: string, labelPath: string, labelMap?: LabelMap): NaiveBayesExample[] {
  return pairParallelCorpus(readLines(textPath), readLines(labelPath), labelMap);
}

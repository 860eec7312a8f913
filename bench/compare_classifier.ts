import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  parseLabelMap,
  readParallelCorpus,
  tokenize,
  trainNaiveBayesTextClassifier,
  type NaiveBayesExample,
} from "../index";

const fixtures = resolve(dirname(fileURLToPath(import.meta.url)), "..", "test", "fixtures");

// Park-Miller LCG, so repeated runs time identical datasets.
function seededRandom(seed: number): () => number {
  let state = seed % 2147483647 || 1;
  return () => {
    state = (state * 48271) % 2147483647;
    return state / 2147483647;
  };
}

function tokensByLabel(rows: NaiveBayesExample[]): Map<string, string[]> {
  const out = new Map<string, string[]>();
  for (const row of rows) {
    const bucket = out.get(row.label) ?? [];
    bucket.push(...tokenize(row.text));
    out.set(row.label, bucket);
  }
  return out;
}

function sampleRows(pools: Map<string, string[]>, size: number, noise: number, next: () => number): NaiveBayesExample[] {
  const labels = [...pools.keys()];
  const everything = [...pools.values()].flat();
  const rows: NaiveBayesExample[] = [];
  for (let i = 0; i < size; i += 1) {
    const label = labels[i % labels.length]!;
    const pool = pools.get(label) ?? everything;
    const length = 4 + Math.floor(next() * 12);
    const words: string[] = [];
    for (let w = 0; w < length; w += 1) {
      const source = next() < noise ? everything : pool;
      words.push(source[Math.floor(next() * source.length)]!);
    }
    rows.push({ label, text: words.join(" ") });
  }
  return rows;
}

function summarize(seconds: number[]): { min: number; mean: number } {
  const total = seconds.reduce((acc, value) => acc + value, 0);
  return { min: Math.min(...seconds), mean: total / Math.max(1, seconds.length) };
}

function main() {
  const trainSize = Number(process.argv[2] ?? "5000");
  const testSize = Number(process.argv[3] ?? "1000");
  const rounds = Number(process.argv[4] ?? "5");
  const noise = Number(process.argv[5] ?? "0.3");

  const seedRows = readParallelCorpus(
    resolve(fixtures, "tweets_train.txt"),
    resolve(fixtures, "tweets_train_labels.txt"),
    parseLabelMap("0=hillary,1=trump"),
  );
  const pools = tokensByLabel(seedRows);
  const next = seededRandom(20161108);
  const train = sampleRows(pools, trainSize, noise, next);
  const test = sampleRows(pools, testSize, noise, next);

  const fitSeconds: number[] = [];
  const evaluateSeconds: number[] = [];
  let accuracy = 0;
  for (let round = 0; round < rounds; round += 1) {
    const t0 = performance.now();
    const clf = trainNaiveBayesTextClassifier(train);
    const t1 = performance.now();
    accuracy = clf.evaluate(test).accuracy;
    fitSeconds.push((t1 - t0) / 1000);
    evaluateSeconds.push((performance.now() - t1) / 1000);
  }

  console.log(
    JSON.stringify(
      {
        train_size: train.length,
        test_size: test.length,
        rounds,
        noise,
        accuracy,
        fit_seconds: summarize(fitSeconds),
        evaluate_seconds: summarize(evaluateSeconds),
      },
      null,
      2,
    ),
  );
}

main();

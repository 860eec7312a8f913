import {
  EmptyTrainingSetError,
  LabelMismatchError,
  ModelAlreadyTrainedError,
  ModelNotTrainedError,
  UnknownLabelError,
} from "./errors";
import { ConfusionMatrix, normalizeLogScores } from "./metrics";
import { tokenize } from "./tokenizer";

export type NaiveBayesExample = {
  label: string;
  text: string;
};

export type NaiveBayesOptions = {
  smoothing?: number;
  classes?: string[];
};

export type NaiveBayesPrediction = {
  label: string;
  logScores: Map<string, number>;
};

export type NaiveBayesSerialized = {
  version: number;
  smoothing: number;
  totalDocs: number;
  labels: string[];
  labelDocCounts: number[];
  logPriors: number[];
  vocabulary: string[];
  vocabularyCounts: number[];
  wordCountsByLabel: number[][];
};

type TrainedState = {
  labels: string[];
  labelIndex: Map<string, number>;
  labelDocCounts: number[];
  totalDocs: number;
  vocabulary: string[];
  tokenToId: Map<string, number>;
  vocabularyCounts: Float64Array;
  wordCounts: Float64Array[];
  wordProbabilities: Float64Array[];
  logWordProbabilities: Float64Array[];
  logPriors: number[];
};

function validateSmoothing(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`smoothing must be a positive finite number, got ${value}`);
  }
  return value;
}

function validateClasses(classes: string[] | undefined): string[] | null {
  if (!classes) return null;
  if (new Set(classes).size !== classes.length) {
    throw new RangeError("declared classes must be unique");
  }
  return [...classes];
}

// Probabilities use the class document count in the denominator, with one
// smoothing pseudo-document per class.
function deriveTables(
  labelDocCounts: number[],
  wordCounts: Float64Array[],
  smoothing: number,
): Pick<TrainedState, "wordProbabilities" | "logWordProbabilities" | "logPriors" | "totalDocs"> {
  const numClasses = labelDocCounts.length;
  const totalDocs = labelDocCounts.reduce((sum, count) => sum + count, 0);
  const wordProbabilities: Float64Array[] = [];
  const logWordProbabilities: Float64Array[] = [];

  for (let c = 0; c < numClasses; c += 1) {
    const counts = wordCounts[c]!;
    const denom = labelDocCounts[c]! + numClasses * smoothing;
    const probs = new Float64Array(counts.length);
    const logs = new Float64Array(counts.length);
    for (let t = 0; t < counts.length; t += 1) {
      probs[t] = counts[t]! / denom;
      logs[t] = Math.log(probs[t]!);
    }
    wordProbabilities.push(probs);
    logWordProbabilities.push(logs);
  }

  const logPriors = labelDocCounts.map((count) => Math.log(count / totalDocs));
  return { wordProbabilities, logWordProbabilities, logPriors, totalDocs };
}

export class NaiveBayesTextClassifier {
  readonly smoothing: number;
  private readonly declaredClasses: string[] | null;
  private state: TrainedState | null = null;

  constructor(options: NaiveBayesOptions = {}) {
    this.smoothing = validateSmoothing(options.smoothing ?? 1.0);
    this.declaredClasses = validateClasses(options.classes);
  }

  static fromSerialized(payload: NaiveBayesSerialized): NaiveBayesTextClassifier {
    if (payload.version !== 1) {
      throw new Error(`unsupported NaiveBayes serialized version: ${payload.version}`);
    }
    const numClasses = payload.labels.length;
    if (
      numClasses === 0 ||
      payload.labelDocCounts.length !== numClasses ||
      payload.logPriors.length !== numClasses ||
      payload.wordCountsByLabel.length !== numClasses
    ) {
      throw new Error("invalid NaiveBayes serialized payload lengths");
    }
    const vocabSize = payload.vocabulary.length;
    if (
      payload.vocabularyCounts.length !== vocabSize ||
      payload.wordCountsByLabel.some((row) => row.length !== vocabSize)
    ) {
      throw new Error("invalid NaiveBayes serialized vocabulary lengths");
    }

    const classifier = new NaiveBayesTextClassifier({
      smoothing: payload.smoothing,
      classes: payload.labels,
    });
    const smoothing = classifier.smoothing;

    const tokenToId = new Map<string, number>();
    for (const [idx, token] of payload.vocabulary.entries()) {
      if (tokenToId.has(token)) {
        throw new Error(`duplicate NaiveBayes vocabulary token: "${token}"`);
      }
      tokenToId.set(token, idx);
    }
    if (payload.labelDocCounts.some((count) => !Number.isInteger(count) || count <= 0)) {
      throw new Error("invalid NaiveBayes class document counts");
    }
    // Every stored count already includes the smoothing pseudo-count.
    for (const row of payload.wordCountsByLabel) {
      if (row.some((count) => !Number.isFinite(count) || count < smoothing)) {
        throw new Error(`invalid NaiveBayes word count: counts must be finite and at least ${smoothing}`);
      }
    }

    const wordCounts = payload.wordCountsByLabel.map((row) => Float64Array.from(row));
    const derived = deriveTables(payload.labelDocCounts, wordCounts, smoothing);
    if (payload.totalDocs !== derived.totalDocs) {
      throw new Error(
        `inconsistent NaiveBayes document total: ${payload.totalDocs} stored, ${derived.totalDocs} from class counts`,
      );
    }
    if (payload.logPriors.some((logPrior, idx) => !(Math.abs(logPrior - derived.logPriors[idx]!) <= 1e-9))) {
      throw new Error("inconsistent NaiveBayes log priors for the stored class counts");
    }

    classifier.state = {
      labels: [...payload.labels],
      labelIndex: new Map<string, number>(payload.labels.map((label, idx) => [label, idx])),
      labelDocCounts: [...payload.labelDocCounts],
      vocabulary: [...payload.vocabulary],
      tokenToId,
      vocabularyCounts: Float64Array.from(payload.vocabularyCounts),
      wordCounts,
      ...derived,
    };
    return classifier;
  }

  get isTrained(): boolean {
    return this.state !== null;
  }

  get totalDocuments(): number {
    return this.trained().totalDocs;
  }

  fit(examples: NaiveBayesExample[]): this {
    if (this.state) throw new ModelAlreadyTrainedError();
    if (examples.length === 0) throw new EmptyTrainingSetError();

    const smoothing = this.smoothing;
    const declared = this.declaredClasses;
    const labels: string[] = declared ? [...declared] : [];
    const labelIndex = new Map<string, number>(labels.map((label, idx) => [label, idx]));
    const labelDocCounts: number[] = labels.map(() => 0);
    const occurrences: number[][] = labels.map(() => []);
    const vocabulary: string[] = [];
    const tokenToId = new Map<string, number>();
    const globalOccurrences: number[] = [];

    for (const row of examples) {
      let c = labelIndex.get(row.label);
      if (c === undefined) {
        if (declared) throw new UnknownLabelError(row.label);
        c = labels.length;
        labels.push(row.label);
        labelIndex.set(row.label, c);
        labelDocCounts.push(0);
        occurrences.push(vocabulary.map(() => 0));
      }
      labelDocCounts[c] = labelDocCounts[c]! + 1;

      const classOccurrences = occurrences[c]!;
      for (const token of tokenize(row.text)) {
        let id = tokenToId.get(token);
        if (id === undefined) {
          // First sight: every class starts from the smoothing pseudo-count,
          // whichever class introduced the token.
          id = vocabulary.length;
          vocabulary.push(token);
          tokenToId.set(token, id);
          globalOccurrences.push(0);
          for (const counts of occurrences) counts.push(0);
        }
        globalOccurrences[id] = globalOccurrences[id]! + 1;
        classOccurrences[id] = classOccurrences[id]! + 1;
      }
    }

    const missing = labels.filter((_, idx) => labelDocCounts[idx] === 0);
    if (missing.length > 0) {
      throw new EmptyTrainingSetError(`no training documents for class: ${missing.join(", ")}`);
    }

    const numClasses = labels.length;
    const wordCounts = occurrences.map((row) => Float64Array.from(row, (count) => count + smoothing));
    const vocabularyCounts = Float64Array.from(globalOccurrences, (count) => count + numClasses * smoothing);

    this.state = {
      labels,
      labelIndex,
      labelDocCounts,
      vocabulary,
      tokenToId,
      vocabularyCounts,
      wordCounts,
      ...deriveTables(labelDocCounts, wordCounts, smoothing),
    };
    return this;
  }

  fitParallel(texts: string[], labels: string[]): this {
    if (texts.length !== labels.length) {
      throw new LabelMismatchError(texts.length, labels.length);
    }
    return this.fit(texts.map((text, idx) => ({ text, label: labels[idx]! })));
  }

  labels(): string[] {
    return this.state ? [...this.state.labels] : this.declaredClasses ? [...this.declaredClasses] : [];
  }

  predict(text: string): NaiveBayesPrediction {
    const state = this.trained();
    const ids: number[] = [];
    for (const token of tokenize(text)) {
      const id = state.tokenToId.get(token);
      if (id === undefined) {
        // Out-of-vocabulary tokens add nothing to any class score.
        continue;
      }
      ids.push(id);
    }

    const logScores = new Map<string, number>();
    let bestIdx = 0;
    let bestScore = Number.NEGATIVE_INFINITY;
    for (let c = 0; c < state.labels.length; c += 1) {
      const logProbs = state.logWordProbabilities[c]!;
      let score = state.logPriors[c]!;
      for (const id of ids) score += logProbs[id]!;
      logScores.set(state.labels[c]!, score);
      // Strict comparison: exact ties keep the earlier class.
      if (c === 0 || score > bestScore) {
        bestIdx = c;
        bestScore = score;
      }
    }

    return { label: state.labels[bestIdx]!, logScores };
  }

  classify(text: string): string {
    return this.predict(text).label;
  }

  posteriors(text: string): Map<string, number> {
    return normalizeLogScores(this.predict(text).logScores);
  }

  evaluate(examples: NaiveBayesExample[]): ConfusionMatrix {
    const matrix = new ConfusionMatrix(this.trained().labels);
    for (const row of examples) {
      matrix.record(this.classify(row.text), row.label);
    }
    return matrix;
  }

  vocabulary(): string[] {
    return [...this.trained().vocabulary];
  }

  vocabularyCount(token: string): number | undefined {
    const state = this.trained();
    const id = state.tokenToId.get(token);
    return id === undefined ? undefined : state.vocabularyCounts[id];
  }

  wordCount(label: string, token: string): number | undefined {
    return this.lookup(this.trained().wordCounts, label, token);
  }

  wordProbability(label: string, token: string): number | undefined {
    return this.lookup(this.trained().wordProbabilities, label, token);
  }

  classDocumentCount(label: string): number | undefined {
    const state = this.trained();
    const c = state.labelIndex.get(label);
    return c === undefined ? undefined : state.labelDocCounts[c];
  }

  logPrior(label: string): number | undefined {
    const state = this.trained();
    const c = state.labelIndex.get(label);
    return c === undefined ? undefined : state.logPriors[c];
  }

  toJSON(): NaiveBayesSerialized {
    const state = this.trained();
    return {
      version: 1,
      smoothing: this.smoothing,
      totalDocs: state.totalDocs,
      labels: [...state.labels],
      labelDocCounts: [...state.labelDocCounts],
      logPriors: [...state.logPriors],
      vocabulary: [...state.vocabulary],
      vocabularyCounts: [...state.vocabularyCounts],
      wordCountsByLabel: state.wordCounts.map((row) => [...row]),
    };
  }

  private trained(): TrainedState {
    if (!this.state) throw new ModelNotTrainedError();
    return this.state;
  }

  private lookup(table: Float64Array[], label: string, token: string): number | undefined {
    const state = this.trained();
    const c = state.labelIndex.get(label);
    const id = state.tokenToId.get(token);
    if (c === undefined || id === undefined) return undefined;
    return table[c]![id];
  }
}

export function trainNaiveBayesTextClassifier(
  examples: NaiveBayesExample[],
  options?: NaiveBayesOptions,
): NaiveBayesTextClassifier {
  return new NaiveBayesTextClassifier(options).fit(examples);
}

export function loadNaiveBayesTextClassifier(payload: NaiveBayesSerialized): NaiveBayesTextClassifier {
  return NaiveBayesTextClassifier.fromSerialized(payload);
}

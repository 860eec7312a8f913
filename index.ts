export { stripPunctuation, tokenize } from "./src/tokenizer";
export {
  NaiveBayesTextClassifier,
  loadNaiveBayesTextClassifier,
  trainNaiveBayesTextClassifier,
} from "./src/naive_bayes";
export type {
  NaiveBayesExample,
  NaiveBayesOptions,
  NaiveBayesPrediction,
  NaiveBayesSerialized,
} from "./src/naive_bayes";
export { ConfusionMatrix, logSumExp, normalizeLogScores } from "./src/metrics";
export type { ConfusionRow } from "./src/metrics";
export {
  EmptyTrainingSetError,
  LabelMismatchError,
  ModelAlreadyTrainedError,
  ModelNotTrainedError,
  UnknownLabelError,
} from "./src/errors";
export { pairParallelCorpus, parseLabelMap, readLines, readParallelCorpus, splitLines } from "./src/corpus_readers";
export type { LabelMap } from "./src/corpus_readers";

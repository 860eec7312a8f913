import {
  parseLabelMap,
  readLines,
  readParallelCorpus,
  pairParallelCorpus,
  trainNaiveBayesTextClassifier,
} from "../index";

const DEFAULT_LABEL_MAP = "0=hillary,1=trump";

function usage(): string {
  return "usage: classify-tweets <train-texts> <train-labels> <test-texts> [test-labels] [label-map]";
}

function main() {
  const [trainTexts, trainLabels, testTexts, testLabels, labelSpec] = process.argv.slice(2);
  if (!trainTexts || !trainLabels || !testTexts) {
    throw new Error(usage());
  }

  const labelMap = parseLabelMap(labelSpec ?? DEFAULT_LABEL_MAP);
  const train = readParallelCorpus(trainTexts, trainLabels, labelMap);
  const classifier = trainNaiveBayesTextClassifier(train, { classes: [...new Set(labelMap.values())] });

  const texts = readLines(testTexts);
  const predictions = texts.map((text) => ({
    text,
    label: classifier.classify(text),
    posteriors: Object.fromEntries(classifier.posteriors(text)),
  }));

  const report: Record<string, unknown> = {
    train_size: train.length,
    vocabulary_size: classifier.vocabulary().length,
    labels: classifier.labels(),
    predictions,
  };

  if (testLabels) {
    const matrix = classifier.evaluate(pairParallelCorpus(texts, readLines(testLabels), labelMap));
    report.test_size = matrix.total;
    report.correct = matrix.correct;
    report.accuracy = matrix.accuracy;
    report.confusion = matrix.toRows();
  }

  console.log(JSON.stringify(report, null, 2));
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}

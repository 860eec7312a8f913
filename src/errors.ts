export class EmptyTrainingSetError extends Error {
  constructor(message = "training set is empty") {
    super(message);
    this.name = "EmptyTrainingSetError";
  }
}

export class LabelMismatchError extends Error {
  readonly textCount: number;
  readonly labelCount: number;

  constructor(textCount: number, labelCount: number) {
    super(`text/label count mismatch: ${textCount} texts, ${labelCount} labels`);
    this.name = "LabelMismatchError";
    this.textCount = textCount;
    this.labelCount = labelCount;
  }
}

export class UnknownLabelError extends Error {
  readonly label: string;

  constructor(label: string, context = "declared classes") {
    super(`label "${label}" is not one of the ${context}`);
    this.name = "UnknownLabelError";
    this.label = label;
  }
}

export class ModelAlreadyTrainedError extends Error {
  constructor() {
    super("classifier is already trained; create a new instance to train again");
    this.name = "ModelAlreadyTrainedError";
  }
}

export class ModelNotTrainedError extends Error {
  constructor() {
    super("classifier is not trained");
    this.name = "ModelNotTrainedError";
  }
}

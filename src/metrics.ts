export type ConfusionRow = {
  predicted: string;
  actual: string;
  count: number;
};

export function logSumExp(values: Iterable<number>): number {
  const items = [...values];
  if (items.length === 0) return Number.NEGATIVE_INFINITY;
  const max = Math.max(...items);
  if (!Number.isFinite(max)) return max;
  let sum = 0;
  for (const value of items) sum += Math.exp(value - max);
  return max + Math.log(sum);
}

/**
 * Turns unnormalized log-scores into probabilities that sum to 1.
 * Scores are shifted by their maximum first, so very negative scores on long
 * documents do not underflow to zero.
 */
export function normalizeLogScores(scores: Map<string, number>): Map<string, number> {
  const total = logSumExp(scores.values());
  const out = new Map<string, number>();
  for (const [label, score] of scores) {
    out.set(label, Number.isFinite(total) ? Math.exp(score - total) : 0);
  }
  return out;
}

export class ConfusionMatrix {
  private readonly order: string[];
  private readonly counts = new Map<string, Map<string, number>>();
  private recorded = 0;

  constructor(labels: string[] = []) {
    this.order = [...new Set(labels)];
  }

  record(predicted: string, actual: string): void {
    for (const label of [predicted, actual]) {
      if (!this.order.includes(label)) this.order.push(label);
    }
    let row = this.counts.get(predicted);
    if (!row) {
      row = new Map<string, number>();
      this.counts.set(predicted, row);
    }
    row.set(actual, (row.get(actual) ?? 0) + 1);
    this.recorded += 1;
  }

  count(predicted: string, actual: string): number {
    return this.counts.get(predicted)?.get(actual) ?? 0;
  }

  labels(): string[] {
    return [...this.order];
  }

  get total(): number {
    return this.recorded;
  }

  get correct(): number {
    let out = 0;
    for (const label of this.order) out += this.count(label, label);
    return out;
  }

  get accuracy(): number {
    return this.recorded === 0 ? 0 : this.correct / this.recorded;
  }

  toRows(): ConfusionRow[] {
    const rows: ConfusionRow[] = [];
    for (const predicted of this.order) {
      for (const actual of this.order) {
        rows.push({ predicted, actual, count: this.count(predicted, actual) });
      }
    }
    return rows;
  }
}

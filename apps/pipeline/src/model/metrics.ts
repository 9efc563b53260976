/**
 * Evaluation Metrics
 * Multi-class classification report and confusion matrix
 */

import {
  SENTIMENT_LABELS,
  labelToIndex,
  sentimentName,
  type AveragedScores,
  type ClassReport,
  type EvaluationMetrics,
  type SentimentLabel,
} from '@sentiment/shared';

// ============================================
// Metrics Calculator
// ============================================

export class MetricsCalculator {
  /**
   * Rows are actual labels, columns predicted, both in SENTIMENT_LABELS order
   */
  buildConfusionMatrix(predictions: SentimentLabel[], actuals: SentimentLabel[]): number[][] {
    if (predictions.length !== actuals.length) {
      throw new Error('Predictions and actuals must have same length');
    }

    const matrix = SENTIMENT_LABELS.map(() => SENTIMENT_LABELS.map(() => 0));
    for (let i = 0; i < predictions.length; i++) {
      matrix[labelToIndex(actuals[i])][labelToIndex(predictions[i])]++;
    }
    return matrix;
  }

  /**
   * One-vs-rest precision, recall and F1 per class. Undefined ratios count as 0.
   */
  calculatePerClass(matrix: number[][]): ClassReport[] {
    return SENTIMENT_LABELS.map((label, c) => {
      const tp = matrix[c][c];
      const predicted = matrix.reduce((sum, row) => sum + row[c], 0);
      const support = matrix[c].reduce((sum, count) => sum + count, 0);

      const precision = predicted > 0 ? tp / predicted : 0;
      const recall = support > 0 ? tp / support : 0;
      const f1Score = (precision + recall) > 0
        ? 2 * (precision * recall) / (precision + recall)
        : 0;

      return { label, precision, recall, f1Score, support };
    });
  }

  calculateMacroAverage(perClass: ClassReport[]): AveragedScores {
    const n = perClass.length;
    if (n === 0) return { precision: 0, recall: 0, f1Score: 0 };
    return {
      precision: perClass.reduce((acc, m) => acc + m.precision, 0) / n,
      recall: perClass.reduce((acc, m) => acc + m.recall, 0) / n,
      f1Score: perClass.reduce((acc, m) => acc + m.f1Score, 0) / n,
    };
  }

  /**
   * Averages weighted by support
   */
  calculateWeightedAverage(perClass: ClassReport[]): AveragedScores {
    const totalSupport = perClass.reduce((acc, m) => acc + m.support, 0);
    if (totalSupport === 0) return { precision: 0, recall: 0, f1Score: 0 };
    return {
      precision: perClass.reduce((acc, m) => acc + m.precision * m.support, 0) / totalSupport,
      recall: perClass.reduce((acc, m) => acc + m.recall * m.support, 0) / totalSupport,
      f1Score: perClass.reduce((acc, m) => acc + m.f1Score * m.support, 0) / totalSupport,
    };
  }

  evaluate(predictions: SentimentLabel[], actuals: SentimentLabel[]): EvaluationMetrics {
    const confusionMatrix = this.buildConfusionMatrix(predictions, actuals);
    const perClass = this.calculatePerClass(confusionMatrix);
    const correct = confusionMatrix.reduce((sum, row, i) => sum + row[i], 0);

    return {
      accuracy: actuals.length > 0 ? correct / actuals.length : 0,
      support: actuals.length,
      macroAvg: this.calculateMacroAverage(perClass),
      weightedAvg: this.calculateWeightedAverage(perClass),
      perClass,
      confusionMatrix,
    };
  }

  /**
   * Flat metric names as logged to the tracker
   */
  toTrackerMetrics(metrics: EvaluationMetrics): Record<string, number> {
    const flat: Record<string, number> = {
      test_accuracy: metrics.accuracy,
      test_macro_precision: metrics.macroAvg.precision,
      test_macro_recall: metrics.macroAvg.recall,
      test_macro_f1: metrics.macroAvg.f1Score,
      test_weighted_f1: metrics.weightedAvg.f1Score,
    };
    for (const report of metrics.perClass) {
      const name = sentimentName(report.label);
      flat[`${name}_precision`] = report.precision;
      flat[`${name}_recall`] = report.recall;
      flat[`${name}_f1`] = report.f1Score;
    }
    return flat;
  }

  /**
   * Text classification report, one line per class and average
   */
  formatReport(metrics: EvaluationMetrics): string {
    const row = (name: string, scores: AveragedScores, support: number) =>
      name.padStart(12) +
      [scores.precision, scores.recall, scores.f1Score].map(v => v.toFixed(2).padStart(10)).join('') +
      support.toString().padStart(10);

    return [
      ''.padStart(12) + ['precision', 'recall', 'f1-score', 'support'].map(h => h.padStart(10)).join(''),
      ...metrics.perClass.map(report => row(sentimentName(report.label), report, report.support)),
      'accuracy'.padStart(12) + ''.padStart(20) + metrics.accuracy.toFixed(2).padStart(10) + metrics.support.toString().padStart(10),
      row('macro avg', metrics.macroAvg, metrics.support),
      row('weighted avg', metrics.weightedAvg, metrics.support),
    ].join('\n');
  }

  /**
   * Confusion matrix for display
   */
  formatConfusionMatrix(matrix: number[][]): string {
    const names = SENTIMENT_LABELS.map(label => sentimentName(label).slice(0, 3));
    return [
      'Actual \\ Predicted' + names.map(n => n.padStart(6)).join(''),
      ...matrix.map((row, i) =>
        names[i].padStart(18) + row.map(count => count.toString().padStart(6)).join('')
      ),
    ].join('\n');
  }
}

// Export singleton
export const metricsCalculator = new MetricsCalculator();

import { readFileSync } from 'fs';
import { z } from 'zod';
import { logger } from '../../logger';
import { CATEGORY_LABELS } from './taxonomy';
import type { DefectCategory, DefectClassifier } from './types';

const classifierLogger = logger.child({ component: 'defect-classifier' });

export class NullClassifier implements DefectClassifier {
  readonly name = 'none';

  isAvailable(): boolean {
    return false;
  }

  score(): number | null {
    return null;
  }
}

const categoryModelSchema = z.object({
  bias: z.number(),
  weights: z.record(z.string(), z.number()),
});

export const classifierModelSchema = z.object({
  name: z.string().min(1).default('logistic-keyword'),
  version: z.string().min(1),
  categories: z.record(z.enum(CATEGORY_LABELS), categoryModelSchema),
});

export type ClassifierModel = z.infer<typeof classifierModelSchema>;

export function tokenize(sentence: string): Set<string> {
  return new Set(sentence.toLowerCase().match(/[a-z0-9]+(?:['-][a-z0-9]+)*/g) ?? []);
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/**
 * Per-category logistic model over sentence tokens. The weights are fixed after loading, so
 * concurrent analyses can share one instance.
 */
export class LogisticKeywordClassifier implements DefectClassifier {
  readonly name: string;
  readonly version: string;
  private readonly categories: ReadonlyMap<DefectCategory, { bias: number; weights: ReadonlyMap<string, number> }>;

  constructor(model: ClassifierModel) {
    this.name = model.name;
    this.version = model.version;

    const categories = new Map<DefectCategory, { bias: number; weights: ReadonlyMap<string, number> }>();
    for (const label of CATEGORY_LABELS) {
      const entry = model.categories[label];
      if (!entry) continue;
      categories.set(label, { bias: entry.bias, weights: new Map(Object.entries(entry.weights)) });
    }
    this.categories = categories;
  }

  isAvailable(): boolean {
    return this.categories.size > 0;
  }

  score(sentence: string, category: DefectCategory): number | null {
    const model = this.categories.get(category);
    if (!model) return null;

    let logit = model.bias;
    for (const token of tokenize(sentence)) {
      logit += model.weights.get(token) ?? 0;
    }
    return sigmoid(logit);
  }
}

export function parseClassifierModel(data: unknown): ClassifierModel {
  return classifierModelSchema.parse(data);
}

/**
 * Loads the classifier named by the configuration. A missing path or an unreadable model file
 * falls back to rule-based scoring; the engine never depends on the classifier being present.
 */
export function loadClassifier(modelPath: string | undefined): DefectClassifier {
  if (!modelPath) {
    classifierLogger.info('No classifier model configured, using rule-based scoring only');
    return new NullClassifier();
  }

  try {
    const model = parseClassifierModel(JSON.parse(readFileSync(modelPath, 'utf-8')));
    const classifier = new LogisticKeywordClassifier(model);
    classifierLogger.info(
      { modelPath, name: classifier.name, version: classifier.version, available: classifier.isAvailable() },
      'Classifier model loaded'
    );
    return classifier;
  } catch (error) {
    classifierLogger.warn({ err: error, modelPath }, 'Failed to load classifier model, falling back to rule-based scoring');
    return new NullClassifier();
  }
}

import { z } from 'zod';
import taxonomyData from './defect-taxonomy.json';
import type {
  AreaDefinition,
  CategoryDefinition,
  KeywordRule,
  KeywordTaxonomy,
} from './types';

export const CATEGORY_IDS = [
  'structural',
  'moisture',
  'electrical',
  'plumbing',
  'mold',
  'corrosion',
  'general',
] as const;

export const CATEGORY_LABELS = [
  'Structural',
  'Moisture & Damp',
  'Electrical',
  'Plumbing',
  'Mold & Fungus',
  'Corrosion & Rust',
  'General Structural',
] as const;

export const AREA_NAMES = [
  'basement',
  'foundation',
  'kitchen',
  'bathroom',
  'electrical',
  'exterior',
  'roof',
] as const;

const keywordText = z
  .string()
  .transform(value => value.trim().toLowerCase())
  .pipe(z.string().min(1, 'Keyword must not be empty'));

const taxonomySchema = z
  .object({
    categories: z
      .array(
        z.object({
          id: z.enum(CATEGORY_IDS),
          label: z.enum(CATEGORY_LABELS),
          keywords: z
            .array(
              z.object({
                keyword: keywordText,
                severity: z.enum(['High', 'Medium', 'Low']),
              })
            )
            .min(1, 'Category must define at least one keyword'),
        })
      )
      .length(CATEGORY_IDS.length, `Taxonomy must define exactly ${CATEGORY_IDS.length} categories`),
    areas: z
      .array(
        z.object({
          area: z.enum(AREA_NAMES),
          keywords: z.array(keywordText).min(1, 'Area must define at least one keyword'),
        })
      )
      .min(1),
    severityQualifiers: z.object({
      high: z.array(keywordText),
      low: z.array(keywordText),
    }),
  })
  .superRefine((taxonomy, ctx) => {
    const seenIds = new Set<string>();
    const seenLabels = new Set<string>();

    taxonomy.categories.forEach((category, categoryIndex) => {
      if (CATEGORY_LABELS[CATEGORY_IDS.indexOf(category.id)] !== category.label) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories', categoryIndex, 'label'],
          message: `Label "${category.label}" does not belong to category "${category.id}"`,
        });
      }
      if (seenIds.has(category.id) || seenLabels.has(category.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['categories', categoryIndex],
          message: `Category "${category.id}" is defined more than once`,
        });
      }
      seenIds.add(category.id);
      seenLabels.add(category.label);

      const seenKeywords = new Set<string>();
      category.keywords.forEach((rule, ruleIndex) => {
        if (seenKeywords.has(rule.keyword)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['categories', categoryIndex, 'keywords', ruleIndex, 'keyword'],
            message: `Keyword "${rule.keyword}" is repeated in category "${category.id}"`,
          });
        }
        seenKeywords.add(rule.keyword);
      });
    });

    const seenAreas = new Set<string>();
    taxonomy.areas.forEach((area, areaIndex) => {
      if (seenAreas.has(area.area)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['areas', areaIndex, 'area'],
          message: `Area "${area.area}" is defined more than once`,
        });
      }
      seenAreas.add(area.area);
    });
  });

export type TaxonomyInput = z.input<typeof taxonomySchema>;

export class TaxonomyConfigError extends Error {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`Invalid defect taxonomy: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'TaxonomyConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates raw taxonomy data and returns an immutable taxonomy.
 * Rules keep the order they are declared in, which the aggregator uses as its last tie-break.
 */
export function createTaxonomy(data: unknown): KeywordTaxonomy {
  const parsed = taxonomySchema.safeParse(data);
  if (!parsed.success) {
    throw new TaxonomyConfigError(
      parsed.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
    );
  }

  const categories: CategoryDefinition[] = CATEGORY_IDS.map((id, order) => ({
    id,
    label: CATEGORY_LABELS[order],
    order,
  }));

  const rules: KeywordRule[] = [];
  for (const definition of categories) {
    const category = parsed.data.categories.find(c => c.id === definition.id);
    if (!category) continue;
    for (const rule of category.keywords) {
      rules.push({
        category: definition.label,
        keyword: rule.keyword,
        severity: rule.severity,
        order: rules.length,
      });
    }
  }

  const areas: AreaDefinition[] = parsed.data.areas.map(area => ({
    area: area.area,
    keywords: area.keywords,
  }));

  return deepFreeze({
    categories,
    rules,
    areas,
    severityQualifiers: {
      high: parsed.data.severityQualifiers.high,
      low: parsed.data.severityQualifiers.low,
    },
  });
}

export function getCategoryOrder(taxonomy: KeywordTaxonomy, label: string): number {
  const category = taxonomy.categories.find(c => c.label === label);
  return category ? category.order : taxonomy.categories.length;
}

export const DEFAULT_TAXONOMY: KeywordTaxonomy = createTaxonomy(taxonomyData);

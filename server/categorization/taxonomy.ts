import { z } from 'zod';
import taxonomyData from './taxonomy.json';

export const CANONICAL_CATEGORIES = [
  'ecommerce',
  'news',
  'education',
  'social',
  'business',
  'technology',
  'health',
  'finance',
  'reference',
  'entertainment',
  'general',
  'unknown',
] as const;

export type CanonicalCategory = (typeof CANONICAL_CATEGORIES)[number];

const CanonicalSchema = z.enum(CANONICAL_CATEGORIES);

const RuleEntrySchema = z.object({
  category: CanonicalSchema,
  patterns: z.array(z.string().min(1)).min(1),
});

const KeywordGroupSchema = z.object({
  label: z.string().min(1),
  keywords: z.array(z.string().min(1)).min(1),
});

const CategoryDefinitionSchema = z.object({
  name: z.string().min(1),
  canonical: CanonicalSchema,
  description: z.string(),
  indicators: z.array(z.string()),
  examples: z.array(z.string()),
  focus: z.string(),
  fields: z.string(),
});

const TaxonomySchema = z.object({
  rules: z.array(RuleEntrySchema).min(1),
  keywords: z.array(KeywordGroupSchema).min(1),
  analysis: z.array(CategoryDefinitionSchema).min(1),
});

export type RuleEntry = z.infer<typeof RuleEntrySchema>;
export type KeywordGroup = z.infer<typeof KeywordGroupSchema>;
export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;
export type Taxonomy = z.infer<typeof TaxonomySchema>;

/** Order inside each list is significant: earlier entries win ties. */
export const TAXONOMY: Taxonomy = TaxonomySchema.parse(taxonomyData);

export const GENERAL_LABEL = 'General';

const canonicalByLabel = new Map(TAXONOMY.analysis.map((entry) => [entry.name.toLowerCase(), entry.canonical]));

/** Maps an analysis-taxonomy label to the shared canonical set; unknown labels become `general`. */
export const toCanonical = (label: string): CanonicalCategory =>
  canonicalByLabel.get(label.trim().toLowerCase()) ?? 'general';

export const findDefinition = (label: string): CategoryDefinition | undefined =>
  TAXONOMY.analysis.find((entry) => entry.name === label);

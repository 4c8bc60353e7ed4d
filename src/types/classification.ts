import { z } from 'zod';

export const REQUIRED_RESULT_FIELDS = [
  'description',
  'id',
  'parent_id',
  'name',
  'tier_1',
  'tier_2',
  'tier_3',
  'tier_4'
] as const;

const identifier = z.union([z.string(), z.number()]).transform(String);

// Optional tiers may be null, but every key has to be present
export const classificationResultSchema = z.object({
  description: z.string(),
  id: identifier,
  parent_id: identifier.nullable(),
  name: z.string(),
  tier_1: z.string(),
  tier_2: z.string().nullable(),
  tier_3: z.string().nullable(),
  tier_4: z.string().nullable()
});

export type ClassificationResult = z.infer<typeof classificationResultSchema>;

export interface TaxonomyCategory {
  id: string;
  parent_id: string | null;
  name: string;
  tier_1: string;
  tier_2: string | null;
  tier_3: string | null;
  tier_4: string | null;
}

export interface Taxonomy {
  version: string;
  categories: TaxonomyCategory[];
}

export interface ClassifyRequest {
  description: string;
}

export interface ClassifyResponse {
  trace_id: string;
  score_id?: string | null;
  result: ClassificationResult;
}

export interface ConvertRequest {
  trace_id: string;
  score_id: string;
}

export interface ErrorResponse {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

import type { Taxonomy } from '../types/index.js';
import { REQUIRED_RESULT_FIELDS } from '../types/index.js';

export const CLASSIFICATION_SYSTEM_PROMPT = `You classify content descriptions into a content taxonomy.

Pick the single most specific taxonomy category that fits the description.
Only use categories that appear in the taxonomy you are given; never invent ids or names.

Respond with a json object containing exactly these fields:
- "description": the description you classified, unchanged
- "id": the id of the chosen category
- "parent_id": the parent id of the chosen category, or null
- "name": the name of the chosen category
- "tier_1", "tier_2", "tier_3", "tier_4": the tiers of the chosen category, null where empty

Only respond with the json object, nothing else.`;

const COLUMNS = ['id', 'parent_id', 'name', 'tier_1', 'tier_2', 'tier_3', 'tier_4'] as const;

export function formatTaxonomy(taxonomy: Taxonomy): string {
  const header = COLUMNS.join('\t');
  const rows = taxonomy.categories.map(category =>
    COLUMNS.map(column => category[column] ?? '').join('\t')
  );
  return [header, ...rows].join('\n');
}

export function buildClassificationPrompt(description: string, taxonomy: Taxonomy): string {
  return [
    `Taxonomy (version ${taxonomy.version}, tab separated):`,
    formatTaxonomy(taxonomy),
    '',
    'Description:',
    description,
    '',
    `Return the fields ${REQUIRED_RESULT_FIELDS.join(', ')}.`
  ].join('\n');
}

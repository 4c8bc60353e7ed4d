import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { Taxonomy } from '../types/index.js';
import { TaxonomyUnavailableError, errorMessage } from '../errors.js';

const identifier = z.union([z.string(), z.number()]).transform(String);
const optionalTier = z.string().nullable().default(null);

const taxonomySchema = z.object({
  version: identifier.default('1'),
  categories: z.array(z.object({
    id: identifier,
    parent_id: identifier.nullable().default(null),
    name: z.string().min(1),
    tier_1: z.string().min(1),
    tier_2: optionalTier,
    tier_3: optionalTier,
    tier_4: optionalTier
  })).min(1)
});

// Read on every call; the file is owned by whoever maintains the taxonomy
export class TaxonomyLoader {
  constructor(readonly path: string) {}

  async load(): Promise<Taxonomy> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      throw new TaxonomyUnavailableError(`Cannot read taxonomy ${this.path}: ${errorMessage(error)}`, this.path);
    }

    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (error) {
      throw new TaxonomyUnavailableError(`Cannot parse taxonomy ${this.path}: ${errorMessage(error)}`, this.path);
    }

    const result = taxonomySchema.safeParse(document);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown issue';
      throw new TaxonomyUnavailableError(`Invalid taxonomy ${this.path} (${where})`, this.path);
    }

    return result.data;
  }
}

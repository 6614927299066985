/**
 * Loads the read-only corpora (tables, intents, teams, keywords) from data/.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { z } from 'zod';
import { rootDir } from '../config.js';
import {
  KeywordCorpusSchema,
  SchemaCorpusSchema,
  TeamCorpusSchema,
} from '../types/models.js';
import type { KeywordCorpus, SchemaCorpus, Team } from '../types/models.js';

export const DEFAULT_DATA_DIR = join(rootDir, 'data');

export interface Corpora {
  readonly schema: SchemaCorpus;
  readonly teams: readonly Team[];
  readonly keywords: KeywordCorpus;
}

function readJson<T extends z.ZodTypeAny>(path: string, schema: T): z.infer<T> {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid corpus file ${path}: ${issues}`);
  }
  return parsed.data;
}

export function loadCorpora(dataDir: string = DEFAULT_DATA_DIR): Corpora {
  return {
    schema: readJson(join(dataDir, 'schema.json'), SchemaCorpusSchema),
    teams: readJson(join(dataDir, 'teams.json'), TeamCorpusSchema).teams,
    keywords: readJson(join(dataDir, 'keywords.json'), KeywordCorpusSchema),
  };
}

import * as fs from 'fs';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { CustomPatternMapping, TaxonomyDefinition } from './types';
import { InvalidPatternError } from '../pipeline/errors';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const patternList = { type: 'array', items: { type: 'string' } } as const;
const patternMap = { type: 'object', additionalProperties: patternList } as const;
const failureMap = {
  type: 'object',
  additionalProperties: {
    type: 'object',
    required: ['severity', 'patterns'],
    properties: {
      severity: { type: 'string', enum: ['high', 'medium', 'low'] },
      patterns: patternList,
    },
    additionalProperties: false,
  },
} as const;

const validateTaxonomy = ajv.compile<TaxonomyDefinition>({
  type: 'object',
  required: [
    'topics',
    'sentiment',
    'failures',
    'completionCues',
    'questionPatterns',
    'clarificationPatterns',
    'effectiveness',
    'nonNameWords',
  ],
  properties: {
    topics: patternMap,
    sentiment: patternMap,
    failures: failureMap,
    completionCues: {
      type: 'object',
      required: ['affirmation', 'abandonment', 'blocker'],
      properties: {
        affirmation: patternList,
        abandonment: patternList,
        blocker: patternList,
      },
      additionalProperties: false,
    },
    questionPatterns: patternList,
    clarificationPatterns: patternList,
    effectiveness: {
      type: 'object',
      required: ['highly_effective', 'effective', 'partially_effective', 'ineffective'],
      properties: {
        highly_effective: patternList,
        effective: patternList,
        partially_effective: patternList,
        ineffective: patternList,
      },
      additionalProperties: false,
    },
    nonNameWords: patternList,
  },
  additionalProperties: false,
});

const validateCustomPatterns = ajv.compile<CustomPatternMapping>({
  type: 'object',
  properties: {
    topics: patternMap,
    sentiment: patternMap,
    failures: failureMap,
    pii: patternMap,
  },
  additionalProperties: false,
});

function readYAML(filepath: string, category: string): unknown {
  if (!fs.existsSync(filepath)) {
    throw new InvalidPatternError(category, filepath, 'file not found');
  }
  const content = fs.readFileSync(filepath, 'utf-8');
  try {
    // JSON is a subset of YAML, so .json pattern files load here too
    return yaml.load(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidPatternError(category, filepath, reason);
  }
}

function schemaErrors(errors: typeof validateTaxonomy.errors): string {
  return (errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('; ');
}

/** Parse and validate an in-memory taxonomy document. */
export function parseTaxonomy(data: unknown, source = 'taxonomy'): TaxonomyDefinition {
  if (!validateTaxonomy(data)) {
    throw new InvalidPatternError('taxonomy', source, schemaErrors(validateTaxonomy.errors));
  }
  return data;
}

/** Parse and validate an in-memory custom pattern mapping. */
export function parseCustomPatterns(data: unknown, source = 'custom patterns'): CustomPatternMapping {
  if (!validateCustomPatterns(data)) {
    throw new InvalidPatternError('custom', source, schemaErrors(validateCustomPatterns.errors));
  }
  return data;
}

/** Load the built-in taxonomy tables from a YAML file. */
export function loadTaxonomy(filepath: string): TaxonomyDefinition {
  const taxonomy = parseTaxonomy(readYAML(filepath, 'taxonomy'), filepath);
  logger.info(
    {
      filepath,
      topicCount: Object.keys(taxonomy.topics).length,
      sentimentCount: Object.keys(taxonomy.sentiment).length,
      failureCount: Object.keys(taxonomy.failures).length,
    },
    'Taxonomy loaded',
  );
  return taxonomy;
}

/** Load a custom pattern mapping from a YAML or JSON file. */
export function loadCustomPatterns(filepath: string): CustomPatternMapping {
  const mapping = parseCustomPatterns(readYAML(filepath, 'custom'), filepath);
  logger.info({ filepath, sections: Object.keys(mapping) }, 'Custom patterns loaded');
  return mapping;
}

/**
 * Analyzer configuration builder.
 *
 * All pattern registration happens here, before a run starts. build() compiles
 * every table, freezes the result and seals the builder; later registration
 * attempts throw PatternRegistrationClosedError.
 */

import {
  AnalysisThresholds,
  AnalyzerConfig,
  CompiledCategory,
  CompiledFailureKind,
  CompletionCue,
  CustomPatternMapping,
  CustomPiiRule,
  EffectivenessLevel,
  FailureDefinition,
  FeatureFlags,
  PrivacyOptions,
  Severity,
  TaxonomyDefinition,
} from './types';
import { env } from './env';
import { loadCustomPatterns, loadTaxonomy } from './taxonomy-loader';
import { InvalidPatternError, PatternRegistrationClosedError } from '../pipeline/errors';

export const DEFAULT_FEATURES: FeatureFlags = {
  privacy: true,
  quality: true,
  temporal: true,
  visualization: true,
};

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  quickResponseSeconds: 60,
  longGapSeconds: 3600,
  completionTailSize: 3,
  collaborationHighMax: 0.15,
  collaborationMediumMax: 0.35,
  failureDensityWeight: 0.5,
  negativeSentimentWeight: 0.3,
  interruptionWeight: 0.2,
  confrontationalNegativeRate: 0.3,
  confrontationalHighSeverityRate: 0.2,
  trendWindowSize: 10,
  trendStdDevThreshold: 2,
  trendMinMagnitude: 0.25,
  minStreakDays: 3,
};

export const DEFAULT_PRIVACY: PrivacyOptions = {
  pseudonymizeOrganizations: true,
  pseudonymSalt: '',
  pseudonymLength: 12,
};

const PII_KIND_FORMAT = /^[a-z][a-z0-9_]*$/;

function compilePattern(category: string, source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidPatternError(category, source, reason);
  }
}

function compileCategory(kind: string, name: string, sources: readonly string[]): CompiledCategory {
  return Object.freeze({
    name,
    patterns: Object.freeze(sources.map((s) => compilePattern(`${kind}:${name}`, s, 'i'))),
  });
}

export class AnalyzerConfigBuilder {
  private features: FeatureFlags = { ...DEFAULT_FEATURES };
  private thresholds: AnalysisThresholds = { ...DEFAULT_THRESHOLDS };
  private privacy: PrivacyOptions = { ...DEFAULT_PRIVACY };

  // Maps keep insertion order, which is the evaluation order
  private readonly topics = new Map<string, string[]>();
  private readonly sentiment = new Map<string, string[]>();
  private readonly failures = new Map<string, FailureDefinition>();
  private readonly piiPatterns = new Map<string, string[]>();
  private readonly completionCues: Record<CompletionCue, string[]>;
  private readonly questionPatterns: string[];
  private readonly clarificationPatterns: string[];
  private readonly effectiveness: Record<EffectivenessLevel, string[]>;
  private readonly nonNameWords: string[];
  private sealed = false;

  constructor(taxonomy: TaxonomyDefinition) {
    for (const [name, patterns] of Object.entries(taxonomy.topics)) this.topics.set(name, [...patterns]);
    for (const [name, patterns] of Object.entries(taxonomy.sentiment)) this.sentiment.set(name, [...patterns]);
    for (const [name, def] of Object.entries(taxonomy.failures)) {
      this.failures.set(name, { severity: def.severity, patterns: [...def.patterns] });
    }
    this.completionCues = {
      affirmation: [...taxonomy.completionCues.affirmation],
      abandonment: [...taxonomy.completionCues.abandonment],
      blocker: [...taxonomy.completionCues.blocker],
    };
    this.questionPatterns = [...taxonomy.questionPatterns];
    this.clarificationPatterns = [...taxonomy.clarificationPatterns];
    this.effectiveness = {
      highly_effective: [...taxonomy.effectiveness.highly_effective],
      effective: [...taxonomy.effectiveness.effective],
      partially_effective: [...taxonomy.effectiveness.partially_effective],
      ineffective: [...taxonomy.effectiveness.ineffective],
    };
    this.nonNameWords = [...taxonomy.nonNameWords];
  }

  /** Start from the taxonomy YAML file (defaults to config/taxonomy.yaml). */
  static fromTaxonomyFile(filepath: string = env.io.taxonomyPath): AnalyzerConfigBuilder {
    return new AnalyzerConfigBuilder(loadTaxonomy(filepath));
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  withFeatures(features: Partial<FeatureFlags>): this {
    this.assertOpen('feature flags');
    this.features = { ...this.features, ...features };
    return this;
  }

  withThresholds(thresholds: Partial<AnalysisThresholds>): this {
    this.assertOpen('thresholds');
    this.thresholds = { ...this.thresholds, ...thresholds };
    return this;
  }

  withPrivacyOptions(options: Partial<PrivacyOptions>): this {
    this.assertOpen('privacy options');
    this.privacy = { ...this.privacy, ...options };
    return this;
  }

  registerTopicPatterns(name: string, patterns: string[]): this {
    this.assertOpen(`topic "${name}"`);
    this.topics.set(name, [...(this.topics.get(name) ?? []), ...patterns]);
    return this;
  }

  /** Extends an existing sentiment category, or appends a new one at the end of the cascade. */
  registerSentimentPatterns(name: string, patterns: string[]): this {
    this.assertOpen(`sentiment "${name}"`);
    this.sentiment.set(name, [...(this.sentiment.get(name) ?? []), ...patterns]);
    return this;
  }

  registerFailurePatterns(name: string, severity: Severity, patterns: string[]): this {
    this.assertOpen(`failure "${name}"`);
    const existing = this.failures.get(name);
    if (existing && existing.severity !== severity) {
      throw new InvalidPatternError(
        `failure:${name}`,
        severity,
        `severity conflicts with registered severity "${existing.severity}"`,
      );
    }
    this.failures.set(name, { severity, patterns: [...(existing?.patterns ?? []), ...patterns] });
    return this;
  }

  /** Custom PII patterns match case-sensitively; spell out both cases where needed (`[Ee]mp`). */
  registerPiiPattern(kind: string, patterns: string | string[]): this {
    this.assertOpen(`PII kind "${kind}"`);
    if (!PII_KIND_FORMAT.test(kind)) {
      throw new InvalidPatternError(`pii:${kind}`, kind, 'kind names must be lowercase snake_case');
    }
    const list = Array.isArray(patterns) ? patterns : [patterns];
    this.piiPatterns.set(kind, [...(this.piiPatterns.get(kind) ?? []), ...list]);
    return this;
  }

  withCustomPatterns(mapping: CustomPatternMapping): this {
    for (const [name, patterns] of Object.entries(mapping.topics ?? {})) this.registerTopicPatterns(name, patterns);
    for (const [name, patterns] of Object.entries(mapping.sentiment ?? {})) this.registerSentimentPatterns(name, patterns);
    for (const [name, def] of Object.entries(mapping.failures ?? {})) {
      this.registerFailurePatterns(name, def.severity, def.patterns);
    }
    for (const [kind, patterns] of Object.entries(mapping.pii ?? {})) this.registerPiiPattern(kind, patterns);
    return this;
  }

  build(): AnalyzerConfig {
    this.assertOpen('configuration');

    if (this.thresholds.trendWindowSize < 1 || this.thresholds.completionTailSize < 1) {
      throw new RangeError('trendWindowSize and completionTailSize must be at least 1');
    }

    const failures: CompiledFailureKind[] = Array.from(this.failures.entries()).map(([name, def]) =>
      Object.freeze({ ...compileCategory('failure', name, def.patterns), severity: def.severity }),
    );

    const compileCues = (cue: CompletionCue): readonly RegExp[] =>
      Object.freeze(this.completionCues[cue].map((s) => compilePattern(`completion:${cue}`, s, 'i')));
    const completionCues: Record<CompletionCue, readonly RegExp[]> = {
      affirmation: compileCues('affirmation'),
      abandonment: compileCues('abandonment'),
      blocker: compileCues('blocker'),
    };

    const compileLevel = (level: EffectivenessLevel): readonly RegExp[] =>
      Object.freeze(this.effectiveness[level].map((s) => compilePattern(`effectiveness:${level}`, s, 'i')));
    const effectiveness: Record<EffectivenessLevel, readonly RegExp[]> = {
      highly_effective: compileLevel('highly_effective'),
      effective: compileLevel('effective'),
      partially_effective: compileLevel('partially_effective'),
      ineffective: compileLevel('ineffective'),
    };

    const customPiiRules: CustomPiiRule[] = [];
    for (const [kind, sources] of this.piiPatterns) {
      for (const source of sources) {
        customPiiRules.push(Object.freeze({ kind, regex: compilePattern(`pii:${kind}`, source, 'g') }));
      }
    }

    const config: AnalyzerConfig = Object.freeze({
      features: Object.freeze({ ...this.features }),
      thresholds: Object.freeze({ ...this.thresholds }),
      privacy: Object.freeze({ ...this.privacy }),
      taxonomy: Object.freeze({
        topics: Object.freeze(Array.from(this.topics.entries()).map(([n, p]) => compileCategory('topic', n, p))),
        sentiment: Object.freeze(
          Array.from(this.sentiment.entries()).map(([n, p]) => compileCategory('sentiment', n, p)),
        ),
        failures: Object.freeze(failures),
        completionCues: Object.freeze(completionCues),
        questionPatterns: Object.freeze(this.questionPatterns.map((s) => compilePattern('question', s, 'i'))),
        clarificationPatterns: Object.freeze(
          this.clarificationPatterns.map((s) => compilePattern('clarification', s, 'i')),
        ),
        effectiveness: Object.freeze(effectiveness),
      }),
      customPiiRules: Object.freeze(customPiiRules),
      nonNameWords: new Set(this.nonNameWords.map((w) => w.toLowerCase())),
    });

    this.sealed = true;
    return config;
  }

  private assertOpen(what: string): void {
    if (this.sealed) throw new PatternRegistrationClosedError(what);
  }
}

/** Build a configuration from environment variables and the configured pattern files. */
export function createConfigFromEnv(): AnalyzerConfig {
  const builder = AnalyzerConfigBuilder.fromTaxonomyFile(env.io.taxonomyPath)
    .withFeatures(env.features)
    .withThresholds(env.thresholds)
    .withPrivacyOptions(env.privacy);

  if (env.io.customPatternsPath) {
    builder.withCustomPatterns(loadCustomPatterns(env.io.customPatternsPath));
  }

  return builder.build();
}

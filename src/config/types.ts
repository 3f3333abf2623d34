/** Failure severity, ordered high > medium > low */
export type Severity = 'high' | 'medium' | 'low';

/** Completion cue families recognised in message text */
export type CompletionCue = 'affirmation' | 'abandonment' | 'blocker';

export const COMPLETION_CUES: readonly CompletionCue[] = ['affirmation', 'abandonment', 'blocker'];

/** How well a user's next message says an assistant reply landed, best first */
export type EffectivenessLevel = 'highly_effective' | 'effective' | 'partially_effective' | 'ineffective';

export const EFFECTIVENESS_LEVELS: readonly EffectivenessLevel[] = [
  'highly_effective',
  'effective',
  'partially_effective',
  'ineffective',
];

/** Stage toggles. Visualization is carried for sinks; the core never renders. */
export interface FeatureFlags {
  privacy: boolean;
  quality: boolean;
  temporal: boolean;
  visualization: boolean;
}

/** Named aggregation constants (see DESIGN.md for the chosen defaults) */
export interface AnalysisThresholds {
  /** Role-alternating pairs closer than this are quick responses */
  quickResponseSeconds: number;
  /** Adjacent messages further apart than this form a long gap */
  longGapSeconds: number;
  /** Number of trailing messages inspected for task completion */
  completionTailSize: number;
  /** Collaboration score below this is `high` */
  collaborationHighMax: number;
  /** Collaboration score below this (and at least collaborationHighMax) is `medium` */
  collaborationMediumMax: number;
  failureDensityWeight: number;
  negativeSentimentWeight: number;
  interruptionWeight: number;
  /** Share of negative-sentiment messages above which a conversation may be confrontational */
  confrontationalNegativeRate: number;
  /** Share of high-severity messages above which a conversation may be confrontational */
  confrontationalHighSeverityRate: number;
  trendWindowSize: number;
  trendStdDevThreshold: number;
  trendMinMagnitude: number;
  minStreakDays: number;
}

export interface PrivacyOptions {
  pseudonymizeOrganizations: boolean;
  pseudonymSalt: string;
  /** Hex characters kept from the pseudonym digest */
  pseudonymLength: number;
}

// ───── Raw (uncompiled) pattern tables ─────

export interface FailureDefinition {
  severity: Severity;
  patterns: string[];
}

export interface TaxonomyDefinition {
  topics: Record<string, string[]>;
  /** Insertion order is the sentiment cascade order */
  sentiment: Record<string, string[]>;
  failures: Record<string, FailureDefinition>;
  completionCues: Record<CompletionCue, string[]>;
  questionPatterns: string[];
  /** A user asking the assistant to explain or restate */
  clarificationPatterns: string[];
  effectiveness: Record<EffectivenessLevel, string[]>;
  nonNameWords: string[];
}

/** Name → pattern-list mappings merged into the built-in tables */
export interface CustomPatternMapping {
  topics?: Record<string, string[]>;
  sentiment?: Record<string, string[]>;
  failures?: Record<string, FailureDefinition>;
  pii?: Record<string, string[]>;
}

// ───── Compiled tables ─────

export interface CompiledCategory {
  readonly name: string;
  readonly patterns: readonly RegExp[];
}

export interface CompiledFailureKind extends CompiledCategory {
  readonly severity: Severity;
}

export interface CompiledTaxonomy {
  readonly topics: readonly CompiledCategory[];
  readonly sentiment: readonly CompiledCategory[];
  readonly failures: readonly CompiledFailureKind[];
  readonly completionCues: Readonly<Record<CompletionCue, readonly RegExp[]>>;
  readonly questionPatterns: readonly RegExp[];
  readonly clarificationPatterns: readonly RegExp[];
  readonly effectiveness: Readonly<Record<EffectivenessLevel, readonly RegExp[]>>;
}

/** A custom PII kind: matched with a global regex, replaced by `[KIND_REDACTED]` */
export interface CustomPiiRule {
  readonly kind: string;
  readonly regex: RegExp;
}

/** Frozen output of AnalyzerConfigBuilder.build() */
export interface AnalyzerConfig {
  readonly features: Readonly<FeatureFlags>;
  readonly thresholds: Readonly<AnalysisThresholds>;
  readonly privacy: Readonly<PrivacyOptions>;
  readonly taxonomy: CompiledTaxonomy;
  readonly customPiiRules: readonly CustomPiiRule[];
  readonly nonNameWords: ReadonlySet<string>;
}

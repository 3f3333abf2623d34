import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalFloat(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseFloat(val);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

const nodeEnv = optional('NODE_ENV', 'development');

export const env = {
  nodeEnv,
  logLevel: optional('LOG_LEVEL', nodeEnv === 'test' ? 'silent' : 'info'),
  projectRoot,

  // ───── Input / Output ─────
  io: {
    exportPath: optional('EXPORT_PATH', ''),
    outputPath: optional('OUTPUT_PATH', ''),
    taxonomyPath: optional('TAXONOMY_PATH', path.join(projectRoot, 'config', 'taxonomy.yaml')),
    customPatternsPath: optional('CUSTOM_PATTERNS_PATH', ''),
  },

  // ───── Feature Toggles ─────
  features: {
    privacy: optionalBool('PRIVACY_ENABLED', true),
    quality: optionalBool('QUALITY_ENABLED', true),
    temporal: optionalBool('TEMPORAL_ENABLED', true),
    visualization: optionalBool('VISUALIZATION_ENABLED', true),
  },

  // ───── Privacy ─────
  privacy: {
    pseudonymizeOrganizations: optionalBool('PSEUDONYMIZE_ORGANIZATIONS', true),
    pseudonymSalt: optional('PSEUDONYM_SALT', ''),
  },

  // ───── Aggregation Thresholds ─────
  thresholds: {
    quickResponseSeconds: optionalInt('QUICK_RESPONSE_SECONDS', 60),
    longGapSeconds: optionalInt('LONG_GAP_SECONDS', 3600),
    trendWindowSize: optionalInt('TREND_WINDOW_SIZE', 10),
    trendStdDevThreshold: optionalFloat('TREND_STDDEV_THRESHOLD', 2),
  },
} as const;

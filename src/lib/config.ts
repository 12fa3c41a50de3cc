import { ValidationError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const FEATURE_NAMES = [
  'anomalyDetection',
  'forecasting',
  'realtimeUpdates',
  'caching',
  'encryption',
  'auditLogging',
  'benchmarking',
  'insightGeneration',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureToggles = Record<FeatureName, boolean>;

export interface RevenueConfig {
  features: FeatureToggles;
  logLevel: LogLevel;
  databasePath: string;
  reportingCurrency: string;
  clockSkewToleranceMs: number;
  collaboratorTimeoutMs: number;
  exportEncryptionKey: string | null;
}

const FEATURE_ENV_KEYS: Record<FeatureName, string> = {
  anomalyDetection: 'FEATURE_ANOMALY_DETECTION',
  forecasting: 'FEATURE_FORECASTING',
  realtimeUpdates: 'FEATURE_REALTIME_UPDATES',
  caching: 'FEATURE_CACHING',
  encryption: 'FEATURE_ENCRYPTION',
  auditLogging: 'FEATURE_AUDIT_LOGGING',
  benchmarking: 'FEATURE_BENCHMARKING',
  insightGeneration: 'FEATURE_INSIGHT_GENERATION',
};

export const DEFAULT_FEATURES: Readonly<FeatureToggles> = {
  anomalyDetection: true,
  forecasting: true,
  realtimeUpdates: true,
  caching: true,
  encryption: false,
  auditLogging: true,
  benchmarking: false,
  insightGeneration: true,
};

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true' || raw.trim() === '1';
}

/** A 32-byte AES key written as 64 hex characters. */
export function isExportKey(value: string | null | undefined): value is string {
  return typeof value === 'string' && /^[0-9a-fA-F]{64}$/.test(value);
}

function parseIntOr(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadRevenueConfig(env: NodeJS.ProcessEnv = process.env): RevenueConfig {
  const features = { ...DEFAULT_FEATURES };
  for (const name of FEATURE_NAMES) {
    features[name] = parseFlag(env[FEATURE_ENV_KEYS[name]], DEFAULT_FEATURES[name]);
  }

  // Sealed exports are on by default only when there is a key to seal with.
  const exportEncryptionKey = env.EXPORT_ENCRYPTION_KEY || null;
  features.encryption = parseFlag(env.FEATURE_ENCRYPTION, isExportKey(exportEncryptionKey));
  if (features.encryption && !isExportKey(exportEncryptionKey)) {
    throw new ValidationError(
      'EXPORT_ENCRYPTION_KEY',
      'FEATURE_ENCRYPTION needs EXPORT_ENCRYPTION_KEY set to 64 hex characters',
      'encryption_key_required',
    );
  }

  const level = (env.LOG_LEVEL || 'info').toLowerCase();

  return {
    features,
    logLevel: isLogLevel(level) ? level : 'info',
    databasePath: env.DATABASE_PATH || './data/revenue.db',
    reportingCurrency: (env.REPORTING_CURRENCY || 'USD').toUpperCase(),
    clockSkewToleranceMs: parseIntOr(env.CLOCK_SKEW_TOLERANCE_MS, 300_000),
    collaboratorTimeoutMs: parseIntOr(env.COLLABORATOR_TIMEOUT_MS, 10_000),
    exportEncryptionKey,
  };
}

/** Read once at startup. */
export const APP_CONFIG: Readonly<RevenueConfig> = loadRevenueConfig();

// ── Policy constants ──────────────────────────────────────────────────────────

export const POLICY = {
  /** Lower bound (in σ units) of each anomaly severity band. */
  anomalyBands: { low: 2, medium: 3, high: 4, critical: 5 },
  anomalyBaselineWindow: 7,
  anomalyLookbackBuckets: 30,
  healthWeights: { uptime: 0.4, errorRate: 0.3, usageEfficiency: 0.2, satisfaction: 0.1 },
  healthGrades: { excellent: 90, good: 80, fair: 70, poor: 50 },
  healthTrendEpsilon: 0.005,
  healthRecalculationMs: 24 * 60 * 60 * 1000,
  childLimitFraction: { metered: 10, seats: 5 },
  forecastHistoryMonths: 6,
  forecastMinHistoryMonths: 3,
  forecastMaxMonths: 36,
  forecastScenarioSigma: 0.5,
  forecastZScore: 1.645,
  forecastHorizonDecay: 0.93,
  growthTrendSamples: 3,
  /** Typical month-over-month revenue growth for booking SaaS. */
  industryMonthlyGrowth: 0.05,
  insightTtlMs: 7 * 24 * 60 * 60 * 1000,
  /** Days in an average Gregorian month (365.2425 / 12). */
  averageMonthDays: 30.436875,
} as const;

export const TENANT_TIERS = ['individual', 'smallBusiness', 'medium', 'professional', 'enterprise', 'custom'] as const;
export type TenantTier = (typeof TENANT_TIERS)[number];

export type TenantStatus = 'provisioning' | 'active' | 'suspended' | 'inactive' | 'deleted';

export const SUSPENSION_REASONS = [
  'nonPayment',
  'violation',
  'security',
  'abuse',
  'maintenance',
  'requested',
  'other',
] as const;
export type SuspensionReason = (typeof SUSPENSION_REASONS)[number];

export type SupportLevel = 'email' | 'priority' | 'dedicated';

/** Numeric ceilings, one per governed resource. */
export interface TenantLimitValues {
  apiCallsPerMonth: number;
  storageGb: number;
  bandwidthGb: number;
  maxUsers: number;
  maxCourses: number;
  maxBookings: number;
  maxChildTenants: number;
  maxCustomDomains: number;
  maxWebhooks: number;
}

export type LimitKey = keyof TenantLimitValues;

export interface TenantLimits extends TenantLimitValues {
  supportLevel: SupportLevel;
  slaUptime: number | null;
  backupRetentionDays: number;
  version: number;
}

export const GOVERNED_RESOURCES = [
  'apiCalls',
  'storageGb',
  'bandwidthGb',
  'users',
  'courses',
  'bookings',
  'childTenants',
  'customDomains',
  'webhooks',
] as const;
export type GovernedResource = (typeof GOVERNED_RESOURCES)[number];

export type ResourceUsage = Record<GovernedResource, number>;

export interface TenantUsageCounter {
  tenantId: string;
  periodStart: Date;
  usage: ResourceUsage;
  updatedAt: Date;
}

export interface Tenant {
  id: string;
  name: string;
  slug: string;
  tier?: TenantTier;
  status: TenantStatus;
  parentTenantId?: string;
  limitOverrides?: Partial<TenantLimitValues>;
  suspensionReason?: SuspensionReason;
  suspendedAt?: Date;
  createdAt: Date;
  updatedAt?: Date;
  branding: Record<string, unknown>;
  settings: Record<string, unknown>;
  metadata: Record<string, string>;
}

export interface TenantCreateRequest {
  name: string;
  slug: string;
  tier?: TenantTier;
  limitOverrides?: Partial<TenantLimitValues>;
  branding?: Record<string, unknown>;
  settings?: Record<string, unknown>;
  metadata?: Record<string, string>;
}

export type ResourceOverage = Record<GovernedResource, number>;

export interface TenantUsageProjection {
  projected: ResourceUsage;
  confidence: number;
}

export interface TenantUsageReport {
  tenantId: string;
  limits: TenantLimits;
  usage: ResourceUsage;
  overages: ResourceOverage;
  projectedUsage: TenantUsageProjection;
  periodStart: Date;
  generatedAt: Date;
}

// ── Health ────────────────────────────────────────────────────────────────────

export type HealthGrade = 'excellent' | 'good' | 'fair' | 'poor' | 'critical';

export type HealthFactorName = 'uptime' | 'errorRate' | 'usageEfficiency' | 'satisfaction';

export type HealthTrendDirection = 'improving' | 'stable' | 'declining';

export interface HealthFactor {
  name: HealthFactorName;
  weight: number;
  value: number;
  contribution: number;
}

export interface HealthTrend {
  factor: HealthFactorName;
  direction: HealthTrendDirection;
  change: number;
}

export interface TenantHealthScore {
  tenantId: string;
  score: number;
  grade: HealthGrade;
  factors: HealthFactor[];
  trends: HealthTrend[];
  recommendations: string[];
  calculatedAt: Date;
  nextCalculation: Date;
}

/** Signals from the external SLO feed. */
export interface SloSignals {
  uptime: number;
  errorRate: number;
  /** Customer satisfaction on a 0–5 scale. */
  satisfaction: number;
}

// ── Migration ─────────────────────────────────────────────────────────────────

export type MigrationStatus = 'pending' | 'inProgress' | 'completed' | 'partiallyCompleted' | 'failed' | 'cancelled';

export type MigrationItem = 'users' | 'courses' | 'bookings' | 'settings';

export interface MigrationOptions {
  includeUsers: boolean;
  includeCourses: boolean;
  includeBookings: boolean;
  includeSettings: boolean;
}

export interface MigrationStatistics {
  totalItems: number;
  successfulItems: number;
  failedItems: number;
}

export interface MigrationResult {
  migrationId: string;
  fromTenantId: string;
  toTenantId: string;
  status: MigrationStatus;
  startTime: Date;
  endTime: Date;
  migratedItems: MigrationItem[];
  errors: string[];
  statistics: MigrationStatistics;
}

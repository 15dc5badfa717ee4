/**
 * Engine Configuration
 * Resource identifiers, scoring constants and external endpoints.
 *
 * Deployment-specific values come from the environment; everything else is
 * fixed here so scoring stays reproducible across deployments.
 */

const tablePrefix = process.env.ENGINE_TABLE_PREFIX || 'access-engine';

export const ENGINE_CONFIG = {
  region: process.env.AWS_REGION || 'eu-central-1',

  dynamodb: {
    tables: {
      policies: `${tablePrefix}-policies`,
      sessions: `${tablePrefix}-sessions`,
      devices: `${tablePrefix}-devices`,
      audit: `${tablePrefix}-audit`
    },
    indexes: {
      ipIndex: 'ip-index'
    }
  },

  risk: {
    weights: {
      device: 0.30,
      location: 0.25,
      time: 0.20,
      failed_attempts: 0.15,
      velocity: 0.10
    },
    levels: {
      mediumFrom: 40,
      highFrom: 75
    },
    businessHours: {
      startHour: 8,
      endHour: 18
    },
    failedAttemptsWindowMs: 60 * 60 * 1000,
    velocityWindowMs: 5 * 60 * 1000,
    fingerprintUaPrefixLength: 50
  },

  geolocation: {
    endpoint: process.env.GEOLOCATION_API_URL || 'http://ip-api.com/json',
    timeoutMs: 3000
  },

  reevaluation: {
    intervalsMs: {
      high: 5 * 60 * 1000,
      medium: 15 * 60 * 1000,
      low: 30 * 60 * 1000
    },
    locationDriftKm: 100,
    impossibleTravelKmh: 800,
    maxRiskIncrease: 30,
    anomalyPenalty: 10,
    sweepRiskThreshold: 40,
    sweepConcurrency: 5
  },

  threatIntel: {
    abuseIpDbUrl: process.env.ABUSEIPDB_API_URL || 'https://api.abuseipdb.com/api/v2/check',
    abuseIpDbApiKey: process.env.ABUSEIPDB_API_KEY || '',
    maxAgeInDays: 90,
    timeoutMs: 5000,
    cacheTtlMs: 60 * 60 * 1000,
    maxCacheSize: 10000,
    localWindowMs: 30 * 24 * 60 * 60 * 1000
  },

  stepUp: {
    secret: process.env.STEPUP_TOKEN_SECRET || 'change-me-in-production',
    ttlSeconds: 15 * 60,
    codeLength: 6
  },

  session: {
    durationMs: 8 * 60 * 60 * 1000
  }
} as const;

export type EngineConfig = typeof ENGINE_CONFIG;

/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, LEDGER_CONFIG } from './environments';
 *
 *   if (isProduction) { ... }
 *   const owner = LEDGER_CONFIG.ownerAddress;
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

/**
 * Local development flag
 * Set LOCAL_DEV=true to use localhost URLs even in non-development environments
 */
export const isLocalDev = process.env.LOCAL_DEV === 'true';

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

export const MONGODB_URI = isProduction
  ? process.env.MONGODB_URI || 'mongodb://mongodb:27017/token-escrow-ledger'
  : isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/token-escrow-ledger-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/token-escrow-ledger';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  maxIdleTimeMS: isProduction ? 60000 : 30000,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = isProduction
  ? process.env.REDIS_HOST || 'redis'
  : process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = parseInt(
  process.env.REDIS_PORT || (isTest ? '6380' : '6379'),
  10
);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction
  ? process.env.REDIS_PASSWORD || undefined
  : undefined;

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * JWT Secret - validated at startup in production
 */
export const JWT_SECRET = process.env.JWT_SECRET || (isProduction ? '' : 'dev-secret-do-not-use-in-production');

export const JWT_CONFIG = {
  secret: JWT_SECRET,
  accessTokenExpiresIn: process.env.JWT_ACCESS_TOKEN_EXPIRES_IN || (isProduction ? '15m' : '1h'),
  /**
   * POST /auth/token hands out caller tokens for any address.
   * Never enabled in production, where tokens come from the identity provider.
   */
  allowTokenIssuance: !isProduction && process.env.AUTH_TOKEN_ISSUANCE !== 'false',
};

// =============================================================================
// LEDGER CONFIGURATION
// =============================================================================

/**
 * Genesis parameters of the token and escrow ledgers.
 * Defaults are placeholder owner and bridge manager addresses for local runs.
 */
export const LEDGER_CONFIG = {
  ownerAddress: process.env.LEDGER_OWNER_ADDRESS || '0x0000000000000000000000000000000000000001',
  bridgeManagerAddress:
    process.env.BRIDGE_MANAGER_ADDRESS || '0x0000000000000000000000000000000000000002',
  tokenName: process.env.TOKEN_NAME || 'RenderToken',
  tokenSymbol: process.env.TOKEN_SYMBOL || 'RNDR',
  tokenDecimals: parseInt(process.env.TOKEN_DECIMALS || '18', 10),
  legacyMigrationEnabled: process.env.LEGACY_MIGRATION_ENABLED === 'true',
  persistenceEnabled: isTest ? false : process.env.LEDGER_PERSISTENCE_ENABLED !== 'false',
  notificationPageLimit: parseInt(process.env.NOTIFICATION_PAGE_LIMIT || '500', 10),
  /** Notifications held in memory; older pages are read from MongoDB */
  notificationRetention: parseInt(process.env.NOTIFICATION_RETENTION || '10000', 10),
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

/**
 * Request limits per window. Tests run with limits high enough never to trip.
 *
 * RATE_LIMIT_DISABLED=true turns every limiter off. When RATE_LIMIT_BYPASS_SECRET
 * is set, requests carrying it in X-Load-Test-Token skip the limiters.
 */
export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  bypassSecret: process.env.RATE_LIMIT_BYPASS_SECRET || (isTest ? 'test-bypass-secret' : ''),

  // Every route except health and metrics
  global: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    maxRequests: isProduction
      ? parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10)
      : isTest
      ? 10000
      : parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '1000', 10),
  },

  // POST /auth/token
  auth: {
    windowMs: parseInt(process.env.AUTH_RATE_LIMIT_WINDOW_MS || '900000', 10),
    maxRequests: isProduction
      ? parseInt(process.env.AUTH_RATE_LIMIT_MAX || '10', 10)
      : isTest
      ? 10000
      : parseInt(process.env.AUTH_RATE_LIMIT_MAX || '100', 10),
  },

  // State-changing ledger calls, per caller address
  ledgerCall: {
    windowMs: parseInt(process.env.LEDGER_RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
    maxRequests: isProduction
      ? parseInt(process.env.LEDGER_RATE_LIMIT_MAX || '30', 10)
      : isTest
      ? 10000
      : parseInt(process.env.LEDGER_RATE_LIMIT_MAX || '300', 10),
  },
};

// =============================================================================
// TRACING CONFIGURATION
// =============================================================================

export const TRACING_CONFIG = {
  enabled: !isTest && process.env.TRACING_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'token-escrow-ledger',
  otlpEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  corsOrigins: isProduction
    ? (process.env.CORS_ORIGINS || '').split(',').filter(Boolean)
    : ['http://localhost:3000', 'http://localhost:3001', 'http://127.0.0.1:3000'],
};

// =============================================================================
// LOGGING CONFIGURATION
// =============================================================================

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 * Call this during app startup in production
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'JWT_SECRET',
    'MONGODB_URI',
    'REDIS_HOST',
    'LEDGER_OWNER_ADDRESS',
    'BRIDGE_MANAGER_ADDRESS',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables for production: ${missing.join(', ')}`
    );
  }

  if (JWT_SECRET.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  isLocalDev,
  mongoHost: MONGODB_URI.replace(/^mongodb(\+srv)?:\/\//, '').split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  persistenceEnabled: LEDGER_CONFIG.persistenceEnabled,
  rateLimitingDisabled: RATE_LIMIT_CONFIG.disabled,
  tracingEnabled: TRACING_CONFIG.enabled,
});

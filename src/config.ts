/**
 * Centralized configuration for the vitals session server.
 *
 * This file extracts all configurable values from the codebase into a single location.
 * Values can be overridden via environment variables where noted.
 *
 * Configuration categories:
 * - Server: HTTP server settings (port, host, body limits)
 * - Auth: API token settings (token format, headers)
 * - RateLimit: Request rate limiting
 * - CORS: Cross-origin resource sharing
 * - FileLock: File locking for concurrent writes
 * - Storage: Local data directory and collection keys
 * - Session: Measurement session policies
 * - Analytics: Rolling windows and trend thresholds
 * - Sync: Remote store location and timeouts
 * - Retry: Retry logic for remote store I/O
 * - Backup: Backup bundle format
 */

import type { RestartPolicy } from './types';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Safely parse an integer from an environment variable.
 * Throws a descriptive error if the value is not a valid number.
 *
 * @param value - The raw environment variable value (or undefined)
 * @param defaultValue - Default value if env var is not set
 * @param variableName - Name of the environment variable (for error messages)
 * @throws TypeError if value is set but not a valid integer
 */
function parseIntSafe(
  value: string | undefined,
  defaultValue: number,
  variableName: string,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new TypeError(`Invalid ${variableName}: "${value}" is not a valid integer`);
  }
  return parsed;
}

/**
 * Parse a boolean flag. Accepts "true"/"false"/"1"/"0".
 */
function parseBooleanSafe(
  value: string | undefined,
  defaultValue: boolean,
  variableName: string,
): boolean {
  if (!value) return defaultValue;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new TypeError(`Invalid ${variableName}: "${value}" is not a boolean`);
}

/**
 * A missing or zero cap means "no cap".
 */
function parseReadingCap(value: string | undefined): number | null {
  const parsed = parseIntSafe(value, 0, 'MAX_READINGS_PER_SESSION');
  if (parsed < 0) {
    throw new TypeError(`Invalid MAX_READINGS_PER_SESSION: "${String(value)}" must be >= 0`);
  }
  return parsed === 0 ? null : parsed;
}

function parseRestartPolicy(value: string | undefined): RestartPolicy {
  if (!value) return 'reset';
  if (value === 'reset' || value === 'keep') return value;
  throw new TypeError(`Invalid SESSION_RESTART_POLICY: "${value}" (expected "reset" or "keep")`);
}

// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

export const ServerConfig = {
  /**
   * Server port.
   * @env PORT
   * @default 3001
   */
  port: parseIntSafe(process.env.PORT, 3001, 'PORT'),

  /**
   * Server bind address.
   * @default '0.0.0.0'
   */
  host: '0.0.0.0',

  /**
   * Maximum request body size for JSON payloads.
   * Backup restores carry the whole history.
   * @default '10mb'
   */
  bodyLimit: '10mb',

  /**
   * Graceful shutdown timeout in milliseconds.
   * @default 10000 (10 seconds)
   */
  shutdownTimeoutMs: 10_000,
} as const;

// =============================================================================
// REQUEST CONFIGURATION
// =============================================================================

export const RequestConfig = {
  /**
   * Maximum request processing time in milliseconds.
   * Requests exceeding this will receive a 408 timeout response.
   * @default 60000 (1 minute)
   */
  timeoutMs: 60_000,
} as const;

// =============================================================================
// AUTHENTICATION CONFIGURATION
// =============================================================================

export const AuthConfig = {
  /**
   * Required prefix for API tokens.
   * @default 'sk-'
   */
  tokenPrefix: 'sk-',

  /**
   * HTTP header name for the API token.
   * @default 'api-key'
   */
  headerName: 'api-key',

  /**
   * Environment variable name for the API token.
   * @default 'API_TOKEN'
   */
  tokenEnvVar: 'API_TOKEN',
} as const;

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

const RATE_LIMIT_WINDOW_MS = 60_000;

export const RateLimitConfig = {
  /**
   * Maximum requests allowed per IP address within the time window.
   * @default 120
   */
  maxRequests: 120,

  /**
   * Rate limit time window in milliseconds.
   * @default 60000 (1 minute)
   */
  windowMs: RATE_LIMIT_WINDOW_MS,

  /**
   * Paths excluded from rate limiting.
   * @default ['/health']
   */
  skipPaths: ['/health'],
} as const;

// =============================================================================
// CORS CONFIGURATION
// =============================================================================

export const CorsConfig = {
  /**
   * Allowed HTTP headers for CORS requests.
   */
  allowedHeaders: ['Content-Type', 'Authorization', 'api-key'],

  /**
   * Allowed HTTP methods for CORS requests.
   */
  allowedMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],

  /**
   * Environment variable name for CORS origins (comma-separated).
   * If not set or set to '*', allows all origins.
   * @env CORS_ORIGINS
   */
  originsEnvVar: 'CORS_ORIGINS',
} as const;

// =============================================================================
// FILE LOCKING CONFIGURATION
// =============================================================================

const FILE_LOCK_RETRY_DELAY_MS = 50;
const FILE_LOCK_MAX_RETRIES = 100;

export const FileLockConfig = {
  /**
   * Delay between lock acquisition retry attempts in milliseconds.
   * @default 50
   */
  retryDelayMs: FILE_LOCK_RETRY_DELAY_MS,

  /**
   * Maximum number of lock acquisition attempts.
   * @default 100
   */
  maxRetries: FILE_LOCK_MAX_RETRIES,

  /**
   * Time in milliseconds before a lock is considered stale.
   * @default 30000 (30 seconds)
   */
  staleTimeoutMs: 30_000,
} as const;

// =============================================================================
// STORAGE CONFIGURATION
// =============================================================================

export const StorageConfig = {
  /**
   * Directory holding the local key→blob documents.
   * @env DATA_DIR
   * @default './data'
   */
  dataDir: process.env.DATA_DIR ?? './data',

  /**
   * Subdirectory for backup bundles written by the server.
   * @default 'backups'
   */
  backupsDir: 'backups',

  /**
   * Document keys. One JSON document per key.
   */
  keys: {
    currentSessions: 'currentSessions',
    healthMetrics: 'healthMetrics',
    measurementSessions: 'measurementSessions',
    profile: 'profile',
    workoutSessions: 'workoutSessions',
  },
} as const;

// =============================================================================
// SESSION CONFIGURATION
// =============================================================================

export const SessionConfig = {
  /**
   * Maximum readings per measurement session. `null` means unlimited.
   * @env MAX_READINGS_PER_SESSION (unset or 0 = unlimited)
   * @default null
   */
  maxReadingsPerSession: parseReadingCap(process.env.MAX_READINGS_PER_SESSION),

  /**
   * What starting an already-active measurement session does to its start time.
   * @env SESSION_RESTART_POLICY
   * @default 'reset'
   */
  restartPolicy: parseRestartPolicy(process.env.SESSION_RESTART_POLICY),

  /**
   * Start an inactive measurement session when a reading or metric arrives.
   * @env AUTO_START_ON_READING
   * @default true
   */
  autoStartOnReading: parseBooleanSafe(
    process.env.AUTO_START_ON_READING,
    true,
    'AUTO_START_ON_READING',
  ),
} as const;

// =============================================================================
// ANALYTICS CONFIGURATION
// =============================================================================

export const AnalyticsConfig = {
  /**
   * Rolling average window sizes in days.
   */
  rollingWindowDays: [3, 7, 14, 21, 30],

  /**
   * Absolute change in average working weight (lbs) beyond which
   * a fitness trend counts as increasing or decreasing.
   * @default 5
   */
  fitnessTrendThresholdLbs: 5,

  /**
   * Relative change (percent) beyond which a standalone metric trend
   * counts as increasing or decreasing.
   * @default 5
   */
  metricTrendThresholdPercent: 5,

  /**
   * Default lookback for standalone metric summaries.
   * @default 30
   */
  metricSummaryDays: 30,
} as const;

// =============================================================================
// SYNC CONFIGURATION
// =============================================================================

export const SyncConfig = {
  /**
   * Upper bound for each remote store call in milliseconds.
   * @env SYNC_TIMEOUT_MS
   * @default 30000
   */
  timeoutMs: parseIntSafe(process.env.SYNC_TIMEOUT_MS, 30_000, 'SYNC_TIMEOUT_MS'),

  /**
   * Directory backing the file remote store.
   * @env REMOTE_STORE_DIR
   * @default './remote-data'
   */
  remoteStoreDir: process.env.REMOTE_STORE_DIR ?? './remote-data',
} as const;

// =============================================================================
// RETRY CONFIGURATION
// =============================================================================

export const RetryConfig = {
  /**
   * Maximum attempts for remote store file operations.
   * @default 3
   */
  maxRetries: 3,

  /**
   * Base delay for exponential backoff in milliseconds.
   * Actual delay = baseDelayMs * 2^attemptNumber.
   * @default 200
   */
  baseDelayMs: 200,
} as const;

// =============================================================================
// BACKUP CONFIGURATION
// =============================================================================

export const BackupConfig = {
  /**
   * Format version written into every bundle. Parsing rejects other versions.
   */
  formatVersion: '1.0',
} as const;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HttpStatus = {
  BAD_REQUEST: 400,
  CONFLICT: 409,
  CREATED: 201,
  INTERNAL_SERVER_ERROR: 500,
  NOT_FOUND: 404,
  OK: 200,
  REQUEST_TIMEOUT: 408,
  SERVICE_UNAVAILABLE: 503,
  TOO_MANY_REQUESTS: 429,
  UNAUTHORIZED: 401,
  UNPROCESSABLE_ENTITY: 422,
} as const;

// =============================================================================
// COMBINED EXPORT
// =============================================================================

/**
 * Complete application configuration.
 */
export const config = {
  analytics: AnalyticsConfig,
  auth: AuthConfig,
  backup: BackupConfig,
  cors: CorsConfig,
  fileLock: FileLockConfig,
  httpStatus: HttpStatus,
  rateLimit: RateLimitConfig,
  request: RequestConfig,
  retry: RetryConfig,
  server: ServerConfig,
  session: SessionConfig,
  storage: StorageConfig,
  sync: SyncConfig,
} as const;

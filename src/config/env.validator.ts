/**
 * Environment Variable Validator
 * Validates required environment variables on startup
 */

import { logger } from '../utils/logger';

const requiredEnvVars = [
  'NODE_ENV',
  'PORT',
  'RABBITMQ_URL',
  'LOG_LEVEL',
] as const;

const numericEnvVars = [
  'PORT',
  'DB_PORT',
  'DB_POOL_MAX',
  'DB_STATEMENT_TIMEOUT',
  'PROMO_CODE_SUFFIX_LENGTH',
  'PROMO_CODE_MAX_GENERATION_ATTEMPTS',
  'REDEEM_MAX_ATTEMPTS',
  'REDEEM_RETRY_INITIAL_DELAY_MS',
  'REDEEM_RETRY_MAX_DELAY_MS',
  'DISPATCH_BATCH_SIZE',
  'CAMPAIGN_SCHEDULER_INTERVAL_SECONDS',
  'CAMPAIGN_METRICS_INTERVAL_SECONDS',
  'PROMO_RECONCILIATION_INTERVAL_SECONDS',
];

const validEnvs = ['development', 'staging', 'production', 'test'];
const validLogLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface EnvValidationResult {
  errors: string[];
  warnings: string[];
}

export function collectEnvironmentErrors(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const varName of requiredEnvVars) {
    if (!env[varName]) {
      errors.push(`Missing required environment variable: ${varName}`);
    }
  }

  if (!env.DATABASE_URL && !env.DB_HOST) {
    errors.push('Either DATABASE_URL or DB_HOST must be set');
  }

  for (const varName of numericEnvVars) {
    const value = env[varName];
    if (value !== undefined && isNaN(parseInt(value, 10))) {
      errors.push(`${varName} must be a valid number`);
    }
  }

  if (env.NODE_ENV && !validEnvs.includes(env.NODE_ENV)) {
    errors.push(`NODE_ENV must be one of: ${validEnvs.join(', ')}`);
  }

  if (env.LOG_LEVEL && !validLogLevels.includes(env.LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be one of: ${validLogLevels.join(', ')}`);
  }

  if (env.RABBITMQ_URL && !/^amqps?:\/\//.test(env.RABBITMQ_URL)) {
    errors.push('RABBITMQ_URL must start with amqp:// or amqps://');
  }

  if (env.NODE_ENV === 'production' && env.REDEEM_MAX_ATTEMPTS === '1') {
    warnings.push('REDEEM_MAX_ATTEMPTS=1 disables contention retries for promo redemption');
  }

  return { errors, warnings };
}

export function validateEnvironment(): void {
  const { errors, warnings } = collectEnvironmentErrors();

  for (const warning of warnings) {
    logger.warn(warning);
  }

  if (errors.length > 0) {
    logger.error({ errors }, 'Environment validation failed');
    throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
  }

  logger.info('Environment variables validated successfully');
}

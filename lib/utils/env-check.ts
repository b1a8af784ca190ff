/**
 * Environment validation utility
 *
 * Call at worker startup to make sure the storage and payment integrations
 * are configured.
 */

import { loadOrderConfig } from '@/lib/config/order-config';
import { createLogger, errorMessage } from '@/lib/security/logger';

const log = createLogger('env-check');

export interface EnvCheckResult {
  valid: boolean;
  missing: string[];
  warnings: string[];
}

const REQUIRED_VARS = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'];

const RECOMMENDED_VARS = ['STRIPE_SECRET_KEY', 'INNGEST_EVENT_KEY', 'INNGEST_SIGNING_KEY'];

const PLACEHOLDER_VALUES = ['xxxxx', 'your-key-here', 'changeme', 'placeholder'];

export function isPlaceholder(value: string): boolean {
  const lower = value.toLowerCase();
  return PLACEHOLDER_VALUES.some((p) => lower.includes(p));
}

export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): EnvCheckResult {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const name of REQUIRED_VARS) {
    const value = env[name];
    if (!value || isPlaceholder(value)) {
      missing.push(name);
    }
  }

  for (const name of RECOMMENDED_VARS) {
    const value = env[name];
    if (!value || isPlaceholder(value)) {
      warnings.push(`${name} not configured - some features may not work`);
    }
  }

  try {
    loadOrderConfig(env);
  } catch (error) {
    missing.push(`order settings invalid: ${errorMessage(error)}`);
  }

  return { valid: missing.length === 0, missing, warnings };
}

export function logEnvironmentCheck(env: NodeJS.ProcessEnv = process.env): EnvCheckResult {
  const result = checkEnvironment(env);

  if (!result.valid) {
    log.error('Environment validation failed', { missing: result.missing });
  } else {
    log.info('Environment validation passed');
  }

  for (const warning of result.warnings) {
    log.warn(warning);
  }

  return result;
}

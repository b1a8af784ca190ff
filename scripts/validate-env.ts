/**
 * Environment Validation Script
 *
 * Run: npm run validate-env
 *
 * Exit code 1 on missing required vars.
 */

import { logEnvironmentCheck } from '../lib/utils/env-check';

const result = logEnvironmentCheck();
if (!result.valid) {
  process.exitCode = 1;
}

/**
 * Environment Variable Validation
 * Fails startup with the full list of missing or invalid variables
 */

import { isZeroAddress } from '@swapbook/shared';
import { parseMinimumOrderAmounts } from './config';

interface EnvValidationError {
  variable: string;
  issue: string;
}

export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  const errors: EnvValidationError[] = [];

  validateRequired(env, 'NODE_ENV', errors);
  validateRequired(env, 'PORT', errors);
  validateRequired(env, 'DATABASE_URL', errors);
  validateRequired(env, 'REDIS_URL', errors);
  validateRequired(env, 'JWT_SECRET', errors);
  validateRequired(env, 'ESCROW_ADMIN_ADDRESS', errors);
  validateRequired(env, 'ESCROW_CUSTODY_ADDRESS', errors);
  validateRequired(env, 'ESCROW_FEE_RECIPIENT', errors);

  const jwtSecret = env.JWT_SECRET;
  if (jwtSecret && jwtSecret.length < 32) {
    errors.push({
      variable: 'JWT_SECRET',
      issue: 'Must be at least 32 characters long',
    });
  }

  for (const name of ['ESCROW_ADMIN_ADDRESS', 'ESCROW_CUSTODY_ADDRESS', 'ESCROW_FEE_RECIPIENT']) {
    const value = env[name];
    if (value && isZeroAddress(value)) {
      errors.push({ variable: name, issue: 'Must not be the zero address' });
    }
  }

  const feeRecipient = env.ESCROW_FEE_RECIPIENT;
  if (feeRecipient && feeRecipient === env.ESCROW_CUSTODY_ADDRESS) {
    errors.push({
      variable: 'ESCROW_FEE_RECIPIENT',
      issue: 'Must differ from ESCROW_CUSTODY_ADDRESS',
    });
  }

  try {
    parseMinimumOrderAmounts(env.ESCROW_MIN_ORDER_AMOUNTS);
  } catch (error) {
    errors.push({
      variable: 'ESCROW_MIN_ORDER_AMOUNTS',
      issue: error instanceof Error ? error.message : 'Invalid value',
    });
  }

  if (errors.length > 0) {
    const errorMessages = errors.map((err) => `  - ${err.variable}: ${err.issue}`).join('\n');

    throw new Error(
      `Environment validation failed. Fix the following issues:\n\n${errorMessages}\n\n` +
        `See .env.example for required variables.`
    );
  }
}

function validateRequired(env: NodeJS.ProcessEnv, name: string, errors: EnvValidationError[]): void {
  const value = env[name];

  if (!value || value.trim() === '') {
    errors.push({
      variable: name,
      issue: 'Required but not set',
    });
  }
}

/**
 * Massing Configuration
 *
 * Resolves a partial configuration over the defaults and validates it.
 * The result is frozen and passed explicitly into every pipeline call;
 * nothing in the algorithm reads ambient state.
 */

import { z } from 'zod';
import { MassingConfig } from './types';
import {
  DEFAULT_POLICY_TABLE,
  DEFAULT_MODULE_CM,
  DEFAULT_HEIGHT_CM,
  DEFAULT_AREA_TOLERANCE,
  DEFAULT_MAX_PASSES,
  MODULE_RANGE_CM
} from './constants';
import { PolicyTableSchema } from './proportion-policy';
import { Logger } from './utils/logger';

/**
 * Error thrown when a configuration cannot be used.
 * Row-level problems never throw; see MassingIssue.
 */
export class MassingConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MassingConfigError';
  }
}

export const MassingConfigSchema = z.object({
  moduleCm: z.number().int().min(MODULE_RANGE_CM[0]).max(MODULE_RANGE_CM[1]),
  heightCm: z.number().positive(),
  areaTolerance: z.number().gt(0).lt(1),
  maxPasses: z.number().int().min(1),
  policies: PolicyTableSchema
});

/**
 * Format zod issues as "path: message; path: message".
 */
export const formatZodIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

/**
 * Merge `overrides` over the defaults, validate, and freeze.
 * An override left `undefined` keeps its default.
 *
 * @throws {MassingConfigError} If any value is out of range
 */
export function resolveConfig(overrides: Partial<MassingConfig> = {}): Readonly<MassingConfig> {
  const candidate: MassingConfig = {
    moduleCm: overrides.moduleCm ?? DEFAULT_MODULE_CM,
    heightCm: overrides.heightCm ?? DEFAULT_HEIGHT_CM,
    areaTolerance: overrides.areaTolerance ?? DEFAULT_AREA_TOLERANCE,
    maxPasses: overrides.maxPasses ?? DEFAULT_MAX_PASSES,
    policies: overrides.policies ?? DEFAULT_POLICY_TABLE
  };

  const parsed = MassingConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const message = `Invalid massing configuration: ${formatZodIssues(parsed.error)}`;
    Logger.error(message);
    throw new MassingConfigError(message);
  }

  return Object.freeze({ ...candidate });
}

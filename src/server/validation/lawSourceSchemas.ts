/**
 * Law Source Validation Schemas
 *
 * Zod schemas for caller-supplied law source overrides (e.g. from an upload form).
 */

import { z } from 'zod';
import { LAW_TYPES } from '../types/legal.js';
import type { LawSourceOverrides } from '../types/legal.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

export const lawSourceOverridesSchema = z
  .object({
    name: z.string().trim().min(1, 'Name must not be empty').nullish(),
    type: z.enum(LAW_TYPES).nullish(),
    jurisdiction: z.string().trim().min(1, 'Jurisdiction must not be empty').nullish(),
    issuingAuthority: z.string().nullish(),
    issueDate: isoDate.nullish(),
    lastUpdate: isoDate.nullish(),
    description: z.string().nullish(),
    sourceUrl: z.string().url('Source URL must be a valid URL').nullish(),
  })
  .strict();

export interface OverridesValidationIssue {
  field: string;
  message: string;
}

export type OverridesValidationResult =
  | { success: true; data: LawSourceOverrides }
  | { success: false; issues: OverridesValidationIssue[] };

function issueField(issue: z.ZodIssue): string {
  if (issue.path.length > 0) {
    return issue.path.join('.');
  }
  // Unknown keys are reported on the object itself
  return issue.code === 'unrecognized_keys' ? issue.keys.join(',') : 'lawSourceOverrides';
}

/**
 * Validate overrides; `field` of the first issue names the offending key
 */
export function validateLawSourceOverrides(input: unknown): OverridesValidationResult {
  const parsed = lawSourceOverridesSchema.safeParse(input ?? {});
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }

  return {
    success: false,
    issues: parsed.error.issues.map((issue) => ({
      field: issueField(issue),
      message: issue.message,
    })),
  };
}

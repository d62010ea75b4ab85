/**
 * Persisted effectiveness record schema
 */

import { z } from 'zod';
import { RuleCategory } from '../../shared/types/rule.js';
import { EffectivenessStatus, type RuleEffectiveness } from './types.js';

const count = z.number().int().nonnegative();

export const ruleEffectivenessSchema: z.ZodType<RuleEffectiveness, z.ZodTypeDef, unknown> = z
  .object({
    ruleId: z.string().min(1),
    ruleName: z.string(),
    category: z.nativeEnum(RuleCategory),
    totalValidations: count,
    passedValidations: count,
    failedValidations: count,
    feedbackCount: count,
    positiveFeedback: count,
    negativeFeedback: count,
    averageSeverity: z.number().nonnegative(),
    status: z.nativeEnum(EffectivenessStatus),
    lastUpdated: z.coerce.date(),
  })
  .refine(
    (record) => record.passedValidations + record.failedValidations === record.totalValidations,
    { message: 'passedValidations + failedValidations must equal totalValidations' }
  )
  .refine(
    (record) => record.positiveFeedback + record.negativeFeedback === record.feedbackCount,
    { message: 'positiveFeedback + negativeFeedback must equal feedbackCount' }
  );

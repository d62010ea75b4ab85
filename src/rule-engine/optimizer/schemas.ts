/**
 * Optimization history schemas (persisted records and imported documents)
 */

import { z } from 'zod';
import {
  OptimizationStrategy,
  type OptimizationHistoryRecord,
  type OptimizationResult,
} from './types.js';

export const optimizationResultSchema: z.ZodType<OptimizationResult, z.ZodTypeDef, unknown> = z.object({
  ruleId: z.string().min(1),
  parameterName: z.string().min(1),
  originalValue: z.number(),
  optimizedValue: z.number(),
  improvement: z.number(),
  strategy: z.nativeEnum(OptimizationStrategy),
  metrics: z.record(z.number()),
  createdAt: z.coerce.date(),
});

export const optimizationHistoryRecordSchema: z.ZodType<OptimizationHistoryRecord, z.ZodTypeDef, unknown> =
  z.object({
    ruleId: z.string().min(1),
    optimizations: z.array(optimizationResultSchema),
  });

import { z } from 'zod';

export const rejectionReasonSchema = z.enum(['TooLarge', 'EmptyPayload', 'UnsupportedType', 'Malformed']);
export type RejectionReason = z.infer<typeof rejectionReasonSchema>;

export const apiErrorSchema = z.object({
  message: z.string(),
  reason: rejectionReasonSchema.optional()
});
export type ApiErrorBody = z.infer<typeof apiErrorSchema>;

export const healthStatusSchema = z.object({
  status: z.enum(['ok', 'degraded']),
  modelLoaded: z.boolean()
});
export type HealthStatus = z.infer<typeof healthStatusSchema>;

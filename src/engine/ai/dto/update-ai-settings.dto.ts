import { z } from 'zod';

export const UpdateAiSettingsBodySchema = z
  .object({
    defensiveHpThreshold: z.number().min(0).max(1),
    supportHealThreshold: z.number().min(0).max(1),
    focusMinUnits: z.number().int().min(2).max(12),
    defaultProfile: z.string().min(1).max(50),
    decisionLogEnabled: z.boolean(),
  })
  .partial()
  .strict();

export type UpdateAiSettingsBody = z.infer<typeof UpdateAiSettingsBodySchema>;

import { z } from 'zod';

export const OpenBattleBodySchema = z.object({
  battleId: z.string().min(1).max(100),
});

export type OpenBattleBody = z.infer<typeof OpenBattleBodySchema>;

import { z } from 'zod';
import { BattleSnapshotSchema } from './battle-snapshot.dto.js';

export const RunAiTurnBodySchema = z.object({
  unitId: z.string().min(1).max(100),
  snapshot: BattleSnapshotSchema,
});

export type RunAiTurnBody = z.infer<typeof RunAiTurnBodySchema>;

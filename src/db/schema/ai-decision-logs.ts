import {
  integer,
  jsonb,
  pgTable,
  real,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import type { AiAction } from '../types/index.js';

export const aiDecisionLogs = pgTable('ai_decision_logs', {
  id: uuid('id').primaryKey().defaultRandom(),
  battleId: text('battle_id').notNull(),
  round: integer('round').notNull(),
  unitId: text('unit_id').notNull(),
  profile: text('profile').notNull(),
  action: jsonb('action').$type<AiAction>().notNull(),
  intentTargetId: text('intent_target_id'),
  rationale: text('rationale').notNull(),
  score: real('score'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

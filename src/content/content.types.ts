// 컨텐츠 시드 데이터 스키마 (content/*.json 대응)

import { z } from 'zod';
import {
  AI_PROFILE,
  RESOURCE_KIND,
  SKILL_EFFECT,
  SKILL_TARGETING,
  UNIT_ROLE,
} from '../db/types/index.js';

export const SkillDefinitionSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  cost: z.object({
    resource: z.enum(RESOURCE_KIND),
    amount: z.number().min(0),
  }),
  cooldown: z.number().int().min(0),
  targeting: z.enum(SKILL_TARGETING),
  effect: z.enum(SKILL_EFFECT),
  range: z.number().int().min(0),
  minRange: z.number().int().min(0).optional(),
  power: z.number().min(0),
  radius: z.number().int().min(0).optional(),
  hitsAllies: z.boolean().optional(),
  statusId: z.string().min(1).optional(),
  maxStacks: z.number().int().min(1).optional(),
  comboStatus: z.string().min(1).optional(),
  basic: z.boolean().optional(),
});

export const ArchetypeDefinitionSchema = z.object({
  archetypeId: z.string().min(1),
  name: z.string(),
  aiProfile: z.enum(AI_PROFILE),
  role: z.enum(UNIT_ROLE).optional(),
  skills: z.array(z.string()).default([]),
});

export type ArchetypeDefinition = z.infer<typeof ArchetypeDefinitionSchema>;

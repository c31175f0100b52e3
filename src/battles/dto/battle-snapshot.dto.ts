import { z } from 'zod';
import { DIRECTION, SIDE, UNIT_ROLE } from '../../db/types/index.js';
import { SkillDefinitionSchema } from '../../content/content.types.js';

const GridPosSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

const BattleUnitSchema = z.object({
  id: z.string().min(1).max(100),
  name: z.string().optional(),
  side: z.enum(SIDE),
  hp: z.number().min(0),
  maxHp: z.number(),
  resources: z
    .object({
      stamina: z.number().min(0).default(0),
      mana: z.number().min(0).default(0),
    })
    .default({}),
  pos: GridPosSchema,
  attack: z.number().min(0).default(0),
  weaponRange: z.number().int().min(0).default(1),
  movement: z.number().int().min(0).default(3),
  facing: z.enum(DIRECTION).optional(),
  role: z.enum(UNIT_ROLE).optional(),
  statuses: z
    .array(
      z.object({
        id: z.string().min(1),
        stacks: z.number().int().min(1).default(1),
        duration: z.number().int().min(0).default(1),
      }),
    )
    .default([]),
  skills: z.array(
    z.object({
      skillId: z.string().min(1),
      cooldown: z.number().int().min(0).default(0),
    }),
  ),
  aiProfile: z.string().max(50).optional(),
  archetypeId: z.string().max(100).optional(),
});

export const BattleSnapshotSchema = z.object({
  battleId: z.string().min(1).max(100),
  round: z.number().int().min(0),
  grid: z.object({
    width: z.number().int().min(1).max(64),
    height: z.number().int().min(1).max(64),
    blocked: z.array(GridPosSchema).default([]),
  }),
  units: z.array(BattleUnitSchema).min(1).max(64),
  // 카탈로그 위에 덮어쓸 스킬 정의
  skills: z.array(SkillDefinitionSchema).default([]),
});

export type BattleSnapshotBody = z.infer<typeof BattleSnapshotSchema>;

// 전투 AI 공통 열거형

export const SIDE = ['PLAYER', 'ENEMY'] as const;
export type Side = (typeof SIDE)[number];

export const UNIT_ROLE = ['TANK', 'MELEE', 'RANGED', 'CASTER', 'SUPPORT'] as const;
export type UnitRole = (typeof UNIT_ROLE)[number];

export const RESOURCE_KIND = ['stamina', 'mana'] as const;
export type ResourceKind = (typeof RESOURCE_KIND)[number];

export const SKILL_TARGETING = ['ENEMY', 'ALLY', 'SELF', 'AREA'] as const;
export type SkillTargeting = (typeof SKILL_TARGETING)[number];

export const SKILL_EFFECT = ['DAMAGE', 'HEAL', 'BUFF', 'DEBUFF', 'STATUS'] as const;
export type SkillEffect = (typeof SKILL_EFFECT)[number];

export const AI_PROFILE = [
  'brute',
  'skirmisher',
  'caster',
  'support',
  'berserker',
  'defender',
  'assassin',
  'commander',
  'controller',
  'tactician',
] as const;

export const DIRECTION = ['N', 'E', 'S', 'W'] as const;
export type Direction = (typeof DIRECTION)[number];

// 테스트용 스냅샷/서비스 조립 헬퍼

import type {
  BattleSnapshot,
  BattleUnit,
  GridPos,
  SkillDefinition,
} from '../../../db/types/index.js';
import { BattleAiConfigService } from '../battle-ai-config.service.js';
import { BattleAiService } from '../battle-ai.service.js';
import { BattleView } from '../battle-view.js';
import { CoordinationManager } from '../coordination.js';
import { PositioningService } from '../positioning.service.js';
import { ProfileRegistryService } from '../profile-registry.service.js';
import { registerBuiltInProfiles, type AiTurnContext } from '../profiles/index.js';
import { SkillPriorityService } from '../skill-priority.service.js';
import { ThreatService } from '../threat.service.js';

export const SKILLS: Record<string, SkillDefinition> = {
  strike: {
    id: 'strike',
    cost: { resource: 'stamina', amount: 0 },
    cooldown: 0,
    targeting: 'ENEMY',
    effect: 'DAMAGE',
    range: 1,
    power: 4,
    basic: true,
  },
  slash: {
    id: 'slash',
    cost: { resource: 'stamina', amount: 2 },
    cooldown: 1,
    targeting: 'ENEMY',
    effect: 'DAMAGE',
    range: 1,
    power: 8,
  },
  backstab: {
    id: 'backstab',
    cost: { resource: 'stamina', amount: 3 },
    cooldown: 2,
    targeting: 'ENEMY',
    effect: 'DAMAGE',
    range: 1,
    power: 10,
    comboStatus: 'MARKED',
  },
  rage: {
    id: 'rage',
    cost: { resource: 'stamina', amount: 0 },
    cooldown: 4,
    targeting: 'SELF',
    effect: 'BUFF',
    range: 0,
    power: 0,
    statusId: 'EMPOWERED',
  },
  staff_hit: {
    id: 'staff_hit',
    cost: { resource: 'mana', amount: 0 },
    cooldown: 0,
    targeting: 'ENEMY',
    effect: 'DAMAGE',
    range: 1,
    power: 2,
    basic: true,
  },
  firebolt: {
    id: 'firebolt',
    cost: { resource: 'mana', amount: 3 },
    cooldown: 0,
    targeting: 'ENEMY',
    effect: 'DAMAGE',
    range: 5,
    power: 7,
  },
  fireball: {
    id: 'fireball',
    cost: { resource: 'mana', amount: 6 },
    cooldown: 2,
    targeting: 'AREA',
    effect: 'DAMAGE',
    range: 5,
    minRange: 2,
    power: 6,
    radius: 1,
    hitsAllies: true,
  },
  hex: {
    id: 'hex',
    cost: { resource: 'mana', amount: 2 },
    cooldown: 2,
    targeting: 'ENEMY',
    effect: 'DEBUFF',
    range: 4,
    power: 2,
    statusId: 'WEAKEN',
  },
  mark_prey: {
    id: 'mark_prey',
    cost: { resource: 'stamina', amount: 1 },
    cooldown: 2,
    targeting: 'ENEMY',
    effect: 'DEBUFF',
    range: 3,
    power: 0,
    statusId: 'MARKED',
  },
  cleave: {
    id: 'cleave',
    cost: { resource: 'stamina', amount: 4 },
    cooldown: 2,
    targeting: 'AREA',
    effect: 'DAMAGE',
    range: 1,
    power: 6,
    radius: 1,
    hitsAllies: true,
  },
  war_cry: {
    id: 'war_cry',
    cost: { resource: 'stamina', amount: 3 },
    cooldown: 4,
    targeting: 'AREA',
    effect: 'BUFF',
    range: 0,
    power: 0,
    radius: 2,
    statusId: 'EMPOWERED',
  },
  mend: {
    id: 'mend',
    cost: { resource: 'mana', amount: 3 },
    cooldown: 0,
    targeting: 'ALLY',
    effect: 'HEAL',
    range: 3,
    power: 10,
  },
  bless: {
    id: 'bless',
    cost: { resource: 'mana', amount: 2 },
    cooldown: 3,
    targeting: 'ALLY',
    effect: 'BUFF',
    range: 3,
    power: 0,
    statusId: 'EMPOWERED',
  },
};

type UnitOverrides = Partial<Omit<BattleUnit, 'skills'>> & { skills?: string[] };

export function unit(id: string, pos: GridPos, overrides: UnitOverrides = {}): BattleUnit {
  const { skills = ['strike'], ...rest } = overrides;
  return {
    id,
    side: 'ENEMY',
    hp: 20,
    maxHp: 20,
    resources: { stamina: 10, mana: 10 },
    pos,
    attack: 0,
    weaponRange: 1,
    movement: 3,
    statuses: [],
    ...rest,
    skills: skills.map((skillId) => ({ skillId, cooldown: 0 })),
  };
}

export function snapshot(
  units: BattleUnit[],
  grid: Partial<BattleSnapshot['grid']> = {},
  skills: SkillDefinition[] = Object.values(SKILLS),
): BattleSnapshot {
  return {
    battleId: 'battle-1',
    round: 1,
    grid: { width: 8, height: 8, blocked: [], ...grid },
    units,
    skills,
  };
}

export function view(units: BattleUnit[], grid: Partial<BattleSnapshot['grid']> = {}): BattleView {
  return new BattleView(snapshot(units, grid));
}

export function createAiServices() {
  const config = new BattleAiConfigService();
  const threat = new ThreatService();
  const positioning = new PositioningService();
  const skills = new SkillPriorityService(positioning);
  const registry = new ProfileRegistryService(config);
  registerBuiltInProfiles(registry);
  const battleAi = new BattleAiService(config, registry, threat, skills, positioning);
  return { config, threat, positioning, skills, registry, battleAi };
}

export function turnContext(
  battleView: BattleView,
  coordination?: CoordinationManager,
): AiTurnContext {
  const { config, threat, positioning, skills } = createAiServices();
  return {
    view: battleView,
    threat,
    skills,
    positioning,
    coordination: coordination ?? new CoordinationManager(battleView.battleId, threat),
    config: config.get(),
  };
}

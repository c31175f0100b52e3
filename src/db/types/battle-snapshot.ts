// 배틀 엔진이 AI 턴마다 넘겨주는 읽기 전용 스냅샷

import type {
  Direction,
  ResourceKind,
  Side,
  SkillEffect,
  SkillTargeting,
  UnitRole,
} from './enums.js';

export type GridPos = {
  x: number;
  y: number;
};

export type BattleGrid = {
  width: number;
  height: number;
  blocked: GridPos[]; // 지형 장애물 (통과 불가)
};

export type StatusInstance = {
  id: string;
  stacks: number;
  duration: number;
};

export type SkillSlot = {
  skillId: string;
  cooldown: number; // 남은 쿨다운 턴 수, 0이면 사용 가능
};

export type ResourcePool = Record<ResourceKind, number>;

export type BattleUnit = {
  id: string;
  name?: string;
  side: Side;
  hp: number;
  maxHp: number;
  resources: ResourcePool;
  pos: GridPos;
  attack: number;
  weaponRange: number;
  movement: number; // 턴당 이동력 (4방향 칸 수)
  facing?: Direction;
  role?: UnitRole;
  statuses: StatusInstance[];
  skills: SkillSlot[]; // 선언 순서 = 동점 시 우선순위
  aiProfile?: string;
  archetypeId?: string;
};

export type SkillCost = {
  resource: ResourceKind;
  amount: number;
};

export type SkillDefinition = {
  id: string;
  name?: string;
  cost: SkillCost;
  cooldown: number;
  targeting: SkillTargeting;
  effect: SkillEffect;
  range: number;
  minRange?: number;
  power: number;
  radius?: number; // AREA 전용 (맨해튼 반경)
  hitsAllies?: boolean;
  statusId?: string;
  maxStacks?: number;
  comboStatus?: string; // 대상에게 이 상태가 있으면 연계 보너스
  basic?: boolean; // SILENCE 중에도 사용 가능한 기본기
};

export type BattleSnapshot = {
  battleId: string;
  round: number;
  grid: BattleGrid;
  units: BattleUnit[];
  skills: SkillDefinition[];
};

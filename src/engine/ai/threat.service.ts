// 위협 평가: 관찰자 기준 대상별 위협 점수와 순위

import { Injectable } from '@nestjs/common';
import type { BattleUnit, UnitRole } from '../../db/types/index.js';
import type { BattleView } from './battle-view.js';
import { manhattan } from './grid.js';

export interface ThreatEntry {
  target: BattleUnit;
  score: number;
}

/** 역할 가중치: 힐러를 먼저 끊어야 한다 */
const ROLE_WEIGHT: Record<UnitRole, number> = {
  SUPPORT: 15,
  CASTER: 10,
  RANGED: 5,
  MELEE: 0,
  TANK: -5,
};

// 상태/프로필 id 는 호출자가 보낸 임의 문자열이라 Map 으로만 조회한다
const STATUS_WEIGHT = new Map<string, number>([
  ['EMPOWERED', 10],
  ['MARKED', 6],
  ['STUN', -15],
  ['WEAKEN', -5],
]);

const PROFILE_ROLE = new Map<string, UnitRole>([
  ['brute', 'MELEE'],
  ['berserker', 'MELEE'],
  ['skirmisher', 'MELEE'],
  ['assassin', 'MELEE'],
  ['tactician', 'MELEE'],
  ['commander', 'MELEE'],
  ['defender', 'TANK'],
  ['caster', 'CASTER'],
  ['controller', 'CASTER'],
  ['support', 'SUPPORT'],
]);

export function roleOf(unit: BattleUnit): UnitRole {
  if (unit.role) return unit.role;
  const byProfile = unit.aiProfile ? PROFILE_ROLE.get(unit.aiProfile) : undefined;
  if (byProfile) return byProfile;
  return unit.weaponRange > 1 ? 'RANGED' : 'MELEE';
}

@Injectable()
export class ThreatService {
  /**
   * observer 가 target 을 얼마나 우선 처리해야 하는지.
   * 공격력 + 마무리 가능성 + 역할 + 상태 - 거리 패널티
   */
  calculateThreatValue(observer: BattleUnit, target: BattleUnit, view: BattleView): number {
    let threat = 0;

    // 공격 능력 (0~60)
    threat += Math.min(40, target.attack * 2);
    let bestPower = 0;
    for (const slot of target.skills) {
      const skill = view.getSkill(slot.skillId);
      if (skill?.effect === 'DAMAGE') bestPower = Math.max(bestPower, skill.power);
    }
    threat += Math.min(20, bestPower * 2);

    // 마무리 가능성 (0~40): HP가 낮을수록 높다
    threat += (1 - view.hpRatio(target)) * 40;

    threat += ROLE_WEIGHT[roleOf(target)];

    for (const status of target.statuses) {
      threat += STATUS_WEIGHT.get(status.id) ?? 0;
    }

    // 이번 턴 이동 + 사거리로 닿지 않는 거리만큼 감점
    const reach = observer.movement + view.reach(observer);
    const dist = manhattan(observer.pos, target.pos);
    threat -= 4 * Math.max(0, dist - reach);

    return threat;
  }

  /** 위협 내림차순. 동점은 현재 HP 오름차순, 그다음 id 순 */
  rankTargetsByThreat(
    observer: BattleUnit,
    candidates: readonly BattleUnit[],
    view: BattleView,
  ): ThreatEntry[] {
    return candidates
      .map((target) => ({
        target,
        score: this.calculateThreatValue(observer, target, view),
      }))
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.target.hp - b.target.hp ||
          (a.target.id < b.target.id ? -1 : a.target.id > b.target.id ? 1 : 0),
      );
  }
}

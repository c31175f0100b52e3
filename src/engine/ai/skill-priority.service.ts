// 스킬 우선순위: 상황별 스킬 가치 평가 (쿨다운/자원 불가 스킬은 평가 대상에서 제외)

import { Injectable } from '@nestjs/common';
import type { BattleUnit, GridPos, SkillDefinition } from '../../db/types/index.js';
import type { BattleView } from './battle-view.js';
import type { ThreatEntry } from './threat.service.js';
import { PositioningService } from './positioning.service.js';
import { manhattan } from './grid.js';

export interface SkillContext {
  view: BattleView;
  /** 위협 순으로 정렬된 적 목록 */
  ranked: ThreatEntry[];
  /** 지정 대상 (없으면 스킬 종류에 따라 자동 선택) */
  target?: BattleUnit;
}

export interface ScoredSkill {
  skill: SkillDefinition;
  score: number;
  order: number; // 유닛의 스킬 선언 순서
  target?: BattleUnit;
  cell?: GridPos;
  covered?: BattleUnit[];
  inRange: boolean;
}

const KILL_BONUS = 20;
const COMBO_BONUS = 15;
const REDUNDANT_PENALTY = -30;
const FRESH_STATUS_BONUS = 10;
const OFFENSIVE = new Set(['DAMAGE', 'DEBUFF', 'STATUS']);

export function isOffensive(skill: SkillDefinition): boolean {
  return OFFENSIVE.has(skill.effect) && skill.targeting !== 'SELF' && skill.targeting !== 'ALLY';
}

export function withinSkillRange(skill: SkillDefinition, from: GridPos, to: GridPos): boolean {
  const d = manhattan(from, to);
  return d >= (skill.minRange ?? 0) && d <= skill.range;
}

@Injectable()
export class SkillPriorityService {
  constructor(private readonly positioning: PositioningService) {}

  /** 쿨다운/자원/침묵 검사를 통과한 스킬 (선언 순서 유지) */
  usableSkills(unit: BattleUnit, view: BattleView): SkillDefinition[] {
    const silenced = view.hasStatus(unit, 'SILENCE');
    const result: SkillDefinition[] = [];
    for (const slot of unit.skills) {
      const skill = view.getSkill(slot.skillId);
      if (!skill) continue;
      if (slot.cooldown > 0) continue;
      if (skill.cost.amount > unit.resources[skill.cost.resource]) continue;
      if (silenced && !skill.basic) continue;
      result.push(skill);
    }
    return result;
  }

  isUsable(unit: BattleUnit, skillId: string, view: BattleView): boolean {
    return this.usableSkills(unit, view).some((s) => s.id === skillId);
  }

  estimateDamage(unit: BattleUnit, skill: SkillDefinition, view: BattleView): number {
    const raw = skill.power + unit.attack;
    return Math.round(view.hasStatus(unit, 'WEAKEN') ? raw * 0.85 : raw);
  }

  /** 사용 불가 스킬이면 null */
  evaluateSkillValue(
    unit: BattleUnit,
    skill: SkillDefinition,
    context: SkillContext,
  ): number | null {
    if (!this.isUsable(unit, skill.id, context.view)) return null;
    return this.score(unit, skill, context).score;
  }

  /** 점수 내림차순, 동점은 선언 순서 */
  prioritizeSkills(unit: BattleUnit, context: SkillContext): ScoredSkill[] {
    const order = new Map(unit.skills.map((slot, i) => [slot.skillId, i] as const));
    return this.usableSkills(unit, context.view)
      .map((skill) => ({
        ...this.score(unit, skill, context),
        order: order.get(skill.id) ?? 0,
      }))
      .sort((a, b) => b.score - a.score || a.order - b.order);
  }

  private score(
    unit: BattleUnit,
    skill: SkillDefinition,
    ctx: SkillContext,
  ): Omit<ScoredSkill, 'order'> {
    const { view } = ctx;

    if (skill.targeting === 'AREA') return this.scoreArea(unit, skill, ctx);

    const target = this.resolveTarget(unit, skill, ctx);
    if (!target) return { skill, score: REDUNDANT_PENALTY, inRange: false };

    let score = this.effectValue(unit, skill, target, view);
    if (skill.targeting === 'SELF' && view.hpRatio(unit) < 0.5) score += 20;
    score += this.economy(skill);

    const inRange =
      skill.targeting === 'SELF' || withinSkillRange(skill, unit.pos, target.pos);
    return { skill, score, target, inRange };
  }

  private scoreArea(
    unit: BattleUnit,
    skill: SkillDefinition,
    ctx: SkillContext,
  ): Omit<ScoredSkill, 'order'> {
    const { view } = ctx;

    if (OFFENSIVE.has(skill.effect)) {
      const placement = this.positioning.findOptimalAoePosition(unit, skill, view);
      if (!placement) return { skill, score: REDUNDANT_PENALTY, inRange: false };
      let score = 0;
      for (const enemy of placement.covered) {
        score += this.effectValue(unit, skill, enemy, view);
      }
      score += this.economy(skill);
      return { skill, score, cell: placement.cell, covered: placement.covered, inRange: true };
    }

    // 회복/버프 광역: 시전자 중심
    const radius = skill.radius ?? 1;
    const covered = [unit, ...view.alliesOf(unit)].filter(
      (a) => manhattan(a.pos, unit.pos) <= radius,
    );
    let score = 0;
    for (const ally of covered) score += this.effectValue(unit, skill, ally, view);
    score += this.economy(skill);
    return { skill, score, cell: unit.pos, covered, inRange: true };
  }

  private resolveTarget(
    unit: BattleUnit,
    skill: SkillDefinition,
    ctx: SkillContext,
  ): BattleUnit | undefined {
    const { view } = ctx;
    if (skill.targeting === 'SELF') return unit;

    if (skill.targeting === 'ALLY') {
      if (ctx.target && ctx.target.side === unit.side) return ctx.target;
      const friends = [unit, ...view.alliesOf(unit)];
      const inRange = friends.filter((f) => withinSkillRange(skill, unit.pos, f.pos));
      const pool = inRange.length > 0 ? inRange : friends;
      return [...pool].sort(
        (a, b) => view.hpRatio(a) - view.hpRatio(b) || a.hp - b.hp,
      )[0];
    }

    if (ctx.target && ctx.target.side !== unit.side) return ctx.target;
    const inRange = ctx.ranked.find((e) => withinSkillRange(skill, unit.pos, e.target.pos));
    return (inRange ?? ctx.ranked[0])?.target;
  }

  private effectValue(
    unit: BattleUnit,
    skill: SkillDefinition,
    target: BattleUnit,
    view: BattleView,
  ): number {
    let value = 0;

    switch (skill.effect) {
      case 'DAMAGE': {
        const dmg = this.estimateDamage(unit, skill, view);
        value += 2 * Math.min(dmg, target.hp);
        if (dmg >= target.hp) value += KILL_BONUS;
        break;
      }
      case 'HEAL':
        value += 2 * Math.min(skill.power, target.maxHp - target.hp);
        break;
      case 'BUFF':
        value += 12;
        break;
      case 'DEBUFF':
      case 'STATUS':
        value += 10 + skill.power;
        break;
    }

    if (skill.statusId) {
      const stacks = view.statusStacks(target, skill.statusId);
      if (stacks === 0) value += FRESH_STATUS_BONUS;
      else if (stacks >= (skill.maxStacks ?? 1)) value += REDUNDANT_PENALTY;
    }

    if (skill.comboStatus && view.hasStatus(target, skill.comboStatus)) {
      value += COMBO_BONUS;
    }
    return value;
  }

  private economy(skill: SkillDefinition): number {
    let value = -0.5 * skill.cost.amount;
    if (skill.cooldown > 3) value -= 5;
    return value;
  }
}

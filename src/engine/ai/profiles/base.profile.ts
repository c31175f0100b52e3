// 프로필 공통 헬퍼: 대상 순위, 공격 선택, 접근 이동

import type { BattleUnit, Decision, GridPos, SkillDefinition } from '../../../db/types/index.js';
import type { ThreatEntry } from '../threat.service.js';
import {
  isOffensive,
  withinSkillRange,
  type ScoredSkill,
  type SkillContext,
} from '../skill-priority.service.js';
import { manhattan } from '../grid.js';
import type { AiProfile, AiTurnContext } from './ai-profile.types.js';

export abstract class BaseAiProfile implements AiProfile {
  abstract readonly id: string;
  abstract readonly description: string;

  abstract executeTurn(unit: BattleUnit, ctx: AiTurnContext, hpRatio: number): Decision | null;

  /** 기본: 가장 가까운 대상 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    _ctx: AiTurnContext,
  ): BattleUnit | undefined {
    return this.chooseNearest(unit, targets);
  }

  protected chooseNearest(unit: BattleUnit, targets: readonly BattleUnit[]): BattleUnit | undefined {
    return [...targets].sort(
      (a, b) =>
        manhattan(unit.pos, a.pos) - manhattan(unit.pos, b.pos) ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    )[0];
  }

  protected rank(unit: BattleUnit, ctx: AiTurnContext): ThreatEntry[] {
    return ctx.threat.rankTargetsByThreat(unit, ctx.view.enemiesOf(unit), ctx.view);
  }

  protected skillContext(
    ctx: AiTurnContext,
    ranked: ThreatEntry[],
    target?: BattleUnit,
  ): SkillContext {
    return { view: ctx.view, ranked, target };
  }

  /** target 에게 지금 쓸 수 있는 공격 스킬 (점수 순) */
  protected attackOptions(
    unit: BattleUnit,
    target: BattleUnit,
    ctx: AiTurnContext,
    ranked: ThreatEntry[],
  ): ScoredSkill[] {
    return ctx.skills
      .prioritizeSkills(unit, this.skillContext(ctx, ranked, target))
      .filter(
        (o) =>
          o.inRange &&
          o.score > 0 &&
          (o.skill.targeting === 'AREA'
            ? isOffensive(o.skill) && (o.covered ?? []).some((c) => c.id === target.id)
            : isOffensive(o.skill) && o.target?.id === target.id),
      );
  }

  /** 위협 순으로 훑어서 지금 칠 수 있는 첫 대상과 최선의 스킬 */
  protected firstAttackInRange(
    unit: BattleUnit,
    ctx: AiTurnContext,
    ranked: ThreatEntry[],
  ): ScoredSkill | undefined {
    for (const entry of ranked) {
      const best = this.attackOptions(unit, entry.target, ctx, ranked)[0];
      if (best) return best;
    }
    return undefined;
  }

  /** 사용 가능한 공격 스킬 중 가장 긴 사거리 (없으면 무기 사거리) */
  protected attackRange(unit: BattleUnit, ctx: AiTurnContext): number {
    const ranges = ctx.skills
      .usableSkills(unit, ctx.view)
      .filter(isOffensive)
      .map((s) => s.range);
    return Math.max(1, unit.weaponRange, ...ranges);
  }

  /** 이번 턴 이동 + 사거리로 닿는 대상 */
  protected inStrikeReach(unit: BattleUnit, target: BattleUnit, ctx: AiTurnContext): boolean {
    return manhattan(unit.pos, target.pos) <= unit.movement + ctx.view.reach(unit);
  }

  /** cell 에서 target 에게 닿는 단일 대상 공격 스킬이 있는지 */
  protected strikesFrom(
    unit: BattleUnit,
    target: BattleUnit,
    ctx: AiTurnContext,
  ): (cell: GridPos) => boolean {
    const single = ctx.skills
      .usableSkills(unit, ctx.view)
      .filter((s) => isOffensive(s) && s.targeting !== 'AREA');
    return (cell) => single.some((s) => withinSkillRange(s, cell, target.pos));
  }

  /** 단일 대상 스킬 사용 결정. 적 대상이면 집중 배정 의도를 싣는다 */
  protected castOn(
    unit: BattleUnit,
    skill: SkillDefinition,
    target: BattleUnit,
    rationale: string,
  ): Decision {
    return {
      unitId: unit.id,
      profile: this.id,
      action: { type: 'USE_SKILL', skillId: skill.id, targetId: target.id },
      rationale,
      ...(target.side !== unit.side ? { intentTargetId: target.id } : {}),
    };
  }

  protected useSkill(unit: BattleUnit, option: ScoredSkill, rationale: string): Decision {
    const targetId = option.skill.targeting === 'AREA' ? undefined : option.target?.id;
    const intent =
      option.skill.targeting === 'AREA'
        ? option.covered?.find((c) => c.side !== unit.side)?.id
        : option.target && option.target.side !== unit.side
          ? option.target.id
          : undefined;
    return {
      unitId: unit.id,
      profile: this.id,
      action: {
        type: 'USE_SKILL',
        skillId: option.skill.id,
        ...(targetId !== undefined ? { targetId } : {}),
        ...(option.cell ? { cell: option.cell } : {}),
      },
      rationale,
      score: option.score,
      ...(intent ? { intentTargetId: intent } : {}),
    };
  }

  protected move(unit: BattleUnit, cell: GridPos, rationale: string, intent?: BattleUnit): Decision {
    return {
      unitId: unit.id,
      profile: this.id,
      action: { type: 'MOVE', cell },
      rationale,
      ...(intent ? { intentTargetId: intent.id } : {}),
    };
  }

  /** target 쪽으로 접근. 움직일 칸이 없으면 null */
  protected approach(
    unit: BattleUnit,
    target: BattleUnit,
    ctx: AiTurnContext,
    rationale: string,
  ): Decision | null {
    const result = ctx.positioning.findApproachPosition(
      unit,
      target,
      ctx.view,
      this.attackRange(unit, ctx),
    );
    return result.status === 'MOVE' ? this.move(unit, result.cell, rationale, target) : null;
  }

  /** 대상 공격 → 다른 사정권 대상 공격 → 접근 */
  protected engage(
    unit: BattleUnit,
    target: BattleUnit,
    ctx: AiTurnContext,
    ranked: ThreatEntry[],
    pick: (options: ScoredSkill[]) => ScoredSkill | undefined = (o) => o[0],
  ): Decision | null {
    const chosen = pick(this.attackOptions(unit, target, ctx, ranked));
    if (chosen) {
      return this.useSkill(unit, chosen, `${chosen.skill.id} → ${target.id}`);
    }
    const fallback = this.firstAttackInRange(unit, ctx, ranked);
    if (fallback) {
      return this.useSkill(
        unit,
        fallback,
        `${fallback.skill.id} → ${fallback.target?.id ?? 'area'} (primary out of range)`,
      );
    }
    return this.approach(unit, target, ctx, `advance on ${target.id}`);
  }
}

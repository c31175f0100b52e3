// Commander: 집중 공격 대상을 정하고 표식을 새긴다. 주변 아군 독려가 먼저

import type { BattleUnit, Decision, SkillDefinition } from '../../../db/types/index.js';
import { isOffensive, withinSkillRange } from '../skill-priority.service.js';
import { isAdjacent, manhattan } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

const RALLY_MIN_ALLIES = 2;
const MARK_STATUS = 'MARKED';

export class CommanderProfile extends BaseAiProfile {
  readonly id: string = 'commander';
  readonly description: string = 'Calls the focus target, marks it and rallies nearby allies';

  /** 집중 공격이 성립하면 팀 집중 대상, 아니면 위협 최고 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const { view, coordination } = ctx;
    const team = [unit, ...view.alliesOf(unit)];
    if (coordination.shouldFocusFire(team, targets, view)) {
      const focus = coordination.getFocusTarget(team, targets, view);
      if (focus && targets.includes(focus)) return focus;
    }
    return ctx.threat.rankTargetsByThreat(unit, targets, view)[0]?.target;
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext): Decision | null {
    const { view } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const usable = ctx.skills.usableSkills(unit, view);
    const rally = this.rallyDecision(unit, usable, ctx);
    if (rally) return rally;
    const order = this.orderDecision(unit, usable, ctx);
    if (order) return order;

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;

    const mark = usable.find(
      (s) =>
        isOffensive(s) &&
        s.statusId === MARK_STATUS &&
        s.targeting === 'ENEMY' &&
        withinSkillRange(s, unit.pos, target.pos),
    );
    if (mark && !view.hasStatus(target, MARK_STATUS)) {
      return this.castOn(unit, mark, target, `mark ${target.id} for the team`);
    }

    return this.engage(unit, target, ctx, this.rank(unit, ctx));
  }

  /** 시전자 중심 광역 버프: 버프가 없는 아군이 RALLY_MIN_ALLIES 명 이상 들어올 때 */
  private rallyDecision(
    unit: BattleUnit,
    usable: SkillDefinition[],
    ctx: AiTurnContext,
  ): Decision | null {
    const { view } = ctx;
    for (const skill of usable) {
      if (skill.targeting !== 'AREA' || skill.effect !== 'BUFF') continue;
      const radius = skill.radius ?? 1;
      const rallied = view
        .alliesOf(unit)
        .filter(
          (a) =>
            manhattan(a.pos, unit.pos) <= radius &&
            !(skill.statusId && view.hasStatus(a, skill.statusId)),
        );
      if (rallied.length >= RALLY_MIN_ALLIES) {
        return {
          unitId: unit.id,
          profile: this.id,
          action: { type: 'USE_SKILL', skillId: skill.id, cell: unit.pos },
          rationale: `${skill.id} rallies ${rallied.length}`,
        };
      }
    }
    return null;
  }

  /** 단일 아군 버프: 적과 맞붙은 아군 우선 */
  private orderDecision(
    unit: BattleUnit,
    usable: SkillDefinition[],
    ctx: AiTurnContext,
  ): Decision | null {
    const { view } = ctx;
    const enemies = view.enemiesOf(unit);
    const engaged = (a: BattleUnit) => (enemies.some((e) => isAdjacent(e.pos, a.pos)) ? 0 : 1);
    const allies = view
      .alliesOf(unit)
      .sort((a, b) => engaged(a) - engaged(b) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    for (const skill of usable) {
      if (skill.targeting !== 'ALLY' || skill.effect !== 'BUFF') continue;
      const ally = allies.find(
        (a) =>
          withinSkillRange(skill, unit.pos, a.pos) &&
          !(skill.statusId && view.hasStatus(a, skill.statusId)),
      );
      if (ally) return this.castOn(unit, skill, ally, `order ${ally.id} forward with ${skill.id}`);
    }
    return null;
  }
}

// Controller: 표식과 약화로 위협적인 적을 묶는다. 원거리면 간격을 유지

import type { BattleUnit, Decision, SkillDefinition } from '../../../db/types/index.js';
import type { ThreatEntry } from '../threat.service.js';
import { isOffensive, withinSkillRange } from '../skill-priority.service.js';
import { isAdjacent } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

const MARK_STATUS = 'MARKED';
/** 표식 외 약화는 이 HP 비율보다 건강한 적에게만 */
const HEALTHY_RATIO = 0.6;
const SAFE_DISTANCE = 2;

export class ControllerProfile extends BaseAiProfile {
  readonly id: string = 'controller';
  readonly description: string = 'Marks and weakens dangerous enemies before they act';

  /** 표식이 없는 대상 중 위협 최고, 모두 표식이면 위협 최고 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const ranked = ctx.threat.rankTargetsByThreat(unit, targets, ctx.view);
    const unmarked = ranked.find((e) => !ctx.view.hasStatus(e.target, MARK_STATUS));
    return (unmarked ?? ranked[0])?.target;
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext): Decision | null {
    const { view, positioning } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const ranked = this.rank(unit, ctx);
    const controls = ctx.skills
      .usableSkills(unit, view)
      .filter(
        (s) =>
          isOffensive(s) && s.targeting === 'ENEMY' && s.effect !== 'DAMAGE' && !!s.statusId,
      )
      .sort((a, b) => Number(b.statusId === MARK_STATUS) - Number(a.statusId === MARK_STATUS));

    for (const skill of controls) {
      const victim = this.controlTarget(unit, skill, ranked, ctx);
      if (victim) {
        return this.castOn(unit, skill, victim, `${skill.id} → ${victim.id}`);
      }
    }

    const range = this.attackRange(unit, ctx);
    if (range >= SAFE_DISTANCE) {
      const adjacent = ranked.find((e) => isAdjacent(e.target.pos, unit.pos))?.target;
      if (adjacent) {
        const pos = positioning.findOptimalRangePosition(
          unit,
          adjacent,
          SAFE_DISTANCE,
          range,
          view,
        );
        if (pos.status === 'MOVE') {
          return this.move(unit, pos.cell, `keep distance from ${adjacent.id}`);
        }
      }
    }

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;
    return this.engage(unit, target, ctx, ranked);
  }

  /** 사거리 안, 아직 그 상태가 없는 적 중 위협 최고 */
  private controlTarget(
    unit: BattleUnit,
    skill: SkillDefinition,
    ranked: ThreatEntry[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const { view } = ctx;
    return ranked.find(
      (e) =>
        withinSkillRange(skill, unit.pos, e.target.pos) &&
        !(skill.statusId && view.hasStatus(e.target, skill.statusId)) &&
        (skill.statusId === MARK_STATUS || view.hpRatio(e.target) > HEALTHY_RATIO),
    )?.target;
  }
}

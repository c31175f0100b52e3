// Defender: 위협받는 아군을 몸으로 막고, 다치면 방어 버프

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import { isAdjacent } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

const GUARD_HP_RATIO = 0.7;

export class DefenderProfile extends BaseAiProfile {
  readonly id: string = 'defender';
  readonly description: string = 'Bodyblocks for threatened allies and raises its guard';

  /** 아군에게 붙어 있는 적 우선 (위협 순), 없으면 최고 위협 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const ranked = ctx.threat.rankTargetsByThreat(unit, targets, ctx.view);
    const allies = ctx.view.alliesOf(unit);
    const pressing = ranked.find((e) => allies.some((a) => isAdjacent(a.pos, e.target.pos)));
    return (pressing ?? ranked[0])?.target;
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext, hpRatio: number): Decision | null {
    const { view } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const ranked = this.rank(unit, ctx);

    // 가장 위험한 아군 옆으로
    const threatened = view
      .alliesOf(unit)
      .filter((a) => enemies.some((e) => isAdjacent(e.pos, a.pos)))
      .sort(
        (a, b) =>
          view.hpRatio(a) - view.hpRatio(b) || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
      );
    const ward = threatened[0];
    if (ward && !isAdjacent(unit.pos, ward.pos)) {
      const attacker = ranked.find((e) => isAdjacent(e.target.pos, ward.pos))?.target;
      if (attacker) {
        const guard = ctx.positioning.findGuardPosition(unit, ward, attacker, view);
        if (guard.status === 'MOVE') {
          return this.move(unit, guard.cell, `guard ${ward.id} from ${attacker.id}`, attacker);
        }
      }
    }

    if (hpRatio < GUARD_HP_RATIO) {
      const guardSkill = ctx.skills
        .usableSkills(unit, view)
        .find(
          (s) =>
            s.targeting === 'SELF' &&
            s.effect === 'BUFF' &&
            !(s.statusId && view.hasStatus(unit, s.statusId)),
        );
      if (guardSkill) {
        return {
          unitId: unit.id,
          profile: this.id,
          action: { type: 'USE_SKILL', skillId: guardSkill.id, targetId: unit.id },
          rationale: `${guardSkill.id} at hp ${hpRatio.toFixed(2)}`,
        };
      }
    }

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;
    return this.engage(unit, target, ctx, ranked);
  }
}

// Berserker: 후퇴하지 않는다. 빈사 시 광폭화 후 가장 가까운 적에게

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import { manhattan } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BruteProfile } from './brute.profile.js';

const RAGE_HP_RATIO = 0.3;

export class BerserkerProfile extends BruteProfile {
  readonly id: string = 'berserker';
  readonly description: string = 'Reckless attacker that rages when near death';

  /** 빈사면 가장 가까운 대상, 아니면 공격력 최고 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    if (ctx.view.hpRatio(unit) < RAGE_HP_RATIO) {
      return this.chooseNearest(unit, targets);
    }
    return [...targets].sort(
      (a, b) =>
        b.attack - a.attack ||
        manhattan(unit.pos, a.pos) - manhattan(unit.pos, b.pos) ||
        (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    )[0];
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext, hpRatio: number = 1): Decision | null {
    const { view } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    if (hpRatio < RAGE_HP_RATIO) {
      const rage = ctx.skills
        .usableSkills(unit, view)
        .find(
          (s) =>
            s.targeting === 'SELF' &&
            s.effect === 'BUFF' &&
            !(s.statusId && view.hasStatus(unit, s.statusId)),
        );
      if (rage) {
        return {
          unitId: unit.id,
          profile: this.id,
          action: { type: 'USE_SKILL', skillId: rage.id, targetId: unit.id },
          rationale: `${rage.id} at hp ${hpRatio.toFixed(2)}`,
        };
      }
    }

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;
    return this.engage(unit, target, ctx, this.rank(unit, ctx), (options) =>
      this.hardestHit(unit, options, ctx),
    );
  }
}

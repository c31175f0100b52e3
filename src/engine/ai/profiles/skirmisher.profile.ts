// Skirmisher: 측면을 잡고 약한 대상을 마무리, HP가 낮으면 후퇴

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

export class SkirmisherProfile extends BaseAiProfile {
  readonly id: string = 'skirmisher';
  readonly description: string = 'Flanks and finishes weak targets, falls back when hurt';

  /** MARKED 중 HP 최저, 없으면 HP 최저 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const byHp = [...targets].sort(
      (a, b) => a.hp - b.hp || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
    return byHp.find((t) => ctx.view.hasStatus(t, 'MARKED')) ?? byHp[0];
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext, hpRatio: number): Decision | null {
    const { view, positioning } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    if (hpRatio < ctx.config.defensiveHpThreshold) {
      const retreat = positioning.findRetreatPosition(unit, view);
      if (retreat.status === 'MOVE') {
        return this.move(unit, retreat.cell, `fall back (hp ${hpRatio.toFixed(2)})`);
      }
    }

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;

    const flank = positioning.findFlankingPosition(
      unit,
      target,
      view,
      this.strikesFrom(unit, target, ctx),
    );
    if (flank.status === 'MOVE') {
      return this.move(unit, flank.cell, `flank ${target.id}`, target);
    }

    return this.engage(unit, target, ctx, this.rank(unit, ctx));
  }
}

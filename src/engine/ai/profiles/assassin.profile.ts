// Assassin: 고립되거나 약한 대상을 노리고, 마무리 일격이 보이면 바로 친다

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import { isAdjacent } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

export class AssassinProfile extends BaseAiProfile {
  readonly id: string = 'assassin';
  readonly description: string = 'Hunts isolated or weakened targets from the flank';

  /** 상하좌우에 아군이 없는 대상 중 HP 최저, 없으면 HP 최저 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const byHp = [...targets].sort(
      (a, b) => a.hp - b.hp || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
    const isolated = byHp.filter(
      (t) => !ctx.view.alliesOf(t).some((a) => isAdjacent(a.pos, t.pos)),
    );
    return isolated[0] ?? byHp[0];
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext): Decision | null {
    const { view } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const ranked = this.rank(unit, ctx);
    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;

    const options = this.attackOptions(unit, target, ctx, ranked);
    const finisher = options.find(
      (o) =>
        o.skill.effect === 'DAMAGE' &&
        ctx.skills.estimateDamage(unit, o.skill, view) >= target.hp,
    );
    if (finisher) {
      return this.useSkill(unit, finisher, `finish ${target.id} with ${finisher.skill.id}`);
    }

    const flank = ctx.positioning.findFlankingPosition(
      unit,
      target,
      view,
      this.strikesFrom(unit, target, ctx),
    );
    if (flank.status === 'MOVE') {
      return this.move(unit, flank.cell, `slip behind ${target.id}`, target);
    }

    return this.engage(unit, target, ctx, ranked);
  }
}

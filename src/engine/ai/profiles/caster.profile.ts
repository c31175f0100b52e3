// Caster: 거리 유지, 광역 우선, 근접 회피

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import { isOffensive } from '../skill-priority.service.js';
import { isAdjacent } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

const SAFE_DISTANCE = 2;
const AOE_MIN_TARGETS = 2;
const DEBUFF_MARKERS = ['MARKED', 'WEAKEN'];

export class CasterProfile extends BaseAiProfile {
  readonly id: string = 'caster';
  readonly description: string = 'Keeps its distance and prefers area spells';

  /** 약화된 대상 중 HP 최저, 없으면 HP 최저 */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const byHp = [...targets].sort(
      (a, b) => a.hp - b.hp || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
    return (
      byHp.find((t) => DEBUFF_MARKERS.some((s) => ctx.view.hasStatus(t, s))) ?? byHp[0]
    );
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext): Decision | null {
    const { view, positioning } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const ranked = this.rank(unit, ctx);
    const ranged = ctx.skills
      .usableSkills(unit, view)
      .filter((s) => isOffensive(s) && s.range >= SAFE_DISTANCE);
    const maxRange = Math.max(0, ...ranged.map((s) => s.range));

    // 근접당했으면 먼저 사거리 회복
    const adjacent = enemies
      .filter((e) => isAdjacent(e.pos, unit.pos))
      .sort((a, b) => (a.id < b.id ? -1 : 1));
    if (adjacent.length > 0 && ranged.length > 0) {
      const pos = positioning.findOptimalRangePosition(
        unit,
        adjacent[0],
        SAFE_DISTANCE,
        maxRange,
        view,
      );
      if (pos.status === 'MOVE') {
        return this.move(unit, pos.cell, `back away from ${adjacent[0].id}`);
      }
    }

    // 광역: 2명 이상 맞으면 우선
    const aoe = ctx.skills
      .prioritizeSkills(unit, this.skillContext(ctx, ranked))
      .find(
        (o) =>
          o.skill.targeting === 'AREA' &&
          isOffensive(o.skill) &&
          o.score > 0 &&
          (o.covered?.length ?? 0) >= AOE_MIN_TARGETS,
      );
    if (aoe) {
      return this.useSkill(unit, aoe, `${aoe.skill.id} hits ${aoe.covered?.length ?? 0}`);
    }

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;

    const single = this.attackOptions(unit, target, ctx, ranked)[0];
    if (single) return this.useSkill(unit, single, `${single.skill.id} → ${target.id}`);

    const other = this.firstAttackInRange(unit, ctx, ranked);
    if (other) {
      return this.useSkill(unit, other, `${other.skill.id} → ${other.target?.id ?? 'area'}`);
    }

    if (ranged.length > 0) {
      const pos = positioning.findOptimalRangePosition(
        unit,
        target,
        SAFE_DISTANCE,
        maxRange,
        view,
      );
      if (pos.status === 'MOVE') {
        return this.move(unit, pos.cell, `take range on ${target.id}`, target);
      }
    }
    return this.approach(unit, target, ctx, `advance cautiously on ${target.id}`);
  }
}

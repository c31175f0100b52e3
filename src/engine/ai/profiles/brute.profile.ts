// Brute: 닿는 대상 중 최고 위협을 최대 피해 스킬로 돌격

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import type { ScoredSkill } from '../skill-priority.service.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

export class BruteProfile extends BaseAiProfile {
  readonly id: string = 'brute';
  readonly description: string = 'Charges the highest-threat reachable target with its hardest hit';

  /** MARKED 우선, 그다음 위협 최고. 이번 턴에 닿는 대상만 고려 (없으면 전체) */
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined {
    const ranked = ctx.threat.rankTargetsByThreat(unit, targets, ctx.view);
    const reachable = ranked.filter((e) => this.inStrikeReach(unit, e.target, ctx));
    const pool = reachable.length > 0 ? reachable : ranked;
    const marked = pool.find((e) => ctx.view.hasStatus(e.target, 'MARKED'));
    return (marked ?? pool[0])?.target;
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext): Decision | null {
    const { view } = ctx;
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const ranked = this.rank(unit, ctx);
    let target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;

    const team = [unit, ...view.alliesOf(unit)];
    if (ctx.coordination.shouldFocusFire(team, enemies, view)) {
      const focus = ctx.coordination.getFocusTarget(team, enemies, view);
      if (focus && this.inStrikeReach(unit, focus, ctx)) target = focus;
    }

    return this.engage(unit, target, ctx, ranked, (options) => this.hardestHit(unit, options, ctx));
  }

  /** 예상 피해 최대 스킬 (상황 점수 무시), 동점은 선언 순서 */
  protected hardestHit(
    unit: BattleUnit,
    options: ScoredSkill[],
    ctx: AiTurnContext,
  ): ScoredSkill | undefined {
    const damage = (o: ScoredSkill) =>
      o.skill.effect === 'DAMAGE' ? ctx.skills.estimateDamage(unit, o.skill, ctx.view) : -1;
    return [...options].sort((a, b) => damage(b) - damage(a) || a.order - b.order)[0];
  }
}

// Tactician: 표식으로 연계를 준비하고, 준비된 대상에게 연계기. 측면을 잡고 싸운다

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import { isOffensive, withinSkillRange } from '../skill-priority.service.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';

export class TacticianProfile extends BaseAiProfile {
  readonly id: string = 'tactician';
  readonly description: string = 'Sets up combo strikes and fights from the flank';

  /** 팀 집중 대상 우선, 없으면 위협 최고 */
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

    const ranked = this.rank(unit, ctx);
    const usable = ctx.skills.usableSkills(unit, view).filter(isOffensive);

    // 연계: 준비된 적에게 연계기, 아니면 대상에게 준비 상태 부여
    for (const combo of usable.filter((s) => s.comboStatus && s.targeting === 'ENEMY')) {
      const primed = ranked.find(
        (e) =>
          combo.comboStatus !== undefined &&
          view.hasStatus(e.target, combo.comboStatus) &&
          withinSkillRange(combo, unit.pos, e.target.pos),
      )?.target;
      if (primed) return this.castOn(unit, combo, primed, `${combo.id} combo on ${primed.id}`);
    }

    const target = this.chooseTarget(unit, enemies, ctx);
    if (!target) return null;

    for (const combo of usable.filter((s) => s.comboStatus)) {
      const setup = usable.find(
        (s) =>
          s.statusId === combo.comboStatus &&
          s.targeting === 'ENEMY' &&
          withinSkillRange(s, unit.pos, target.pos),
      );
      if (setup && !(setup.statusId && view.hasStatus(target, setup.statusId))) {
        return this.castOn(unit, setup, target, `${setup.id} sets up ${combo.id} on ${target.id}`);
      }
    }

    const flank = ctx.positioning.findFlankingPosition(
      unit,
      target,
      view,
      this.strikesFrom(unit, target, ctx),
    );
    if (flank.status === 'MOVE') {
      return this.move(unit, flank.cell, `outmanoeuvre ${target.id}`, target);
    }

    return this.engage(unit, target, ctx, ranked);
  }
}

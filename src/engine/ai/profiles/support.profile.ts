// Support: 아군 치유/버프 우선, 도울 아군이 없으면 Brute 처럼 싸운다

import type { BattleUnit, Decision, SkillDefinition } from '../../../db/types/index.js';
import { withinSkillRange } from '../skill-priority.service.js';
import { manhattan } from '../grid.js';
import type { AiTurnContext } from './ai-profile.types.js';
import { BaseAiProfile } from './base.profile.js';
import { BruteProfile } from './brute.profile.js';

const BUFF_PRIORITY_PROFILES = ['brute', 'skirmisher', 'berserker'];

export class SupportProfile extends BaseAiProfile {
  readonly id: string = 'support';
  readonly description: string = 'Heals and buffs allies before fighting';

  private readonly fallback = new BruteProfile();

  /** 공격할 때는 HP 최저 */
  chooseTarget(unit: BattleUnit, targets: readonly BattleUnit[]): BattleUnit | undefined {
    return [...targets].sort(
      (a, b) => a.hp - b.hp || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    )[0];
  }

  executeTurn(unit: BattleUnit, ctx: AiTurnContext): Decision | null {
    const { view } = ctx;
    const usable = ctx.skills.usableSkills(unit, view);

    const heals = usable.filter(
      (s) => s.effect === 'HEAL' && (s.targeting === 'ALLY' || s.targeting === 'AREA'),
    );
    const injured = view
      .alliesOf(unit)
      .filter((a) => view.hpRatio(a) < ctx.config.supportHealThreshold)
      .sort(
        (a, b) =>
          view.hpRatio(a) - view.hpRatio(b) ||
          a.hp - b.hp ||
          (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
      );

    if (heals.length > 0 && injured.length > 0) {
      for (const ally of injured) {
        const heal = this.bestHealFor(unit, ally, heals, ctx);
        if (heal) {
          const score = ctx.skills.evaluateSkillValue(unit, heal, {
            view,
            ranked: [],
            target: ally,
          });
          return {
            unitId: unit.id,
            profile: this.id,
            action:
              heal.targeting === 'AREA'
                ? { type: 'USE_SKILL', skillId: heal.id, cell: unit.pos }
                : { type: 'USE_SKILL', skillId: heal.id, targetId: ally.id },
            rationale: `heal ${ally.id} (hp ${view.hpRatio(ally).toFixed(2)})`,
            ...(score !== null ? { score } : {}),
          };
        }
      }
      // 사정거리 밖: 가장 다친 아군에게 접근 (공격 스킬로 빠지지 않는다)
      const patient = injured[0];
      const healRange = Math.max(...heals.map((h) => this.healReach(h)));
      const step = ctx.positioning.findApproachPosition(unit, patient, view, healRange);
      return step.status === 'MOVE'
        ? this.move(unit, step.cell, `move to heal ${patient.id}`)
        : null;
    }

    const buff = this.buffDecision(unit, usable, ctx);
    if (buff) return buff;

    const fought = this.fallback.executeTurn(unit, ctx);
    return fought ? { ...fought, profile: this.id } : null;
  }

  private healReach(skill: SkillDefinition): number {
    return skill.targeting === 'AREA' ? (skill.radius ?? 1) : skill.range;
  }

  private bestHealFor(
    unit: BattleUnit,
    ally: BattleUnit,
    heals: SkillDefinition[],
    ctx: AiTurnContext,
  ): SkillDefinition | undefined {
    const inRange = heals.filter((h) =>
      h.targeting === 'AREA'
        ? manhattan(unit.pos, ally.pos) <= (h.radius ?? 1)
        : withinSkillRange(h, unit.pos, ally.pos),
    );
    const value = (h: SkillDefinition) =>
      ctx.skills.evaluateSkillValue(unit, h, { view: ctx.view, ranked: [], target: ally }) ?? 0;
    return inRange.sort((a, b) => value(b) - value(a))[0];
  }

  /** 아직 버프가 없는 아군에게 (딜러 우선) */
  private buffDecision(
    unit: BattleUnit,
    usable: SkillDefinition[],
    ctx: AiTurnContext,
  ): Decision | null {
    const { view } = ctx;
    const buffs = usable.filter((s) => s.effect === 'BUFF' && s.targeting === 'ALLY');
    if (buffs.length === 0) return null;

    const allies = view
      .alliesOf(unit)
      .sort((a, b) => {
        const pa = BUFF_PRIORITY_PROFILES.includes(a.aiProfile ?? '') ? 0 : 1;
        const pb = BUFF_PRIORITY_PROFILES.includes(b.aiProfile ?? '') ? 0 : 1;
        return pa - pb || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
      });

    for (const buff of buffs) {
      const ally = allies.find(
        (a) =>
          withinSkillRange(buff, unit.pos, a.pos) &&
          !(buff.statusId && view.hasStatus(a, buff.statusId)),
      );
      if (ally) {
        return {
          unitId: unit.id,
          profile: this.id,
          action: { type: 'USE_SKILL', skillId: buff.id, targetId: ally.id },
          rationale: `buff ${ally.id} with ${buff.id}`,
        };
      }
    }
    return null;
  }
}

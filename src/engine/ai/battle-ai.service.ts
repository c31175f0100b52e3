// 전투 AI 오케스트레이터: 프로필 해석 → 결정 → 검증 → 배틀 엔진 전달

import { Injectable, Logger } from '@nestjs/common';
import type {
  BattleAction,
  BattleSnapshot,
  BattleUnit,
  Decision,
} from '../../db/types/index.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import { BattleAiConfigService } from './battle-ai-config.service.js';
import { BattleView, isAlive } from './battle-view.js';
import type { CoordinationManager } from './coordination.js';
import { PositioningService } from './positioning.service.js';
import { ProfileRegistryService } from './profile-registry.service.js';
import { SkillPriorityService, withinSkillRange } from './skill-priority.service.js';
import { ThreatService } from './threat.service.js';
import { samePos } from './grid.js';
import type { AiTurnContext } from './profiles/index.js';

/** 결정을 실제로 적용하는 쪽 (배틀 엔진) */
export interface BattleExecutor {
  execute(action: BattleAction): void;
}

export interface AiTurnInput {
  snapshot: BattleSnapshot;
  unitId: string;
  coordination: CoordinationManager;
  /** archetypeId → 프로필 태그 (콘텐츠 카탈로그) */
  archetypes?: ReadonlyMap<string, string>;
  executor?: BattleExecutor;
}

export interface AiTurnResult {
  decision: Decision;
  action: BattleAction;
}

@Injectable()
export class BattleAiService {
  private readonly logger = new Logger(BattleAiService.name);

  constructor(
    private readonly configService: BattleAiConfigService,
    private readonly registry: ProfileRegistryService,
    private readonly threat: ThreatService,
    private readonly skills: SkillPriorityService,
    private readonly positioning: PositioningService,
  ) {}

  /** 단일 진입점. 동기 실행, 같은 입력이면 같은 결과 */
  executeAiTurn(input: AiTurnInput): AiTurnResult {
    const view = new BattleView(input.snapshot);
    const unit = view.getUnit(input.unitId);
    if (!unit) {
      throw new ContractViolationError(`Acting unit "${input.unitId}" is not in the battle`);
    }
    if (!isAlive(unit)) {
      throw new ContractViolationError(`Acting unit "${input.unitId}" is defeated`);
    }

    const tag =
      unit.aiProfile ??
      (unit.archetypeId ? input.archetypes?.get(unit.archetypeId) : undefined);
    const profile = this.registry.resolve(tag);

    let decision: Decision;
    if (view.hasStatus(unit, 'STUN')) {
      decision = this.defend(unit, profile.id, 'stunned');
    } else {
      const ctx: AiTurnContext = {
        view,
        threat: this.threat,
        skills: this.skills,
        positioning: this.positioning,
        coordination: input.coordination,
        config: this.configService.get(),
      };
      decision =
        this.runProfile(unit, ctx, profile.id, () =>
          profile.executeTurn(unit, ctx, view.hpRatio(unit)),
        ) ?? this.defend(unit, profile.id, 'no usable action');
    }

    const violation = this.checkDecision(unit, decision, view);
    if (violation) {
      this.logger.warn(
        `Discarded ${decision.action.type} from ${decision.profile} for ${unit.id}: ${violation}`,
      );
      decision = this.defend(unit, decision.profile, `fallback: ${violation}`);
    }

    if (decision.intentTargetId) {
      input.coordination.assign(unit.id, decision.intentTargetId);
    } else {
      input.coordination.release(unit.id);
    }

    const action: BattleAction = { ...decision.action, actorId: unit.id };
    input.executor?.execute(action);

    this.logger.debug(
      `[${view.battleId} r${view.round}] ${unit.id} (${decision.profile}) → ${action.type}: ${decision.rationale}`,
    );
    return { decision, action };
  }

  /** 프로필 내부 오류는 DEFEND 로 복구, 호출 계약 위반은 그대로 던진다 */
  private runProfile(
    unit: BattleUnit,
    ctx: AiTurnContext,
    profileId: string,
    run: () => Decision | null,
  ): Decision | null {
    try {
      return run();
    } catch (err) {
      if (err instanceof ContractViolationError) throw err;
      this.logger.error(
        `AI profile "${profileId}" failed for ${unit.id} in ${ctx.view.battleId}`,
        err instanceof Error ? err.stack : String(err),
      );
      return null;
    }
  }

  private defend(unit: BattleUnit, profile: string, rationale: string): Decision {
    return { unitId: unit.id, profile, action: { type: 'DEFEND' }, rationale };
  }

  /** 불변식 검사. 위반 사유 또는 null */
  private checkDecision(unit: BattleUnit, decision: Decision, view: BattleView): string | null {
    const action = decision.action;
    switch (action.type) {
      case 'DEFEND':
        return null;

      case 'MOVE': {
        if (!view.inBounds(action.cell)) return 'move target out of bounds';
        if (!view.isFree(action.cell, unit.id)) return 'move target occupied or blocked';
        const reachable = view.reachableCells(unit).some((r) => samePos(r.cell, action.cell));
        return reachable ? null : 'move target not reachable this turn';
      }

      case 'USE_SKILL': {
        const skill = view.getSkill(action.skillId);
        if (!skill || !this.skills.isUsable(unit, action.skillId, view)) {
          return `skill "${action.skillId}" not usable (cooldown, cost or silence)`;
        }
        if (action.cell && !view.inBounds(action.cell)) return 'skill cell out of bounds';
        if (action.targetId === undefined) return null;

        const target = view.getUnit(action.targetId);
        if (!target || !isAlive(target)) return `target "${action.targetId}" not alive`;
        if (skill.targeting === 'ENEMY' && target.side === unit.side) {
          return 'offensive skill aimed at an ally';
        }
        if (skill.targeting === 'ALLY' && target.side !== unit.side) {
          return 'support skill aimed at an enemy';
        }
        if (skill.targeting !== 'SELF' && !withinSkillRange(skill, unit.pos, target.pos)) {
          return `target "${target.id}" out of range`;
        }
        return null;
      }
    }
  }
}

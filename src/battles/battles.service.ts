// 배틀 수명 주기 + AI 턴 실행 (스냅샷 → 결정 → 로그)

import { Injectable } from '@nestjs/common';
import type { BattleSnapshot, SkillDefinition } from '../db/types/index.js';
import { BadRequestError, NotFoundError } from '../common/errors/game-errors.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { BattleAiService, type AiTurnResult } from '../engine/ai/battle-ai.service.js';
import { CoordinationService } from '../engine/ai/coordination.service.js';
import { DecisionLogService } from '../engine/ai/decision-log.service.js';

@Injectable()
export class BattlesService {
  constructor(
    private readonly battleAi: BattleAiService,
    private readonly coordination: CoordinationService,
    private readonly decisionLog: DecisionLogService,
    private readonly content: ContentLoaderService,
  ) {}

  openBattle(battleId: string) {
    this.coordination.open(battleId);
    return { battleId, open: true };
  }

  async runAiTurn(
    battleId: string,
    unitId: string,
    snapshot: BattleSnapshot,
  ): Promise<AiTurnResult> {
    if (snapshot.battleId !== battleId) {
      throw new BadRequestError('Snapshot belongs to a different battle', {
        battleId,
        snapshotBattleId: snapshot.battleId,
      });
    }
    const coordination = this.coordination.get(battleId);

    const result = this.battleAi.executeAiTurn({
      snapshot: { ...snapshot, skills: this.mergeSkills(snapshot.skills) },
      unitId,
      coordination,
      archetypes: this.content.archetypeProfiles(),
    });

    await this.decisionLog.log({
      battleId,
      round: snapshot.round,
      decision: result.decision,
    });
    return result;
  }

  closeBattle(battleId: string) {
    if (!this.coordination.close(battleId)) {
      throw new NotFoundError(`Battle "${battleId}" is not open`);
    }
    return { battleId, open: false };
  }

  /** 카탈로그 스킬 + 스냅샷 스킬 (같은 id 는 스냅샷 우선) */
  private mergeSkills(overrides: SkillDefinition[]): SkillDefinition[] {
    const merged = new Map<string, SkillDefinition>();
    for (const skill of this.content.getAllSkills()) merged.set(skill.id, skill);
    for (const skill of overrides) merged.set(skill.id, skill);
    return [...merged.values()];
  }
}

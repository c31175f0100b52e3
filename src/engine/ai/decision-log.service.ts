// AI 결정 로그 서비스: ai_decision_logs 테이블에 기록

import { Inject, Injectable, Logger } from '@nestjs/common';
import { DB, type DrizzleDB } from '../../db/drizzle.module.js';
import { aiDecisionLogs } from '../../db/schema/index.js';
import type { Decision } from '../../db/types/index.js';
import { BattleAiConfigService } from './battle-ai-config.service.js';

export interface DecisionLogEntry {
  battleId: string;
  round: number;
  decision: Decision;
}

@Injectable()
export class DecisionLogService {
  private readonly logger = new Logger(DecisionLogService.name);

  constructor(
    @Inject(DB) private readonly db: DrizzleDB,
    private readonly configService: BattleAiConfigService,
  ) {}

  /** 실패해도 턴은 계속된다 (error 로그만) */
  async log(entry: DecisionLogEntry): Promise<boolean> {
    if (!this.configService.get().decisionLogEnabled) return false;
    const { decision } = entry;
    try {
      await this.db.insert(aiDecisionLogs).values({
        battleId: entry.battleId,
        round: entry.round,
        unitId: decision.unitId,
        profile: decision.profile,
        action: decision.action,
        intentTargetId: decision.intentTargetId ?? null,
        rationale: decision.rationale,
        score: decision.score ?? null,
      });
      return true;
    } catch (err) {
      this.logger.error(
        `Failed to log AI decision: battle=${entry.battleId} round=${entry.round} unit=${decision.unitId}`,
        err instanceof Error ? err.stack : String(err),
      );
      return false;
    }
  }
}

// AI 프로필 계약: 모든 프로필은 상태 없는 싱글턴, 턴별 상태는 전부 인자로 받는다

import type { BattleUnit, Decision } from '../../../db/types/index.js';
import type { BattleAiConfig } from '../battle-ai-config.service.js';
import type { BattleView } from '../battle-view.js';
import type { CoordinationManager } from '../coordination.js';
import type { PositioningService } from '../positioning.service.js';
import type { SkillPriorityService } from '../skill-priority.service.js';
import type { ThreatService } from '../threat.service.js';

export interface AiTurnContext {
  view: BattleView;
  threat: ThreatService;
  skills: SkillPriorityService;
  positioning: PositioningService;
  coordination: CoordinationManager;
  config: BattleAiConfig;
}

export interface AiProfile {
  readonly id: string;
  readonly description: string;
  chooseTarget(
    unit: BattleUnit,
    targets: readonly BattleUnit[],
    ctx: AiTurnContext,
  ): BattleUnit | undefined;
  /** 유효한 행동이 없으면 null (오케스트레이터가 DEFEND 로 대체) */
  executeTurn(unit: BattleUnit, ctx: AiTurnContext, hpRatio: number): Decision | null;
}

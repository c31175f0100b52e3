// AI 턴 결과물: 배틀 엔진이 즉시 소비

import type { GridPos } from './battle-snapshot.js';

export type AiAction =
  | { type: 'USE_SKILL'; skillId: string; targetId?: string; cell?: GridPos }
  | { type: 'MOVE'; cell: GridPos }
  | { type: 'DEFEND' };

export type Decision = {
  unitId: string;
  profile: string;
  action: AiAction;
  rationale: string; // 디버그용 결정 사유
  intentTargetId?: string; // 이 결정이 노리는 적 (집중 공격 배정용)
  score?: number;
};

export type BattleAction = AiAction & { actorId: string };

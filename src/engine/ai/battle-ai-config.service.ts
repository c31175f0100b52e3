// 전투 AI 설정 서비스: .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';

export interface BattleAiConfig {
  /** 이 HP 비율 미만이면 방어적 행동 (Skirmisher 후퇴 등) */
  defensiveHpThreshold: number;
  /** 이 HP 비율 미만인 아군은 치유 대상 */
  supportHealThreshold: number;
  /** 집중 공격을 권할 최소 동원 유닛 수 */
  focusMinUnits: number;
  /** 알 수 없는 프로필 태그의 대체 프로필 */
  defaultProfile: string;
  /** 결정 로그 DB 기록 여부 */
  decisionLogEnabled: boolean;
}

export type BattleAiConfigPatch = Partial<BattleAiConfig>;

function envNumber(name: string, fallback: string): number {
  const value = parseFloat(process.env[name] ?? fallback);
  return Number.isFinite(value) ? value : parseFloat(fallback);
}

@Injectable()
export class BattleAiConfigService {
  private readonly logger = new Logger(BattleAiConfigService.name);
  private config: BattleAiConfig;

  constructor() {
    this.config = {
      defensiveHpThreshold: envNumber('AI_DEFENSIVE_HP_THRESHOLD', '0.4'),
      supportHealThreshold: envNumber('AI_SUPPORT_HEAL_THRESHOLD', '0.7'),
      focusMinUnits: Math.max(2, Math.floor(envNumber('AI_FOCUS_MIN_UNITS', '2'))),
      defaultProfile: process.env.AI_DEFAULT_PROFILE ?? 'brute',
      decisionLogEnabled: (process.env.AI_DECISION_LOG ?? 'true') !== 'false',
    };
  }

  get(): BattleAiConfig {
    return this.config;
  }

  /** 런타임 설정 변경: 다음 AI 턴부터 반영 */
  update(patch: BattleAiConfigPatch): BattleAiConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Battle AI config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}

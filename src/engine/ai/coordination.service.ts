// 배틀별 CoordinationManager 수명 관리 (배틀 시작 시 생성, 종료 시 폐기)

import { Injectable, Logger } from '@nestjs/common';
import { BattleConflictError, NotFoundError } from '../../common/errors/game-errors.js';
import { BattleAiConfigService } from './battle-ai-config.service.js';
import { CoordinationManager } from './coordination.js';
import { ThreatService } from './threat.service.js';

@Injectable()
export class CoordinationService {
  private readonly logger = new Logger(CoordinationService.name);
  private readonly managers = new Map<string, CoordinationManager>();

  constructor(
    private readonly threat: ThreatService,
    private readonly configService: BattleAiConfigService,
  ) {}

  open(battleId: string): CoordinationManager {
    if (this.managers.has(battleId)) {
      throw new BattleConflictError(`Battle "${battleId}" is already open`);
    }
    const manager = new CoordinationManager(
      battleId,
      this.threat,
      () => this.configService.get().focusMinUnits,
    );
    this.managers.set(battleId, manager);
    this.logger.log(`Battle opened: ${battleId}`);
    return manager;
  }

  get(battleId: string): CoordinationManager {
    const manager = this.managers.get(battleId);
    if (!manager) {
      throw new NotFoundError(`Battle "${battleId}" is not open`);
    }
    return manager;
  }

  has(battleId: string): boolean {
    return this.managers.has(battleId);
  }

  /** 배틀 종료: 배정 정리 후 폐기. 열린 적 없는 배틀이면 false */
  close(battleId: string): boolean {
    const manager = this.managers.get(battleId);
    if (!manager) return false;
    manager.clear();
    this.managers.delete(battleId);
    this.logger.log(`Battle closed: ${battleId}`);
    return true;
  }

  get openCount(): number {
    return this.managers.size;
  }
}

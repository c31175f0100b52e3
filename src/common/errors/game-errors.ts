import { HttpStatus } from '@nestjs/common';

export class GameError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly httpStatus: number = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'GameError';
  }
}

export class BadRequestError extends GameError {
  constructor(message = 'Bad request', details?: Record<string, unknown>) {
    super('BAD_REQUEST', message, HttpStatus.BAD_REQUEST, details);
  }
}

export class NotFoundError extends GameError {
  constructor(message = 'Not found', details?: Record<string, unknown>) {
    super('NOT_FOUND', message, HttpStatus.NOT_FOUND, details);
  }
}

export class BattleConflictError extends GameError {
  constructor(message = 'Battle conflict', details?: Record<string, unknown>) {
    super('BATTLE_CONFLICT', message, HttpStatus.CONFLICT, details);
  }
}

export class InvalidInputError extends GameError {
  constructor(message = 'Invalid input', details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 422, details);
  }
}

/**
 * 배틀 엔진이 AI 호출 계약을 어긴 경우 (위치 없는 유닛, 스킬 없는 유닛 등).
 * "행동 불가 → DEFEND" 와는 구분되는 치명적 오류.
 */
export class ContractViolationError extends GameError {
  constructor(message = 'Contract violation', details?: Record<string, unknown>) {
    super('CONTRACT_VIOLATION', message, 422, details);
    this.name = 'ContractViolationError';
  }
}

export class InternalError extends GameError {
  constructor(message = 'Internal error', details?: Record<string, unknown>) {
    super('INTERNAL_ERROR', message, HttpStatus.INTERNAL_SERVER_ERROR, details);
  }
}

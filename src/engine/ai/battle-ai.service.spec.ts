import type { BattleAction, BattleUnit, Decision } from '../../db/types/index.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import { CoordinationManager } from './coordination.js';
import type { AiProfile } from './profiles/index.js';
import { createAiServices, snapshot, unit } from './testing/fixtures.js';

describe('BattleAiService', () => {
  let services: ReturnType<typeof createAiServices>;
  let coordination: CoordinationManager;

  beforeEach(() => {
    services = createAiServices();
    coordination = new CoordinationManager('battle-1', services.threat);
  });

  const bruteScene = (): BattleUnit[] => [
    unit('b', { x: 2, y: 2 }, { aiProfile: 'brute', attack: 2, skills: ['strike', 'slash'] }),
    unit('p1', { x: 3, y: 2 }, { side: 'PLAYER', hp: 5, maxHp: 30, attack: 5 }),
    unit('p2', { x: 2, y: 3 }, { side: 'PLAYER', hp: 30, maxHp: 30, attack: 5 }),
  ];

  describe('executeAiTurn', () => {
    it('결정을 배틀 액션으로 전달하고 집중 배정 기록', () => {
      const executed: BattleAction[] = [];
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot(bruteScene()),
        unitId: 'b',
        coordination,
        executor: { execute: (action) => executed.push(action) },
      });

      expect(result.action).toEqual({
        type: 'USE_SKILL',
        skillId: 'slash',
        targetId: 'p1',
        actorId: 'b',
      });
      expect(executed).toEqual([result.action]);
      expect(coordination.assignedTarget('b')).toBe('p1');
    });

    it('같은 입력이면 같은 결정', () => {
      const run = () =>
        services.battleAi.executeAiTurn({
          snapshot: snapshot(bruteScene()),
          unitId: 'b',
          coordination: new CoordinationManager('battle-1', services.threat),
        });
      expect(run()).toEqual(run());
    });

    it('아군이 함께 닿으면 빈사 대상에 집중', () => {
      const e1 = unit('e1', { x: 0, y: 0 }, { aiProfile: 'brute', attack: 2 });
      const low = unit('p1', { x: 0, y: 1 }, { side: 'PLAYER', hp: 6 });
      const healer = unit('p2', { x: 1, y: 0 }, { side: 'PLAYER', attack: 10, role: 'SUPPORT' });
      const e2 = unit('e2', { x: 2, y: 2 }, { aiProfile: 'brute' });

      const alone = services.battleAi.executeAiTurn({
        snapshot: snapshot([e1, low, healer]),
        unitId: 'e1',
        coordination,
      });
      expect(alone.action).toEqual({ type: 'USE_SKILL', skillId: 'strike', targetId: 'p2', actorId: 'e1' });

      const together = services.battleAi.executeAiTurn({
        snapshot: snapshot([e1, low, healer, e2]),
        unitId: 'e1',
        coordination: new CoordinationManager('battle-1', services.threat),
      });
      expect(together.action).toEqual({ type: 'USE_SKILL', skillId: 'strike', targetId: 'p1', actorId: 'e1' });
    });

    it('기절 상태면 DEFEND, 배정 해제', () => {
      const [b, p1, p2] = bruteScene();
      const stunned = { ...b, statuses: [{ id: 'STUN', stacks: 1, duration: 1 }] };
      coordination.assign('b', 'p1');

      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot([stunned, p1, p2]),
        unitId: 'b',
        coordination,
      });
      expect(result.decision).toEqual({
        unitId: 'b',
        profile: 'brute',
        action: { type: 'DEFEND' },
        rationale: 'stunned',
      });
      expect(coordination.assignedTarget('b')).toBeUndefined();
    });

    it('침묵 + 기본기 없음 → DEFEND', () => {
      const b = unit('b', { x: 2, y: 2 }, {
        skills: ['slash'],
        statuses: [{ id: 'SILENCE', stacks: 1, duration: 1 }],
      });
      const p = unit('p1', { x: 3, y: 2 }, { side: 'PLAYER' });

      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot([b, p]),
        unitId: 'b',
        coordination,
      });
      expect(result.action).toEqual({ type: 'DEFEND', actorId: 'b' });
      expect(result.decision.rationale).toBe('no usable action');
    });
  });

  describe('프로필 해석', () => {
    const solo = (overrides: Partial<BattleUnit>): BattleUnit[] => [
      { ...unit('u', { x: 0, y: 0 }), ...overrides },
      unit('p1', { x: 1, y: 0 }, { side: 'PLAYER' }),
    ];

    it('알 수 없는 태그는 기본 프로필', () => {
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot(solo({ aiProfile: 'dragon' })),
        unitId: 'u',
        coordination,
      });
      expect(result.decision.profile).toBe('brute');
    });

    it('태그가 없으면 아키타입 프로필', () => {
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot(solo({ archetypeId: 'field_medic' })),
        unitId: 'u',
        coordination,
        archetypes: new Map([['field_medic', 'support']]),
      });
      expect(result.decision.profile).toBe('support');
    });

    it('유닛 태그가 아키타입보다 우선', () => {
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot(solo({ aiProfile: 'assassin', archetypeId: 'field_medic' })),
        unitId: 'u',
        coordination,
        archetypes: new Map([['field_medic', 'support']]),
      });
      expect(result.decision.profile).toBe('assassin');
    });
  });

  describe('결정 검증', () => {
    const scripted = (id: string, decide: (unit: BattleUnit) => Decision): AiProfile => ({
      id,
      description: 'scripted',
      chooseTarget: () => undefined,
      executeTurn: (u) => decide(u),
    });

    it('점유된 칸으로 이동하는 결정은 DEFEND 로 대체', () => {
      services.registry.register(
        scripted('rogue', (u) => ({
          unitId: u.id,
          profile: 'rogue',
          action: { type: 'MOVE', cell: { x: 1, y: 0 } },
          rationale: 'walk into p1',
        })),
      );
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot([
          unit('u', { x: 0, y: 0 }, { aiProfile: 'rogue' }),
          unit('p1', { x: 1, y: 0 }, { side: 'PLAYER' }),
        ]),
        unitId: 'u',
        coordination,
      });
      expect(result.action).toEqual({ type: 'DEFEND', actorId: 'u' });
      expect(result.decision.rationale).toBe('fallback: move target occupied or blocked');
    });

    it('사거리 밖 스킬 결정은 DEFEND 로 대체', () => {
      services.registry.register(
        scripted('sniper', (u) => ({
          unitId: u.id,
          profile: 'sniper',
          action: { type: 'USE_SKILL', skillId: 'strike', targetId: 'p1' },
          rationale: 'poke from afar',
        })),
      );
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot([
          unit('u', { x: 0, y: 0 }, { aiProfile: 'sniper' }),
          unit('p1', { x: 4, y: 0 }, { side: 'PLAYER' }),
        ]),
        unitId: 'u',
        coordination,
      });
      expect(result.action.type).toBe('DEFEND');
      expect(result.decision.rationale).toBe('fallback: target "p1" out of range');
    });

    it('프로필 내부 오류는 DEFEND 로 복구', () => {
      services.registry.register(
        scripted('broken', () => {
          throw new Error('boom');
        }),
      );
      const result = services.battleAi.executeAiTurn({
        snapshot: snapshot([
          unit('u', { x: 0, y: 0 }, { aiProfile: 'broken' }),
          unit('p1', { x: 1, y: 0 }, { side: 'PLAYER' }),
        ]),
        unitId: 'u',
        coordination,
      });
      expect(result.decision).toEqual({
        unitId: 'u',
        profile: 'broken',
        action: { type: 'DEFEND' },
        rationale: 'no usable action',
      });
    });
  });

  describe('호출 계약 위반', () => {
    it('없는 유닛', () => {
      expect(() =>
        services.battleAi.executeAiTurn({
          snapshot: snapshot(bruteScene()),
          unitId: 'nobody',
          coordination,
        }),
      ).toThrow(ContractViolationError);
    });

    it('쓰러진 유닛', () => {
      const [b, p1, p2] = bruteScene();
      expect(() =>
        services.battleAi.executeAiTurn({
          snapshot: snapshot([{ ...b, hp: 0 }, p1, p2]),
          unitId: 'b',
          coordination,
        }),
      ).toThrow(ContractViolationError);
    });

    it('한 칸에 두 유닛', () => {
      const [b, p1] = bruteScene();
      expect(() =>
        services.battleAi.executeAiTurn({
          snapshot: snapshot([b, { ...p1, pos: { x: 2, y: 2 } }]),
          unitId: 'b',
          coordination,
        }),
      ).toThrow(ContractViolationError);
    });
  });
});

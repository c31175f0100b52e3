import { BattleConflictError, NotFoundError } from '../../common/errors/game-errors.js';
import { BattleAiConfigService } from './battle-ai-config.service.js';
import { CoordinationService } from './coordination.service.js';
import { ThreatService } from './threat.service.js';
import { unit, view } from './testing/fixtures.js';

describe('CoordinationService', () => {
  let service: CoordinationService;

  beforeEach(() => {
    service = new CoordinationService(new ThreatService(), new BattleAiConfigService());
  });

  it('배틀별로 하나의 매니저', () => {
    const opened = service.open('b1');
    expect(service.get('b1')).toBe(opened);
    expect(opened.battleId).toBe('b1');
    expect(service.openCount).toBe(1);
  });

  it('중복 open 은 충돌', () => {
    service.open('b1');
    expect(() => service.open('b1')).toThrow(BattleConflictError);
  });

  it('열리지 않은 배틀 조회는 NotFound', () => {
    expect(() => service.get('missing')).toThrow(NotFoundError);
  });

  it('설정 변경은 이미 열린 배틀에도 다음 조회부터 반영', () => {
    const config = new BattleAiConfigService();
    service = new CoordinationService(new ThreatService(), config);
    const manager = service.open('b1');
    const e1 = unit('e1', { x: 0, y: 0 });
    const e2 = unit('e2', { x: 0, y: 2 });
    const p1 = unit('p1', { x: 1, y: 1 }, { side: 'PLAYER' });
    const v = view([e1, e2, p1]);

    expect(manager.shouldFocusFire([e1, e2], [p1], v)).toBe(true);
    config.update({ focusMinUnits: 3 });
    expect(manager.shouldFocusFire([e1, e2], [p1], v)).toBe(false);
  });

  it('close 후 배정이 사라진다', () => {
    const manager = service.open('b1');
    manager.assign('e1', 'p1');

    expect(service.close('b1')).toBe(true);
    expect(manager.size).toBe(0);
    expect(service.has('b1')).toBe(false);
    expect(service.close('b1')).toBe(false);
  });
});

import { BattleAiConfigService } from './battle-ai-config.service.js';

describe('BattleAiConfigService', () => {
  const KEYS = [
    'AI_DEFENSIVE_HP_THRESHOLD',
    'AI_SUPPORT_HEAL_THRESHOLD',
    'AI_FOCUS_MIN_UNITS',
    'AI_DEFAULT_PROFILE',
    'AI_DECISION_LOG',
  ];
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('기본값', () => {
    expect(new BattleAiConfigService().get()).toEqual({
      defensiveHpThreshold: 0.4,
      supportHealThreshold: 0.7,
      focusMinUnits: 2,
      defaultProfile: 'brute',
      decisionLogEnabled: true,
    });
  });

  it('환경 변수 반영, 잘못된 숫자는 기본값', () => {
    process.env.AI_DEFENSIVE_HP_THRESHOLD = '0.25';
    process.env.AI_SUPPORT_HEAL_THRESHOLD = 'lots';
    process.env.AI_FOCUS_MIN_UNITS = '1';
    process.env.AI_DEFAULT_PROFILE = 'caster';
    process.env.AI_DECISION_LOG = 'false';

    expect(new BattleAiConfigService().get()).toEqual({
      defensiveHpThreshold: 0.25,
      supportHealThreshold: 0.7,
      focusMinUnits: 2,
      defaultProfile: 'caster',
      decisionLogEnabled: false,
    });
  });

  it('런타임 변경', () => {
    const service = new BattleAiConfigService();
    service.update({ defensiveHpThreshold: 0.5 });
    expect(service.get().defensiveHpThreshold).toBe(0.5);
    expect(service.get().supportHealThreshold).toBe(0.7);
  });
});

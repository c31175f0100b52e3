// 팀 협동: 집중 공격 대상 배정 (배틀 단위 수명, AI 계층의 유일한 턴 간 상태)

import type { BattleUnit } from '../../db/types/index.js';
import { isAlive, type BattleView } from './battle-view.js';
import type { ThreatService } from './threat.service.js';
import { manhattan } from './grid.js';

interface FocusCandidate {
  target: BattleUnit;
  reachers: number;
  assigned: number;
  teamThreat: number;
}

const LOW_HP_RATIO = 0.4;

function byId(a: BattleUnit, b: BattleUnit): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class CoordinationManager {
  private readonly assignments = new Map<string, string>(); // unitId -> targetId

  /** focusMinUnits 는 조회마다 읽는다 (런타임 설정 변경이 열린 배틀에도 반영) */
  constructor(
    readonly battleId: string,
    private readonly threat: ThreatService,
    private readonly focusMinUnits: () => number = () => 2,
  ) {}

  assign(unitId: string, targetId: string): void {
    this.assignments.set(unitId, targetId);
  }

  release(unitId: string): void {
    this.assignments.delete(unitId);
  }

  assignedTarget(unitId: string): string | undefined {
    return this.assignments.get(unitId);
  }

  focusCount(targetId: string): number {
    let count = 0;
    for (const t of this.assignments.values()) if (t === targetId) count++;
    return count;
  }

  get size(): number {
    return this.assignments.size;
  }

  clear(): void {
    this.assignments.clear();
  }

  /** 이번 턴 + 다음 턴 안에 target 에 닿을 수 있는지 */
  canReach(member: BattleUnit, target: BattleUnit, view: BattleView): boolean {
    return manhattan(member.pos, target.pos) <= 2 * member.movement + view.reach(member);
  }

  /**
   * 죽었거나 사라진 대상, 사라진 배정자, 사거리 밖으로 벗어난 배정은 제거.
   * 에러 없이 다음 조회에서 재배정된다.
   */
  prune(team: readonly BattleUnit[], candidates: readonly BattleUnit[], view: BattleView): void {
    for (const [unitId, targetId] of [...this.assignments]) {
      const member = team.find((u) => u.id === unitId && isAlive(u));
      const target = candidates.find((c) => c.id === targetId && isAlive(c));
      if (!member || !target || !this.canReach(member, target, view)) {
        this.assignments.delete(unitId);
      }
    }
  }

  /** 후보 중 하나라도 focusMinUnits 명 이상이 닿으면 집중 공격 */
  shouldFocusFire(
    team: readonly BattleUnit[],
    candidates: readonly BattleUnit[],
    view: BattleView,
  ): boolean {
    const min = this.focusMinUnits();
    return this.evaluate(team, candidates, view).some((c) => c.reachers >= min);
  }

  getFocusTarget(
    team: readonly BattleUnit[],
    candidates: readonly BattleUnit[],
    view: BattleView,
  ): BattleUnit | undefined {
    const scored = this.evaluate(team, candidates, view);
    const min = this.focusMinUnits();
    const reachable = scored.filter((c) => c.reachers >= min);

    // 1. 여럿이 닿는 대상 중 이미 배정된 대상 유지
    const kept = reachable.filter((c) => c.assigned > 0);
    if (kept.length > 0) {
      return kept.sort(
        (a, b) =>
          b.assigned - a.assigned || b.teamThreat - a.teamThreat || byId(a.target, b.target),
      )[0].target;
    }

    // 2. 여럿이 닿는 대상 중 빈사 우선, 그다음 팀 위협
    const pool = reachable.length > 0 ? reachable : scored;
    const lowHp = (c: FocusCandidate) => (view.hpRatio(c.target) < LOW_HP_RATIO ? 0 : 1);
    return pool.sort(
      (a, b) =>
        lowHp(a) - lowHp(b) ||
        b.teamThreat - a.teamThreat ||
        a.target.hp - b.target.hp ||
        byId(a.target, b.target),
    )[0]?.target;
  }

  private evaluate(
    team: readonly BattleUnit[],
    candidates: readonly BattleUnit[],
    view: BattleView,
  ): FocusCandidate[] {
    this.prune(team, candidates, view);

    const members = team.filter(isAlive);
    const live = candidates.filter(isAlive);
    if (members.length === 0) return [];

    return live.map((target) => ({
      target,
      reachers: members.filter((m) => this.canReach(m, target, view)).length,
      assigned: this.focusCount(target.id),
      teamThreat:
        members.reduce((sum, m) => sum + this.threat.calculateThreatValue(m, target, view), 0) /
        members.length,
    }));
  }
}

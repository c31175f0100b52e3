// 스냅샷 위의 읽기 전용 질의 계층. AI는 이 뷰만 읽고 유닛 상태를 바꾸지 않는다.

import type {
  BattleSnapshot,
  BattleUnit,
  GridPos,
  SkillDefinition,
} from '../../db/types/index.js';
import { ContractViolationError } from '../../common/errors/game-errors.js';
import {
  STEPS_4,
  cellKey,
  facingVector,
  isAdjacent,
  manhattan,
  sign,
} from './grid.js';

export interface ReachableCell {
  cell: GridPos;
  steps: number;
}

const OFFENSIVE_EFFECTS = new Set(['DAMAGE', 'DEBUFF', 'STATUS']);

export function isAlive(unit: BattleUnit): boolean {
  return unit.hp > 0;
}

export class BattleView {
  readonly battleId: string;
  readonly round: number;
  readonly width: number;
  readonly height: number;
  private readonly unitList: BattleUnit[];
  private readonly unitsById = new Map<string, BattleUnit>();
  private readonly skillsById = new Map<string, SkillDefinition>();
  private readonly blocked = new Set<string>();
  private readonly occupancy = new Map<string, BattleUnit>();

  constructor(snapshot: BattleSnapshot) {
    this.battleId = snapshot.battleId;
    this.round = snapshot.round;
    this.width = snapshot.grid.width;
    this.height = snapshot.grid.height;

    if (
      !Number.isInteger(this.width) ||
      !Number.isInteger(this.height) ||
      this.width <= 0 ||
      this.height <= 0
    ) {
      throw new ContractViolationError('Grid dimensions must be positive integers', {
        width: this.width,
        height: this.height,
      });
    }

    for (const skill of snapshot.skills) this.skillsById.set(skill.id, skill);
    for (const cell of snapshot.grid.blocked) this.blocked.add(cellKey(cell));

    for (const unit of snapshot.units) {
      this.assertUnit(unit);
      this.unitsById.set(unit.id, unit);
      if (!isAlive(unit)) continue;
      const key = cellKey(unit.pos);
      const other = this.occupancy.get(key);
      if (other) {
        throw new ContractViolationError('Two units share one cell', {
          cell: unit.pos,
          units: [other.id, unit.id],
        });
      }
      this.occupancy.set(key, unit);
    }
    this.unitList = snapshot.units;
  }

  private assertUnit(unit: BattleUnit): void {
    if (this.unitsById.has(unit.id)) {
      throw new ContractViolationError(`Duplicate unit id "${unit.id}"`);
    }
    if (!unit.pos || !this.inBounds(unit.pos)) {
      throw new ContractViolationError(`Unit "${unit.id}" has no position on the grid`, {
        pos: unit.pos ?? null,
      });
    }
    if (isAlive(unit) && this.blocked.has(cellKey(unit.pos))) {
      throw new ContractViolationError(`Unit "${unit.id}" stands on a blocked cell`, {
        pos: unit.pos,
      });
    }
    if (unit.maxHp <= 0) {
      throw new ContractViolationError(`Unit "${unit.id}" has non-positive maxHp`);
    }
    if (unit.skills.length === 0) {
      throw new ContractViolationError(`Unit "${unit.id}" has no skills`);
    }
    for (const slot of unit.skills) {
      if (!this.skillsById.has(slot.skillId)) {
        throw new ContractViolationError(
          `Unit "${unit.id}" references unknown skill "${slot.skillId}"`,
        );
      }
    }
  }

  // ── 유닛 조회 ──

  get allUnits(): readonly BattleUnit[] {
    return this.unitList;
  }

  getUnit(id: string): BattleUnit | undefined {
    return this.unitsById.get(id);
  }

  liveUnits(): BattleUnit[] {
    return this.unitList.filter(isAlive);
  }

  enemiesOf(unit: BattleUnit): BattleUnit[] {
    return this.unitList.filter((u) => isAlive(u) && u.side !== unit.side);
  }

  /** 같은 편 생존 유닛 (자기 자신 제외) */
  alliesOf(unit: BattleUnit): BattleUnit[] {
    return this.unitList.filter(
      (u) => isAlive(u) && u.side === unit.side && u.id !== unit.id,
    );
  }

  getSkill(id: string): SkillDefinition | undefined {
    return this.skillsById.get(id);
  }

  hasStatus(unit: BattleUnit, statusId: string): boolean {
    return unit.statuses.some((s) => s.id === statusId);
  }

  statusStacks(unit: BattleUnit, statusId: string): number {
    return unit.statuses.find((s) => s.id === statusId)?.stacks ?? 0;
  }

  hpRatio(unit: BattleUnit): number {
    return unit.hp / Math.max(1, unit.maxHp);
  }

  /** 무기/공격 스킬 중 가장 긴 사거리 */
  reach(unit: BattleUnit): number {
    let best = unit.weaponRange;
    for (const slot of unit.skills) {
      const skill = this.skillsById.get(slot.skillId);
      if (skill && OFFENSIVE_EFFECTS.has(skill.effect) && skill.targeting !== 'SELF') {
        best = Math.max(best, skill.range);
      }
    }
    return best;
  }

  // ── 격자 ──

  inBounds(p: GridPos): boolean {
    return p.x >= 0 && p.y >= 0 && p.x < this.width && p.y < this.height;
  }

  isBlocked(p: GridPos): boolean {
    return this.blocked.has(cellKey(p));
  }

  occupant(p: GridPos): BattleUnit | undefined {
    return this.occupancy.get(cellKey(p));
  }

  /** 범위 안, 장애물 아님, 다른 유닛 없음 (ignoreId 유닛 자리는 빈칸 취급) */
  isFree(p: GridPos, ignoreId?: string): boolean {
    if (!this.inBounds(p) || this.isBlocked(p)) return false;
    const occ = this.occupant(p);
    return !occ || occ.id === ignoreId;
  }

  /**
   * 이동력 안에서 도달 가능한 칸 (4방향 BFS, 유닛/장애물 통과 불가).
   * 현재 위치는 steps 0으로 포함된다.
   */
  reachableCells(unit: BattleUnit, maxSteps: number = unit.movement): ReachableCell[] {
    const start = unit.pos;
    const seen = new Map<string, ReachableCell>([
      [cellKey(start), { cell: start, steps: 0 }],
    ]);
    let frontier: GridPos[] = [start];

    for (let step = 1; step <= maxSteps && frontier.length > 0; step++) {
      const next: GridPos[] = [];
      for (const from of frontier) {
        for (const d of STEPS_4) {
          const cell = { x: from.x + d.x, y: from.y + d.y };
          const key = cellKey(cell);
          if (seen.has(key) || !this.isFree(cell, unit.id)) continue;
          seen.set(key, { cell, steps: step });
          next.push(cell);
        }
      }
      frontier = next;
    }
    return [...seen.values()];
  }

  /**
   * goals 중 가장 가까운 칸까지의 경로 길이 (칸 키 → 걸음 수).
   * 장애물과 유닛은 통과 불가, ignoreId 유닛 자리는 빈칸 취급.
   */
  pathDistances(goals: readonly GridPos[], ignoreId?: string): Map<string, number> {
    const dist = new Map<string, number>();
    let frontier: GridPos[] = [];
    for (const goal of goals) {
      const key = cellKey(goal);
      if (dist.has(key) || !this.isFree(goal, ignoreId)) continue;
      dist.set(key, 0);
      frontier.push(goal);
    }

    for (let step = 1; frontier.length > 0; step++) {
      const next: GridPos[] = [];
      for (const from of frontier) {
        for (const d of STEPS_4) {
          const cell = { x: from.x + d.x, y: from.y + d.y };
          const key = cellKey(cell);
          if (dist.has(key) || !this.isFree(cell, ignoreId)) continue;
          dist.set(key, step);
          next.push(cell);
        }
      }
      frontier = next;
    }
    return dist;
  }

  /** 다음 턴에 cell 을 공격할 수 있는 적 수 */
  exposure(cell: GridPos, unit: BattleUnit): number {
    return this.enemiesOf(unit).filter(
      (e) => manhattan(e.pos, cell) <= e.movement + this.reach(e),
    ).length;
  }

  /**
   * from 칸에서 target 을 측면/후면 공격하는지. 상하좌우 인접 칸만 해당.
   * - facing 이 있으면: 정면 반평면이 아니면 측면
   * - 없으면: 공격자 반대편 칸에 대상의 아군이 없을 때 측면 (대열 기준)
   */
  isFlanking(from: GridPos, target: BattleUnit): boolean {
    if (!isAdjacent(from, target.pos)) return false;
    const dx = from.x - target.pos.x;
    const dy = from.y - target.pos.y;

    if (target.facing) {
      const f = facingVector(target.facing);
      return dx * f.x + dy * f.y <= 0;
    }

    const opposite = { x: target.pos.x - sign(dx), y: target.pos.y - sign(dy) };
    const guard = this.occupant(opposite);
    return !guard || guard.side !== target.side;
  }
}

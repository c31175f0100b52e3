// 위치 선정: 측면, 광역 중심, 사거리 유지, 후퇴, 접근, 호위

import { Injectable } from '@nestjs/common';
import type { BattleUnit, GridPos, SkillDefinition } from '../../db/types/index.js';
import type { BattleView, ReachableCell } from './battle-view.js';
import { STEPS_4, cellKey, compareRowMajor, manhattan } from './grid.js';

export type PositionResult =
  | { status: 'MOVE'; cell: GridPos; steps: number }
  | { status: 'STAY' }
  | { status: 'NONE' };

export interface AoePlacement {
  cell: GridPos;
  covered: BattleUnit[];
}

const STAY: PositionResult = { status: 'STAY' };
const NONE: PositionResult = { status: 'NONE' };

function toMove(best: ReachableCell | undefined): PositionResult {
  return best ? { status: 'MOVE', cell: best.cell, steps: best.steps } : NONE;
}

function nearestEnemyDistance(cell: GridPos, enemies: BattleUnit[]): number {
  return Math.min(...enemies.map((e) => manhattan(e.pos, cell)));
}

@Injectable()
export class PositioningService {
  /**
   * 측면 칸 탐색. canStrike 는 그 칸에서 대상에게 스킬이 닿는지 (닿지 않는 측면은 후보가 아니다).
   */
  findFlankingPosition(
    unit: BattleUnit,
    target: BattleUnit,
    view: BattleView,
    canStrike: (cell: GridPos) => boolean = () => true,
  ): PositionResult {
    if (view.isFlanking(unit.pos, target) && canStrike(unit.pos)) return STAY;

    const reachable = new Map(
      view.reachableCells(unit).map((r) => [cellKey(r.cell), r] as const),
    );
    const options: ReachableCell[] = [];
    for (const d of STEPS_4) {
      const cell = { x: target.pos.x + d.x, y: target.pos.y + d.y };
      const r = reachable.get(cellKey(cell));
      if (r && r.steps > 0 && view.isFlanking(cell, target) && canStrike(cell)) options.push(r);
    }
    options.sort((a, b) => a.steps - b.steps || compareRowMajor(a.cell, b.cell));
    return toMove(options[0]);
  }

  /**
   * 광역 스킬 중심 칸: 맞는 적 수 최대.
   * 아군 피격 스킬이면 다른 아군이 범위에 들어가는 중심은 제외 (시전자 자신은 맞지 않는다).
   */
  findOptimalAoePosition(
    unit: BattleUnit,
    skill: SkillDefinition,
    view: BattleView,
  ): AoePlacement | null {
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return null;

    const radius = skill.radius ?? 1;
    const minRange = skill.minRange ?? 0;
    const friends = view.alliesOf(unit);
    const cx = enemies.reduce((sum, e) => sum + e.pos.x, 0) / enemies.length;
    const cy = enemies.reduce((sum, e) => sum + e.pos.y, 0) / enemies.length;
    const centroidDist = (p: GridPos) => (p.x - cx) ** 2 + (p.y - cy) ** 2;

    let best: AoePlacement | null = null;
    for (let y = unit.pos.y - skill.range; y <= unit.pos.y + skill.range; y++) {
      for (let x = unit.pos.x - skill.range; x <= unit.pos.x + skill.range; x++) {
        const cell = { x, y };
        const dist = manhattan(unit.pos, cell);
        if (!view.inBounds(cell) || dist < minRange || dist > skill.range) continue;

        const covered = enemies.filter((e) => manhattan(e.pos, cell) <= radius);
        if (covered.length === 0) continue;
        if (skill.hitsAllies && friends.some((f) => manhattan(f.pos, cell) <= radius)) {
          continue;
        }

        if (
          !best ||
          covered.length > best.covered.length ||
          (covered.length === best.covered.length &&
            (centroidDist(cell) < centroidDist(best.cell) ||
              (centroidDist(cell) === centroidDist(best.cell) &&
                compareRowMajor(cell, best.cell) < 0)))
        ) {
          best = { cell, covered };
        }
      }
    }
    return best;
  }

  /** [minRange, maxRange] 밴드 유지. 밴드 안이면 STAY, 밖이면 노출이 가장 적은 밴드 칸 */
  findOptimalRangePosition(
    unit: BattleUnit,
    target: BattleUnit,
    minRange: number,
    maxRange: number,
    view: BattleView,
  ): PositionResult {
    const current = manhattan(unit.pos, target.pos);
    if (current >= minRange && current <= maxRange) return STAY;

    const options = view
      .reachableCells(unit)
      .filter((r) => {
        const d = manhattan(r.cell, target.pos);
        return r.steps > 0 && d >= minRange && d <= maxRange;
      })
      .map((r) => ({
        r,
        exposure: view.exposure(r.cell, unit),
        dist: manhattan(r.cell, target.pos),
      }));
    options.sort(
      (a, b) =>
        a.exposure - b.exposure ||
        a.r.steps - b.r.steps ||
        b.dist - a.dist ||
        compareRowMajor(a.r.cell, b.r.cell),
    );
    return toMove(options[0]?.r);
  }

  /** 가장 가까운 적과의 거리를 늘리는 칸. 없으면 NONE */
  findRetreatPosition(unit: BattleUnit, view: BattleView): PositionResult {
    const enemies = view.enemiesOf(unit);
    if (enemies.length === 0) return NONE;
    const current = nearestEnemyDistance(unit.pos, enemies);

    const options = view
      .reachableCells(unit)
      .filter((r) => r.steps > 0)
      .map((r) => ({
        r,
        gap: nearestEnemyDistance(r.cell, enemies),
        exposure: view.exposure(r.cell, unit),
      }))
      .filter((o) => o.gap > current);
    options.sort(
      (a, b) =>
        a.exposure - b.exposure ||
        b.gap - a.gap ||
        a.r.steps - b.r.steps ||
        compareRowMajor(a.r.cell, b.r.cell),
    );
    return toMove(options[0]?.r);
  }

  /**
   * target 에서 desiredRange 이내인 칸으로 가는 경로를 따라 전진. 이미 이내면 STAY.
   * 그런 칸까지 길이 없으면 직선 거리를 줄이는 칸.
   */
  findApproachPosition(
    unit: BattleUnit,
    target: BattleUnit,
    view: BattleView,
    desiredRange = 1,
  ): PositionResult {
    const current = manhattan(unit.pos, target.pos);
    if (current <= desiredRange) return STAY;

    const goals: GridPos[] = [];
    for (let y = target.pos.y - desiredRange; y <= target.pos.y + desiredRange; y++) {
      for (let x = target.pos.x - desiredRange; x <= target.pos.x + desiredRange; x++) {
        if (manhattan({ x, y }, target.pos) <= desiredRange) goals.push({ x, y });
      }
    }
    const remaining = view.pathDistances(goals, unit.id);
    const here = remaining.get(cellKey(unit.pos));
    const moves = view.reachableCells(unit).filter((r) => r.steps > 0);

    if (here !== undefined) {
      const options = moves
        .map((r) => ({ r, left: remaining.get(cellKey(r.cell)) ?? Infinity }))
        .filter((o) => o.left < here);
      options.sort(
        (a, b) =>
          a.left - b.left || a.r.steps - b.r.steps || compareRowMajor(a.r.cell, b.r.cell),
      );
      return toMove(options[0]?.r);
    }

    const options = moves
      .map((r) => ({ r, dist: manhattan(r.cell, target.pos) }))
      .filter((o) => o.dist < current);
    options.sort(
      (a, b) =>
        Math.max(a.dist, desiredRange) - Math.max(b.dist, desiredRange) ||
        a.r.steps - b.r.steps ||
        compareRowMajor(a.r.cell, b.r.cell),
    );
    return toMove(options[0]?.r);
  }

  /** ally 옆 칸 중 threat 에 가장 가까운 칸 (몸으로 막기) */
  findGuardPosition(
    unit: BattleUnit,
    ally: BattleUnit,
    threat: BattleUnit,
    view: BattleView,
  ): PositionResult {
    const reachable = new Map(
      view.reachableCells(unit).map((r) => [cellKey(r.cell), r] as const),
    );
    const options: ReachableCell[] = [];
    for (const d of STEPS_4) {
      const r = reachable.get(cellKey({ x: ally.pos.x + d.x, y: ally.pos.y + d.y }));
      if (r) options.push(r);
    }
    options.sort(
      (a, b) =>
        manhattan(a.cell, threat.pos) - manhattan(b.cell, threat.pos) ||
        a.steps - b.steps ||
        compareRowMajor(a.cell, b.cell),
    );
    const best = options[0];
    if (!best) return NONE;
    return best.steps === 0 ? STAY : toMove(best);
  }
}

// 격자 거리/좌표 유틸

import type { Direction, GridPos } from '../../db/types/index.js';

export const STEPS_4: ReadonlyArray<GridPos> = [
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: 0, y: 1 },
  { x: -1, y: 0 },
];

const FACING_VECTOR: Record<Direction, GridPos> = {
  N: { x: 0, y: -1 },
  E: { x: 1, y: 0 },
  S: { x: 0, y: 1 },
  W: { x: -1, y: 0 },
};

export function manhattan(a: GridPos, b: GridPos): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/** 상하좌우 인접 (사거리 1 근접기가 닿는 칸) */
export function isAdjacent(a: GridPos, b: GridPos): boolean {
  return manhattan(a, b) === 1;
}

export function cellKey(p: GridPos): string {
  return `${p.x},${p.y}`;
}

export function samePos(a: GridPos, b: GridPos): boolean {
  return a.x === b.x && a.y === b.y;
}

/** 행 우선 비교 (y, x): 결정적 동점 처리용 */
export function compareRowMajor(a: GridPos, b: GridPos): number {
  return a.y - b.y || a.x - b.x;
}

export function facingVector(d: Direction): GridPos {
  return FACING_VECTOR[d];
}

export function sign(n: number): number {
  return n > 0 ? 1 : n < 0 ? -1 : 0;
}

import type { Point } from '../types';

/** Parameter resolution used before arc-length resampling of a cubic. */
export const CUBIC_FLATTEN_STEPS = 1000;

export interface CurveSample {
  pt: Point;
  t: number;
}

interface CubicCoefficients {
  ax: number; ay: number;
  bx: number; by: number;
  cx: number; cy: number;
  dx: number; dy: number;
}

function calcCubicParameters(p0: Point, p1: Point, p2: Point, p3: Point): CubicCoefficients {
  const cx = 3 * (p1.x - p0.x);
  const cy = 3 * (p1.y - p0.y);
  const bx = 3 * (p2.x - p1.x) - cx;
  const by = 3 * (p2.y - p1.y) - cy;
  return {
    ax: p3.x - p0.x - cx - bx,
    ay: p3.y - p0.y - cy - by,
    bx, by,
    cx, cy,
    dx: p0.x,
    dy: p0.y,
  };
}

function evalPolynomial(k: CubicCoefficients, t: number): Point {
  return {
    x: ((k.ax * t + k.bx) * t + k.cx) * t + k.dx,
    y: ((k.ay * t + k.by) * t + k.cy) * t + k.dy,
  };
}

/**
 * Point on the cubic p0 → p3 (controls p1, p2) at parameter t. The end
 * parameters return the end points themselves, not a rounded polynomial value.
 */
export function evaluateCubicAt(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  if (t === 0) return { x: p0.x, y: p0.y };
  if (t === 1) return { x: p3.x, y: p3.y };
  return evalPolynomial(calcCubicParameters(p0, p1, p2, p3), t);
}

export function distance(a: Point, b: Point): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

export function interpolateScalar(v0: number, v1: number, t: number): number {
  return v0 + t * (v1 - v0);
}

export function pointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/** Heading of the vector a → b, in radians. */
export function calcAngle(a: Point, b: Point): number {
  return Math.atan2(b.y - a.y, b.x - a.x);
}

export function projectPoint(pt: Point, angle: number, length: number): Point {
  return {
    x: pt.x + Math.cos(angle) * length,
    y: pt.y + Math.sin(angle) * length,
  };
}

/**
 * Points every `spacing` units from p0 towards p1. The end point is left out;
 * the following segment starts there. Shorter than `spacing` gives nothing.
 */
export function resampleLineSegment(p0: Point, p1: Point, spacing: number): Point[] {
  const length = distance(p0, p1);
  const steps = Math.floor(length / spacing);

  const points: Point[] = [];
  for (let i = 0; i < steps; i++) {
    const factor = (i * spacing) / length;
    points.push({
      x: interpolateScalar(p0.x, p1.x, factor),
      y: interpolateScalar(p0.y, p1.y, factor),
    });
  }
  return points;
}

/**
 * `steps` samples of the cubic, uniform in t (not in length): the start and
 * end points plus `steps - 2` interior samples.
 */
export function flattenCubic(p0: Point, p1: Point, p2: Point, p3: Point, steps: number): CurveSample[] {
  const count = Math.max(2, Math.floor(steps));
  const k = calcCubicParameters(p0, p1, p2, p3);

  const samples: CurveSample[] = [{ pt: { x: p0.x, y: p0.y }, t: 0 }];
  for (let i = 1; i < count - 1; i++) {
    const t = i / (count - 1);
    samples.push({ pt: evalPolynomial(k, t), t });
  }
  samples.push({ pt: { x: p3.x, y: p3.y }, t: 1 });
  return samples;
}

/**
 * Approximately `spacing`-apart points along the cubic, both end points
 * included. Picks from a dense parameter-uniform flattening: each kept point is
 * the first raw sample at least `spacing` away from the previous one.
 */
export function resampleCubicByArcLength(
  p0: Point, p1: Point, p2: Point, p3: Point,
  spacing: number,
): Point[] {
  const raw = flattenCubic(p0, p1, p2, p3, CUBIC_FLATTEN_STEPS);

  const kept: Point[] = [];
  let index = 0;
  while (index < raw.length) {
    const anchor = raw[index].pt;
    kept.push(anchor);

    let next = -1;
    for (let j = index + 1; j < raw.length; j++) {
      if (distance(anchor, raw[j].pt) >= spacing) {
        next = j;
        break;
      }
    }
    if (next < 0) break;
    index = next;
  }

  const last = raw[raw.length - 1].pt;
  if (kept[kept.length - 1] !== last) {
    kept.push(last);
  }
  return kept;
}

/** Shoelace sum. Positive is counter-clockwise in y-up font coordinates. */
export function signedArea(points: readonly Point[]): number {
  let area = 0;
  for (let i = 0; i < points.length; i++) {
    const j = (i + 1) % points.length;
    area += points[i].x * points[j].y;
    area -= points[j].x * points[i].y;
  }
  return area / 2;
}

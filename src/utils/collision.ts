import type {
  ContainmentPredicate,
  OutwardSide,
  Point,
  ProbeResult,
} from '../types';
import { calcAngle, pointsEqual, projectPoint } from './bezier';

/**
 * Rotation from the direction of travel to the outward normal. Pointing right
 * of travel is outside the material for outlines in the standard (outer
 * counter-clockwise) direction.
 */
export const OUTWARD_NORMAL_ROTATION = -Math.PI / 2;

/** Pairs sampled per contour when resolving the outward side. */
export const SIDE_SAMPLE_COUNT = 8;
/** Distance from a pair's midpoint at which the material side is tested. */
export const SIDE_PROBE_DISTANCE = 0.5;

export interface ClassifierContext {
  bitRadius: number;
  bitDiameterUnits: number;
  toleranceUnits: number;
  pointInside: ContainmentPredicate;
  ringAngleStepDegrees: number;
  outwardSide: OutwardSide;
}

export interface ContourClassification {
  clearProbes: ProbeResult[];
  collidingProbes: ProbeResult[];
  /** Sharp-radius offsets of the clear probes, in train order. */
  preview: Point[];
}

/**
 * Samples the predicate on a ring of `radius` around `center`, one point every
 * `angleStep` degrees starting at 0°. Any inside sample counts as a collision.
 */
export function isTouching(
  center: Point,
  radius: number,
  pointInside: ContainmentPredicate,
  angleStep = 15,
): boolean {
  for (let angle = 0; angle < 360; angle += angleStep) {
    const rad = (angle * Math.PI) / 180;
    const sample = {
      x: center.x + Math.cos(rad) * radius,
      y: center.y + Math.sin(rad) * radius,
    };
    if (pointInside(sample)) return true;
  }
  return false;
}

function validPairs(points: readonly Point[]): [Point, Point][] {
  const pairs: [Point, Point][] = [];
  for (let i = 1; i < points.length; i++) {
    if (!pointsEqual(points[i], points[i - 1])) {
      pairs.push([points[i - 1], points[i]]);
    }
  }
  return pairs;
}

/**
 * Decides on which side of travel the contour's material-free side lies by
 * testing both sides of a spread of its on-outline points. A pair votes only
 * when exactly one side is inside; more votes for material on the right means
 * the contour runs against the standard direction.
 *
 * The test starts at the pair's end point, which lies on the outline. A chord
 * midpoint sits inside a convex curve by the chord's sagitta and would read
 * as material on both sides of a small dot.
 */
export function resolveOutwardSide(
  points: readonly Point[],
  pointInside: ContainmentPredicate,
): 'right' | 'left' {
  const pairs = validPairs(points);
  if (pairs.length === 0) return 'right';

  const count = Math.min(SIDE_SAMPLE_COUNT, pairs.length);
  let materialRight = 0;
  let materialLeft = 0;
  for (let s = 0; s < count; s++) {
    const [prev, cur] = pairs[Math.floor((s * pairs.length) / count)];
    const heading = calcAngle(prev, cur);
    const right = pointInside(projectPoint(cur, heading + OUTWARD_NORMAL_ROTATION, SIDE_PROBE_DISTANCE));
    const left = pointInside(projectPoint(cur, heading - OUTWARD_NORMAL_ROTATION, SIDE_PROBE_DISTANCE));
    if (right && !left) materialRight++;
    if (left && !right) materialLeft++;
  }
  return materialRight > materialLeft ? 'left' : 'right';
}

export function classifyContour(points: readonly Point[], ctx: ClassifierContext): ContourClassification {
  const clearProbes: ProbeResult[] = [];
  const collidingProbes: ProbeResult[] = [];
  const preview: Point[] = [];

  const side = ctx.outwardSide === 'auto'
    ? resolveOutwardSide(points, ctx.pointInside)
    : ctx.outwardSide;
  const rotation = side === 'right' ? OUTWARD_NORMAL_ROTATION : -OUTWARD_NORMAL_ROTATION;

  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const cur = points[i];
    if (pointsEqual(cur, prev)) continue;

    const normal = calcAngle(prev, cur) + rotation;
    const toleranceProbe = projectPoint(cur, normal, ctx.bitRadius + ctx.toleranceUnits);
    const sharpProbe = projectPoint(cur, normal, ctx.bitRadius);

    const isColliding = isTouching(toleranceProbe, ctx.bitRadius, ctx.pointInside, ctx.ringAngleStepDegrees);
    const probe: ProbeResult = Object.freeze({
      position: Object.freeze(toleranceProbe),
      bitDiameterUnits: ctx.bitDiameterUnits,
      isColliding,
    });

    if (isColliding) {
      collidingProbes.push(probe);
    } else {
      clearProbes.push(probe);
      preview.push(Object.freeze(sharpProbe));
    }
  }

  return { clearProbes, collidingProbes, preview };
}

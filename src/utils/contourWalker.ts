import type { OutlinePen, Point, WalkedContour } from '../types';
import {
  pointsEqual,
  resampleCubicByArcLength,
  resampleLineSegment,
  signedArea,
} from './bezier';
import { OutlineProtocolError } from './errors';

export interface ContourWalker extends OutlinePen {
  /** Finalises any open contour and returns everything walked so far. */
  finish(): WalkedContour[];
}

function countDistinct(points: readonly Point[]): number {
  let distinct = 0;
  for (let i = 0; i < points.length && distinct < 2; i++) {
    if (i === 0 || !pointsEqual(points[i], points[0])) distinct++;
  }
  return distinct;
}

/**
 * Pen that breaks each contour it is drawn with into a point train spaced
 * `spacing` design units apart.
 */
export function createContourWalker(spacing: number): ContourWalker {
  const contours: WalkedContour[] = [];

  let points: Point[] = [];
  let firstPt: Point | null = null;
  let prevPt: Point | null = null;

  function current(op: string): Point {
    if (prevPt === null) {
      throw new OutlineProtocolError(`${op} called without an open contour`);
    }
    return prevPt;
  }

  function finalize(): void {
    if (firstPt !== null && countDistinct(points) >= 2) {
      contours.push({ points, isClockwise: signedArea(points) < 0 });
    }
    points = [];
    firstPt = null;
    prevPt = null;
  }

  return {
    moveTo(pt) {
      if (firstPt !== null) finalize();
      points = [];
      firstPt = pt;
      prevPt = pt;
    },

    lineTo(pt) {
      points.push(...resampleLineSegment(current('lineTo'), pt, spacing));
      prevPt = pt;
    },

    curveTo(c1, c2, pt) {
      points.push(...resampleCubicByArcLength(current('curveTo'), c1, c2, pt, spacing));
      prevPt = pt;
    },

    closePath() {
      const start = firstPt;
      const prev = current('closePath');
      if (start !== null) {
        points.push(...resampleLineSegment(prev, start, spacing));
      }
      finalize();
    },

    finish() {
      finalize();
      return contours;
    },
  };
}

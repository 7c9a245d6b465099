import type { PathCommand } from 'opentype.js';
import polygonClipping from 'polygon-clipping';
import type { ContainmentPredicate, FillRule, GlyphOutline, Point } from '../types';
import { drawPathCommands, getContourRanges, quadraticToCubic } from './pathCommands';

type Ring = [number, number][];

export const RING_SAMPLES_PER_CURVE = 40;

function sampleCubicBezier(
  x0: number, y0: number, x1: number, y1: number,
  x2: number, y2: number, x3: number, y3: number, steps: number,
): Ring {
  const pts: Ring = [];
  for (let i = 1; i <= steps; i++) {
    const t = i / steps;
    const mt = 1 - t;
    pts.push([
      mt * mt * mt * x0 + 3 * mt * mt * t * x1 + 3 * mt * t * t * x2 + t * t * t * x3,
      mt * mt * mt * y0 + 3 * mt * mt * t * y1 + 3 * mt * t * t * y2 + t * t * t * y3,
    ]);
  }
  return pts;
}

function contourToRing(
  commands: PathCommand[], start: number, end: number, samplesPerCurve: number,
): Ring {
  const ring: Ring = [];
  let cx = 0, cy = 0;
  for (let i = start; i <= end; i++) {
    const cmd = commands[i];
    if (cmd.type === 'M' || cmd.type === 'L') {
      cx = cmd.x;
      cy = cmd.y;
      ring.push([cx, cy]);
    } else if (cmd.type === 'C') {
      ring.push(...sampleCubicBezier(cx, cy, cmd.x1, cmd.y1, cmd.x2, cmd.y2, cmd.x, cmd.y, samplesPerCurve));
      cx = cmd.x;
      cy = cmd.y;
    }
  }
  return ring;
}

/** Closed rings (last point not repeated) of every contour with an area. */
export function commandsToRings(commands: PathCommand[], samplesPerCurve = RING_SAMPLES_PER_CURVE): Ring[] {
  const cubic = quadraticToCubic(commands);
  const rings: Ring[] = [];
  for (const { start, end } of getContourRanges(cubic)) {
    const ring = contourToRing(cubic, start, end, samplesPerCurve);
    const first = ring[0];
    const last = ring[ring.length - 1];
    if (ring.length > 1 && first[0] === last[0] && first[1] === last[1]) {
      ring.pop();
    }
    if (ring.length >= 3) {
      rings.push(ring);
    }
  }
  return rings;
}

function isLeft(a: [number, number], b: [number, number], pt: Point): number {
  return (b[0] - a[0]) * (pt.y - a[1]) - (pt.x - a[0]) * (b[1] - a[1]);
}

export function windingNumber(pt: Point, ring: Ring): number {
  let wn = 0;
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    if (a[1] <= pt.y) {
      if (b[1] > pt.y && isLeft(a, b, pt) > 0) wn++;
    } else if (b[1] <= pt.y && isLeft(a, b, pt) < 0) {
      wn--;
    }
  }
  return wn;
}

function ringContains(pt: Point, ring: Ring): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if ((yi > pt.y) !== (yj > pt.y) && pt.x < ((xj - xi) * (pt.y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

/**
 * Containment test over the whole outline. `nonzero` sums winding numbers;
 * `evenodd` first resolves overlaps with an xor of all rings.
 */
export function createPointInside(commands: PathCommand[], fillRule: FillRule = 'nonzero'): ContainmentPredicate {
  const rings = commandsToRings(commands);
  if (rings.length === 0) return () => false;

  if (fillRule === 'nonzero') {
    return (pt) => rings.reduce((sum, ring) => sum + windingNumber(pt, ring), 0) !== 0;
  }

  const [first, ...rest] = rings;
  const region = polygonClipping.xor([first], ...rest.map((ring) => [ring]));
  return (pt) => region.some(([outer, ...holes]) =>
    ringContains(pt, outer) && !holes.some((hole) => ringContains(pt, hole)),
  );
}

export function createGlyphOutline(commands: PathCommand[], fillRule: FillRule = 'nonzero'): GlyphOutline {
  return {
    draw: (pen) => drawPathCommands(commands, pen),
    pointInside: createPointInside(commands, fillRule),
  };
}

import { describe, it, expect } from 'vitest';
import type { ContainmentPredicate, GlyphOutline } from '../types';
import { distance } from '../utils/bezier';
import { InvalidParameterError } from '../utils/errors';
import { DEFAULT_BIT_SIZE, DEFAULT_BODY_SIZE } from '../utils/parameters';
import { reverseContours } from '../utils/pathCommands';
import {
  computeBitDiameterUnits,
  simulate,
  simulateWithBitDiameter,
} from '../utils/simulation';
import {
  circleCommands,
  insideLShape,
  insideRect,
  lShapeCommands,
  outlineOf,
  rectCommands,
} from './helpers/outlines';

const square = rectCommands(0, 0, 100, 100);
const insideSquare = insideRect(0, 0, 100, 100);

/** 1000-unit square with a circular counter of radius 100 at its centre. */
function squareWithCounter(counterClockwise: boolean): GlyphOutline {
  const center = { x: 500, y: 500 };
  const inside: ContainmentPredicate = (pt) =>
    insideRect(0, 0, 1000, 1000)(pt) && distance(pt, center) > 100;
  return outlineOf(
    [...rectCommands(0, 0, 1000, 1000), ...circleCommands(500, 500, 100, !counterClockwise)],
    inside,
  );
}

describe('computeBitDiameterUnits', () => {
  it('should convert a millimetre bit into design units', () => {
    expect(computeBitDiameterUnits(1000, 90, 1)).toBeCloseTo(31.496, 3);
  });

  it('should match the panel defaults of a 1 mm bit on a 90 pt body', () => {
    expect(DEFAULT_BODY_SIZE).toBe(90);
    expect(DEFAULT_BIT_SIZE).toBe(1);
    expect(computeBitDiameterUnits(1000, DEFAULT_BODY_SIZE, DEFAULT_BIT_SIZE))
      .toBeCloseTo(computeBitDiameterUnits(1000, 90, 1), 10);
  });

  it('should scale linearly with bit size and inversely with body size', () => {
    const base = computeBitDiameterUnits(1000, 90, 1);
    expect(computeBitDiameterUnits(1000, 180, 1)).toBeCloseTo(base / 2, 10);
    expect(computeBitDiameterUnits(1000, 90, 2)).toBeCloseTo(base * 2, 10);
  });
});

describe('simulate parameter validation', () => {
  const outline = outlineOf(square, insideSquare);

  it.each([
    ['bodySize 0', 1000, 0, 1],
    ['negative bodySize', 1000, -5, 1],
    ['NaN bitSize', 1000, 90, Number.NaN],
    ['infinite unitsPerEm', Number.POSITIVE_INFINITY, 90, 1],
  ])('should reject %s', (_label, upm, body, bit) => {
    expect(() => simulate(outline, upm, body, bit)).toThrow(InvalidParameterError);
  });

  it('should fail before any geometry runs', () => {
    let draws = 0;
    const counting: GlyphOutline = {
      draw: () => { draws++; },
      pointInside: insideSquare,
    };
    expect(() => simulate(counting, 1000, 0, 1)).toThrow('bodySize must be positive, got 0');
    expect(draws).toBe(0);
  });

  it('should reject invalid options', () => {
    expect(() => simulateWithBitDiameter(outline, 10, { toleranceUnits: -1 })).toThrow(InvalidParameterError);
    expect(() => simulateWithBitDiameter(outline, 10, { ringAngleStepDegrees: 0 })).toThrow(InvalidParameterError);
    expect(() => simulateWithBitDiameter(outline, 10, { minSampleSpacingUnits: 0 })).toThrow(InvalidParameterError);
  });
});

describe('simulateWithBitDiameter', () => {
  it('should keep a small bit clear of a plain square', () => {
    const result = simulateWithBitDiameter(outlineOf(square, insideSquare), 10);

    expect(result.bitDiameterUnits).toBe(10);
    expect(result.collidingProbes).toHaveLength(0);
    expect(result.clearProbes).toHaveLength(99);
    expect(result.previewContours).toHaveLength(1);
    expect(result.previewContours[0].isClockwise).toBe(false);
    expect(result.previewContours[0].points).toHaveLength(99);
  });

  it('should classify a reversed square the same way', () => {
    const result = simulateWithBitDiameter(outlineOf(reverseContours(square), insideSquare), 10);

    expect(result.collidingProbes).toHaveLength(0);
    expect(result.clearProbes).toHaveLength(99);
    expect(result.previewContours[0].isClockwise).toBe(true);
  });

  it('should push every probe into material when the fixed side is wrong', () => {
    const result = simulateWithBitDiameter(
      outlineOf(reverseContours(square), insideSquare),
      10,
      { outwardSide: 'right' },
    );
    expect(result.clearProbes).toHaveLength(0);
    expect(result.collidingProbes).toHaveLength(99);
    expect(result.previewContours).toEqual([]);
  });

  it('should flag the concave corner of an L and nothing else', () => {
    const result = simulateWithBitDiameter(outlineOf(lShapeCommands(), insideLShape), 60);

    expect(result.collidingProbes).toHaveLength(15);
    expect(result.clearProbes).toHaveLength(284);
    for (const probe of result.collidingProbes) {
      expect(distance(probe.position, { x: 100, y: 100 })).toBeLessThan(45);
    }
    // bottom edge probes sit below the glyph
    const bottom = result.clearProbes.filter((p) => p.position.y < 0);
    expect(bottom).toHaveLength(75);
  });

  it.each([true, false])('should fit a bit that is narrower than the counter (counter-clockwise counter: %s)', (ccw) => {
    const result = simulateWithBitDiameter(squareWithCounter(ccw), 80);
    expect(result.collidingProbes).toHaveLength(0);
    expect(result.previewContours).toHaveLength(2);
  });

  it.each([true, false])('should flag every counter probe for a bit wider than the counter (counter-clockwise counter: %s)', (ccw) => {
    const result = simulateWithBitDiameter(squareWithCounter(ccw), 240);
    expect(result.clearProbes).toHaveLength(331);
    expect(result.collidingProbes.length).toBeGreaterThan(0);
    for (const probe of result.collidingProbes) {
      expect(distance(probe.position, { x: 500, y: 500 })).toBeLessThan(100);
    }
  });

  it('should offset a small dot outwards when chords cut deep into it', () => {
    const center = { x: 0, y: 0 };
    const dot = outlineOf(circleCommands(0, 0, 20), (pt) => distance(pt, center) < 20);
    const options = { minSampleSpacingUnits: 10, toleranceUnits: 2 };

    const auto = simulateWithBitDiameter(dot, 40, options);
    const right = simulateWithBitDiameter(dot, 40, { ...options, outwardSide: 'right' });

    expect(auto).toEqual(right);
    expect(auto.collidingProbes).toHaveLength(0);
    expect(auto.clearProbes).toHaveLength(16);
    for (const probe of auto.clearProbes) {
      expect(distance(probe.position, center)).toBeGreaterThan(20);
    }
  });

  it('should offset an i-dot outwards for a wide bit on a small body', () => {
    const dot = outlineOf(circleCommands(500, 800, 45), (pt) => distance(pt, { x: 500, y: 800 }) < 45);
    expect(simulate(dot, 1000, 20, 2)).toEqual(simulate(dot, 1000, 20, 2, { outwardSide: 'right' }));
  });

  it('should keep the preview of a tightly curved glyph on the offset ring', () => {
    const center = { x: 0, y: 0 };
    const result = simulateWithBitDiameter(
      outlineOf(circleCommands(0, 0, 10), (pt) => distance(pt, center) < 10),
      40,
      // chord normals lean inwards on a 4-unit spacing at this radius
      { toleranceUnits: 1 },
    );

    expect(result.collidingProbes).toHaveLength(0);
    expect(result.previewContours).toHaveLength(1);
    const [preview] = result.previewContours;
    expect(preview.isClockwise).toBe(false);
    expect(preview.points).toHaveLength(result.clearProbes.length);
    for (const pt of preview.points) {
      const r = distance(pt, center);
      expect(r).toBeGreaterThan(28);
      expect(r).toBeLessThan(31);
    }
  });
});

describe('simulate', () => {
  const outline = outlineOf(lShapeCommands(), insideLShape);

  it('should be idempotent', () => {
    expect(simulate(outline, 1000, 90, 2)).toEqual(simulate(outline, 1000, 90, 2));
  });

  it('should return a frozen result', () => {
    const result = simulate(outline, 1000, 90, 1);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.clearProbes)).toBe(true);
    expect(Object.isFrozen(result.previewContours)).toBe(true);
  });

  it('should report the bit diameter it simulated', () => {
    const result = simulate(outline, 1000, 90, 1);
    expect(result.bitDiameterUnits).toBeCloseTo(31.496, 3);
    expect(result.clearProbes.every((p) => p.bitDiameterUnits === result.bitDiameterUnits)).toBe(true);
  });
});

import type {
  GlyphOutline,
  PreviewContour,
  ProbeResult,
  SimulationOptions,
  SimulationResult,
} from '../types';
import { classifyContour } from './collision';
import { createContourWalker } from './contourWalker';
import { assertPositiveNumber } from './errors';
import { MM_TO_POINT, computeSampleSpacing, resolveSimulationOptions } from './parameters';

/**
 * Diameter of a `bitSize` mm bit in the glyph's design units, once the glyph
 * is scaled to a `bodySize` point body.
 */
export function computeBitDiameterUnits(unitsPerEm: number, bodySize: number, bitSize: number): number {
  assertPositiveNumber(unitsPerEm, 'unitsPerEm');
  assertPositiveNumber(bodySize, 'bodySize');
  assertPositiveNumber(bitSize, 'bitSize');
  return (unitsPerEm * bitSize * MM_TO_POINT) / bodySize;
}

export function simulateWithBitDiameter(
  outline: GlyphOutline,
  bitDiameterUnits: number,
  overrides: Partial<SimulationOptions> = {},
): SimulationResult {
  assertPositiveNumber(bitDiameterUnits, 'bitDiameterUnits');
  const options = resolveSimulationOptions(overrides);

  const walker = createContourWalker(computeSampleSpacing(bitDiameterUnits, options));
  outline.draw(walker);
  const contours = walker.finish();

  const clearProbes: ProbeResult[] = [];
  const collidingProbes: ProbeResult[] = [];
  const previewContours: PreviewContour[] = [];

  for (const contour of contours) {
    const classified = classifyContour(contour.points, {
      bitRadius: bitDiameterUnits / 2,
      bitDiameterUnits,
      toleranceUnits: options.toleranceUnits,
      // Whole glyph: a bit can run into a neighbouring contour.
      pointInside: outline.pointInside,
      ringAngleStepDegrees: options.ringAngleStepDegrees,
      outwardSide: options.outwardSide,
    });
    clearProbes.push(...classified.clearProbes);
    collidingProbes.push(...classified.collidingProbes);
    if (classified.preview.length > 0) {
      previewContours.push(Object.freeze({
        isClockwise: contour.isClockwise,
        points: Object.freeze(classified.preview),
      }));
    }
  }

  return Object.freeze({
    bitDiameterUnits,
    clearProbes: Object.freeze(clearProbes),
    collidingProbes: Object.freeze(collidingProbes),
    previewContours: Object.freeze(previewContours),
  });
}

/**
 * Where a `bitSize` mm bit fails to reach into the outline once the glyph is
 * set on a `bodySize` body. Throws InvalidParameterError before any geometry
 * runs if a size is not a positive finite number.
 */
export function simulate(
  outline: GlyphOutline,
  unitsPerEm: number,
  bodySize: number,
  bitSize: number,
  overrides: Partial<SimulationOptions> = {},
): SimulationResult {
  const bitDiameterUnits = computeBitDiameterUnits(unitsPerEm, bodySize, bitSize);
  return simulateWithBitDiameter(outline, bitDiameterUnits, overrides);
}

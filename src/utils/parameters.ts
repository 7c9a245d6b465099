import {
  DEFAULT_CLASSIFIER,
  DEFAULT_SAMPLING,
  type OutwardSide,
  type SamplingDefaults,
  type SimulationOptions,
} from '../types';
import {
  InvalidParameterError,
  assertNonNegativeNumber,
  assertPositiveNumber,
} from './errors';

/** Millimetres to PostScript points. */
export const MM_TO_POINT = 2.834627813;

export const DEFAULT_BODY_SIZE = 90;
export const DEFAULT_BIT_SIZE = 1;

const OUTWARD_SIDES: readonly OutwardSide[] = ['right', 'left', 'auto'];

export function resolveSimulationOptions(overrides: Partial<SimulationOptions> = {}): SimulationOptions {
  const options: SimulationOptions = {
    toleranceUnits: overrides.toleranceUnits ?? DEFAULT_SAMPLING.toleranceUnits,
    minSampleSpacingUnits: overrides.minSampleSpacingUnits ?? DEFAULT_SAMPLING.minSampleSpacingUnits,
    sampleSpacingFraction: overrides.sampleSpacingFraction ?? DEFAULT_SAMPLING.sampleSpacingFraction,
    ringAngleStepDegrees: overrides.ringAngleStepDegrees ?? DEFAULT_CLASSIFIER.ringAngleStepDegrees,
    outwardSide: overrides.outwardSide ?? DEFAULT_CLASSIFIER.outwardSide,
  };

  assertNonNegativeNumber(options.toleranceUnits, 'toleranceUnits');
  assertPositiveNumber(options.minSampleSpacingUnits, 'minSampleSpacingUnits');
  assertPositiveNumber(options.sampleSpacingFraction, 'sampleSpacingFraction');
  assertPositiveNumber(options.ringAngleStepDegrees, 'ringAngleStepDegrees');
  if (options.ringAngleStepDegrees > 360) {
    throw new InvalidParameterError(
      `ringAngleStepDegrees must be at most 360, got ${options.ringAngleStepDegrees}`,
    );
  }
  if (!OUTWARD_SIDES.includes(options.outwardSide)) {
    throw new InvalidParameterError(
      `outwardSide must be one of ${OUTWARD_SIDES.join(', ')}, got ${String(options.outwardSide)}`,
    );
  }
  return options;
}

/** max(minSampleSpacingUnits, sampleSpacingFraction × bit radius) */
export function computeSampleSpacing(bitDiameterUnits: number, params: SamplingDefaults = DEFAULT_SAMPLING): number {
  const bitRadius = bitDiameterUnits / 2;
  return Math.max(params.minSampleSpacingUnits, params.sampleSpacingFraction * bitRadius);
}

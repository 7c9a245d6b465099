export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Drawing-pen protocol an outline replays itself into. Coordinates are
 * absolute, in font design units.
 */
export interface OutlinePen {
  moveTo(pt: Point): void;
  lineTo(pt: Point): void;
  curveTo(c1: Point, c2: Point, pt: Point): void;
  closePath(): void;
}

/** True iff the point lies in the filled area of the whole glyph. */
export type ContainmentPredicate = (pt: Point) => boolean;

export interface GlyphOutline {
  draw(pen: OutlinePen): void;
  pointInside: ContainmentPredicate;
}

export interface WalkedContour {
  points: Point[];
  isClockwise: boolean;
}

export interface SamplingParameters {
  bitDiameterUnits: number;
  toleranceUnits: number;
  minSampleSpacingUnits: number;
  /** Fraction of the bit radius used as nominal sample spacing. */
  sampleSpacingFraction: number;
}

export type SamplingDefaults = Omit<SamplingParameters, 'bitDiameterUnits'>;

export const DEFAULT_SAMPLING: SamplingDefaults = {
  toleranceUnits: 0.1,
  minSampleSpacingUnits: 4,
  sampleSpacingFraction: 0.1,
};

/**
 * Which side of the direction of travel the material-free side lies on.
 * 'auto' resolves it per contour against the containment predicate.
 */
export type OutwardSide = 'right' | 'left' | 'auto';

export interface ClassifierOptions {
  ringAngleStepDegrees: number;
  outwardSide: OutwardSide;
}

export const DEFAULT_CLASSIFIER: ClassifierOptions = {
  ringAngleStepDegrees: 15,
  outwardSide: 'auto',
};

export type SimulationOptions = SamplingDefaults & ClassifierOptions;

export interface ProbeResult {
  readonly position: Point;
  readonly bitDiameterUnits: number;
  readonly isColliding: boolean;
}

export interface PreviewContour {
  readonly isClockwise: boolean;
  readonly points: readonly Point[];
}

export interface SimulationResult {
  readonly bitDiameterUnits: number;
  readonly clearProbes: readonly ProbeResult[];
  readonly collidingProbes: readonly ProbeResult[];
  readonly previewContours: readonly PreviewContour[];
}

export type FillRule = 'nonzero' | 'evenodd';

export interface LayerVisibility {
  showSimulation: boolean;
  showErrors: boolean;
  showPreview: boolean;
}

export const DEFAULT_LAYER_VISIBILITY: LayerVisibility = {
  showSimulation: true,
  showErrors: true,
  showPreview: false,
};

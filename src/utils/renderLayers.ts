import { Path } from 'opentype.js';
import {
  DEFAULT_LAYER_VISIBILITY,
  type FillRule,
  type LayerVisibility,
  type Point,
  type ProbeResult,
  type SimulationResult,
} from '../types';

export const SIMULATION_FILL = 'rgba(0, 255, 0, 0.4)';
export const ERROR_FILL = 'rgba(255, 0, 0, 0.4)';
export const PREVIEW_FILL = 'black';

/** Control-point distance for a quarter circle drawn as one cubic. */
const KAPPA = 0.5522847498;

export interface SimulationLayers {
  simulation: Path | null;
  errors: Path | null;
  preview: Path | null;
}

export function appendCircle(path: Path, center: Point, radius: number): void {
  const k = radius * KAPPA;
  const { x, y } = center;
  path.moveTo(x + radius, y);
  path.curveTo(x + radius, y + k, x + k, y + radius, x, y + radius);
  path.curveTo(x - k, y + radius, x - radius, y + k, x - radius, y);
  path.curveTo(x - radius, y - k, x - k, y - radius, x, y - radius);
  path.curveTo(x + k, y - radius, x + radius, y - k, x + radius, y);
  path.closePath();
}

function circlesPath(probes: readonly ProbeResult[], fill: string): Path {
  const path = new Path();
  for (const probe of probes) {
    appendCircle(path, probe.position, probe.bitDiameterUnits / 2);
  }
  path.fill = fill;
  return path;
}

/**
 * Non-zero when counters wind against their outer contours, even-odd when
 * every preview contour runs the same way.
 */
export function previewFillRule(result: SimulationResult): FillRule {
  const contours = result.previewContours;
  if (contours.length === 0) return 'nonzero';
  const first = contours[0].isClockwise;
  return contours.every((c) => c.isClockwise === first) ? 'evenodd' : 'nonzero';
}

function previewPath(result: SimulationResult): Path {
  const path = new Path();
  for (const contour of result.previewContours) {
    const [start, ...rest] = contour.points;
    if (!start) continue;
    path.moveTo(start.x, start.y);
    for (const pt of rest) {
      path.lineTo(pt.x, pt.y);
    }
    path.closePath();
  }
  path.fill = PREVIEW_FILL;
  return path;
}

export function buildSimulationLayers(
  result: SimulationResult,
  visibility: Partial<LayerVisibility> = {},
): SimulationLayers {
  const v = { ...DEFAULT_LAYER_VISIBILITY, ...visibility };
  return {
    simulation: v.showSimulation ? circlesPath(result.clearProbes, SIMULATION_FILL) : null,
    errors: v.showErrors ? circlesPath(result.collidingProbes, ERROR_FILL) : null,
    preview: v.showPreview ? previewPath(result) : null,
  };
}

/**
 * SVG overlay of the visible layers in design units. Font space is y-up, so
 * the group is flipped and the viewBox spans the flipped bounds.
 */
export function renderSimulationSVG(
  result: SimulationResult,
  visibility: Partial<LayerVisibility> = {},
  decimalPlaces = 2,
): string {
  const layers = buildSimulationLayers(result, visibility);
  const elements: string[] = [];
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;

  const order: [Path | null, string][] = [
    [layers.preview, `fill-rule="${previewFillRule(result)}"`],
    [layers.simulation, ''],
    [layers.errors, ''],
  ];
  for (const [path, extra] of order) {
    if (!path || path.commands.length === 0) continue;
    const box = path.getBoundingBox();
    minX = Math.min(minX, box.x1);
    minY = Math.min(minY, box.y1);
    maxX = Math.max(maxX, box.x2);
    maxY = Math.max(maxY, box.y2);
    const attrs = extra ? ` ${extra}` : '';
    elements.push(`<path d="${path.toPathData(decimalPlaces)}" fill="${path.fill ?? 'none'}"${attrs}/>`);
  }

  if (elements.length === 0) {
    return '<svg xmlns="http://www.w3.org/2000/svg"/>';
  }
  const viewBox = [minX, -maxY, maxX - minX, maxY - minY]
    .map((n) => Number(n.toFixed(decimalPlaces)))
    .join(' ');
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="${viewBox}">`,
    '<g transform="scale(1 -1)">',
    ...elements,
    '</g>',
    '</svg>',
  ].join('');
}

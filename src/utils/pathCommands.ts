import type { PathCommand } from 'opentype.js';
import type { OutlinePen } from '../types';

export interface ContourRange {
  start: number;
  end: number;
}

export function getContourRanges(commands: PathCommand[]): ContourRange[] {
  const ranges: ContourRange[] = [];
  let start = -1;
  for (let i = 0; i < commands.length; i++) {
    if (commands[i].type === 'M') {
      if (start >= 0) {
        ranges.push({ start, end: i - 1 });
      }
      start = i;
    } else if (commands[i].type === 'Z' && start >= 0) {
      ranges.push({ start, end: i });
      start = -1;
    }
  }
  if (start >= 0) {
    ranges.push({ start, end: commands.length - 1 });
  }
  return ranges;
}

/**
 * Lossless conversion of quadratic bezier (Q) commands to cubic (C) commands.
 * Formula: Q(P0, CP, P2) -> C(P0, P0 + 2/3*(CP-P0), P2 + 2/3*(CP-P2), P2)
 */
export function quadraticToCubic(commands: PathCommand[]): PathCommand[] {
  const result: PathCommand[] = [];
  let curX = 0, curY = 0;

  for (const cmd of commands) {
    if (cmd.type === 'Q') {
      result.push({
        type: 'C',
        x1: curX + (2 / 3) * (cmd.x1 - curX),
        y1: curY + (2 / 3) * (cmd.y1 - curY),
        x2: cmd.x + (2 / 3) * (cmd.x1 - cmd.x),
        y2: cmd.y + (2 / 3) * (cmd.y1 - cmd.y),
        x: cmd.x,
        y: cmd.y,
      });
      curX = cmd.x;
      curY = cmd.y;
    } else {
      result.push({ ...cmd });
      if (cmd.type !== 'Z') {
        curX = cmd.x;
        curY = cmd.y;
      }
    }
  }
  return result;
}

function reverseSingleContour(contourCmds: PathCommand[]): PathCommand[] {
  const moveCmd = contourCmds[0];
  if (!moveCmd || moveCmd.type !== 'M') return contourCmds;
  const hasZ = contourCmds[contourCmds.length - 1].type === 'Z';

  const segments = contourCmds.slice(1, hasZ ? contourCmds.length - 1 : contourCmds.length);
  const endpoints: { x: number; y: number }[] = [{ x: moveCmd.x, y: moveCmd.y }];
  for (const seg of segments) {
    const prev = endpoints[endpoints.length - 1];
    endpoints.push(seg.type === 'Z' ? prev : { x: seg.x, y: seg.y });
  }

  const last = endpoints[endpoints.length - 1];
  const reversed: PathCommand[] = [{ type: 'M', x: last.x, y: last.y }];
  for (let i = segments.length - 1; i >= 0; i--) {
    const seg = segments[i];
    const target = endpoints[i];

    if (seg.type === 'L') {
      reversed.push({ type: 'L', x: target.x, y: target.y });
    } else if (seg.type === 'Q') {
      reversed.push({ type: 'Q', x1: seg.x1, y1: seg.y1, x: target.x, y: target.y });
    } else if (seg.type === 'C') {
      reversed.push({
        type: 'C',
        x1: seg.x2,
        y1: seg.y2,
        x2: seg.x1,
        y2: seg.y1,
        x: target.x,
        y: target.y,
      });
    }
  }

  if (hasZ) {
    reversed.push({ type: 'Z' });
  }
  return reversed;
}

/**
 * Reverses the direction of every contour, e.g. to move an outline between
 * the PostScript (outer counter-clockwise) and TrueType conventions.
 */
export function reverseContours(commands: PathCommand[]): PathCommand[] {
  const result: PathCommand[] = [];
  for (const { start, end } of getContourRanges(commands)) {
    result.push(...reverseSingleContour(commands.slice(start, end + 1)));
  }
  return result;
}

/**
 * Replays opentype.js commands into a pen. Quadratics arrive as cubics; a
 * drawing command with no open contour is skipped with a warning.
 */
export function drawPathCommands(commands: PathCommand[], pen: OutlinePen): void {
  let open = false;

  for (const [i, cmd] of quadraticToCubic(commands).entries()) {
    if (cmd.type === 'M') {
      pen.moveTo({ x: cmd.x, y: cmd.y });
      open = true;
      continue;
    }
    if (!open) {
      console.warn(`Skipping path command #${i} (${cmd.type}): no open contour`);
      continue;
    }

    switch (cmd.type) {
      case 'L':
        pen.lineTo({ x: cmd.x, y: cmd.y });
        break;
      case 'C':
        pen.curveTo({ x: cmd.x1, y: cmd.y1 }, { x: cmd.x2, y: cmd.y2 }, { x: cmd.x, y: cmd.y });
        break;
      case 'Z':
        pen.closePath();
        open = false;
        break;
      case 'Q':
        // already promoted to C
        break;
    }
  }
}

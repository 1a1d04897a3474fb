import type { PathCommand } from "../shaping/types";

/**
 * Flatten an outline into straight edges.
 *
 * Returns packed `x0, y0, x1, y1` quadruples. Every contour is closed, with or
 * without a trailing `Z`.
 */
export function flattenOutline(
  commands: readonly PathCommand[],
  scale: number,
  offsetX: number,
  curveSteps: number
): number[] {
  const edges: number[] = [];
  const steps = Math.max(1, Math.floor(curveSteps));
  let startX = 0;
  let startY = 0;
  let x = 0;
  let y = 0;
  let open = false;

  const lineTo = (nx: number, ny: number): void => {
    if (nx !== x || ny !== y) {
      edges.push(x, y, nx, ny);
    }
    x = nx;
    y = ny;
  };

  const close = (): void => {
    if (open) lineTo(startX, startY);
    open = false;
  };

  for (const command of commands) {
    switch (command.type) {
      case "M": {
        close();
        startX = x = command.coords[0] * scale + offsetX;
        startY = y = command.coords[1] * scale;
        open = true;
        break;
      }
      case "L": {
        lineTo(command.coords[0] * scale + offsetX, command.coords[1] * scale);
        open = true;
        break;
      }
      case "Q": {
        const [cx, cy, ex, ey] = command.coords;
        const x0 = x;
        const y0 = y;
        const x1 = cx * scale + offsetX;
        const y1 = cy * scale;
        const x2 = ex * scale + offsetX;
        const y2 = ey * scale;
        for (let i = 1; i <= steps; i++) {
          const t = i / steps;
          const mt = 1 - t;
          lineTo(
            mt * mt * x0 + 2 * mt * t * x1 + t * t * x2,
            mt * mt * y0 + 2 * mt * t * y1 + t * t * y2
          );
        }
        open = true;
        break;
      }
      case "C": {
        const [c1x, c1y, c2x, c2y, ex, ey] = command.coords;
        const x0 = x;
        const y0 = y;
        const x1 = c1x * scale + offsetX;
        const y1 = c1y * scale;
        const x2 = c2x * scale + offsetX;
        const y2 = c2y * scale;
        const x3 = ex * scale + offsetX;
        const y3 = ey * scale;
        for (let i = 1; i <= steps; i++) {
          const t = i / steps;
          const mt = 1 - t;
          const a = mt * mt * mt;
          const b = 3 * mt * mt * t;
          const c = 3 * mt * t * t;
          const d = t * t * t;
          lineTo(a * x0 + b * x1 + c * x2 + d * x3, a * y0 + b * y1 + c * y2 + d * y3);
        }
        open = true;
        break;
      }
      case "Z": {
        close();
        break;
      }
    }
  }
  close();

  return edges;
}

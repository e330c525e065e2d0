/**
 * Hit testing for lasso and box selections, in data coordinates
 */

export interface Point {
  x: number;
  y: number;
}

export interface SelectionBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Ray casting point-in-polygon test. Polygons with fewer than three
 * vertices contain nothing.
 */
export function isPointInPolygon(point: Point, polygon: readonly Point[]): boolean {
  if (polygon.length < 3) return false;

  let inside = false;
  const { x, y } = point;

  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const xi = polygon[i].x;
    const yi = polygon[i].y;
    const xj = polygon[j].x;
    const yj = polygon[j].y;

    const intersect =
      yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;

    if (intersect) {
      inside = !inside;
    }
  }

  return inside;
}

/** Inclusive on every edge */
export function isPointInBox(point: Point, bounds: SelectionBounds): boolean {
  return (
    point.x >= bounds.minX &&
    point.x <= bounds.maxX &&
    point.y >= bounds.minY &&
    point.y <= bounds.maxY
  );
}

/**
 * Normalize two corners given in any order
 */
export function boundsFromRanges(x: readonly [number, number], y: readonly [number, number]): SelectionBounds {
  return {
    minX: Math.min(x[0], x[1]),
    maxX: Math.max(x[0], x[1]),
    minY: Math.min(y[0], y[1]),
    maxY: Math.max(y[0], y[1]),
  };
}

/**
 * Marker overlay
 *
 * Maps a color tag to the point it marks. Setting an existing tag replaces its
 * point in place (last write wins, original insertion slot kept). Lookups
 * return the first tag in insertion order whose point truncates to the cell.
 */

import type { Point } from '../projection/types.js';

export type MarkerPoints = ReadonlyMap<string, Point> | Readonly<Record<string, Point>>;

function isPointMap(points: MarkerPoints): points is ReadonlyMap<string, Point> {
  return points instanceof Map;
}

export class MarkerOverlay {
  private readonly points = new Map<string, Point>();

  constructor(points?: MarkerPoints) {
    if (points) {
      this.replaceAll(points);
    }
  }

  get size(): number {
    return this.points.size;
  }

  set(color: string, point: Point): this {
    this.points.set(color, { x: point.x, y: point.y });
    return this;
  }

  get(color: string): Point | undefined {
    const point = this.points.get(color);
    return point ? { ...point } : undefined;
  }

  has(color: string): boolean {
    return this.points.has(color);
  }

  delete(color: string): boolean {
    return this.points.delete(color);
  }

  clear(): void {
    this.points.clear();
  }

  replaceAll(points: MarkerPoints): this {
    this.points.clear();
    const entries = isPointMap(points) ? points.entries() : Object.entries(points);
    for (const [color, point] of entries) {
      this.set(color, point);
    }
    return this;
  }

  entries(): Array<[string, Point]> {
    return Array.from(this.points, ([color, point]): [string, Point] => [color, { ...point }]);
  }

  /**
   * Color tag of the first marker on the given cell, if any
   */
  colorAt(cellX: number, row: number): string | undefined {
    for (const [color, point] of this.points) {
      if (Math.trunc(point.x) === cellX && Math.trunc(point.y) === row) {
        return color;
      }
    }
    return undefined;
  }
}

import { vec2, type ReadonlyVec2, type ReadonlyVec4 } from 'gl-matrix';

// Coordinate systems (WebGPU):
// NDC: x right, y up, both in [-1, 1]
// Framebuffer: origin at the top-left corner, x right, y down, in pixels

/**
 * 2D point with named components
 */
export interface Point2D {
  x: number;
  y: number;
}

/**
 * Clip space to normalized device coordinates (perspective divide)
 */
export const clipToNdc = (clip: ReadonlyVec4): vec2 =>
  vec2.fromValues(clip[0] / clip[3], clip[1] / clip[3]);

/**
 * NDC to framebuffer coordinates for a viewport covering the whole target
 */
export const ndcToFramebuffer = (ndc: ReadonlyVec2, width: number, height: number): Point2D => ({
  x: (ndc[0] + 1) * 0.5 * width,
  y: (1 - ndc[1]) * 0.5 * height,
});

/**
 * Pixel whose area contains a framebuffer position
 */
export const framebufferToPixel = (point: Point2D): Point2D => ({
  x: Math.floor(point.x),
  y: Math.floor(point.y),
});

/**
 * Twice the signed area of triangle (a, b, c).
 * Positive when counter-clockwise in a y-up system.
 */
export const signedArea2 = (a: ReadonlyVec2, b: ReadonlyVec2, c: ReadonlyVec2): number =>
  (b[0] - a[0]) * (c[1] - a[1]) - (c[0] - a[0]) * (b[1] - a[1]);

/**
 * Average of a set of points
 */
export const centroid = (points: readonly ReadonlyVec2[]): vec2 => {
  const sum = vec2.create();
  for (const p of points) {
    vec2.add(sum, sum, p);
  }
  return vec2.scale(sum, sum, 1 / points.length);
};

/**
 * Triangle shader stages - TypeScript mirrors of vs_main / fs_main in triangle.wgsl
 *
 * Both stages are pure. The software rasterizer binds them to its vertex and
 * fragment slots the same way the GPU pipeline binds the WGSL entry points.
 */

import { vec4, type ReadonlyVec4 } from 'gl-matrix';

/** Per-fragment input produced by the rasterizer */
export interface FragmentInput {
  /** Framebuffer position of the pixel center (x, y), depth (z) and 1/w */
  position: ReadonlyVec4;
}

/** Vertex stage: vertex index -> clip-space position */
export type VertexStage = (vertexIndex: number) => vec4;

/** Fragment stage: interpolated input -> RGBA color */
export type FragmentStage = (input: FragmentInput) => vec4;

/** Opaque dark brown written by the fragment stage */
export const TRIANGLE_COLOR: ReadonlyVec4 = vec4.fromValues(0.3, 0.2, 0.1, 1.0);

/**
 * Position generator (vs_main).
 *
 * index 0 -> ( 0.4, -0.5), index 1 -> (0.0, 0.5), index 2 -> (-0.4, -0.5).
 * Indices outside {0, 1, 2} never come from a conforming draw and are not guarded.
 */
export function generatePosition(vertexIndex: number): vec4 {
  const x = (1 - vertexIndex) * 0.4;
  const y = ((vertexIndex & 1) * 2 - 1) * 0.5;
  return vec4.fromValues(x, y, 0.0, 1.0);
}

/**
 * Fragment colorizer (fs_main). The input is not read.
 */
export function colorizeFragment(_input: FragmentInput): vec4 {
  return vec4.clone(TRIANGLE_COLOR);
}

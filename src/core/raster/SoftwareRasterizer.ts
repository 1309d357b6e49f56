/**
 * SoftwareRasterizer - CPU reference for the triangle render pipeline
 *
 * Runs the same stage functions the GPU pipeline runs and follows WebGPU's
 * fixed-function rules closely enough to check rendered output pixel by pixel:
 *
 * 1. Vertex stage once per vertex index
 * 2. Triangle-list primitive assembly
 * 3. Facing from the signed NDC area, then culling
 * 4. Viewport transform: NDC y-up -> framebuffer y-down
 * 5. Coverage at pixel centers, top-left fill rule
 * 6. Depth clip to [0, 1]
 * 7. Fragment stage once per covered pixel, REPLACE write
 */

import { vec2, vec4, type ReadonlyVec2, type ReadonlyVec4 } from 'gl-matrix';
import type { CullMode, FrontFace } from '../gpu/GPURenderPipeline';
import { TRIANGLE_DRAW, validateDrawCall, type DrawCall } from '../gpu/pipeline/DrawCall';
import { clipToNdc, ndcToFramebuffer, signedArea2 } from '../utils';
import { ColorTarget } from './ColorTarget';
import { colorizeFragment, generatePosition, type FragmentStage, type VertexStage } from './stages';

/** Stage functions bound to pipeline slots, plus the primitive state */
export interface RasterPipeline {
  vertex: VertexStage;
  fragment: FragmentStage;
  cullMode: CullMode;
  frontFace: FrontFace;
}

/** Counters for a single draw */
export interface RasterStats {
  verticesShaded: number;
  primitivesAssembled: number;
  primitivesCulled: number;
  fragmentsShaded: number;
}

/** Clear color behind the triangle: dark blue, opaque */
export const DEFAULT_CLEAR_COLOR: ReadonlyVec4 = vec4.fromValues(0.1, 0.2, 0.3, 1.0);

/** Same stages and primitive state as the GPU triangle pipeline */
export const TRIANGLE_RASTER_PIPELINE: Readonly<RasterPipeline> = Object.freeze({
  vertex: generatePosition,
  fragment: colorizeFragment,
  cullMode: 'back',
  frontFace: 'ccw',
});

interface ScreenVertex {
  /** Framebuffer position */
  xy: vec2;
  /** Depth (z / w) */
  z: number;
  /** 1 / w */
  invW: number;
}

/** Edge function: twice the signed area of (a, b, p) */
const edge = signedArea2;

/**
 * Top-left rule for an edge whose interior lies on the positive side
 * (framebuffer y grows downward).
 */
function isTopLeft(a: ReadonlyVec2, b: ReadonlyVec2): boolean {
  const dx = b[0] - a[0];
  const dy = b[1] - a[1];
  return dy < 0 || (dy === 0 && dx > 0);
}

function covers(weight: number, topLeft: boolean): boolean {
  return weight > 0 || (weight === 0 && topLeft);
}

export class SoftwareRasterizer {
  private readonly pipeline: Readonly<RasterPipeline>;

  constructor(pipeline: Readonly<RasterPipeline> = TRIANGLE_RASTER_PIPELINE) {
    this.pipeline = pipeline;
  }

  /**
   * Execute `draw` against `target`. The target is not cleared first.
   */
  draw(target: ColorTarget, draw: Readonly<DrawCall> = TRIANGLE_DRAW): RasterStats {
    validateDrawCall(draw);

    const stats: RasterStats = {
      verticesShaded: 0,
      primitivesAssembled: 0,
      primitivesCulled: 0,
      fragmentsShaded: 0,
    };

    const clipPositions: vec4[] = [];
    for (let i = 0; i < draw.vertexCount; i++) {
      clipPositions.push(this.pipeline.vertex(draw.firstVertex + i));
      stats.verticesShaded++;
    }

    for (let first = 0; first + 3 <= clipPositions.length; first += 3) {
      stats.primitivesAssembled++;
      const primitive = clipPositions.slice(first, first + 3);
      if (this.isCulled(primitive)) {
        stats.primitivesCulled++;
        continue;
      }
      stats.fragmentsShaded += this.rasterizeTriangle(target, primitive);
    }

    return stats;
  }

  /**
   * Clear a new width x height target and draw the triangle into it
   */
  renderTriangle(width: number, height: number, clearColor: ReadonlyVec4 = DEFAULT_CLEAR_COLOR): ColorTarget {
    const target = new ColorTarget(width, height).clear(clearColor);
    this.draw(target);
    return target;
  }

  /**
   * Facing test in NDC (y-up), where counter-clockwise has positive area.
   * Degenerate primitives are always dropped.
   */
  private isCulled(clip: vec4[]): boolean {
    const [a, b, c] = clip.map(clipToNdc);
    const area = edge(a, b, c);
    if (area === 0) return true;

    const ccw = area > 0;
    const frontFacing = this.pipeline.frontFace === 'ccw' ? ccw : !ccw;

    switch (this.pipeline.cullMode) {
      case 'back':
        return !frontFacing;
      case 'front':
        return frontFacing;
      case 'none':
        return false;
    }
  }

  private toScreen(target: ColorTarget, clip: vec4): ScreenVertex {
    const invW = 1 / clip[3];
    const fb = ndcToFramebuffer(clipToNdc(clip), target.width, target.height);
    return {
      xy: vec2.fromValues(fb.x, fb.y),
      z: clip[2] * invW,
      invW,
    };
  }

  /**
   * Shade every pixel whose center the triangle covers. Returns the fragment count.
   */
  private rasterizeTriangle(target: ColorTarget, clip: vec4[]): number {
    let [v0, v1, v2] = clip.map((p) => this.toScreen(target, p));

    // Orient so the interior is on the positive side of every edge
    if (edge(v0.xy, v1.xy, v2.xy) < 0) {
      [v1, v2] = [v2, v1];
    }
    const area = edge(v0.xy, v1.xy, v2.xy);

    const xs = [v0.xy[0], v1.xy[0], v2.xy[0]];
    const ys = [v0.xy[1], v1.xy[1], v2.xy[1]];
    const minX = Math.max(0, Math.floor(Math.min(...xs)));
    const maxX = Math.min(target.width - 1, Math.ceil(Math.max(...xs)));
    const minY = Math.max(0, Math.floor(Math.min(...ys)));
    const maxY = Math.min(target.height - 1, Math.ceil(Math.max(...ys)));

    const topLeft12 = isTopLeft(v1.xy, v2.xy);
    const topLeft20 = isTopLeft(v2.xy, v0.xy);
    const topLeft01 = isTopLeft(v0.xy, v1.xy);

    const center = vec2.create();
    let fragments = 0;

    for (let py = minY; py <= maxY; py++) {
      for (let px = minX; px <= maxX; px++) {
        vec2.set(center, px + 0.5, py + 0.5);

        const w0 = edge(v1.xy, v2.xy, center);
        const w1 = edge(v2.xy, v0.xy, center);
        const w2 = edge(v0.xy, v1.xy, center);
        if (!covers(w0, topLeft12) || !covers(w1, topLeft20) || !covers(w2, topLeft01)) {
          continue;
        }

        const z = (w0 * v0.z + w1 * v1.z + w2 * v2.z) / area;
        if (z < 0 || z > 1) continue;

        const invW = (w0 * v0.invW + w1 * v1.invW + w2 * v2.invW) / area;
        const color = this.pipeline.fragment({
          position: vec4.fromValues(center[0], center[1], z, invW),
        });
        target.write(px, py, color);
        fragments++;
      }
    }

    return fragments;
  }
}

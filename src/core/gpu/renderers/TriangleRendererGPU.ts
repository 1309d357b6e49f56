/**
 * TriangleRendererGPU - Draws the fixed triangle
 *
 * Vertices come from the vertex index inside the shader, so the pipeline has
 * no vertex buffers and no bind groups. Every draw goes through the triangle
 * draw contract before it is recorded.
 */

import type { GPUContext } from '../GPUContext';
import { RenderPipelineWrapper } from '../GPURenderPipeline';
import { getShaderSource, loadShader } from '../ShaderLoader';
import { TRIANGLE_DRAW, validateDrawCall, type DrawCall } from '../pipeline/DrawCall';
import { ColorTarget, DEFAULT_CLEAR_COLOR } from '../../raster';

export interface TriangleRendererOptions {
  /** Color target format for the main pipeline (default: context format) */
  colorFormat?: GPUTextureFormat;
  /** Pipeline label */
  label?: string;
}

/** DEFAULT_CLEAR_COLOR as a render pass clear value */
export const DEFAULT_CLEAR_VALUE: Readonly<GPUColorDict> = Object.freeze({
  r: DEFAULT_CLEAR_COLOR[0],
  g: DEFAULT_CLEAR_COLOR[1],
  b: DEFAULT_CLEAR_COLOR[2],
  a: DEFAULT_CLEAR_COLOR[3],
});

/** Offscreen format: 4 float channels per pixel */
const OFFSCREEN_FORMAT: GPUTextureFormat = 'rgba32float';
const OFFSCREEN_BYTES_PER_PIXEL = 16;

/**
 * Renders the fixed triangle with a pipeline bound to vs_main / fs_main
 */
export class TriangleRendererGPU {
  private ctx: GPUContext;
  private label: string;
  private pipelines = new Map<GPUTextureFormat, RenderPipelineWrapper>();
  private colorFormat: GPUTextureFormat;

  /**
   * Compile the triangle shader, failing on compilation errors, then build
   * the renderer on the checked module
   */
  static async create(ctx: GPUContext, options: TriangleRendererOptions = {}): Promise<TriangleRendererGPU> {
    const label = options.label ?? 'triangle-pipeline';
    await loadShader(ctx, 'triangle', `${label}-vertex`);
    return new TriangleRendererGPU(ctx, options);
  }

  /**
   * Build the renderer without checking compilation messages.
   * The main pipeline is created here.
   */
  constructor(ctx: GPUContext, options: TriangleRendererOptions = {}) {
    this.ctx = ctx;
    this.label = options.label ?? 'triangle-pipeline';
    this.colorFormat = options.colorFormat ?? ctx.format;
    this.getPipeline(this.colorFormat);
  }

  /**
   * Get (or create) the triangle pipeline for a color target format
   */
  getPipeline(format: GPUTextureFormat): RenderPipelineWrapper {
    let pipeline = this.pipelines.get(format);
    if (!pipeline) {
      const shader = getShaderSource('triangle');
      pipeline = RenderPipelineWrapper.create(this.ctx, {
        label: format === this.colorFormat ? this.label : `${this.label}-${format}`,
        vertexShader: shader,
        vertexEntryPoint: 'vs_main',
        fragmentEntryPoint: 'fs_main',
        bindGroupLayouts: [],
        topology: 'triangle-list',
        cullMode: 'back',
        frontFace: 'ccw',
        colorFormats: [format],
      });
      this.pipelines.set(format, pipeline);
    }
    return pipeline;
  }

  /**
   * Record the triangle draw into a render pass.
   * Nothing is recorded when `draw` breaks the triangle draw contract.
   *
   * @param format - Format of the pass's color attachment
   */
  render(
    passEncoder: GPURenderPassEncoder,
    format: GPUTextureFormat = this.colorFormat,
    draw: Readonly<DrawCall> = TRIANGLE_DRAW
  ): void {
    validateDrawCall(draw);

    passEncoder.setPipeline(this.getPipeline(format).pipeline);
    passEncoder.draw(draw.vertexCount, draw.instanceCount, draw.firstVertex, draw.firstInstance);
  }

  /**
   * Clear the canvas, draw the triangle and submit
   */
  renderToScreen(clearValue: GPUColor = DEFAULT_CLEAR_VALUE): void {
    const colorView = this.ctx.getCurrentTextureView();

    const encoder = this.ctx.device.createCommandEncoder({
      label: 'triangle-encoder',
    });

    const passEncoder = encoder.beginRenderPass({
      label: 'triangle-pass',
      colorAttachments: [
        {
          view: colorView,
          clearValue,
          loadOp: 'clear',
          storeOp: 'store',
        },
      ],
    });

    this.render(passEncoder, this.ctx.format);

    passEncoder.end();
    this.ctx.queue.submit([encoder.finish()]);
  }

  /**
   * Render into an offscreen float target and read the pixels back
   */
  async renderToTexture(
    width: number,
    height: number,
    clearValue: GPUColor = DEFAULT_CLEAR_VALUE
  ): Promise<ColorTarget> {
    const target = new ColorTarget(width, height);
    const device = this.ctx.device;

    const texture = device.createTexture({
      label: 'triangle-offscreen-target',
      size: { width, height, depthOrArrayLayers: 1 },
      format: OFFSCREEN_FORMAT,
      usage: GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.COPY_SRC,
    });

    const bytesPerRow = Math.ceil(width * OFFSCREEN_BYTES_PER_PIXEL / 256) * 256; // Must be multiple of 256
    const stagingBuffer = device.createBuffer({
      label: 'triangle-readback-staging',
      size: bytesPerRow * height,
      usage: GPUBufferUsage.COPY_DST | GPUBufferUsage.MAP_READ,
    });

    try {
      const encoder = device.createCommandEncoder({
        label: 'triangle-offscreen-encoder',
      });

      const passEncoder = encoder.beginRenderPass({
        label: 'triangle-offscreen-pass',
        colorAttachments: [
          {
            view: texture.createView(),
            clearValue,
            loadOp: 'clear',
            storeOp: 'store',
          },
        ],
      });
      this.render(passEncoder, OFFSCREEN_FORMAT);
      passEncoder.end();

      encoder.copyTextureToBuffer(
        { texture, mipLevel: 0 },
        { buffer: stagingBuffer, bytesPerRow, rowsPerImage: height },
        { width, height, depthOrArrayLayers: 1 }
      );

      this.ctx.queue.submit([encoder.finish()]);

      await stagingBuffer.mapAsync(GPUMapMode.READ);
      const srcView = new Float32Array(stagingBuffer.getMappedRange());
      const srcRowFloats = bytesPerRow / 4;
      const dstRowFloats = width * 4;

      // Drop the row padding
      for (let y = 0; y < height; y++) {
        const srcOffset = y * srcRowFloats;
        target.data.set(srcView.subarray(srcOffset, srcOffset + dstRowFloats), y * dstRowFloats);
      }
      stagingBuffer.unmap();
    } finally {
      stagingBuffer.destroy();
      texture.destroy();
    }

    console.log(`[TriangleRendererGPU] Read back ${width}x${height} offscreen target`);
    return target;
  }
}

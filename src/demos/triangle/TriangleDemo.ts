/**
 * TriangleDemo - Host for the fixed triangle
 *
 * Owns the GPU context, the renderer and the frame loop. Each frame the
 * surface is resized to the canvas's display size if it changed, then the
 * triangle is rendered to the screen.
 */

import { GPUContext, DEFAULT_CLEAR_VALUE, TriangleRendererGPU } from '../../core/gpu';
import { createAnimationLoop, type AnimationLoop, type FpsCallback, type FrameScheduler } from '../../core/animationLoop';

export interface TriangleDemoOptions {
  /** Fixed drawing-buffer width; defaults to the canvas client width x devicePixelRatio */
  width?: number;
  /** Fixed drawing-buffer height; defaults to the canvas client height x devicePixelRatio */
  height?: number;
  clearColor?: GPUColor;
  /** Ignored, with a warning, when a GPUContext already exists */
  powerPreference?: GPUPowerPreference;
  /** Pixel ratio used when the size follows the canvas (default: window.devicePixelRatio) */
  devicePixelRatio?: number;
  onFps?: FpsCallback;
  /** WebGPU entry point (default: navigator.gpu). Ignored, with a warning, when a GPUContext already exists */
  gpu?: GPU;
  /** Frame scheduler (default: requestAnimationFrame) */
  scheduler?: FrameScheduler;
}

export class TriangleDemo {
  private ctx: GPUContext;
  private canvas: HTMLCanvasElement;
  private renderer: TriangleRendererGPU;
  private animationLoop: AnimationLoop;
  private options: TriangleDemoOptions;
  private _framesRendered = 0;

  private constructor(
    ctx: GPUContext,
    canvas: HTMLCanvasElement,
    renderer: TriangleRendererGPU,
    options: TriangleDemoOptions
  ) {
    this.ctx = ctx;
    this.canvas = canvas;
    this.options = options;
    this.renderer = renderer;
    this.animationLoop = createAnimationLoop({
      onFps: options.onFps ?? null,
      scheduler: options.scheduler,
    });
  }

  /**
   * Initialize WebGPU on `canvas` and start rendering.
   * Rejects when the triangle shader does not compile.
   */
  static async start(canvas: HTMLCanvasElement, options: TriangleDemoOptions = {}): Promise<TriangleDemo> {
    const ctx = await GPUContext.getInstance(canvas, {
      powerPreference: options.powerPreference,
      gpu: options.gpu,
    });

    const renderer = await TriangleRendererGPU.create(ctx);
    const demo = new TriangleDemo(ctx, canvas, renderer, options);
    demo.syncSurfaceSize();
    demo.animationLoop.start(() => demo.frame());

    console.log('[TriangleDemo] Started');
    return demo;
  }

  /**
   * Drawing-buffer size the surface should have right now
   */
  targetSize(): { width: number; height: number } {
    const dpr = this.options.devicePixelRatio
      ?? (typeof window !== 'undefined' ? window.devicePixelRatio || 1 : 1);
    const width = this.options.width ?? Math.floor(this.canvas.clientWidth * dpr);
    const height = this.options.height ?? Math.floor(this.canvas.clientHeight * dpr);
    return { width: Math.max(1, width), height: Math.max(1, height) };
  }

  /**
   * Render one frame. Errors are logged and the loop keeps running.
   */
  frame(): void {
    try {
      this.syncSurfaceSize();
      this.renderer.renderToScreen(this.options.clearColor ?? DEFAULT_CLEAR_VALUE);
      this._framesRendered++;
    } catch (error) {
      console.error('[TriangleDemo] Frame failed:', error);
    }
  }

  get framesRendered(): number {
    return this._framesRendered;
  }

  isRunning(): boolean {
    return this.animationLoop.isRunning();
  }

  /**
   * Stop the frame loop. The GPU context stays alive.
   */
  stop(): void {
    this.animationLoop.stop();
    console.log(`[TriangleDemo] Stopped after ${this._framesRendered} frames`);
  }

  private syncSurfaceSize(): void {
    const { width, height } = this.targetSize();
    this.ctx.resizeCanvas(width, height);
  }
}

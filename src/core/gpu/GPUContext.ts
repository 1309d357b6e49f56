/**
 * GPUContext - Singleton for WebGPU device management
 * Handles adapter/device acquisition and the canvas surface
 */

import { ShaderModuleManager } from './GPUShaderModule';

export interface GPUContextOptions {
  powerPreference?: GPUPowerPreference;
  requiredFeatures?: GPUFeatureName[];
  requiredLimits?: Record<string, number>;
  /** WebGPU entry point; defaults to navigator.gpu */
  gpu?: GPU;
  /** Canvas compositing mode */
  alphaMode?: GPUCanvasAlphaMode;
}

/**
 * Singleton class managing WebGPU adapter, device, and queue
 */
export class GPUContext {
  private static instance: GPUContext | null = null;
  private static initPromise: Promise<GPUContext> | null = null;

  private _gpu: GPU;
  private _alphaMode: GPUCanvasAlphaMode;
  private _powerPreference: GPUPowerPreference = 'high-performance';
  private _adapter: GPUAdapter | null = null;
  private _device: GPUDevice | null = null;
  private _canvas: HTMLCanvasElement | null = null;
  private _context: GPUCanvasContext | null = null;
  private _format: GPUTextureFormat = 'bgra8unorm';

  private constructor(gpu: GPU, alphaMode: GPUCanvasAlphaMode) {
    this._gpu = gpu;
    this._alphaMode = alphaMode;
  }

  /**
   * Check if WebGPU is supported in the current environment
   */
  static isSupported(): boolean {
    return typeof navigator !== 'undefined' && 'gpu' in navigator;
  }

  /**
   * Get or initialize the singleton instance.
   * Options only apply to the first initialization; later callers get the
   * existing context and a warning for any option it was not created with.
   */
  static async getInstance(
    canvas?: HTMLCanvasElement,
    options?: GPUContextOptions
  ): Promise<GPUContext> {
    if (GPUContext.instance && GPUContext.instance._device) {
      GPUContext.instance.warnIgnoredOptions(options);
      // If canvas provided and different, reconfigure
      if (canvas && canvas !== GPUContext.instance._canvas) {
        GPUContext.instance.configureCanvas(canvas);
      }
      return GPUContext.instance;
    }

    // Prevent multiple concurrent initializations
    if (GPUContext.initPromise) {
      return GPUContext.initPromise;
    }

    GPUContext.initPromise = GPUContext.initialize(canvas, options);
    try {
      GPUContext.instance = await GPUContext.initPromise;
      return GPUContext.instance;
    } finally {
      GPUContext.initPromise = null;
    }
  }

  /**
   * Internal initialization
   */
  private static async initialize(
    canvas?: HTMLCanvasElement,
    options?: GPUContextOptions
  ): Promise<GPUContext> {
    const gpu = options?.gpu ?? (GPUContext.isSupported() ? navigator.gpu : undefined);
    if (!gpu) {
      throw new Error('WebGPU is not supported in this browser');
    }

    const ctx = new GPUContext(gpu, options?.alphaMode || 'opaque');

    ctx._powerPreference = options?.powerPreference || 'high-performance';
    ctx._adapter = await gpu.requestAdapter({
      powerPreference: ctx._powerPreference,
    });

    if (!ctx._adapter) {
      throw new Error('Failed to acquire WebGPU adapter');
    }

    const info = ctx._adapter.info;
    console.log('[GPUContext] Adapter acquired:', info ? info.description || info.vendor || 'unknown' : 'unknown');

    // Request device with features and limits
    const deviceDescriptor: GPUDeviceDescriptor = {
      requiredFeatures: options?.requiredFeatures || [],
      requiredLimits: options?.requiredLimits || {},
    };

    const device = await ctx._adapter.requestDevice(deviceDescriptor);
    ctx._device = device;

    // Handle device loss
    void device.lost.then(
      (lost) => {
        console.error('[GPUContext] Device lost:', lost.message);
        if (GPUContext.instance === ctx) {
          GPUContext.instance = null;
        }
      },
      (error: unknown) => {
        console.error('[GPUContext] Device loss tracking failed:', error);
      }
    );

    // Configure canvas if provided
    if (canvas) {
      ctx.configureCanvas(canvas);
    }

    console.log('[GPUContext] Initialized successfully');
    return ctx;
  }

  private warnIgnoredOptions(options?: GPUContextOptions): void {
    const ignored: string[] = [];
    if (options?.gpu && options.gpu !== this._gpu) ignored.push('gpu');
    if (options?.powerPreference && options.powerPreference !== this._powerPreference) ignored.push('powerPreference');
    if (ignored.length > 0) {
      console.warn(`[GPUContext] Already initialized, ignoring options: ${ignored.join(', ')}`);
    }
  }

  /**
   * Configure a canvas for WebGPU rendering
   */
  configureCanvas(canvas: HTMLCanvasElement): void {
    const device = this.device;

    const context = canvas.getContext('webgpu');
    if (!context) {
      throw new Error('Failed to get WebGPU context from canvas');
    }

    this._canvas = canvas;
    this._context = context;

    // Get preferred format
    this._format = this._gpu.getPreferredCanvasFormat();

    this._context.configure({
      device,
      format: this._format,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
      alphaMode: this._alphaMode,
    });

    console.log('[GPUContext] Canvas configured, format:', this._format);
  }

  /**
   * Resize the drawing buffer and reconfigure the surface.
   * Returns false when the size is unchanged.
   */
  resizeCanvas(width: number, height: number): boolean {
    if (!this._canvas) {
      throw new Error('Canvas not configured');
    }
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid canvas size ${width}x${height}`);
    }
    if (this._canvas.width === width && this._canvas.height === height) {
      return false;
    }

    this._canvas.width = width;
    this._canvas.height = height;
    this.configureCanvas(this._canvas);
    console.log(`[GPUContext] Surface resized to ${width}x${height}`);
    return true;
  }

  /**
   * Get the current render target texture view
   */
  getCurrentTextureView(): GPUTextureView {
    if (!this._context) {
      throw new Error('Canvas not configured');
    }
    return this._context.getCurrentTexture().createView();
  }

  // Getters
  get adapter(): GPUAdapter {
    if (!this._adapter) throw new Error('GPUContext not initialized');
    return this._adapter;
  }

  get device(): GPUDevice {
    if (!this._device) throw new Error('GPUContext not initialized');
    return this._device;
  }

  get queue(): GPUQueue {
    return this.device.queue;
  }

  get format(): GPUTextureFormat {
    return this._format;
  }

  get canvas(): HTMLCanvasElement | null {
    return this._canvas;
  }

  get context(): GPUCanvasContext | null {
    return this._context;
  }

  /**
   * Get device limits
   */
  get limits(): GPUSupportedLimits {
    return this.device.limits;
  }

  /**
   * Check if a feature is supported
   */
  hasFeature(feature: GPUFeatureName): boolean {
    return this.device.features.has(feature);
  }

  /**
   * Destroy the context and release resources
   */
  destroy(): void {
    if (this._context) {
      this._context.unconfigure();
    }
    if (this._device) {
      this._device.destroy();
      this._device = null;
    }
    ShaderModuleManager.clearCache();
    this._adapter = null;
    this._context = null;
    this._canvas = null;
    if (GPUContext.instance === this) {
      GPUContext.instance = null;
    }
    console.log('[GPUContext] Destroyed');
  }
}

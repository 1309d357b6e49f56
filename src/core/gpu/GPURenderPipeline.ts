/**
 * GPURenderPipeline - Render pipeline wrapper for WebGPU
 * Simplifies render pipeline creation with sensible defaults
 */

import type { GPUContext } from './GPUContext';
import { ShaderModuleManager } from './GPUShaderModule';

/** Primitive topology types */
export type PrimitiveTopology = 'point-list' | 'line-list' | 'line-strip' | 'triangle-list' | 'triangle-strip';

/** Cull mode types */
export type CullMode = 'none' | 'front' | 'back';

/** Front face winding */
export type FrontFace = 'ccw' | 'cw';

/** Depth compare functions */
export type DepthCompareFunction = 'never' | 'less' | 'equal' | 'less-equal' | 'greater' | 'not-equal' | 'greater-equal' | 'always';

/** Render pipeline options */
export interface RenderPipelineOptions {
  label?: string;

  // Shaders
  vertexShader: string;
  fragmentShader?: string;
  vertexEntryPoint?: string;
  fragmentEntryPoint?: string;

  // Pipeline layout
  bindGroupLayouts?: GPUBindGroupLayout[];

  // Primitive state
  topology?: PrimitiveTopology;
  cullMode?: CullMode;
  frontFace?: FrontFace;
  stripIndexFormat?: 'uint16' | 'uint32';

  // Depth/stencil (omit depthFormat to disable)
  depthFormat?: GPUTextureFormat;
  depthWriteEnabled?: boolean;
  depthCompare?: DepthCompareFunction;

  // Multisample
  sampleCount?: number;

  // Color targets. No blend state is set, so fragments replace the target.
  colorFormats?: GPUTextureFormat[];
}

/**
 * Render pipeline wrapper
 */
export class RenderPipelineWrapper {
  private _pipeline: GPURenderPipeline;
  private _layout: GPUPipelineLayout;
  private _label: string;

  private constructor(
    pipeline: GPURenderPipeline,
    layout: GPUPipelineLayout,
    label: string
  ) {
    this._pipeline = pipeline;
    this._layout = layout;
    this._label = label;
  }

  /**
   * Resolve options into a pipeline descriptor.
   * Creates (or reuses) the shader modules and the pipeline layout.
   */
  static buildDescriptor(ctx: GPUContext, options: RenderPipelineOptions): GPURenderPipelineDescriptor & { layout: GPUPipelineLayout } {
    const {
      label = 'render-pipeline',
      vertexShader,
      fragmentShader,
      vertexEntryPoint = 'vs_main',
      fragmentEntryPoint = 'fs_main',
      bindGroupLayouts = [],
      topology = 'triangle-list',
      cullMode = 'back',
      frontFace = 'ccw',
      stripIndexFormat,
      depthFormat,
      depthWriteEnabled = true,
      depthCompare = 'less',
      sampleCount = 1,
      colorFormats = [ctx.format],
    } = options;

    // Create shader modules
    const vertexModule = ShaderModuleManager.getOrCreate(ctx, vertexShader, `${label}-vertex`);
    const fragmentModule = fragmentShader
      ? ShaderModuleManager.getOrCreate(ctx, fragmentShader, `${label}-fragment`)
      : vertexModule; // Combined shader

    // Create pipeline layout
    const layout = ctx.device.createPipelineLayout({
      label: `${label}-layout`,
      bindGroupLayouts,
    });

    const colorTargets: GPUColorTargetState[] = colorFormats.map((format) => ({ format }));

    const descriptor: GPURenderPipelineDescriptor & { layout: GPUPipelineLayout } = {
      label,
      layout,
      vertex: {
        module: vertexModule,
        entryPoint: vertexEntryPoint,
        buffers: [],
      },
      primitive: {
        topology,
        cullMode,
        frontFace,
        stripIndexFormat: topology.includes('strip') ? stripIndexFormat : undefined,
      },
      multisample: {
        count: sampleCount,
      },
    };

    // Add fragment stage if we have color targets
    if (colorTargets.length > 0) {
      descriptor.fragment = {
        module: fragmentModule,
        entryPoint: fragmentEntryPoint,
        targets: colorTargets,
      };
    }

    if (depthFormat) {
      descriptor.depthStencil = {
        format: depthFormat,
        depthWriteEnabled,
        depthCompare,
      };
    }

    return descriptor;
  }

  /**
   * Create a render pipeline
   */
  static create(ctx: GPUContext, options: RenderPipelineOptions): RenderPipelineWrapper {
    const descriptor = RenderPipelineWrapper.buildDescriptor(ctx, options);
    const pipeline = ctx.device.createRenderPipeline(descriptor);
    return new RenderPipelineWrapper(pipeline, descriptor.layout, descriptor.label ?? 'render-pipeline');
  }

  // Getters
  get pipeline(): GPURenderPipeline {
    return this._pipeline;
  }

  get layout(): GPUPipelineLayout {
    return this._layout;
  }

  get label(): string {
    return this._label;
  }
}

/**
 * GPU Module - WebGPU abstraction layer
 */

// Core context
export { GPUContext } from './GPUContext';
export type { GPUContextOptions } from './GPUContext';

// Shader module management
export { ShaderModuleManager, hashString } from './GPUShaderModule';
export type { ShaderCompilationResult } from './GPUShaderModule';

// Shader loader (WGSL file imports)
export { ShaderSources, getShaderSource, loadShader } from './ShaderLoader';
export type { ShaderName } from './ShaderLoader';

// Render pipeline
export { RenderPipelineWrapper } from './GPURenderPipeline';
export type {
  PrimitiveTopology,
  CullMode,
  FrontFace,
  DepthCompareFunction,
  RenderPipelineOptions,
} from './GPURenderPipeline';

// Draw contract
export { TRIANGLE_DRAW, DrawContractError, getDrawCallViolations, validateDrawCall } from './pipeline/DrawCall';
export type { DrawCall } from './pipeline/DrawCall';

// Renderers
export { TriangleRendererGPU, DEFAULT_CLEAR_VALUE } from './renderers/TriangleRendererGPU';
export type { TriangleRendererOptions } from './renderers/TriangleRendererGPU';

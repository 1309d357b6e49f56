/**
 * ShaderLoader - Utility for loading WGSL shader files
 * Uses Vite's ?raw import to load shader source code
 */

import type { GPUContext } from './GPUContext';
import { ShaderModuleManager } from './GPUShaderModule';

// Loaded as raw strings at build time
import triangleWGSL from './shaders/triangle.wgsl?raw';

/**
 * Available shader sources
 */
export const ShaderSources = {
  triangle: triangleWGSL,
} as const;

export type ShaderName = keyof typeof ShaderSources;

/**
 * Get shader source by name
 */
export function getShaderSource(name: ShaderName): string {
  const source = ShaderSources[name];
  if (!source) {
    throw new Error(`Shader "${name}" not found`);
  }
  return source;
}

/**
 * Compile a named shader and check its compilation messages.
 * The module is cached per device, so pipelines built from the same source
 * afterwards reuse it.
 */
export async function loadShader(ctx: GPUContext, name: ShaderName, label?: string): Promise<GPUShaderModule> {
  const result = await ShaderModuleManager.createWithInfo(ctx, getShaderSource(name), label || name);
  if (result.hasErrors) {
    throw new Error(`Shader "${name}" failed to compile`);
  }
  return result.module;
}

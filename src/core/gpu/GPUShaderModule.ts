/**
 * GPUShaderModule - WGSL shader compilation and management
 * Provides caching and error reporting for shader modules
 */

import type { GPUContext } from './GPUContext';

/** Shader compilation result */
export interface ShaderCompilationResult {
  module: GPUShaderModule;
  compilationInfo?: GPUCompilationInfo;
  hasErrors: boolean;
  hasWarnings: boolean;
}

/**
 * Simple hash function for shader source caching
 */
export function hashString(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash) + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return hash.toString(36);
}

/**
 * Shader module manager with caching and compilation utilities
 */
export class ShaderModuleManager {
  private static cache = new Map<string, GPUShaderModule>();

  /**
   * Create or retrieve a cached shader module.
   * Modules belong to a device, so the cache is keyed by device and source hash.
   */
  static getOrCreate(ctx: GPUContext, code: string, label?: string): GPUShaderModule {
    const hash = hashString(code);
    const key = `${ShaderModuleManager.deviceKey(ctx.device)}:${hash}`;

    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const module = ctx.device.createShaderModule({
      code,
      label: label || `shader-${hash}`,
    });

    this.cache.set(key, module);
    return module;
  }

  /**
   * Get the (cached) module for `code` and collect its compilation messages.
   * Errors and warnings are logged; the caller decides what an error means.
   */
  static async createWithInfo(
    ctx: GPUContext,
    code: string,
    label?: string
  ): Promise<ShaderCompilationResult> {
    const module = ShaderModuleManager.getOrCreate(ctx, code, label);

    const compilationInfo = await module.getCompilationInfo();
    let hasErrors = false;
    let hasWarnings = false;

    for (const message of compilationInfo.messages) {
      if (message.type === 'error') {
        hasErrors = true;
        console.error(`[Shader Error] ${message.message}`, {
          lineNum: message.lineNum,
          linePos: message.linePos,
        });
      } else if (message.type === 'warning') {
        hasWarnings = true;
        console.warn(`[Shader Warning] ${message.message}`, {
          lineNum: message.lineNum,
          linePos: message.linePos,
        });
      }
    }

    return {
      module,
      compilationInfo,
      hasErrors,
      hasWarnings,
    };
  }

  /**
   * Clear the shader cache
   */
  static clearCache(): void {
    this.cache.clear();
    this.deviceIds = new WeakMap();
  }

  /**
   * Get cache statistics
   */
  static getCacheStats(): { size: number } {
    return { size: this.cache.size };
  }

  private static deviceIds = new WeakMap<GPUDevice, number>();
  private static nextDeviceId = 0;

  private static deviceKey(device: GPUDevice): number {
    let id = this.deviceIds.get(device);
    if (id === undefined) {
      id = this.nextDeviceId++;
      this.deviceIds.set(device, id);
    }
    return id;
  }
}

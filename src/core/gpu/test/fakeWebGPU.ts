/**
 * In-process WebGPU stand-ins for tests
 *
 * Only the members the GPU layer touches are implemented. Every method is a
 * vi.fn so tests can assert on the recorded commands.
 */

import { vi } from 'vitest';
import { GPUContext } from '../GPUContext';

export interface FakeWebGPUOptions {
  /** Messages returned by getCompilationInfo() */
  compilationMessages?: Partial<GPUCompilationMessage>[];
  /** Fills a staging buffer of `size` bytes before it is mapped */
  readback?: (size: number) => ArrayBuffer;
  preferredFormat?: GPUTextureFormat;
  adapterInfo?: { vendor: string; description: string };
}

/** WebGPU usage flags, values as defined by WebGPU */
export const GPU_GLOBALS = {
  GPUTextureUsage: { COPY_SRC: 0x01, COPY_DST: 0x02, TEXTURE_BINDING: 0x04, STORAGE_BINDING: 0x08, RENDER_ATTACHMENT: 0x10 },
  GPUBufferUsage: { MAP_READ: 0x0001, MAP_WRITE: 0x0002, COPY_SRC: 0x0004, COPY_DST: 0x0008, VERTEX: 0x0020, UNIFORM: 0x0040 },
  GPUMapMode: { READ: 0x0001, WRITE: 0x0002 },
};

export function stubWebGPUGlobals(): void {
  for (const [name, value] of Object.entries(GPU_GLOBALS)) {
    vi.stubGlobal(name, value);
  }
}

export function createFakeWebGPU(options: FakeWebGPUOptions = {}) {
  const pass = {
    setPipeline: vi.fn(),
    draw: vi.fn(),
    end: vi.fn(),
  };

  const commandBuffer = { label: 'fake-command-buffer' };

  const encoder = {
    beginRenderPass: vi.fn((_descriptor: GPURenderPassDescriptor) => pass),
    copyTextureToBuffer: vi.fn(),
    finish: vi.fn(() => commandBuffer),
  };

  const offscreenView = { label: 'fake-offscreen-view' };
  const offscreenTexture = {
    createView: vi.fn(() => offscreenView),
    destroy: vi.fn(),
  };

  let mappedRange = new ArrayBuffer(0);
  const stagingBuffer = {
    mapAsync: vi.fn(async (_mode: number) => undefined),
    getMappedRange: vi.fn(() => mappedRange),
    unmap: vi.fn(),
    destroy: vi.fn(),
  };

  const device = {
    queue: { submit: vi.fn() },
    limits: { maxTextureDimension2D: 8192 },
    features: new Set<string>(['float32-filterable']),
    lost: new Promise<GPUDeviceLostInfo>(() => undefined),
    createShaderModule: vi.fn((descriptor: GPUShaderModuleDescriptor) => ({
      label: descriptor.label ?? '',
      code: descriptor.code,
      getCompilationInfo: vi.fn(async () => ({ messages: options.compilationMessages ?? [] })),
    })),
    createPipelineLayout: vi.fn((descriptor: GPUPipelineLayoutDescriptor) => ({ label: descriptor.label ?? '' })),
    createRenderPipeline: vi.fn((descriptor: GPURenderPipelineDescriptor) => ({ label: descriptor.label ?? '' })),
    createCommandEncoder: vi.fn((_descriptor?: GPUCommandEncoderDescriptor) => encoder),
    createTexture: vi.fn((_descriptor: GPUTextureDescriptor) => offscreenTexture),
    createBuffer: vi.fn((descriptor: GPUBufferDescriptor) => {
      mappedRange = options.readback ? options.readback(descriptor.size) : new ArrayBuffer(descriptor.size);
      return stagingBuffer;
    }),
    destroy: vi.fn(),
  };

  const adapter = {
    info: options.adapterInfo ?? { vendor: 'test-vendor', description: 'Test Adapter' },
    requestDevice: vi.fn(async (_descriptor?: GPUDeviceDescriptor) => device),
  };

  const gpu = {
    requestAdapter: vi.fn(async (_options?: GPURequestAdapterOptions) => adapter),
    getPreferredCanvasFormat: vi.fn(() => options.preferredFormat ?? 'bgra8unorm'),
  };

  const swapchainView = { label: 'fake-swapchain-view' };
  const swapchainTexture = { createView: vi.fn(() => swapchainView) };
  const canvasContext = {
    configure: vi.fn(),
    unconfigure: vi.fn(),
    getCurrentTexture: vi.fn(() => swapchainTexture),
  };

  const canvas = {
    width: 300,
    height: 150,
    clientWidth: 200,
    clientHeight: 100,
    getContext: vi.fn((_kind: string) => canvasContext),
  };

  return {
    pass,
    commandBuffer,
    encoder,
    offscreenView,
    offscreenTexture,
    stagingBuffer,
    device,
    adapter,
    gpu,
    swapchainView,
    canvasContext,
    canvas,
    /** The fakes typed as the WebGPU / DOM interfaces they stand in for */
    typed: {
      gpu: gpu as unknown as GPU,
      device: device as unknown as GPUDevice,
      canvas: canvas as unknown as HTMLCanvasElement,
      pass: pass as unknown as GPURenderPassEncoder,
    },
  };
}

export type FakeWebGPU = ReturnType<typeof createFakeWebGPU>;

/**
 * Initialize the GPUContext singleton on a fake adapter and canvas
 */
export async function createTestContext(options: FakeWebGPUOptions = {}): Promise<{ ctx: GPUContext; fake: FakeWebGPU }> {
  const fake = createFakeWebGPU(options);
  const ctx = await GPUContext.getInstance(fake.typed.canvas, { gpu: fake.typed.gpu });
  return { ctx, fake };
}

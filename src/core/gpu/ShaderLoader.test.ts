import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ShaderSources, getShaderSource, loadShader } from './ShaderLoader';
import { createTestContext, stubWebGPUGlobals } from './test/fakeWebGPU';

describe('ShaderSources.triangle', () => {
  const source = ShaderSources.triangle;

  it('declares both entry points', () => {
    expect(source).toContain('@vertex\nfn vs_main(@builtin(vertex_index) in_vertex_index: u32) -> VertexOutput {');
    expect(source).toContain('@fragment\nfn fs_main(in: VertexOutput) -> @location(0) vec4f {');
  });

  it('derives the position from the vertex index', () => {
    expect(source).toContain('let x = f32(1 - i32(in_vertex_index)) * 0.4;');
    expect(source).toContain('let y = f32(i32(in_vertex_index & 1u) * 2 - 1) * 0.5;');
    expect(source).toContain('out.clip_position = vec4f(x, y, 0.0, 1.0);');
  });

  it('returns a constant color', () => {
    expect(source).toContain('return vec4f(0.3, 0.2, 0.1, 1.0);');
  });

  it('binds no resources', () => {
    expect(source).not.toContain('@group');
    expect(source).not.toContain('@location(0) position');
  });
});

describe('getShaderSource', () => {
  it('returns the source by name', () => {
    expect(getShaderSource('triangle')).toBe(ShaderSources.triangle);
  });
});

describe('loadShader', () => {
  beforeEach(() => {
    stubWebGPUGlobals();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('compiles the named shader once per device', async () => {
    const { ctx, fake } = await createTestContext();

    const first = await loadShader(ctx, 'triangle');
    const second = await loadShader(ctx, 'triangle');

    expect(second).toBe(first);
    expect(fake.device.createShaderModule).toHaveBeenCalledTimes(1);
    expect(fake.device.createShaderModule).toHaveBeenCalledWith({
      code: ShaderSources.triangle,
      label: 'triangle',
    });
    ctx.destroy();
  });

  it('reads the compilation messages of the module', async () => {
    const { ctx, fake } = await createTestContext();

    const module = await loadShader(ctx, 'triangle');

    expect(module).toBe(fake.device.createShaderModule.mock.results[0].value);
    expect(fake.device.createShaderModule.mock.results[0].value.getCompilationInfo).toHaveBeenCalledTimes(1);
    ctx.destroy();
  });

  it('rejects a shader with compilation errors', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { ctx } = await createTestContext({
      compilationMessages: [{ type: 'error', message: 'bad wgsl', lineNum: 1, linePos: 1 }],
    });

    await expect(loadShader(ctx, 'triangle')).rejects.toThrow('Shader "triangle" failed to compile');
    expect(error).toHaveBeenCalledWith('[Shader Error] bad wgsl', { lineNum: 1, linePos: 1 });
    ctx.destroy();
  });

  it('accepts a shader with only warnings', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { ctx } = await createTestContext({
      compilationMessages: [{ type: 'warning', message: 'unused binding', lineNum: 2, linePos: 3 }],
    });

    await expect(loadShader(ctx, 'triangle')).resolves.toBeDefined();
    ctx.destroy();
  });
});

/**
 * Browser entry: render the fixed triangle on #gpu-canvas
 */

import { GPUContext } from './core/gpu';
import { TriangleDemo } from './demos/triangle/TriangleDemo';

async function main(): Promise<void> {
  const canvas = document.querySelector<HTMLCanvasElement>('#gpu-canvas');
  if (!canvas) {
    throw new Error('Canvas #gpu-canvas not found');
  }

  if (!GPUContext.isSupported()) {
    console.error('[main] WebGPU is not supported in this browser');
    return;
  }

  const demo = await TriangleDemo.start(canvas, {
    onFps: (fps) => console.log(`[main] ${fps} fps`),
  });

  window.addEventListener('beforeunload', () => demo.stop());
}

main().catch((error: unknown) => {
  console.error('[main] Failed to start:', error);
});

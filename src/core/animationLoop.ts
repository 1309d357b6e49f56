/**
 * Per-frame work: receives the milliseconds since the previous frame (0 on
 * the first frame after start) and the scheduler's timestamp
 */
export type FrameCallback = (deltaTime: number, totalTime: number) => void;

/** Receives how many frames ran in the last second */
export type FpsCallback = (fps: number) => void;

/** Frame scheduler pair, requestAnimationFrame-compatible */
export interface FrameScheduler {
  request(callback: (time: number) => void): number;
  cancel(handle: number): void;
}

export interface AnimationLoopOptions {
  onFps?: FpsCallback | null;
  /** Default: requestAnimationFrame / cancelAnimationFrame */
  scheduler?: FrameScheduler;
}

export interface AnimationLoop {
  /** Begin ticking, or swap the callback of a running loop */
  start(callback: FrameCallback): void;
  /** Cancel the pending frame. Safe to call from inside the callback. */
  stop(): void;
  isRunning(): boolean;
}

const browserScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

const FPS_WINDOW_MS = 1000;

/**
 * Drives the triangle demo: one callback per scheduled frame, with delta time
 * and a once-a-second frame count
 */
export function createAnimationLoop(options: AnimationLoopOptions = {}): AnimationLoop {
  const { onFps = null, scheduler = browserScheduler } = options;

  let pendingFrame: number | null = null;
  let previousTime: number | null = null;
  let callback: FrameCallback | null = null;

  let framesInWindow = 0;
  let windowStart = 0;

  function tick(time: number): void {
    if (previousTime === null) {
      previousTime = time;
      windowStart = time;
    }
    const deltaTime = time - previousTime;
    previousTime = time;

    framesInWindow++;
    if (time - windowStart >= FPS_WINDOW_MS) {
      onFps?.(framesInWindow);
      framesInWindow = 0;
      windowStart = time;
    }

    callback?.(deltaTime, time);

    // stop() inside the callback clears pendingFrame
    if (pendingFrame !== null) {
      pendingFrame = scheduler.request(tick);
    }
  }

  return {
    start(frameCallback: FrameCallback): void {
      callback = frameCallback;
      if (pendingFrame !== null) return;

      previousTime = null;
      framesInWindow = 0;
      pendingFrame = scheduler.request(tick);
    },

    stop(): void {
      if (pendingFrame === null) return;

      scheduler.cancel(pendingFrame);
      pendingFrame = null;
      callback = null;
    },

    isRunning: () => pendingFrame !== null,
  };
}

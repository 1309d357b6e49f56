/**
 * ColorTarget - CPU-side RGBA float image, row-major, top row first
 */

import { vec4, type ReadonlyVec4 } from 'gl-matrix';

const CHANNELS = 4;

export class ColorTarget {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;

  constructor(width: number, height: number, data?: Float32Array) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Invalid color target size ${width}x${height}`);
    }
    const length = width * height * CHANNELS;
    if (data && data.length !== length) {
      throw new RangeError(`Pixel data has ${data.length} floats, expected ${length}`);
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Float32Array(length);
  }

  /**
   * Fill every pixel with `color` (load op 'clear')
   */
  clear(color: ReadonlyVec4): this {
    for (let i = 0; i < this.data.length; i += CHANNELS) {
      this.data[i] = color[0];
      this.data[i + 1] = color[1];
      this.data[i + 2] = color[2];
      this.data[i + 3] = color[3];
    }
    return this;
  }

  read(x: number, y: number): vec4 {
    const i = this.offset(x, y);
    return vec4.fromValues(this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]);
  }

  /**
   * Overwrite one pixel (no blending)
   */
  write(x: number, y: number, color: ReadonlyVec4): void {
    const i = this.offset(x, y);
    this.data[i] = color[0];
    this.data[i + 1] = color[1];
    this.data[i + 2] = color[2];
    this.data[i + 3] = color[3];
  }

  /**
   * Bitwise comparison of size and pixel data
   */
  equals(other: ColorTarget): boolean {
    if (other.width !== this.width || other.height !== this.height) return false;
    for (let i = 0; i < this.data.length; i++) {
      if (!Object.is(this.data[i], other.data[i])) return false;
    }
    return true;
  }

  /**
   * Count pixels whose color equals `color` exactly
   */
  countPixels(color: ReadonlyVec4): number {
    const expected = vec4.clone(color);
    let count = 0;
    for (let i = 0; i < this.data.length; i += CHANNELS) {
      if (
        this.data[i] === expected[0] &&
        this.data[i + 1] === expected[1] &&
        this.data[i + 2] === expected[2] &&
        this.data[i + 3] === expected[3]
      ) {
        count++;
      }
    }
    return count;
  }

  private offset(x: number, y: number): number {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} target`);
    }
    return (y * this.width + x) * CHANNELS;
  }
}

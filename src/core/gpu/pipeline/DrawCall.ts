/**
 * DrawCall - Host-side draw contract for the fixed triangle
 *
 * The shader stages trust their inputs; anything that could hand them an
 * out-of-range vertex index is rejected here, before a draw is recorded.
 */

/** Parameters of a single non-indexed draw */
export interface DrawCall {
  vertexCount: number;
  instanceCount: number;
  firstVertex: number;
  firstInstance: number;
  /** Number of bound vertex buffers */
  vertexBufferCount: number;
  /** Whether an index buffer is bound (drawIndexed) */
  indexBuffer: boolean;
  /** Number of bound bind groups (uniforms, textures) */
  bindGroupCount: number;
}

/** The only draw the triangle pipeline accepts: 3 vertices, 1 instance, nothing bound */
export const TRIANGLE_DRAW: Readonly<DrawCall> = Object.freeze({
  vertexCount: 3,
  instanceCount: 1,
  firstVertex: 0,
  firstInstance: 0,
  vertexBufferCount: 0,
  indexBuffer: false,
  bindGroupCount: 0,
});

const DRAW_CALL_FIELDS: readonly (keyof DrawCall)[] = [
  'vertexCount',
  'instanceCount',
  'firstVertex',
  'firstInstance',
  'vertexBufferCount',
  'indexBuffer',
  'bindGroupCount',
];

/**
 * Thrown when a draw does not match TRIANGLE_DRAW
 */
export class DrawContractError extends Error {
  readonly violations: readonly string[];

  constructor(violations: string[]) {
    super(`Invalid triangle draw: ${violations.join('; ')}`);
    this.name = 'DrawContractError';
    this.violations = violations;
  }
}

/**
 * Collect every way `draw` deviates from the triangle draw contract
 */
export function getDrawCallViolations(draw: Readonly<DrawCall>): string[] {
  const violations: string[] = [];
  for (const field of DRAW_CALL_FIELDS) {
    const expected = TRIANGLE_DRAW[field];
    const actual = draw[field];
    if (actual !== expected) {
      violations.push(`${field} must be ${expected} (got ${actual})`);
    }
  }

  return violations;
}

/**
 * Throw DrawContractError unless `draw` is exactly the triangle draw
 */
export function validateDrawCall(draw: Readonly<DrawCall>): void {
  const violations = getDrawCallViolations(draw);
  if (violations.length > 0) {
    throw new DrawContractError(violations);
  }
}

/**
 * CPU reference pipeline for the triangle stages
 */

export { ColorTarget } from './ColorTarget';
export {
  SoftwareRasterizer,
  TRIANGLE_RASTER_PIPELINE,
  DEFAULT_CLEAR_COLOR,
  type RasterPipeline,
  type RasterStats,
} from './SoftwareRasterizer';
export {
  generatePosition,
  colorizeFragment,
  TRIANGLE_COLOR,
  type FragmentInput,
  type VertexStage,
  type FragmentStage,
} from './stages';

export * from './constants';
export type * from './types';
export {
  POSITIONS,
  computeCurves,
  computeWave,
  effectiveBoundaries,
  effectiveIndices,
  regionAt,
  sampleAt,
  wavenumbers,
} from './WaveField';
export type { RefractiveIndices, Wavenumbers } from './WaveField';
export { cssColor, spectralFactor, wavelengthToRGB } from './ColorMapper';
export { ParameterError, ParameterStore, formatMediumLabel } from './ParameterStore';
export type { ParameterErrorCode } from './ParameterStore';
export { AnimationDriver } from './AnimationDriver';
export type { DriverOptions, FrameListener, IntervalTimer } from './AnimationDriver';
export { buildScene } from './scene';
export { decimationStride, renderScene } from './renderers';
export type { PlotContext } from './renderers';

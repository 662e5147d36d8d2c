import type { Region, SimulationParameters, WaveCurve } from './types';
import {
  CAUCHY_COEFFICIENT_N2,
  CAUCHY_COEFFICIENT_N3,
  CAUCHY_REFERENCE_NM,
  DISPERSION_WAVELENGTHS,
  DOMAIN_MAX,
  SAMPLE_COUNT,
} from './constants';

export interface RefractiveIndices {
  n1: number;
  n2: number;
  n3: number;
}

export interface Wavenumbers {
  k1: number;
  k2: number;
  k3: number;
}

function linspace(start: number, end: number, count: number): Float64Array {
  const out = new Float64Array(count);
  if (count === 1) {
    out[0] = start;
    return out;
  }
  const step = (end - start) / (count - 1);
  for (let i = 0; i < count; i++) out[i] = start + step * i;
  out[count - 1] = end; // exact right edge regardless of rounding
  return out;
}

/**
 * Sample positions shared by every curve: SAMPLE_COUNT evenly spaced points
 * over [0, DOMAIN_MAX], both ends included. Treat as read-only.
 */
export const POSITIONS: Float64Array = linspace(0, DOMAIN_MAX, SAMPLE_COUNT);

/** Medium 1 is the dispersion-free reference; only n2 and n3 pick up the Cauchy term. */
export function effectiveIndices(params: Readonly<SimulationParameters>, wavelengthNm: number): RefractiveIndices {
  if (!params.dispersionEnabled) {
    return { n1: params.n1, n2: params.n2, n3: params.n3 };
  }
  const ratio = CAUCHY_REFERENCE_NM / wavelengthNm;
  const ratio2 = ratio * ratio;
  return {
    n1: params.n1,
    n2: params.n2 + CAUCHY_COEFFICIENT_N2 * ratio2,
    n3: params.n3 + CAUCHY_COEFFICIENT_N3 * ratio2,
  };
}

export function wavenumbers(params: Readonly<SimulationParameters>, wavelengthNm: number): Wavenumbers {
  const { n1, n2, n3 } = effectiveIndices(params, wavelengthNm);
  const twoPiOverLambda = (2 * Math.PI) / wavelengthNm;
  return {
    k1: twoPiOverLambda * n1,
    k2: twoPiOverLambda * n2,
    k3: twoPiOverLambda * n3,
  };
}

/**
 * Boundaries as the wave field uses them: both clamped into the domain, and
 * boundary2 raised to boundary1 when the pair is out of order. A disordered
 * pair therefore leaves region 2 empty instead of overlapping regions 1 and 3.
 */
export function effectiveBoundaries(params: Readonly<SimulationParameters>): [number, number] {
  const b1 = Math.min(DOMAIN_MAX, Math.max(0, params.boundary1));
  const b2 = Math.min(DOMAIN_MAX, Math.max(b1, params.boundary2));
  return [b1, b2];
}

export function regionAt(params: Readonly<SimulationParameters>, x: number): Region {
  const [b1, b2] = effectiveBoundaries(params);
  if (x <= b1) return 1;
  if (x <= b2) return 2;
  return 3;
}

// Everything the per-sample loop needs, resolved once per call
interface PhaseModel {
  k1: number;
  k2: number;
  k3: number;
  b1: number;
  b2: number;
  omegaT: number;
  peak: number;
}

function phaseModel(params: Readonly<SimulationParameters>, wavelengthNm: number): PhaseModel {
  const { k1, k2, k3 } = wavenumbers(params, wavelengthNm);
  const [b1, b2] = effectiveBoundaries(params);
  return {
    k1, k2, k3, b1, b2,
    omegaT: params.speed * params.time,
    peak: params.amplitude * params.visualizationScale,
  };
}

// Phase restarts at zero on entering regions 2 and 3; it is not carried across.
function evaluate(m: PhaseModel, x: number): number {
  if (x <= m.b1) return m.peak * Math.sin(m.k1 * x - m.omegaT);
  if (x <= m.b2) return m.peak * Math.sin(m.k2 * (x - m.b1) - m.omegaT);
  return m.peak * Math.sin(m.k3 * (x - m.b2) - m.omegaT);
}

/**
 * Amplitude of the wave at every entry of POSITIONS, for one wavelength.
 * Pure: identical inputs give identical output, and `params` is not touched.
 */
export function computeWave(params: Readonly<SimulationParameters>, wavelengthNm: number): Float64Array {
  const model = phaseModel(params, wavelengthNm);
  const out = new Float64Array(SAMPLE_COUNT);
  for (let i = 0; i < SAMPLE_COUNT; i++) {
    out[i] = evaluate(model, POSITIONS[i]);
  }
  return out;
}

/** Same model as computeWave, at an arbitrary position. */
export function sampleAt(params: Readonly<SimulationParameters>, wavelengthNm: number, x: number): number {
  return evaluate(phaseModel(params, wavelengthNm), x);
}

/** The curves one animation tick draws: the primary wavelength, or all seven in white-light mode. */
export function computeCurves(params: Readonly<SimulationParameters>): WaveCurve[] {
  const wavelengths: readonly number[] = params.whiteLightEnabled ? DISPERSION_WAVELENGTHS : [params.wavelength];
  return wavelengths.map((wavelength) => ({
    wavelength,
    samples: computeWave(params, wavelength),
  }));
}

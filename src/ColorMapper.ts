// --- Spectral Color Mapping ---
// Dan Bruton's piecewise-linear approximation of visible wavelengths to RGB.

import type { Rgb } from './types';
import { VISIBLE_SPECTRUM } from './constants';

const OUT_OF_SPECTRUM = 0.5;

function inSpectrum(nm: number): boolean {
  return nm >= VISIBLE_SPECTRUM.min && nm <= VISIBLE_SPECTRUM.max;
}

// Raw channels in [0, 1]. Bands are half-open except the last, which includes 750.
function bandColor(nm: number): Rgb {
  if (nm >= 380 && nm < 440) return [-(nm - 440) / (440 - 380), 0, 1];
  if (nm >= 440 && nm < 490) return [0, (nm - 440) / (490 - 440), 1];
  if (nm >= 490 && nm < 510) return [0, 1, -(nm - 510) / (510 - 490)];
  if (nm >= 510 && nm < 580) return [(nm - 510) / (580 - 510), 1, 0];
  if (nm >= 580 && nm < 645) return [1, -(nm - 645) / (645 - 580), 0];
  return [1, 0, 0];
}

/** Brightness falloff toward the edges of the visible band; 0 outside it. */
export function spectralFactor(nm: number): number {
  if (nm >= 380 && nm < 420) return 0.3 + (0.7 * (nm - 380)) / (420 - 380);
  if (nm >= 420 && nm < 700) return 1;
  if (nm >= 700 && nm <= 750) return 0.3 + (0.7 * (750 - nm)) / (750 - 700);
  return 0;
}

// Ties go to the even neighbour: 76.5 -> 76, 127.5 -> 128
function roundHalfEven(v: number): number {
  const r = Math.round(v);
  return Math.abs(v % 1) === 0.5 && r % 2 !== 0 ? r - 1 : r;
}

/**
 * Approximate display color of a wavelength in nanometers. Defined on the
 * whole real line: anything outside [380, 750] (NaN included) is mid gray.
 */
export function wavelengthToRGB(nm: number): Rgb {
  if (!inSpectrum(nm)) {
    const v = roundHalfEven(255 * OUT_OF_SPECTRUM);
    return [v, v, v];
  }
  const [r, g, b] = bandColor(nm);
  const factor = spectralFactor(nm);
  return [
    roundHalfEven(255 * r * factor),
    roundHalfEven(255 * g * factor),
    roundHalfEven(255 * b * factor),
  ];
}

// Style strings are built once per color; the renderer asks for them every frame.
// Cleared when full, so arbitrary wavelengths can't grow it without bound.
export const STYLE_CACHE_LIMIT = 256;
const styleCache = new Map<string, string>();

export function styleCacheSize(): number {
  return styleCache.size;
}

/** CSS color for an RGB triple; `alpha` is 0-255 like the channels. */
export function cssColor(rgb: Rgb, alpha: number = 255): string {
  const key = `${rgb[0]},${rgb[1]},${rgb[2]},${alpha}`;
  let s = styleCache.get(key);
  if (s) return s;
  s = alpha >= 255
    ? `rgb(${rgb[0]},${rgb[1]},${rgb[2]})`
    : `rgba(${rgb[0]},${rgb[1]},${rgb[2]},${Number((alpha / 255).toFixed(3))})`;
  if (styleCache.size >= STYLE_CACHE_LIMIT) styleCache.clear();
  styleCache.set(key, s);
  return s;
}

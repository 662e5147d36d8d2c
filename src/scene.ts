// --- Scene Builder ---
// Turns a computed frame plus display state into everything a renderer draws.

import type { DisplayState, Frame, MediumSlot, Scene, SceneLabel, SceneRegion } from './types';
import { DOMAIN_MAX, MEDIUM_PRESETS, TITLE_SINGLE, TITLE_WHITE_LIGHT } from './constants';
import { effectiveBoundaries } from './WaveField';
import { wavelengthToRGB } from './ColorMapper';
import { formatMediumLabel } from './ParameterStore';

const SLOTS: readonly MediumSlot[] = [0, 1, 2];

export function buildScene(frame: Frame, display: Readonly<DisplayState>): Scene {
  const { params } = frame;
  const [b1, b2] = effectiveBoundaries(params);
  const spans: Array<[number, number]> = [[0, b1], [b1, b2], [b2, DOMAIN_MAX]];
  const indices = [params.n1, params.n2, params.n3];

  const regions: SceneRegion[] = SLOTS.map((slot) => {
    const medium = display.media[slot];
    const [start, end] = spans[slot];
    return { medium, start, end, fill: MEDIUM_PRESETS[medium].fill };
  });

  const labels: SceneLabel[] = SLOTS.map((slot) => {
    const [start, end] = spans[slot];
    return {
      text: formatMediumLabel(display.media[slot], slot, indices[slot]),
      x: start + (end - start) / 2,
    };
  });

  return {
    title: params.whiteLightEnabled ? TITLE_WHITE_LIGHT : TITLE_SINGLE,
    curves: frame.curves.map((curve) => ({ ...curve, color: wavelengthToRGB(curve.wavelength) })),
    regions,
    boundaries: [b1, b2],
    labels,
    yRange: (params.amplitude * params.visualizationScale * 1.5) / display.zoom,
  };
}

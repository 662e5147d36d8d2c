// ─── Light Refraction Constants ───
// Fixed domain, defaults, medium presets and scenario presets.

import type {
  DisplayState,
  MediumName,
  MediumPreset,
  MediumTriple,
  ScenarioName,
  SimulationParameters,
  ValueRange,
} from './types';

/** Right edge of the spatial domain; the left edge is 0. */
export const DOMAIN_MAX = 3000;
export const SAMPLE_COUNT = 3000;

export const VISUALIZATION_SCALE = 0.1;

/** Wavelengths drawn in white-light mode, nm. */
export const DISPERSION_WAVELENGTHS: readonly number[] = [400, 450, 500, 550, 600, 650, 700];

// Simplified Cauchy correction: n(λ) = n + C * (REFERENCE / λ)²
export const CAUCHY_REFERENCE_NM = 550;
export const CAUCHY_COEFFICIENT_N2 = 0.0006;
export const CAUCHY_COEFFICIENT_N3 = 0.0008;

export const VISIBLE_SPECTRUM: ValueRange = { min: 380, max: 750 };

export const TIME_STEP = 0.01;
export const TICK_INTERVAL_MS = 10;
export const RESUMED_TICK_INTERVAL_MS = 50;

export const TITLE_SINGLE = 'Light Wave Refraction Visualization';
export const TITLE_WHITE_LIGHT = 'White Light Dispersion (Prism Effect)';

export const DEFAULT_PARAMETERS: Readonly<SimulationParameters> = Object.freeze({
  wavelength: 550,
  amplitude: 5,
  speed: 2,
  visualizationScale: VISUALIZATION_SCALE,
  n1: 1.0003,
  n2: 1.33,
  n3: 1.52,
  boundary1: 1000,
  boundary2: 2000,
  dispersionEnabled: false,
  whiteLightEnabled: false,
  time: 0,
});

export const DEFAULT_DISPLAY: Readonly<DisplayState> = {
  media: ['Air', 'Water', 'Glass (Crown)'],
  zoom: 1,
};

// Slider bounds a host UI should offer
export const CONTROL_RANGES = {
  wavelength: { min: 380, max: 750 },
  amplitude: { min: 1, max: 10 },
  speed: { min: 1, max: 10 },
  refractiveIndex: { min: 1, max: 3 },
  zoom: { min: 0.1, max: 2 },
} satisfies Record<string, ValueRange>;

// Indices at ~550nm; fills are translucent region tints
export const MEDIUM_PRESETS: Record<MediumName, MediumPreset> = {
  'Air': { n: 1.0003, fill: [230, 230, 255, 50] },
  'Water': { n: 1.33, fill: [153, 204, 255, 80] },
  'Glass (Crown)': { n: 1.52, fill: [204, 230, 230, 100] },
  'Glass (Flint)': { n: 1.62, fill: [179, 204, 204, 100] },
  'Diamond': { n: 2.42, fill: [242, 242, 255, 130] },
  'Acrylic': { n: 1.49, fill: [230, 230, 179, 80] },
  'Glycerine': { n: 1.47, fill: [230, 204, 230, 80] },
  'Ethanol': { n: 1.36, fill: [204, 204, 230, 80] },
  'Quartz': { n: 1.54, fill: [255, 255, 230, 80] },
  'Sapphire': { n: 1.77, fill: [179, 179, 230, 100] },
};

/** Alphabetical, the order a medium picker lists them in. */
export const MEDIUM_NAMES: readonly MediumName[] = [
  'Acrylic',
  'Air',
  'Diamond',
  'Ethanol',
  'Glass (Crown)',
  'Glass (Flint)',
  'Glycerine',
  'Quartz',
  'Sapphire',
  'Water',
];

export const SCENARIOS: Record<ScenarioName, Readonly<MediumTriple>> = {
  'Air → Water → Glass': ['Air', 'Water', 'Glass (Crown)'],
  'Air → Glass → Water': ['Air', 'Glass (Crown)', 'Water'],
  'Water → Air → Glass': ['Water', 'Air', 'Glass (Crown)'],
  'Air → Diamond → Glass': ['Air', 'Diamond', 'Glass (Crown)'],
  'Glass → Air → Water': ['Glass (Crown)', 'Air', 'Water'],
};

export const SCENARIO_NAMES: readonly ScenarioName[] = [
  'Air → Water → Glass',
  'Air → Glass → Water',
  'Water → Air → Glass',
  'Air → Diamond → Glass',
  'Glass → Air → Water',
];

export function isMediumName(name: string): name is MediumName {
  return Object.prototype.hasOwnProperty.call(MEDIUM_PRESETS, name);
}

export function isScenarioName(name: string): name is ScenarioName {
  return Object.prototype.hasOwnProperty.call(SCENARIOS, name);
}

// ─── Light Refraction Types ───
// Shared shapes for the wave field, the parameter store and the render scene.

export type MediumName =
  | 'Acrylic'
  | 'Air'
  | 'Diamond'
  | 'Ethanol'
  | 'Glass (Crown)'
  | 'Glass (Flint)'
  | 'Glycerine'
  | 'Quartz'
  | 'Sapphire'
  | 'Water';

export type ScenarioName =
  | 'Air → Water → Glass'
  | 'Air → Glass → Water'
  | 'Water → Air → Glass'
  | 'Air → Diamond → Glass'
  | 'Glass → Air → Water';

/** Index of a medium along the x axis: 0 is leftmost. */
export type MediumSlot = 0 | 1 | 2;

export type Region = 1 | 2 | 3;

export type Rgb = [number, number, number];

/** Alpha is on the same 0-255 scale as the color channels. */
export type Rgba = [number, number, number, number];

export type MediumTriple = [MediumName, MediumName, MediumName];

export interface SimulationParameters {
  /** Nanometers. */
  wavelength: number;
  amplitude: number;
  /** Angular-frequency proxy shared by all three media. */
  speed: number;
  visualizationScale: number;
  n1: number;
  n2: number;
  n3: number;
  boundary1: number;
  boundary2: number;
  dispersionEnabled: boolean;
  whiteLightEnabled: boolean;
  time: number;
}

export interface DisplayState {
  media: MediumTriple;
  /** Vertical scale factor; 1 shows ±1.5× the rendered amplitude. */
  zoom: number;
}

export interface MediumPreset {
  n: number;
  fill: Rgba;
}

export interface WaveCurve {
  wavelength: number;
  samples: Float64Array;
}

export interface Frame {
  index: number;
  params: Readonly<SimulationParameters>;
  curves: WaveCurve[];
}

export interface SceneCurve extends WaveCurve {
  color: Rgb;
}

export interface SceneRegion {
  medium: MediumName;
  start: number;
  end: number;
  fill: Rgba;
}

export interface SceneLabel {
  text: string;
  x: number;
}

export interface Scene {
  title: string;
  curves: SceneCurve[];
  regions: SceneRegion[];
  boundaries: [number, number];
  labels: SceneLabel[];
  /** Half-height of the visible amplitude axis. */
  yRange: number;
}

export interface ValueRange {
  min: number;
  max: number;
}

import type {
  DisplayState,
  MediumName,
  MediumSlot,
  MediumTriple,
  ScenarioName,
  SimulationParameters,
} from './types';
import {
  DEFAULT_DISPLAY,
  DEFAULT_PARAMETERS,
  DOMAIN_MAX,
  MEDIUM_PRESETS,
  SCENARIOS,
  VISUALIZATION_SCALE,
  isMediumName,
  isScenarioName,
} from './constants';

export type ParameterErrorCode =
  | 'InvalidBoundaryOrder'
  | 'BoundaryOutOfDomain'
  | 'NonPositiveRefractiveIndex'
  | 'NonPositiveWavelength'
  | 'NonPositiveAmplitude'
  | 'NonPositiveSpeed'
  | 'InvalidZoom'
  | 'InvalidTime'
  | 'UnknownMedium'
  | 'UnknownScenario';

export class ParameterError extends Error {
  readonly code: ParameterErrorCode;
  readonly value: unknown;

  constructor(code: ParameterErrorCode, message: string, value: unknown) {
    super(message);
    this.name = 'ParameterError';
    this.code = code;
    this.value = value;
  }
}

const SUBSCRIPTS = ['₁', '₂', '₃'] as const;
const INDEX_KEYS = ['n1', 'n2', 'n3'] as const;

/** e.g. `Water (n₂ = 1.3300)` */
export function formatMediumLabel(name: MediumName, slot: MediumSlot, n: number): string {
  return `${name} (n${SUBSCRIPTS[slot]} = ${n.toFixed(4)})`;
}

function requirePositive(code: ParameterErrorCode, label: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ParameterError(code, `${label} must be a positive finite number, got ${value}`, value);
  }
}

function requireNonNegative(code: ParameterErrorCode, label: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ParameterError(code, `${label} must be a non-negative finite number, got ${value}`, value);
  }
}

function requireBoundaries(boundary1: number, boundary2: number): void {
  for (const b of [boundary1, boundary2]) {
    if (!Number.isFinite(b) || b < 0 || b > DOMAIN_MAX) {
      throw new ParameterError('BoundaryOutOfDomain', `boundary ${b} lies outside [0, ${DOMAIN_MAX}]`, b);
    }
  }
  if (boundary1 >= boundary2) {
    throw new ParameterError(
      'InvalidBoundaryOrder',
      `boundary1 (${boundary1}) must be less than boundary2 (${boundary2})`,
      [boundary1, boundary2],
    );
  }
}

function validate(p: SimulationParameters): void {
  requirePositive('NonPositiveWavelength', 'wavelength', p.wavelength);
  requirePositive('NonPositiveAmplitude', 'amplitude', p.amplitude);
  requirePositive('NonPositiveSpeed', 'speed', p.speed);
  for (const key of INDEX_KEYS) {
    requirePositive('NonPositiveRefractiveIndex', key, p[key]);
  }
  requireBoundaries(p.boundary1, p.boundary2);
  requireNonNegative('InvalidTime', 'time', p.time);
}

/**
 * The host's single mutable copy of the simulation parameters.
 *
 * Setters validate and assign; none of them recomputes anything. Invalid
 * values are rejected with a {@link ParameterError} and leave the store as
 * it was. Computation reads through {@link snapshot}, which returns a frozen
 * copy, so a frame never sees a half-applied update.
 */
export class ParameterStore {
  private params: SimulationParameters;
  private media: MediumTriple;
  private zoom: number;

  constructor(initial: Partial<SimulationParameters> = {}, display: Partial<DisplayState> = {}) {
    // The scale is fixed; an override is ignored
    const params = { ...DEFAULT_PARAMETERS, ...initial, visualizationScale: VISUALIZATION_SCALE };
    validate(params);
    const zoom = display.zoom ?? DEFAULT_DISPLAY.zoom;
    requirePositive('InvalidZoom', 'zoom', zoom);
    this.params = params;
    this.media = [...(display.media ?? DEFAULT_DISPLAY.media)];
    this.zoom = zoom;
  }

  snapshot(): Readonly<SimulationParameters> {
    return Object.freeze({ ...this.params });
  }

  displayState(): Readonly<DisplayState> {
    const state: DisplayState = { media: [...this.media], zoom: this.zoom };
    return Object.freeze(state);
  }

  get time(): number {
    return this.params.time;
  }

  setWavelength(nm: number): void {
    requirePositive('NonPositiveWavelength', 'wavelength', nm);
    this.params.wavelength = nm;
  }

  setAmplitude(amplitude: number): void {
    requirePositive('NonPositiveAmplitude', 'amplitude', amplitude);
    this.params.amplitude = amplitude;
  }

  setSpeed(speed: number): void {
    requirePositive('NonPositiveSpeed', 'speed', speed);
    this.params.speed = speed;
  }

  setRefractiveIndex(slot: MediumSlot, n: number): void {
    const key = INDEX_KEYS[slot];
    requirePositive('NonPositiveRefractiveIndex', key, n);
    this.params[key] = n;
  }

  setN1(n: number): void { this.setRefractiveIndex(0, n); }
  setN2(n: number): void { this.setRefractiveIndex(1, n); }
  setN3(n: number): void { this.setRefractiveIndex(2, n); }

  /** Moves both boundaries at once, for moves that would cross when applied one at a time. */
  setBoundaries(boundary1: number, boundary2: number): void {
    requireBoundaries(boundary1, boundary2);
    this.params.boundary1 = boundary1;
    this.params.boundary2 = boundary2;
  }

  setBoundary1(boundary1: number): void {
    this.setBoundaries(boundary1, this.params.boundary2);
  }

  setBoundary2(boundary2: number): void {
    this.setBoundaries(this.params.boundary1, boundary2);
  }

  setDispersionEnabled(enabled: boolean): void {
    this.params.dispersionEnabled = enabled;
  }

  setWhiteLightEnabled(enabled: boolean): void {
    this.params.whiteLightEnabled = enabled;
  }

  setZoom(zoom: number): void {
    requirePositive('InvalidZoom', 'zoom', zoom);
    this.zoom = zoom;
  }

  /** Selects a named medium for a slot and takes over its refractive index. */
  selectMedium(slot: MediumSlot, name: string): void {
    if (!isMediumName(name)) {
      throw new ParameterError('UnknownMedium', `unknown medium "${name}"`, name);
    }
    this.media[slot] = name;
    this.params[INDEX_KEYS[slot]] = MEDIUM_PRESETS[name].n;
  }

  applyScenario(name: string): ScenarioName {
    if (!isScenarioName(name)) {
      throw new ParameterError('UnknownScenario', `unknown scenario "${name}"`, name);
    }
    const [m1, m2, m3] = SCENARIOS[name];
    this.selectMedium(0, m1);
    this.selectMedium(1, m2);
    this.selectMedium(2, m3);
    return name;
  }

  mediumLabel(slot: MediumSlot): string {
    return formatMediumLabel(this.media[slot], slot, this.params[INDEX_KEYS[slot]]);
  }

  /** The clock only moves forward: `dt` must be finite and non-negative. */
  advanceTime(dt: number): void {
    requireNonNegative('InvalidTime', 'dt', dt);
    this.params.time += dt;
  }

  /** Back to the startup defaults, as on an application restart. */
  reset(): void {
    this.params = { ...DEFAULT_PARAMETERS };
    this.media = [...DEFAULT_DISPLAY.media];
    this.zoom = DEFAULT_DISPLAY.zoom;
  }
}

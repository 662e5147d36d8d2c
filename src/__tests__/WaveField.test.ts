import { describe, it, expect } from 'vitest';
import {
  POSITIONS,
  computeCurves,
  computeWave,
  effectiveBoundaries,
  effectiveIndices,
  regionAt,
  sampleAt,
  wavenumbers,
} from '../WaveField';
import { DEFAULT_PARAMETERS, DISPERSION_WAVELENGTHS, SAMPLE_COUNT } from '../constants';
import type { SimulationParameters } from '../types';

function params(overrides: Partial<SimulationParameters> = {}): Readonly<SimulationParameters> {
  return Object.freeze({ ...DEFAULT_PARAMETERS, ...overrides });
}

describe('WaveField', () => {
  // ── Position domain ──
  describe('POSITIONS', () => {
    it('holds 3000 evenly spaced points from 0 to 3000 inclusive', () => {
      expect(POSITIONS.length).toBe(3000);
      expect(POSITIONS[0]).toBe(0);
      expect(POSITIONS[2999]).toBe(3000);
      expect(POSITIONS[1] - POSITIONS[0]).toBeCloseTo(3000 / 2999, 12);
    });

    it('is strictly increasing', () => {
      for (let i = 1; i < POSITIONS.length; i++) {
        expect(POSITIONS[i]).toBeGreaterThan(POSITIONS[i - 1]);
      }
    });
  });

  // ── computeWave ──
  describe('computeWave', () => {
    it('returns one finite value per position', () => {
      const wave = computeWave(params(), 550);
      expect(wave.length).toBe(SAMPLE_COUNT);
      for (let i = 0; i < wave.length; i++) {
        expect(Number.isFinite(wave[i])).toBe(true);
      }
    });

    it('is zero at x=0 when time is zero', () => {
      expect(computeWave(params(), 550)[0]).toBe(0);
    });

    it('follows A*S*sin(k1*x - speed*t) in region 1', () => {
      const p = params({ time: 0.37 });
      const { k1 } = wavenumbers(p, 550);
      const wave = computeWave(p, 550);
      for (const i of [1, 250, 999]) {
        expect(wave[i]).toBeCloseTo(0.5 * Math.sin(k1 * POSITIONS[i] - 2 * 0.37), 12);
      }
    });

    it('restarts the phase at boundary1', () => {
      const p = params();
      const { k2 } = wavenumbers(p, 550);
      const wave = computeWave(p, 550);
      // index 1000 is the first sample past x=1000
      expect(POSITIONS[1000]).toBeGreaterThan(1000);
      expect(wave[1000]).toBeCloseTo(0.5 * Math.sin(k2 * (POSITIONS[1000] - 1000)), 12);
      expect(sampleAt(p, 550, 1000 + 1e-9)).toBeCloseTo(0, 9);
    });

    it('restarts the phase at boundary2 independently of region 2', () => {
      const p = params({ time: 1.5 });
      const { k3 } = wavenumbers(p, 550);
      expect(sampleAt(p, 550, 2000 + 1e-9)).toBeCloseTo(0.5 * Math.sin(-3), 9);
      const wave = computeWave(p, 550);
      expect(wave[2500]).toBeCloseTo(0.5 * Math.sin(k3 * (POSITIONS[2500] - 2000) - 3), 12);
    });

    it('scales with amplitude', () => {
      const p = params({ time: 0.2 });
      const base = computeWave(p, 550);
      const doubled = computeWave(params({ time: 0.2, amplitude: 10 }), 550);
      expect(doubled[777]).toBeCloseTo(2 * base[777], 12);
    });

    it('is idempotent for identical parameters', () => {
      const p = params({ time: 3.21, dispersionEnabled: true });
      expect(computeWave(p, 450)).toEqual(computeWave(p, 450));
    });

    it('does not modify its parameters', () => {
      const p = { ...DEFAULT_PARAMETERS, time: 0.5 };
      const before = { ...p };
      computeWave(p, 600);
      expect(p).toEqual(before);
    });

    it('changes smoothly between nearby times', () => {
      const delta = 1e-4;
      const a = computeWave(params({ time: 1 }), 550);
      const b = computeWave(params({ time: 1 + delta }), 550);
      // |d/dt| of A*S*sin(kx - speed*t) is at most A*S*speed = 1
      for (let i = 0; i < a.length; i++) {
        expect(Math.abs(a[i] - b[i])).toBeLessThanOrEqual(delta + 1e-12);
      }
    });
  });

  // ── Regions ──
  describe('regionAt', () => {
    it('puts boundaries in the region to their left', () => {
      const p = params();
      expect(regionAt(p, 0)).toBe(1);
      expect(regionAt(p, 1000)).toBe(1);
      expect(regionAt(p, 1000.5)).toBe(2);
      expect(regionAt(p, 2000)).toBe(2);
      expect(regionAt(p, 2000.1)).toBe(3);
      expect(regionAt(p, 3000)).toBe(3);
    });
  });

  // ── Dispersion ──
  describe('dispersion', () => {
    it('leaves indices untouched when disabled', () => {
      expect(effectiveIndices(params(), 400)).toEqual({ n1: 1.0003, n2: 1.33, n3: 1.52 });
    });

    it('applies the Cauchy correction to n2 and n3 only', () => {
      const p = params({ dispersionEnabled: true });
      const at400 = effectiveIndices(p, 400);
      expect(at400.n1).toBe(1.0003);
      expect(at400.n2).toBeCloseTo(1.33 + 0.0006 * (550 / 400) ** 2, 12);
      expect(at400.n2).toBeCloseTo(1.331134375, 12);
      expect(at400.n3).toBeCloseTo(1.5215125, 12);

      const at700 = effectiveIndices(p, 700);
      expect(at700.n2).toBeCloseTo(1.33 + 0.0006 * (550 / 700) ** 2, 12);
      expect(at400.n2).toBeGreaterThan(at700.n2);
      expect(at400.n3).toBeGreaterThan(at700.n3);
    });

    it('has no effect at the 550nm reference beyond the constant offset', () => {
      const at550 = effectiveIndices(params({ dispersionEnabled: true }), 550);
      expect(at550.n2).toBeCloseTo(1.3306, 12);
      expect(at550.n3).toBeCloseTo(1.5208, 12);
    });

    it('feeds the corrected index into k2', () => {
      const p = params({ dispersionEnabled: true });
      expect(wavenumbers(p, 400).k2).toBeCloseTo((2 * Math.PI * 1.331134375) / 400, 12);
    });

    it('changes regions 2 and 3 but not region 1', () => {
      const off = computeWave(params({ time: 0.4 }), 400);
      const on = computeWave(params({ time: 0.4, dispersionEnabled: true }), 400);
      expect(on[500]).toBe(off[500]);
      expect(on[1500]).not.toBe(off[1500]);
      expect(on[2500]).not.toBe(off[2500]);
    });
  });

  // ── Degraded boundaries ──
  describe('boundary order violation', () => {
    const swapped = params({ boundary1: 2000, boundary2: 1000, time: 0.25 });

    it('collapses region 2 onto boundary1', () => {
      expect(effectiveBoundaries(swapped)).toEqual([2000, 2000]);
      expect(regionAt(swapped, 1500)).toBe(1);
      expect(regionAt(swapped, 2000)).toBe(1);
      expect(regionAt(swapped, 2001)).toBe(3);
    });

    it('produces finite, deterministic output', () => {
      const a = computeWave(swapped, 550);
      const b = computeWave(swapped, 550);
      expect(a).toEqual(b);
      for (let i = 0; i < a.length; i++) {
        expect(Number.isFinite(a[i])).toBe(true);
      }
    });

    it('uses medium 1 up to boundary1 and medium 3 after it', () => {
      const { k1, k3 } = wavenumbers(swapped, 550);
      const wave = computeWave(swapped, 550);
      expect(wave[1500]).toBeCloseTo(0.5 * Math.sin(k1 * POSITIONS[1500] - 0.5), 12);
      expect(wave[2500]).toBeCloseTo(0.5 * Math.sin(k3 * (POSITIONS[2500] - 2000) - 0.5), 12);
    });

    it('clamps boundaries into the domain', () => {
      expect(effectiveBoundaries(params({ boundary1: -100, boundary2: 5000 }))).toEqual([0, 3000]);
    });
  });

  // ── Curves per tick ──
  describe('computeCurves', () => {
    it('computes the primary wavelength only in single-wave mode', () => {
      const curves = computeCurves(params({ wavelength: 610 }));
      expect(curves).toHaveLength(1);
      expect(curves[0].wavelength).toBe(610);
      expect(curves[0].samples).toEqual(computeWave(params({ wavelength: 610 }), 610));
    });

    it('computes the seven dispersion wavelengths in white-light mode', () => {
      const curves = computeCurves(params({ whiteLightEnabled: true, dispersionEnabled: true }));
      expect(curves.map((c) => c.wavelength)).toEqual([400, 450, 500, 550, 600, 650, 700]);
      expect(curves.map((c) => c.wavelength)).toEqual([...DISPERSION_WAVELENGTHS]);
    });

    it('gives distinct curves for 400nm and 700nm', () => {
      const [violet, , , , , , red] = computeCurves(params({ whiteLightEnabled: true, time: 0.1 }));
      expect(violet.samples[1200]).not.toBe(red.samples[1200]);
    });
  });
});

// --- Refraction Plot Renderer ---
// Draws a Scene onto a 2D canvas: medium tints, grid, dashed boundaries,
// the wave curves, then labels and title on top.
// PERF: curves are decimated to one vertex per pixel column (3000 samples
//       onto an ~800px canvas would otherwise emit 3000 lineTo calls per curve).

import type { Scene, SceneCurve } from './types';
import { DOMAIN_MAX } from './constants';
import { cssColor } from './ColorMapper';

export type PlotContext = Pick<
  CanvasRenderingContext2D,
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
  | 'font'
  | 'textAlign'
  | 'fillRect'
  | 'beginPath'
  | 'moveTo'
  | 'lineTo'
  | 'stroke'
  | 'fillText'
  | 'setLineDash'
>;

const BACKGROUND = '#000';
const FOREGROUND = '#fff';
const GRID_STYLE = 'rgba(255,255,255,0.5)';
const GRID_SPACING = 500;
const CURVE_WIDTH = 4;
const BOUNDARY_DASH = [8, 6];

/** Sample stride so that a curve emits at most one vertex per pixel column. */
export function decimationStride(sampleCount: number, width: number): number {
  const columns = Math.max(1, Math.floor(width));
  return Math.max(1, Math.floor(sampleCount / columns));
}

function drawCurve(ctx: PlotContext, curve: SceneCurve, toX: (x: number) => number, toY: (y: number) => number, stride: number): void {
  const samples = curve.samples;
  const last = samples.length - 1;
  if (last < 0) return;
  // Position i is i * DOMAIN_MAX / (n - 1); evaluated inline to keep the loop allocation-free
  const dx = last > 0 ? DOMAIN_MAX / last : 0;

  ctx.strokeStyle = cssColor(curve.color);
  ctx.lineWidth = CURVE_WIDTH;
  ctx.beginPath();
  ctx.moveTo(toX(0), toY(samples[0]));
  for (let i = stride; i < last; i += stride) {
    ctx.lineTo(toX(i * dx), toY(samples[i]));
  }
  if (last > 0) ctx.lineTo(toX(DOMAIN_MAX), toY(samples[last]));
  ctx.stroke();
}

export function renderScene(ctx: PlotContext, scene: Scene, w: number, h: number): void {
  const sx = w / DOMAIN_MAX;
  const halfH = h / 2;
  const sy = scene.yRange > 0 ? halfH / scene.yRange : 0;
  const toX = (x: number): number => x * sx;
  const toY = (y: number): number => halfH - y * sy;

  ctx.fillStyle = BACKGROUND;
  ctx.fillRect(0, 0, w, h);

  for (const region of scene.regions) {
    const [r, g, b, a] = region.fill;
    ctx.fillStyle = cssColor([r, g, b], a);
    ctx.fillRect(toX(region.start), 0, toX(region.end) - toX(region.start), h);
  }

  // Grid: verticals every GRID_SPACING units, plus the zero line
  ctx.strokeStyle = GRID_STYLE;
  ctx.lineWidth = 1;
  ctx.beginPath();
  for (let x = 0; x <= DOMAIN_MAX; x += GRID_SPACING) {
    ctx.moveTo(toX(x), 0);
    ctx.lineTo(toX(x), h);
  }
  ctx.moveTo(0, halfH);
  ctx.lineTo(w, halfH);
  ctx.stroke();

  ctx.strokeStyle = FOREGROUND;
  ctx.lineWidth = 2;
  ctx.setLineDash(BOUNDARY_DASH);
  ctx.beginPath();
  for (const boundary of scene.boundaries) {
    ctx.moveTo(toX(boundary), 0);
    ctx.lineTo(toX(boundary), h);
  }
  ctx.stroke();
  ctx.setLineDash([]);

  const stride = scene.curves.length > 0 ? decimationStride(scene.curves[0].samples.length, w) : 1;
  for (const curve of scene.curves) {
    drawCurve(ctx, curve, toX, toY, stride);
  }

  ctx.fillStyle = FOREGROUND;
  ctx.textAlign = 'center';
  ctx.font = 'bold 12px Arial';
  for (const label of scene.labels) {
    ctx.fillText(label.text, toX(label.x), 40);
  }
  ctx.font = '14px Arial';
  ctx.fillText(scene.title, w / 2, 18);
}

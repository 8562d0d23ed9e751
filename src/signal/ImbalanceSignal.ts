/**
 * Multi-level order-flow imbalance (MLOFI).
 *
 * For level n, with bid (b, r) and ask (a, q) price/qty at the current and
 * previous snapshot:
 *
 *   w = r        if b rose,  r - r'  if unchanged,  -r'  if fell
 *   v = -q'      if a rose,  q - q'  if unchanged,   q   if fell
 *   e_n = w - v
 *
 * Levels missing from a snapshot count as price 0 and qty 0.
 */

import type { LevelSnapshot, L2Level } from "../util/types";
import { ValidationError } from "../util/errors";

export type ImbalanceSample = {
  ts: number;
  revision: number;
  levels: number[]; // e_1..e_m
  value: number; // sum of levels
};

function checkDepth(m: number) {
  if (!Number.isInteger(m) || m < 1) throw new ValidationError(`Imbalance depth must be a positive integer, got ${m}`);
}

function at(side: L2Level[], n: number): L2Level {
  return side[n] ?? [0, 0];
}

function levelImbalance(prev: LevelSnapshot, curr: LevelSnapshot, n: number): number {
  const [b, r] = at(curr.bids, n);
  const [bPrev, rPrev] = at(prev.bids, n);
  const [a, q] = at(curr.asks, n);
  const [aPrev, qPrev] = at(prev.asks, n);

  const w = b > bPrev ? r : b === bPrev ? r - rPrev : -rPrev;
  const v = a > aPrev ? -qPrev : a === aPrev ? q - qPrev : q;
  return w - v;
}

/** per-level contributions e_1..e_m; all zero when there is no previous snapshot */
export function levelImbalances(prev: LevelSnapshot | null, curr: LevelSnapshot, m: number): number[] {
  checkDepth(m);
  const out: number[] = [];
  for (let n = 0; n < m; n++) out.push(prev ? levelImbalance(prev, curr, n) : 0);
  return out;
}

/** aggregate MLOFI between two consecutive snapshots, pure */
export function imbalanceAlter(prev: LevelSnapshot | null, curr: LevelSnapshot, m: number): number {
  return levelImbalances(prev, curr, m).reduce((s, e) => s + e, 0);
}

export function isImbalanceSignificant(value: number, threshold: number): boolean {
  return Math.abs(value) > threshold;
}

/**
 * Weighted bid/ask volume ratio in [-1, 1] over the window averages.
 * Level i is weighted by exp(-0.5 i); both averages carry +1 so an empty book gives 0.
 */
export function depthRatio(bidVolumes: readonly number[][], askVolumes: readonly number[][], m: number): number {
  checkDepth(m);
  let vBid = 0;
  let vAsk = 0;
  for (let i = 0; i < m; i++) {
    const w = Math.exp(-0.5 * i);
    vBid += w * (mean(bidVolumes.map((row) => row[i] ?? 0)) + 1);
    vAsk += w * (mean(askVolumes.map((row) => row[i] ?? 0)) + 1);
  }
  return (vBid - vAsk) / (vBid + vAsk);
}

function mean(xs: number[]): number {
  return xs.length ? xs.reduce((s, x) => s + x, 0) / xs.length : 0;
}

function qtys(side: L2Level[], m: number): number[] {
  const out: number[] = [];
  for (let n = 0; n < m; n++) out.push(at(side, n)[1]);
  return out;
}

/**
 * Rolling MLOFI state fed by consecutive snapshots of one book.
 * Nothing is recorded until two snapshots have been observed.
 */
export class ImbalanceTracker {
  readonly depth: number;
  readonly window: number;

  private prev: LevelSnapshot | null = null;
  private samples: ImbalanceSample[] = [];
  private depths: number[][] = []; // (r_n + q_n) / 2 per level
  private bidVols: number[][] = [];
  private askVols: number[][] = [];

  constructor(depth: number, window = 10) {
    checkDepth(depth);
    if (!Number.isInteger(window) || window < 1) throw new ValidationError(`Imbalance window must be a positive integer, got ${window}`);
    this.depth = depth;
    this.window = window;
  }

  observe(snap: LevelSnapshot, ts: number): ImbalanceSample | null {
    const prev = this.prev;
    this.prev = snap;
    if (!prev) return null;

    const levels = levelImbalances(prev, snap, this.depth);
    const sample = { ts, revision: snap.revision, levels, value: levels.reduce((s, e) => s + e, 0) };

    const bids = qtys(snap.bids, this.depth);
    const asks = qtys(snap.asks, this.depth);
    this.push(this.samples, sample);
    this.push(this.bidVols, bids);
    this.push(this.askVols, asks);
    this.push(
      this.depths,
      bids.map((r, i) => (r + (asks[i] ?? 0)) / 2)
    );
    return sample;
  }

  private push<T>(arr: T[], x: T) {
    arr.push(x);
    if (arr.length > this.window) arr.shift();
  }

  latest(): ImbalanceSample | null {
    return this.samples[this.samples.length - 1] ?? null;
  }

  history(): readonly ImbalanceSample[] {
    return this.samples;
  }

  /**
   * Depth-normalised MLOFI over the window:
   *   sum_i decay^i * (sum of e_i over window) / (mean depth_i + 1)
   * Zero until two snapshots exist.
   */
  signal(decay = 0.8): number {
    let out = 0;
    for (let i = 0; i < this.depth; i++) {
      const cum = this.samples.reduce((s, x) => s + (x.levels[i] ?? 0), 0);
      const avgDepth = mean(this.depths.map((row) => row[i] ?? 0)) + 1;
      out += (Math.pow(decay, i) * cum) / avgDepth;
    }
    return out;
  }

  ratio(): number {
    return depthRatio(this.bidVols, this.askVols, this.depth);
  }

  reset() {
    this.prev = null;
    this.samples = [];
    this.depths = [];
    this.bidVols = [];
    this.askVols = [];
  }
}

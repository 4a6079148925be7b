import anglePool from './data/angles.json';

export type Angle = {
  angle: string;
  topic: string;
  visualHint: string;
};

export const ANGLES: readonly Angle[] = anglePool;

export type PickAngleOptions = {
  /** Angles used by recent runs */
  recent?: readonly string[];
  /** Angles already tried in this run */
  tried?: readonly string[];
  pool?: readonly Angle[];
  random?: () => number;
};

/**
 * Pick an angle that is neither recent nor already tried. When that leaves
 * nothing, recent ones become eligible again; when even that is empty, the whole pool.
 */
export function pickAngle(opts: PickAngleOptions = {}): Angle {
  const pool = opts.pool ?? ANGLES;
  if (pool.length === 0) throw new Error('Angle pool is empty');
  const tried = new Set(opts.tried ?? []);
  const recent = new Set(opts.recent ?? []);
  const random = opts.random ?? Math.random;

  let available = pool.filter((a) => !tried.has(a.angle) && !recent.has(a.angle));
  if (available.length === 0) available = pool.filter((a) => !tried.has(a.angle));
  if (available.length === 0) available = [...pool];
  return available[Math.floor(random() * available.length) % available.length];
}

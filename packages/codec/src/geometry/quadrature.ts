/**
 * Composite 5-point Gauss–Legendre quadrature.
 *
 * Exact for polynomials up to degree 9 on each sub-interval, which keeps
 * the Fresnel-type integrals of the spiral and the arc-length integral of
 * poly3 accurate to well below 1e-9 m for road-scale segments.
 */

/** [node, weight] pairs on [-1, 1] */
const RULE = [
  [0, 0.5688888888888889],
  [-0.5384693101056831, 0.47862867049936647],
  [0.5384693101056831, 0.47862867049936647],
  [-0.906179845938664, 0.23692688505618908],
  [0.906179845938664, 0.23692688505618908],
] as const;

/** Integrate `fn` over [a, b] split into `segments` equal sub-intervals */
export function integrate(fn: (t: number) => number, a: number, b: number, segments: number): number {
  const n = Math.max(1, Math.ceil(segments));
  const step = (b - a) / n;
  const half = step / 2;
  let sum = 0;
  for (let i = 0; i < n; i++) {
    const mid = a + (i + 0.5) * step;
    for (const [node, weight] of RULE) {
      sum += weight * fn(mid + half * node);
    }
  }
  return sum * half;
}

/**
 * Integrate the unit direction vector (cos θ(t), sin θ(t)) over [a, b].
 * Both components share one set of θ evaluations.
 */
export function integrateDirection(
  theta: (t: number) => number,
  a: number,
  b: number,
  segments: number,
): { dx: number; dy: number } {
  const n = Math.max(1, Math.ceil(segments));
  const step = (b - a) / n;
  const half = step / 2;
  let dx = 0;
  let dy = 0;
  for (let i = 0; i < n; i++) {
    const mid = a + (i + 0.5) * step;
    for (const [node, weight] of RULE) {
      const angle = theta(mid + half * node);
      dx += weight * Math.cos(angle);
      dy += weight * Math.sin(angle);
    }
  }
  return { dx: dx * half, dy: dy * half };
}

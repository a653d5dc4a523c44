const EPSILON = 1e-30;
const MAX_ITERATIONS = 250;

const LANCZOS = [
  0.99999999999980993,
  676.5203681218851,
  -1259.1392167224028,
  771.32342877765313,
  -176.61502916214059,
  12.507343278686905,
  -0.13857109526572012,
  9.9843695780195716e-6,
  1.5056327351493116e-7
] as const;

/** Student's t cumulative distribution; `df` may be fractional. */
export function studentTCdf(t: number, df: number): number {
  if (!Number.isFinite(t)) {
    return t > 0 ? 1 : 0;
  }
  const x = df / (df + t * t);
  const tail = 0.5 * regularizedIncompleteBeta(x, df / 2, 0.5);
  return t >= 0 ? 1 - tail : tail;
}

/** P(|T| >= |t|). */
export function studentTTwoTailed(t: number, df: number): number {
  return Math.min(1, 2 * studentTCdf(-Math.abs(t), df));
}

export function studentTQuantile(p: number, df: number): number {
  let lo = -50;
  let hi = 50;
  for (let i = 0; i < 120; i++) {
    const mid = (lo + hi) / 2;
    if (studentTCdf(mid, df) < p) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return (lo + hi) / 2;
}

export function regularizedIncompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  if (x > (a + 1) / (a + b + 2)) {
    return 1 - regularizedIncompleteBeta(1 - x, b, a);
  }

  const lnBeta = lnGamma(a) + lnGamma(b) - lnGamma(a + b);
  const front = Math.exp(a * Math.log(x) + b * Math.log(1 - x) - lnBeta) / a;
  return front * betaContinuedFraction(x, a, b);
}

// Modified Lentz evaluation of the incomplete beta continued fraction.
function betaContinuedFraction(x: number, a: number, b: number): number {
  let c = 1;
  let d = clampAwayFromZero(1 - ((a + b) * x) / (a + 1));
  d = 1 / d;
  let f = d;

  for (let m = 1; m <= MAX_ITERATIONS; m++) {
    const even = (m * (b - m) * x) / ((a + 2 * m - 1) * (a + 2 * m));
    d = 1 / clampAwayFromZero(1 + even * d);
    c = clampAwayFromZero(1 + even / c);
    f *= c * d;

    const odd = (-(a + m) * (a + b + m) * x) / ((a + 2 * m) * (a + 2 * m + 1));
    d = 1 / clampAwayFromZero(1 + odd * d);
    c = clampAwayFromZero(1 + odd / c);

    const delta = c * d;
    f *= delta;
    if (Math.abs(delta - 1) < 1e-11) {
      break;
    }
  }

  return f;
}

function clampAwayFromZero(value: number): number {
  return Math.abs(value) < EPSILON ? EPSILON : value;
}

export function lnGamma(z: number): number {
  if (z < 0.5) {
    return Math.log(Math.PI / Math.sin(Math.PI * z)) - lnGamma(1 - z);
  }

  const shifted = z - 1;
  let sum: number = LANCZOS[0];
  for (let i = 1; i < LANCZOS.length; i++) {
    sum += (LANCZOS[i] ?? 0) / (shifted + i);
  }
  const t = shifted + LANCZOS.length - 1.5;
  return 0.5 * Math.log(2 * Math.PI) + (shifted + 0.5) * Math.log(t) - t + Math.log(sum);
}

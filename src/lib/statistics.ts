import { RatioUndefinedError } from './errors';

/** z-score for a two-sided 95% confidence interval. */
export const Z_95 = 1.96;

export interface ProportionEstimate {
  count: number;
  base: number;
  /** Observed proportion count / base, 0 when the base is empty. */
  p: number;
  /** Half-width of the normal-approximation (Wald) interval around p. */
  moe: number;
}

export interface RatioEstimate {
  ratio: number;
  moe: number;
}

export function estimateProportion(count: number, base: number, z: number = Z_95): ProportionEstimate {
  if (base <= 0) {
    return { count, base, p: 0, moe: 0 };
  }

  const p = count / base;
  return {
    count,
    base,
    p,
    moe: z * Math.sqrt((p * (1 - p)) / base),
  };
}

// (moe / p)^2, or 0 when the side carries no uncertainty
function relativeErrorSquared(estimate: Pick<ProportionEstimate, 'p' | 'moe'>): number {
  return estimate.p > 0 && estimate.moe > 0 ? (estimate.moe / estimate.p) ** 2 : 0;
}

/**
 * Ratio of two independent proportions, with relative errors added in quadrature.
 * Throws RatioUndefinedError when the denominator proportion is zero.
 */
export function estimateRatio(
  numerator: Pick<ProportionEstimate, 'p' | 'moe'>,
  denominator: Pick<ProportionEstimate, 'p' | 'moe'>
): RatioEstimate {
  if (denominator.p === 0) {
    throw new RatioUndefinedError(numerator.p);
  }

  const ratio = numerator.p / denominator.p;
  const relErrSq = relativeErrorSquared(numerator) + relativeErrorSquared(denominator);

  return {
    ratio,
    moe: ratio !== 0 && relErrSq > 0 ? Math.abs(ratio) * Math.sqrt(relErrSq) : 0,
  };
}

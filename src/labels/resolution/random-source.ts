export const RANDOM_SOURCE = 'RANDOM_SOURCE';

export interface RandomSource {
  /** Integer in `[0, bound)`. */
  nextInt(bound: number): number;
}

export class MathRandomSource implements RandomSource {
  nextInt(bound: number): number {
    return Math.floor(Math.random() * bound);
  }
}

/**
 * Reproducible source (mulberry32), selected with `LABEL_RANDOM_SEED` so
 * alternative picks can be replayed.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  nextInt(bound: number): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const unit = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return Math.floor(unit * bound);
  }
}

export function createRandomSource(seed: string | undefined): RandomSource {
  if (seed === undefined || seed === '') return new MathRandomSource();
  const parsed = parseInt(seed, 10);
  return Number.isNaN(parsed)
    ? new MathRandomSource()
    : new SeededRandomSource(parsed);
}

// consensus/semantic-bft/core/random/seeded-random.ts
// Reproducible random streams; every node and domain owns its own

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Derive a 32-bit seed from a parent seed and a label (FNV-1a)
 */
export function deriveSeed(seed: number, label: string): number {
  let hash = FNV_OFFSET;
  const input = `${seed >>> 0}:${label}`;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export class SeededRandom {
  private state: number;

  constructor(private readonly seed: number) {
    this.state = seed >>> 0;
  }

  public getSeed(): number {
    return this.seed;
  }

  /**
   * Next value in [0, 1) (mulberry32)
   */
  public next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  }

  public uniform(min: number, max: number): number {
    if (min >= max) return min;
    return min + this.next() * (max - min);
  }

  /**
   * Integer in [min, max]
   */
  public nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  public nextBoolean(probability: number = 0.5): boolean {
    return this.next() < probability;
  }

  /**
   * Normal draw via Box-Muller
   */
  public gaussian(mean: number = 0, std: number = 1): number {
    let u = 0;
    let v = 0;
    while (u === 0) u = this.next();
    while (v === 0) v = this.next();
    return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
  }

  /**
   * Fisher-Yates shuffle into a new array
   */
  public shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      const tmp = result[i];
      result[i] = result[j];
      result[j] = tmp;
    }
    return result;
  }

  public fork(label: string): SeededRandom {
    return new SeededRandom(deriveSeed(this.seed, label));
  }
}

// consensus/semantic-bft/core/concept/concept-codec.ts
// Concept vector generation, adversarial corruption and content digests

import * as crypto from 'crypto';
import { ConceptVector, NodeId } from '../types';
import { SeededRandom } from '../random/seeded-random';
import { InvalidDimensionError } from '../errors';

export const DIGEST_LENGTH = 16;

export interface CorruptionProfile {
  extremeValueProbability: number;
}

export class ConceptCodec {
  constructor(
    public readonly dimension: number,
    private readonly precision: number = 6
  ) {}

  /**
   * Draw a fresh vector of independent standard-normal components
   */
  public generate(rng: SeededRandom, nodeId: NodeId, timestamp: number, domain?: string): ConceptVector {
    const values: number[] = [];
    for (let i = 0; i < this.dimension; i++) {
      values.push(rng.gaussian());
    }
    return { values, timestamp, nodeId, domain, isCorrupted: false };
  }

  /**
   * Return a corrupted copy: every component scaled by 1 + U(-0.5, 0.5),
   * and sometimes one component replaced by an extreme value.
   * Must be applied before the digest is computed.
   */
  public injectMalformed(vector: ConceptVector, rng: SeededRandom, profile: CorruptionProfile): ConceptVector {
    const values = vector.values.map(value => value * (1 + rng.uniform(-0.5, 0.5)));

    if (rng.nextBoolean(profile.extremeValueProbability)) {
      const index = rng.nextInt(0, values.length - 1);
      values[index] = rng.uniform(-10, 10);
    }

    return { ...vector, values, isCorrupted: true };
  }

  /**
   * Deterministic fingerprint of the vector contents at fixed precision
   */
  public digest(values: readonly number[]): string {
    this.assertDimension(values);
    const canonical = values.map(value => value.toFixed(this.precision)).join(';');
    return crypto.createHash('sha256').update(canonical).digest('hex').slice(0, DIGEST_LENGTH);
  }

  public assertDimension(values: readonly number[]): void {
    if (values.length !== this.dimension) {
      throw new InvalidDimensionError(this.dimension, values.length);
    }
  }
}

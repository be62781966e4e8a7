// consensus/semantic-bft/domains/sae-model.ts
// Linear semantic auto-encoder used to translate concepts between domains

import { SeededRandom } from '../core/random/seeded-random';
import { ConfigurationError } from '../core/errors';
import { multiply } from '../core/concept/vector-math';

export type Matrix = readonly (readonly number[])[];

export class SaeModel {
  public readonly latentDimension: number;

  /**
   * @param encoder latent × dimension
   * @param decoder dimension × latent
   */
  constructor(
    public readonly dimension: number,
    private readonly encoder: Matrix,
    private readonly decoder: Matrix
  ) {
    this.latentDimension = encoder.length;
    SaeModel.assertShape('encoder', encoder, this.latentDimension, dimension);
    SaeModel.assertShape('decoder', decoder, dimension, this.latentDimension);
  }

  /**
   * Model with gaussian(0, scale) weights drawn from `rng`
   */
  public static random(rng: SeededRandom, dimension: number, latentDimension: number, scale: number): SaeModel {
    const draw = (rows: number, cols: number): number[][] =>
      Array.from({ length: rows }, () => Array.from({ length: cols }, () => rng.gaussian(0, scale)));
    return new SaeModel(dimension, draw(latentDimension, dimension), draw(dimension, latentDimension));
  }

  public encode(values: readonly number[]): number[] {
    if (values.length !== this.dimension) {
      throw new ConfigurationError(
        `Encoder expects ${this.dimension} components, got ${values.length}`
      );
    }
    return multiply(this.encoder, values);
  }

  public decode(latent: readonly number[]): number[] {
    if (latent.length !== this.latentDimension) {
      throw new ConfigurationError(
        `Decoder expects ${this.latentDimension} latent components, got ${latent.length}`
      );
    }
    return multiply(this.decoder, latent);
  }

  private static assertShape(name: string, matrix: Matrix, rows: number, cols: number): void {
    if (rows === 0 || matrix.length !== rows || matrix.some(row => row.length !== cols)) {
      const actualCols = matrix.length > 0 ? matrix[0].length : 0;
      throw new ConfigurationError(
        `SAE ${name} must be ${rows}x${cols}, got ${matrix.length}x${actualCols}`,
        [`${name}: expected ${rows}x${cols}`]
      );
    }
  }
}

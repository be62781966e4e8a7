// consensus/semantic-bft/core/validation/semantic-verifier.ts
// Semantic integrity checks run independently by every receiving node

import { Transaction, RejectionReason, VerificationVerdict } from '../types';
import { ConceptCodec } from '../concept/concept-codec';
import { cosineSimilarity, populationVariance } from '../concept/vector-math';
import { VerifierConfig } from '../config/config-manager';

export interface IntegrityRule {
  reason: RejectionReason;
  description: string;
  violates: (transaction: Transaction) => boolean;
}

export class SemanticVerifier {
  private rules: IntegrityRule[] = [];
  private readonly referenceVector: readonly number[];

  constructor(
    private readonly codec: ConceptCodec,
    private readonly config: VerifierConfig
  ) {
    this.referenceVector = new Array<number>(codec.dimension).fill(config.referenceValue);
    this.registerRules();
  }

  /**
   * Decide whether a transaction's concept vector is well-formed.
   * Rules run in registration order and stop at the first violation.
   */
  public verify(transaction: Transaction): VerificationVerdict {
    const groundTruthClean = !transaction.conceptVector.isCorrupted;

    if (!this.config.enabled) {
      return { accepted: true, countsAsValid: groundTruthClean };
    }

    for (const rule of this.rules) {
      if (rule.violates(transaction)) {
        return {
          accepted: false,
          reason: rule.reason,
          // Ground truth is only consulted here, after the decision
          falsePositive: rule.reason === 'low-similarity' && groundTruthClean
        };
      }
    }

    return { accepted: true, countsAsValid: groundTruthClean };
  }

  public similarityToReference(values: readonly number[]): number {
    return cosineSimilarity(values, this.referenceVector);
  }

  public getRules(): readonly IntegrityRule[] {
    return this.rules;
  }

  private registerRules(): void {
    this.rules.push({
      reason: 'digest-mismatch',
      description: 'Recomputed digest differs from the one carried by the transaction',
      violates: transaction =>
        this.codec.digest(transaction.conceptVector.values) !== transaction.semanticDigest
    });

    this.rules.push({
      reason: 'high-variance',
      description: 'Component variance above the ceiling',
      violates: transaction =>
        populationVariance(transaction.conceptVector.values) > this.config.varianceCeiling
    });

    this.rules.push({
      reason: 'extreme-value',
      description: 'A component magnitude above the extreme-value ceiling',
      violates: transaction =>
        transaction.conceptVector.values.some(value => Math.abs(value) > this.config.extremeValueCeiling)
    });

    this.rules.push({
      reason: 'low-similarity',
      description: 'Top-k concept present and cosine similarity to the reference below threshold',
      violates: transaction => {
        const values = transaction.conceptVector.values;
        if (!values.some(value => Math.abs(value) > this.config.topKThreshold)) {
          return false;
        }
        return this.similarityToReference(values) < this.config.similarityThreshold;
      }
    });
  }
}

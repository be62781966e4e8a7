import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { ConceptCodec } from '../core/concept/concept-codec';
import { SemanticVerifier } from '../core/validation/semantic-verifier';
import { VerifierConfig } from '../core/config/config-manager';
import { makeTransaction, testConfig } from './helpers';

describe('SemanticVerifier', () => {
  const codec = new ConceptCodec(10);
  const defaults: VerifierConfig = testConfig().verifier;
  const verifier = new SemanticVerifier(codec, defaults);

  // Mean 0.12, population variance 0.3576, cosine to the reference ≈ 0.197
  const mixed = [1, -1, 0.5, 0.2, -0.3, 0.1, 0, 0.4, -0.6, 0.9];

  test('accepts every small, low-variance vector', () => {
    fc.assert(fc.property(
      fc.array(fc.double({ min: -0.8, max: 0.8, noNaN: true }), { minLength: 10, maxLength: 10 }),
      values => {
        const verdict = verifier.verify(makeTransaction(codec, values));
        expect(verdict).toEqual({ accepted: true, countsAsValid: true });
      }
    ));
  });

  test('similarity equal to the threshold passes and anything below fails', () => {
    const similarity = verifier.similarityToReference(mixed);
    const transaction = makeTransaction(codec, mixed);

    const atThreshold = new SemanticVerifier(codec, { ...defaults, similarityThreshold: similarity });
    expect(atThreshold.verify(transaction)).toEqual({ accepted: true, countsAsValid: true });

    const aboveSimilarity = new SemanticVerifier(codec, { ...defaults, similarityThreshold: similarity + 1e-9 });
    expect(aboveSimilarity.verify(transaction)).toEqual({
      accepted: false,
      reason: 'low-similarity',
      falsePositive: true
    });
  });

  test('low-similarity rejection of a corrupted vector is not a false positive', () => {
    const strict = new SemanticVerifier(codec, { ...defaults, similarityThreshold: 0.9 });
    const verdict = strict.verify(makeTransaction(codec, mixed, { corrupted: true }));
    expect(verdict).toEqual({ accepted: false, reason: 'low-similarity', falsePositive: false });
  });

  test('digest mismatch is checked before anything else', () => {
    const extreme = [9, 0, 0, 0, 0, 0, 0, 0, 0, 0];
    const verdict = verifier.verify(makeTransaction(codec, extreme, { digest: '0000000000000000' }));
    expect(verdict).toEqual({ accepted: false, reason: 'digest-mismatch', falsePositive: false });
  });

  test('variance is checked before extreme values', () => {
    // variance 8.1 - 0.81 = 7.29
    const verdict = verifier.verify(makeTransaction(codec, [9, 0, 0, 0, 0, 0, 0, 0, 0, 0]));
    expect(verdict).toEqual({ accepted: false, reason: 'high-variance', falsePositive: false });
  });

  test('flags an extreme component in an otherwise flat vector', () => {
    const flat = new Array<number>(10).fill(5.5);
    const verdict = verifier.verify(makeTransaction(codec, flat));
    expect(verdict).toEqual({ accepted: false, reason: 'extreme-value', falsePositive: false });
  });

  test('skips the similarity check when no component clears the top-k threshold', () => {
    const opposite = new Array<number>(10).fill(-0.5);
    expect(verifier.similarityToReference(opposite)).toBeCloseTo(-1, 12);
    expect(verifier.verify(makeTransaction(codec, opposite))).toEqual({ accepted: true, countsAsValid: true });
  });

  test('a disabled verifier accepts everything but still counts only clean vectors as valid', () => {
    const disabled = new SemanticVerifier(codec, { ...defaults, enabled: false });
    const tampered = makeTransaction(codec, [9, 0, 0, 0, 0, 0, 0, 0, 0, 0], { corrupted: true, digest: 'ffffffffffffffff' });
    expect(disabled.verify(tampered)).toEqual({ accepted: true, countsAsValid: false });
  });

  test('registers its rules in evaluation order', () => {
    expect(verifier.getRules().map(rule => rule.reason)).toEqual([
      'digest-mismatch',
      'high-variance',
      'extreme-value',
      'low-similarity'
    ]);
  });
});

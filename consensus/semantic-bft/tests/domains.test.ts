import { describe, test, expect } from '@jest/globals';
import { SaeModel } from '../domains/sae-model';
import { Domain, IntraDomainResult } from '../domains/domain';
import { CrossDomainCoordinator } from '../domains/cross-domain-coordinator';
import { SeededRandom } from '../core/random/seeded-random';
import { ConfigurationError } from '../core/errors';
import { ConceptVector, DOMAIN_TYPES } from '../core/types';
import { CALM_VALUES, silentLogger, testConfig } from './helpers';

const config = testConfig({ network: { hopLatency: { base: 0, jitter: 0 } } });

function buildDomains(seed: number): Domain[] {
  const root = new SeededRandom(seed);
  return DOMAIN_TYPES.map(type => new Domain({ name: type, type, config, rng: root.fork(type), logger: silentLogger() }));
}

function coordinatorFor(domains: Domain[], enableSync: boolean): CrossDomainCoordinator {
  return new CrossDomainCoordinator({
    domains,
    config: config.domains,
    rng: new SeededRandom(77),
    logger: silentLogger(),
    enableSync
  });
}

function vectorOf(values: readonly number[]): ConceptVector {
  return { values, timestamp: 0, nodeId: 'vehicle-0', isCorrupted: false };
}

function recordConsensus(domains: Domain[]): IntraDomainResult[] {
  const results: IntraDomainResult[] = [];
  domains.forEach(domain => domain.on('consensus:completed', (result: IntraDomainResult) => results.push(result)));
  return results;
}

// 4 RSUs + edge server, 3 phases, 2048-byte messages
const INTRA_BYTES_PER_CONSENSUS = 5 * 3 * 2048;
// 8 latent values of 8 bytes
const BYTES_PER_SYNC = 64;

describe('SaeModel', () => {
  test('encodes to the latent size and decodes back to the concept size', () => {
    const model = SaeModel.random(new SeededRandom(1), 10, 8, 0.1);
    const latent = model.encode(CALM_VALUES);
    expect(latent).toHaveLength(8);
    expect(model.decode(latent)).toHaveLength(10);
  });

  test('applies its matrices as given', () => {
    const model = new SaeModel(2, [[1, 0], [0, 2], [1, 1]], [[1, 0, 0], [0, 1, 0]]);
    expect(model.latentDimension).toBe(3);
    expect(model.encode([3, 4])).toEqual([3, 8, 7]);
    expect(model.decode([3, 8, 7])).toEqual([3, 8]);
  });

  test('rejects mismatched shapes as configuration errors', () => {
    expect(() => new SaeModel(2, [[1, 0, 0]], [[1], [1]])).toThrow(ConfigurationError);
    expect(() => new SaeModel(2, [[1, 0]], [[1]])).toThrow('SAE decoder must be 2x1, got 1x1');
    expect(() => new SaeModel(2, [], [])).toThrow('SAE encoder must be 0x2, got 0x0');
    const model = new SaeModel(2, [[1, 0]], [[1], [1]]);
    expect(() => model.encode([1, 2, 3])).toThrow('Encoder expects 2 components, got 3');
    expect(() => model.decode([1, 2])).toThrow('Decoder expects 1 latent components, got 2');
  });
});

describe('Domain', () => {
  test('finalizes a well-formed proposal through its validators', async () => {
    const [urban] = buildDomains(5);
    const result = await urban.runIntraDomainConsensus(vectorOf(CALM_VALUES), 0);

    expect(result.finalized).toBe(true);
    expect(result.consensusTime).toBeGreaterThanOrEqual(0.5);
    expect(result.consensusTime).toBeLessThanOrEqual(1.0);
    expect(urban.getBandwidth()).toEqual({ intra: INTRA_BYTES_PER_CONSENSUS, inter: 0 });
    expect(urban.getValidators().map(node => node.id)).toEqual(['urban-rsu-0', 'urban-rsu-1', 'urban-rsu-2', 'urban-rsu-3']);
    expect(urban.getProposer().id).toBe('urban-edge');
    expect(urban.getValidators().every(node => node.isFinalized(result.transactionId))).toBe(true);
  });

  test('a proposal the validators refuse does not finalize but still costs bandwidth', async () => {
    const [, interurban] = buildDomains(5);
    const result = await interurban.runIntraDomainConsensus(vectorOf(new Array<number>(10).fill(6)), 0);

    expect(result.finalized).toBe(false);
    expect(result.consensusTime).toBeGreaterThanOrEqual(1.0);
    expect(result.consensusTime).toBeLessThanOrEqual(1.5);
    expect(interurban.getBandwidth().intra).toBe(INTRA_BYTES_PER_CONSENSUS);
    expect(interurban.getFinalizedCount()).toBe(0);
    expect(interurban.getConsensusRounds()).toBe(1);
  });
});

describe('CrossDomainCoordinator', () => {
  test('without synchronization CDFT is the sum of the intra-domain consensus times', async () => {
    const domains = buildDomains(8);
    const coordinator = coordinatorFor(domains, false);
    const results = recordConsensus(domains);

    const processed = await coordinator.processTransaction(domains[0], vectorOf(CALM_VALUES), true, 0);

    expect(results).toHaveLength(3);
    const sum = results.reduce((total, result) => total + result.consensusTime, 0);
    expect(processed.finalized).toBe(true);
    expect(processed.syncTime).toBe(0);
    expect(processed.finalityTime).toBeCloseTo(sum, 12);
    expect(coordinator.getSamples('urban')).toEqual([processed.finalityTime]);
    expect(coordinator.getAttemptSamples('urban')).toEqual([processed.finalityTime]);
    expect(coordinator.getInteroperabilityOverhead()).toBe(0);
    expect(domains.map(domain => domain.getBandwidth().inter)).toEqual([0, 0, 0]);
  });

  test('with synchronization the sync delays and bytes are added', async () => {
    const domains = buildDomains(8);
    const coordinator = coordinatorFor(domains, true);
    const results = recordConsensus(domains);

    const processed = await coordinator.processTransaction(domains[0], vectorOf(CALM_VALUES), true, 0);
    const consensusSum = results.reduce((total, result) => total + result.consensusTime, 0);

    expect(processed.syncTime).toBeGreaterThanOrEqual(0.2);
    expect(processed.syncTime).toBeLessThanOrEqual(0.6);
    expect(processed.finalityTime).toBeCloseTo(consensusSum + processed.syncTime, 12);
    expect(coordinator.getSyncEvents()).toBe(2);
    expect(coordinator.getInteroperabilityOverhead()).toBe(2 * BYTES_PER_SYNC);
    expect(coordinator.getPairTotals()).toEqual({
      'urban->interurban': BYTES_PER_SYNC,
      'urban->rural': BYTES_PER_SYNC
    });
    expect(domains.map(domain => domain.getBandwidth().inter)).toEqual([2 * BYTES_PER_SYNC, BYTES_PER_SYNC, BYTES_PER_SYNC]);
  });

  test('an intra-domain event records its own consensus time', async () => {
    const domains = buildDomains(9);
    const coordinator = coordinatorFor(domains, true);
    const results = recordConsensus(domains);

    const processed = await coordinator.processTransaction(domains[2], vectorOf(CALM_VALUES), false, 0);
    expect(results).toHaveLength(1);
    expect(processed.finalityTime).toBe(results[0].consensusTime);
    expect(coordinator.getSyncEvents()).toBe(0);
    expect(coordinator.getCounters('rural')).toEqual({ originated: 1, crossDomain: 0, finalized: 1 });
  });

  test('no CDFT sample is recorded when any domain fails to finalize', async () => {
    const domains = buildDomains(10);
    const coordinator = coordinatorFor(domains, false);

    const processed = await coordinator.processTransaction(domains[1], vectorOf(new Array<number>(10).fill(6)), true, 0);
    expect(processed.finalized).toBe(false);
    expect(coordinator.getSamples('interurban')).toEqual([]);
    expect(coordinator.getAttemptSamples('interurban')).toEqual([processed.finalityTime]);
    expect(coordinator.getCounters('interurban')).toEqual({ originated: 1, crossDomain: 1, finalized: 0 });
  });

  test('full-mesh resynchronization runs both directions for every pair', () => {
    const domains = buildDomains(11);
    const coordinator = coordinatorFor(domains, true);

    expect(coordinator.resynchronizeAll()).toBe(6);
    expect(coordinator.getSyncEvents()).toBe(6);
    expect(coordinator.getInteroperabilityOverhead()).toBe(6 * BYTES_PER_SYNC);
    expect(domains.map(domain => domain.getBandwidth().inter)).toEqual([4, 4, 4].map(n => n * BYTES_PER_SYNC));
    expect(Object.keys(coordinator.getPairTotals()).sort()).toEqual([
      'interurban->rural',
      'interurban->urban',
      'rural->interurban',
      'rural->urban',
      'urban->interurban',
      'urban->rural'
    ]);
  });

  test('disabled synchronization exchanges nothing', () => {
    const domains = buildDomains(12);
    const coordinator = coordinatorFor(domains, false);
    expect(coordinator.resynchronizeAll()).toBe(0);
    expect(coordinator.synchronize(domains[0], domains[1])).toBe(0);
    expect(coordinator.getSyncEvents()).toBe(0);
  });
});

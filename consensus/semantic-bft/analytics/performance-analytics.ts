// consensus/semantic-bft/analytics/performance-analytics.ts
// Run metrics, false-positive accounting and multi-seed summaries

import { NodeActor } from '../core/state/node-actor';
import { mean, stddev } from '../core/concept/vector-math';
import { DomainType } from '../core/types';
import { CrossDomainCoordinator } from '../domains/cross-domain-coordinator';

export { mean, stddev };

export interface Metrics {
  meanLatency: number;
  stdLatency: number;
  messageOverhead: number;
  createdTransactions: number;
  // Distinct transactions finalized by at least one node
  confirmedTransactions: number;
  nodeFinalizations: number;
  malformedDetected: number;
  falsePositives: number;
  validTransactions: number;
  falsePositiveRate: number;
  expiredTransactions: number;
  consensusRejections: number;
  throughput: number;
  elapsedTime: number;
  nodeCount: number;
  adversarialCount: number;
}

export type MetricName = keyof Metrics;

export interface MetricSummary {
  mean: number;
  std: number;
}

export type MetricsSummary = Record<MetricName, MetricSummary>;

export interface OverheadSource {
  getMessageOverhead(): number;
}

/**
 * Share of clean-but-rejected transactions among clean ones, in percent
 */
export function falsePositiveRate(falsePositives: number, validTransactions: number): number {
  const denominator = falsePositives + validTransactions;
  if (denominator === 0) return 0;
  return (falsePositives / denominator) * 100;
}

export function throughput(confirmed: number, elapsed: number): number {
  if (elapsed <= 0) return 0;
  return confirmed / elapsed;
}

export function collectNetworkMetrics(
  nodes: readonly NodeActor[],
  fabric: OverheadSource,
  elapsedTime: number
): Metrics {
  const latencies: number[] = [];
  const confirmed = new Set<string>();
  let createdTransactions = 0;
  let nodeFinalizations = 0;
  let malformedDetected = 0;
  let falsePositives = 0;
  let validTransactions = 0;
  let expiredTransactions = 0;
  let consensusRejections = 0;
  let adversarialCount = 0;

  for (const node of nodes) {
    const stats = node.getStats();
    latencies.push(...node.getLatencies());
    for (const id of node.getFinalizedIds()) confirmed.add(id);

    createdTransactions += stats.transactionsCreated;
    nodeFinalizations += stats.finalizedTransactions;
    malformedDetected += stats.malformedDetected;
    falsePositives += stats.falsePositives;
    validTransactions += stats.validTransactions;
    expiredTransactions += stats.expiredTransactions;
    consensusRejections += stats.consensusRejections;
    if (stats.adversarial) adversarialCount++;
  }

  return {
    meanLatency: mean(latencies),
    stdLatency: stddev(latencies),
    messageOverhead: fabric.getMessageOverhead(),
    createdTransactions,
    confirmedTransactions: confirmed.size,
    nodeFinalizations,
    malformedDetected,
    falsePositives,
    validTransactions,
    falsePositiveRate: falsePositiveRate(falsePositives, validTransactions),
    expiredTransactions,
    consensusRejections,
    throughput: throughput(confirmed.size, elapsedTime),
    elapsedTime,
    nodeCount: nodes.length,
    adversarialCount
  };
}

/**
 * Mean and population standard deviation of every metric across runs
 */
export function summarize(runs: readonly Metrics[]): MetricsSummary {
  const stat = (name: MetricName): MetricSummary => {
    const values = runs.map(run => run[name]);
    return { mean: mean(values), std: stddev(values) };
  };

  return {
    meanLatency: stat('meanLatency'),
    stdLatency: stat('stdLatency'),
    messageOverhead: stat('messageOverhead'),
    createdTransactions: stat('createdTransactions'),
    confirmedTransactions: stat('confirmedTransactions'),
    nodeFinalizations: stat('nodeFinalizations'),
    malformedDetected: stat('malformedDetected'),
    falsePositives: stat('falsePositives'),
    validTransactions: stat('validTransactions'),
    falsePositiveRate: stat('falsePositiveRate'),
    expiredTransactions: stat('expiredTransactions'),
    consensusRejections: stat('consensusRejections'),
    throughput: stat('throughput'),
    elapsedTime: stat('elapsedTime'),
    nodeCount: stat('nodeCount'),
    adversarialCount: stat('adversarialCount')
  };
}

export interface DomainReport {
  name: string;
  type: DomainType;
  cdftMean: number;
  cdftStd: number;
  cdftSamples: number;
  // Over every processed event, finalized or not
  cdftAttemptMean: number;
  cdftAttemptStd: number;
  cdftAttemptSamples: number;
  intraBandwidth: number;
  interBandwidth: number;
  originated: number;
  crossDomain: number;
  finalized: number;
  validators: number;
}

export interface DomainMetrics {
  domains: DomainReport[];
  // Bytes, each sync counted once
  interoperabilityOverhead: number;
  pairTotals: Record<string, number>;
  syncEvents: number;
  totalEvents: number;
  elapsedTime: number;
  enableCrossDomainSync: boolean;
}

export function collectDomainMetrics(
  coordinator: CrossDomainCoordinator,
  elapsedTime: number,
  totalEvents: number
): DomainMetrics {
  const domains = coordinator.getDomains().map((domain): DomainReport => {
    const samples = coordinator.getSamples(domain.name);
    const attempts = coordinator.getAttemptSamples(domain.name);
    const counters = coordinator.getCounters(domain.name);
    const bandwidth = domain.getBandwidth();
    return {
      name: domain.name,
      type: domain.type,
      cdftMean: mean(samples),
      cdftStd: stddev(samples),
      cdftSamples: samples.length,
      cdftAttemptMean: mean(attempts),
      cdftAttemptStd: stddev(attempts),
      cdftAttemptSamples: attempts.length,
      intraBandwidth: bandwidth.intra,
      interBandwidth: bandwidth.inter,
      originated: counters.originated,
      crossDomain: counters.crossDomain,
      finalized: counters.finalized,
      validators: domain.getValidators().length
    };
  });

  return {
    domains,
    interoperabilityOverhead: coordinator.getInteroperabilityOverhead(),
    pairTotals: coordinator.getPairTotals(),
    syncEvents: coordinator.getSyncEvents(),
    totalEvents,
    elapsedTime,
    enableCrossDomainSync: coordinator.isSyncEnabled()
  };
}

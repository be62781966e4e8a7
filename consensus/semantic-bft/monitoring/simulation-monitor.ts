// consensus/semantic-bft/monitoring/simulation-monitor.ts
// Prometheus-style counters for a simulation run, fed by node and domain events

import { EventEmitter } from 'events';
import winston from 'winston';
import { Registry as PromRegistry, Counter, Gauge, Histogram } from 'prom-client';
import { NodeActor, FinalizedEvent } from '../core/state/node-actor';
import { RejectionReason, Transaction } from '../core/types';

export interface DomainBandwidthSample {
  domain: string;
  intraBytes: number;
  interBytes: number;
}

interface MalformedEvent {
  transactionId: string;
  nodeId: string;
  reason: RejectionReason;
  falsePositive: boolean;
}

const LATENCY_BUCKETS = [0.01, 0.02, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

export class SimulationMonitor extends EventEmitter {
  private promRegistry: PromRegistry;

  private txCreatedTotal: Counter<string>;
  private txFinalizedTotal: Counter<string>;
  private txRejectedTotal: Counter<string>;
  private txMalformedTotal: Counter<string>;
  private txExpiredTotal: Counter<string>;
  private falsePositivesTotal: Counter<string>;
  private finalityLatency: Histogram<string>;
  private messageOverhead: Gauge<string>;
  private domainBandwidth: Gauge<string>;
  private interoperabilityOverhead: Gauge<string>;

  constructor(private readonly logger: winston.Logger) {
    super();
    this.promRegistry = new PromRegistry();

    this.txCreatedTotal = this.createCounter('semantic_bft_tx_created_total', 'Transactions originated', ['role']);
    this.txFinalizedTotal = this.createCounter('semantic_bft_tx_finalized_total', 'Node-level finalizations', ['role']);
    this.txRejectedTotal = this.createCounter('semantic_bft_tx_rejected_total', 'Node-level consensus rejections', ['role']);
    this.txMalformedTotal = this.createCounter('semantic_bft_tx_malformed_total', 'Transactions rejected by semantic verification', ['reason']);
    this.txExpiredTotal = this.createCounter('semantic_bft_tx_expired_total', 'Transactions dropped for age', []);
    this.falsePositivesTotal = this.createCounter('semantic_bft_false_positives_total', 'Clean transactions rejected as malformed', []);
    this.finalityLatency = new Histogram({
      name: 'semantic_bft_finality_latency',
      help: 'Origination-to-finality latency of self-originated transactions (simulated time)',
      buckets: LATENCY_BUCKETS,
      registers: [this.promRegistry]
    });
    this.messageOverhead = this.createGauge('semantic_bft_message_overhead', 'Point-to-point deliveries counted by the fabric', []);
    this.domainBandwidth = this.createGauge('semantic_bft_domain_bandwidth_bytes', 'Domain bandwidth usage', ['domain', 'scope']);
    this.interoperabilityOverhead = this.createGauge('semantic_bft_interoperability_overhead_bytes', 'Bytes exchanged by semantic synchronization', []);
  }

  /**
   * Subscribe to a node's lifecycle events
   */
  public attachNode(node: NodeActor): void {
    const role = node.adversarial ? 'adversarial' : 'honest';

    node.on('transaction:created', (transaction: Transaction) => {
      this.txCreatedTotal.inc({ role });
      this.emit('transaction:created', transaction.id);
    });

    node.on('transaction:finalized', (event: FinalizedEvent) => {
      this.txFinalizedTotal.inc({ role });
      if (event.latency !== undefined) {
        this.finalityLatency.observe(event.latency);
      }
    });

    node.on('transaction:rejected', () => {
      this.txRejectedTotal.inc({ role });
    });

    node.on('transaction:malformed', (event: MalformedEvent) => {
      this.txMalformedTotal.inc({ reason: event.reason });
      if (event.falsePositive) {
        this.falsePositivesTotal.inc();
        this.logger.debug(`False positive at ${event.nodeId} on ${event.transactionId}`, { reason: event.reason });
      }
    });

    node.on('transaction:expired', () => {
      this.txExpiredTotal.inc();
    });
  }

  public recordMessageOverhead(total: number): void {
    this.messageOverhead.set(total);
  }

  public recordDomainBandwidth(sample: DomainBandwidthSample): void {
    this.domainBandwidth.set({ domain: sample.domain, scope: 'intra' }, sample.intraBytes);
    this.domainBandwidth.set({ domain: sample.domain, scope: 'inter' }, sample.interBytes);
  }

  public recordInteroperabilityOverhead(bytes: number): void {
    this.interoperabilityOverhead.set(bytes);
  }

  public async getMetricsText(): Promise<string> {
    return this.promRegistry.metrics();
  }

  // Metric creation helpers
  private createCounter(name: string, help: string, labelNames: string[]): Counter<string> {
    return new Counter({ name, help, labelNames, registers: [this.promRegistry] });
  }

  private createGauge(name: string, help: string, labelNames: string[]): Gauge<string> {
    return new Gauge({ name, help, labelNames, registers: [this.promRegistry] });
  }
}

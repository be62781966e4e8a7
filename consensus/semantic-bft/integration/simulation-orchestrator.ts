// consensus/semantic-bft/integration/simulation-orchestrator.ts
// Wires configuration, nodes, fabric, scheduler and analytics into complete runs

import { EventEmitter } from 'events';
import winston from 'winston';
import { ConfigOverrides, SemanticBftConfig, resolveConfig } from '../core/config/config-manager';
import { ConfigurationError } from '../core/errors';
import { DOMAIN_TYPES } from '../core/types';
import { SeededRandom } from '../core/random/seeded-random';
import { ConceptCodec } from '../core/concept/concept-codec';
import { SemanticVerifier } from '../core/validation/semantic-verifier';
import { NodeActor, nodeSettingsFrom } from '../core/state/node-actor';
import { BroadcastFabric } from '../network/broadcast-fabric';
import { RoundScheduler } from '../network/round-scheduler';
import { Domain } from '../domains/domain';
import { CrossDomainCoordinator } from '../domains/cross-domain-coordinator';
import { VehicleFleet } from '../domains/vehicle-fleet';
import {
  DomainMetrics,
  Metrics,
  MetricsSummary,
  collectDomainMetrics,
  collectNetworkMetrics,
  summarize
} from '../analytics/performance-analytics';
import { createLogger } from '../monitoring/logger';
import { SimulationMonitor } from '../monitoring/simulation-monitor';

export interface RunOptions {
  nodeCount: number;
  adversarialFraction: number;
  rounds: number;
  seed: number;
}

export interface MultiDomainOptions {
  domainCount: number;
  vehiclesPerDomain: number;
  // Simulated time units
  duration: number;
  enableCrossDomainSync: boolean;
  seed: number;
}

export interface OrchestratorOptions {
  configPath?: string;
  logger?: winston.Logger;
  monitor?: SimulationMonitor;
}

export interface SeedRun {
  seed: number;
  metrics: Metrics;
}

export interface SeedRunSummary {
  runs: SeedRun[];
  summary: MetricsSummary;
}

export interface SweepPoint {
  adversarialFraction: number;
  summary: MetricsSummary;
}

const RESYNC_TASK = 'domain-resync';

export class SimulationOrchestrator extends EventEmitter {
  private readonly configPath?: string;
  private readonly logger?: winston.Logger;
  private readonly monitor?: SimulationMonitor;

  constructor(options: OrchestratorOptions = {}) {
    super();
    this.configPath = options.configPath;
    this.logger = options.logger;
    this.monitor = options.monitor;
  }

  /**
   * Single-network run. Exactly round(nodeCount × adversarialFraction) nodes
   * are adversarial.
   */
  public async run(options: RunOptions, overrides: ConfigOverrides = {}): Promise<Metrics> {
    assertWholeNumber('rounds', options.rounds);
    assertWholeNumber('seed', options.seed);

    const config = resolveConfig({
      ...overrides,
      network: { ...overrides.network, nodeCount: options.nodeCount },
      adversary: { ...overrides.adversary, fraction: options.adversarialFraction }
    }, this.configPath);
    const logger = this.loggerFor(config);
    const root = new SeededRandom(options.seed);

    const codec = new ConceptCodec(config.concept.dimension, config.concept.digestPrecision);
    const verifier = new SemanticVerifier(codec, config.verifier);
    const settings = nodeSettingsFrom(config);
    const fabric = new BroadcastFabric(root.fork('fabric'), config.network.hopLatency);

    const adversaries = this.pickAdversaries(root, config.network.nodeCount, config.adversary.fraction);
    const nodes: NodeActor[] = [];
    for (let i = 0; i < config.network.nodeCount; i++) {
      const id = `node-${i}`;
      const node = new NodeActor({
        id,
        adversarial: adversaries.has(i),
        settings,
        codec,
        verifier,
        rng: root.fork(id),
        fabric,
        logger
      });
      fabric.register(node);
      this.monitor?.attachNode(node);
      nodes.push(node);
    }

    const scheduler = new RoundScheduler({ roundDuration: config.network.roundDuration, logger, fabric });
    scheduler.addParticipant({
      onRound: ({ now }) => {
        for (const node of nodes) node.maybeOriginate(now);
      }
    });
    scheduler.on('round:completed', event => this.emit('round:completed', event));

    logger.info(`Starting simulation: ${nodes.length} nodes, ${adversaries.size} adversarial, ${options.rounds} rounds`, {
      seed: options.seed
    });
    const elapsed = await scheduler.run(options.rounds);

    const metrics = collectNetworkMetrics(nodes, fabric, elapsed);
    this.monitor?.recordMessageOverhead(metrics.messageOverhead);
    logger.info(`Simulation finished: ${metrics.confirmedTransactions}/${metrics.createdTransactions} confirmed`, {
      throughput: metrics.throughput,
      falsePositiveRate: metrics.falsePositiveRate
    });
    this.emit('run:completed', metrics);
    return metrics;
  }

  /**
   * Domain-partitioned run measuring cross-domain finality and bandwidth
   */
  public async runMultiDomain(options: MultiDomainOptions, overrides: ConfigOverrides = {}): Promise<DomainMetrics> {
    assertWholeNumber('seed', options.seed);
    if (!(options.duration >= 0)) {
      throw new ConfigurationError(`duration must be non-negative, got ${options.duration}`, ['duration']);
    }

    const config = resolveConfig({
      ...overrides,
      domains: {
        ...overrides.domains,
        count: options.domainCount,
        vehiclesPerDomain: options.vehiclesPerDomain
      }
    }, this.configPath);
    const logger = this.loggerFor(config);
    const root = new SeededRandom(options.seed);

    const domains: Domain[] = [];
    for (let i = 0; i < config.domains.count; i++) {
      const type = DOMAIN_TYPES[i % DOMAIN_TYPES.length];
      const generation = Math.floor(i / DOMAIN_TYPES.length);
      const name = generation === 0 ? type : `${type}-${generation}`;
      domains.push(new Domain({ name, type, config, rng: root.fork(`domain:${name}`), logger }));
    }

    const coordinator = new CrossDomainCoordinator({
      domains,
      config: config.domains,
      rng: root.fork('coordinator'),
      logger,
      enableSync: options.enableCrossDomainSync
    });
    const fleet = new VehicleFleet(coordinator, config.domains, root.fork('vehicles'));

    const scheduler = new RoundScheduler({ roundDuration: config.domains.roundDuration, logger });
    scheduler.addParticipant(fleet);
    if (options.enableCrossDomainSync) {
      scheduler.every(config.domains.syncInterval, () => {
        coordinator.resynchronizeAll();
      }, RESYNC_TASK);
    }

    const rounds = Math.ceil(Number((options.duration / config.domains.roundDuration).toFixed(9)));
    logger.info(`Starting multi-domain simulation: ${domains.length} domains, ${fleet.getVehicles().length} vehicles`, {
      rounds,
      crossDomainSync: options.enableCrossDomainSync
    });
    const elapsed = await scheduler.run(rounds);

    const metrics = collectDomainMetrics(coordinator, elapsed, fleet.getEventCount());
    for (const report of metrics.domains) {
      this.monitor?.recordDomainBandwidth({
        domain: report.name,
        intraBytes: report.intraBandwidth,
        interBytes: report.interBandwidth
      });
    }
    this.monitor?.recordInteroperabilityOverhead(metrics.interoperabilityOverhead);
    logger.info(`Multi-domain simulation finished: ${metrics.totalEvents} events`, {
      syncEvents: metrics.syncEvents,
      interoperabilityOverhead: metrics.interoperabilityOverhead
    });
    this.emit('multi-domain:completed', metrics);
    return metrics;
  }

  /**
   * Repeat a run once per seed and summarize the spread
   */
  public async runSeeds(
    options: Omit<RunOptions, 'seed'>,
    seeds: readonly number[],
    overrides: ConfigOverrides = {}
  ): Promise<SeedRunSummary> {
    const runs: SeedRun[] = [];
    for (const seed of seeds) {
      runs.push({ seed, metrics: await this.run({ ...options, seed }, overrides) });
    }
    return { runs, summary: summarize(runs.map(run => run.metrics)) };
  }

  public async sweepAdversarialFractions(
    fractions: readonly number[],
    options: Omit<RunOptions, 'seed' | 'adversarialFraction'>,
    seeds: readonly number[],
    overrides: ConfigOverrides = {}
  ): Promise<SweepPoint[]> {
    const points: SweepPoint[] = [];
    for (const adversarialFraction of fractions) {
      const { summary } = await this.runSeeds({ ...options, adversarialFraction }, seeds, overrides);
      points.push({ adversarialFraction, summary });
    }
    return points;
  }

  private pickAdversaries(rng: SeededRandom, nodeCount: number, fraction: number): Set<number> {
    const count = Math.round(nodeCount * fraction);
    const indices = Array.from({ length: nodeCount }, (_, i) => i);
    return new Set(rng.fork('adversaries').shuffle(indices).slice(0, count));
  }

  private loggerFor(config: SemanticBftConfig): winston.Logger {
    return this.logger ?? createLogger(config.logging);
  }
}

function assertWholeNumber(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`, [name]);
  }
}

export function run(options: RunOptions, overrides: ConfigOverrides = {}): Promise<Metrics> {
  return new SimulationOrchestrator().run(options, overrides);
}

export function runMultiDomain(options: MultiDomainOptions, overrides: ConfigOverrides = {}): Promise<DomainMetrics> {
  return new SimulationOrchestrator().runMultiDomain(options, overrides);
}

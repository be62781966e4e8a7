// consensus/semantic-bft/domains/cross-domain-coordinator.ts
// Cross-domain finality and semantic synchronization between domains

import { EventEmitter } from 'events';
import winston from 'winston';
import { ConceptVector } from '../core/types';
import { DomainsConfig } from '../core/config/config-manager';
import { SeededRandom } from '../core/random/seeded-random';
import { Domain } from './domain';

export interface CoordinatorOptions {
  domains: readonly Domain[];
  config: DomainsConfig;
  rng: SeededRandom;
  logger: winston.Logger;
  enableSync: boolean;
}

export interface ProcessedTransaction {
  transactionId: string;
  origin: string;
  crossDomain: boolean;
  // Every involved domain finalized
  finalized: boolean;
  // CDFT for cross-domain transactions, the origin's consensus time otherwise
  finalityTime: number;
  syncTime: number;
}

export interface OriginCounters {
  originated: number;
  crossDomain: number;
  finalized: number;
}

export class CrossDomainCoordinator extends EventEmitter {
  private readonly domains: readonly Domain[];
  private readonly config: DomainsConfig;
  private readonly rng: SeededRandom;
  private readonly logger: winston.Logger;
  private readonly enableSync: boolean;

  private samples: Map<string, number[]> = new Map();
  // Every processed event, finalized or not
  private attemptSamples: Map<string, number[]> = new Map();
  private counters: Map<string, OriginCounters> = new Map();
  private pairTotals: Map<string, number> = new Map();
  private interoperabilityOverhead = 0;
  private syncEvents = 0;

  constructor(options: CoordinatorOptions) {
    super();
    this.domains = options.domains;
    this.config = options.config;
    this.rng = options.rng;
    this.logger = options.logger;
    this.enableSync = options.enableSync;

    for (const domain of this.domains) {
      this.samples.set(domain.name, []);
      this.attemptSamples.set(domain.name, []);
      this.counters.set(domain.name, { originated: 0, crossDomain: 0, finalized: 0 });
    }
  }

  /**
   * Exchange a sampled concept batch from `source` to `target` through their
   * SAE models. Returns the sync delay, 0 when synchronization is disabled.
   */
  public synchronize(source: Domain, target: Domain): number {
    if (!this.enableSync) return 0;

    let encodedLength = 0;
    for (let i = 0; i < this.config.syncBatchSize; i++) {
      const concepts = Array.from({ length: source.sae.dimension }, () => this.rng.gaussian());
      const encoded = source.sae.encode(concepts);
      target.sae.decode(encoded);
      encodedLength += encoded.length;
    }

    const bytes = encodedLength * this.config.bytesPerValue;
    source.addInterBandwidth(bytes);
    target.addInterBandwidth(bytes);

    const pair = `${source.name}->${target.name}`;
    this.pairTotals.set(pair, (this.pairTotals.get(pair) ?? 0) + bytes);
    this.interoperabilityOverhead += bytes;
    this.syncEvents++;

    const delay = this.rng.uniform(this.config.syncDelay.min, this.config.syncDelay.max);
    this.emit('sync:completed', { source: source.name, target: target.name, bytes, delay });
    return delay;
  }

  /**
   * Run a vehicle event through its origin domain and, when cross-domain,
   * through every other domain.
   * CDFT = origin consensus + sync delays + consensus in each peer domain.
   */
  public async processTransaction(
    origin: Domain,
    vector: ConceptVector,
    crossDomain: boolean,
    now: number
  ): Promise<ProcessedTransaction> {
    const counters = this.countersFor(origin);
    counters.originated++;
    if (crossDomain) counters.crossDomain++;

    const local = await origin.runIntraDomainConsensus(vector, now, crossDomain);
    let finalized = local.finalized;
    let finalityTime = local.consensusTime;
    let syncTime = 0;

    if (crossDomain) {
      const peers = this.domains.filter(domain => domain !== origin);
      for (const peer of peers) {
        syncTime += this.synchronize(origin, peer);
      }
      for (const peer of peers) {
        const remote = await peer.runIntraDomainConsensus(vector, now, true);
        finalized = finalized && remote.finalized;
        finalityTime += remote.consensusTime;
      }
      finalityTime += syncTime;
    }

    this.samplesFor(this.attemptSamples, origin).push(finalityTime);
    if (finalized) {
      counters.finalized++;
      this.samplesFor(this.samples, origin).push(finalityTime);
    }

    const processed: ProcessedTransaction = {
      transactionId: local.transactionId,
      origin: origin.name,
      crossDomain,
      finalized,
      finalityTime,
      syncTime
    };
    this.emit('transaction:processed', processed);
    return processed;
  }

  /**
   * Full-mesh resynchronization, both directions per pair
   */
  public resynchronizeAll(): number {
    if (!this.enableSync) return 0;

    let syncs = 0;
    for (let i = 0; i < this.domains.length; i++) {
      for (let j = i + 1; j < this.domains.length; j++) {
        this.synchronize(this.domains[i], this.domains[j]);
        this.synchronize(this.domains[j], this.domains[i]);
        syncs += 2;
      }
    }
    this.logger.debug(`Resynchronized ${this.domains.length} domains`, { syncs });
    return syncs;
  }

  public isSyncEnabled(): boolean {
    return this.enableSync;
  }

  public getDomains(): readonly Domain[] {
    return this.domains;
  }

  /** Finality times of events every involved domain finalized */
  public getSamples(domainName: string): readonly number[] {
    return this.samples.get(domainName) ?? [];
  }

  /** Finality times of every event originated in the domain */
  public getAttemptSamples(domainName: string): readonly number[] {
    return this.attemptSamples.get(domainName) ?? [];
  }

  public getCounters(domainName: string): OriginCounters {
    return { ...(this.counters.get(domainName) ?? { originated: 0, crossDomain: 0, finalized: 0 }) };
  }

  public getPairTotals(): Record<string, number> {
    return Object.fromEntries(this.pairTotals);
  }

  public getInteroperabilityOverhead(): number {
    return this.interoperabilityOverhead;
  }

  public getSyncEvents(): number {
    return this.syncEvents;
  }

  private countersFor(domain: Domain): OriginCounters {
    let counters = this.counters.get(domain.name);
    if (!counters) {
      counters = { originated: 0, crossDomain: 0, finalized: 0 };
      this.counters.set(domain.name, counters);
    }
    return counters;
  }

  private samplesFor(store: Map<string, number[]>, domain: Domain): number[] {
    let samples = store.get(domain.name);
    if (!samples) {
      samples = [];
      store.set(domain.name, samples);
    }
    return samples;
  }
}

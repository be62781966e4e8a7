// consensus/semantic-bft/core/state/node-actor.ts
// A consensus participant: originates, verifies, votes and finalizes transactions

import { EventEmitter } from 'events';
import winston from 'winston';
import {
  ConceptVector,
  ConsensusVote,
  Envelope,
  FabricEndpoint,
  MessageFabric,
  NodeId,
  NodeStats,
  Transaction,
  VerificationVerdict
} from '../types';
import { ConceptCodec } from '../concept/concept-codec';
import { SemanticVerifier } from '../validation/semantic-verifier';
import { VoteAggregator, VoteOutcome, VoteTally } from '../voting/vote-aggregator';
import { SeededRandom } from '../random/seeded-random';
import { AdversaryConfig, SemanticBftConfig } from '../config/config-manager';
import { SimulationError } from '../errors';
import { TransactionLifecycle, TransactionState } from './transaction-lifecycle';

export interface NodeSettings {
  estimatedNetworkSize: number;
  bftFraction: number;
  originationProbability: number;
  maxTransactionAge: number;
  adversary: AdversaryConfig;
}

export function nodeSettingsFrom(config: SemanticBftConfig): NodeSettings {
  return {
    estimatedNetworkSize: config.network.estimatedNetworkSize,
    bftFraction: config.network.bftFraction,
    originationProbability: config.network.originationProbability,
    maxTransactionAge: config.transaction.maxAge,
    adversary: config.adversary
  };
}

export interface NodeActorOptions {
  id: NodeId;
  adversarial: boolean;
  settings: NodeSettings;
  codec: ConceptCodec;
  verifier: SemanticVerifier;
  rng: SeededRandom;
  fabric: MessageFabric;
  logger: winston.Logger;
  domain?: string;
}

export interface OriginateOptions {
  conceptVector?: ConceptVector;
  crossDomain?: boolean;
  domain?: string;
}

export type ReceiveOutcome =
  | { status: 'own' }
  | { status: 'duplicate' }
  | { status: 'expired'; age: number }
  | { status: 'malformed'; verdict: VerificationVerdict }
  | { status: 'voted'; accept: boolean };

export interface FinalizedEvent {
  transactionId: string;
  nodeId: NodeId;
  timestamp: number;
  latency?: number;
}

export class NodeActor extends EventEmitter implements FabricEndpoint {
  public readonly id: NodeId;
  public readonly adversarial: boolean;
  public readonly domain?: string;

  private readonly settings: NodeSettings;
  private readonly codec: ConceptCodec;
  private readonly verifier: SemanticVerifier;
  private readonly rng: SeededRandom;
  private readonly fabric: MessageFabric;
  private readonly logger: winston.Logger;
  private readonly aggregator: VoteAggregator;
  private readonly lifecycle = new TransactionLifecycle();

  private pending: Map<string, Transaction> = new Map();
  private received: Set<string> = new Set();
  private verified: Set<string> = new Set();
  private finalized: Set<string> = new Set();
  private rejected: Set<string> = new Set();
  private originationTimes: Map<string, number> = new Map();
  private latencies: number[] = [];

  private sequence = 0;
  private clock = 0;
  private transactionsCreated = 0;
  private messagesSent = 0;
  private malformedDetected = 0;
  private falsePositives = 0;
  private validTransactions = 0;
  private expiredTransactions = 0;
  private consensusRejections = 0;

  private mailbox: Envelope[] = [];
  private head = 0;
  private draining: Promise<void> | null = null;
  private failure: SimulationError | null = null;

  constructor(options: NodeActorOptions) {
    super();
    this.id = options.id;
    this.adversarial = options.adversarial;
    this.domain = options.domain;
    this.settings = options.settings;
    this.codec = options.codec;
    this.verifier = options.verifier;
    this.rng = options.rng;
    this.fabric = options.fabric;
    this.logger = options.logger;
    this.aggregator = new VoteAggregator(
      options.settings.estimatedNetworkSize,
      options.settings.bftFraction
    );
  }

  /**
   * Round opportunity: originate with the configured per-round probability
   */
  public maybeOriginate(now: number): Transaction | null {
    if (!this.rng.nextBoolean(this.settings.originationProbability)) {
      return null;
    }
    return this.originate(now);
  }

  /**
   * Create, digest and broadcast a transaction
   */
  public originate(now: number, options: OriginateOptions = {}): Transaction {
    const timestamp = this.advanceClock(now);
    let conceptVector = options.conceptVector
      ?? this.codec.generate(this.rng, this.id, timestamp, this.domain);

    if (!options.conceptVector && this.adversarial
      && this.rng.nextBoolean(this.settings.adversary.corruptionProbability)) {
      conceptVector = this.codec.injectMalformed(conceptVector, this.rng, this.settings.adversary);
    }

    const transaction: Transaction = {
      id: `tx-${this.id}-${++this.sequence}`,
      conceptVector,
      semanticDigest: this.codec.digest(conceptVector.values),
      timestamp,
      originator: this.id,
      domain: options.domain ?? this.domain,
      crossDomain: options.crossDomain ?? false
    };

    this.transactionsCreated++;
    this.originationTimes.set(transaction.id, timestamp);
    this.lifecycle.transition(transaction.id, TransactionState.CREATED, timestamp);
    this.emit('transaction:created', transaction);

    this.fabric.broadcast(this.id, { kind: 'transaction', transaction }, timestamp);
    this.messagesSent++;
    this.lifecycle.transition(transaction.id, TransactionState.BROADCAST, timestamp);

    this.logger.debug(`Node ${this.id} broadcast ${transaction.id}`, {
      corrupted: conceptVector.isCorrupted
    });
    return transaction;
  }

  /**
   * Verify a delivered transaction and vote on it.
   * A local rejection sends no vote at all.
   */
  public receiveTransaction(transaction: Transaction, now: number): ReceiveOutcome {
    if (transaction.originator === this.id) {
      return { status: 'own' };
    }
    if (this.received.has(transaction.id)) {
      return { status: 'duplicate' };
    }
    this.received.add(transaction.id);

    const timestamp = this.advanceClock(now);
    this.moveTo(transaction.id, TransactionState.PENDING_VERIFICATION, timestamp);

    const age = timestamp - transaction.timestamp;
    if (age > this.settings.maxTransactionAge) {
      this.expiredTransactions++;
      this.moveTo(transaction.id, TransactionState.EXPIRED, timestamp);
      this.emit('transaction:expired', { transactionId: transaction.id, nodeId: this.id, age });
      this.logger.debug(`Node ${this.id} dropped expired ${transaction.id}`, { age });
      return { status: 'expired', age };
    }

    const verdict = this.verifier.verify(transaction);
    if (!verdict.accepted) {
      this.malformedDetected++;
      if (verdict.falsePositive) this.falsePositives++;
      this.moveTo(transaction.id, TransactionState.MALFORMED, timestamp);
      this.emit('transaction:malformed', {
        transactionId: transaction.id,
        nodeId: this.id,
        reason: verdict.reason,
        falsePositive: verdict.falsePositive
      });
      this.logger.debug(`Node ${this.id} rejected malformed ${transaction.id}`, { reason: verdict.reason });
      return { status: 'malformed', verdict };
    }

    if (verdict.countsAsValid) this.validTransactions++;
    this.verified.add(transaction.id);
    // Votes can outrun the transaction itself; a decided id is never pending again
    if (!this.isDecided(transaction.id)) {
      this.pending.set(transaction.id, transaction);
    }

    const accept = this.castVote(transaction, timestamp);
    this.moveTo(transaction.id, TransactionState.VOTED, timestamp);
    return { status: 'voted', accept };
  }

  public receiveVote(vote: ConsensusVote, now: number): VoteOutcome {
    const timestamp = this.advanceClock(now);
    const outcome = this.aggregator.record(vote);

    if (outcome.status === 'finalize') {
      this.finalize(vote.transactionId, timestamp);
    } else if (outcome.status === 'reject') {
      this.reject(vote.transactionId, timestamp, outcome.tally);
    }
    return outcome;
  }

  /**
   * Confirm a transaction. Returns false when it was already decided.
   */
  public finalize(transactionId: string, now: number): boolean {
    if (this.isDecided(transactionId)) return false;

    const timestamp = this.advanceClock(now);
    this.finalized.add(transactionId);
    this.aggregator.decide(transactionId, 'finalized');
    this.pending.delete(transactionId);

    let latency: number | undefined;
    const startedAt = this.originationTimes.get(transactionId);
    if (startedAt !== undefined) {
      latency = timestamp - startedAt;
      this.latencies.push(latency);
      this.originationTimes.delete(transactionId);
    }

    this.moveTo(transactionId, TransactionState.FINALIZED, timestamp);
    const event: FinalizedEvent = { transactionId, nodeId: this.id, timestamp, latency };
    this.emit('transaction:finalized', event);
    if (latency !== undefined) {
      this.logger.debug(`Transaction ${transactionId} confirmed`, { latency });
    }
    return true;
  }

  /**
   * Drop a transaction the vote tally went against. Returns false when already decided.
   */
  public reject(transactionId: string, now: number, tally?: VoteTally): boolean {
    if (this.isDecided(transactionId)) return false;

    const timestamp = this.advanceClock(now);
    this.rejected.add(transactionId);
    this.aggregator.decide(transactionId, 'rejected');
    this.pending.delete(transactionId);
    this.consensusRejections++;

    this.moveTo(transactionId, TransactionState.REJECTED, timestamp);
    this.emit('transaction:rejected', { transactionId, nodeId: this.id, timestamp, tally });
    this.logger.debug(`Transaction ${transactionId} rejected by consensus at ${this.id}`, { tally });
    return true;
  }

  // Fabric endpoint

  public deliver(envelope: Envelope): void {
    this.mailbox.push(envelope);
    this.scheduleDrain();
  }

  public isBusy(): boolean {
    return this.draining !== null || (this.failure === null && this.head < this.mailbox.length);
  }

  public whenIdle(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  public getFailure(): SimulationError | null {
    return this.failure;
  }

  // Read-only accessors

  public isVerified(transactionId: string): boolean {
    return this.verified.has(transactionId);
  }

  public isFinalized(transactionId: string): boolean {
    return this.finalized.has(transactionId);
  }

  public isRejected(transactionId: string): boolean {
    return this.rejected.has(transactionId);
  }

  public isPending(transactionId: string): boolean {
    return this.pending.has(transactionId);
  }

  public getTransactionState(transactionId: string): TransactionState | undefined {
    return this.lifecycle.get(transactionId);
  }

  public getTally(transactionId: string): VoteTally {
    return this.aggregator.tally(transactionId);
  }

  public getRequiredVotes(): number {
    return this.aggregator.required;
  }

  public getFinalizedIds(): ReadonlySet<string> {
    return this.finalized;
  }

  public getLatencies(): readonly number[] {
    return this.latencies;
  }

  public getStats(): NodeStats {
    return {
      nodeId: this.id,
      adversarial: this.adversarial,
      transactionsCreated: this.transactionsCreated,
      messagesSent: this.messagesSent,
      malformedDetected: this.malformedDetected,
      falsePositives: this.falsePositives,
      validTransactions: this.validTransactions,
      expiredTransactions: this.expiredTransactions,
      consensusRejections: this.consensusRejections,
      pendingTransactions: this.pending.size,
      finalizedTransactions: this.finalized.size
    };
  }

  public advanceClock(now: number): number {
    this.clock = Math.max(this.clock, now);
    return this.clock;
  }

  private isDecided(transactionId: string): boolean {
    return this.finalized.has(transactionId) || this.rejected.has(transactionId);
  }

  private castVote(transaction: Transaction, timestamp: number): boolean {
    let accept = true;
    if (this.adversarial && this.rng.nextBoolean(this.settings.adversary.voteFlipProbability)) {
      accept = !accept;
    }

    this.sendVote({ transactionId: transaction.id, senderId: this.id, accept, timestamp });

    // Equivocation: a second, conflicting ballot that receivers must discard
    if (this.adversarial && this.rng.nextBoolean(this.settings.adversary.equivocationProbability)) {
      this.sendVote({ transactionId: transaction.id, senderId: this.id, accept: !accept, timestamp });
    }
    return accept;
  }

  private sendVote(vote: ConsensusVote): void {
    this.fabric.broadcast(this.id, { kind: 'vote', vote }, vote.timestamp);
    this.messagesSent++;
    this.emit('vote:sent', vote);
  }

  private moveTo(transactionId: string, state: TransactionState, timestamp: number): void {
    if (this.lifecycle.canTransition(transactionId, state)) {
      this.lifecycle.transition(transactionId, state, timestamp);
    }
  }

  private handle(envelope: Envelope): void {
    const message = envelope.message;
    switch (message.kind) {
      case 'transaction':
        this.receiveTransaction(message.transaction, envelope.deliverAt);
        break;
      case 'vote':
        this.receiveVote(message.vote, envelope.deliverAt);
        break;
    }
  }

  private scheduleDrain(): void {
    if (this.draining || this.failure) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.head < this.mailbox.length) this.scheduleDrain();
    });
  }

  private async drain(): Promise<void> {
    // Yield first so delivery never runs inside the sender's own handler
    await Promise.resolve();

    while (this.head < this.mailbox.length) {
      const envelope = this.mailbox[this.head++];
      try {
        this.handle(envelope);
      } catch (error) {
        this.failure = new SimulationError(
          `Node ${this.id} failed handling a ${envelope.message.kind} message`,
          this.id,
          error
        );
        this.logger.error(this.failure.message, { cause: this.failure.metadata?.cause });
        return;
      }
    }

    this.mailbox = [];
    this.head = 0;
  }
}

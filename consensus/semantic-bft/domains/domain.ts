// consensus/semantic-bft/domains/domain.ts
// A network domain: edge-server proposer and RSU validators on a local fabric

import { EventEmitter } from 'events';
import winston from 'winston';
import { ConceptVector, DomainType } from '../core/types';
import { SemanticBftConfig } from '../core/config/config-manager';
import { ConceptCodec } from '../core/concept/concept-codec';
import { SemanticVerifier } from '../core/validation/semantic-verifier';
import { SeededRandom } from '../core/random/seeded-random';
import { NodeActor, NodeSettings } from '../core/state/node-actor';
import { BroadcastFabric } from '../network/broadcast-fabric';
import { SaeModel } from './sae-model';

export interface DomainOptions {
  name: string;
  type: DomainType;
  config: SemanticBftConfig;
  rng: SeededRandom;
  logger: winston.Logger;
}

export interface IntraDomainResult {
  transactionId: string;
  finalized: boolean;
  consensusTime: number;
}

export interface BandwidthUsage {
  intra: number;
  inter: number;
}

export class Domain extends EventEmitter {
  public readonly name: string;
  public readonly type: DomainType;
  public readonly sae: SaeModel;
  public readonly codec: ConceptCodec;

  private readonly config: SemanticBftConfig;
  private readonly rng: SeededRandom;
  private readonly logger: winston.Logger;
  private readonly fabric: BroadcastFabric;
  private readonly proposer: NodeActor;
  private readonly validators: NodeActor[] = [];

  private intraBandwidth = 0;
  private interBandwidth = 0;
  private consensusRounds = 0;
  private finalizedCount = 0;

  constructor(options: DomainOptions) {
    super();
    const { config } = options;
    this.name = options.name;
    this.type = options.type;
    this.config = config;
    this.rng = options.rng;
    this.logger = options.logger;

    this.codec = new ConceptCodec(config.concept.dimension, config.concept.digestPrecision);
    this.sae = SaeModel.random(
      this.rng.fork('sae'),
      config.concept.dimension,
      config.domains.latentDimension,
      config.domains.modelScale
    );
    this.fabric = new BroadcastFabric(this.rng.fork('fabric'), config.network.hopLatency);

    const verifier = new SemanticVerifier(this.codec, config.verifier);
    // Quorum is estimated from the validator pool, not the network-wide size
    const settings: NodeSettings = {
      estimatedNetworkSize: config.domains.validatorsPerDomain,
      bftFraction: config.network.bftFraction,
      originationProbability: 0,
      maxTransactionAge: config.transaction.maxAge,
      adversary: config.adversary
    };

    const createNode = (id: string): NodeActor => {
      const node = new NodeActor({
        id,
        adversarial: false,
        settings,
        codec: this.codec,
        verifier,
        rng: this.rng.fork(id),
        fabric: this.fabric,
        logger: this.logger,
        domain: this.name
      });
      this.fabric.register(node);
      return node;
    };

    this.proposer = createNode(`${this.name}-edge`);
    for (let i = 0; i < config.domains.validatorsPerDomain; i++) {
      this.validators.push(createNode(`${this.name}-rsu-${i}`));
    }
  }

  /**
   * Run one proposal through the domain's validators. The vector is proposed
   * by the edge server; consensus succeeds when the edge server finalizes it.
   */
  public async runIntraDomainConsensus(
    vector: ConceptVector,
    now: number,
    crossDomain: boolean = false
  ): Promise<IntraDomainResult> {
    const transaction = this.proposer.originate(now, {
      conceptVector: vector,
      crossDomain,
      domain: this.name
    });
    await this.fabric.settle();

    const finalized = this.proposer.isFinalized(transaction.id);
    const { domains } = this.config;
    const consensusTime = domains.baseDelay[this.type] + this.rng.uniform(0, domains.consensusJitter);

    this.intraBandwidth += this.getParticipantCount() * domains.phaseCount * domains.avgMessageSizeBytes;
    this.consensusRounds++;
    if (finalized) this.finalizedCount++;

    const result: IntraDomainResult = { transactionId: transaction.id, finalized, consensusTime };
    this.emit('consensus:completed', { domain: this.name, ...result });
    this.logger.debug(`Domain ${this.name} consensus on ${transaction.id}`, { finalized, consensusTime });
    return result;
  }

  public addInterBandwidth(bytes: number): void {
    this.interBandwidth += bytes;
  }

  public getBandwidth(): BandwidthUsage {
    return { intra: this.intraBandwidth, inter: this.interBandwidth };
  }

  public getParticipantCount(): number {
    return this.fabric.getParticipantCount();
  }

  public getValidators(): readonly NodeActor[] {
    return this.validators;
  }

  public getProposer(): NodeActor {
    return this.proposer;
  }

  public getConsensusRounds(): number {
    return this.consensusRounds;
  }

  public getFinalizedCount(): number {
    return this.finalizedCount;
  }

  public getMessageOverhead(): number {
    return this.fabric.getMessageOverhead();
  }
}

// consensus/semantic-bft/core/types.ts
// Shared types for the semantic BFT simulator

export { TransactionState } from './state/transaction-lifecycle';
export type { StateTransition } from './state/transaction-lifecycle';

export type NodeId = string;

export type DomainType = 'urban' | 'interurban' | 'rural';

export const DOMAIN_TYPES: readonly DomainType[] = ['urban', 'interurban', 'rural'];

export interface ConceptVector {
  readonly values: readonly number[];
  readonly timestamp: number;
  readonly nodeId: NodeId;
  readonly domain?: string;
  // Ground truth from adversarial injection; verification never reads it
  readonly isCorrupted: boolean;
}

export interface Transaction {
  readonly id: string;
  readonly conceptVector: ConceptVector;
  readonly semanticDigest: string;
  readonly timestamp: number;
  readonly originator: NodeId;
  readonly domain?: string;
  readonly crossDomain: boolean;
}

export interface ConsensusVote {
  readonly transactionId: string;
  readonly senderId: NodeId;
  readonly accept: boolean;
  readonly timestamp: number;
}

export type RejectionReason =
  | 'digest-mismatch'
  | 'high-variance'
  | 'extreme-value'
  | 'low-similarity';

export type VerificationVerdict =
  | { accepted: true; countsAsValid: boolean }
  | { accepted: false; reason: RejectionReason; falsePositive: boolean };

export type FabricMessage =
  | { kind: 'transaction'; transaction: Transaction }
  | { kind: 'vote'; vote: ConsensusVote };

export interface Envelope {
  message: FabricMessage;
  senderId: NodeId;
  sentAt: number;
  deliverAt: number;
}

export interface NodeStats {
  nodeId: NodeId;
  adversarial: boolean;
  transactionsCreated: number;
  messagesSent: number;
  malformedDetected: number;
  falsePositives: number;
  validTransactions: number;
  expiredTransactions: number;
  consensusRejections: number;
  pendingTransactions: number;
  finalizedTransactions: number;
}

/**
 * A participant the broadcast fabric can deliver to
 */
export interface FabricEndpoint {
  readonly id: NodeId;
  deliver(envelope: Envelope): void;
  isBusy(): boolean;
  whenIdle(): Promise<void>;
  getFailure(): Error | null;
}

export interface MessageFabric {
  broadcast(senderId: NodeId, message: FabricMessage, sentAt: number): void;
}

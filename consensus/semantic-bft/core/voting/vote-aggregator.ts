// consensus/semantic-bft/core/voting/vote-aggregator.ts
// Threshold-based BFT tallying shared by every node

import { ConsensusVote, NodeId } from '../types';

export type ConsensusDecision = 'finalized' | 'rejected';

export interface VoteTally {
  total: number;
  accepts: number;
}

export type VoteOutcome =
  | { status: 'ignored'; reason: 'decided' | 'duplicate' }
  | { status: 'pending'; tally: VoteTally }
  | { status: 'finalize'; tally: VoteTally }
  | { status: 'reject'; tally: VoteTally };

/**
 * ceil(size × fraction), with the product rounded first so that
 * 100 × 0.67 yields 67 rather than 68.
 */
export function requiredVotes(estimatedNetworkSize: number, bftFraction: number): number {
  const product = Number((estimatedNetworkSize * bftFraction).toFixed(9));
  return Math.ceil(product);
}

interface OpenTally {
  senders: Set<NodeId>;
  accepts: number;
}

export class VoteAggregator {
  private tallies: Map<string, OpenTally> = new Map();
  private decisions: Map<string, ConsensusDecision> = new Map();
  public readonly required: number;

  constructor(estimatedNetworkSize: number, bftFraction: number) {
    this.required = requiredVotes(estimatedNetworkSize, bftFraction);
  }

  /**
   * Count a vote. The first vote per sender wins; later ones from the same
   * sender are discarded whatever they say.
   */
  public record(vote: ConsensusVote): VoteOutcome {
    if (this.decisions.has(vote.transactionId)) {
      return { status: 'ignored', reason: 'decided' };
    }

    let open = this.tallies.get(vote.transactionId);
    if (!open) {
      open = { senders: new Set(), accepts: 0 };
      this.tallies.set(vote.transactionId, open);
    }

    if (open.senders.has(vote.senderId)) {
      return { status: 'ignored', reason: 'duplicate' };
    }
    open.senders.add(vote.senderId);
    if (vote.accept) open.accepts++;

    const tally: VoteTally = { total: open.senders.size, accepts: open.accepts };
    if (tally.total < this.required) {
      return { status: 'pending', tally };
    }

    if (tally.accepts >= this.required) {
      this.decide(vote.transactionId, 'finalized');
      return { status: 'finalize', tally };
    }

    this.decide(vote.transactionId, 'rejected');
    return { status: 'reject', tally };
  }

  public tally(transactionId: string): VoteTally {
    const open = this.tallies.get(transactionId);
    if (!open) return { total: 0, accepts: 0 };
    return { total: open.senders.size, accepts: open.accepts };
  }

  /**
   * Record a decision reached outside `record` and drop its tally
   */
  public decide(transactionId: string, decision: ConsensusDecision): void {
    if (this.decisions.has(transactionId)) return;
    this.decisions.set(transactionId, decision);
    this.tallies.delete(transactionId);
  }

  public isDecided(transactionId: string): boolean {
    return this.decisions.has(transactionId);
  }

  public getDecision(transactionId: string): ConsensusDecision | undefined {
    return this.decisions.get(transactionId);
  }

  public openTallies(): number {
    return this.tallies.size;
  }
}

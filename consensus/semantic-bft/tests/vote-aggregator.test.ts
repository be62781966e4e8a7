import { describe, test, expect, beforeEach } from '@jest/globals';
import { VoteAggregator, requiredVotes } from '../core/voting/vote-aggregator';
import { ConsensusVote } from '../core/types';

function vote(senderId: string, accept: boolean = true, transactionId: string = 'tx-a'): ConsensusVote {
  return { transactionId, senderId, accept, timestamp: 0 };
}

describe('requiredVotes', () => {
  test('is free of floating-point noise', () => {
    expect(requiredVotes(100, 0.67)).toBe(67);
    expect(requiredVotes(4, 0.67)).toBe(3);
    expect(requiredVotes(10, 0.5)).toBe(5);
    expect(requiredVotes(3, 0.67)).toBe(3);
  });
});

describe('VoteAggregator', () => {
  let aggregator: VoteAggregator;

  beforeEach(() => {
    aggregator = new VoteAggregator(100, 0.67);
  });

  test('finalizes on the 67th accepting vote and ignores later ones', () => {
    for (let i = 0; i < 66; i++) {
      expect(aggregator.record(vote(`node-${i}`)).status).toBe('pending');
    }
    expect(aggregator.record(vote('node-66'))).toEqual({ status: 'finalize', tally: { total: 67, accepts: 67 } });
    expect(aggregator.record(vote('node-67'))).toEqual({ status: 'ignored', reason: 'decided' });
    expect(aggregator.getDecision('tx-a')).toBe('finalized');
  });

  test('counts only the first vote of each sender', () => {
    aggregator.record(vote('node-1', true));
    expect(aggregator.record(vote('node-1', true))).toEqual({ status: 'ignored', reason: 'duplicate' });
    expect(aggregator.record(vote('node-1', false))).toEqual({ status: 'ignored', reason: 'duplicate' });
    expect(aggregator.tally('tx-a')).toEqual({ total: 1, accepts: 1 });
  });

  test('keeps tallies per transaction', () => {
    aggregator.record(vote('node-1', true, 'tx-a'));
    aggregator.record(vote('node-1', false, 'tx-b'));
    expect(aggregator.tally('tx-a')).toEqual({ total: 1, accepts: 1 });
    expect(aggregator.tally('tx-b')).toEqual({ total: 1, accepts: 0 });
    expect(aggregator.openTallies()).toBe(2);
  });

  test('rejects once the quorum is reached without enough accepts and discards the tally', () => {
    const small = new VoteAggregator(3, 0.67);
    small.record(vote('node-1', true));
    small.record(vote('node-2', true));
    expect(small.record(vote('node-3', false))).toEqual({ status: 'reject', tally: { total: 3, accepts: 2 } });

    expect(small.tally('tx-a')).toEqual({ total: 0, accepts: 0 });
    expect(small.record(vote('node-4', true))).toEqual({ status: 'ignored', reason: 'decided' });
    expect(small.getDecision('tx-a')).toBe('rejected');
  });

  test('the first decision sticks', () => {
    aggregator.decide('tx-a', 'finalized');
    aggregator.decide('tx-a', 'rejected');
    expect(aggregator.getDecision('tx-a')).toBe('finalized');
    expect(aggregator.isDecided('tx-a')).toBe(true);
    expect(aggregator.isDecided('tx-b')).toBe(false);
  });
});

import { describe, test, expect } from '@jest/globals';
import { TransactionLifecycle, TransactionState } from '../core/state/transaction-lifecycle';

describe('TransactionLifecycle', () => {
  test('follows an own transaction from creation to finality', () => {
    const lifecycle = new TransactionLifecycle();
    expect(lifecycle.transition('tx-1', TransactionState.CREATED, 0))
      .toEqual({ transactionId: 'tx-1', from: null, to: TransactionState.CREATED, timestamp: 0 });
    lifecycle.transition('tx-1', TransactionState.BROADCAST, 0);
    expect(lifecycle.transition('tx-1', TransactionState.FINALIZED, 1).from).toBe(TransactionState.BROADCAST);
    expect(lifecycle.get('tx-1')).toBe(TransactionState.FINALIZED);
  });

  test('a locally rejected transaction can still be decided by the network', () => {
    const lifecycle = new TransactionLifecycle();
    lifecycle.transition('tx-2', TransactionState.PENDING_VERIFICATION, 0);
    lifecycle.transition('tx-2', TransactionState.MALFORMED, 0);
    expect(lifecycle.canTransition('tx-2', TransactionState.FINALIZED)).toBe(true);
    expect(lifecycle.canTransition('tx-2', TransactionState.VOTED)).toBe(false);
  });

  test('throws on moves the table does not allow', () => {
    const lifecycle = new TransactionLifecycle();
    expect(() => lifecycle.transition('tx-3', TransactionState.VOTED, 0))
      .toThrow('Invalid transition for tx-3: NONE -> VOTED');

    lifecycle.transition('tx-3', TransactionState.PENDING_VERIFICATION, 0);
    lifecycle.transition('tx-3', TransactionState.EXPIRED, 0);
    lifecycle.transition('tx-3', TransactionState.REJECTED, 0);
    expect(() => lifecycle.transition('tx-3', TransactionState.FINALIZED, 0))
      .toThrow('Invalid transition for tx-3: REJECTED -> FINALIZED');
  });

  test('counts transactions per state', () => {
    const lifecycle = new TransactionLifecycle();
    lifecycle.transition('tx-a', TransactionState.PENDING_VERIFICATION, 0);
    lifecycle.transition('tx-b', TransactionState.PENDING_VERIFICATION, 0);
    lifecycle.transition('tx-b', TransactionState.VOTED, 0);
    lifecycle.transition('tx-c', TransactionState.FINALIZED, 0);
    expect(lifecycle.countIn(TransactionState.PENDING_VERIFICATION)).toBe(1);
    expect(lifecycle.countIn(TransactionState.VOTED)).toBe(1);
    expect(lifecycle.countIn(TransactionState.FINALIZED)).toBe(1);
  });
});

// consensus/semantic-bft/core/state/transaction-lifecycle.ts
// Node-local view of each transaction's lifecycle

export enum TransactionState {
  CREATED = 'CREATED',
  BROADCAST = 'BROADCAST',
  PENDING_VERIFICATION = 'PENDING_VERIFICATION',
  VOTED = 'VOTED',
  EXPIRED = 'EXPIRED',
  MALFORMED = 'MALFORMED',
  FINALIZED = 'FINALIZED',
  REJECTED = 'REJECTED'
}

export interface StateTransition {
  transactionId: string;
  from: TransactionState | null;
  to: TransactionState;
  timestamp: number;
}

// Local verdicts (EXPIRED, MALFORMED) are not terminal: the network may
// still decide the transaction through votes this node receives.
const TRANSITIONS: Record<TransactionState, readonly TransactionState[]> = {
  [TransactionState.CREATED]: [TransactionState.BROADCAST],
  [TransactionState.BROADCAST]: [TransactionState.FINALIZED, TransactionState.REJECTED],
  [TransactionState.PENDING_VERIFICATION]: [
    TransactionState.VOTED,
    TransactionState.EXPIRED,
    TransactionState.MALFORMED
  ],
  [TransactionState.VOTED]: [TransactionState.FINALIZED, TransactionState.REJECTED],
  [TransactionState.EXPIRED]: [TransactionState.FINALIZED, TransactionState.REJECTED],
  [TransactionState.MALFORMED]: [TransactionState.FINALIZED, TransactionState.REJECTED],
  [TransactionState.FINALIZED]: [],
  [TransactionState.REJECTED]: []
};

// States a transaction may enter without this node having seen it first
const ENTRY_STATES: readonly TransactionState[] = [
  TransactionState.CREATED,
  TransactionState.PENDING_VERIFICATION,
  TransactionState.FINALIZED,
  TransactionState.REJECTED
];

export class TransactionLifecycle {
  private states: Map<string, TransactionState> = new Map();

  public get(transactionId: string): TransactionState | undefined {
    return this.states.get(transactionId);
  }

  public canTransition(transactionId: string, to: TransactionState): boolean {
    const from = this.states.get(transactionId);
    if (from === undefined) return ENTRY_STATES.includes(to);
    return TRANSITIONS[from].includes(to);
  }

  /**
   * Move a transaction to a new state; invalid moves are programmer errors
   */
  public transition(transactionId: string, to: TransactionState, timestamp: number): StateTransition {
    const from = this.states.get(transactionId) ?? null;
    if (!this.canTransition(transactionId, to)) {
      throw new Error(`Invalid transition for ${transactionId}: ${from ?? 'NONE'} -> ${to}`);
    }
    this.states.set(transactionId, to);
    return { transactionId, from, to, timestamp };
  }

  public countIn(state: TransactionState): number {
    let count = 0;
    for (const current of this.states.values()) {
      if (current === state) count++;
    }
    return count;
  }
}

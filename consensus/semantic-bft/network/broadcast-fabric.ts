// consensus/semantic-bft/network/broadcast-fabric.ts
// In-process delivery of transactions and votes between registered participants

import { EventEmitter } from 'events';
import { FabricEndpoint, FabricMessage, MessageFabric, NodeId } from '../core/types';
import { SeededRandom } from '../core/random/seeded-random';
import { SimulationError } from '../core/errors';

export interface HopLatency {
  base: number;
  jitter: number;
}

export class BroadcastFabric extends EventEmitter implements MessageFabric {
  private endpoints: Map<NodeId, FabricEndpoint> = new Map();
  private messageOverhead = 0;
  private deliveries = 0;

  constructor(
    private readonly rng: SeededRandom,
    private readonly hopLatency: HopLatency = { base: 0, jitter: 0 }
  ) {
    super();
  }

  public register(endpoint: FabricEndpoint): void {
    if (this.endpoints.has(endpoint.id)) {
      throw new Error(`Participant ${endpoint.id} is already registered`);
    }
    this.endpoints.set(endpoint.id, endpoint);
  }

  /**
   * Fan a message out to every participant but the sender.
   * Per-receiver order follows call order; nothing is dropped or retried.
   */
  public broadcast(senderId: NodeId, message: FabricMessage, sentAt: number): void {
    for (const endpoint of this.endpoints.values()) {
      if (endpoint.id === senderId) continue;
      endpoint.deliver({
        message,
        senderId,
        sentAt,
        deliverAt: sentAt + this.sampleLatency()
      });
      this.deliveries++;
    }

    this.messageOverhead += Math.max(this.endpoints.size - 1, 0);
    this.emit('message:broadcast', { senderId, kind: message.kind, sentAt });
  }

  /**
   * Resolve once every mailbox is empty, including messages sent while
   * draining. Rejects with the first actor failure.
   */
  public async settle(): Promise<void> {
    for (;;) {
      this.throwIfFailed();
      const busy = [...this.endpoints.values()].filter(endpoint => endpoint.isBusy());
      if (busy.length === 0) break;
      await Promise.all(busy.map(endpoint => endpoint.whenIdle()));
    }
  }

  public getMessageOverhead(): number {
    return this.messageOverhead;
  }

  public getDeliveryCount(): number {
    return this.deliveries;
  }

  public getParticipantCount(): number {
    return this.endpoints.size;
  }

  private sampleLatency(): number {
    return this.hopLatency.base + this.rng.uniform(0, this.hopLatency.jitter);
  }

  private throwIfFailed(): void {
    for (const endpoint of this.endpoints.values()) {
      const failure = endpoint.getFailure();
      if (failure === null) continue;
      if (failure instanceof SimulationError) throw failure;
      throw new SimulationError(failure.message, endpoint.id, failure);
    }
  }
}

// consensus/semantic-bft/tests/helpers.ts
// Shared fixtures for the simulator tests

import winston from 'winston';
import { ConfigOverrides, SemanticBftConfig, resolveConfig } from '../core/config/config-manager';
import { ConceptCodec } from '../core/concept/concept-codec';
import { FabricMessage, MessageFabric, NodeId, Transaction } from '../core/types';

export const SILENT: ConfigOverrides = { logging: { silent: true } };

export function testConfig(overrides: ConfigOverrides = {}): SemanticBftConfig {
  return resolveConfig({ ...overrides, logging: { ...overrides.logging, silent: true } });
}

export function silentLogger(): winston.Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}

export interface SentMessage {
  senderId: NodeId;
  message: FabricMessage;
  sentAt: number;
}

export class RecordingFabric implements MessageFabric {
  public readonly sent: SentMessage[] = [];

  public broadcast(senderId: NodeId, message: FabricMessage, sentAt: number): void {
    this.sent.push({ senderId, message, sentAt });
  }

  public votes(): SentMessage[] {
    return this.sent.filter(entry => entry.message.kind === 'vote');
  }
}

// Small, flat vector: no variance, no extreme value, never reaches the similarity check
export const CALM_VALUES: readonly number[] = [0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1];

export function makeTransaction(
  codec: ConceptCodec,
  values: readonly number[],
  options: { id?: string; originator?: string; timestamp?: number; corrupted?: boolean; digest?: string } = {}
): Transaction {
  const originator = options.originator ?? 'node-origin';
  const timestamp = options.timestamp ?? 0;
  return {
    id: options.id ?? `tx-${originator}-1`,
    conceptVector: { values, timestamp, nodeId: originator, isCorrupted: options.corrupted ?? false },
    semanticDigest: options.digest ?? codec.digest(values),
    timestamp,
    originator,
    crossDomain: false
  };
}

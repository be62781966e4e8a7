// consensus/semantic-bft/index.ts
// Public surface of the semantic BFT simulator

export * from './core/types';
export * from './core/errors';
export {
  ConfigManager,
  configSchema,
  LOG_LEVELS,
  loadConfig,
  parseConfig,
  resolveConfig
} from './core/config/config-manager';
export type {
  AdversaryConfig,
  ConfigOverrides,
  DeepPartial,
  DomainsConfig,
  LoggingConfig,
  NetworkConfig,
  SemanticBftConfig,
  VerifierConfig
} from './core/config/config-manager';
export { SeededRandom, deriveSeed } from './core/random/seeded-random';
export { ConceptCodec, DIGEST_LENGTH } from './core/concept/concept-codec';
export { cosineSimilarity, populationVariance } from './core/concept/vector-math';
export { SemanticVerifier } from './core/validation/semantic-verifier';
export { VoteAggregator, requiredVotes } from './core/voting/vote-aggregator';
export type { ConsensusDecision, VoteOutcome, VoteTally } from './core/voting/vote-aggregator';
export { TransactionLifecycle } from './core/state/transaction-lifecycle';
export { NodeActor, nodeSettingsFrom } from './core/state/node-actor';
export type { NodeSettings, NodeActorOptions, ReceiveOutcome, FinalizedEvent } from './core/state/node-actor';
export { BroadcastFabric } from './network/broadcast-fabric';
export { RoundScheduler } from './network/round-scheduler';
export { SaeModel } from './domains/sae-model';
export { Domain } from './domains/domain';
export { CrossDomainCoordinator } from './domains/cross-domain-coordinator';
export { VehicleFleet } from './domains/vehicle-fleet';
export * from './analytics/performance-analytics';
export { createLogger, resolveLogLevel } from './monitoring/logger';
export type { LogLevel } from './monitoring/logger';
export { SimulationMonitor } from './monitoring/simulation-monitor';
export {
  SimulationOrchestrator,
  run,
  runMultiDomain
} from './integration/simulation-orchestrator';
export type {
  MultiDomainOptions,
  RunOptions,
  SeedRunSummary,
  SweepPoint
} from './integration/simulation-orchestrator';

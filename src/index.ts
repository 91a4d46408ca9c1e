// Core contracts (host-agnostic)
export type {
  PlayerId,
  Transition,
  StateMachine,
  TransitionEvent,
  StateProgram,
  StateProgramFactory,
} from './shared/types/stateProgram';
export type { ReplicatedEvent, ReplicationSink } from './shared/types/replication';
export {
  createPlayerEvent,
  createSuspendedEvent,
  isProgramOriginated,
  asFiredEvent,
  querySuspendedEvent,
} from './shared/engine/transitionEvent';
export {
  StateMachineContainerProgram,
  StateMachineContainerProgramFactory,
  DefaultStateProgramFactory,
  type DefaultConstructor,
} from './shared/engine/containerProgram';
export { fingerprintState, hashState } from './shared/engine/fingerprint';
export {
  createEmptySlot,
  resolveSuspendedEventSlot,
  type SuspendedEventSlot,
  type SuspendedEventSlotChange,
  type SuspendedEventSlotUpdate,
} from './shared/stateMachines/suspendedEventSlot';
export {
  ReplayEngine,
  replayTransitionLog,
  type ReplayEngineOptions,
  type ReplayStepResult,
} from './shared/replay/ReplayEngine';
export {
  PlayerIdSchema,
  TransitionEventEnvelopeSchema,
  ReplicatedEventEnvelopeSchema,
  parseTransitionEvent,
  parseReplicatedEvent,
} from './shared/validation/transitionSchemas';
export * from './shared/errors';

// Reference programs
export { CounterMachine, CounterTransitionSchema, type CounterTransition } from './shared/programs/CounterMachine';
export {
  CountdownProgram,
  CountdownProgramFactory,
  CountdownTransitionSchema,
  COUNTDOWN_START,
  type CountdownTransition,
} from './shared/programs/CountdownProgram';
export {
  TurnTimerProgram,
  TurnTimerTransitionSchema,
  type TurnTimerTransition,
} from './shared/programs/TurnTimerProgram';

// Authoritative host
export {
  ProgramSession,
  type ProgramSessionOptions,
  type SessionStatus,
  type AdmissionDecision,
  type AdmissionGuard,
} from './server/game/ProgramSession';
export {
  ProgramSessionManager,
  type ProgramSessionManagerOptions,
} from './server/game/ProgramSessionManager';
export {
  SuspendedEventTimer,
  globalTimerHost,
  type TimerHost,
  type SuspendedEventTimerOptions,
} from './server/game/timers/SuspendedEventTimer';
export { config, buildConfig, type AppConfig } from './server/config';
export { logger, createSessionLogger } from './server/utils/logger';

// Follower
export { ProgramReplica, type ProgramReplicaOptions } from './client/replica/ProgramReplica';

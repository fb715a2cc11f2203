export { CheckpointSchema, type Checkpoint } from "./checkpoint.js"
export {
  HistoryCompactor,
  type CompactionAlert,
  type CompactionOptions,
  type CompactionOutcome,
} from "./compactor.js"
export { CorruptCheckpointError, loadEntityHistory, type HydrationResult } from "./hydration.js"
export {
  assertValidTransition,
  InvalidTransitionError,
  isValidTransition,
  VALID_TRANSITIONS,
  type LifecycleListener,
  type LifecycleTransitionEvent,
} from "./lifecycle.js"
export { MailboxClosedError, PriorityMailbox, type MessagePriority } from "./mailbox.js"
export { ActorMessageSchema, type ActorMessage, type InternalMessage } from "./messages.js"
export {
  EntityStateMachine,
  type EntityDeps,
  type EntityOptions,
  type HandleOutcome,
  type RecoveredHistory,
} from "./state-machine.js"

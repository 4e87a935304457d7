/**
 * tickfsm - Hierarchical finite state machines driven by a host tick
 *
 * - Nested machines: a StateMachine is also a state
 * - Instant or exit-time transitions, ghost pass-through states
 * - Hybrid machines with before/after lifecycle hooks
 * - Typed user actions dispatched down the active state path
 * - Zero runtime dependencies
 */

export const VERSION = '1.0.0';

// Core exports
export { StateMachine, createStateMachine, DEFAULT_MAX_GHOST_CHAIN } from './state-machine.js';
export type { StateMachineOptions, RequestStateChangeOptions } from './state-machine.js';
export { HybridStateMachine, createHybridStateMachine } from './hybrid-state-machine.js';
export type { HybridStateMachineOptions, HybridHook, HybridLogicHook } from './hybrid-state-machine.js';
export { StateBase, State } from './state.js';
export type { StateOptions } from './state.js';

// Transitions
export { TransitionBase, Transition, TransitionAfter, ReverseTransition, ExitTransition } from './transition.js';
export type { TransitionOptions, TransitionAfterOptions, ExitTransitionOptions } from './transition.js';
export {
  InputDownTransition,
  InputUpTransition,
  InputPressTransition,
  InputReleaseTransition,
} from './input-transitions.js';
export type { InputSource } from './input-transitions.js';

// Utilities
export { Timer, defaultTimeSource } from './timer.js';
export { ActionStorage, matchesType } from './action-storage.js';
export type {
  ActionType,
  ActionDataOf,
  ActionHandler,
  ActionEntry,
  AddActionArgs,
  Constructor,
  PrimitiveTypeName,
} from './action-storage.js';

// Export all types and interfaces
export { ANY_STATE, isAnyState, isTriggerable } from './types.js';
export type { AnyState, TransitionSource, TimeSource, ActionArgs, IStateMachine, ITriggerable } from './types.js';

// Export error classes
export { StateMachineError, NotInitializedError, GhostChainError, ActionTypeMismatchError } from './types.js';

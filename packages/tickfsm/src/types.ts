/**
 * Type definitions for tickfsm
 *
 * Shared contracts between states, transitions and machines, plus the
 * error classes raised for configuration and misuse.
 */

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Wildcard source for transitions that apply to any active state
 */
export const ANY_STATE: unique symbol = Symbol('tickfsm.anyState');

export type AnyState = typeof ANY_STATE;

/**
 * Source of a transition - a state id, or the any-state wildcard
 */
export type TransitionSource<TStateId> = TStateId | AnyState;

/**
 * Monotonic clock sampled by timers (milliseconds by default)
 */
export type TimeSource = () => number;

/**
 * Arguments of an action dispatch: none, or exactly one data value
 */
export type ActionArgs = [] | [data: unknown];

// ============================================================================
// Machine contracts
// ============================================================================

/**
 * What a state can see of the machine that owns it
 */
export interface IStateMachine {
  /** Grant the pending exit request of the active state */
  stateCanExit(): void;

  /** Whether a transition is waiting for the active state to allow its exit */
  readonly hasPendingTransition: boolean;

  /** Whether debug tracing is on for this machine */
  readonly debugEnabled: boolean;
}

/**
 * A state that reacts to trigger events (nested machines)
 */
export interface ITriggerable<TEvent> {
  trigger(event: TEvent): boolean;
}

// ============================================================================
// Type Guards
// ============================================================================

export const isAnyState = (value: unknown): value is AnyState => value === ANY_STATE;

export const isTriggerable = <TEvent>(state: object): state is ITriggerable<TEvent> =>
  'trigger' in state && typeof state.trigger === 'function';

export const describeId = (id: unknown): string => (isAnyState(id) ? '*' : String(id));

// ============================================================================
// Errors
// ============================================================================

/**
 * Configuration or misuse of a state machine
 */
export class StateMachineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StateMachineError';
  }
}

/**
 * Runtime call on a machine that has not been entered yet
 */
export class NotInitializedError extends StateMachineError {
  constructor(operation: string, machine: string) {
    super(
      `Cannot run ${operation} on ${machine} before it is initialized. ` +
        'Call init() on the root machine (or let the parent enter it) first.'
    );
    this.name = 'NotInitializedError';
  }
}

/**
 * Chain of ghost states that never settles on a stable state
 */
export class GhostChainError extends StateMachineError {
  constructor(
    public readonly path: string[],
    max: number
  ) {
    super(`Ghost state chain exceeded ${max} consecutive transitions: ${path.join(' -> ')}`);
    this.name = 'GhostChainError';
  }
}

/**
 * Action invoked with an argument that does not fit a registered handler
 */
export class ActionTypeMismatchError extends Error {
  constructor(
    public readonly trigger: string,
    public readonly expected: string,
    public readonly received: string
  ) {
    super(`Action "${trigger}" expects ${expected} but was run with ${received}`);
    this.name = 'ActionTypeMismatchError';
  }
}

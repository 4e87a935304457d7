/**
 * States - the units of behaviour a machine switches between
 */

import { Timer, defaultTimeSource } from './timer.js';
import {
  ActionStorage,
  createActionEntry,
  type ActionHandler,
  type ActionType,
  type AddActionArgs,
} from './action-storage.js';
import type { ActionArgs, IStateMachine, TimeSource } from './types.js';

/**
 * Base of every state, including nested machines
 *
 * Lifecycle, driven by the owning machine:
 * - init() once, when the state is added
 * - onEnter() once per activation
 * - onLogic(delta) every tick while active
 * - onExitRequest() when a transition waits for this state to allow its exit
 * - onExit() once per deactivation
 */
export class StateBase<TStateId = string, TEvent = string> {
  readonly needsExitTime: boolean;
  readonly isGhostState: boolean;

  /** Id under which the owning machine registered this state */
  name: TStateId | undefined = undefined;

  /** Owning machine, set when the state is added */
  fsm: IStateMachine | undefined = undefined;

  /**
   * @param needsExitTime - the state decides when it may be left (see onExitRequest)
   * @param isGhostState - pass-through state: its outgoing transitions are tested right after entering
   */
  constructor(needsExitTime = false, isGhostState = false) {
    this.needsExitTime = needsExitTime;
    this.isGhostState = isGhostState;
  }

  init(): void {}

  onEnter(): void {}

  onLogic(_delta: number): void {}

  /**
   * A transition away from this state is pending
   * States without exit time let it through at once
   */
  onExitRequest(): void {
    if (!this.needsExitTime) {
      this.fsm?.stateCanExit();
    }
  }

  onExit(): void {}

  onAction(_trigger: TEvent, ..._args: ActionArgs): void {}

  getActiveHierarchyPath(): string {
    return this.name === undefined ? '' : String(this.name);
  }
}

/**
 * Options for callback-driven states
 */
export interface StateOptions<TStateId = string, TEvent = string> {
  onEnter?: (state: State<TStateId, TEvent>) => void;
  onLogic?: (state: State<TStateId, TEvent>, delta: number) => void;
  onExit?: (state: State<TStateId, TEvent>) => void;

  /** Polled while an exit is pending; returning true lets the transition complete */
  canExit?: (state: State<TStateId, TEvent>) => boolean;

  needsExitTime?: boolean;
  isGhostState?: boolean;

  /** Clock for the state's timer */
  timeSource?: TimeSource;
}

/**
 * State built from callbacks, with its own timer and actions
 *
 * @example
 * ```ts
 * const attack = new State({
 *   onEnter: () => sword.swing(),
 *   canExit: (state) => state.timer.isElapsedAtLeast(500),
 *   needsExitTime: true,
 * });
 * ```
 */
export class State<TStateId = string, TEvent = string> extends StateBase<TStateId, TEvent> {
  readonly timer: Timer;

  private readonly options: StateOptions<TStateId, TEvent>;

  /**
   * Lazily initialized
   */
  private actionStorage: ActionStorage<TEvent> | undefined;

  constructor(options: StateOptions<TStateId, TEvent> = {}) {
    super(options.needsExitTime ?? false, options.isGhostState ?? false);
    this.options = options;
    this.timer = new Timer(options.timeSource ?? defaultTimeSource);
  }

  onEnter(): void {
    this.timer.reset();
    this.options.onEnter?.(this);
  }

  onLogic(delta: number): void {
    this.options.onLogic?.(this, delta);

    if (this.needsExitTime && this.options.canExit && this.fsm?.hasPendingTransition && this.options.canExit(this)) {
      this.fsm.stateCanExit();
    }
  }

  /**
   * Without canExit, a state with exit time waits for an explicit
   * fsm.stateCanExit() call
   */
  onExitRequest(): void {
    if (!this.needsExitTime || (this.options.canExit && this.options.canExit(this))) {
      this.fsm?.stateCanExit();
    }
  }

  onExit(): void {
    this.options.onExit?.(this);
  }

  onAction(trigger: TEvent, ...args: ActionArgs): void {
    this.actionStorage?.runAction(trigger, ...args);
  }

  /**
   * Add a user-defined action, run by onAction()
   *
   * @returns Itself
   */
  addAction(trigger: TEvent, handler: () => void): this;
  addAction<T extends ActionType>(trigger: TEvent, type: T, handler: ActionHandler<T>): this;
  addAction<T extends ActionType>(trigger: TEvent, ...args: AddActionArgs<T>): this {
    this.actionStorage ??= new ActionStorage<TEvent>();
    this.actionStorage.addEntry(trigger, createActionEntry(trigger, args));

    // Fluent interface
    return this;
  }
}

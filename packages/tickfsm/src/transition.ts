/**
 * Transitions - directed edges between states
 *
 * A machine polls shouldTransition() of the candidate transitions once per
 * logic tick; the first one returning true fires.
 */

import { Timer, defaultTimeSource } from './timer.js';
import { ANY_STATE, StateMachineError, isAnyState, type IStateMachine, type TimeSource, type TransitionSource } from './types.js';

export abstract class TransitionBase<TStateId = string> {
  readonly from: TransitionSource<TStateId>;
  readonly to: TStateId;

  /** Leave the active state even if it needs exit time */
  readonly forceInstantly: boolean;

  /** Machine the transition was added to */
  fsm: IStateMachine | undefined = undefined;

  constructor(from: TransitionSource<TStateId>, to: TStateId, forceInstantly = false) {
    this.from = from;
    this.to = to;
    this.forceInstantly = forceInstantly;
  }

  /** Called once, when added to a machine */
  init(): void {}

  /** Called every time the source state is entered */
  onEnter(): void {}

  abstract shouldTransition(): boolean;

  /** Runs before the active state exits */
  beforeTransition(): void {}

  /** Runs after the target state has been entered */
  afterTransition(): void {}
}

/**
 * Options for predicate-based transitions
 */
export interface TransitionOptions<TStateId = string> {
  /** Predicate; a transition without one always fires */
  condition?: (transition: Transition<TStateId>) => boolean;

  forceInstantly?: boolean;

  onTransition?: (transition: Transition<TStateId>) => void;
  afterTransition?: (transition: Transition<TStateId>) => void;
}

export class Transition<TStateId = string> extends TransitionBase<TStateId> {
  private readonly options: TransitionOptions<TStateId>;

  constructor(from: TransitionSource<TStateId>, to: TStateId, options: TransitionOptions<TStateId> = {}) {
    super(from, to, options.forceInstantly ?? false);
    this.options = options;
  }

  shouldTransition(): boolean {
    return this.options.condition?.(this) ?? true;
  }

  beforeTransition(): void {
    this.options.onTransition?.(this);
  }

  afterTransition(): void {
    this.options.afterTransition?.(this);
  }
}

/**
 * Options for delayed transitions
 */
export interface TransitionAfterOptions<TStateId = string> {
  /** Extra predicate, tested once the delay has passed */
  condition?: (transition: TransitionAfter<TStateId>) => boolean;

  forceInstantly?: boolean;

  onTransition?: (transition: TransitionAfter<TStateId>) => void;
  afterTransition?: (transition: TransitionAfter<TStateId>) => void;

  timeSource?: TimeSource;
}

/**
 * Fires once the source state has been active for `delay`
 *
 * @example
 * ```ts
 * fsm.addTransition(new TransitionAfter('stunned', 'idle', 1500));
 * ```
 */
export class TransitionAfter<TStateId = string> extends TransitionBase<TStateId> {
  readonly delay: number;
  readonly timer: Timer;

  private readonly options: TransitionAfterOptions<TStateId>;

  constructor(
    from: TransitionSource<TStateId>,
    to: TStateId,
    delay: number,
    options: TransitionAfterOptions<TStateId> = {}
  ) {
    super(from, to, options.forceInstantly ?? false);
    this.delay = delay;
    this.options = options;
    this.timer = new Timer(options.timeSource ?? defaultTimeSource);
  }

  onEnter(): void {
    this.timer.reset();
  }

  shouldTransition(): boolean {
    if (this.timer.isElapsedLessThan(this.delay)) {
      return false;
    }
    return this.options.condition?.(this) ?? true;
  }

  beforeTransition(): void {
    this.options.onTransition?.(this);
  }

  afterTransition(): void {
    this.options.afterTransition?.(this);
  }
}

/**
 * Back edge of a transition, firing whenever the wrapped one would not
 */
export class ReverseTransition<TStateId = string> extends TransitionBase<TStateId> {
  readonly wrapped: TransitionBase<TStateId>;

  constructor(wrapped: TransitionBase<TStateId>) {
    const { from } = wrapped;
    if (isAnyState(from)) {
      throw new StateMachineError('Cannot reverse a transition from any state');
    }
    super(wrapped.to, from, wrapped.forceInstantly);
    this.wrapped = wrapped;
  }

  init(): void {
    this.wrapped.fsm = this.fsm;
    this.wrapped.init();
  }

  onEnter(): void {
    this.wrapped.onEnter();
  }

  shouldTransition(): boolean {
    return !this.wrapped.shouldTransition();
  }

  beforeTransition(): void {
    this.wrapped.beforeTransition();
  }

  afterTransition(): void {
    this.wrapped.afterTransition();
  }
}

/**
 * Options for exit transitions of nested machines
 */
export interface ExitTransitionOptions<TStateId = string> {
  condition?: (transition: ExitTransition<TStateId>) => boolean;

  /** Leave even if the machine's active state needs exit time */
  forceInstantly?: boolean;
}

/**
 * Lets a nested machine grant its parent's exit request
 *
 * Only tested while the parent waits for the nested machine to allow its exit.
 */
export class ExitTransition<TStateId = string> {
  readonly from: TransitionSource<TStateId>;
  readonly forceInstantly: boolean;

  private readonly options: ExitTransitionOptions<TStateId>;

  constructor(from: TransitionSource<TStateId> = ANY_STATE, options: ExitTransitionOptions<TStateId> = {}) {
    this.from = from;
    this.forceInstantly = options.forceInstantly ?? false;
    this.options = options;
  }

  shouldTransition(): boolean {
    return this.options.condition?.(this) ?? true;
  }
}

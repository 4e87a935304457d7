/**
 * StateMachine - tick-driven hierarchical state machine
 *
 * Owns a set of states and the transitions between them. The host calls
 * onLogic(delta) on the root machine once per tick; the machine runs the
 * active state's logic, then tests the transitions leaving it.
 *
 * A StateMachine is itself a state, so machines nest: a nested machine is
 * entered, ticked and exited by its parent like any other state.
 */

import { State, StateBase, type StateOptions } from './state.js';
import { defaultTimeSource } from './timer.js';
import {
  ExitTransition,
  ReverseTransition,
  Transition,
  TransitionBase,
  type ExitTransitionOptions,
  type TransitionOptions,
} from './transition.js';
import {
  ANY_STATE,
  GhostChainError,
  NotInitializedError,
  StateMachineError,
  describeId,
  isAnyState,
  isTriggerable,
  type ActionArgs,
  type IStateMachine,
  type ITriggerable,
  type TimeSource,
} from './types.js';

export const DEFAULT_MAX_GHOST_CHAIN = 64;

/**
 * Machine configuration
 */
export interface StateMachineOptions {
  /** As a nested state: wait for an exit transition before the parent may leave it */
  needsExitTime?: boolean;

  /** As a nested state: pass-through state */
  isGhostState?: boolean;

  /** Re-enter the last active state instead of the start state */
  rememberLastState?: boolean;

  /** Max ghost states entered within one lifecycle call (default: 64) */
  maxGhostChain?: number;

  /** Trace lifecycle and transitions on console.debug (default: inherited from the parent, else false) */
  debug?: boolean;

  /** Clock for the states built by addState(id, options) */
  timeSource?: TimeSource;
}

interface ResolvedOptions {
  rememberLastState: boolean;
  maxGhostChain: number;
  debug: boolean | undefined;
  timeSource: TimeSource;
}

interface ActiveState<TStateId, TEvent> {
  id: TStateId;
  state: StateBase<TStateId, TEvent>;
}

/**
 * Transition waiting for the active state to allow its exit
 */
type PendingTransition<TStateId> =
  | { kind: 'state'; target: TStateId; transition: TransitionBase<TStateId> | undefined }
  | { kind: 'exit'; transition: ExitTransition<TStateId> };

export interface RequestStateChangeOptions {
  forceInstantly?: boolean;
}

export class StateMachine<TOwnId = string, TStateId = TOwnId, TEvent = string>
  extends StateBase<TOwnId, TEvent>
  implements IStateMachine, ITriggerable<TEvent>
{
  private states = new Map<TStateId, StateBase<TStateId, TEvent>>();
  private startState: { id: TStateId } | undefined = undefined;
  private lastState: { id: TStateId } | undefined = undefined;
  private active: ActiveState<TStateId, TEvent> | undefined = undefined;
  private pending: PendingTransition<TStateId> | undefined = undefined;

  /** The parent waits for an exit transition of this machine */
  private exitRequested = false;

  private transitionsFrom = new Map<TStateId, TransitionBase<TStateId>[]>();
  private transitionsFromAny: TransitionBase<TStateId>[] = [];
  private triggerTransitionsFrom = new Map<TStateId, Map<TEvent, TransitionBase<TStateId>[]>>();
  private triggerTransitionsFromAny = new Map<TEvent, TransitionBase<TStateId>[]>();
  private exitTransitionsFrom = new Map<TStateId, ExitTransition<TStateId>[]>();
  private exitTransitionsFromAny: ExitTransition<TStateId>[] = [];

  private options: ResolvedOptions;
  private lifecycleDepth = 0;
  private stateChanges = 0;

  /** Ghost states entered since the outermost lifecycle call began */
  private ghostPath: string[] = [];

  constructor(options: StateMachineOptions = {}) {
    super(options.needsExitTime ?? false, options.isGhostState ?? false);
    this.options = {
      rememberLastState: options.rememberLastState ?? false,
      maxGhostChain: options.maxGhostChain ?? DEFAULT_MAX_GHOST_CHAIN,
      debug: options.debug,
      timeSource: options.timeSource ?? defaultTimeSource,
    };

    if (this.options.maxGhostChain < 1) {
      throw new StateMachineError(`maxGhostChain must be at least 1, got ${this.options.maxGhostChain}`);
    }
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Register a state
   * Without a state instance, a State is built from the given options.
   * The first registered state is the start state unless setStartState() says otherwise.
   *
   * @example
   * ```ts
   * fsm
   *   .addState('idle', { onLogic: () => look.around() })
   *   .addState('combat', combatFsm);
   * ```
   */
  addState(id: TStateId, state?: StateBase<TStateId, TEvent> | StateOptions<TStateId, TEvent>): this {
    this.assertConfigurable('addState');

    if (this.states.has(id)) {
      throw new StateMachineError(`State "${describeId(id)}" is already registered in ${this.describe()}`);
    }

    const instance =
      state instanceof StateBase
        ? state
        : new State<TStateId, TEvent>({ timeSource: this.options.timeSource, ...state });

    this.assertCanAdopt(instance, id);

    instance.name = id;
    instance.fsm = this;
    this.states.set(id, instance);
    this.startState ??= { id };
    instance.init();

    this.log('State added', { state: describeId(id), totalStates: this.states.size });

    return this;
  }

  setStartState(id: TStateId): this {
    this.assertConfigurable('setStartState');
    this.startState = { id };
    return this;
  }

  /**
   * Register a transition
   * A transition whose source is ANY_STATE is tested from every state.
   */
  addTransition(transition: TransitionBase<TStateId>): this;
  addTransition(from: TStateId, to: TStateId, options?: TransitionOptions<TStateId>): this;
  addTransition(
    ...args:
      | [transition: TransitionBase<TStateId>]
      | [from: TStateId, to: TStateId, options?: TransitionOptions<TStateId>]
  ): this {
    this.assertConfigurable('addTransition');
    const transition = args.length === 1 ? args[0] : new Transition<TStateId>(args[0], args[1], args[2]);
    this.registerTransition(transition);
    return this;
  }

  addTransitionFromAny(transition: TransitionBase<TStateId>): this;
  addTransitionFromAny(to: TStateId, options?: TransitionOptions<TStateId>): this;
  addTransitionFromAny(
    ...args: [transition: TransitionBase<TStateId>] | [to: TStateId, options?: TransitionOptions<TStateId>]
  ): this {
    this.assertConfigurable('addTransitionFromAny');
    const first = args[0];
    const options = args.length === 2 ? args[1] : undefined;
    const transition =
      first instanceof TransitionBase ? first : new Transition<TStateId>(ANY_STATE, first, options);

    if (!isAnyState(transition.from)) {
      throw new StateMachineError(
        `addTransitionFromAny() needs a transition from ANY_STATE, got one from "${describeId(transition.from)}"`
      );
    }

    this.registerTransition(transition);
    return this;
  }

  /**
   * Register a transition and its reverse, which fires whenever the
   * forward condition is false
   */
  addTwoWayTransition(transition: TransitionBase<TStateId>): this;
  addTwoWayTransition(from: TStateId, to: TStateId, options?: TransitionOptions<TStateId>): this;
  addTwoWayTransition(
    ...args:
      | [transition: TransitionBase<TStateId>]
      | [from: TStateId, to: TStateId, options?: TransitionOptions<TStateId>]
  ): this {
    this.assertConfigurable('addTwoWayTransition');
    const transition = args.length === 1 ? args[0] : new Transition<TStateId>(args[0], args[1], args[2]);
    const reverse = new ReverseTransition(transition);
    this.registerTransition(transition);
    this.registerTransition(reverse);
    return this;
  }

  /**
   * Register a transition tested only when trigger(event) is called
   */
  addTriggerTransition(trigger: TEvent, transition: TransitionBase<TStateId>): this;
  addTriggerTransition(trigger: TEvent, from: TStateId, to: TStateId, options?: TransitionOptions<TStateId>): this;
  addTriggerTransition(
    ...args:
      | [trigger: TEvent, transition: TransitionBase<TStateId>]
      | [trigger: TEvent, from: TStateId, to: TStateId, options?: TransitionOptions<TStateId>]
  ): this {
    this.assertConfigurable('addTriggerTransition');
    const transition = args.length === 2 ? args[1] : new Transition<TStateId>(args[1], args[2], args[3]);
    this.registerTriggerTransition(args[0], transition);
    return this;
  }

  addTriggerTransitionFromAny(trigger: TEvent, transition: TransitionBase<TStateId>): this;
  addTriggerTransitionFromAny(trigger: TEvent, to: TStateId, options?: TransitionOptions<TStateId>): this;
  addTriggerTransitionFromAny(
    ...args:
      | [trigger: TEvent, transition: TransitionBase<TStateId>]
      | [trigger: TEvent, to: TStateId, options?: TransitionOptions<TStateId>]
  ): this {
    this.assertConfigurable('addTriggerTransitionFromAny');
    const trigger = args[0];
    const second = args[1];
    const options = args.length === 3 ? args[2] : undefined;
    const transition =
      second instanceof TransitionBase ? second : new Transition<TStateId>(ANY_STATE, second, options);

    if (!isAnyState(transition.from)) {
      throw new StateMachineError(
        `addTriggerTransitionFromAny() needs a transition from ANY_STATE, got one from "${describeId(transition.from)}"`
      );
    }

    this.registerTriggerTransition(trigger, transition);
    return this;
  }

  /**
   * Let this machine, as a nested state with exit time, allow its parent to
   * leave it while `from` is active
   */
  addExitTransition(from: TStateId, options?: ExitTransitionOptions<TStateId>): this {
    this.assertConfigurable('addExitTransition');
    const list = this.exitTransitionsFrom.get(from) ?? [];
    list.push(new ExitTransition<TStateId>(from, options));
    this.exitTransitionsFrom.set(from, list);
    return this;
  }

  addExitTransitionFromAny(options?: ExitTransitionOptions<TStateId>): this {
    this.assertConfigurable('addExitTransitionFromAny');
    this.exitTransitionsFromAny.push(new ExitTransition<TStateId>(ANY_STATE, options));
    return this;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Start a root machine
   * Nested machines are entered by their parent, so this is a no-op for them.
   */
  init(): void {
    if (this.fsm) {
      return;
    }
    this.onEnter();
  }

  onEnter(): void {
    this.assertInactive();

    this.run(() => {
      const startId = this.validateConfiguration();
      const entryId = this.options.rememberLastState && this.lastState ? this.lastState.id : startId;

      this.pending = undefined;
      this.exitRequested = false;

      this.log('Machine entered', { state: describeId(entryId) });
      this.changeState(entryId, undefined);
    });
  }

  /**
   * Run the active state's logic, then test the transitions leaving it
   * At most one transition fires per tick (ghost states aside).
   *
   * @throws NotInitializedError before the machine was entered
   */
  onLogic(delta: number): void {
    const active = this.assertInitialized('onLogic');

    this.run(() => {
      const changes = this.stateChanges;
      active.state.onLogic(delta);

      // The active state granted a pending exit, or a descendant exited us
      if (this.stateChanges !== changes || !this.active) {
        return;
      }

      if (this.exitRequested && this.pending?.kind !== 'exit' && this.tryAllExitTransitions()) {
        return;
      }

      this.tryAllTransitions();
    });
  }

  /**
   * The parent waits to leave this machine
   * A machine with exit time only lets it through once an exit transition fires.
   */
  onExitRequest(): void {
    if (!this.needsExitTime) {
      this.fsm?.stateCanExit();
      return;
    }

    this.exitRequested = true;
    this.log('Exit requested by parent');
    this.run(() => {
      this.tryAllExitTransitions();
    });
  }

  /**
   * Exit the active state; a pending transition is cancelled first
   */
  onExit(): void {
    const active = this.active;
    if (!active) {
      return;
    }

    this.run(() => {
      if (this.pending) {
        this.log('Pending transition cancelled', { state: describeId(active.id) });
      }
      this.pending = undefined;
      this.exitRequested = false;

      active.state.onExit();

      if (this.options.rememberLastState) {
        this.lastState = { id: active.id };
      }
      this.active = undefined;
      this.log('Machine exited', { state: describeId(active.id) });
    });
  }

  /**
   * Dispatch a user-defined action to the active state
   *
   * @throws NotInitializedError before the machine was entered
   */
  onAction(trigger: TEvent, ...args: ActionArgs): void {
    const active = this.assertInitialized('onAction');
    this.run(() => {
      active.state.onAction(trigger, ...args);
    });
  }

  /**
   * Test the trigger transitions of the active state; when none fires,
   * pass the trigger on to a nested machine
   *
   * @returns true when a transition fired at this level or below
   */
  trigger(event: TEvent): boolean {
    const active = this.assertInitialized('trigger');

    return this.run(() => {
      if (this.tryTriggerTransitions(event, active.id)) {
        return true;
      }
      const { state } = active;
      return isTriggerable<TEvent>(state) ? state.trigger(event) : false;
    });
  }

  /**
   * Switch state from outside, with the same exit-time rules as transitions
   */
  requestStateChange(id: TStateId, options: RequestStateChangeOptions = {}): void {
    this.assertInitialized('requestStateChange');
    this.assertKnownState(id);
    this.run(() => {
      this.requestTransition(id, options.forceInstantly ?? false, undefined);
    });
  }

  /**
   * Allow the pending transition to complete
   * Called by the active state once it is ready to be left.
   *
   * @throws StateMachineError when no exit request is pending
   */
  stateCanExit(): void {
    const pending = this.pending;
    if (!pending) {
      throw new StateMachineError(`stateCanExit() called on ${this.describe()} without a pending exit request`);
    }
    this.pending = undefined;

    this.run(() => {
      if (pending.kind === 'exit') {
        this.grantParentExit();
        return;
      }
      this.log('Exit granted', { to: describeId(pending.target) });
      this.changeState(pending.target, pending.transition);
    });
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  get activeState(): StateBase<TStateId, TEvent> | undefined {
    return this.active?.state;
  }

  get activeStateName(): TStateId | undefined {
    return this.active?.id;
  }

  get isInitialized(): boolean {
    return this.active !== undefined;
  }

  get hasPendingTransition(): boolean {
    return this.pending !== undefined;
  }

  get debugEnabled(): boolean {
    return this.options.debug ?? this.fsm?.debugEnabled ?? false;
  }

  getState(id: TStateId): StateBase<TStateId, TEvent> {
    return this.assertKnownState(id);
  }

  stateNames(): TStateId[] {
    return Array.from(this.states.keys());
  }

  /**
   * Path of active states from this machine down, e.g. "/combat/attack"
   */
  getActiveHierarchyPath(): string {
    const own = this.name === undefined ? '' : String(this.name);
    if (!this.active) {
      return own;
    }
    return `${own}/${this.active.state.getActiveHierarchyPath()}`;
  }

  /**
   * Enable/disable debug tracing
   */
  debug(enabled: boolean): void {
    this.options.debug = enabled;
    console.debug(`[tickfsm] Debug mode ${enabled ? 'enabled' : 'disabled'}`, { machine: this.describe() });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /**
   * Run a lifecycle call; configuration is locked while it runs
   */
  protected run<T>(fn: () => T): T {
    this.lifecycleDepth++;
    try {
      return fn();
    } finally {
      this.lifecycleDepth--;
      if (this.lifecycleDepth === 0) {
        this.ghostPath = [];
      }
    }
  }

  protected assertInactive(): void {
    if (this.active) {
      throw new StateMachineError(`${this.describe()} is already active`);
    }
  }

  protected assertInitialized(operation: string): ActiveState<TStateId, TEvent> {
    if (!this.active) {
      throw new NotInitializedError(operation, this.describe());
    }
    return this.active;
  }

  protected log(message: string, detail: Record<string, unknown> = {}): void {
    if (!this.debugEnabled) {
      return;
    }
    console.debug(`[tickfsm] ${message}`, { machine: this.describe(), ...detail });
  }

  protected describe(): string {
    return this.name === undefined ? 'root machine' : `machine "${String(this.name)}"`;
  }

  private assertConfigurable(operation: string): void {
    if (this.lifecycleDepth > 0) {
      throw new StateMachineError(
        `Cannot ${operation}() on ${this.describe()} while it runs a lifecycle call`
      );
    }
  }

  private assertKnownState(id: TStateId): StateBase<TStateId, TEvent> {
    const state = this.states.get(id);
    if (!state) {
      throw new StateMachineError(`Unknown state "${describeId(id)}" in ${this.describe()}`);
    }
    return state;
  }

  /**
   * A state belongs to one machine, and a machine may not contain itself
   */
  private assertCanAdopt(state: StateBase<TStateId, TEvent>, id: TStateId): void {
    if (state.fsm !== undefined && state.fsm !== this) {
      throw new StateMachineError(`State "${describeId(id)}" already belongs to another machine`);
    }

    let node: StateBase<unknown, TEvent> | undefined = this;
    while (node) {
      if (node === state) {
        throw new StateMachineError(`State "${describeId(id)}" cannot contain itself`);
      }
      const parent: IStateMachine | undefined = node.fsm;
      node = parent instanceof StateBase ? parent : undefined;
    }
  }

  private registerTransition(transition: TransitionBase<TStateId>): void {
    transition.fsm = this;
    transition.init();

    const { from } = transition;
    if (isAnyState(from)) {
      this.transitionsFromAny.push(transition);
    } else {
      const list = this.transitionsFrom.get(from) ?? [];
      list.push(transition);
      this.transitionsFrom.set(from, list);
    }

    this.log('Transition added', { from: describeId(from), to: describeId(transition.to) });
  }

  private registerTriggerTransition(trigger: TEvent, transition: TransitionBase<TStateId>): void {
    transition.fsm = this;
    transition.init();

    const { from } = transition;
    let byTrigger: Map<TEvent, TransitionBase<TStateId>[]>;
    if (isAnyState(from)) {
      byTrigger = this.triggerTransitionsFromAny;
    } else {
      byTrigger = this.triggerTransitionsFrom.get(from) ?? new Map<TEvent, TransitionBase<TStateId>[]>();
      this.triggerTransitionsFrom.set(from, byTrigger);
    }

    const list = byTrigger.get(trigger) ?? [];
    list.push(transition);
    byTrigger.set(trigger, list);

    this.log('Trigger transition added', {
      trigger: describeId(trigger),
      from: describeId(from),
      to: describeId(transition.to),
    });
  }

  /**
   * Check every id referenced by the start state and transitions
   *
   * @returns The start state id
   */
  private validateConfiguration(): TStateId {
    if (this.states.size === 0) {
      throw new StateMachineError(`${this.describe()} has no states`);
    }
    if (!this.startState) {
      throw new StateMachineError(`${this.describe()} has no start state`);
    }
    this.assertKnownState(this.startState.id);

    for (const [from, transitions] of this.transitionsFrom) {
      this.assertKnownState(from);
      for (const transition of transitions) {
        this.assertKnownState(transition.to);
      }
    }
    for (const transition of this.transitionsFromAny) {
      this.assertKnownState(transition.to);
    }
    for (const [from, byTrigger] of this.triggerTransitionsFrom) {
      this.assertKnownState(from);
      for (const transitions of byTrigger.values()) {
        for (const transition of transitions) {
          this.assertKnownState(transition.to);
        }
      }
    }
    for (const transitions of this.triggerTransitionsFromAny.values()) {
      for (const transition of transitions) {
        this.assertKnownState(transition.to);
      }
    }
    for (const from of this.exitTransitionsFrom.keys()) {
      this.assertKnownState(from);
    }

    return this.startState.id;
  }

  /**
   * Exit the active state and enter `id`
   * Entering a ghost state tests its transitions right away.
   *
   * @throws GhostChainError past maxGhostChain ghost entries within one lifecycle call
   */
  private changeState(id: TStateId, transition: TransitionBase<TStateId> | undefined): void {
    const next = this.assertKnownState(id);
    const previous = this.active;

    if (next.isGhostState) {
      this.ghostPath.push(describeId(id));
      if (this.ghostPath.length > this.options.maxGhostChain) {
        throw new GhostChainError([...this.ghostPath], this.options.maxGhostChain);
      }
    }

    this.pending = undefined;
    transition?.beforeTransition();

    previous?.state.onExit();

    this.active = { id, state: next };
    this.stateChanges++;
    if (this.options.rememberLastState) {
      this.lastState = { id };
    }

    this.log('State changed', {
      from: previous ? describeId(previous.id) : undefined,
      to: describeId(id),
      forced: transition?.forceInstantly ?? false,
    });

    next.onEnter();

    for (const candidate of this.transitionsFrom.get(id) ?? []) {
      candidate.onEnter();
    }
    for (const candidate of this.transitionsFromAny) {
      candidate.onEnter();
    }
    for (const candidates of this.triggerTransitionsFrom.get(id)?.values() ?? []) {
      for (const candidate of candidates) {
        candidate.onEnter();
      }
    }
    for (const candidates of this.triggerTransitionsFromAny.values()) {
      for (const candidate of candidates) {
        candidate.onEnter();
      }
    }

    transition?.afterTransition();

    if (next.isGhostState && this.active?.state === next) {
      this.tryAllTransitions();
    }
  }

  /**
   * Any-state transitions first, then the active state's own, in registration order
   *
   * @returns true when one fired
   */
  private tryAllTransitions(): boolean {
    const active = this.active;
    if (!active) {
      return false;
    }

    for (const transition of this.transitionsFromAny) {
      // No self-transition through the wildcard
      if (transition.to === active.id) {
        continue;
      }
      if (this.tryTransition(transition)) {
        return true;
      }
    }

    for (const transition of this.transitionsFrom.get(active.id) ?? []) {
      if (this.tryTransition(transition)) {
        return true;
      }
    }

    return false;
  }

  private tryTriggerTransitions(event: TEvent, activeId: TStateId): boolean {
    for (const transition of this.triggerTransitionsFromAny.get(event) ?? []) {
      if (transition.to === activeId) {
        continue;
      }
      if (this.tryTransition(transition)) {
        return true;
      }
    }

    for (const transition of this.triggerTransitionsFrom.get(activeId)?.get(event) ?? []) {
      if (this.tryTransition(transition)) {
        return true;
      }
    }

    return false;
  }

  private tryTransition(transition: TransitionBase<TStateId>): boolean {
    if (!transition.shouldTransition()) {
      return false;
    }
    this.requestTransition(transition.to, transition.forceInstantly, transition);
    return true;
  }

  /**
   * Switch now, or leave the transition pending until the active state
   * calls stateCanExit()
   *
   * The exit is negotiated when either end needs exit time; ghost states and
   * forced transitions never wait.
   */
  private requestTransition(
    to: TStateId,
    forceInstantly: boolean,
    transition: TransitionBase<TStateId> | undefined
  ): void {
    const current = this.assertInitialized('requestTransition');
    const target = this.assertKnownState(to);

    const negotiate =
      !forceInstantly && !current.state.isGhostState && (current.state.needsExitTime || target.needsExitTime);

    if (!negotiate) {
      this.changeState(to, transition);
      return;
    }

    this.pending = { kind: 'state', target: to, transition };
    this.log('Transition pending', { from: describeId(current.id), to: describeId(to) });
    current.state.onExitRequest();
  }

  /**
   * Exit transitions of the active state, any-state ones first
   *
   * @returns true when one fired
   */
  private tryAllExitTransitions(): boolean {
    const active = this.active;
    if (!active) {
      return false;
    }

    const candidates = [...this.exitTransitionsFromAny, ...(this.exitTransitionsFrom.get(active.id) ?? [])];
    for (const transition of candidates) {
      if (transition.shouldTransition()) {
        this.performExitTransition(transition, active);
        return true;
      }
    }

    return false;
  }

  private performExitTransition(transition: ExitTransition<TStateId>, active: ActiveState<TStateId, TEvent>): void {
    if (transition.forceInstantly || !active.state.needsExitTime) {
      this.grantParentExit();
      return;
    }

    this.pending = { kind: 'exit', transition };
    this.log('Waiting for active state before exit', { state: describeId(active.id) });
    active.state.onExitRequest();
  }

  private grantParentExit(): void {
    const parent = this.fsm;
    if (!parent) {
      throw new StateMachineError(`Exit transition fired on ${this.describe()}, which has no parent`);
    }
    this.exitRequested = false;
    this.log('Exit granted to parent');
    parent.stateCanExit();
  }
}

/**
 * Factory function to create a StateMachine instance
 */
export const createStateMachine = <TOwnId = string, TStateId = TOwnId, TEvent = string>(
  options?: StateMachineOptions
): StateMachine<TOwnId, TStateId, TEvent> => {
  return new StateMachine<TOwnId, TStateId, TEvent>(options);
};

/**
 * HybridStateMachine - a state machine that also runs code of its own
 *
 * Hooks bracket each lifecycle call of the nested machine, so shared
 * setup/teardown of sub-states lives in one place instead of every child.
 */

import { StateMachine, type StateMachineOptions } from './state-machine.js';
import { Timer, defaultTimeSource } from './timer.js';
import {
  ActionStorage,
  createActionEntry,
  type ActionHandler,
  type ActionType,
  type AddActionArgs,
} from './action-storage.js';
import type { ActionArgs } from './types.js';

export type HybridHook<TOwnId, TStateId, TEvent> = (fsm: HybridStateMachine<TOwnId, TStateId, TEvent>) => void;

export type HybridLogicHook<TOwnId, TStateId, TEvent> = (
  fsm: HybridStateMachine<TOwnId, TStateId, TEvent>,
  delta: number
) => void;

/**
 * Hybrid machine configuration
 */
export interface HybridStateMachineOptions<TOwnId = string, TStateId = TOwnId, TEvent = string>
  extends StateMachineOptions {
  /** Before the active sub-state is entered */
  beforeOnEnter?: HybridHook<TOwnId, TStateId, TEvent>;
  /** After the active sub-state was entered */
  afterOnEnter?: HybridHook<TOwnId, TStateId, TEvent>;

  beforeOnLogic?: HybridLogicHook<TOwnId, TStateId, TEvent>;
  afterOnLogic?: HybridLogicHook<TOwnId, TStateId, TEvent>;

  beforeOnExit?: HybridHook<TOwnId, TStateId, TEvent>;
  afterOnExit?: HybridHook<TOwnId, TStateId, TEvent>;
}

/**
 * @example
 * ```ts
 * const combat = new HybridStateMachine({
 *   beforeOnLogic: () => enemy.faceTarget(),
 *   afterOnExit: () => enemy.sheathe(),
 * })
 *   .addState('attack', attack)
 *   .addState('dodge', dodge)
 *   .addAction('hit', 'number', (damage) => enemy.damage(damage));
 * ```
 */
export class HybridStateMachine<TOwnId = string, TStateId = TOwnId, TEvent = string> extends StateMachine<
  TOwnId,
  TStateId,
  TEvent
> {
  readonly timer: Timer;

  private readonly hooks: HybridStateMachineOptions<TOwnId, TStateId, TEvent>;

  /**
   * Lazily initialized
   */
  private actionStorage: ActionStorage<TEvent> | undefined;

  constructor(options: HybridStateMachineOptions<TOwnId, TStateId, TEvent> = {}) {
    super(options);
    this.hooks = options;
    this.timer = new Timer(options.timeSource ?? defaultTimeSource);
  }

  onEnter(): void {
    this.assertInactive();
    this.run(() => {
      this.hooks.beforeOnEnter?.(this);
      super.onEnter();

      this.timer.reset();
      this.hooks.afterOnEnter?.(this);
    });
  }

  onLogic(delta: number): void {
    this.assertInitialized('onLogic');
    this.run(() => {
      this.hooks.beforeOnLogic?.(this, delta);
      super.onLogic(delta);
      this.hooks.afterOnLogic?.(this, delta);
    });
  }

  onExit(): void {
    if (!this.isInitialized) {
      return;
    }
    this.run(() => {
      this.hooks.beforeOnExit?.(this);
      super.onExit();
      this.hooks.afterOnExit?.(this);
    });
  }

  /**
   * Own actions run before the active sub-state's
   */
  onAction(trigger: TEvent, ...args: ActionArgs): void {
    this.assertInitialized('onAction');
    this.run(() => {
      this.actionStorage?.runAction(trigger, ...args);
      super.onAction(trigger, ...args);
    });
  }

  /**
   * Add an action run by onAction(), before the sub-state's action
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

/**
 * Factory function to create a HybridStateMachine instance
 */
export const createHybridStateMachine = <TOwnId = string, TStateId = TOwnId, TEvent = string>(
  options?: HybridStateMachineOptions<TOwnId, TStateId, TEvent>
): HybridStateMachine<TOwnId, TStateId, TEvent> => {
  return new HybridStateMachine<TOwnId, TStateId, TEvent>(options);
};

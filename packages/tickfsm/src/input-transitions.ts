/**
 * Transitions driven by a boolean input signal (a button, a key, a flag)
 *
 * The host injects the signal as an InputSource; these transitions never
 * poll devices themselves.
 */

import { TransitionBase } from './transition.js';
import type { TransitionSource } from './types.js';

/**
 * Reads the current state of a boolean input (true = pressed)
 */
export type InputSource = () => boolean;

/**
 * Fires while the input is held down
 */
export class InputDownTransition<TStateId = string> extends TransitionBase<TStateId> {
  constructor(
    from: TransitionSource<TStateId>,
    to: TStateId,
    private readonly input: InputSource,
    forceInstantly = false
  ) {
    super(from, to, forceInstantly);
  }

  shouldTransition(): boolean {
    return this.input();
  }
}

/**
 * Fires while the input is up
 */
export class InputUpTransition<TStateId = string> extends TransitionBase<TStateId> {
  constructor(
    from: TransitionSource<TStateId>,
    to: TStateId,
    private readonly input: InputSource,
    forceInstantly = false
  ) {
    super(from, to, forceInstantly);
  }

  shouldTransition(): boolean {
    return !this.input();
  }
}

/**
 * Fires on the tick the input goes from up to down
 * The first sample only records the input state.
 */
export class InputPressTransition<TStateId = string> extends TransitionBase<TStateId> {
  private wasPressed: boolean | undefined = undefined;

  constructor(
    from: TransitionSource<TStateId>,
    to: TStateId,
    private readonly input: InputSource,
    forceInstantly = false
  ) {
    super(from, to, forceInstantly);
  }

  shouldTransition(): boolean {
    const isPressed = this.input();
    const pressed = this.wasPressed === false && isPressed;
    this.wasPressed = isPressed;
    return pressed;
  }
}

/**
 * Fires on the tick the input goes from down to up
 * The first sample only records the input state.
 */
export class InputReleaseTransition<TStateId = string> extends TransitionBase<TStateId> {
  private wasPressed: boolean | undefined = undefined;

  constructor(
    from: TransitionSource<TStateId>,
    to: TStateId,
    private readonly input: InputSource,
    forceInstantly = false
  ) {
    super(from, to, forceInstantly);
  }

  shouldTransition(): boolean {
    const isPressed = this.input();
    const released = this.wasPressed === true && !isPressed;
    this.wasPressed = isPressed;
    return released;
  }
}

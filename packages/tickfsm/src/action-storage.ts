/**
 * ActionStorage - registry of user-defined actions
 *
 * Maps a trigger to an ordered list of handlers. Every handler carries a
 * runtime type tag next to it, so a run with the wrong kind of data fails
 * instead of silently skipping handlers.
 */

import { ActionTypeMismatchError, describeId, type ActionArgs } from './types.js';

/**
 * `typeof` names accepted as action data tags
 */
export type PrimitiveTypeName =
  | 'string'
  | 'number'
  | 'boolean'
  | 'bigint'
  | 'symbol'
  | 'object'
  | 'function'
  | 'undefined';

interface PrimitiveTypeMap {
  string: string;
  number: number;
  boolean: boolean;
  bigint: bigint;
  symbol: symbol;
  object: object | null;
  function: (...args: never[]) => unknown;
  undefined: undefined;
}

/**
 * Class accepted as action data tag (matched with instanceof)
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Runtime tag describing the data a handler expects
 */
export type ActionType = PrimitiveTypeName | Constructor;

/**
 * Data type a tag stands for
 * @example ActionDataOf<'number'> is number, ActionDataOf<typeof Vector> is Vector
 */
export type ActionDataOf<T extends ActionType> = T extends PrimitiveTypeName
  ? PrimitiveTypeMap[T]
  : T extends Constructor<infer D>
  ? D
  : never;

export type ActionHandler<T extends ActionType> = (data: ActionDataOf<T>) => void;

/**
 * Arguments of addAction(): a zero-arg handler, or a type tag and a one-arg handler
 */
export type AddActionArgs<T extends ActionType> =
  | [handler: () => void]
  | [type: T, handler: ActionHandler<T>];

/**
 * Stored handler with its type tag
 */
export type ActionEntry =
  | { kind: 'none'; handler: () => void }
  | { kind: 'data'; type: ActionType; invoke: (data: unknown) => void };

export const matchesType = <T extends ActionType>(type: T, data: unknown): data is ActionDataOf<T> => {
  const tag: ActionType = type;
  if (typeof tag === 'string') {
    return typeof data === tag;
  }
  return data instanceof tag;
};

export const describeType = (type: ActionType | undefined): string => {
  if (type === undefined) {
    return 'no argument';
  }
  return typeof type === 'string' ? type : type.name || 'anonymous class';
};

export const describeValue = (data: unknown): string => {
  if (data === null) {
    return 'null';
  }
  if (typeof data === 'object') {
    const proto: unknown = Object.getPrototypeOf(data);
    const ctorName = typeof proto === 'object' && proto !== null && 'constructor' in proto &&
      typeof proto.constructor === 'function' ? proto.constructor.name : '';
    return ctorName ? `object (${ctorName})` : 'object';
  }
  return typeof data;
};

/**
 * Build a stored entry from addAction() arguments
 */
export function createActionEntry<T extends ActionType>(
  trigger: unknown,
  args: AddActionArgs<T>
): ActionEntry {
  if (args.length === 1) {
    const [handler] = args;
    return { kind: 'none', handler };
  }

  const [type, handler] = args;
  return {
    kind: 'data',
    type,
    invoke: (data: unknown) => {
      if (!matchesType(type, data)) {
        throw new ActionTypeMismatchError(describeId(trigger), describeType(type), describeValue(data));
      }
      handler(data);
    },
  };
}

export class ActionStorage<TEvent = string> {
  private actions = new Map<TEvent, ActionEntry[]>();

  /**
   * Register a handler under a trigger
   * Handlers of one trigger run in registration order
   *
   * @example
   * ```ts
   * storage
   *   .addAction('jump', () => player.jump())
   *   .addAction('hit', 'number', (damage) => player.damage(damage));
   * ```
   */
  addAction(trigger: TEvent, handler: () => void): this;
  addAction<T extends ActionType>(trigger: TEvent, type: T, handler: ActionHandler<T>): this;
  addAction<T extends ActionType>(trigger: TEvent, ...args: AddActionArgs<T>): this {
    return this.addEntry(trigger, createActionEntry(trigger, args));
  }

  addEntry(trigger: TEvent, entry: ActionEntry): this {
    const entries = this.actions.get(trigger) ?? [];
    entries.push(entry);
    this.actions.set(trigger, entries);
    return this;
  }

  /**
   * Run every handler of a trigger
   *
   * Without data, every handler must be zero-arg; with data, every handler
   * must expect the data's type. The whole list is checked before the first
   * handler runs. An unknown trigger is a no-op.
   *
   * @throws ActionTypeMismatchError
   */
  runAction(trigger: TEvent, ...args: ActionArgs): void {
    const registered = this.actions.get(trigger);
    if (!registered) {
      return;
    }
    // Handlers may register more actions while running
    const entries = [...registered];

    if (args.length === 0) {
      for (const entry of entries) {
        if (entry.kind === 'data') {
          throw new ActionTypeMismatchError(describeId(trigger), describeType(entry.type), 'no argument');
        }
      }
      for (const entry of entries) {
        if (entry.kind === 'none') {
          entry.handler();
        }
      }
      return;
    }

    const [data] = args;
    for (const entry of entries) {
      if (entry.kind === 'none') {
        throw new ActionTypeMismatchError(describeId(trigger), 'no argument', describeValue(data));
      }
      if (!matchesType(entry.type, data)) {
        throw new ActionTypeMismatchError(describeId(trigger), describeType(entry.type), describeValue(data));
      }
    }
    for (const entry of entries) {
      if (entry.kind === 'data') {
        entry.invoke(data);
      }
    }
  }

  hasAction(trigger: TEvent): boolean {
    return this.actions.has(trigger);
  }

  /**
   * Number of handlers for a trigger, or across all triggers
   */
  actionCount(trigger?: TEvent): number {
    if (trigger === undefined) {
      let total = 0;
      for (const entries of this.actions.values()) {
        total += entries.length;
      }
      return total;
    }
    return this.actions.get(trigger)?.length ?? 0;
  }

  triggers(): TEvent[] {
    return Array.from(this.actions.keys());
  }

  /**
   * Remove the handlers of one trigger, or of all triggers
   */
  removeActions(trigger?: TEvent): void {
    if (trigger === undefined) {
      this.actions.clear();
      return;
    }
    this.actions.delete(trigger);
  }
}

/**
 * HybridStateMachine Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HybridStateMachine, createHybridStateMachine } from './hybrid-state-machine.js';
import { StateMachine } from './state-machine.js';
import { State } from './state.js';
import { NotInitializedError } from './types.js';

describe('HybridStateMachine', () => {
  let log: string[];

  const tracked = (name: string) =>
    new State({
      onEnter: () => log.push(`${name}:enter`),
      onLogic: () => log.push(`${name}:logic`),
      onExit: () => log.push(`${name}:exit`),
    });

  beforeEach(() => {
    log = [];
  });

  describe('hooks', () => {
    it('should bracket every lifecycle call of the active state', () => {
      const hybrid = createHybridStateMachine({
        beforeOnEnter: () => log.push('before:enter'),
        afterOnEnter: () => log.push('after:enter'),
        beforeOnLogic: (_, delta) => log.push(`before:logic:${delta}`),
        afterOnLogic: (_, delta) => log.push(`after:logic:${delta}`),
        beforeOnExit: () => log.push('before:exit'),
        afterOnExit: () => log.push('after:exit'),
      }).addState('a', tracked('a'));

      hybrid.init();
      hybrid.onLogic(0.5);
      hybrid.onExit();

      expect(log).toEqual([
        'before:enter',
        'a:enter',
        'after:enter',
        'before:logic:0.5',
        'a:logic',
        'after:logic:0.5',
        'before:exit',
        'a:exit',
        'after:exit',
      ]);
    });

    it('should pass the machine to its hooks', () => {
      const seen: Array<string | undefined> = [];
      const hybrid = new HybridStateMachine({
        beforeOnEnter: (fsm) => seen.push(fsm.activeStateName),
        afterOnEnter: (fsm) => seen.push(fsm.activeStateName),
      }).addState('a');

      hybrid.init();

      expect(seen).toEqual([undefined, 'a']);
    });

    it('should run without hooks like a plain machine', () => {
      const hybrid = new HybridStateMachine().addState('a', tracked('a')).addState('b', tracked('b'));
      hybrid.addTransition('a', 'b');

      hybrid.init();
      hybrid.onLogic(1);

      expect(hybrid.activeStateName).toBe('b');
      expect(log).toEqual(['a:enter', 'a:logic', 'a:exit', 'b:enter']);
    });

    it('should count every tick while a nested machine switches as usual', () => {
      let counter = 0;
      const child = new StateMachine().addState('c1').addState('c2').addTransition('c1', 'c2');
      const hybrid = new HybridStateMachine({ beforeOnLogic: () => counter++ }).addState('child', child);

      hybrid.init();
      for (let i = 0; i < 10; i++) {
        hybrid.onLogic(0.016);
      }

      expect(counter).toBe(10);
      expect(child.activeStateName).toBe('c2');
      expect(hybrid.getActiveHierarchyPath()).toBe('/child/c2');
    });

    it('should reject a second enter before running any hook', () => {
      let entered = 0;
      const hybrid = new HybridStateMachine({ beforeOnEnter: () => entered++ }).addState('a');
      hybrid.init();

      expect(() => hybrid.onEnter()).toThrow('root machine is already active');
      expect(entered).toBe(1);
      expect(hybrid.activeStateName).toBe('a');
    });

    it('should not call hooks before init', () => {
      const beforeOnLogic = vi.fn();
      const beforeOnExit = vi.fn();
      const hybrid = new HybridStateMachine({ beforeOnLogic, beforeOnExit }).addState('a');

      expect(() => hybrid.onLogic(1)).toThrow(NotInitializedError);
      hybrid.onExit();

      expect(beforeOnLogic).not.toHaveBeenCalled();
      expect(beforeOnExit).not.toHaveBeenCalled();
    });
  });

  describe('actions', () => {
    it('should run own actions before the active state ones', () => {
      const order: string[] = [];
      const hybrid = new HybridStateMachine()
        .addAction('hit', 'number', (damage) => order.push(`hybrid:${damage}`))
        .addState('a', new State().addAction('hit', 'number', (damage) => order.push(`child:${damage}`)));

      hybrid.init();
      hybrid.onAction('hit', 5);

      expect(order).toEqual(['hybrid:5', 'child:5']);
    });

    it('should return itself from addAction', () => {
      const hybrid = new HybridStateMachine();

      expect(hybrid.addAction('jump', () => {})).toBe(hybrid);
    });

    it('should run parameterless actions', () => {
      const jump = vi.fn();
      const hybrid = new HybridStateMachine().addAction('jump', jump).addState('a');

      hybrid.init();
      hybrid.onAction('jump');

      expect(jump).toHaveBeenCalledTimes(1);
    });

    it('should require init before dispatching', () => {
      const hit = vi.fn();
      const hybrid = new HybridStateMachine().addAction('hit', hit).addState('a');

      expect(() => hybrid.onAction('hit')).toThrow(NotInitializedError);
      expect(hit).not.toHaveBeenCalled();
    });
  });

  describe('timer', () => {
    it('should restart its timer on every enter', () => {
      let now = 0;
      const hybrid = new HybridStateMachine({ timeSource: () => now }).addState('a');

      now = 100;
      hybrid.init();
      now = 130;
      expect(hybrid.timer.elapsed).toBe(30);

      hybrid.onExit();
      now = 200;
      hybrid.onEnter();
      expect(hybrid.timer.elapsed).toBe(0);
    });
  });
});

/**
 * Tests for SetupScheduler: dependency order, cycles, event gating.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createPackContext, type PackContext } from '../../../src/core/context.js';
import { EventBus } from '../../../src/core/event-bus.js';
import { SetupScheduler, type SetupSchedulerOptions } from '../../../src/core/setup-scheduler.js';
import type { SetupAction } from '../../../src/types/spec.js';
import { createMockLogger, messagesOf, type MockLogger } from '../../helpers/factories.js';

describe('SetupScheduler', () => {
  let context: PackContext;
  let logger: MockLogger;
  let events: EventBus;
  let order: string[];

  function setup(
    identity: string,
    options: { dependencies?: string[]; triggers?: string[]; action?: SetupAction; installed?: boolean } = {}
  ): SetupAction {
    const action = options.action ?? vi.fn(() => order.push(identity));
    context.setups.register(identity, {
      action,
      dependencies: options.dependencies ?? [],
      triggerEvents: options.triggers,
    });
    context.activation.transition(identity, 'registered');
    if (options.installed ?? true) {
      context.activation.markInstalled(identity);
    }
    return action;
  }

  function createScheduler(options: SetupSchedulerOptions = {}): SetupScheduler {
    return new SetupScheduler(context, events, logger, options);
  }

  beforeEach(() => {
    context = createPackContext();
    logger = createMockLogger();
    events = new EventBus(logger);
    order = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('immediate setups', () => {
    it('runs dependencies before the dependent', () => {
      setup('a', { dependencies: ['b'] });
      setup('b');

      expect(createScheduler().activate('a')).toBe(true);
      expect(order).toEqual(['b', 'a']);
      expect(context.activation.state('a')).toBe('completed');
      expect(context.activation.state('b')).toBe('completed');
    });

    it('runs a shared dependency once', () => {
      setup('a', { dependencies: ['b', 'c'] });
      setup('b', { dependencies: ['d'] });
      setup('c', { dependencies: ['d'] });
      setup('d');

      expect(createScheduler().activate('a')).toBe(true);
      expect(order).toEqual(['d', 'b', 'c', 'a']);
    });

    it('treats an identity without a setup as done', () => {
      expect(createScheduler().activate('owner/none')).toBe(true);
    });

    it('never runs a completed setup again', () => {
      let count = 0;
      setup('a', { action: () => void count++ });
      const scheduler = createScheduler();

      scheduler.activate('a');
      scheduler.activate('a');
      scheduler.activateAll();

      expect(count).toBe(1);
    });

    it('completes a setup without an action', () => {
      context.setups.register('a', { dependencies: [] });
      context.activation.markInstalled('a');

      expect(createScheduler().activate('a')).toBe(true);
      expect(context.activation.isCompleted('a')).toBe(true);
    });
  });

  describe('aborted branches', () => {
    it('refuses to run setup for a plugin that is not installed', () => {
      const action = setup('a', { installed: false });

      expect(createScheduler().activate('a')).toBe(false);
      expect(action).not.toHaveBeenCalled();
      expect(logger.calls.error).toEqual([
        [{ identity: 'a', code: 'NOT_INSTALLED', error: 'a: not installed, cannot run setup' }, 'Setup aborted'],
      ]);
    });

    it('aborts a dependent whose dependency has no setup and is not installed', () => {
      const action = setup('a', { dependencies: ['lib'] });

      expect(createScheduler().activate('a')).toBe(false);
      expect(action).not.toHaveBeenCalled();
      expect(logger.calls.error).toEqual([
        [{ identity: 'a', code: 'NOT_INSTALLED', error: 'lib: not installed, cannot run setup' }, 'Setup aborted'],
      ]);
    });

    it('runs a dependent whose installed dependency has no setup', () => {
      context.activation.markInstalled('lib');
      setup('a', { dependencies: ['lib'] });

      expect(createScheduler().activate('a')).toBe(true);
      expect(order).toEqual(['a']);
    });

    it('reports a cycle naming both identities and runs neither action', () => {
      const a = setup('a', { dependencies: ['b'] });
      const b = setup('b', { dependencies: ['a'] });

      expect(createScheduler().activate('a')).toBe(false);
      expect(a).not.toHaveBeenCalled();
      expect(b).not.toHaveBeenCalled();
      expect(logger.calls.error).toEqual([
        [{ identity: 'a', code: 'CIRCULAR_DEPENDENCY', error: 'b: circular setup dependency b -> a' }, 'Setup aborted'],
      ]);
    });

    it('marks a throwing setup failed and keeps siblings running', () => {
      setup('a', {
        action: () => {
          throw new Error('boom');
        },
      });
      setup('b');

      const failed = createScheduler().activateAll();

      expect(failed).toEqual(['a']);
      expect(context.activation.state('a')).toBe('failed');
      expect(order).toEqual(['b']);
      expect(logger.calls.error[0]).toEqual([
        { identity: 'a', code: 'SETUP_FAILED', error: 'a: setup failed: boom' },
        'Setup aborted',
      ]);
    });

    it('aborts the dependent of a failing setup', () => {
      setup('a', {
        action: () => {
          throw new Error('boom');
        },
      });
      const dependent = setup('c', { dependencies: ['a'] });

      expect(createScheduler().activateAll()).toEqual(['a', 'c']);
      expect(dependent).not.toHaveBeenCalled();
    });

    it('rethrows errors that are not pack errors', () => {
      setup('a');
      const scheduler = createScheduler();
      vi.spyOn(context.setups, 'get').mockImplementation(() => {
        throw new TypeError('registry broken');
      });

      expect(() => scheduler.activate('a')).toThrow(TypeError);
    });
  });

  describe('event-gated setups', () => {
    it('waits for a trigger event and runs once after the debounce', async () => {
      vi.useFakeTimers();
      const action = setup('a', { triggers: ['BufRead'] });
      const scheduler = createScheduler();

      expect(scheduler.activate('a')).toBe(true);
      expect(context.activation.state('a')).toBe('waiting');
      expect(scheduler.waiting()).toEqual(['a']);
      expect(action).not.toHaveBeenCalled();

      await events.publish({ name: 'BufRead', resource: '/tmp/notes.txt' });
      await events.publish({ name: 'BufRead', resource: '/tmp/notes.txt' });
      expect(action).not.toHaveBeenCalled();

      vi.advanceTimersByTime(10);

      expect(action).toHaveBeenCalledTimes(1);
      expect(context.activation.state('a')).toBe('completed');
      expect(scheduler.waiting()).toEqual([]);
      expect(events.subscriptionCount()).toBe(0);
    });

    it('ignores events it is not waiting for', async () => {
      vi.useFakeTimers();
      const action = setup('a', { triggers: ['BufRead'] });
      createScheduler().activate('a');

      expect(await events.publish({ name: 'InsertEnter' })).toBe(0);
      vi.advanceTimersByTime(10);

      expect(action).not.toHaveBeenCalled();
    });

    it('ignores transient resources except on the enter event', async () => {
      vi.useFakeTimers();
      const action = setup('a', { triggers: ['BufRead', 'enter'] });
      createScheduler().activate('a');

      await events.publish({ name: 'BufRead', resource: 'oil:///tmp' });
      vi.advanceTimersByTime(10);
      expect(action).not.toHaveBeenCalled();

      await events.publish({ name: 'enter', resource: 'oil:///tmp' });
      vi.advanceTimersByTime(10);
      expect(action).toHaveBeenCalledTimes(1);
    });

    it('honours a custom debounce', async () => {
      vi.useFakeTimers();
      const action = setup('a', { triggers: ['BufRead'] });
      createScheduler({ debounceMs: 50 }).activate('a');

      await events.publish({ name: 'BufRead' });
      vi.advanceTimersByTime(49);
      expect(action).not.toHaveBeenCalled();
      vi.advanceTimersByTime(1);
      expect(action).toHaveBeenCalledTimes(1);
    });

    it('runs dependencies eagerly while the dependent waits', () => {
      setup('a', { triggers: ['BufRead'], dependencies: ['b'] });
      setup('b');

      createScheduler().activate('a');

      expect(order).toEqual(['b']);
      expect(context.activation.state('a')).toBe('waiting');
    });

    it('does not block a dependent on a waiting dependency', () => {
      setup('b', { triggers: ['BufRead'] });
      setup('a', { dependencies: ['b'] });
      const scheduler = createScheduler();

      scheduler.activate('b');
      expect(scheduler.activate('a')).toBe(true);

      expect(order).toEqual(['a']);
      expect(messagesOf(logger, 'debug')).toContain('Dependency is waiting for its event');
    });

    it('keeps waiting after a deferred failure and retries on the next event', async () => {
      vi.useFakeTimers();
      let calls = 0;
      setup('a', {
        triggers: ['BufRead'],
        action: () => {
          calls++;
          if (calls === 1) throw new Error('not yet');
        },
      });
      createScheduler().activate('a');

      await events.publish({ name: 'BufRead' });
      vi.advanceTimersByTime(10);
      expect(context.activation.state('a')).toBe('waiting');
      expect(logger.calls.error).toEqual([[{ identity: 'a', error: 'not yet' }, 'a: setup failed: not yet']]);

      await events.publish({ name: 'BufRead' });
      vi.advanceTimersByTime(10);
      expect(calls).toBe(2);
      expect(context.activation.state('a')).toBe('completed');
    });

    it('arms one listener per identity', () => {
      setup('a', { triggers: ['BufRead'] });
      const scheduler = createScheduler();

      scheduler.activate('a');
      scheduler.activate('a');

      expect(events.subscriptionCount()).toBe(1);
    });

    it('drops listeners and pending timers on dispose', async () => {
      vi.useFakeTimers();
      const action = setup('a', { triggers: ['BufRead'] });
      const scheduler = createScheduler();
      scheduler.activate('a');

      await events.publish({ name: 'BufRead' });
      scheduler.dispose();
      vi.advanceTimersByTime(10);

      expect(action).not.toHaveBeenCalled();
      expect(events.subscriptionCount()).toBe(0);
    });
  });
});

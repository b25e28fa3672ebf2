/**
 * Setup Scheduler
 *
 * Runs registered setup actions in dependency order.
 *
 *   unregistered → registered → (waiting | activating) → completed
 *
 * A setup without trigger events runs as soon as its dependencies are done.
 * One with trigger events waits on the event bus; dependencies still run
 * eagerly when the dependent is scheduled. Failures stay inside the branch
 * they happen in and are reported through the logger.
 */

import type { Logger } from '../types/logger.js';
import type { RuntimeEvent, SetupDescriptor } from '../types/pack.js';
import type { PackContext } from './context.js';
import type { EventBus } from './event-bus.js';
import {
  CircularDependencyError,
  NotInstalledError,
  PackError,
  SetupError,
  describeError,
} from './pack-errors.js';

export const DEFAULT_ENTER_EVENT = 'enter';
export const DEFAULT_SETUP_DEBOUNCE_MS = 10;

/** Virtual buffers such as `oil:///tmp` or `fugitive://...` */
const URI_RESOURCE = /^[a-z][a-z0-9+.-]*:\/\//i;

export interface SetupSchedulerOptions {
  /** Delay between a matching event and the setup call */
  debounceMs?: number;
  /** Event exempt from the transient-resource filter */
  enterEvent?: string;
  /** Resources whose events are ignored (except the enter event) */
  isTransientResource?: (resource: string) => boolean;
}

export class SetupScheduler {
  private readonly logger: Logger;
  private readonly debounceMs: number;
  private readonly enterEvent: string;
  private readonly isTransientResource: (resource: string) => boolean;
  /** identity → event bus subscription while waiting */
  private readonly listeners = new Map<string, string>();
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(
    private readonly context: PackContext,
    private readonly events: EventBus,
    logger: Logger,
    options: SetupSchedulerOptions = {}
  ) {
    this.logger = logger.child({ component: 'setup-scheduler' });
    this.debounceMs = options.debounceMs ?? DEFAULT_SETUP_DEBOUNCE_MS;
    this.enterEvent = options.enterEvent ?? DEFAULT_ENTER_EVENT;
    this.isTransientResource = options.isTransientResource ?? ((resource) => URI_RESOURCE.test(resource));
  }

  /**
   * Activate one identity and everything it depends on.
   *
   * @returns false when the branch aborted (cycle, missing install, failing action)
   */
  activate(identity: string): boolean {
    try {
      this.walk(identity, new Set());
      return true;
    } catch (error) {
      if (!(error instanceof PackError)) {
        throw error;
      }
      this.logger.error({ identity, code: error.code, error: error.message }, 'Setup aborted');
      return false;
    }
  }

  /**
   * Activate every registered setup in registration order.
   *
   * @returns identities whose branch aborted
   */
  activateAll(): string[] {
    const failed: string[] = [];
    for (const identity of this.context.setups.identities()) {
      if (!this.activate(identity)) {
        failed.push(identity);
      }
    }
    return failed;
  }

  /**
   * Identities with an armed event listener.
   */
  waiting(): string[] {
    return [...this.listeners.keys()];
  }

  /**
   * Drop all listeners and pending debounce timers.
   */
  dispose(): void {
    for (const subscriptionId of this.listeners.values()) {
      this.events.unsubscribe(subscriptionId);
    }
    this.listeners.clear();
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private walk(identity: string, activePath: Set<string>): void {
    const setup = this.context.setups.get(identity);
    if (!setup) {
      return;
    }

    const { activation } = this.context;
    if (activation.isCompleted(identity)) {
      return;
    }
    if (!activation.isInstalled(identity)) {
      throw new NotInstalledError(identity);
    }

    activePath.add(identity);
    try {
      for (const dependency of setup.dependencies) {
        if (activation.isCompleted(dependency)) continue;

        if (activePath.has(dependency)) {
          throw new CircularDependencyError(identity, dependency);
        }

        // Dependencies without a setup of their own still have to be installed.
        if (!activation.isInstalled(dependency)) {
          throw new NotInstalledError(dependency);
        }

        if (activation.state(dependency) === 'waiting') {
          this.logger.debug({ identity, dependency }, 'Dependency is waiting for its event');
          continue;
        }

        this.walk(dependency, activePath);
      }
    } finally {
      activePath.delete(identity);
    }

    this.schedule(identity, setup);
  }

  private schedule(identity: string, setup: SetupDescriptor): void {
    const { activation } = this.context;

    if (!setup.action) {
      activation.transition(identity, 'completed');
      return;
    }

    const triggers = setup.triggerEvents ?? [];
    if (triggers.length === 0) {
      this.run(identity, setup.action);
      return;
    }

    if (this.listeners.has(identity)) {
      return;
    }

    activation.transition(identity, 'waiting');
    const subscriptionId = this.events.subscribe(
      (event) => {
        this.onTrigger(identity, event);
      },
      { names: triggers }
    );
    this.listeners.set(identity, subscriptionId);
    this.logger.debug({ identity, events: triggers }, 'Setup deferred until event');
  }

  private onTrigger(identity: string, event: RuntimeEvent): void {
    if (
      event.name !== this.enterEvent &&
      event.resource !== undefined &&
      this.isTransientResource(event.resource)
    ) {
      this.logger.debug({ identity, event: event.name, resource: event.resource }, 'Ignoring transient resource');
      return;
    }

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      const action = this.context.setups.get(identity)?.action;
      if (!action || this.context.activation.isCompleted(identity)) {
        return;
      }
      if (this.run(identity, action)) {
        const subscriptionId = this.listeners.get(identity);
        if (subscriptionId !== undefined) {
          this.events.unsubscribe(subscriptionId);
          this.listeners.delete(identity);
        }
      }
    }, this.debounceMs);
    this.timers.add(timer);
  }

  /**
   * Invoke an action and record the outcome.
   * A deferred failure is only logged: there is no caller left to tell.
   */
  private run(identity: string, action: () => void): boolean {
    const { activation } = this.context;
    const deferred = activation.state(identity) === 'waiting';

    activation.transition(identity, 'activating');
    try {
      action();
    } catch (error) {
      const failure = new SetupError(identity, error);
      if (!deferred) {
        activation.transition(identity, 'failed');
        throw failure;
      }
      activation.transition(identity, 'waiting');
      this.logger.error({ identity, error: describeError(error) }, failure.message);
      return false;
    }

    activation.transition(identity, 'completed');
    this.logger.debug({ identity }, 'Setup completed');
    return true;
  }
}

import type { SetupDescriptor } from '../types/pack.js';

/**
 * SetupRegistry - identity → setup descriptor.
 *
 * Filled while the registration queue is expanded, read by the scheduler.
 * Iteration follows registration order so activation is deterministic.
 */
export class SetupRegistry {
  private readonly setups = new Map<string, SetupDescriptor>();

  /**
   * Register (or replace) the setup for an identity.
   * @returns true when an earlier registration was replaced
   */
  register(identity: string, descriptor: SetupDescriptor): boolean {
    const replaced = this.setups.has(identity);
    this.setups.set(identity, Object.freeze({ ...descriptor }));
    return replaced;
  }

  get(identity: string): SetupDescriptor | undefined {
    return this.setups.get(identity);
  }

  has(identity: string): boolean {
    return this.setups.has(identity);
  }

  identities(): string[] {
    return [...this.setups.keys()];
  }

  get size(): number {
    return this.setups.size;
  }
}

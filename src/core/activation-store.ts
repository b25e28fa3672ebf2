import type { SetupState } from '../types/pack.js';

interface ActivationRecord {
  installed: boolean;
  state: SetupState;
}

/**
 * Snapshot row for inspection and diagnostics.
 */
export interface ActivationSnapshot extends ActivationRecord {
  identity: string;
}

/**
 * ActivationStore - per-identity install flag and setup state.
 *
 * `installed` is set once the installer confirms a package.
 * The setup state is a small state machine whose `completed` state is absorbing:
 * once reached, every later transition is refused.
 */
export class ActivationStore {
  private readonly records = new Map<string, ActivationRecord>();

  markInstalled(identity: string): void {
    this.record(identity).installed = true;
  }

  isInstalled(identity: string): boolean {
    return this.records.get(identity)?.installed ?? false;
  }

  state(identity: string): SetupState {
    return this.records.get(identity)?.state ?? 'unregistered';
  }

  isCompleted(identity: string): boolean {
    return this.state(identity) === 'completed';
  }

  /**
   * Move an identity to `next`.
   * @returns false when the identity is already completed
   */
  transition(identity: string, next: SetupState): boolean {
    const current = this.record(identity);
    if (current.state === 'completed') {
      return false;
    }
    current.state = next;
    return true;
  }

  snapshot(): ActivationSnapshot[] {
    return [...this.records.entries()].map(([identity, record]) => ({ identity, ...record }));
  }

  private record(identity: string): ActivationRecord {
    let existing = this.records.get(identity);
    if (!existing) {
      existing = { installed: false, state: 'unregistered' };
      this.records.set(identity, existing);
    }
    return existing;
  }
}

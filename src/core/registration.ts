/**
 * Registration-time flattening.
 *
 * Expands queued specs depth-first into the installation set and registers
 * the setup of every plugin that declared one. Dependencies precede their
 * dependents in the installation set.
 */

import type { Logger } from '../types/logger.js';
import type { PluginDescriptor } from '../types/pack.js';
import type { PluginSpec, SinglePluginSpec } from '../types/spec.js';
import type { PackContext } from './context.js';
import { resolveIdentity } from './identity.js';
import { ConfigurationError, describeError } from './pack-errors.js';
import { normalizeSpec } from './spec-normalizer.js';

export interface RegistrationOptions {
  defaultHost?: string | undefined;
  logger: Logger;
}

interface PendingSetup {
  identity: string;
  spec: SinglePluginSpec;
  dependencies: string[];
  events: readonly string[] | undefined;
}

interface Expansion {
  descriptors: PluginDescriptor[];
  setups: PendingSetup[];
}

/**
 * Expand one spec. Nothing is written to the context here so a failing entry
 * leaves no partial registrations behind.
 *
 * @throws ConfigurationError when a plugin in the spec has no identity
 */
function expand(
  spec: PluginSpec,
  defaultHost: string | undefined,
  inheritedEvents: readonly string[] | undefined,
  into: Expansion
): void {
  switch (spec.kind) {
    case 'identifier':
      into.descriptors.push(...normalizeSpec(spec, { defaultHost }));
      return;

    case 'group':
      for (const item of spec.items) {
        expand(item, defaultHost, inheritedEvents, into);
      }
      return;

    case 'plugin': {
      const identity = resolveIdentity(spec);
      if (identity === undefined) {
        throw new ConfigurationError(spec.source || '<empty>', 'cannot derive a plugin identity');
      }

      const events = spec.events && spec.events.length > 0 ? spec.events : inheritedEvents;

      if (spec.dependencies) {
        expand(spec.dependencies, defaultHost, events, into);
      }

      into.descriptors.push(...normalizeSpec(spec, { defaultHost }));

      if (spec.setup) {
        const dependencies: string[] = [];
        for (const dep of normalizeSpec(spec.dependencies, { defaultHost })) {
          const depIdentity = resolveIdentity(dep);
          if (depIdentity === undefined) {
            throw new ConfigurationError(identity, `dependency ${dep.source} has no identity`);
          }
          dependencies.push(depIdentity);
        }
        into.setups.push({ identity, spec, dependencies, events });
      }
      return;
    }
  }
}

/**
 * Turn queued specs into the installation set, registering setups and branch
 * overrides in `context`. Entries that fail are reported and skipped.
 */
export function buildInstallSet(
  context: PackContext,
  specs: readonly PluginSpec[],
  options: RegistrationOptions
): PluginDescriptor[] {
  const log = options.logger.child({ component: 'registration' });
  const installSet: PluginDescriptor[] = [];
  const seen = new Map<string, PluginDescriptor>();

  specs.forEach((spec, index) => {
    const expansion: Expansion = { descriptors: [], setups: [] };
    try {
      expand(spec, options.defaultHost, undefined, expansion);
    } catch (error) {
      log.error({ entry: index, error: describeError(error) }, 'Skipping plugin spec');
      return;
    }

    for (const descriptor of expansion.descriptors) {
      const identity = resolveIdentity(descriptor);
      if (identity === undefined) {
        log.error({ entry: index, source: descriptor.source }, 'Skipping plugin without identity');
        continue;
      }

      const previous = seen.get(identity);
      if (previous) {
        if (previous.branchOverride !== descriptor.branchOverride) {
          log.warn(
            { identity, kept: previous.branchOverride, ignored: descriptor.branchOverride },
            'Conflicting branch override, keeping the first'
          );
        }
        continue;
      }

      seen.set(identity, descriptor);
      installSet.push(descriptor);
      if (descriptor.branchOverride !== undefined) {
        context.branchOverrides.set(identity, descriptor.branchOverride);
      }
    }

    for (const pending of expansion.setups) {
      const replaced = context.setups.register(pending.identity, {
        action: pending.spec.setup,
        dependencies: pending.dependencies,
        triggerEvents: pending.events,
      });
      if (replaced) {
        log.warn({ identity: pending.identity }, 'Setup registered twice, using the later one');
      }
      const state = context.activation.state(pending.identity);
      if (state === 'unregistered' || state === 'failed') {
        context.activation.transition(pending.identity, 'registered');
      }
    }
  });

  log.debug({ plugins: installSet.length, setups: context.setups.size }, 'Installation set built');
  return installSet;
}

/**
 * Spec Normalizer
 *
 * Flattens one PluginSpec into the ordered descriptors the installer consumes.
 * Pure: no filesystem, no network.
 */

import type { PluginDescriptor } from '../types/pack.js';
import type { PluginSpec } from '../types/spec.js';
import { isRemoteUrl } from './identity.js';

export const DEFAULT_HOST = 'https://github.com';

export interface NormalizeOptions {
  /** Host prefixed to `owner/repo` shorthands */
  defaultHost?: string;
}

/**
 * Expand an `owner/repo` shorthand to an absolute URL; URLs pass unchanged.
 */
export function normalizeSource(value: string, defaultHost: string = DEFAULT_HOST): string {
  const trimmed = value.trim();
  if (isRemoteUrl(trimmed)) {
    return trimmed;
  }
  return `${defaultHost.replace(/\/+$/, '')}/${trimmed.replace(/^\/+/, '')}`;
}

/**
 * Flatten a spec into descriptors in declaration order.
 * `undefined` yields an empty list.
 */
export function normalizeSpec(
  spec: PluginSpec | undefined,
  options: NormalizeOptions = {}
): PluginDescriptor[] {
  if (spec === undefined) {
    return [];
  }

  const host = options.defaultHost ?? DEFAULT_HOST;

  switch (spec.kind) {
    case 'identifier':
      return [freeze({ source: normalizeSource(spec.value, host), options: {} })];

    case 'plugin': {
      const passthrough: Record<string, unknown> = { ...spec.options };
      if (spec.version !== undefined) {
        passthrough['version'] = spec.version;
      }
      return [
        freeze({
          source: normalizeSource(spec.source, host),
          branchOverride: spec.version,
          options: passthrough,
        }),
      ];
    }

    case 'group':
      return spec.items.flatMap((item) => normalizeSpec(item, options));
  }
}

function freeze(descriptor: PluginDescriptor): PluginDescriptor {
  Object.freeze(descriptor.options);
  return Object.freeze(descriptor);
}

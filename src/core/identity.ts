/**
 * Plugin identity: the repository path of a plugin's source URL
 * (`https://github.com/owner/repo` → `owner/repo`). Keys the setup registry,
 * activation state and branch overrides.
 */

import type { PluginDescriptor } from '../types/pack.js';
import type { PluginSpec } from '../types/spec.js';

export type IdentityInput =
  | string
  | PluginDescriptor
  | PluginSpec
  | readonly (string | PluginDescriptor | PluginSpec)[];

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\/[^/]*\/?/i;
const SCP_PREFIX = /^[\w.-]+@[\w.-]+:/;

/**
 * True for `scheme://...` URLs (any scheme) and scp-like `user@host:path`.
 */
export function isRemoteUrl(value: string): boolean {
  return URL_SCHEME.test(value) || SCP_PREFIX.test(value);
}

/**
 * An identity names a directory below the install root: no empty,
 * `.` or `..` segments, no backslashes.
 */
export function isSafeIdentity(identity: string): boolean {
  return (
    !identity.includes('\\') &&
    identity.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..')
  );
}

/**
 * Locate the source URL carried by any identity input.
 */
export function sourceOf(input: IdentityInput | undefined): string | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input === 'string') {
    return input;
  }
  if (isInputList(input)) {
    return sourceOf(input[0]);
  }
  if (!('kind' in input)) {
    return input.source;
  }
  switch (input.kind) {
    case 'identifier':
      return input.value;
    case 'plugin':
      return input.source;
    case 'group':
      return sourceOf(input.items[0]);
  }
}

/**
 * Path portion after the host, without a trailing slash or `.git`;
 * `undefined` when that path is empty or could leave the install root.
 */
export function identityFromUrl(url: string): string | undefined {
  const path = url
    .trim()
    .replace(SCHEME_PREFIX, '')
    .replace(SCP_PREFIX, '')
    .replace(/\/+$/, '')
    .replace(/\.git$/, '');
  return path !== '' && isSafeIdentity(path) ? path : undefined;
}

/**
 * Stable identity of a plugin, or `undefined` when no source can be found
 * or its path is not a safe identity.
 */
export function resolveIdentity(input: IdentityInput | undefined): string | undefined {
  const source = sourceOf(input);
  return source === undefined ? undefined : identityFromUrl(source);
}

function isInputList(
  input: IdentityInput
): input is readonly (string | PluginDescriptor | PluginSpec)[] {
  return Array.isArray(input);
}

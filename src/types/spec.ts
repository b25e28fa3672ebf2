/**
 * Plugin specs as written by configuration units.
 *
 * A spec is decided once, when the configuration is built: a bare identifier,
 * one plugin with its lifecycle fields, or a group of further specs. Code that
 * loads untyped configuration goes through `specFromRaw`.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/pack-errors.js';

/** Zero-argument setup routine run once after install */
export type SetupAction = () => void;

export interface IdentifierSpec {
  readonly kind: 'identifier';
  /** `owner/repo` shorthand or a URL */
  readonly value: string;
}

export interface SinglePluginSpec {
  readonly kind: 'plugin';
  readonly source: string;
  /** Branch, tag or version to track instead of the default branch */
  readonly version?: string | undefined;
  readonly setup?: SetupAction | undefined;
  /** Plugins installed (and set up) before this one */
  readonly dependencies?: PluginSpec | undefined;
  /** Runtime events that gate setup; absent means run right after install */
  readonly events?: readonly string[] | undefined;
  /** Passthrough configuration forwarded to the installer untouched */
  readonly options: Readonly<Record<string, unknown>>;
}

export interface GroupSpec {
  readonly kind: 'group';
  readonly items: readonly PluginSpec[];
}

export type PluginSpec = IdentifierSpec | SinglePluginSpec | GroupSpec;

export interface PluginFields {
  version?: string | undefined;
  setup?: SetupAction | undefined;
  dependencies?: PluginSpec | readonly PluginSpec[] | undefined;
  events?: string | readonly string[] | undefined;
  options?: Record<string, unknown> | undefined;
}

// ─── Builders ────────────────────────────────────────────────────

export function identifier(value: string): IdentifierSpec {
  return { kind: 'identifier', value };
}

export function group(...items: PluginSpec[]): GroupSpec {
  return { kind: 'group', items };
}

export function plugin(source: string, fields: PluginFields = {}): SinglePluginSpec {
  const { dependencies, events } = fields;
  return {
    kind: 'plugin',
    source,
    version: fields.version,
    setup: fields.setup,
    dependencies: isSpecList(dependencies) ? group(...dependencies) : dependencies,
    events: typeof events === 'string' ? [events] : events,
    options: { ...fields.options },
  };
}

function isSpecList(value: PluginSpec | readonly PluginSpec[] | undefined): value is readonly PluginSpec[] {
  return Array.isArray(value);
}

// ─── Untyped configuration ───────────────────────────────────────

const LIFECYCLE_KEYS = new Set(['source', 'version', 'setup', 'dependencies', 'event', 'events']);

const eventsSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

/**
 * Shape of a single-plugin table. `dependencies` is checked by recursion.
 */
export const rawPluginSchema = z
  .object({
    source: z.string().min(1),
    version: z.string().min(1).optional(),
    setup: z.custom<SetupAction>((value) => typeof value === 'function', 'setup must be a function').optional(),
    event: eventsSchema.optional(),
    events: eventsSchema.optional(),
    dependencies: z.unknown().optional(),
  })
  .passthrough();

/**
 * Convert a duck-typed spec (string, table with `source`, or array of either)
 * into a PluginSpec.
 *
 * @throws ConfigurationError when the value matches none of the three shapes
 */
export function specFromRaw(value: unknown, where = 'spec'): PluginSpec {
  if (typeof value === 'string') {
    if (value.trim() === '') {
      throw new ConfigurationError(where, 'empty plugin identifier');
    }
    return identifier(value.trim());
  }

  if (Array.isArray(value)) {
    return group(...value.map((item, index) => specFromRaw(item, `${where}[${String(index)}]`)));
  }

  if (typeof value === 'object' && value !== null) {
    const parsed = rawPluginSchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') ?? '';
      throw new ConfigurationError(
        where,
        `invalid plugin table${field ? ` (${field})` : ''}: ${issue?.message ?? 'unknown shape'}`
      );
    }

    const table = parsed.data;
    const options: Record<string, unknown> = {};
    for (const [key, field] of Object.entries(table)) {
      if (!LIFECYCLE_KEYS.has(key)) {
        options[key] = field;
      }
    }

    return plugin(table.source, {
      version: table.version,
      setup: table.setup,
      dependencies:
        table.dependencies === undefined
          ? undefined
          : specFromRaw(table.dependencies, `${where}.dependencies`),
      events: table.events ?? table.event,
      options,
    });
  }

  throw new ConfigurationError(where, `expected a string, a plugin table or an array, got ${typeof value}`);
}

/**
 * Update Dispatcher
 *
 * Hands the divergence list to a selection surface and passes whatever it
 * picks to the installer's batch update.
 */

import type { Logger } from '../types/logger.js';
import type { PackageInstaller, UpdateRecord } from '../types/pack.js';

/** Identities to update, or every divergent package */
export type UpdateSelection = readonly string[] | 'all';

export interface UpdateSelector {
  select(records: readonly UpdateRecord[]): Promise<UpdateSelection> | UpdateSelection;
}

export function selectAll(): UpdateSelector {
  return { select: () => 'all' };
}

export function selectNamed(names: readonly string[]): UpdateSelector {
  return { select: () => names };
}

/**
 * @returns identities handed to the installer (empty when nothing was dispatched)
 */
export async function dispatchUpdates(
  records: readonly UpdateRecord[],
  selector: UpdateSelector,
  installer: Pick<PackageInstaller, 'update'>,
  logger: Logger
): Promise<string[]> {
  const log = logger.child({ component: 'update-dispatcher' });

  if (records.length === 0) {
    log.info('Everything is up to date');
    return [];
  }

  const selection = await selector.select(records);
  const divergent = new Set(records.map((r) => r.identity));

  let identities: string[];
  if (selection === 'all') {
    identities = [...divergent];
  } else {
    identities = [];
    for (const name of new Set(selection)) {
      if (divergent.has(name)) {
        identities.push(name);
      } else {
        log.warn({ identity: name }, 'Not in the divergence list, skipping');
      }
    }
  }

  if (identities.length === 0) {
    log.info('No packages selected');
    return [];
  }

  log.info({ identities }, 'Updating packages');
  await installer.update(identities);
  return identities;
}

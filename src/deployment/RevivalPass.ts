/**
 * @fileoverview One partition-and-revive pass over a set of stamped ghosts.
 *
 * ## Order
 * 1. Ghosts are split into deferred (rolling stock) and immediate (the rest),
 *    each keeping stamp order.
 * 2. Immediate ghosts are revived. A buildable ghost with item requests has
 *    its requests copied into the revived entity's module inventory.
 * 3. Deferred ghosts are revived.
 *
 * A ghost that fails to revive stays on the map as a ghost and is counted,
 * nothing else happens to it.
 *
 * @module deployment/RevivalPass
 */

import { cloneDeep, partition } from "lodash";
import { GhostEntity, HostEntity, ItemRequest } from "../host";
import { ENTITY_GHOST } from "./DeploymentConstants";
import { isRollingStock } from "./RollingStock";

/**
 * Statistics for one revival pass.
 */
export interface RevivalPassReport {
  /** Ghosts handed to the pass */
  ghosts: number;
  revived: number;
  failed: number;
  /** Rolling stock held back until the end of the pass */
  deferred: number;
  /** Items accepted by module inventories */
  modulesInserted: number;
}

/**
 * Ghosts whose requests must be copied over by hand after revival.
 */
function carriesItemRequests(ghost: GhostEntity): boolean {
  return (
    ghost.name === ENTITY_GHOST &&
    ghost.ghostType !== undefined &&
    ghost.itemRequests !== undefined
  );
}

function insertRequestedModules(entity: HostEntity, requests: ItemRequest[]): number {
  const inventory = entity.getModuleInventory();
  if (!inventory) {
    return 0;
  }

  let inserted = 0;
  for (const request of requests) {
    inserted += inventory.insert({
      name: request.name,
      count: request.count,
      quality: request.quality,
    });
  }
  return inserted;
}

/**
 * Revives every ghost of one stamp, rolling stock last.
 */
export function runRevivalPass(ghosts: readonly GhostEntity[]): RevivalPassReport {
  const report: RevivalPassReport = {
    ghosts: ghosts.length,
    revived: 0,
    failed: 0,
    deferred: 0,
    modulesInserted: 0,
  };

  const [deferred, immediate] = partition(ghosts, (ghost) => isRollingStock(ghost.ghostName));
  report.deferred = deferred.length;

  for (const ghost of immediate) {
    // Requests belong to the ghost and are gone once it is revived
    const requests = carriesItemRequests(ghost) ? cloneDeep(ghost.itemRequests) : undefined;

    const result = ghost.revive();
    if (!result.revived) {
      report.failed++;
      continue;
    }

    report.revived++;
    if (requests) {
      report.modulesInserted += insertRequestedModules(result.entity, requests);
    }
  }

  for (const ghost of deferred) {
    if (ghost.revive().revived) {
      report.revived++;
    } else {
      report.failed++;
    }
  }

  return report;
}

/**
 * @fileoverview Shared constants for blueprint deployment.
 *
 * Prototype names and fixed quantities used by the deployment engine,
 * kept in one place so the engine, the resource table and the tests agree.
 *
 * @module deployment/DeploymentConstants
 */

import { QualityName } from "../host";

// =============================================================================
// STAGING
// =============================================================================

/** Item placed in the holder entity before the payload is imported */
export const BLUEPRINT_ITEM = "blueprint";

/** Where the holder entity is dropped while the payload is staged */
export const HOLDER_POSITION = { x: 0, y: 0 } as const;

/** Index of the player whose position anchors the stamp */
export const REQUESTING_PLAYER_INDEX = 1;

/** Ghost entity name for buildable entities (tile ghosts use "tile-ghost") */
export const ENTITY_GHOST = "entity-ghost";

// =============================================================================
// RESOURCE PRE-SEEDING
// =============================================================================

/** Mining structure whose module request selects the resource beneath it */
export const RESOURCE_CONSUMER = "big-mining-drill";

/** Module item whose quality tier is read as the resource selector */
export const RESOURCE_SELECTOR_ITEM = "efficiency-module-3";

/** Units deposited per seeded patch */
export const RESOURCE_PATCH_AMOUNT = 10_000_000;

// =============================================================================
// BOT PROVISIONING
// =============================================================================

/** Entity type that anchors a logistics network */
export const PROVISIONING_HUB_TYPE = "roboport";

export const LOGISTIC_ROBOT = "logistic-robot";

/** Robots are always handed out at the top tier */
export const LOGISTIC_ROBOT_QUALITY: QualityName = "legendary";

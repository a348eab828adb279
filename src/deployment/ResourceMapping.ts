/**
 * @fileoverview Quality tier to resource lookup for pre-seeded patches.
 *
 * A resource consumer asks for the resource it should sit on by carrying a
 * selector module at a given quality tier. The table is closed: a request
 * that matches no row seeds nothing. New resources are new rows.
 *
 * @module deployment/ResourceMapping
 */

import { QualityName } from "../host";
import { RESOURCE_SELECTOR_ITEM } from "./DeploymentConstants";

export type ResourceName = "stone" | "iron-ore" | "copper-ore" | "coal";

export interface ResourceMappingRow {
  item: string;
  /** undefined = base tier (request carries no quality) */
  quality: QualityName | undefined;
  resource: ResourceName;
}

export const RESOURCE_MAPPING: readonly ResourceMappingRow[] = [
  { item: RESOURCE_SELECTOR_ITEM, quality: undefined, resource: "stone" },
  { item: RESOURCE_SELECTOR_ITEM, quality: "uncommon", resource: "iron-ore" },
  { item: RESOURCE_SELECTOR_ITEM, quality: "rare", resource: "copper-ore" },
  { item: RESOURCE_SELECTOR_ITEM, quality: "epic", resource: "coal" },
];

/**
 * Looks up the resource for an item request.
 * Both item name and quality must match a row exactly; "normal" is not
 * treated as the base tier.
 */
export function resolveResourceType(
  itemName: string,
  quality: QualityName | undefined,
  table: readonly ResourceMappingRow[] = RESOURCE_MAPPING
): ResourceName | undefined {
  const row = table.find((r) => r.item === itemName && r.quality === quality);
  return row?.resource;
}

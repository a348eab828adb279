/**
 * @fileoverview Deployment module exports.
 *
 * @module deployment
 */

export * from "./DeploymentConstants";
export { DeploymentError, BlueprintDecodeError } from "./DeploymentError";
export type { ResourceName, ResourceMappingRow } from "./ResourceMapping";
export { RESOURCE_MAPPING, resolveResourceType } from "./ResourceMapping";
export type { RollingStockName } from "./RollingStock";
export { ROLLING_STOCK, isRollingStock } from "./RollingStock";
export type { RevivalPassReport } from "./RevivalPass";
export { runRevivalPass } from "./RevivalPass";
export type { DeploymentContext, DeploymentReport, SeededPatch } from "./DeploymentEngine";
export { DeploymentEngine } from "./DeploymentEngine";

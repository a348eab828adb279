/**
 * @fileoverview Scheduler module exports.
 *
 * @module scheduler
 */

export type { SaveTriggerState, SchedulerHost, DeployFn } from "./Scheduler";
export { Scheduler } from "./Scheduler";

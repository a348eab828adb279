/**
 * @fileoverview Tick-driven one-shot gates for deployment and save.
 *
 * ## Lifecycle
 * One instance per session, created at bootstrap and dropped with the
 * session. Nothing is persisted, so a restarted session starts over.
 *
 * ## Every tick (multiplayer sessions only)
 * 1. DEPLOY: on the first tick, record it and run the deployment
 * 2. SAVE: once `tick - startTick >= saveAfterTicks`, save exactly once
 *
 * Each gate is latched before its operation runs. A deployment or save that
 * throws is not attempted again on a later tick.
 *
 * @module scheduler/Scheduler
 */

import { RunConfig } from "../config";
import { DeploymentReport } from "../deployment";
import { TickEvent } from "../host";

/**
 * State of the save trigger.
 * - disabled: threshold is 0, never arms
 * - not-started: waiting for deployment
 * - armed: counting ticks since deployment
 * - fired: terminal
 */
export type SaveTriggerState = "disabled" | "not-started" | "armed" | "fired";

/**
 * Host capabilities the scheduler needs.
 */
export interface SchedulerHost {
  isMultiplayer(): boolean;
  serverSave(name: string): void;
  print(message: string): void;
}

/** Runs the deployment synchronously to completion. */
export type DeployFn = () => DeploymentReport;

export class Scheduler {
  private deploymentStarted = false;
  private saveIssued = false;
  private startTick: number | undefined;
  private lastReport: DeploymentReport | undefined;

  constructor(
    private readonly host: SchedulerHost,
    private readonly config: RunConfig,
    private readonly deploy: DeployFn
  ) {}

  /**
   * Tick entry point. Must not be called again before it returns.
   */
  handleTick(event: TickEvent): void {
    if (!this.host.isMultiplayer()) {
      return;
    }

    if (!this.deploymentStarted) {
      this.startDeployment(event.tick);
    }

    if (this.shouldSave(event.tick)) {
      this.issueSave(event.tick);
    }
  }

  hasDeployed(): boolean {
    return this.deploymentStarted;
  }

  getStartTick(): number | undefined {
    return this.startTick;
  }

  getLastReport(): DeploymentReport | undefined {
    return this.lastReport;
  }

  getSaveTriggerState(): SaveTriggerState {
    if (this.config.saveAfterTicks <= 0) return "disabled";
    if (this.saveIssued) return "fired";
    return this.deploymentStarted ? "armed" : "not-started";
  }

  private startDeployment(tick: number): void {
    this.startTick = tick;
    this.deploymentStarted = true;
    console.log(`[Scheduler] Deployment started at tick ${tick}`);
    this.lastReport = this.deploy();
  }

  private shouldSave(tick: number): boolean {
    if (this.getSaveTriggerState() !== "armed" || this.startTick === undefined) {
      return false;
    }
    return tick - this.startTick >= this.config.saveAfterTicks;
  }

  private issueSave(tick: number): void {
    this.saveIssued = true;
    console.log(`[Scheduler] Saving "${this.config.saveGameName}" at tick ${tick}`);
    this.host.print("saving game");
    this.host.serverSave(this.config.saveGameName);
  }
}

/**
 * @fileoverview Blueprint deployment: stage, seed resources, build twice, provision.
 *
 * ## Protocol (runs once, within a single tick)
 * 1. STAGE: drop a holder entity, import the payload, decode its entities
 * 2. OFFSET: stamp at the anchor position; offset = first ghost - first blueprint entity
 * 3. SEED: place a resource patch under every resource consumer whose
 *    selector module maps to a resource
 * 4. BUILD: revive the first stamp (rolling stock last)
 * 5. RE-EVALUATE: stamp again and revive again, so consumers that could not
 *    be completed over bare ground are completed over the seeded patch;
 *    the holder is released after this stamp
 * 6. PROVISION: fill every roboport with logistic robots
 *
 * Nothing here may yield. The whole protocol must finish inside the tick
 * that started it, or participants diverge.
 *
 * @module deployment/DeploymentEngine
 */

import { sumBy } from "lodash";
import { RunConfig } from "../config";
import {
  BlueprintEntitySpec,
  BlueprintHolder,
  GhostEntity,
  HostSurface,
  Position,
  StatusSink,
  addPositions,
  formatPosition,
  subtractPositions,
} from "../host";
import {
  BLUEPRINT_ITEM,
  HOLDER_POSITION,
  LOGISTIC_ROBOT,
  LOGISTIC_ROBOT_QUALITY,
  PROVISIONING_HUB_TYPE,
  RESOURCE_CONSUMER,
  RESOURCE_PATCH_AMOUNT,
} from "./DeploymentConstants";
import { BlueprintDecodeError } from "./DeploymentError";
import { ResourceMappingRow, RESOURCE_MAPPING, resolveResourceType } from "./ResourceMapping";
import { RevivalPassReport, runRevivalPass } from "./RevivalPass";

/**
 * Where and for whom the blueprint is stamped.
 */
export interface DeploymentContext {
  surface: HostSurface;
  force: string;
  /** Anchor for both stamps, normally the requesting player's position */
  position: Position;
}

export interface SeededPatch {
  resource: string;
  amount: number;
  position: Position;
}

/**
 * Outcome of one deployment.
 */
export interface DeploymentReport {
  offset: Position;
  seededPatches: SeededPatch[];
  firstPass: RevivalPassReport;
  /** The completion-dependent re-evaluation pass */
  secondPass: RevivalPassReport;
  /** Hubs that accepted robots */
  provisionedHubs: number;
}

/**
 * Stamps the blueprint at the anchor and returns the ghosts it placed.
 */
function stamp(holder: BlueprintHolder, context: DeploymentContext): GhostEntity[] {
  return holder.buildBlueprint({
    surface: context.surface,
    force: context.force,
    position: context.position,
    forceBuild: true,
  });
}

export class DeploymentEngine {
  constructor(
    private readonly config: RunConfig,
    private readonly status: StatusSink,
    private readonly resourceTable: readonly ResourceMappingRow[] = RESOURCE_MAPPING
  ) {}

  /**
   * Runs the full protocol.
   *
   * @throws BlueprintDecodeError when the payload cannot be decoded or
   *   stamping it places nothing
   */
  deploy(context: DeploymentContext): DeploymentReport {
    this.status.print("starting placement");
    console.log(
      `[Deploy] Staging blueprint on ${context.surface.name} at ${formatPosition(context.position)}`
    );

    const holder = context.surface.createItemHolder(BLUEPRINT_ITEM, HOLDER_POSITION);

    let specs: BlueprintEntitySpec[];
    let firstGhosts: GhostEntity[];
    let offset: Position;
    try {
      specs = this.stageBlueprint(holder);
      firstGhosts = stamp(holder, context);
      offset = this.determineOffset(specs, firstGhosts);
    } catch (e) {
      holder.destroy();
      throw e;
    }

    const seededPatches = this.seedResources(context.surface, specs, offset);
    const firstPass = runRevivalPass(firstGhosts);
    const secondPass = this.reevaluateCompletion(holder, context);

    this.status.print("placement done");

    const provisionedHubs = this.provisionBots(context.surface);

    const report: DeploymentReport = {
      offset,
      seededPatches,
      firstPass,
      secondPass,
      provisionedHubs,
    };
    logReport(report);
    return report;
  }

  private stageBlueprint(holder: BlueprintHolder): BlueprintEntitySpec[] {
    const status = holder.importStack(this.config.blueprintString);
    if (status === -1) {
      throw new BlueprintDecodeError("blueprint payload could not be imported");
    }
    if (status === 1) {
      console.log(`[Deploy] Blueprint imported with errors, continuing`);
    }

    const specs = holder.getBlueprintEntities();
    if (!specs || specs.length === 0) {
      throw new BlueprintDecodeError("blueprint payload contains no entities");
    }
    return specs;
  }

  /**
   * Offset between the authored layout and the map, taken from the first
   * entity of each and reused for every derived position in this deployment.
   */
  private determineOffset(specs: BlueprintEntitySpec[], ghosts: GhostEntity[]): Position {
    if (ghosts.length === 0) {
      throw new BlueprintDecodeError("stamping the blueprint placed no ghosts");
    }
    return subtractPositions(ghosts[0].position, specs[0].position);
  }

  /**
   * Places resource patches under resource consumers. Reads the decoded
   * specs only, so it runs exactly once per deployment.
   */
  private seedResources(
    surface: HostSurface,
    specs: BlueprintEntitySpec[],
    offset: Position
  ): SeededPatch[] {
    const patches: SeededPatch[] = [];

    for (const spec of specs) {
      if (spec.name !== RESOURCE_CONSUMER || !spec.items) continue;

      for (const request of spec.items) {
        const resource = resolveResourceType(request.name, request.quality, this.resourceTable);
        if (!resource) continue;

        const patch: SeededPatch = {
          resource,
          amount: RESOURCE_PATCH_AMOUNT,
          position: addPositions(spec.position, offset),
        };
        surface.createEntity({ name: patch.resource, amount: patch.amount, position: patch.position });
        patches.push(patch);
      }
    }

    return patches;
  }

  /**
   * Completion-dependent re-evaluation pass.
   *
   * Ghosts from the first stamp were judged against the map as it was before
   * any resource was seeded. Stamping again yields ghosts judged against the
   * current map, so resource consumers can now be completed. Runs even when
   * nothing was seeded.
   */
  private reevaluateCompletion(holder: BlueprintHolder, context: DeploymentContext): RevivalPassReport {
    let ghosts: GhostEntity[];
    try {
      ghosts = stamp(holder, context);
    } finally {
      holder.destroy();
    }
    return runRevivalPass(ghosts);
  }

  private provisionBots(surface: HostSurface): number {
    if (this.config.botCount <= 0) {
      return 0;
    }

    let provisioned = 0;
    for (const hub of surface.findEntitiesFiltered({ type: PROVISIONING_HUB_TYPE })) {
      const inserted = hub.insert({
        name: LOGISTIC_ROBOT,
        count: this.config.botCount,
        quality: LOGISTIC_ROBOT_QUALITY,
      });
      if (inserted > 0) provisioned++;
    }
    return provisioned;
  }
}

function logReport(report: DeploymentReport): void {
  const passes = [report.firstPass, report.secondPass];
  console.log(
    `[Deploy] Done: offset ${formatPosition(report.offset)}, ` +
      `${report.seededPatches.length} patches, ` +
      `pass 1 ${report.firstPass.revived}/${report.firstPass.ghosts} revived, ` +
      `pass 2 ${report.secondPass.revived}/${report.secondPass.ghosts} revived, ` +
      `${sumBy(passes, (p) => p.failed)} left as ghosts, ` +
      `${report.provisionedHubs} roboports provisioned`
  );
}

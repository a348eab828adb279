/**
 * @fileoverview Session entry point for the blueprint deployer.
 *
 * The host calls {@link bootstrap} once when the session starts. From then on
 * everything is driven by tick notifications:
 *
 * ### FIRST TICK (multiplayer only)
 * Stamp the blueprint at player 1's position, seed resources, build it in
 * two passes and hand out logistic robots.
 *
 * ### LATER TICKS
 * Save once the configured number of ticks has passed.
 *
 * @module main
 */

import { loadRunConfig, StartupSettings } from "./config";
import { DeploymentEngine, DeploymentError, REQUESTING_PLAYER_INDEX } from "./deployment";
import { SimulationHost, TickEvent } from "./host";
import { Scheduler } from "./scheduler";
import { ErrorMapper } from "./utils";

export * from "./config";
export * from "./deployment";
export * from "./host";
export * from "./scheduler";
export * from "./utils";

/**
 * Reads the configuration, builds the scheduler and subscribes it to ticks.
 *
 * @throws ConfigError when the startup settings are invalid
 */
export function bootstrap(host: SimulationHost, settings: StartupSettings): Scheduler {
  const config = loadRunConfig(settings);
  const engine = new DeploymentEngine(config, host);

  const scheduler = new Scheduler(host, config, () => {
    const player = host.getPlayer(REQUESTING_PLAYER_INDEX);
    if (!player) {
      throw new DeploymentError(`player ${REQUESTING_PLAYER_INDEX} is not connected`);
    }
    return engine.deploy({
      surface: player.surface,
      force: player.forceName,
      position: player.position,
    });
  });

  host.onTick(ErrorMapper.wrapHandler(host, (event: TickEvent) => scheduler.handleTick(event)));
  return scheduler;
}

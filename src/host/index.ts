/**
 * @fileoverview Host capability exports.
 *
 * @module host
 */

export type {
  Position,
  QualityName,
  ItemRequest,
  ItemStack,
  BlueprintEntitySpec,
  ImportStatus,
  HostInventory,
  HostEntity,
  RevivalResult,
  GhostEntity,
  StampOptions,
  BlueprintHolder,
  CreateEntityOptions,
  EntityFilter,
  HostSurface,
  HostPlayer,
  TickEvent,
  TickHandler,
  StatusSink,
  SimulationHost,
} from "./HostApi";

export { addPositions, subtractPositions, formatPosition } from "./Position";

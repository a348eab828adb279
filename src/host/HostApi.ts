/**
 * @fileoverview Capabilities consumed from the simulation host.
 *
 * The deployer never touches host globals. Every capability it needs is
 * described here and handed in through {@link SimulationHost}, so the same
 * code runs against a live adapter or the in-process fake used by tests.
 *
 * Names follow the host's own vocabulary: a blueprint is imported into a
 * holder entity, stamped onto a surface as ghosts, and ghosts are revived
 * into real entities.
 *
 * @module host/HostApi
 */

/** Map coordinates. Tile centres sit on half-integers for odd-sized entities. */
export interface Position {
  x: number;
  y: number;
}

/**
 * Quality tier name. Absent quality on a request means the base tier.
 */
export type QualityName = "normal" | "uncommon" | "rare" | "epic" | "legendary";

/** One requested item on a blueprint entity or ghost. */
export interface ItemRequest {
  name: string;
  /** undefined = base tier */
  quality?: QualityName;
  count: number;
}

/** A stack handed to an inventory insert. */
export interface ItemStack {
  name: string;
  count: number;
  quality?: QualityName;
}

/** One authored entity, as decoded from a blueprint payload. */
export interface BlueprintEntitySpec {
  entityNumber: number;
  name: string;
  position: Position;
  items?: ItemRequest[];
}

/**
 * Result of {@link BlueprintHolder.importStack}.
 * 0 = imported, 1 = imported with errors, -1 = not imported.
 */
export type ImportStatus = 0 | 1 | -1;

export interface HostInventory {
  /** @returns number of items actually inserted */
  insert(stack: ItemStack): number;
}

/** A real (non-ghost) entity on a surface. */
export interface HostEntity {
  readonly name: string;
  readonly type: string;
  readonly position: Position;
  insert(stack: ItemStack): number;
  /** undefined when the entity has no module slots */
  getModuleInventory(): HostInventory | undefined;
}

/**
 * Outcome of reviving a ghost. A ghost that cannot be built yet is not an
 * error, it simply stays where it is.
 */
export type RevivalResult =
  | { revived: true; entity: HostEntity }
  | { revived: false };

/** A provisional entity placed by stamping a blueprint. */
export interface GhostEntity {
  /** "entity-ghost" for buildable entities, "tile-ghost" for tiles */
  readonly name: string;
  /** Name of the entity this ghost will become */
  readonly ghostName: string;
  /** Prototype type of that entity; undefined for tile ghosts */
  readonly ghostType: string | undefined;
  readonly position: Position;
  readonly itemRequests: ItemRequest[] | undefined;
  revive(): RevivalResult;
}

export interface StampOptions {
  surface: HostSurface;
  force: string;
  position: Position;
  forceBuild: boolean;
}

/** Item-holder entity carrying a blueprint stack. */
export interface BlueprintHolder {
  importStack(payload: string): ImportStatus;
  getBlueprintEntities(): BlueprintEntitySpec[] | undefined;
  buildBlueprint(options: StampOptions): GhostEntity[];
  destroy(): void;
}

/** Plain entity creation, used for resource patches. */
export interface CreateEntityOptions {
  name: string;
  position: Position;
  amount?: number;
}

export interface EntityFilter {
  type?: string;
  name?: string;
}

export interface HostSurface {
  readonly name: string;
  createEntity(options: CreateEntityOptions): HostEntity | undefined;
  /** Creates an item-on-ground entity holding an empty stack of `item`. */
  createItemHolder(item: string, position: Position): BlueprintHolder;
  findEntitiesFiltered(filter: EntityFilter): HostEntity[];
}

export interface HostPlayer {
  readonly index: number;
  readonly position: Position;
  readonly surface: HostSurface;
  readonly forceName: string;
}

export interface TickEvent {
  tick: number;
}

export type TickHandler = (event: TickEvent) => void;

/** Player-visible output channel. */
export interface StatusSink {
  print(message: string): void;
}

export interface SimulationHost extends StatusSink {
  isMultiplayer(): boolean;
  getPlayer(index: number): HostPlayer | undefined;
  serverSave(name: string): void;
  onTick(handler: TickHandler): void;
}

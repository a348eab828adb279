/**
 * Position arithmetic on map coordinates.
 * Abstract from the host's MapPosition, which also accepts `[x, y]` tuples.
 */
import { Position } from "./HostApi";

/**
 * Component-wise sum, used to move a blueprint-local position onto the map.
 */
export function addPositions(a: Position, b: Position): Position {
  return { x: a.x + b.x, y: a.y + b.y };
}

/**
 * Component-wise difference `a - b`.
 */
export function subtractPositions(a: Position, b: Position): Position {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function formatPosition(pos: Position): string {
  return `(${pos.x}, ${pos.y})`;
}

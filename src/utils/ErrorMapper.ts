/**
 * @fileoverview Error handling for host event handlers.
 *
 * An error escaping a tick handler would take the host session down with
 * it. Handlers are wrapped so the error is logged, shown to players, and the
 * next tick is delivered as usual.
 *
 * @module utils/ErrorMapper
 */

import { StatusSink } from "../host";

export function describeError(e: unknown): string {
  if (e instanceof Error) {
    return e.stack ? `${e.message}\n${e.stack}` : e.message;
  }
  return String(e);
}

/**
 * Error handling utilities for event handlers.
 *
 * @example
 * host.onTick(ErrorMapper.wrapHandler(host, (event) => {
 *   // handler logic here
 * }));
 */
export const ErrorMapper = {
  /**
   * Wraps a handler to catch and report any error.
   *
   * @param sink - Where players see the failure
   * @param fn - Handler to wrap
   */
  wrapHandler<TArgs extends unknown[]>(
    sink: StatusSink,
    fn: (...args: TArgs) => void
  ): (...args: TArgs) => void {
    return (...args: TArgs) => {
      try {
        fn(...args);
      } catch (e) {
        console.error(`Error in handler: ${describeError(e)}`);
        sink.print(`deployment error: ${e instanceof Error ? e.message : String(e)}`);
      }
    };
  },
};

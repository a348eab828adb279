/**
 * Rolling stock is revived only after everything else in a pass, so that
 * the rails it sits on already exist.
 */
export const ROLLING_STOCK = ["locomotive", "cargo-wagon", "fluid-wagon"] as const;

export type RollingStockName = (typeof ROLLING_STOCK)[number];

const ROLLING_STOCK_NAMES: ReadonlySet<string> = new Set(ROLLING_STOCK);

export function isRollingStock(entityName: string): entityName is RollingStockName {
  return ROLLING_STOCK_NAMES.has(entityName);
}

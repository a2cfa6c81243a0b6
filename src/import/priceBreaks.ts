import type { PartRepository, PriceBreak, SupplierPart } from "../inventree/types.js";
import { logger, type Logger } from "../utils/logger.js";

export type PriceBreakSyncSummary = {
  created: number[];
  updated: number[];
  unchanged: number[];
};

/**
 * Brings the supplier part's price breaks in line with the quoted tiers. Tiers the
 * supplier no longer quotes are left alone.
 */
export async function syncPriceBreaks(
  repository: PartRepository,
  supplierPart: SupplierPart,
  priceBreaks: ReadonlyMap<number, number>,
  currency: string,
  log: Logger = logger
): Promise<PriceBreakSyncSummary> {
  const existing = new Map<number, PriceBreak>();
  for (const priceBreak of await repository.listPriceBreaks(supplierPart.pk)) {
    existing.set(Number(priceBreak.quantity), priceBreak);
  }

  const summary: PriceBreakSyncSummary = { created: [], updated: [], unchanged: [] };
  for (const [quantity, price] of priceBreaks) {
    const current = existing.get(quantity);
    if (current) {
      if (samePrice(current.price, price)) {
        summary.unchanged.push(quantity);
        continue;
      }
      await repository.updatePriceBreak(current.pk, { price, price_currency: currency });
      summary.updated.push(quantity);
    } else {
      await repository.createPriceBreak({ part: supplierPart.pk, quantity, price, price_currency: currency });
      summary.created.push(quantity);
    }
  }

  if (summary.created.length || summary.updated.length) {
    log.info({ msg: "updating price breaks ...", created: summary.created, updated: summary.updated });
  }

  return summary;
}

function samePrice(stored: number | string, quoted: number): boolean {
  const parsed = typeof stored === "number" ? stored : Number(stored);
  return Number.isFinite(parsed) && parsed === quoted;
}

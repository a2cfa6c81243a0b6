import type { Env } from "../config/env.js";
import { logger, type Logger } from "../utils/logger.js";
import { DigiKeySupplier } from "./digikey.js";
import type { Supplier } from "./types.js";

type SupplierFactory = {
  id: string;
  create(env: Env): Supplier | null;
};

const factories: SupplierFactory[] = [
  {
    id: "digikey",
    create(env) {
      if (!env.DIGIKEY_CLIENT_ID || !env.DIGIKEY_CLIENT_SECRET) {
        return null;
      }
      return new DigiKeySupplier({
        clientId: env.DIGIKEY_CLIENT_ID,
        clientSecret: env.DIGIKEY_CLIENT_SECRET,
        apiUrl: env.DIGIKEY_API_URL,
        currency: env.DIGIKEY_CURRENCY,
        language: env.DIGIKEY_LANGUAGE,
        location: env.DIGIKEY_LOCATION
      });
    }
  }
];

export const supplierIds = factories.map((factory) => factory.id);

/** Suppliers in registration order; one without credentials stays disabled. */
export function supplierRegistry(env: Env, log: Logger = logger): Supplier[] {
  const suppliers: Supplier[] = [];
  for (const factory of factories) {
    const supplier = factory.create(env);
    if (supplier) {
      suppliers.push(supplier);
    } else {
      log.debug({ msg: `supplier '${factory.id}' is not configured` });
    }
  }
  return suppliers;
}

import { z } from "zod";
import { CacheStore } from "../utils/cacheStore.js";
import { errorMessage, ImportError } from "../utils/errors.js";
import { createChildLogger, type Logger } from "../utils/logger.js";
import { ApiPart, type ApiPartFields, type Supplier, type SupplierSearchResult } from "./types.js";

type FetchLike = typeof fetch;

export type DigiKeyOptions = {
  clientId: string;
  clientSecret: string;
  apiUrl?: string;
  currency?: string;
  language?: string;
  location?: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  now?: () => number;
  log?: Logger;
};

export const DIGIKEY_RECORD_COUNT = 10;
const MANUFACTURER_PAGE = "Manufacturer Product Page";
const TOKEN_KEY = "client_credentials";
// refresh a little before the server would reject the token
const TOKEN_EXPIRY_MARGIN_S = 60;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive()
});

export class DigiKeySupplier implements Supplier {
  readonly id = "digikey";
  readonly name = "DigiKey";

  private readonly apiUrl: string;
  private readonly currency: string;
  private readonly language: string;
  private readonly location: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly tokens: CacheStore<string>;
  private readonly log: Logger;

  constructor(private readonly options: DigiKeyOptions) {
    this.apiUrl = (options.apiUrl ?? "https://api.digikey.com").replace(/\/+$/, "");
    this.currency = options.currency ?? "EUR";
    this.language = options.language ?? "en";
    this.location = options.location ?? "DE";
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.tokens = new CacheStore<string>(60_000, 1, options.now);
    this.log = options.log ?? createChildLogger({ supplier: this.id });
  }

  async search(term: string): Promise<SupplierSearchResult> {
    const details = await this.productDetails(term);
    if (details) {
      const part = this.toApiPart(details, true);
      if (part) {
        return { parts: [part], total: 1 };
      }
    }

    const payload = await this.request("POST", "/Search/v3/Products/Keyword", {
      Keywords: term,
      RecordCount: DIGIKEY_RECORD_COUNT
    });
    if (!isRecord(payload)) {
      throw new ImportError("unexpected DigiKey keyword search response", "supplier_response");
    }

    const needle = term.toLowerCase();
    const exactManufacturerCount = numericOrUndefined(payload.ExactManufacturerProductsCount) ?? 0;
    let products: Record<string, unknown>[];
    let total: number;
    if (exactManufacturerCount > 0) {
      products = recordsOf(payload.ExactManufacturerProducts);
      total = exactManufacturerCount;
    } else {
      products = recordsOf(payload.Products).filter((product) =>
        (firstText([product.ManufacturerPartNumber]) ?? "").toLowerCase().startsWith(needle)
      );
      total = numericOrUndefined(payload.ProductsCount) ?? products.length;
    }

    const exact = products.filter((product) =>
      (firstText([product.ManufacturerPartNumber]) ?? "").toLowerCase() === needle
    );
    if (exact.length === 1) {
      products = exact;
      total = 1;
    }

    const parts: ApiPart[] = [];
    for (const product of products) {
      const part = this.toApiPart(product, false);
      if (part) {
        parts.push(part);
      }
    }
    return { parts, total };
  }

  /** Exact part-number lookup. Resolves null when DigiKey does not know the number. */
  async productDetails(partNumber: string): Promise<Record<string, unknown> | null> {
    const payload = await this.request("GET", `/Search/v3/Products/${encodeURIComponent(partNumber)}`);
    return isRecord(payload) ? payload : null;
  }

  private toApiPart(product: Record<string, unknown>, fromDetails: boolean): ApiPart | null {
    const fields = parseDigiKeyProduct(product, this.currency);
    if (!fields) {
      return null;
    }
    if (fromDetails) {
      return new ApiPart(fields);
    }
    // keyword results lack the media links, so fetch the full record before import
    return new ApiPart(fields, async (part) => {
      const details = await this.productDetails(part.sku);
      return details ? parseDigiKeyProduct(details, this.currency) : null;
    });
  }

  private async accessToken(): Promise<string> {
    const cached = this.tokens.get(TOKEN_KEY);
    if (cached) {
      return cached;
    }

    const body = new URLSearchParams({
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      grant_type: "client_credentials"
    });
    const response = await this.send(`${this.apiUrl}/v1/oauth2/token`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded", Accept: "application/json" },
      body: body.toString()
    });
    if (!response.ok) {
      throw new ImportError(`DigiKey authentication failed with status ${response.status}`, "supplier_auth");
    }

    const token = tokenResponseSchema.parse(await response.json());
    const lifetimeMs = Math.max(0, token.expires_in - TOKEN_EXPIRY_MARGIN_S) * 1000;
    this.tokens.set(TOKEN_KEY, token.access_token, lifetimeMs);
    this.log.debug({ msg: "fetched DigiKey access token", expiresIn: token.expires_in });
    return token.access_token;
  }

  private async request(method: "GET" | "POST", path: string, json?: unknown): Promise<unknown> {
    const token = await this.accessToken();
    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Bearer ${token}`,
      "X-DIGIKEY-Client-Id": this.options.clientId,
      "X-DIGIKEY-Locale-Currency": this.currency,
      "X-DIGIKEY-Locale-Site": this.location,
      "X-DIGIKEY-Locale-Language": this.language
    };
    if (json !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    const response = await this.send(`${this.apiUrl}${path}`, {
      method,
      headers,
      body: json === undefined ? undefined : JSON.stringify(json)
    });
    if (response.status === 404) {
      return null;
    }
    if (response.status === 401) {
      this.tokens.delete(TOKEN_KEY);
    }
    if (!response.ok) {
      throw new ImportError(`DigiKey request ${method} ${path} failed with status ${response.status}`, "supplier_http");
    }
    return response.json();
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (error) {
      throw new ImportError(`DigiKey request to ${url} failed: ${errorMessage(error)}`, "supplier_network");
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Maps a DigiKey product record to supplier part fields. Returns null when the
 * record has no DigiKey or manufacturer part number.
 */
export function parseDigiKeyProduct(payload: unknown, currency: string): ApiPartFields | null {
  if (!isRecord(payload)) {
    return null;
  }

  const sku = firstText([payload.DigiKeyPartNumber]);
  const mpn = firstText([payload.ManufacturerPartNumber]);
  if (!sku || !mpn) {
    return null;
  }

  const family = valueOf(payload.Family);
  const categoryPath = [valueOf(payload.Category), ...(family ? family.split(" - ") : [])]
    .map((segment) => segment?.trim() ?? "")
    .filter((segment) => segment.length > 0);

  const parameters = new Map<string, string>();
  for (const entry of recordsOf(payload.Parameters)) {
    const name = firstText([entry.Parameter]);
    const value = firstText([entry.Value]);
    if (name && value) {
      parameters.set(name, value);
    }
  }

  const priceBreaks = new Map<number, number>();
  for (const entry of recordsOf(payload.StandardPricing)) {
    const quantity = numericOrUndefined(entry.BreakQuantity);
    const price = numericOrUndefined(entry.UnitPrice);
    if (quantity !== undefined && price !== undefined) {
      priceBreaks.set(quantity, price);
    }
  }

  const manufacturerPage = recordsOf(payload.MediaLinks).find((media) => media.MediaType === MANUFACTURER_PAGE);

  return {
    description: firstText([payload.ProductDescription, payload.DetailedDescription]) ?? "",
    imageUrl: absoluteUrl(firstText([payload.PrimaryPhoto])),
    datasheetUrl: absoluteUrl(firstText([payload.PrimaryDatasheet])),
    supplierLink: firstText([payload.ProductUrl]) ?? "",
    sku,
    manufacturer: valueOf(payload.Manufacturer) ?? "",
    manufacturerLink: absoluteUrl(firstText([manufacturerPage?.Url])),
    mpn,
    quantityAvailable:
      (numericOrUndefined(payload.QuantityAvailable) ?? 0) + (numericOrUndefined(payload.ManufacturerPublicQuantity) ?? 0),
    packaging: valueOf(payload.Packaging) ?? "",
    categoryPath,
    parameters,
    priceBreaks,
    currency
  };
}

// DigiKey media links are often protocol-relative
function absoluteUrl(value: string | null): string {
  if (!value) return "";
  return value.startsWith("//") ? `https:${value}` : value;
}

function valueOf(value: unknown): string | null {
  return isRecord(value) ? firstText([value.Value]) : null;
}

function recordsOf(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function firstText(candidates: unknown[]): string | null {
  for (const candidate of candidates) {
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      return candidate.trim();
    }
  }
  return null;
}

function numericOrUndefined(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

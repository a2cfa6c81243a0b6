import { z } from "zod";
import { errorMessage, RepositoryHttpError } from "../utils/errors.js";
import { logger, type Logger } from "../utils/logger.js";
import type {
  Attachment,
  Company,
  ManufacturerPart,
  NewEntity,
  Parameter,
  ParameterTemplate,
  Part,
  PartCategory,
  PartRepository,
  Patch,
  PriceBreak,
  StockItem,
  SupplierPart
} from "./types.js";

type FetchLike = typeof fetch;

export type InventreeClientOptions = {
  baseUrl: string;
  token: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
  log?: Logger;
};

type Query = Record<string, string | number | boolean>;

type RequestInput = {
  query?: Query;
  json?: unknown;
  form?: FormData;
};

const DEFAULT_TIMEOUT_MS = 15_000;

const optionalText = z.string().nullish().transform((value) => value ?? undefined);

const companySchema: z.ZodType<Company, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  name: z.string(),
  description: optionalText,
  website: optionalText,
  is_manufacturer: z.boolean(),
  is_supplier: z.boolean()
});

const categorySchema: z.ZodType<PartCategory, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  name: z.string(),
  pathstring: z.string(),
  parent: z.number().nullable(),
  description: optionalText,
  structural: z.boolean().optional()
});

const partSchema: z.ZodType<Part, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  name: z.string(),
  description: z.string().nullish().transform((value) => value ?? ""),
  category: z.number().nullable(),
  link: optionalText,
  image: z.string().nullish(),
  purchaseable: z.boolean().optional(),
  component: z.boolean().optional()
});

const manufacturerPartSchema: z.ZodType<ManufacturerPart, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  part: z.number(),
  manufacturer: z.number(),
  MPN: z.string(),
  description: optionalText,
  link: optionalText
});

const supplierPartSchema: z.ZodType<SupplierPart, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  part: z.number(),
  supplier: z.number(),
  manufacturer_part: z.number().nullable(),
  SKU: z.string(),
  description: optionalText,
  link: optionalText,
  packaging: optionalText,
  available: z.coerce.number().optional()
});

const priceBreakSchema: z.ZodType<PriceBreak, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  part: z.number(),
  quantity: z.coerce.number(),
  price: z.union([z.number(), z.string()]),
  price_currency: optionalText
});

const parameterTemplateSchema: z.ZodType<ParameterTemplate, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  name: z.string(),
  units: optionalText,
  description: optionalText
});

const parameterSchema: z.ZodType<Parameter, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  part: z.number(),
  template: z.number(),
  data: z.string(),
  template_detail: z.object({ name: z.string() }).nullish().transform((value) => value ?? undefined)
});

const attachmentSchema: z.ZodType<Attachment, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  comment: z.string().nullish().transform((value) => value ?? ""),
  link: z.string().nullish(),
  attachment: z.string().nullish()
});

const stockItemSchema: z.ZodType<StockItem, z.ZodTypeDef, unknown> = z.object({
  pk: z.number(),
  part: z.number(),
  location: z.number(),
  quantity: z.coerce.number()
});

/** List endpoints answer with a bare array, or with `{ results }` when paginated. */
function listOf<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z.union([
    z.array(schema),
    z.object({ results: z.array(schema) }).transform((page) => page.results)
  ]);
}

export class InventreeClient implements PartRepository {
  readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(options: InventreeClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = Math.max(500, Math.floor(options.timeoutMs ?? DEFAULT_TIMEOUT_MS));
    this.log = options.log ?? logger;
  }

  async findCompany(name: string, role: "manufacturer" | "supplier"): Promise<Company | null> {
    const query: Query = role === "manufacturer" ? { name, is_manufacturer: true } : { name, is_supplier: true };
    const companies = await this.list("/api/company/", companySchema, query);
    return companies.find((company) => company.name === name) ?? null;
  }

  async createCompany(data: NewEntity<Company>): Promise<Company> {
    return this.send("POST", "/api/company/", companySchema, { json: data });
  }

  async getPart(pk: number): Promise<Part> {
    return this.send("GET", `/api/part/${pk}/`, partSchema);
  }

  async findPartByName(name: string): Promise<Part | null> {
    const parts = await this.list("/api/part/", partSchema, { name_regex: `^${escapeRegExp(name)}$` });
    return parts.find((part) => part.name === name) ?? null;
  }

  async createPart(data: NewEntity<Part>): Promise<Part> {
    return this.send("POST", "/api/part/", partSchema, { json: data });
  }

  async updatePart(pk: number, patch: Patch<Part>): Promise<Part> {
    return this.send("PATCH", `/api/part/${pk}/`, partSchema, { json: patch });
  }

  async uploadPartImage(pk: number, imageUrl: string): Promise<Part | null> {
    const file = await this.download(imageUrl);
    if (!file) {
      return null;
    }
    const form = new FormData();
    form.append("image", file.blob, file.name);
    return this.send("PATCH", `/api/part/${pk}/`, partSchema, { form });
  }

  async listAttachments(partPk: number): Promise<Attachment[]> {
    return this.list("/api/attachment/", attachmentSchema, { model_type: "part", model_id: partPk });
  }

  async addLinkAttachment(partPk: number, link: string, comment: string): Promise<Attachment> {
    return this.send("POST", "/api/attachment/", attachmentSchema, {
      json: { model_type: "part", model_id: partPk, link, comment }
    });
  }

  async uploadAttachment(partPk: number, fileUrl: string, comment: string): Promise<Attachment> {
    const file = await this.download(fileUrl);
    if (!file) {
      this.log.warn({ msg: `falling back to a link attachment for '${fileUrl}'` });
      return this.addLinkAttachment(partPk, fileUrl.slice(0, 200), comment);
    }
    const form = new FormData();
    form.append("model_type", "part");
    form.append("model_id", String(partPk));
    form.append("comment", comment);
    form.append("attachment", file.blob, file.name);
    return this.send("POST", "/api/attachment/", attachmentSchema, { form });
  }

  async getManufacturerPart(pk: number): Promise<ManufacturerPart> {
    return this.send("GET", `/api/company/part/manufacturer/${pk}/`, manufacturerPartSchema);
  }

  async findManufacturerPartByMpn(mpn: string): Promise<ManufacturerPart | null> {
    const parts = await this.list("/api/company/part/manufacturer/", manufacturerPartSchema, { MPN: mpn });
    return parts.find((part) => part.MPN === mpn) ?? null;
  }

  async createManufacturerPart(data: NewEntity<ManufacturerPart>): Promise<ManufacturerPart> {
    return this.send("POST", "/api/company/part/manufacturer/", manufacturerPartSchema, { json: data });
  }

  async updateManufacturerPart(pk: number, patch: Patch<ManufacturerPart>): Promise<ManufacturerPart> {
    return this.send("PATCH", `/api/company/part/manufacturer/${pk}/`, manufacturerPartSchema, { json: patch });
  }

  async findSupplierPartBySku(sku: string): Promise<SupplierPart | null> {
    const parts = await this.list("/api/company/part/", supplierPartSchema, { SKU: sku });
    return parts.find((part) => part.SKU === sku) ?? null;
  }

  async createSupplierPart(data: NewEntity<SupplierPart>): Promise<SupplierPart> {
    return this.send("POST", "/api/company/part/", supplierPartSchema, { json: data });
  }

  async updateSupplierPart(pk: number, patch: Patch<SupplierPart>): Promise<SupplierPart> {
    return this.send("PATCH", `/api/company/part/${pk}/`, supplierPartSchema, { json: patch });
  }

  async listPriceBreaks(supplierPartPk: number): Promise<PriceBreak[]> {
    return this.list("/api/company/price-break/", priceBreakSchema, { part: supplierPartPk });
  }

  async createPriceBreak(data: NewEntity<PriceBreak>): Promise<PriceBreak> {
    return this.send("POST", "/api/company/price-break/", priceBreakSchema, { json: data });
  }

  async updatePriceBreak(pk: number, patch: Patch<PriceBreak>): Promise<PriceBreak> {
    return this.send("PATCH", `/api/company/price-break/${pk}/`, priceBreakSchema, { json: patch });
  }

  async listParameters(partPk: number): Promise<Parameter[]> {
    return this.list("/api/part/parameter/", parameterSchema, { part: partPk });
  }

  async createParameter(data: NewEntity<Parameter>): Promise<Parameter> {
    return this.send("POST", "/api/part/parameter/", parameterSchema, { json: data });
  }

  async updateParameter(pk: number, patch: Patch<Parameter>): Promise<Parameter> {
    return this.send("PATCH", `/api/part/parameter/${pk}/`, parameterSchema, { json: patch });
  }

  async listParameterTemplates(): Promise<ParameterTemplate[]> {
    return this.list("/api/part/parameter/template/", parameterTemplateSchema);
  }

  async createParameterTemplate(data: NewEntity<ParameterTemplate>): Promise<ParameterTemplate> {
    return this.send("POST", "/api/part/parameter/template/", parameterTemplateSchema, { json: data });
  }

  async listCategories(): Promise<PartCategory[]> {
    return this.list("/api/part/category/", categorySchema);
  }

  async createCategory(data: Omit<NewEntity<PartCategory>, "pathstring">): Promise<PartCategory> {
    return this.send("POST", "/api/part/category/", categorySchema, { json: data });
  }

  async createStockItem(data: NewEntity<StockItem>): Promise<StockItem> {
    return this.send("POST", "/api/stock/", stockItemSchema, { json: data });
  }

  private async list<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, query?: Query): Promise<T[]> {
    return this.send("GET", path, listOf(schema), { query });
  }

  private async send<T>(
    method: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    input: RequestInput = {}
  ): Promise<T> {
    const url = new URL(path, `${this.baseUrl}/`);
    for (const [key, value] of Object.entries(input.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = {
      Accept: "application/json",
      Authorization: `Token ${this.token}`
    };
    let body: string | FormData | undefined;
    if (input.form) {
      body = input.form;
    } else if (input.json !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(input.json);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url.toString(), { method, headers, body, signal: controller.signal });
      text = await response.text();
    } catch (error) {
      throw new RepositoryHttpError({ status: 0, method, url: url.toString(), body: "", message: errorMessage(error) });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new RepositoryHttpError({ status: response.status, method, url: url.toString(), body: text });
    }

    this.log.debug({ msg: "inventree request", method, url: url.toString(), status: response.status });
    return schema.parse(text ? JSON.parse(text) : null);
  }

  private async download(fileUrl: string): Promise<{ blob: Blob; name: string } | null> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await this.fetchImpl(fileUrl, {
        method: "GET",
        signal: controller.signal,
        headers: { "User-Agent": "Mozilla/5.0 (compatible; partsync/0.1)" }
      });
      if (!response.ok) {
        this.log.warn({ msg: `failed to download '${fileUrl}' (status ${response.status})` });
        return null;
      }
      return { blob: await response.blob(), name: fileNameOf(fileUrl) };
    } catch (error) {
      this.log.warn({ msg: `failed to download '${fileUrl}'`, error: errorMessage(error) });
      return null;
    } finally {
      clearTimeout(timeout);
    }
  }
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function fileNameOf(fileUrl: string): string {
  try {
    const name = new URL(fileUrl).pathname.split("/").filter(Boolean).pop();
    return name ? decodeURIComponent(name) : "download";
  } catch {
    return "download";
  }
}

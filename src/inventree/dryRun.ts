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

/** Placeholder id of entities a dry run pretends to create. */
export const DRY_RUN_PK = 0;

/**
 * Passes reads through to the wrapped repository and turns every write into a log
 * line. Created entities come back with `pk` 0; lookups keyed by pk 0 return nothing.
 */
export class DryRunRepository implements PartRepository {
  readonly writes: Array<{ operation: string; data: unknown }> = [];

  constructor(
    private readonly inner: PartRepository,
    private readonly log: Logger = logger
  ) {}

  get baseUrl(): string {
    return this.inner.baseUrl;
  }

  findCompany(name: string, role: "manufacturer" | "supplier"): Promise<Company | null> {
    return this.inner.findCompany(name, role);
  }

  async createCompany(data: NewEntity<Company>): Promise<Company> {
    return this.created("createCompany", data);
  }

  getPart(pk: number): Promise<Part> {
    return this.inner.getPart(pk);
  }

  findPartByName(name: string): Promise<Part | null> {
    return this.inner.findPartByName(name);
  }

  async createPart(data: NewEntity<Part>): Promise<Part> {
    return this.created("createPart", data);
  }

  async updatePart(pk: number, patch: Patch<Part>): Promise<Part> {
    this.record("updatePart", { pk, ...patch });
    const current = pk === DRY_RUN_PK ? null : await this.inner.getPart(pk);
    return { pk, name: "", description: "", category: null, ...current, ...patch };
  }

  async uploadPartImage(pk: number, imageUrl: string): Promise<Part | null> {
    this.record("uploadPartImage", { pk, imageUrl });
    const current = pk === DRY_RUN_PK ? null : await this.inner.getPart(pk);
    return { pk, name: "", description: "", category: null, ...current, image: imageUrl };
  }

  async listAttachments(partPk: number): Promise<Attachment[]> {
    return partPk === DRY_RUN_PK ? [] : this.inner.listAttachments(partPk);
  }

  async addLinkAttachment(partPk: number, link: string, comment: string): Promise<Attachment> {
    return this.created("addLinkAttachment", { part: partPk, link, comment });
  }

  async uploadAttachment(partPk: number, fileUrl: string, comment: string): Promise<Attachment> {
    return this.created("uploadAttachment", { part: partPk, attachment: fileUrl, comment });
  }

  getManufacturerPart(pk: number): Promise<ManufacturerPart> {
    return this.inner.getManufacturerPart(pk);
  }

  findManufacturerPartByMpn(mpn: string): Promise<ManufacturerPart | null> {
    return this.inner.findManufacturerPartByMpn(mpn);
  }

  async createManufacturerPart(data: NewEntity<ManufacturerPart>): Promise<ManufacturerPart> {
    return this.created("createManufacturerPart", data);
  }

  async updateManufacturerPart(pk: number, patch: Patch<ManufacturerPart>): Promise<ManufacturerPart> {
    this.record("updateManufacturerPart", { pk, ...patch });
    const current = pk === DRY_RUN_PK ? null : await this.inner.getManufacturerPart(pk);
    return { pk, part: DRY_RUN_PK, manufacturer: DRY_RUN_PK, MPN: "", ...current, ...patch };
  }

  findSupplierPartBySku(sku: string): Promise<SupplierPart | null> {
    return this.inner.findSupplierPartBySku(sku);
  }

  async createSupplierPart(data: NewEntity<SupplierPart>): Promise<SupplierPart> {
    return this.created("createSupplierPart", data);
  }

  async updateSupplierPart(pk: number, patch: Patch<SupplierPart>): Promise<SupplierPart> {
    this.record("updateSupplierPart", { pk, ...patch });
    return { pk, part: DRY_RUN_PK, supplier: DRY_RUN_PK, manufacturer_part: null, SKU: "", ...patch };
  }

  async listPriceBreaks(supplierPartPk: number): Promise<PriceBreak[]> {
    return supplierPartPk === DRY_RUN_PK ? [] : this.inner.listPriceBreaks(supplierPartPk);
  }

  async createPriceBreak(data: NewEntity<PriceBreak>): Promise<PriceBreak> {
    return this.created("createPriceBreak", data);
  }

  async updatePriceBreak(pk: number, patch: Patch<PriceBreak>): Promise<PriceBreak> {
    this.record("updatePriceBreak", { pk, ...patch });
    return { pk, part: DRY_RUN_PK, quantity: 0, price: 0, ...patch };
  }

  async listParameters(partPk: number): Promise<Parameter[]> {
    return partPk === DRY_RUN_PK ? [] : this.inner.listParameters(partPk);
  }

  async createParameter(data: NewEntity<Parameter>): Promise<Parameter> {
    return this.created("createParameter", data);
  }

  async updateParameter(pk: number, patch: Patch<Parameter>): Promise<Parameter> {
    this.record("updateParameter", { pk, ...patch });
    return { pk, part: DRY_RUN_PK, template: DRY_RUN_PK, data: "", ...patch };
  }

  listParameterTemplates(): Promise<ParameterTemplate[]> {
    return this.inner.listParameterTemplates();
  }

  async createParameterTemplate(data: NewEntity<ParameterTemplate>): Promise<ParameterTemplate> {
    return this.created("createParameterTemplate", data);
  }

  listCategories(): Promise<PartCategory[]> {
    return this.inner.listCategories();
  }

  async createCategory(data: Omit<NewEntity<PartCategory>, "pathstring">): Promise<PartCategory> {
    return this.created("createCategory", { ...data, pathstring: data.name });
  }

  async createStockItem(data: NewEntity<StockItem>): Promise<StockItem> {
    return this.created("createStockItem", data);
  }

  private created<T extends object>(operation: string, data: T): T & { pk: number } {
    this.record(operation, data);
    return { ...data, pk: DRY_RUN_PK };
  }

  private record(operation: string, data: unknown): void {
    this.writes.push({ operation, data });
    this.log.debug({ msg: `dry run: skipped ${operation}`, data });
  }
}

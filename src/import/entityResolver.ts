import type { DatasheetMode } from "../config/env.js";
import { partUrl, supplierPartUrl } from "../inventree/links.js";
import type { Company, ManufacturerPart, Part, PartRepository, SupplierPart } from "../inventree/types.js";
import type { ApiPart } from "../suppliers/types.js";
import { logger, type Logger } from "../utils/logger.js";
import type { ImportCatalog } from "./catalog.js";
import { CategoryResolver } from "./categoryResolver.js";
import type { Chooser } from "./chooser.js";
import { combine, ImportResult } from "./importResult.js";
import { ParameterReconciler } from "./parameterReconciler.js";
import { syncPriceBreaks } from "./priceBreaks.js";

export const DATASHEET_COMMENT = "datasheet";
const MAX_LINK_LENGTH = 200;

/** State shared by every supplier result of one search term. */
export type ImportSession = {
  searchTerm: string;
  manufacturerPart: ManufacturerPart | null;
  part: Part | null;
};

export type SupplierPartImport = {
  session: ImportSession;
  supplier: Company;
  apiPart: ApiPart;
  part?: Part | null;
  stockLocationId?: number;
  stockQuantity?: number;
};

export type EntityResolverOptions = {
  datasheets?: DatasheetMode;
  dryRun?: boolean;
};

/**
 * Percent-escapes everything except unreserved characters, `:` and `/`, then caps
 * the result to the server's link length.
 */
export function safeDatasheetLink(url: string): string {
  const escaped = encodeURIComponent(url)
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%3A/g, ":")
    .replace(/%2F/g, "/");
  return escaped.slice(0, MAX_LINK_LENGTH);
}

/** Fields of `data` whose value differs from `current`. */
export function changedFields<T extends object>(current: T, data: Partial<T>): Partial<T> {
  const patch: Partial<T> = {};
  for (const key in data) {
    const value = data[key];
    if (value !== undefined && current[key] !== value) {
      patch[key] = value;
    }
  }
  return patch;
}

export class EntityResolver {
  private readonly categories: CategoryResolver;
  private readonly parameters: ParameterReconciler;
  private readonly datasheets: DatasheetMode;
  private readonly manufacturers = new Map<string, Company>();

  constructor(
    private readonly repository: PartRepository,
    catalog: ImportCatalog,
    chooser: Chooser,
    options: EntityResolverOptions = {},
    private readonly log: Logger = logger
  ) {
    this.categories = new CategoryResolver(catalog, chooser, log);
    this.parameters = new ParameterReconciler(repository, catalog, chooser, { dryRun: options.dryRun }, log);
    this.datasheets = options.datasheets ?? "link";
  }

  async importSupplierPart(input: SupplierPartImport): Promise<ImportResult> {
    const { session, supplier, apiPart } = input;
    let result: ImportResult = ImportResult.SUCCESS;
    let part = input.part ?? null;

    const supplierPart = await this.repository.findSupplierPartBySku(apiPart.sku);
    if (supplierPart) {
      this.log.info({ msg: `found existing ${supplier.name} part ${supplierPart.SKU} ...` });
    } else {
      this.log.info({ msg: `importing ${supplier.name} part ${apiPart.sku} ...` });
    }

    let manufacturerPart: ManufacturerPart | null;
    if (supplierPart && supplierPart.manufacturer_part !== null) {
      manufacturerPart = await this.repository.getManufacturerPart(supplierPart.manufacturer_part);
    } else {
      manufacturerPart = (await this.repository.findManufacturerPartByMpn(apiPart.mpn)) ?? session.manufacturerPart;
    }

    if (!manufacturerPart) {
      if (!(await apiPart.finalize())) {
        this.log.error({ msg: `failed to load details for ${supplier.name} part ${apiPart.sku}` });
        return ImportResult.FAILURE;
      }
      const created = await this.createManufacturerPart(apiPart, part);
      if (!created) {
        return ImportResult.FAILURE;
      }
      manufacturerPart = created.manufacturerPart;
      part = created.part;
    }

    const updatePart = !session.manufacturerPart || session.manufacturerPart.pk !== manufacturerPart.pk;

    if (!part) {
      part = session.part?.pk === manufacturerPart.part
        ? session.part
        : await this.repository.getPart(manufacturerPart.part);
    } else if (part.pk !== manufacturerPart.part) {
      manufacturerPart = await this.repository.updateManufacturerPart(manufacturerPart.pk, { part: part.pk });
    }

    if (updatePart) {
      if (!(await apiPart.finalize())) {
        this.log.error({ msg: `failed to load details for ${supplier.name} part ${apiPart.sku}` });
        return ImportResult.FAILURE;
      }
      part = await this.patchPart(part, apiPart);
    }

    if (!part.image && apiPart.imageUrl) {
      this.log.info({ msg: `uploading image for part ${apiPart.mpn} ...` });
      part = await this.repository.uploadPartImage(part.pk, apiPart.imageUrl) ?? part;
    }

    await this.attachDatasheet(part, apiPart);

    if (apiPart.parameters.size) {
      result = combine(result, await this.parameters.reconcile(part, apiPart, updatePart));
    }

    session.manufacturerPart = manufacturerPart;
    session.part = part;

    const supplierPartData = {
      part: part.pk,
      manufacturer_part: manufacturerPart.pk,
      supplier: supplier.pk,
      SKU: apiPart.sku,
      ...apiPart.getSupplierPartData()
    };

    let stored: SupplierPart;
    let action: "added" | "updated";
    if (supplierPart) {
      action = "updated";
      stored = await this.patchSupplierPart(supplierPart, supplierPartData, supplier.name);
    } else {
      action = "added";
      stored = await this.repository.createSupplierPart(supplierPartData);
    }

    await syncPriceBreaks(this.repository, stored, apiPart.priceBreaks, apiPart.currency, this.log);

    this.log.info({
      msg: `${action} ${supplier.name} part ${apiPart.sku} (${supplierPartUrl(this.repository.baseUrl, stored.pk)})`,
      action
    });

    if (input.stockLocationId !== undefined) {
      const quantity = input.stockQuantity ?? 0;
      this.log.info({ msg: `adding ${quantity} of ${apiPart.mpn} to stock location ${input.stockLocationId} ...` });
      await this.repository.createStockItem({ part: part.pk, location: input.stockLocationId, quantity });
    }

    return result;
  }

  private async createManufacturerPart(
    apiPart: ApiPart,
    part: Part | null
  ): Promise<{ manufacturerPart: ManufacturerPart; part: Part } | null> {
    let target = part ?? (await this.repository.findPartByName(apiPart.mpn));
    if (target) {
      target = await this.patchPart(target, apiPart);
    } else {
      const category = await this.categories.resolve(apiPart.categoryPath);
      if (!category) {
        return null;
      }
      this.log.info({ msg: `creating part ${apiPart.mpn} in '${category.partCategory.pathstring}' ...` });
      target = await this.repository.createPart({ category: category.partCategory.pk, ...apiPart.getPartData() });
      this.log.info({ msg: `created part ${apiPart.mpn} (${partUrl(this.repository.baseUrl, target.pk)})` });
    }

    const manufacturer = await this.findOrCreateManufacturer(apiPart.manufacturer);
    this.log.info({ msg: `creating manufacturer part ${apiPart.mpn} ...` });
    const manufacturerPart = await this.repository.createManufacturerPart({
      part: target.pk,
      manufacturer: manufacturer.pk,
      ...apiPart.getManufacturerPartData()
    });

    return { manufacturerPart, part: target };
  }

  private async findOrCreateManufacturer(name: string): Promise<Company> {
    const cached = this.manufacturers.get(name);
    if (cached) {
      return cached;
    }

    let manufacturer = await this.repository.findCompany(name, "manufacturer");
    if (!manufacturer) {
      this.log.info({ msg: `creating manufacturer '${name}' ...` });
      manufacturer = await this.repository.createCompany({
        name,
        description: name,
        is_manufacturer: true,
        is_supplier: false
      });
    }
    this.manufacturers.set(name, manufacturer);
    return manufacturer;
  }

  private async patchPart(part: Part, apiPart: ApiPart): Promise<Part> {
    const patch = changedFields<Part>(part, apiPart.getPartData());
    if (!Object.keys(patch).length) {
      return part;
    }
    this.log.info({ msg: `updating part ${apiPart.mpn} ...`, fields: Object.keys(patch) });
    return this.repository.updatePart(part.pk, patch);
  }

  private async patchSupplierPart(
    supplierPart: SupplierPart,
    data: Partial<SupplierPart>,
    supplierName: string
  ): Promise<SupplierPart> {
    const patch = changedFields<SupplierPart>(supplierPart, data);
    if (!Object.keys(patch).length) {
      return supplierPart;
    }
    this.log.info({ msg: `updating ${supplierName} part ${supplierPart.SKU} ...`, fields: Object.keys(patch) });
    return this.repository.updateSupplierPart(supplierPart.pk, patch);
  }

  private async attachDatasheet(part: Part, apiPart: ApiPart): Promise<void> {
    if (!apiPart.datasheetUrl || this.datasheets === "off") {
      return;
    }

    const attachments = await this.repository.listAttachments(part.pk);
    if (attachments.some((attachment) => attachment.comment === DATASHEET_COMMENT)) {
      return;
    }

    if (this.datasheets === "upload") {
      this.log.info({ msg: `uploading datasheet for part ${apiPart.mpn} ...` });
      await this.repository.uploadAttachment(part.pk, apiPart.datasheetUrl, DATASHEET_COMMENT);
    } else {
      await this.repository.addLinkAttachment(part.pk, safeDatasheetLink(apiPart.datasheetUrl), DATASHEET_COMMENT);
    }
  }
}

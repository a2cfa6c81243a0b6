import type { DatasheetMode } from "../config/env.js";
import type { Company, Part, PartRepository } from "../inventree/types.js";
import { drainSearches, searchSuppliers, type SupplierScope } from "../suppliers/search.js";
import type { ApiPart, Supplier, SupplierSearchResult } from "../suppliers/types.js";
import { describeHttpError, errorMessage, isRepositoryHttpError } from "../utils/errors.js";
import { logger, type Logger } from "../utils/logger.js";
import type { ImportCatalog } from "./catalog.js";
import { SKIP } from "./categoryResolver.js";
import { nonInteractiveChooser, type Chooser } from "./chooser.js";
import { EntityResolver, type ImportSession } from "./entityResolver.js";
import { combine, ImportResult } from "./importResult.js";
import type { SettledTask } from "./workerPool.js";

export const DEFAULT_MAX_RESULTS = 10;

export type PartImporterOptions = {
  chooser?: Chooser;
  dryRun?: boolean;
  verbose?: boolean;
  maxResults?: number;
  datasheets?: DatasheetMode;
  log?: Logger;
};

export type ImportPartOptions = SupplierScope & {
  existingPart?: Part | null;
  stockLocationId?: number;
  stockQuantity?: number;
};

/** `MPN | manufacturer | SKU (link)` with the first three columns padded to line up. */
export function formatCandidateChoices(parts: readonly ApiPart[]): string[] {
  const widthOf = (values: string[]) => Math.max(0, ...values.map((value) => value.length));
  const mpnWidth = widthOf(parts.map((part) => part.mpn));
  const manufacturerWidth = widthOf(parts.map((part) => part.manufacturer));
  const skuWidth = widthOf(parts.map((part) => part.sku));

  return parts.map((part) => [
    part.mpn.padEnd(mpnWidth),
    part.manufacturer.padEnd(manufacturerWidth),
    part.sku.padEnd(skuWidth)
  ].join(" | ") + ` (${part.supplierLink})`);
}

/**
 * Imports search terms from every enabled supplier. One instance owns the alias
 * tables of its catalog, so concurrent imports need one importer each.
 */
export class PartImporter {
  readonly catalog: ImportCatalog;
  private readonly chooser: Chooser;
  private readonly verbose: boolean;
  private readonly maxResults: number;
  private readonly log: Logger;
  private readonly resolver: EntityResolver;
  private readonly supplierCompanies = new Map<string, Company>();

  constructor(
    private readonly repository: PartRepository,
    private readonly suppliers: readonly Supplier[],
    catalog: ImportCatalog,
    options: PartImporterOptions = {}
  ) {
    this.catalog = catalog;
    this.chooser = options.chooser ?? nonInteractiveChooser;
    this.verbose = options.verbose ?? false;
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.log = options.log ?? logger;
    this.resolver = new EntityResolver(
      repository,
      catalog,
      this.chooser,
      { datasheets: options.datasheets, dryRun: options.dryRun },
      this.log
    );
  }

  async importPart(searchTerm: string, options: ImportPartOptions = {}): Promise<ImportResult> {
    this.log.info({ msg: `searching for ${searchTerm} ...` });
    let result: ImportResult = ImportResult.SUCCESS;
    const session: ImportSession = { searchTerm, manufacturerPart: null, part: null };

    const pending = searchSuppliers(this.suppliers, searchTerm, options);
    try {
      for (const { supplier, results } of pending) {
        this.log.info({ msg: `searching at ${supplier.name} ...`, supplier: supplier.id });
        result = combine(result, await this.importFrom(supplier, await results, session, options));
        if (result === ImportResult.ERROR) {
          await drainSearches(pending);
          return ImportResult.ERROR;
        }
      }
    } catch (error) {
      await drainSearches(pending);
      throw error;
    }

    if (!session.manufacturerPart) {
      result = combine(result, ImportResult.FAILURE);
    }
    return result;
  }

  private async importFrom(
    supplier: Supplier,
    settled: SettledTask<SupplierSearchResult>,
    session: ImportSession,
    options: ImportPartOptions
  ): Promise<ImportResult> {
    if (settled.status === "rejected") {
      this.log.warn({ msg: `search at ${supplier.name} failed: ${errorMessage(settled.reason)}`, supplier: supplier.id });
      return ImportResult.INCOMPLETE;
    }

    const apiPart = await this.pickCandidate(supplier, settled.value.parts, settled.value.total);
    if (apiPart === undefined) {
      return ImportResult.SUCCESS;
    }
    if (apiPart === null) {
      return ImportResult.INCOMPLETE;
    }

    try {
      const company = await this.supplierCompany(supplier);
      return await this.resolver.importSupplierPart({
        session,
        supplier: company,
        apiPart,
        part: options.existingPart,
        stockLocationId: options.stockLocationId,
        stockQuantity: options.stockQuantity
      });
    } catch (error) {
      if (!isRepositoryHttpError(error)) {
        throw error;
      }
      this.log.error({
        msg: `failed to import part with: ${describeHttpError(error)}`,
        error: error.message,
        status: error.status
      });
      if (this.verbose) {
        this.log.error({ msg: "full stack trace", stack: error.stack });
      }
      return ImportResult.ERROR;
    }
  }

  /**
   * undefined: nothing to import from this supplier. null: a choice was needed and
   * none was made.
   */
  private async pickCandidate(supplier: Supplier, parts: readonly ApiPart[], total: number): Promise<ApiPart | null | undefined> {
    const [first] = parts;
    if (!first) {
      this.log.info({ msg: `no results at ${supplier.name}`, hint: true });
      return undefined;
    }
    if (parts.length === 1) {
      return first;
    }

    if (!this.chooser.interactive) {
      this.log.warn({ msg: `found ${total} parts at ${supplier.name}, skipping import` });
      return null;
    }

    const shown = parts.slice(0, this.maxResults);
    if (total > shown.length) {
      this.log.info({ msg: `found ${total} results, only showing the first ${shown.length}`, hint: true });
    }
    const index = await this.chooser.select(
      `found multiple parts at ${supplier.name}, select which one to import`,
      [...formatCandidateChoices(shown), SKIP]
    );
    return index === null ? null : shown[index] ?? null;
  }

  private async supplierCompany(supplier: Supplier): Promise<Company> {
    const cached = this.supplierCompanies.get(supplier.id);
    if (cached) {
      return cached;
    }

    let company = await this.repository.findCompany(supplier.name, "supplier");
    if (!company) {
      this.log.info({ msg: `creating supplier '${supplier.name}' ...` });
      company = await this.repository.createCompany({
        name: supplier.name,
        description: supplier.name,
        is_manufacturer: false,
        is_supplier: true
      });
    }
    this.supplierCompanies.set(supplier.id, company);
    return company;
  }
}

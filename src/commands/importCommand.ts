import type { DatasheetMode } from "../config/env.js";
import type { ImportConfig, RawConfigNode } from "../config/importConfig.js";
import type { Chooser } from "../import/chooser.js";
import { ImportResult } from "../import/importResult.js";
import { PartImporter } from "../import/partImporter.js";
import { exportAddedAliases, setupCatalog } from "../inventree/categorySetup.js";
import { DryRunRepository } from "../inventree/dryRun.js";
import type { PartRepository } from "../inventree/types.js";
import type { Supplier } from "../suppliers/types.js";
import { ImportError } from "../utils/errors.js";
import { logger, type Logger } from "../utils/logger.js";

export type ImportCommandOptions = {
  terms: string[];
  dryRun: boolean;
  verbose: boolean;
  maxResults: number;
  datasheets: DatasheetMode;
  supplierId?: string;
  onlySupplier?: boolean;
  partPk?: number;
  stockLocationId?: number;
  stockQuantity?: number;
};

export type ImportCommandDeps = {
  repository: PartRepository;
  suppliers: Supplier[];
  config: ImportConfig;
  chooser: Chooser;
  saveConfig?: (config: { rawCategories: RawConfigNode; rawParameters: RawConfigNode }) => void;
  log?: Logger;
};

export type ImportSummary = {
  results: Record<ImportResult, string[]>;
  exitCode: number;
};

const SUMMARY_LABELS: Record<ImportResult, string> = {
  success: "imported",
  incomplete: "incomplete",
  failure: "failed",
  error: "errored"
};

export async function runImportCommand(options: ImportCommandOptions, deps: ImportCommandDeps): Promise<ImportSummary> {
  const log = deps.log ?? logger;
  if (!deps.suppliers.length) {
    throw new ImportError("no suppliers are configured", "no_suppliers");
  }

  const repository = options.dryRun ? new DryRunRepository(deps.repository, log) : deps.repository;
  const catalog = await setupCatalog(repository, deps.config, log);
  const existingPart = options.partPk === undefined ? null : await repository.getPart(options.partPk);

  const importer = new PartImporter(repository, deps.suppliers, catalog, {
    chooser: deps.chooser,
    dryRun: options.dryRun,
    verbose: options.verbose,
    maxResults: options.maxResults,
    datasheets: options.datasheets,
    log
  });

  const results: Record<ImportResult, string[]> = { success: [], incomplete: [], failure: [], error: [] };
  for (const term of options.terms) {
    const result = await importer.importPart(term, {
      supplierId: options.supplierId,
      onlySupplier: options.onlySupplier,
      existingPart,
      stockLocationId: options.stockLocationId,
      stockQuantity: options.stockQuantity
    });
    results[result].push(term);
  }

  const exported = exportAddedAliases(deps.config, catalog);
  if (exported.changed && !options.dryRun && deps.saveConfig) {
    deps.saveConfig({ rawCategories: exported.rawCategories, rawParameters: exported.rawParameters });
    log.info({ msg: "saved new aliases to the configuration" });
  }

  for (const result of Object.values(ImportResult)) {
    const terms = results[result];
    if (terms.length) {
      log.info({ msg: `${SUMMARY_LABELS[result]} ${terms.length}: ${terms.join(", ")}`, result });
    }
  }

  return {
    results,
    exitCode: results.success.length === options.terms.length ? 0 : 1
  };
}

/** One term per line; blank lines and `#` comments are skipped. */
export function parseTermsFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

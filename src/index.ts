export { runImportCommand, parseTermsFile, type ImportCommandOptions, type ImportSummary } from "./commands/importCommand.js";
export { loadImportConfig, saveImportConfig, type ImportConfig } from "./config/importConfig.js";
export { buildCatalog, ImportCategory, ImportParameter, type ImportCatalog } from "./import/catalog.js";
export { ConsoleChooser, nonInteractiveChooser, type Chooser } from "./import/chooser.js";
export { combine, combineAll, ImportResult } from "./import/importResult.js";
export { PartImporter, formatCandidateChoices, type PartImporterOptions } from "./import/partImporter.js";
export { exportAddedAliases, setupCatalog } from "./inventree/categorySetup.js";
export { InventreeClient } from "./inventree/client.js";
export { DryRunRepository } from "./inventree/dryRun.js";
export type { PartRepository } from "./inventree/types.js";
export { DigiKeySupplier, parseDigiKeyProduct } from "./suppliers/digikey.js";
export { supplierRegistry } from "./suppliers/registry.js";
export { ApiPart, type Supplier, type SupplierSearchResult } from "./suppliers/types.js";
export { ImportError, RepositoryHttpError } from "./utils/errors.js";

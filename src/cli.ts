#!/usr/bin/env node
import { readFileSync } from "node:fs";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { parseTermsFile, runImportCommand } from "./commands/importCommand.js";
import { getEnv } from "./config/env.js";
import { loadImportConfig, saveImportConfig } from "./config/importConfig.js";
import { ConsoleChooser, nonInteractiveChooser } from "./import/chooser.js";
import { InventreeClient } from "./inventree/client.js";
import { supplierIds, supplierRegistry } from "./suppliers/registry.js";
import { errorMessage, ImportError } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

const env = getEnv();

await yargs(hideBin(process.argv))
  .scriptName("partsync")
  .command(
    "import [terms..]",
    "import supplier parts into InvenTree",
    (command) => command
      .positional("terms", { type: "string", array: true, describe: "MPNs or supplier part numbers" })
      .option("file", { alias: "f", type: "string", describe: "read search terms from a file, one per line" })
      .option("interactive", { alias: "i", type: "boolean", default: env.IMPORT_INTERACTIVE })
      .option("dry", { type: "boolean", default: env.IMPORT_DRY_RUN, describe: "log writes instead of sending them" })
      .option("supplier", { alias: "s", type: "string", choices: supplierIds, describe: "search this supplier first" })
      .option("only-supplier", { alias: "o", type: "boolean", default: false, describe: "search --supplier only" })
      .option("part", { type: "number", describe: "pk of an existing part to attach the import to" })
      .option("stock-location", { type: "number", describe: "add stock of the imported part at this location" })
      .option("stock-quantity", { type: "number", default: 0 })
      .option("verbose", { alias: "v", type: "boolean", default: false }),
    async (argv) => {
      const terms = [...(argv.terms ?? []).map(String), ...(argv.file ? parseTermsFile(readFileSync(argv.file, "utf8")) : [])];
      if (!terms.length) {
        logger.error({ msg: "nothing to import" });
        process.exitCode = 1;
        return;
      }
      if (argv.onlySupplier && !argv.supplier) {
        logger.error({ msg: "--only-supplier needs --supplier" });
        process.exitCode = 1;
        return;
      }
      if (!env.INVENTREE_URL || !env.INVENTREE_TOKEN) {
        throw new ImportError("INVENTREE_URL and INVENTREE_TOKEN must be set", "missing_credentials");
      }

      const chooser = argv.interactive ? new ConsoleChooser() : nonInteractiveChooser;
      try {
        const summary = await runImportCommand(
          {
            terms,
            dryRun: argv.dry,
            verbose: argv.verbose,
            maxResults: env.IMPORT_MAX_RESULTS,
            datasheets: env.IMPORT_DATASHEETS,
            supplierId: argv.supplier,
            onlySupplier: argv.onlySupplier,
            partPk: argv.part,
            stockLocationId: argv.stockLocation,
            stockQuantity: argv.stockQuantity
          },
          {
            repository: new InventreeClient({
              baseUrl: env.INVENTREE_URL,
              token: env.INVENTREE_TOKEN,
              timeoutMs: env.INVENTREE_TIMEOUT_MS
            }),
            suppliers: supplierRegistry(env),
            config: loadImportConfig(env.IMPORT_CONFIG_DIR),
            chooser,
            saveConfig: (raw) => saveImportConfig(env.IMPORT_CONFIG_DIR, raw)
          }
        );
        process.exitCode = summary.exitCode;
      } finally {
        if (chooser instanceof ConsoleChooser) {
          chooser.close();
        }
      }
    }
  )
  .demandCommand(1)
  .strict()
  .fail((message, error) => {
    logger.error({ msg: message ?? errorMessage(error) });
    process.exitCode = 1;
  })
  .help()
  .parseAsync();

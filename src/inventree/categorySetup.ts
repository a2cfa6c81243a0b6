import { withCategoryAliases, withParameterAliases, type ImportConfig, type RawConfigNode } from "../config/importConfig.js";
import { buildCatalog, ImportCategory, ImportParameter, type ImportCatalog } from "../import/catalog.js";
import { logger, type Logger } from "../utils/logger.js";
import type { ParameterTemplate, PartCategory, PartRepository } from "./types.js";

/**
 * Makes sure every configured parameter template and category exists on the server,
 * then builds the alias tables an importer works from. Structural categories are
 * created but never offered as an import target.
 */
export async function setupCatalog(
  repository: PartRepository,
  config: Pick<ImportConfig, "categories" | "parameters">,
  log: Logger = logger
): Promise<ImportCatalog> {
  const templates = await ensureParameterTemplates(repository, config, log);
  const partCategories = await ensureCategories(repository, config, log);

  const categories: ImportCategory[] = [];
  for (const definition of config.categories) {
    const partCategory = partCategories.get(definition.path.join("/"));
    if (!partCategory || definition.structural) continue;
    categories.push(new ImportCategory({
      name: definition.name,
      path: definition.path,
      parameters: definition.parameters,
      aliases: definition.aliases,
      partCategory
    }));
  }

  const parameters = config.parameters.map((definition) => new ImportParameter({
    name: definition.name,
    aliases: definition.aliases,
    unit: definition.unit
  }));

  return buildCatalog(categories, parameters, templates);
}

async function ensureParameterTemplates(
  repository: PartRepository,
  config: Pick<ImportConfig, "parameters">,
  log: Logger
): Promise<Map<string, ParameterTemplate>> {
  const templates = new Map<string, ParameterTemplate>();
  for (const template of await repository.listParameterTemplates()) {
    templates.set(template.name, template);
  }

  for (const definition of config.parameters) {
    if (templates.has(definition.name)) continue;
    log.info({ msg: `creating parameter template '${definition.name}' ...` });
    const created = await repository.createParameterTemplate({
      name: definition.name,
      units: definition.unit,
      description: definition.description
    });
    templates.set(definition.name, created);
  }
  return templates;
}

/** Part categories keyed by their `/`-joined path. Definitions arrive parents first. */
async function ensureCategories(
  repository: PartRepository,
  config: Pick<ImportConfig, "categories">,
  log: Logger
): Promise<Map<string, PartCategory>> {
  const byPath = new Map<string, PartCategory>();
  for (const category of await repository.listCategories()) {
    byPath.set(category.pathstring, category);
  }

  for (const definition of config.categories) {
    const key = definition.path.join("/");
    if (byPath.has(key)) continue;

    const parent = byPath.get(definition.path.slice(0, -1).join("/"));
    log.info({ msg: `creating category '${key}' ...` });
    const created = await repository.createCategory({
      name: definition.name,
      parent: definition.path.length > 1 ? parent?.pk ?? null : null,
      description: definition.description,
      structural: definition.structural
    });
    byPath.set(key, created);
  }
  return byPath;
}

/**
 * Merges the aliases picked during a run into the raw configuration trees.
 * `changed` is false when nothing new was learned.
 */
export function exportAddedAliases(
  config: Pick<ImportConfig, "rawCategories" | "rawParameters">,
  catalog: ImportCatalog
): { rawCategories: RawConfigNode; rawParameters: RawConfigNode; changed: boolean } {
  let rawCategories = config.rawCategories;
  let rawParameters = config.rawParameters;
  let changed = false;

  for (const category of catalog.categories) {
    if (!category.addedAliases.length) continue;
    rawCategories = withCategoryAliases(rawCategories, category.path, category.addedAliases);
    changed = true;
  }

  const seen = new Set<ImportParameter>();
  for (const bucket of catalog.parameterMap.values()) {
    for (const parameter of bucket) {
      if (seen.has(parameter) || !parameter.addedAliases.length) continue;
      seen.add(parameter);
      rawParameters = withParameterAliases(rawParameters, parameter.name, parameter.addedAliases);
      changed = true;
    }
  }

  return { rawCategories, rawParameters, changed };
}

import type { ParameterTemplate, PartCategory } from "../inventree/types.js";

export class ImportCategory {
  readonly name: string;
  readonly path: string[];
  readonly parameters: string[];
  readonly partCategory: PartCategory;
  readonly aliases: string[];
  /** Aliases picked during this run, not yet written back to the configuration. */
  readonly addedAliases: string[] = [];

  constructor(input: { name: string; path: string[]; parameters: string[]; aliases: string[]; partCategory: PartCategory }) {
    this.name = input.name;
    this.path = input.path;
    this.parameters = input.parameters;
    this.aliases = [...input.aliases];
    this.partCategory = input.partCategory;
  }

  get pathString(): string {
    return this.path.join("/");
  }

  addAlias(alias: string): void {
    if (alias === this.name || this.aliases.includes(alias)) return;
    this.aliases.push(alias);
    this.addedAliases.push(alias);
  }
}

export class ImportParameter {
  readonly name: string;
  readonly aliases: string[];
  readonly unit?: string;
  readonly addedAliases: string[] = [];

  constructor(input: { name: string; aliases: string[]; unit?: string }) {
    this.name = input.name;
    this.aliases = [...input.aliases];
    this.unit = input.unit;
  }

  addAlias(alias: string): void {
    if (alias === this.name || this.aliases.includes(alias)) return;
    this.aliases.push(alias);
    this.addedAliases.push(alias);
  }
}

/** Category name or alias → category. */
export type CategoryMap = Map<string, ImportCategory>;

/** Parameter name or alias → every parameter it may stand for. */
export type ParameterMap = Map<string, ImportParameter[]>;

/**
 * Alias tables and templates for one importer. The maps only ever grow, and only
 * through `registerCategoryAlias` / `registerParameterAlias`.
 */
export type ImportCatalog = {
  categoryMap: CategoryMap;
  parameterMap: ParameterMap;
  categories: ImportCategory[];
  categoryByPk: Map<number, ImportCategory>;
  parameterTemplates: Map<string, ParameterTemplate>;
};

export function buildCatalog(
  categories: ImportCategory[],
  parameters: ImportParameter[],
  parameterTemplates: Map<string, ParameterTemplate>
): ImportCatalog {
  const categoryMap: CategoryMap = new Map();
  for (const category of categories) {
    categoryMap.set(category.name, category);
    for (const alias of category.aliases) {
      categoryMap.set(alias, category);
    }
  }

  const parameterMap: ParameterMap = new Map();
  for (const parameter of parameters) {
    for (const key of [parameter.name, ...parameter.aliases]) {
      appendParameter(parameterMap, key, parameter);
    }
  }

  return {
    categoryMap,
    parameterMap,
    categories,
    categoryByPk: new Map(categories.map((category) => [category.partCategory.pk, category])),
    parameterTemplates
  };
}

export function registerCategoryAlias(catalog: ImportCatalog, category: ImportCategory, alias: string): void {
  category.addAlias(alias);
  catalog.categoryMap.set(alias, category);
}

export function registerParameterAlias(catalog: ImportCatalog, parameter: ImportParameter, alias: string): void {
  parameter.addAlias(alias);
  appendParameter(catalog.parameterMap, alias, parameter);
}

function appendParameter(map: ParameterMap, key: string, parameter: ImportParameter): void {
  const bucket = map.get(key) ?? [];
  if (!bucket.includes(parameter)) {
    bucket.push(parameter);
  }
  map.set(key, bucket);
}

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";

export const CATEGORIES_CONFIG = "categories.json";
export const PARAMETERS_CONFIG = "parameters.json";

export type CategoryDefinition = {
  name: string;
  path: string[];
  aliases: string[];
  parameters: string[];
  description?: string;
  structural: boolean;
};

export type ParameterDefinition = {
  name: string;
  aliases: string[];
  unit?: string;
  description?: string;
};

export type RawConfigNode = { [key: string]: unknown };

export type ImportConfig = {
  categories: CategoryDefinition[];
  parameters: ParameterDefinition[];
  rawCategories: RawConfigNode;
  rawParameters: RawConfigNode;
};

const categoryOptionsSchema = z.object({
  _aliases: z.array(z.string()).default([]),
  _parameters: z.array(z.string()).default([]),
  _description: z.string().optional(),
  _structural: z.boolean().default(false),
  _omitParentParameters: z.boolean().default(false)
}).strict();

const parameterOptionsSchema = z.union([
  z.literal(true),
  z.null(),
  z.object({
    _aliases: z.array(z.string()).default([]),
    _unit: z.string().optional(),
    _description: z.string().optional()
  }).strict()
]);

const rawNodeSchema = z.record(z.unknown());

export function loadImportConfig(configDir: string): ImportConfig {
  const rawCategories = readConfigFile(join(configDir, CATEGORIES_CONFIG));
  const rawParameters = readConfigFile(join(configDir, PARAMETERS_CONFIG));
  return {
    categories: parseCategories(rawCategories),
    parameters: parseParameters(rawParameters),
    rawCategories,
    rawParameters
  };
}

/**
 * Flattens the nested category tree, parents before children. A category inherits
 * its parent's parameters unless it sets `_omitParentParameters`.
 */
export function parseCategories(raw: RawConfigNode): CategoryDefinition[] {
  const output: CategoryDefinition[] = [];

  const walk = (node: RawConfigNode, parentPath: string[], inherited: string[]): void => {
    for (const [name, value] of Object.entries(node)) {
      if (name.startsWith("_")) continue;

      const child = value === true || value === null ? {} : rawNodeSchema.parse(value);
      const { options, children } = splitOptions(child);
      const parsed = categoryOptionsSchema.safeParse(options);
      if (!parsed.success) {
        throw new Error(`invalid options for category '${[...parentPath, name].join("/")}': ${parsed.error.message}`);
      }

      const path = [...parentPath, name];
      const parameters = unique([
        ...(parsed.data._omitParentParameters ? [] : inherited),
        ...parsed.data._parameters
      ]);
      output.push({
        name,
        path,
        aliases: parsed.data._aliases,
        parameters,
        description: parsed.data._description,
        structural: parsed.data._structural
      });
      walk(children, path, parameters);
    }
  };

  walk(raw, [], []);
  return output;
}

export function parseParameters(raw: RawConfigNode): ParameterDefinition[] {
  return Object.entries(raw).map(([name, value]) => {
    const parsed = parameterOptionsSchema.safeParse(value);
    if (!parsed.success) {
      throw new Error(`invalid options for parameter '${name}': ${parsed.error.message}`);
    }
    if (parsed.data === true || parsed.data === null) {
      return { name, aliases: [] };
    }
    return {
      name,
      aliases: parsed.data._aliases,
      unit: parsed.data._unit,
      description: parsed.data._description
    };
  });
}

/** Returns a copy of the raw tree with `aliases` merged into the node at `path`. */
export function withCategoryAliases(raw: RawConfigNode, path: string[], aliases: string[]): RawConfigNode {
  const [head, ...rest] = path;
  if (head === undefined) {
    const current = Array.isArray(raw._aliases) ? raw._aliases.filter(isString) : [];
    return { ...raw, _aliases: unique([...current, ...aliases]) };
  }

  const value = raw[head];
  const child = value === true || value === null || value === undefined ? {} : rawNodeSchema.parse(value);
  return { ...raw, [head]: withCategoryAliases(child, rest, aliases) };
}

export function withParameterAliases(raw: RawConfigNode, name: string, aliases: string[]): RawConfigNode {
  const value = raw[name];
  const node = value === true || value === null || value === undefined ? {} : rawNodeSchema.parse(value);
  const current = Array.isArray(node._aliases) ? node._aliases.filter(isString) : [];
  return { ...raw, [name]: { ...node, _aliases: unique([...current, ...aliases]) } };
}

export function saveImportConfig(configDir: string, config: Pick<ImportConfig, "rawCategories" | "rawParameters">): void {
  writeFileSync(join(configDir, CATEGORIES_CONFIG), `${JSON.stringify(config.rawCategories, null, 2)}\n`, "utf8");
  writeFileSync(join(configDir, PARAMETERS_CONFIG), `${JSON.stringify(config.rawParameters, null, 2)}\n`, "utf8");
}

function readConfigFile(path: string): RawConfigNode {
  if (!existsSync(path)) {
    throw new Error(`missing configuration file '${path}'`);
  }
  const parsed = rawNodeSchema.safeParse(JSON.parse(readFileSync(path, "utf8")));
  if (!parsed.success) {
    throw new Error(`'${path}' must contain a JSON object`);
  }
  return parsed.data;
}

function splitOptions(node: RawConfigNode): { options: RawConfigNode; children: RawConfigNode } {
  const options: RawConfigNode = {};
  const children: RawConfigNode = {};
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith("_")) {
      options[key] = value;
    } else {
      children[key] = value;
    }
  }
  return { options, children };
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

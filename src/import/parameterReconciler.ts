import type { Parameter, ParameterTemplate, Part, PartRepository } from "../inventree/types.js";
import type { ApiPart } from "../suppliers/types.js";
import { isRepositoryHttpError } from "../utils/errors.js";
import { logger, type Logger } from "../utils/logger.js";
import { partialRatio, rankBy } from "../utils/similarity.js";
import { registerParameterAlias, type ImportCatalog } from "./catalog.js";
import type { Chooser } from "./chooser.js";
import { ENTER_MANUALLY, SKIP } from "./categoryResolver.js";
import { combine, ImportResult } from "./importResult.js";
import { runPool } from "./workerPool.js";

export const PARAMETER_MATCHES = 20;
export const PARAMETER_WORKERS = 4;

const TOLERANCE_GLYPH = /\s*±\s*/g;

export function sanitizeParameterValue(value: string): string {
  const trimmed = value.trim();
  if (trimmed === "-") {
    return "";
  }
  return trimmed
    .replace(TOLERANCE_GLYPH, " ")
    .trim()
    .replace(/Ohm/g, "ohm")
    .replace(/ohms/g, "ohm");
}

export type ParameterReconcilerOptions = {
  dryRun?: boolean;
  concurrency?: number;
};

type ParameterSelection = { alias: string | null; value: string | null };

export class ParameterReconciler {
  private readonly dryRun: boolean;
  private readonly concurrency: number;

  constructor(
    private readonly repository: PartRepository,
    private readonly catalog: ImportCatalog,
    private readonly chooser: Chooser,
    options: ParameterReconcilerOptions = {},
    private readonly log: Logger = logger
  ) {
    this.dryRun = options.dryRun ?? false;
    this.concurrency = options.concurrency ?? PARAMETER_WORKERS;
  }

  async reconcile(part: Part | null, apiPart: ApiPart, updateExisting: boolean = true): Promise<ImportResult> {
    let result: ImportResult = ImportResult.SUCCESS;

    if (!part) {
      return result;
    }

    const category = part.category === null ? undefined : this.catalog.categoryByPk.get(part.category);
    if (!category) {
      this.log.error({ msg: `category of part '${part.name}' is not defined in the category configuration`, category: part.category });
      return ImportResult.FAILURE;
    }

    const existingParameters = new Map<string, Parameter>();
    for (const parameter of await this.repository.listParameters(part.pk)) {
      const name = this.templateName(parameter);
      if (name) existingParameters.set(name, parameter);
    }

    const required = new Set(category.parameters);
    const matched = new Map<string, string>();
    for (const [rawName, value] of apiPart.parameters) {
      for (const parameter of this.catalog.parameterMap.get(rawName) ?? []) {
        if (required.has(parameter.name) && !matched.has(parameter.name)) {
          matched.set(parameter.name, value);
        }
      }
    }

    const alreadySet = new Set(
      [...existingParameters].filter(([, parameter]) => parameter.data.length > 0).map(([name]) => name)
    );
    const unassigned = new Set(category.parameters.filter((name) => !matched.has(name) && !alreadySet.has(name)));

    if (unassigned.size && this.chooser.interactive) {
      this.log.info({ msg: `failed to match some parameters from '${apiPart.supplierLink}'` });
      for (const name of [...unassigned]) {
        const selection = await this.selectParameter(name, apiPart.parameters);
        if (selection.value === null) {
          continue;
        }
        matched.set(name, selection.value);
        unassigned.delete(name);

        if (!selection.alias) {
          continue;
        }
        const candidates = this.catalog.parameterMap.get(name);
        const parameter = candidates?.length === 1 ? candidates[0] : undefined;
        if (!parameter) {
          this.log.warn({ msg: `failed to add alias '${selection.alias}' for parameter '${name}'` });
          continue;
        }
        registerParameterAlias(this.catalog, parameter, selection.alias);
      }
    }

    const tasks: Array<() => Promise<string | null>> = [];
    for (const [name, rawValue] of matched) {
      const value = sanitizeParameterValue(rawValue);
      if (!value) {
        continue;
      }

      const existing = existingParameters.get(name);
      if (existing) {
        if (updateExisting && existing.data !== value) {
          tasks.push(() => this.updateParameter(existing, name, value));
        }
        continue;
      }

      const template = this.catalog.parameterTemplates.get(name);
      if (template) {
        tasks.push(() => this.createParameter(part, template, value));
      } else if (!this.dryRun) {
        this.log.warn({ msg: `failed to find template parameter for '${name}'` });
        result = combine(result, ImportResult.INCOMPLETE);
      }
    }

    if (tasks.length) {
      this.log.info({ msg: "updating part parameters ..." });
    }

    const settled = await runPool(tasks, this.concurrency);
    const unexpected = settled.find((entry) => entry.status === "rejected");
    for (const entry of settled) {
      if (entry.status === "fulfilled" && entry.value) {
        this.log.warn({ msg: entry.value });
        result = combine(result, ImportResult.INCOMPLETE);
      }
    }
    if (unexpected?.status === "rejected") {
      throw unexpected.reason;
    }

    if (unassigned.size) {
      const names = [...unassigned].map((name) => `'${name}'`).join(", ");
      const plural = unassigned.size > 1 ? "s" : "";
      this.log.warn({ msg: `failed to match ${unassigned.size} parameter${plural} from supplier API (${names})` });
      result = combine(result, ImportResult.INCOMPLETE);
    }

    return result;
  }

  private async selectParameter(name: string, parameters: ReadonlyMap<string, string>): Promise<ParameterSelection> {
    const matches = rankBy(
      [...parameters],
      ([rawName, value]) => Math.max(partialRatio(name, rawName), partialRatio(name, value))
    ).slice(0, PARAMETER_MATCHES);

    const width = Math.max(0, ...matches.map(([, value]) => value.length));
    const choices = [
      ...matches.map(([rawName, value]) => `${value.padEnd(width)} | ${rawName}`),
      ENTER_MANUALLY,
      SKIP
    ];

    const index = await this.chooser.select(`failed to match value for parameter '${name}', select value`, choices);
    if (index === null || index === matches.length + 1) {
      return { alias: null, value: null };
    }

    const picked = matches[index];
    if (picked) {
      return { alias: picked[0], value: picked[1] };
    }
    return { alias: null, value: await this.chooser.input("value") };
  }

  private async createParameter(part: Part, template: ParameterTemplate, value: string): Promise<string | null> {
    try {
      await this.repository.createParameter({ part: part.pk, template: template.pk, data: value });
      return null;
    } catch (error) {
      if (!isRepositoryHttpError(error)) throw error;
      return `failed to create parameter '${template.name}' with '${error.body}'`;
    }
  }

  private async updateParameter(parameter: Parameter, name: string, value: string): Promise<string | null> {
    try {
      await this.repository.updateParameter(parameter.pk, { data: value });
      return null;
    } catch (error) {
      if (!isRepositoryHttpError(error)) throw error;
      return `failed to update parameter '${name}' to '${value}' with '${error.body}'`;
    }
  }

  private templateName(parameter: Parameter): string | undefined {
    if (parameter.template_detail?.name) {
      return parameter.template_detail.name;
    }
    for (const template of this.catalog.parameterTemplates.values()) {
      if (template.pk === parameter.template) return template.name;
    }
    return undefined;
  }
}

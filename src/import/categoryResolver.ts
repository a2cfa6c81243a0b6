import { logger, type Logger } from "../utils/logger.js";
import { rankBy, ratio } from "../utils/similarity.js";
import { registerCategoryAlias, type CategoryMap, type ImportCatalog, type ImportCategory } from "./catalog.js";
import type { Chooser } from "./chooser.js";

export const CATEGORY_MATCHES = 5;
export const ENTER_MANUALLY = "Enter manually ...";
export const SKIP = "Skip ...";

/** Tries each path segment from leaf to root against the alias table. */
export function findCategoryByPath(categoryMap: CategoryMap, categoryPath: readonly string[]): ImportCategory | null {
  for (let index = categoryPath.length - 1; index >= 0; index -= 1) {
    const segment = categoryPath[index];
    const category = segment === undefined ? undefined : categoryMap.get(segment);
    if (category) {
      return category;
    }
  }
  return null;
}

export function rankCategories(categories: readonly ImportCategory[], categoryPath: readonly string[]): ImportCategory[] {
  const terms = [categoryPath.at(-1) ?? "", categoryPath.slice(-2).join(" ")];
  return rankBy(categories, (category) => {
    const descriptors = [category.name, category.path.slice(-2).join(" ")];
    return Math.max(...terms.flatMap((term) => descriptors.map((descriptor) => ratio(term, descriptor))));
  });
}

export class CategoryResolver {
  constructor(
    private readonly catalog: ImportCatalog,
    private readonly chooser: Chooser,
    private readonly log: Logger = logger
  ) {}

  /**
   * Resolves a supplier category path to a configured category. Null means the part
   * cannot be placed; the caller reports that as a failure.
   */
  async resolve(categoryPath: readonly string[]): Promise<ImportCategory | null> {
    const known = findCategoryByPath(this.catalog.categoryMap, categoryPath);
    if (known) {
      return known;
    }

    const pathString = categoryPath.join(" / ");
    if (!this.chooser.interactive) {
      this.log.error({ msg: `failed to match category for '${pathString}'`, categoryPath });
      return null;
    }

    const category = await this.selectCategory(categoryPath, `failed to match category for '${pathString}', select category`);
    if (!category) {
      return null;
    }

    const leaf = categoryPath.at(-1);
    if (leaf) {
      registerCategoryAlias(this.catalog, category, leaf);
      this.log.info({ msg: `added alias '${leaf}' to category '${category.pathString}'` });
    }
    return category;
  }

  private async selectCategory(categoryPath: readonly string[], prompt: string): Promise<ImportCategory | null> {
    const matches = rankCategories(this.catalog.categories, categoryPath).slice(0, CATEGORY_MATCHES);
    const choices = [...matches.map((category) => category.path.join(" / ")), ENTER_MANUALLY, SKIP];

    let question = prompt;
    for (;;) {
      const index = await this.chooser.select(question, choices);
      if (index === null || index === matches.length + 1) {
        return null;
      }
      const picked = matches[index];
      if (picked) {
        return picked;
      }

      const name = await this.chooser.input("category name");
      const category = name ? this.catalog.categoryMap.get(name) : undefined;
      if (category && category.name === name) {
        return category;
      }
      this.log.warn({ msg: `category '${name ?? ""}' does not exist` });
      question = "select category";
    }
  }
}

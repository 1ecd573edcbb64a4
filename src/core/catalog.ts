import fs from "node:fs";
import path from "node:path";

import { CATEGORIES, DEFAULT_TOKEN, isCategory, type Category } from "../types/categories";
import { CatalogSchema, type CatalogFile, type CategoryMeta } from "../types/schemas";
import { ConfigError } from "./errors";

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "../../config/categories.json");

/**
 * Read-only category metadata: compliance grouping, replacement token and NER label aliases.
 */
export interface CategoryCatalog {
  readonly version: string;
  /** Total: unknown categories get DEFAULT_TOKEN. */
  tokenFor(category: string): string;
  metaFor(category: Category): CategoryMeta;
  /** Maps an NER label (any case) to a category; unknown labels become OTHER. */
  categoryForLabel(label: string): Category;
}

export function buildCatalog(file: CatalogFile): CategoryCatalog {
  const aliases = new Map<string, Category>();
  for (const category of CATEGORIES) {
    for (const alias of file.categories[category].aliases) {
      const key = alias.toUpperCase();
      const existing = aliases.get(key);
      if ((existing && existing !== category) || (isCategory(key) && key !== category)) {
        throw new ConfigError(`alias ${key} is claimed by more than one category`);
      }
      aliases.set(key, category);
    }
  }

  const tokens = new Map<string, string>(CATEGORIES.map((c) => [c, file.categories[c].token]));

  return Object.freeze({
    version: file.version,
    tokenFor: (category: string) => tokens.get(category) ?? DEFAULT_TOKEN,
    metaFor: (category: Category) => file.categories[category],
    categoryForLabel: (label: string): Category => {
      const key = label.trim().toUpperCase();
      if (isCategory(key)) return key;
      return aliases.get(key) ?? "OTHER";
    },
  });
}

/** Parse and validate a catalog document, throwing ConfigError with the offending fields. */
export function parseCatalog(raw: unknown): CategoryCatalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid category catalog: ${issues}`);
  }
  return buildCatalog(parsed.data);
}

export function loadCatalog(file: string = DEFAULT_CATALOG_PATH): CategoryCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(`cannot read category catalog at ${file}`, { cause: err });
  }
  return parseCatalog(raw);
}

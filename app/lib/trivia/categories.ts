import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { CategoryCatalogName } from "../config";

const CATALOG_FILE = fileURLToPath(
  new URL("../../../data/categories.json", import.meta.url),
);

const CatalogFileSchema = z.object({
  core: z.array(z.string().min(1)).min(1),
  extended: z.array(z.string().min(1)).min(1),
});

let catalogs: z.infer<typeof CatalogFileSchema> | null = null;

/**
 * Category catalog by name. Read once from data/categories.json.
 */
export function getCategoryCatalog(name: CategoryCatalogName = "core"): readonly string[] {
  if (!catalogs) {
    const raw: unknown = JSON.parse(readFileSync(CATALOG_FILE, "utf8"));
    catalogs = CatalogFileSchema.parse(raw);
  }
  return catalogs[name];
}

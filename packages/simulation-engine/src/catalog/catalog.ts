/**
 * Product Catalog
 *
 * Loads the products orders are drawn from. The bundled catalog lives next to
 * this module; `--catalog` / SIM_CATALOG_PATH point at a replacement file of
 * the same shape:
 *
 *   [{ "id": "PROD-001", "name": "...", "price_range": [29.99, 199.99] }]
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CatalogValidationError } from "../errors.js";
import type { Product } from "../types.js";

export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("./products.json", import.meta.url),
);

// ---------------------------------------------------------------------------
// Validation Result Types
// ---------------------------------------------------------------------------

export interface CatalogIssue {
  field: string;
  message: string;
}

export interface CatalogValidationResult {
  valid: boolean;
  errors: CatalogIssue[];
  products: Product[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPrice(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

/**
 * Validate parsed catalog JSON. Collects every problem instead of stopping at
 * the first one.
 */
export function validateCatalog(raw: unknown): CatalogValidationResult {
  const errors: CatalogIssue[] = [];
  const products: Product[] = [];

  if (!Array.isArray(raw)) {
    return {
      valid: false,
      errors: [{ field: "catalog", message: "must be an array of products" }],
      products,
    };
  }

  if (raw.length === 0) {
    errors.push({ field: "catalog", message: "must contain at least one product" });
  }

  const seenIds = new Set<string>();

  raw.forEach((entry: unknown, index: number) => {
    const field = `catalog[${index}]`;
    if (!isRecord(entry)) {
      errors.push({ field, message: "must be an object" });
      return;
    }

    const { id, name } = entry;
    const range = entry["price_range"];
    let ok = true;

    if (typeof id !== "string" || id.trim() === "") {
      errors.push({ field: `${field}.id`, message: "must be a non-empty string" });
      ok = false;
    } else if (seenIds.has(id)) {
      errors.push({ field: `${field}.id`, message: `duplicate product id ${id}` });
      ok = false;
    } else {
      seenIds.add(id);
    }

    if (typeof name !== "string" || name.trim() === "") {
      errors.push({ field: `${field}.name`, message: "must be a non-empty string" });
      ok = false;
    }

    if (!Array.isArray(range) || range.length !== 2 || !isPrice(range[0]) || !isPrice(range[1])) {
      errors.push({
        field: `${field}.price_range`,
        message: "must be [min, max] with non-negative numbers",
      });
      ok = false;
    } else if (range[1] < range[0]) {
      errors.push({
        field: `${field}.price_range`,
        message: `max ${range[1]} is below min ${range[0]}`,
      });
      ok = false;
    }

    if (ok && typeof id === "string" && typeof name === "string" && Array.isArray(range)) {
      const [min, max] = range;
      if (isPrice(min) && isPrice(max)) {
        products.push({ id, name, priceRange: { min, max } });
      }
    }
  });

  return { valid: errors.length === 0, errors, products };
}

/**
 * Read and validate a catalog file.
 *
 * @throws CatalogValidationError when the file is unreadable, not JSON, or
 *   fails validation.
 */
export function loadProductCatalog(path: string = DEFAULT_CATALOG_PATH): Product[] {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new CatalogValidationError([
      `catalog: cannot read ${path} (${err instanceof Error ? err.message : String(err)})`,
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new CatalogValidationError([
      `catalog: ${path} is not valid JSON (${err instanceof Error ? err.message : String(err)})`,
    ]);
  }

  const result = validateCatalog(parsed);
  if (!result.valid) {
    throw new CatalogValidationError(
      result.errors.map((e) => `${e.field}: ${e.message}`),
    );
  }
  return result.products;
}

/**
 * Taxonomy loading
 *
 * Reads the occupational taxonomy JSON and validates it. Fail-fast: any
 * read, parse or validation error throws.
 */

import * as fs from "fs";
import * as path from "path";
import type { Taxonomy } from "@/types";
import { validateTaxonomyRaw } from "@/utils";
import { TAXONOMY_PATH } from "@/constants";

/**
 * Loads the taxonomy from `taxonomyPath` (default TAXONOMY_PATH, relative to the working directory)
 *
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {TaxonomyValidationError} If validation fails
 */
export function loadTaxonomy(taxonomyPath: string = TAXONOMY_PATH): Taxonomy {
  const resolved = path.resolve(process.cwd(), taxonomyPath);
  const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  return validateTaxonomyRaw(raw);
}

/**
 * desktop-repack CLI — Recipe Loader
 *
 * Loads the app recipe a command works on: the file given with --recipe,
 * or the bundled default.
 */

import * as path from "path";
import { AppRecipe, loadRecipeFile } from "@desktop-repack/engine";
import { DEFAULT_RECIPE_PATH } from "./config";

export function recipePath(file?: string): string {
  return file ? path.resolve(file) : DEFAULT_RECIPE_PATH;
}

/**
 * @throws Error if the file is missing or the recipe is invalid
 */
export function loadRecipe(file?: string): AppRecipe {
  return loadRecipeFile(recipePath(file));
}

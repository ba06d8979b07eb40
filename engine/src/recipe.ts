/**
 * desktop-repack Engine — App Recipe Schema (Zod)
 *
 * A recipe describes one Windows desktop app: where its installer lives,
 * where the payload keeps its executable and resources, which icon sizes
 * to install, which native binding to stub out, and how the Linux menu
 * entry and launcher look.
 *
 * Recipes are YAML files. The schema below validates them and fills in
 * defaults.
 */

import * as fs from "fs";
import { z } from "zod";
import { parse as parseYaml } from "yaml";

const SHA256 = /^[a-fA-F0-9]{64}$/;

/** Relative path inside an extracted tree; no absolute paths, no ".." */
const RelativePath = z
  .string()
  .min(1)
  .refine((p) => !p.startsWith("/") && !p.split("/").includes(".."), {
    message: "must be a relative path without '..' segments",
  });

/** A name that is safe as a file name and inside a shell word */
const PlainName = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/);

export const RecipeSchema = z.object({
  id: PlainName,
  name: z.string().min(1).max(128),
  version: z.string().min(1),

  installer: z.object({
    url: z
      .string()
      .url()
      .refine((u) => u.startsWith("https://"), {
        message: "installer URL must be HTTPS",
      }),
    filename: PlainName,
    sha256: z.string().regex(SHA256).optional(),
    nested_extension: z
      .string()
      .regex(/^\.[A-Za-z0-9]+$/)
      .default(".nupkg"),
  }),

  payload: z.object({
    executable: RelativePath,
    resources_dir: RelativePath,
    archive: PlainName.default("app.asar"),
  }),

  icons: z.object({
    name: PlainName,
    sizes: z
      .array(z.number().int().positive().max(1024))
      .min(1)
      .default([16, 24, 32, 48, 64, 256]),
    /** Windows resource type of the icon group (RT_GROUP_ICON) */
    resource_type: z.number().int().positive().default(14),
  }),

  binding: z.object({
    crate: z.string().regex(/^[a-z0-9][a-z0-9-]*$/),
    target: RelativePath,
  }),

  tray: z.object({
    prefix: z.string().min(1).default("Tray"),
  }),

  desktop: z.object({
    command: PlainName,
    categories: z.array(z.string().min(1)).default(["Office", "Utility"]),
    schemes: z.array(z.string().regex(/^[a-z][a-z0-9+.-]*$/)).default([]),
  }),

  launcher: z.object({
    runtime: PlainName.default("electron"),
    wayland_env: z
      .string()
      .regex(/^[A-Z_][A-Z0-9_]*$/)
      .default("WAYLAND_DISPLAY"),
    wayland_flags: z
      .array(z.string().regex(/^--[A-Za-z0-9=._,-]+$/))
      .default([
        "--ozone-platform-hint=auto",
        "--enable-features=WaylandWindowDecorations",
      ]),
  }),

  build: z
    .object({
      work_dir: PlainName.optional(),
      output_dir: PlainName.optional(),
    })
    .default({}),
});

export type AppRecipe = z.infer<typeof RecipeSchema>;
/** What a recipe file may contain before defaults are applied */
export type AppRecipeInput = z.input<typeof RecipeSchema>;

export interface RecipeValidationError {
  path: string;
  message: string;
}

export type RecipeValidationResult =
  | { valid: true; recipe: AppRecipe; errors: [] }
  | { valid: false; errors: RecipeValidationError[] };

/**
 * Validate a parsed recipe object and apply defaults.
 */
export function validateRecipe(raw: unknown): RecipeValidationResult {
  const parsed = RecipeSchema.safeParse(raw);
  if (parsed.success) {
    return { valid: true, recipe: parsed.data, errors: [] };
  }
  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? `/${issue.path.join("/")}` : "/",
      message: issue.message,
    })),
  };
}

/**
 * Read, parse and validate a recipe YAML file.
 *
 * @throws Error if the file is missing, is not YAML, or fails validation
 */
export function loadRecipeFile(filePath: string): AppRecipe {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Recipe not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf-8");
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Recipe ${filePath} is not valid YAML: ${message}`);
  }

  const result = validateRecipe(raw);
  if (!result.valid) {
    const lines = result.errors.map((e) => `${e.path}: ${e.message}`);
    throw new Error(`Invalid recipe ${filePath}:\n  ${lines.join("\n  ")}`);
  }
  return result.recipe;
}

/** File name napi-rs gives the built binding for the Linux x64 triple */
export function bindingArtifactName(recipe: AppRecipe): string {
  return `${recipe.binding.crate}.linux-x64-gnu.node`;
}

/**
 * Lower-case and trim a SHA-256 hex digest; null if it is not 64 hex digits.
 */
export function normalizeSha256(hash: string): string | null {
  const normalized = hash.trim().toLowerCase();
  return SHA256.test(normalized) ? normalized : null;
}

/** Directory under <output>/lib/ holding the repacked app */
export function appLibDir(recipe: AppRecipe): string {
  return recipe.id;
}

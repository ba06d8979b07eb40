/**
 * desktop-repack Engine — Recipe Schema Tests
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { stringify as stringifyYaml } from "yaml";
import {
  appLibDir,
  bindingArtifactName,
  loadRecipeFile,
  normalizeSha256,
  validateRecipe,
} from "../src/recipe";
import { makeTempDir, TEST_RECIPE_INPUT, testRecipe } from "./helpers";

describe("validateRecipe", () => {
  it("accepts a minimal recipe and fills in defaults", () => {
    const result = validateRecipe(TEST_RECIPE_INPUT);
    expect(result.valid).toBe(true);
    if (!result.valid) return;

    const recipe = result.recipe;
    expect(recipe.installer.nested_extension).toBe(".nupkg");
    expect(recipe.payload.archive).toBe("app.asar");
    expect(recipe.icons.sizes).toEqual([16, 24, 32, 48, 64, 256]);
    expect(recipe.icons.resource_type).toBe(14);
    expect(recipe.tray.prefix).toBe("Tray");
    expect(recipe.desktop.categories).toEqual(["Office", "Utility"]);
    expect(recipe.launcher.runtime).toBe("electron");
    expect(recipe.launcher.wayland_env).toBe("WAYLAND_DISPLAY");
    expect(recipe.launcher.wayland_flags).toEqual([
      "--ozone-platform-hint=auto",
      "--enable-features=WaylandWindowDecorations",
    ]);
    expect(recipe.build).toEqual({});
  });

  it("rejects a plain HTTP installer URL", () => {
    const result = validateRecipe({
      ...TEST_RECIPE_INPUT,
      installer: { url: "http://downloads.example.com/setup.exe", filename: "setup.exe" },
    });
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors).toEqual([
      { path: "/installer/url", message: "installer URL must be HTTPS" },
    ]);
  });

  it("rejects a payload path that escapes the work dir", () => {
    const result = validateRecipe({
      ...TEST_RECIPE_INPUT,
      payload: { executable: "../claude.exe", resources_dir: "lib/net45/resources" },
    });
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors.map((e) => e.path)).toEqual(["/payload/executable"]);
  });

  it("rejects a malformed sha256", () => {
    const result = validateRecipe({
      ...TEST_RECIPE_INPUT,
      installer: {
        url: "https://downloads.example.com/setup.exe",
        filename: "setup.exe",
        sha256: "1234",
      },
    });
    expect(result.valid).toBe(false);
  });

  it("reports a missing section at its path", () => {
    const { binding: _binding, ...withoutBinding } = TEST_RECIPE_INPUT;
    const result = validateRecipe(withoutBinding);
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.errors.map((e) => e.path)).toEqual(["/binding"]);
  });
});

describe("loadRecipeFile", () => {
  let dir: string;

  beforeAll(() => {
    dir = makeTempDir("desktop-repack-recipe-");
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads a YAML recipe", () => {
    const file = path.join(dir, "app.yaml");
    fs.writeFileSync(file, stringifyYaml(TEST_RECIPE_INPUT), "utf-8");
    const recipe = loadRecipeFile(file);
    expect(recipe.id).toBe("claude-desktop");
    expect(recipe.desktop.schemes).toEqual(["claude"]);
  });

  it("throws for a missing file", () => {
    const file = path.join(dir, "missing.yaml");
    expect(() => loadRecipeFile(file)).toThrow(`Recipe not found: ${file}`);
  });

  it("throws with every validation error", () => {
    const file = path.join(dir, "invalid.yaml");
    fs.writeFileSync(file, stringifyYaml({ ...TEST_RECIPE_INPUT, id: "" }), "utf-8");
    expect(() => loadRecipeFile(file)).toThrow(`Invalid recipe ${file}:\n  /id:`);
  });

  it("throws for text that is not YAML", () => {
    const file = path.join(dir, "broken.yaml");
    fs.writeFileSync(file, "id: [unclosed\n", "utf-8");
    expect(() => loadRecipeFile(file)).toThrow("is not valid YAML");
  });
});

describe("derived names", () => {
  it("names the napi-rs artifact after the crate", () => {
    expect(bindingArtifactName(testRecipe())).toBe("patchy-cnb.linux-x64-gnu.node");
  });

  it("uses the recipe id as the lib directory", () => {
    expect(appLibDir(testRecipe())).toBe("claude-desktop");
  });
});

describe("normalizeSha256", () => {
  it("lower-cases and trims a valid digest", () => {
    expect(normalizeSha256(`  ${"AB".repeat(32)}\n`)).toBe("ab".repeat(32));
  });

  it("returns null for a short or non-hex digest", () => {
    expect(normalizeSha256("abc123")).toBeNull();
    expect(normalizeSha256("g".repeat(64))).toBeNull();
    expect(normalizeSha256("")).toBeNull();
  });
});

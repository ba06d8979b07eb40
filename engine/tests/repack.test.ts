/**
 * desktop-repack Engine — Payload Repack Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as asar from "@electron/asar";
import { repackLayout, repackPayload } from "../src/repack";
import {
  BUILT_BINDING,
  makeTempDir,
  silentLogger,
  testContext,
  testRecipe,
  TRAY_ICONS,
  writeFakePayload,
} from "./helpers";

const BINDING_TARGET = "node_modules/claude-native/claude-native-binding.node";

let root: string;

afterEach(() => {
  if (root) fs.rmSync(root, { recursive: true, force: true });
});

function writeStub(dir: string): string {
  const file = path.join(dir, "stub.node");
  fs.writeFileSync(file, BUILT_BINDING);
  return file;
}

describe("repackLayout", () => {
  it("puts the archive under lib/<recipe id> in the output dir", () => {
    const layout = repackLayout(
      {
        work_dir: "/w",
        output_dir: "/o",
        cache_dir: "/c",
        package_manager: "dnf",
        image_tool: "magick",
        binding: { kind: "build" },
      },
      testRecipe(),
    );
    expect(layout).toEqual({
      resources: "/w/lib/net45/resources",
      app_dir: "/o/lib/claude-desktop",
      archive: "/o/lib/claude-desktop/app.asar",
      unpacked: "/o/lib/claude-desktop/app.asar.unpacked",
      contents: "/o/lib/claude-desktop/app.asar.contents",
    });
  });
});

describe("repackPayload", () => {
  it("swaps the native binding and adds the tray icons", async () => {
    root = makeTempDir("desktop-repack-asar-");
    const recipe = testRecipe();
    const context = testContext(root);
    await writeFakePayload(context.work_dir, recipe);

    const outcome = await repackPayload({
      context,
      recipe,
      bindingPath: writeStub(root),
      logger: silentLogger,
    });

    const layout = repackLayout(context, recipe);
    expect(outcome).toEqual({ ok: true, value: { app_archive: layout.archive } });

    expect(asar.extractFile(layout.archive, BINDING_TARGET).toString("utf-8")).toBe(BUILT_BINDING);
    expect(asar.extractFile(layout.archive, "index.js").toString("utf-8")).toBe(
      "module.exports = {};",
    );
    for (const icon of TRAY_ICONS) {
      expect(asar.extractFile(layout.archive, `resources/${icon}`).toString("utf-8")).toBe(
        `icon ${icon}`,
      );
    }
    expect(fs.readFileSync(path.join(layout.unpacked, BINDING_TARGET), "utf-8")).toBe(
      BUILT_BINDING,
    );
    expect(fs.readFileSync(path.join(layout.contents, BINDING_TARGET), "utf-8")).toBe(
      BUILT_BINDING,
    );
  });

  it("fails with ARTIFACT_ERROR when the payload has no tray icons", async () => {
    root = makeTempDir("desktop-repack-asar-");
    const recipe = testRecipe();
    const context = testContext(root);
    await writeFakePayload(context.work_dir, recipe);
    for (const icon of TRAY_ICONS) {
      fs.rmSync(path.join(context.work_dir, recipe.payload.resources_dir, icon));
    }

    const outcome = await repackPayload({
      context,
      recipe,
      bindingPath: writeStub(root),
      logger: silentLogger,
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toEqual({
      category: "ARTIFACT_ERROR",
      step: "REPACKING",
      message: "Failed to copy tray icons",
      details: {
        expected: path.join(context.work_dir, "lib", "net45", "resources", "Tray*"),
      },
    });
  });

  it("fails on the first copy when the archive is missing", async () => {
    root = makeTempDir("desktop-repack-asar-");
    const context = testContext(root);

    const outcome = await repackPayload({
      context,
      recipe: testRecipe(),
      bindingPath: writeStub(root),
      logger: silentLogger,
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.category).toBe("EXECUTION_ERROR");
    expect(outcome.error.message).toBe("Failed to copy app.asar");
  });
});

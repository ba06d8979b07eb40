/**
 * desktop-repack Engine — Test Fixtures
 *
 * Fake external tools that write the files the real ones would, a fake PATH
 * lookup, and a recipe factory. Nothing here touches the network.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as asar from "@electron/asar";
import { AppRecipe, AppRecipeInput, RecipeSchema } from "../src/recipe";
import { BuildContext } from "../src/types";
import { createLogger } from "../src/utils/logger";
import { CommandResult, CommandRunner } from "../src/utils/process";
import { ExecutableLookup } from "../src/utils/which";

export const silentLogger = createLogger({ level: "silent" });

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

// ─── Recipe / Context ────────────────────────────────────────────

export const TEST_RECIPE_INPUT: AppRecipeInput = {
  id: "claude-desktop",
  name: "Claude",
  version: "0.7.8",
  installer: {
    url: "https://downloads.example.com/Claude-Setup-x64.exe",
    filename: "Claude-Setup-x64.exe",
  },
  payload: {
    executable: "lib/net45/claude.exe",
    resources_dir: "lib/net45/resources",
  },
  icons: { name: "claude" },
  binding: {
    crate: "patchy-cnb",
    target: "node_modules/claude-native/claude-native-binding.node",
  },
  tray: {},
  desktop: {
    command: "claude-desktop",
    schemes: ["claude"],
  },
  launcher: {},
};

export function testRecipe(overrides: Partial<AppRecipeInput> = {}): AppRecipe {
  return RecipeSchema.parse({ ...TEST_RECIPE_INPUT, ...overrides });
}

export function testContext(root: string, overrides: Partial<BuildContext> = {}): BuildContext {
  const context: BuildContext = {
    work_dir: path.join(root, "work"),
    output_dir: path.join(root, "out"),
    cache_dir: path.join(root, "cache"),
    package_manager: "dnf",
    image_tool: "magick",
    binding: { kind: "build" },
    ...overrides,
  };
  fs.mkdirSync(context.work_dir, { recursive: true });
  fs.mkdirSync(context.output_dir, { recursive: true });
  fs.mkdirSync(context.cache_dir, { recursive: true });
  return context;
}

// ─── PATH Lookup ─────────────────────────────────────────────────

export const ALL_TOOLS = [
  "7z",
  "pnpm",
  "node",
  "cargo",
  "rustc",
  "electron",
  "wrestool",
  "icotool",
  "magick",
  "dnf",
];

export function fakeWhich(available: string[]): ExecutableLookup {
  return (name) => (available.includes(name) ? `/usr/bin/${name}` : null);
}

// ─── Command Runner ──────────────────────────────────────────────

export interface RecordedCall {
  command: string;
  args: string[];
  cwd: string;
}

export type FakeTool = (
  args: string[],
  cwd: string,
) => CommandResult | void | Promise<CommandResult | void>;

const OK: CommandResult = { exit_code: 0, stdout: "", stderr: "" };

export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly tools: Record<string, FakeTool> = {}) {}

  async run(command: string, args: string[], options: { cwd: string }): Promise<CommandResult> {
    this.calls.push({ command, args, cwd: options.cwd });
    const tool = this.tools[command];
    if (!tool) {
      return { exit_code: 127, stdout: "", stderr: `${command}: command not found` };
    }
    return (await tool(args, options.cwd)) ?? OK;
  }

  commands(): string[] {
    return this.calls.map((c) => [c.command, ...c.args].join(" "));
  }
}

export function failure(code: number, stderr: string): CommandResult {
  return { exit_code: code, stdout: "", stderr };
}

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

// ─── Fake Tools ──────────────────────────────────────────────────

export const NESTED_ARCHIVE_NAME = "Claude-0.7.8-full.nupkg";
export const VENDOR_BINDING = "vendor binding";
export const BUILT_BINDING = "stub binding";
export const TRAY_ICONS = ["TrayIconTemplate.png", "TrayIconTemplate@2x.png"];

/**
 * Write the payload the nested archive holds: the executable, a real
 * app.asar, the unpacked tree and the tray icons.
 */
export async function writeFakePayload(workDir: string, recipe: AppRecipe): Promise<void> {
  writeFile(path.join(workDir, recipe.payload.executable), "MZ");

  const resources = path.join(workDir, recipe.payload.resources_dir);
  const source = path.join(workDir, "asar-source");
  writeFile(path.join(source, "package.json"), '{"name":"claude","main":"index.js"}');
  writeFile(path.join(source, "index.js"), "module.exports = {};");
  writeFile(path.join(source, recipe.binding.target), VENDOR_BINDING);
  fs.mkdirSync(resources, { recursive: true });
  await asar.createPackage(source, path.join(resources, recipe.payload.archive));
  fs.rmSync(source, { recursive: true, force: true });

  writeFile(
    path.join(resources, `${recipe.payload.archive}.unpacked`, recipe.binding.target),
    VENDOR_BINDING,
  );
  for (const icon of TRAY_ICONS) {
    writeFile(path.join(resources, icon), `icon ${icon}`);
  }
}

export interface FakeToolOptions {
  /** Sizes icotool "extracts" */
  icoSizes?: number[];
  /** Sizes the image tool fails to convert */
  failingSizes?: number[];
  /** Nested archive name the outer extraction produces */
  nestedName?: string;
}

/**
 * Fake 7z, pnpm, wrestool, icotool and magick that behave like the real
 * tools on a well-formed installer.
 */
export function fakeTools(recipe: AppRecipe, options: FakeToolOptions = {}): Record<string, FakeTool> {
  const icoSizes = options.icoSizes ?? [16, 24, 32, 48, 64, 256];
  const failingSizes = options.failingSizes ?? [];
  const nestedName = options.nestedName ?? NESTED_ARCHIVE_NAME;

  return {
    "7z": async (args, cwd) => {
      const archive = args[args.length - 1];
      if (archive.endsWith(".exe")) {
        writeFile(path.join(cwd, nestedName), "nupkg");
        return;
      }
      await writeFakePayload(cwd, recipe);
    },
    pnpm: (args, cwd) => {
      if (args[0] === "run" && args[1] === "build") {
        writeFile(path.join(cwd, `${recipe.binding.crate}.linux-x64-gnu.node`), BUILT_BINDING);
      }
    },
    wrestool: (args, cwd) => {
      const out = args[args.indexOf("-o") + 1];
      writeFile(path.join(cwd, out), "ico");
    },
    icotool: (_args, cwd) => {
      icoSizes.forEach((size, i) => {
        writeFile(path.join(cwd, `${recipe.icons.name}_${i + 1}_${size}x${size}x32.png`), `png ${size}`);
      });
    },
    magick: (args) => {
      const [source, target] = args;
      if (failingSizes.some((size) => target.includes(`${path.sep}${size}x${size}${path.sep}`))) {
        return failure(1, "magick: improper image header");
      }
      fs.copyFileSync(source, target);
    },
  };
}

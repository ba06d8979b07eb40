/**
 * desktop-repack Engine — Menu Entry, Launcher and Instructions Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import { execFileSync } from "child_process";
import * as fs from "fs";
import * as path from "path";
import {
  buildInstallInstructions,
  desktopEntryPath,
  doubleQuote,
  launcherPath,
  renderDesktopEntry,
  renderLauncher,
  writeLauncherFiles,
} from "../src/desktop";
import { makeTempDir, silentLogger, testContext, testRecipe } from "./helpers";

describe("renderDesktopEntry", () => {
  it("renders the entry with the URI scheme handler", () => {
    expect(renderDesktopEntry(testRecipe())).toBe(
      [
        "[Desktop Entry]",
        "Name=Claude",
        "Exec=claude-desktop %u",
        "Icon=claude",
        "Type=Application",
        "Terminal=false",
        "Categories=Office;Utility;",
        "MimeType=x-scheme-handler/claude",
        "",
      ].join("\n"),
    );
  });

  it("joins several schemes and omits MimeType when there are none", () => {
    const many = testRecipe({
      desktop: { command: "claude-desktop", schemes: ["claude", "claude-dev"] },
    });
    expect(renderDesktopEntry(many)).toContain(
      "MimeType=x-scheme-handler/claude;x-scheme-handler/claude-dev\n",
    );

    const none = testRecipe({ desktop: { command: "claude-desktop", schemes: [] } });
    expect(renderDesktopEntry(none)).not.toContain("MimeType=");
  });
});

describe("renderLauncher", () => {
  it("adds the Wayland flags only when the variable is set", () => {
    expect(renderLauncher(testRecipe(), "/opt/out/lib/claude-desktop/app.asar")).toBe(
      [
        "#!/bin/bash",
        'electron "/opt/out/lib/claude-desktop/app.asar" \\',
        '    ${WAYLAND_DISPLAY:+--ozone-platform-hint=auto --enable-features=WaylandWindowDecorations} "$@"',
        "",
      ].join("\n"),
    );
  });

  it("renders a single line without Wayland flags", () => {
    const recipe = testRecipe({ launcher: { wayland_flags: [] } });
    expect(renderLauncher(recipe, "/opt/my apps/app.asar")).toBe(
      '#!/bin/bash\nelectron "/opt/my apps/app.asar" "$@"\n',
    );
  });

  it("escapes characters bash expands inside double quotes", () => {
    expect(doubleQuote('a"b$c`d\\e')).toBe('"a\\"b\\$c\\`d\\\\e"');
  });
});

describe("writeLauncherFiles", () => {
  let root: string;

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("writes the entry and an executable launcher", async () => {
    root = makeTempDir("desktop-repack-launcher-");
    const recipe = testRecipe();
    const context = testContext(root);

    const outcome = await writeLauncherFiles({ context, recipe, logger: silentLogger });

    const entry = path.join(context.output_dir, "share", "applications", "claude-desktop.desktop");
    const launcher = path.join(context.output_dir, "bin", "claude-desktop");
    expect(outcome).toEqual({ ok: true, value: { desktop_entry: entry, launcher } });
    expect(fs.readFileSync(entry, "utf-8")).toBe(renderDesktopEntry(recipe));
    expect(fs.readFileSync(launcher, "utf-8")).toContain(
      `electron "${path.join(context.output_dir, "lib", "claude-desktop", "app.asar")}"`,
    );
    expect(fs.statSync(launcher).mode & 0o777).toBe(0o755);
  });

  describe("running the written launcher", () => {
    // Stand-in runtime that prints each argument it receives in brackets
    const FAKE_RUNTIME = '#!/bin/sh\nfor arg in "$@"; do printf \'[%s]\\n\' "$arg"; done\n';

    async function runLauncher(wayland: string | undefined): Promise<{ archive: string; lines: string[] }> {
      root = makeTempDir("desktop-repack-launcher-");
      const context = testContext(path.join(root, "my apps"));
      const outcome = await writeLauncherFiles({ context, recipe: testRecipe(), logger: silentLogger });
      if (!outcome.ok) throw new Error(outcome.error.message);

      const bin = path.join(root, "fake-bin");
      fs.mkdirSync(bin);
      fs.writeFileSync(path.join(bin, "electron"), FAKE_RUNTIME, { mode: 0o755 });

      const env: NodeJS.ProcessEnv = { ...process.env, PATH: `${bin}:${process.env.PATH ?? ""}` };
      delete env.WAYLAND_DISPLAY;
      if (wayland !== undefined) env.WAYLAND_DISPLAY = wayland;

      const stdout = execFileSync(outcome.value.launcher, ["claude://open"], { env, encoding: "utf-8" });
      return {
        archive: path.join(context.output_dir, "lib", "claude-desktop", "app.asar"),
        lines: stdout.split("\n").filter((line) => line !== ""),
      };
    }

    it("passes the archive and arguments through without Wayland", async () => {
      const { archive, lines } = await runLauncher(undefined);
      expect(archive).toContain(" ");
      expect(lines).toEqual([`[${archive}]`, "[claude://open]"]);
    });

    it("adds the Wayland flags when WAYLAND_DISPLAY is set", async () => {
      const { archive, lines } = await runLauncher("wayland-0");
      expect(lines).toEqual([
        `[${archive}]`,
        "[--ozone-platform-hint=auto]",
        "[--enable-features=WaylandWindowDecorations]",
        "[claude://open]",
      ]);
    });

    it("treats an empty WAYLAND_DISPLAY as unset", async () => {
      const { archive, lines } = await runLauncher("");
      expect(lines).toEqual([`[${archive}]`, "[claude://open]"]);
    });
  });
});

describe("buildInstallInstructions", () => {
  const recipe = testRecipe();
  const out = "/home/user/claude-desktop";

  it("copies the tree into ~/.local and registers the scheme", () => {
    const instructions = buildInstallInstructions(
      { output_dir: out, package_manager: "dnf" },
      recipe,
    );
    expect(instructions).toEqual({
      copy: [
        "mkdir -p ~/.local/bin ~/.local/share/applications ~/.local/share/icons",
        'cp "/home/user/claude-desktop/bin/claude-desktop" ~/.local/bin/',
        'cp "/home/user/claude-desktop/share/applications/claude-desktop.desktop" ~/.local/share/applications/',
        'cp -r "/home/user/claude-desktop/share/icons"/* ~/.local/share/icons/',
      ],
      refresh: ["update-desktop-database ~/.local/share/applications"],
      protocol: ["xdg-mime default claude-desktop.desktop x-scheme-handler/claude"],
    });
  });

  it("mentions desktop-file-utils on apt systems", () => {
    const { refresh } = buildInstallInstructions({ output_dir: out, package_manager: "apt" }, recipe);
    expect(refresh).toEqual([
      "update-desktop-database ~/.local/share/applications",
      "# You might need to install update-desktop-database if not present:",
      "# sudo apt-get install desktop-file-utils",
    ]);
  });

  it("has no refresh step for an unknown package manager", () => {
    const { refresh } = buildInstallInstructions(
      { output_dir: out, package_manager: "unknown" },
      recipe,
    );
    expect(refresh).toEqual([]);
  });

  it("agrees with the paths the files are written to", () => {
    const { copy } = buildInstallInstructions({ output_dir: out, package_manager: "dnf" }, recipe);
    expect(copy[1]).toBe(`cp "${launcherPath(out, recipe)}" ~/.local/bin/`);
    expect(copy[2]).toBe(`cp "${desktopEntryPath(out, recipe)}" ~/.local/share/applications/`);
  });

  it("quotes an output directory with spaces and shell characters", () => {
    const { copy } = buildInstallInstructions(
      { output_dir: "/home/user/My Apps/$HOME", package_manager: "dnf" },
      recipe,
    );
    expect(copy.slice(1)).toEqual([
      'cp "/home/user/My Apps/\\$HOME/bin/claude-desktop" ~/.local/bin/',
      'cp "/home/user/My Apps/\\$HOME/share/applications/claude-desktop.desktop" ~/.local/share/applications/',
      'cp -r "/home/user/My Apps/\\$HOME/share/icons"/* ~/.local/share/icons/',
    ]);
  });
});

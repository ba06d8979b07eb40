/**
 * desktop-repack Engine — Post-Build Instructions
 *
 * The commands a user runs to install the output tree into ~/.local and
 * register the URI scheme handler. Informational only: nothing here
 * touches the filesystem.
 */

import * as path from "path";
import { AppRecipe } from "../recipe";
import { BuildContext } from "../types";
import { hicolorDir } from "../icons";
import { desktopEntryPath, doubleQuote, launcherPath, schemeMimeTypes } from "./entry";

export interface InstallInstructions {
  /** Copy the tree into the user's profile */
  copy: string[];
  /** Refresh the desktop database (package-manager specific) */
  refresh: string[];
  /** Register the entry as the handler of its URI schemes */
  protocol: string[];
}

export function buildInstallInstructions(
  context: Pick<BuildContext, "output_dir" | "package_manager">,
  recipe: AppRecipe,
): InstallInstructions {
  const out = context.output_dir;
  const entryName = path.basename(desktopEntryPath(out, recipe));

  // The icon glob stays outside the quotes so the shell still expands it
  const copy = [
    "mkdir -p ~/.local/bin ~/.local/share/applications ~/.local/share/icons",
    `cp ${doubleQuote(launcherPath(out, recipe))} ~/.local/bin/`,
    `cp ${doubleQuote(desktopEntryPath(out, recipe))} ~/.local/share/applications/`,
    `cp -r ${doubleQuote(path.dirname(hicolorDir(out)))}/* ~/.local/share/icons/`,
  ];

  const refresh: string[] = [];
  switch (context.package_manager) {
    case "dnf":
      refresh.push("update-desktop-database ~/.local/share/applications");
      break;
    case "apt":
      refresh.push(
        "update-desktop-database ~/.local/share/applications",
        "# You might need to install update-desktop-database if not present:",
        "# sudo apt-get install desktop-file-utils",
      );
      break;
    case "unknown":
      break;
  }

  const protocol = schemeMimeTypes(recipe).map(
    (mime) => `xdg-mime default ${entryName} ${mime}`,
  );

  return { copy, refresh, protocol };
}

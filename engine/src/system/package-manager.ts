/**
 * desktop-repack Engine — Package Manager Detection
 *
 * Only dnf (Fedora/RHEL) and apt (Debian/Ubuntu) get tailored install and
 * post-install commands. Anything else is "unknown".
 */

import { PackageManager } from "../types";
import { ExecutableLookup } from "../utils/which";

/** Distribution packages that provide every required tool */
export const DISTRO_PACKAGES: Record<Exclude<PackageManager, "unknown">, string[]> = {
  dnf: [
    "p7zip",
    "p7zip-plugins",
    "nodejs",
    "rust",
    "cargo",
    "electron",
    "ImageMagick",
    "icoutils",
  ],
  apt: [
    "p7zip-full",
    "nodejs",
    "cargo",
    "rustc",
    "electron",
    "imagemagick",
    "icoutils",
  ],
};

const INSTALL_PREFIX: Record<Exclude<PackageManager, "unknown">, string> = {
  dnf: "sudo dnf install -y",
  apt: "sudo apt-get install -y",
};

export const PNPM_INSTALL_COMMAND =
  "curl -fsSL https://get.pnpm.io/install.sh | sh -";

/**
 * Detect the host package manager. dnf wins when both are present.
 */
export function detectPackageManager(which: ExecutableLookup): PackageManager {
  if (which("dnf")) return "dnf";
  if (which("apt-get")) return "apt";
  return "unknown";
}

export interface InstallHint {
  /** False when the package manager is not one we have package lists for */
  supported: boolean;
  commands: string[];
}

/**
 * Commands that install the build's dependencies on this distribution.
 *
 * @param needsPnpm - include the pnpm installer (only needed when the
 *   stub binding is built from source)
 */
export function installHint(
  packageManager: PackageManager,
  needsPnpm: boolean,
): InstallHint {
  if (packageManager === "unknown") {
    return { supported: false, commands: [] };
  }

  const commands = [
    `${INSTALL_PREFIX[packageManager]} ${DISTRO_PACKAGES[packageManager].join(" ")}`,
  ];
  if (needsPnpm) {
    commands.push(PNPM_INSTALL_COMMAND);
  }
  return { supported: true, commands };
}

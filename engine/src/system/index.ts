/**
 * desktop-repack Engine — Host System (Barrel Export)
 */

export {
  checkDependencies,
  detectImageTool,
  requiredTools,
  IMAGE_TOOL_LABEL,
  type DependencyReport,
  type DependencyStatus,
  type DependencyCheckOptions,
} from "./dependencies";

export {
  detectPackageManager,
  installHint,
  DISTRO_PACKAGES,
  PNPM_INSTALL_COMMAND,
  type InstallHint,
} from "./package-manager";

export {
  renderDesktopEntry,
  renderLauncher,
  writeLauncherFiles,
  desktopEntryPath,
  launcherPath,
  schemeMimeTypes,
  doubleQuote,
  type WriteLauncherOptions,
} from "./entry";

export { buildInstallInstructions, type InstallInstructions } from "./instructions";

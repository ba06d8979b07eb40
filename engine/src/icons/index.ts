export {
  processIcons,
  hicolorDir,
  iconTargetPath,
  iconSourcePattern,
  type IconPipelineOptions,
} from "./pipeline";

export { repackPayload, repackLayout, type RepackOptions, type RepackLayout } from "./payload";

export { toNodeHandler } from "./node-handler";
export {
  fileSystemAssets,
  mimeTypeFor,
  type FileSystemAssetsOptions,
} from "./file-system-assets";

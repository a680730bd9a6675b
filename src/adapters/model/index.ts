/**
 * Model Adapter Exports
 *
 * Loading command models from YAML/JSON documents.
 */

// Interface
export type { ModelSource, ModelFormat } from "./types.js";

// Documents
export { parseModelDocument, linkModelDocument, type LoadedModel } from "./document.js";

// Sources
export {
  FileModelSource,
  TextModelSource,
  loadModel,
  loadModelFile,
  parseModelText,
  formatFromPath,
} from "./filesystem.js";

export { buildTree } from "./tree-builder.js";
export {
  renderTree,
  DEFAULT_CONNECTOR,
  DEFAULT_INDENT,
} from "./tree-renderer.js";
export {
  isExcludedDirectory,
  parseExclusionPattern,
} from "./exclusion-matcher.js";
export type { ExclusionPattern } from "./exclusion-matcher.js";
export type {
  TreeBuildResult,
  TreeLine,
  TreeLineKind,
  TreeRenderOptions,
  TreeWarning,
  TreeWarningReason,
} from "./types.js";

export { classifyFile } from "./file-classifier.js";
export {
  DEFAULT_REPOS_DIR,
  cloneRepository,
  listRepositories,
  listRepositoryFiles,
} from "./repo-loader.js";
export type { CloneOptions, CloneResult, FileKind } from "./types.js";

export { DEFAULT_CONFIG_FILE, loadConfig } from "./config-loader.js";
export {
  DEFAULT_OUTPUT_FILE,
  DEFAULT_STATIC_SECTIONS,
  validateConfig,
} from "./config-validator.js";
export type { ContextConfig, SectionSource } from "./types.js";

export { generateContext, writeContext } from "./context-document.js";
export type {
  ContextOptions,
  ContextResult,
  WriteContextOptions,
  WrittenContext,
} from "./types.js";

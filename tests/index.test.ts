import { describe, expect, it } from "vitest";
import * as api from "../src/index.js";

describe("package entry", () => {
  it("exposes the tree, config, context and ingest operations", () => {
    expect(typeof api.buildTree).toBe("function");
    expect(typeof api.renderTree).toBe("function");
    expect(typeof api.loadConfig).toBe("function");
    expect(typeof api.generateContext).toBe("function");
    expect(typeof api.cloneRepository).toBe("function");
    expect(api.DEFAULT_CONNECTOR).toBe("├── ");
  });
});

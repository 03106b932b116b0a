/**
 * Unit tests for store location resolution
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { isDiagnosticsEnabled, resolveStoreLocation } from "../src/lib/options.js";

describe("store options", () => {
  describe("resolveStoreLocation", () => {
    it("should prefer --root over MODELSTORE_ROOT", () => {
      const env = { MODELSTORE_ROOT: "/env/path" };

      expect(resolveStoreLocation({ root: "/cli/path" }, env).root).toBe(path.resolve("/cli/path"));
      expect(resolveStoreLocation({}, env).root).toBe(path.resolve("/env/path"));
    });

    it("should default to ./data", () => {
      expect(resolveStoreLocation({}, {}).root).toBe(path.resolve("./data"));
    });

    it("should only pass index settings given on the command line", () => {
      expect(resolveStoreLocation({}, {}).overrides).toEqual({});
      expect(
        resolveStoreLocation({ writeIndex: ".model-configs-000002", indexPattern: ".model-configs-*" }, {})
          .overrides
      ).toEqual({ writeIndex: ".model-configs-000002", indexPattern: ".model-configs-*" });
    });
  });

  describe("isDiagnosticsEnabled", () => {
    it("should be enabled by --verbose or MODELSTORE_CLI_DEBUG=1 only", () => {
      expect(isDiagnosticsEnabled({}, {})).toBe(false);
      expect(isDiagnosticsEnabled({}, { MODELSTORE_CLI_DEBUG: "true" })).toBe(false);
      expect(isDiagnosticsEnabled({}, { MODELSTORE_CLI_DEBUG: "1" })).toBe(true);
      expect(isDiagnosticsEnabled({ verbose: true }, {})).toBe(true);
    });
  });
});

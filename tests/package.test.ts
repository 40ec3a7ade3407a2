/**
 * Package manifest checks.
 */

import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";

const manifest: unknown = JSON.parse(
  readFileSync(new URL("../package.json", import.meta.url), "utf8")
);

describe("package.json", () => {
  it("points every entry of the export map at the built files", () => {
    expect(manifest).toMatchObject({
      types: "./dist/index.d.ts",
      exports: {
        ".": {
          types: "./dist/index.d.ts",
          import: "./dist/index.js",
          require: "./dist/index.cjs",
        },
      },
    });
  });
});

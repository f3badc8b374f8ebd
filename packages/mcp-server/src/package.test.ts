import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";

interface PackageJsonShape {
  readonly private?: boolean;
  readonly main?: string;
  readonly types?: string;
  readonly scripts?: Record<string, string>;
  readonly dependencies?: Record<string, string>;
}

describe("mcp package metadata", () => {
  it("points consumers at the server module sources", async () => {
    const packageJsonPath = new URL("../package.json", import.meta.url);
    const raw = await readFile(packageJsonPath, "utf8");
    const manifest = JSON.parse(raw) as PackageJsonShape;

    expect(manifest.private).toBe(true);
    expect(manifest.main).toBe("./src/server.ts");
    expect(manifest.types).toBe("./src/server.ts");
    expect(manifest.scripts?.start).toBe("tsx src/index.ts");
    expect(manifest.dependencies?.["@newsdoc/engine"]).toBeDefined();
  });

  it("starts the stdio server from the entrypoint", async () => {
    const entrypointPath = new URL("./index.ts", import.meta.url);
    const source = await readFile(entrypointPath, "utf8");
    expect(source).toContain("createServer({ logger })");
  });
});

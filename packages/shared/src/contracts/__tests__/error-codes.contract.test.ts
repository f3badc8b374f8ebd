import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { ERROR_CODES } from "../error-codes";

const __dirname = dirname(fileURLToPath(import.meta.url));
const contract = JSON.parse(
  readFileSync(
    resolve(__dirname, "../../../../../contracts/error-codes.json"),
    "utf-8",
  ),
) as { codes: Array<{ code: string; description: string }> };

describe("error-codes contract", () => {
  it("codes match contract", () => {
    expect(Object.values(ERROR_CODES).sort()).toEqual(
      contract.codes.map((entry) => entry.code).sort(),
    );
  });

  it("each code is its own key", () => {
    for (const [key, value] of Object.entries(ERROR_CODES)) {
      expect(value).toBe(key);
    }
  });

  it("every contract code is described", () => {
    for (const entry of contract.codes) {
      expect(entry.description.trim().length).toBeGreaterThan(0);
    }
  });
});

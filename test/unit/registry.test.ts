import { describe, test, expect } from "vitest";
import { parseRegistry, registryOverrides, toRunOptions } from "../../src/services/registry.js";
import { ConfigSchema } from "../../src/config/schema.js";

const shop = { id: "21EB028P1", district: "Sivagangai", taluk: "Karaikudi (Tk)" };

describe("parseRegistry", () => {
  test("accepts shops without options", () => {
    const registry = parseRegistry({ shops: [shop] });
    expect(registry.shops).toEqual([shop]);
    expect(registryOverrides(registry)).toEqual({});
  });

  test("drops unknown shop fields", () => {
    const registry = parseRegistry({ shops: [{ ...shop, note: "near bus stand" }] });
    expect(registry.shops[0]).toEqual(shop);
  });

  test("rejects a shop without a taluk", () => {
    expect(() => parseRegistry({ shops: [{ id: "21EB028P1", district: "Sivagangai" }] })).toThrow();
  });

  test("rejects an empty id", () => {
    expect(() => parseRegistry({ shops: [{ ...shop, id: "" }] })).toThrow();
  });
});

describe("registryOverrides", () => {
  test("maps options to config keys", () => {
    const registry = parseRegistry({ shops: [], options: { headless: false, include_details: false } });
    expect(registryOverrides(registry)).toEqual({ headless: false, include_details: false });
  });

  test("camelCase includeDetails wins over snake_case", () => {
    const registry = parseRegistry({ shops: [], options: { includeDetails: true, include_details: false } });
    expect(registryOverrides(registry)).toEqual({ include_details: true });
  });
});

describe("toRunOptions", () => {
  test("is frozen", () => {
    const options = toRunOptions(ConfigSchema.parse({ include_details: false }));
    expect(options).toEqual({ headless: true, includeDetails: false });
    expect(Object.isFrozen(options)).toBe(true);
  });
});

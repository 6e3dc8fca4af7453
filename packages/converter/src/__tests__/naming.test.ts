import { describe, expect, it } from "vitest";
import { createNamingStrategy } from "../naming.js";

describe("createNamingStrategy", () => {
  it("should pass keys through for identity and camelCase", () => {
    for (const naming of ["identity", "camelCase"] as const) {
      const strategy = createNamingStrategy(naming);
      expect(strategy.toFieldName("first-name")).toBe("first-name");
      expect(strategy.toWireName("firstName")).toBe("firstName");
    }
  });

  it("should convert kebab-case keys", () => {
    const strategy = createNamingStrategy("kebab-case");
    expect(strategy.toFieldName("date-of-birth")).toBe("dateOfBirth");
    expect(strategy.toWireName("dateOfBirth")).toBe("date-of-birth");
    expect(strategy.toFieldName("name")).toBe("name");
  });

  it("should convert snake_case keys", () => {
    const strategy = createNamingStrategy("snake_case");
    expect(strategy.toFieldName("page_count")).toBe("pageCount");
    expect(strategy.toWireName("pageCount")).toBe("page_count");
    expect(strategy.toFieldName("address_line_2")).toBe("addressLine2");
  });
});

import { describe, expect, it } from "vitest";

import { fixtureDictionaries } from "../testing/fixtures.js";
import { createDictionaryProvider } from "./dictionaryProvider.js";

describe("dictionary provider", () => {
  const dict = createDictionaryProvider(fixtureDictionaries);

  it("lists configured names in order", () => {
    expect(dict.listBoats()).toEqual(["Aurora", "Breeze", "Coral"]);
    expect(dict.listCaptains()).toEqual(["Ivan", "Petr", "Oleg"]);
    expect(dict.listPiers()).toEqual(["North Pier", "South Pier"]);
    expect(dict.listPrograms()).toEqual(["Sunset Cruise", "Island Hop", "N/A"]);
  });

  it("derives private routes from programs minus the marker", () => {
    expect(dict.privateTourProgram).toBe("N/A");
    expect(dict.listPrivateRoutes()).toEqual(["Sunset Cruise", "Island Hop"]);
    expect(dict.isPrivateTour("N/A")).toBe(true);
    expect(dict.isPrivateTour("Island Hop")).toBe(false);
  });

  it("validates exact names per category", () => {
    expect(dict.isValid("boat", "Aurora")).toBe(true);
    expect(dict.isValid("boat", "aurora")).toBe(false);
    expect(dict.isValid("captain", "Aurora")).toBe(false);
    expect(dict.isValid("privateRoute", "N/A")).toBe(false);
  });

  it("resolves typed text case-insensitively to the canonical name", () => {
    expect(dict.resolve("boat", "  breeze ")).toBe("Breeze");
    expect(dict.resolve("pier", "SOUTH PIER")).toBe("South Pier");
    expect(dict.resolve("captain", "Nobody")).toBeNull();
  });

  it("honours a custom private-tour marker", () => {
    const custom = createDictionaryProvider({ ...fixtureDictionaries, programs: ["Reef", "Charter"], privateTourProgram: "Charter" });
    expect(custom.listPrivateRoutes()).toEqual(["Reef"]);
    expect(custom.isPrivateTour("Charter")).toBe(true);
  });
});

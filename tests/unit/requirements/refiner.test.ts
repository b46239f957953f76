import { describe, it, expect } from "vitest";
import { dedupKey, refineRequirements } from "../../../src/requirements/pipeline/refiner.js";

describe("dedupKey", () => {
  it("lowercases and keeps ASCII letters and digits only", () => {
    expect(dedupKey("The Customer shall book machine #12!")).toBe("thecustomershallbookmachine12");
    expect(dedupKey("Café – déjà vu")).toBe("cafdjvu");
  });
});

describe("refineRequirements", () => {
  it("keeps the first of drafts that differ only in case and punctuation", () => {
    expect(
      refineRequirements([
        "The customer shall book a washing machine",
        "the Customer shall book a washing-machine!",
      ]),
    ).toEqual(["The customer shall book a washing machine."]);
  });

  it("drops drafts of four words or fewer", () => {
    expect(refineRequirements(["The system shall respond", "The system shall respond quickly"])).toEqual([
      "The system shall respond quickly.",
    ]);
  });

  it("prefixes drafts without an approved lead", () => {
    expect(refineRequirements(["Staff can view machine status"])).toEqual([
      "The system shall Staff can view machine status.",
    ]);
  });

  it("accepts every approved lead as-is", () => {
    expect(
      refineRequirements([
        "The customer should pay by card",
        "The administrator should review weekly reports",
        "The customer shall receive a receipt",
        "The administrator shall track machine faults",
        "the system shall log every cycle",
      ]),
    ).toEqual([
      "The customer should pay by card.",
      "The administrator should review weekly reports.",
      "The customer shall receive a receipt.",
      "The administrator shall track machine faults.",
      "the system shall log every cycle.",
    ]);
  });

  it("does not add a second period", () => {
    expect(refineRequirements(["The system shall stop each dryer when finished."])).toEqual([
      "The system shall stop each dryer when finished.",
    ]);
  });

  it("repairs doubled modals", () => {
    expect(
      refineRequirements([
        "The system shall shall track usage counts",
        "The customer should should be able to be able to pay",
      ]),
    ).toEqual(["The system shall track usage counts.", "The customer should be able to pay."]);
  });

  it("returns [] for no drafts", () => {
    expect(refineRequirements([])).toEqual([]);
  });
});

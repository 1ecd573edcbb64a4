import { describe, it, expect } from "vitest";
import { FallbackRecognizer } from "../src/recognizers/fallback";
import { PatternRecognizer } from "../src/recognizers/pattern";
import { ageCategory, luhnValid } from "../src/recognizers/patterns";
import { MlRecognizer } from "../src/recognizers/ml";
import { catalog, FakeNer } from "./helpers";

describe("value rules", () => {
  it("splits ages at 89", () => {
    expect(ageCategory("89")).toBe("AGE");
    expect(ageCategory("90")).toBe("AGE_OVER_89");
  });

  it("checks card numbers with Luhn", () => {
    expect(luhnValid("4111-1111-1111-1111")).toBe(true);
    expect(luhnValid("4111111111111112")).toBe(false);
    expect(luhnValid("1234")).toBe(false);
  });
});

describe("PatternRecognizer", () => {
  const recognizer = new PatternRecognizer();

  it("reclassifies ages over 89", async () => {
    const spans = await recognizer.detect("Age: 92");
    expect(spans).toHaveLength(1);
    expect(spans[0]).toMatchObject({ start: 5, end: 7, category: "AGE_OVER_89", method: "custom_recognizer" });
    expect(spans[0].score).toBeCloseTo(0.85);
  });

  it("keeps younger ages as AGE", async () => {
    const spans = await recognizer.detect("Age: 45");
    expect(spans.map((s) => s.category)).toEqual(["AGE"]);
  });

  it("narrows a birth date to its value", async () => {
    const spans = await recognizer.detect("DOB: 05/15/1980");
    const dob = spans.find((s) => s.category === "DATE_OF_BIRTH");
    expect(dob).toMatchObject({ start: 5, end: 15 });
  });

  it("reports bare calendar dates, boosted by a visit keyword", async () => {
    const spans = await recognizer.detect("Appointment on 05/15/2024");
    expect(spans).toHaveLength(1);
    expect(spans[0]).toMatchObject({ start: 15, end: 25, category: "DATE", method: "custom_recognizer" });
    expect(spans[0].score).toBeCloseTo(0.75);
  });

  it("labels admission, discharge and death dates", async () => {
    const spans = await recognizer.detect("Admitted 03/14/2024, discharged 2024-03-20, died 04/01/2024.");
    expect(spans.filter((s) => s.category !== "DATE").map((s) => [s.category, s.start, s.end])).toEqual([
      ["ADMISSION_DATE", 9, 19],
      ["DISCHARGE_DATE", 32, 42],
      ["DEATH_DATE", 49, 59],
    ]);
  });

  it("does not read out-of-range numbers as dates", async () => {
    expect(await recognizer.detect("ratio 13/45/2024")).toEqual([]);
  });

  it("finds emails next to long runs of address characters", async () => {
    const text = `${"a.".repeat(2000)} contact: jane.doe@example.org`;
    const spans = await recognizer.detect(text);
    expect(spans.map((s) => [s.category, text.slice(s.start, s.end)])).toEqual([
      ["EMAIL_ADDRESS", "jane.doe@example.org"],
    ]);
  });

  it("does not start an email match inside a local part", async () => {
    const text = `${"x".repeat(70)}@example.com`;
    expect(await recognizer.detect(text)).toEqual([]);
  });

  it("requires a valid Luhn checksum for cards", async () => {
    const valid = await recognizer.detect("card 4111 1111 1111 1111");
    const card = valid.find((s) => s.category === "CREDIT_CARD");
    expect(card).toMatchObject({ start: 5, end: 24 });
    expect(card?.score).toBeCloseTo(0.75);

    const invalid = await recognizer.detect("card 4111 1111 1111 1112");
    expect(invalid.some((s) => s.category === "CREDIT_CARD")).toBe(false);
  });

  it("returns the same spans on repeated calls", async () => {
    const text = "SSN: 123-45-6789, Email: user@example.com";
    expect(await recognizer.detect(text)).toEqual(await recognizer.detect(text));
  });
});

describe("FallbackRecognizer", () => {
  const recognizer = new FallbackRecognizer();

  it("uses fixed scores without context boost", async () => {
    expect(await recognizer.detect("SSN: 123-45-6789")).toEqual([
      { start: 5, end: 16, category: "SSN", score: 0.8, method: "fallback_regex" },
    ]);
  });

  it("scores SOC 2 credentials at 0.75", async () => {
    const spans = await recognizer.detect("pwd: hunter2hunter2");
    expect(spans).toContainEqual({ start: 5, end: 19, category: "PASSWORD", score: 0.75, method: "fallback_regex" });
  });

  it("matches bare US and ISO dates", async () => {
    expect(await recognizer.detect("seen 4/1/24 and 2024-03-20")).toEqual([
      { start: 5, end: 11, category: "DATE", score: 0.5, method: "fallback_regex" },
      { start: 16, end: 26, category: "DATE", score: 0.5, method: "fallback_regex" },
    ]);
  });

  it("reclassifies ages", async () => {
    const spans = await recognizer.detect("aged 91");
    expect(spans).toEqual([{ start: 5, end: 7, category: "AGE_OVER_89", score: 0.8, method: "fallback_regex" }]);
  });
});

describe("MlRecognizer", () => {
  it("maps labels through the catalog and clamps scores", async () => {
    const ner = new FakeNer([
      { start: 0, end: 6, label: "GPE", score: 0.9 },
      { start: 10, end: 14, label: "per", score: 1.7 },
      { start: 15, end: 18, label: "SOMETHING", score: -1 },
    ]);
    const spans = await new MlRecognizer(ner, catalog).detect("Boston is Jane Roe", "en");
    expect(spans).toEqual([
      { start: 0, end: 6, category: "LOCATION", score: 0.9, method: "ml_model" },
      { start: 10, end: 14, category: "PERSON", score: 1, method: "ml_model" },
      { start: 15, end: 18, category: "OTHER", score: 0, method: "ml_model" },
    ]);
  });
});

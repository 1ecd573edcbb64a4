import { describe, it, expect } from "vitest";
import { ReplacementFailure } from "../src/core/errors";
import { REDACTION_MARKER } from "../src/core/failsafe";
import { RedactionPipeline } from "../src/core/pipeline";
import { resolveSpans, type SpanResolver } from "../src/core/resolver";
import { capturingLogger, catalog, FakeNer } from "./helpers";

const PATIENT = "Patient: John Smith, DOB: 05/15/1980, MRN#12345678";
const CONTACT = "SSN: 123-45-6789, Email: user@example.com";

describe("RedactionPipeline scenarios", () => {
  const pipeline = RedactionPipeline.create({ catalog });

  it("redacts a patient header", async () => {
    const res = await pipeline.anonymize(PATIENT);
    expect(res.anonymizedText).toBe("Patient: person, DOB: date, medical_record");
    expect(res.spans.map((e) => [e.span.category, e.span.start, e.span.end])).toEqual([
      ["PERSON", 9, 19],
      ["DATE_OF_BIRTH", 26, 36],
      ["MEDICAL_RECORD_NUMBER", 38, 50],
    ]);
    expect(res.mode).toBe("DEGRADED");
    expect(res.failedRecognizers).toEqual([]);
  });

  it("redacts contact identifiers", async () => {
    const res = await pipeline.anonymize(CONTACT);
    expect(res.anonymizedText).toBe("SSN: identifier, Email: email");
  });

  it("removes every detected value from the output", async () => {
    const res = await pipeline.anonymize(PATIENT);
    for (const value of ["John Smith", "05/15/1980", "12345678"]) {
      expect(res.anonymizedText.includes(value)).toBe(false);
    }
  });

  it("classifies ages around the HIPAA limit", async () => {
    const over = await pipeline.detect("Age: 92");
    expect(over.spans.map((s) => [s.category, s.start, s.end, s.method])).toEqual([
      ["AGE_OVER_89", 5, 7, "custom_recognizer"],
    ]);
    const under = await pipeline.detect("Age: 45");
    expect(under.spans.map((s) => s.category)).toEqual(["AGE"]);
  });

  it("redacts calendar dates that are not birth dates", async () => {
    const res = await pipeline.anonymize("Follow-up visit on 03/02/2025.");
    expect(res.anonymizedText).toBe("Follow-up visit on date.");
    expect(res.spans.map((e) => [e.span.category, e.span.start, e.span.end])).toEqual([["DATE", 19, 29]]);
  });

  it("redacts admission, discharge and death dates without a model", async () => {
    const res = await pipeline.anonymize("Admitted 03/14/2024, discharged 2024-03-20, died 04/01/2024.");
    expect(res.anonymizedText).toBe("Admitted date, discharged date, died date.");
    expect(res.spans.map((e) => e.span.category)).toEqual(["ADMISSION_DATE", "DISCHARGE_DATE", "DEATH_DATE"]);
    expect(res.mode).toBe("DEGRADED");
  });

  it("scans long runs of address characters without stalling other requests", async () => {
    const long = "a.".repeat(100_000);
    const started = Date.now();
    const [slow, other] = await Promise.all([pipeline.anonymize(long), pipeline.anonymize("SSN: 123-45-6789")]);
    expect(Date.now() - started).toBeLessThan(2000);
    expect(slow.anonymizedText).toBe(long);
    expect(slow.spans).toEqual([]);
    expect(other.anonymizedText).toBe("SSN: identifier");
  });
});

describe("degraded mode", () => {
  it("still detects with pattern layers when no NER is loaded", async () => {
    const pipeline = RedactionPipeline.create({ catalog });
    const res = await pipeline.detect("SSN: 123-45-6789");
    expect(res.spans).toEqual([{ start: 5, end: 16, category: "SSN", score: 0.8, method: "fallback_regex" }]);
    expect(res.mode).toBe("DEGRADED");
    expect(pipeline.status()).toEqual({
      mode: "DEGRADED",
      nerLoaded: false,
      modelId: null,
      recognizers: ["custom_patterns", "fallback_regex"],
      catalogVersion: "2024.1",
    });
  });

  it("flags requests where the NER call failed", async () => {
    const pipeline = RedactionPipeline.create({ catalog, ner: new FakeNer(null) });
    expect(pipeline.mode).toBe("NORMAL");
    const res = await pipeline.anonymize("SSN: 123-45-6789");
    expect(res.anonymizedText).toBe("SSN: identifier");
    expect(res.mode).toBe("DEGRADED");
    expect(res.failedRecognizers).toEqual(["ml_model"]);
  });

  it("treats a slow NER call as failed", async () => {
    const pipeline = RedactionPipeline.create({ catalog, ner: new FakeNer([], 200), recognizerTimeoutMs: 20 });
    const res = await pipeline.detect("SSN: 123-45-6789");
    expect(res.failedRecognizers).toEqual(["ml_model"]);
    expect(res.spans.map((s) => s.category)).toEqual(["SSN"]);
  });
});

describe("with an NER capability", () => {
  it("prefers confident model spans", async () => {
    const ner = new FakeNer([{ start: 9, end: 19, label: "PER", score: 0.95 }]);
    const pipeline = RedactionPipeline.create({ catalog, ner });
    const res = await pipeline.anonymize(PATIENT);
    expect(res.mode).toBe("NORMAL");
    expect(res.anonymizedText).toBe("Patient: person, DOB: date, medical_record");
    expect(res.spans[0].span.method).toBe("ml_model");
    expect(pipeline.status()).toMatchObject({ mode: "NORMAL", nerLoaded: true, modelId: "fake-ner" });
    expect(pipeline.status().recognizers).toEqual(["ml_model", "custom_patterns", "fallback_regex"]);
  });

  it("maps model labels to tokens", async () => {
    const ner = new FakeNer([
      { start: 0, end: 6, label: "GPE", score: 0.9 },
      { start: 16, end: 21, label: "FOO", score: 0.9 },
    ]);
    const pipeline = RedactionPipeline.create({ catalog, ner });
    const res = await pipeline.anonymize("Boston is cold, Fresh air");
    expect(res.anonymizedText).toBe("location is cold, entity air");
  });
});

describe("pseudonyms", () => {
  const pipeline = RedactionPipeline.create({ catalog });

  it("keeps the pseudonym verbatim", async () => {
    const res = await pipeline.anonymize("Patient: John Smith, DOB: 05/15/1980", { pseudonym: "John Smith" });
    expect(res.anonymizedText).toBe("Patient: John Smith, DOB: date");
    expect(res.pseudonymPreserved).toBe("John Smith");
  });

  it("echoes a supplied pseudonym even when the text lacks it", async () => {
    const res = await pipeline.anonymize("SSN: 123-45-6789", { pseudonym: "Jane" });
    expect(res.anonymizedText).toBe("SSN: identifier");
    expect(res.pseudonymPreserved).toBe("Jane");
  });

  it("leaves pseudonymPreserved unset without a pseudonym", async () => {
    const res = await pipeline.anonymize("SSN: 123-45-6789");
    expect(res.pseudonymPreserved).toBeUndefined();
  });
});

describe("fail-safe", () => {
  it("returns the emergency marker when resolution throws", async () => {
    const logger = capturingLogger();
    const pipeline = RedactionPipeline.create({
      catalog,
      logger,
      resolve: () => {
        throw new Error("resolver fault");
      },
    });
    const res = await pipeline.anonymize(PATIENT);
    expect(res).toEqual({ anonymizedText: REDACTION_MARKER, spans: [], mode: "EMERGENCY", failedRecognizers: [] });
    expect(logger.records.filter((r) => r.level === "error")).toEqual([
      { level: "error", message: "pipeline_failed", metadata: { stage: "anonymize", error: { name: "Error" } } },
    ]);

    const detected = await pipeline.detect(PATIENT);
    expect(detected).toEqual({ spans: [], mode: "EMERGENCY", failedRecognizers: [] });
  });

  it("recovers on the next request", async () => {
    let calls = 0;
    const resolve: SpanResolver = (candidates) => {
      if (calls++ === 0) throw new Error("transient");
      return resolveSpans(candidates);
    };
    const pipeline = RedactionPipeline.create({ catalog, resolve });
    expect((await pipeline.anonymize(CONTACT)).mode).toBe("EMERGENCY");
    expect((await pipeline.anonymize(CONTACT)).anonymizedText).toBe("SSN: identifier, Email: email");
  });

  it("covers replacement failures", async () => {
    const logger = capturingLogger();
    const pipeline = RedactionPipeline.create({
      catalog,
      logger,
      replace: () => {
        throw new ReplacementFailure("span out of bounds");
      },
    });
    const res = await pipeline.anonymize(CONTACT);
    expect(res.anonymizedText).toBe(REDACTION_MARKER);
    expect(logger.records.find((r) => r.level === "error")?.metadata).toEqual({
      stage: "anonymize",
      error: { name: "ReplacementFailure", code: "replacement_failure", message: "span out of bounds" },
    });
  });
});

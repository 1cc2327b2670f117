import { describe, expect, it } from "vitest";
import { z } from "zod";
import { extractJsonObject, parseJsonResponse } from "../../../src/lib/llm/json";

const Schema = z.object({ study_design: z.string(), confidence: z.number() });

describe("extractJsonObject", () => {
  it("should pull the object out of surrounding prose", () => {
    expect(extractJsonObject('Here you go: {"a": 1} Thanks')).toEqual({ a: 1 });
  });

  it("should throw when there is no object", () => {
    expect(() => extractJsonObject("no json here")).toThrow("No JSON object found in response");
  });
});

describe("parseJsonResponse", () => {
  it("should return validated data", () => {
    expect(parseJsonResponse('{"study_design": "rct", "confidence": 0.9}', Schema)).toEqual({
      study_design: "rct",
      confidence: 0.9,
    });
  });

  it("should return null for invalid JSON or a schema mismatch", () => {
    expect(parseJsonResponse("{not json}", Schema)).toBeNull();
    expect(parseJsonResponse('{"study_design": 3}', Schema)).toBeNull();
    expect(parseJsonResponse("plain text", Schema)).toBeNull();
  });
});

import { describe, expect, it } from "vitest";
import { z } from "zod";
import { ValidationError } from "../src/errors.js";
import { TimeoutMsSchema, isSignalName, parseDuration, parseOrThrow } from "../src/schemas.js";

describe("parseDuration", () => {
  it.each([
    ["500ms", 500],
    ["15s", 15_000],
    ["2m", 120_000],
    ["1h", 3_600_000],
    ["7", 7_000],
    [" 3s ", 3_000],
    ["0", 0],
  ])("parses %j as %d", (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it.each(["", "1.5s", "-1", "10d", "soon", "s"])("rejects %j", (input) => {
    expect(parseDuration(input)).toBeUndefined();
  });
});

describe("isSignalName", () => {
  it("knows the termination signals", () => {
    expect(isSignalName("SIGTERM")).toBe(true);
    expect(isSignalName("SIGINT")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isSignalName("SIGFOO")).toBe(false);
    expect(isSignalName("sigterm")).toBe(false);
    expect(isSignalName("toString")).toBe(false);
  });
});

describe("parseOrThrow", () => {
  it("returns the parsed value", () => {
    expect(parseOrThrow(TimeoutMsSchema, 250, "timeout")).toBe(250);
  });

  it("names the label and the problem", () => {
    expect(() => parseOrThrow(TimeoutMsSchema, -5, "timeout")).toThrow("Invalid timeout: must not be negative");
    expect(() => parseOrThrow(TimeoutMsSchema, 1.5, "timeout")).toThrow(
      "Invalid timeout: must be a whole number of milliseconds",
    );
  });

  it("includes the path of nested issues", () => {
    const schema = z.object({ port: z.number({ invalid_type_error: "must be a number" }) });
    let caught: unknown;
    try {
      parseOrThrow(schema, { port: "80" }, "server options");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ code: "VALIDATION_FAILED", message: "Invalid server options: port: must be a number" });
  });
});

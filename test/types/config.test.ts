import { describe, it, expect } from "vitest";
import {
  createDefaultConfig,
  mergeConfig,
  type InputFormat,
} from "../../src/types/index.js";
import { fixedClock } from "../helpers/workbook.js";

describe("createDefaultConfig", () => {
  it("accepts xlsx only and logs at INFO", () => {
    const config = createDefaultConfig();

    expect([...config.acceptedFormats]).toEqual(["xlsx"]);
    expect(config.previewRows).toBe(5);
    expect(config.logLevel).toBe("INFO");
    expect(config.sheetName).toBeUndefined();
    expect(config.generateRunId).toBeUndefined();
    expect(config.onLog).toBeUndefined();
  });

  it("returns independent format sets", () => {
    const first = createDefaultConfig();
    const second = createDefaultConfig();

    first.acceptedFormats.add("csv");

    expect(second.acceptedFormats.has("csv")).toBe(false);
  });
});

describe("mergeConfig", () => {
  it("returns defaults for an empty partial", () => {
    const config = mergeConfig({});

    expect([...config.acceptedFormats]).toEqual(["xlsx"]);
    expect(config.previewRows).toBe(5);
    expect(config.logLevel).toBe("INFO");
  });

  it("overrides only the given fields", () => {
    const formats = new Set<InputFormat>(["xlsx", "csv"]);
    const config = mergeConfig({
      acceptedFormats: formats,
      sheetName: "Holdings",
      logLevel: "DEBUG",
      now: fixedClock,
    });

    expect(config.acceptedFormats).toBe(formats);
    expect(config.sheetName).toBe("Holdings");
    expect(config.logLevel).toBe("DEBUG");
    expect(config.now).toBe(fixedClock);
    expect(config.previewRows).toBe(5);
  });

  it("keeps a zero preview size", () => {
    expect(mergeConfig({ previewRows: 0 }).previewRows).toBe(0);
  });
});

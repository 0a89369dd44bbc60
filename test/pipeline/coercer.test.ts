import { describe, it, expect } from "vitest";
import { coerceNumerics, toNumeric } from "../../src/pipeline/coercer.js";
import type { RawTable } from "../../src/types/index.js";

describe("Numeric Coercer", () => {
  describe("toNumeric", () => {
    it("should pass finite numbers through", () => {
      expect(toNumeric(12.5)).toBe(12.5);
      expect(toNumeric(-3)).toBe(-3);
      expect(toNumeric(0)).toBe(0);
    });

    it("should parse trimmed decimal strings", () => {
      expect(toNumeric(" 12.5 ")).toBe(12.5);
      expect(toNumeric("-4")).toBe(-4);
      expect(toNumeric("+.5")).toBe(0.5);
      expect(toNumeric("1e3")).toBe(1000);
      expect(toNumeric("7.")).toBe(7);
    });

    it("should map booleans to 1 and 0", () => {
      expect(toNumeric(true)).toBe(1);
      expect(toNumeric(false)).toBe(0);
    });

    it("should return null for blank and non-numeric values", () => {
      expect(toNumeric(null)).toBeNull();
      expect(toNumeric("")).toBeNull();
      expect(toNumeric("   ")).toBeNull();
      expect(toNumeric("abc")).toBeNull();
      expect(toNumeric("12 shares")).toBeNull();
      expect(toNumeric("1,000")).toBeNull();
      expect(toNumeric("0x10")).toBeNull();
      expect(toNumeric(Number.NaN)).toBeNull();
      expect(toNumeric(Number.POSITIVE_INFINITY)).toBeNull();
    });

    it("should return null for decimal strings outside the finite range", () => {
      expect(toNumeric("1e400")).toBeNull();
      expect(toNumeric("-1e400")).toBeNull();
      expect(toNumeric("1e300")).toBe(1e300);
    });
  });

  describe("coerceNumerics", () => {
    const table: RawTable = {
      sheetName: "Sheet1",
      columns: ["Buy_Price", "Current_Price", "Quantity", "Risk_Level", "Sector"],
      rows: [
        { Buy_Price: "10", Current_Price: 15, Quantity: 2, Risk_Level: "High", Sector: "Tech" },
        { Buy_Price: "n/a", Current_Price: null, Quantity: "3", Risk_Level: "Low", Sector: "Energy" },
        { Buy_Price: "", Current_Price: "x", Quantity: 1, Risk_Level: "Low", Sector: "Energy" },
      ],
    };

    it("should replace numeric columns with numbers or null", () => {
      const { table: coerced } = coerceNumerics(table);

      expect(coerced.rows[0]).toEqual({
        Buy_Price: 10,
        Current_Price: 15,
        Quantity: 2,
        Risk_Level: "High",
        Sector: "Tech",
      });
      expect(coerced.rows[1]?.["Buy_Price"]).toBeNull();
      expect(coerced.rows[1]?.["Quantity"]).toBe(3);
      expect(coerced.rows[2]?.["Current_Price"]).toBeNull();
    });

    it("should count missing and unparseable values per column", () => {
      const { report } = coerceNumerics(table);

      expect(report).toEqual({
        Buy_Price: { missing: 2, unparseable: 1 },
        Current_Price: { missing: 2, unparseable: 1 },
        Quantity: { missing: 0, unparseable: 0 },
      });
    });

    it("should count out-of-range strings as unparseable", () => {
      const { table: coerced, report } = coerceNumerics({
        sheetName: "Sheet1",
        columns: ["Buy_Price"],
        rows: [{ Buy_Price: "1e400" }],
      }, ["Buy_Price"]);

      expect(coerced.rows[0]?.["Buy_Price"]).toBeNull();
      expect(report).toEqual({ Buy_Price: { missing: 1, unparseable: 1 } });
    });

    it("should leave the input table untouched", () => {
      coerceNumerics(table);

      expect(table.rows[0]?.["Buy_Price"]).toBe("10");
    });

    it("should keep columns and sheet name", () => {
      const { table: coerced } = coerceNumerics(table);

      expect(coerced.columns).toEqual(table.columns);
      expect(coerced.sheetName).toBe("Sheet1");
    });
  });
});

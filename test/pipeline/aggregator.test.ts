import { describe, it, expect } from "vitest";
import {
  summarizeBySector,
  summarizePortfolio,
} from "../../src/pipeline/aggregator.js";
import { deriveFields } from "../../src/pipeline/enricher.js";
import type { CellValue, EnrichedRecord } from "../../src/types/index.js";

function enrich(rows: [number, number, number, CellValue][]): EnrichedRecord[] {
  return deriveFields({
    sheetName: "Sheet1",
    columns: ["Buy_Price", "Current_Price", "Quantity", "Risk_Level", "Sector"],
    rows: rows.map(([buy, current, quantity, sector]) => ({
      Buy_Price: buy,
      Current_Price: current,
      Quantity: quantity,
      Risk_Level: "Low",
      Sector: sector,
    })),
  }).rows;
}

describe("Summary Aggregator", () => {
  const rows = enrich([
    [10, 15, 2, "Tech"], // +10
    [5, 4, 10, "Energy"], // -10
    [20, 26, 1, "Tech"], // +6
    [3, 5, 4, "Retail"], // +8
    [7, 7, 3, "Energy"], // 0
  ]);

  describe("summarizePortfolio", () => {
    it("should total investment, current value and profit/loss", () => {
      expect(summarizePortfolio(rows)).toEqual({
        Total_Investment: 20 + 50 + 20 + 12 + 21,
        Total_Current_Value: 30 + 40 + 26 + 20 + 21,
        Net_Profit_Loss: 14,
      });
    });

    it("should keep net profit equal to current value minus investment", () => {
      const summary = summarizePortfolio(rows);

      expect(summary.Net_Profit_Loss).toBe(
        summary.Total_Current_Value - summary.Total_Investment
      );
    });

    it("should derive net profit from the totals for fractional prices", () => {
      const fractional = enrich([
        [0.1, 0.2, 1, "Tech"],
        [0.2, 0.3, 1, "Energy"],
      ]);

      const summary = summarizePortfolio(fractional);

      expect(summary.Total_Investment).toBe(0.30000000000000004);
      expect(summary.Total_Current_Value).toBe(0.5);
      expect(summary.Net_Profit_Loss).toBe(0.19999999999999996);
    });

    it("should return zeros for no records", () => {
      expect(summarizePortfolio([])).toEqual({
        Total_Investment: 0,
        Total_Current_Value: 0,
        Net_Profit_Loss: 0,
      });
    });
  });

  describe("summarizeBySector", () => {
    it("should subtotal per sector in first-seen order", () => {
      expect(summarizeBySector(rows)).toEqual([
        { Sector: "Tech", Profit_Loss: 16 },
        { Sector: "Energy", Profit_Loss: -10 },
        { Sector: "Retail", Profit_Loss: 8 },
      ]);
    });

    it("should partition the records' profit/loss", () => {
      const sectorTotal = summarizeBySector(rows).reduce(
        (sum, row) => sum + row.Profit_Loss,
        0
      );
      const recordTotal = rows.reduce((sum, row) => sum + row.Profit_Loss, 0);

      expect(sectorTotal).toBe(recordTotal);
      expect(sectorTotal).toBe(summarizePortfolio(rows).Net_Profit_Loss);
    });

    it("should group records without a sector together", () => {
      const withBlanks = enrich([
        [1, 2, 1, null],
        [1, 3, 1, "Tech"],
        [1, 4, 1, null],
      ]);

      expect(summarizeBySector(withBlanks)).toEqual([
        { Sector: null, Profit_Loss: 4 },
        { Sector: "Tech", Profit_Loss: 2 },
      ]);
    });

    it("should distinguish sector values by exact value", () => {
      const mixed = enrich([
        [1, 2, 1, "tech"],
        [1, 2, 1, "Tech"],
      ]);

      expect(summarizeBySector(mixed).map((row) => row.Sector)).toEqual(["tech", "Tech"]);
    });
  });
});

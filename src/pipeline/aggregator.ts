/**
 * Summary Aggregator
 * Builds the portfolio totals and the per-sector profit/loss view
 */

import type {
  CellValue,
  EnrichedRecord,
  PortfolioSummary,
  SectorSummaryRow,
} from "../types/index.js";

/**
 * Totals across all enriched records
 *
 * Net_Profit_Loss is taken from the two totals, so it always equals
 * Total_Current_Value - Total_Investment exactly.
 */
export function summarizePortfolio(
  rows: readonly EnrichedRecord[]
): PortfolioSummary {
  let totalInvestment = 0;
  let totalCurrentValue = 0;

  for (const row of rows) {
    totalInvestment += row.Investment_Value;
    totalCurrentValue += row.Current_Value;
  }

  return {
    Total_Investment: totalInvestment,
    Total_Current_Value: totalCurrentValue,
    Net_Profit_Loss: totalCurrentValue - totalInvestment,
  };
}

/**
 * Profit/loss subtotal per distinct Sector value, in first-seen order
 *
 * Rows with a blank sector form their own group, so the subtotals always
 * add up to the records' profit/loss.
 */
export function summarizeBySector(
  rows: readonly EnrichedRecord[]
): SectorSummaryRow[] {
  const totals = new Map<CellValue, number>();

  for (const row of rows) {
    const sector = row["Sector"] ?? null;
    totals.set(sector, (totals.get(sector) ?? 0) + row.Profit_Loss);
  }

  return Array.from(totals, ([sector, profitLoss]) => ({
    Sector: sector,
    Profit_Loss: profitLoss,
  }));
}

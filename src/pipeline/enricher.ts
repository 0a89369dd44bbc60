/**
 * Field Enricher
 * Derives investment, valuation, profit and risk fields for every record
 */

import {
  DERIVED_COLUMNS,
  type CellValue,
  type DerivedFields,
  type EnrichedRecord,
  type EnrichedTable,
  type RawRecord,
  type RawTable,
} from "../types/index.js";

/**
 * Reads a coerced numeric cell, counting missing as zero
 */
function zeroFilled(value: CellValue | undefined): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Whether a risk level reads as "high" (case-insensitive, surrounding whitespace ignored)
 */
export function isHighRisk(riskLevel: CellValue | undefined): boolean {
  if (riskLevel === null || riskLevel === undefined) {
    return false;
  }
  return String(riskLevel).trim().toLowerCase() === "high";
}

/**
 * Computes the derived fields for one coerced record
 *
 * Missing Buy_Price, Current_Price or Quantity count as 0, so a record with
 * no usable numbers reports zero values and a "Loss" status.
 */
export function deriveRecordFields(record: RawRecord): DerivedFields {
  const quantity = zeroFilled(record["Quantity"]);
  const investmentValue = zeroFilled(record["Buy_Price"]) * quantity;
  const currentValue = zeroFilled(record["Current_Price"]) * quantity;
  const profitLoss = currentValue - investmentValue;

  return {
    Investment_Value: investmentValue,
    Current_Value: currentValue,
    Profit_Loss: profitLoss,
    Status: profitLoss > 0 ? "Profit" : "Loss",
    High_Risk_Flag: isHighRisk(record["Risk_Level"]) ? "Yes" : "No",
  };
}

/**
 * Appends the derived fields to every record of a coerced table
 *
 * A source column that shares a derived column's name is overwritten in place.
 */
export function deriveFields(table: RawTable): EnrichedTable {
  const columns = [
    ...table.columns,
    ...DERIVED_COLUMNS.filter((column) => !table.columns.includes(column)),
  ];

  const rows: EnrichedRecord[] = table.rows.map((record) => ({
    ...record,
    ...deriveRecordFields(record),
  }));

  return { columns, rows };
}

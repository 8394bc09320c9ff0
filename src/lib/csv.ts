// CSV helpers for the sensor logfile.
//
// Rows are written one at a time as readings arrive, so this module formats
// single lines rather than whole tables.

export type CsvValue = string | number | boolean | null | undefined;

export const CSV_NEWLINE = "\n";

function stringifyValue(v: CsvValue): string {
	if (v === null || v === undefined) return "";
	if (typeof v === "boolean") return v ? "true" : "false";
	if (typeof v === "number") {
		// NaN/Infinity are blank
		if (!Number.isFinite(v)) return "";
		return String(v);
	}
	return v;
}

function escapeCell(raw: string, delimiter: string): string {
	// RFC4180-ish:
	// - quote if contains delimiter, quote, CR or LF
	// - double quotes inside quoted cells
	const needsQuotes = raw.includes(delimiter) || raw.includes("\"") || raw.includes("\n") || raw.includes("\r");

	if (!needsQuotes) return raw;
	return `"${raw.replace(/"/g, "\"\"")}"`;
}

/**
 * Format one CSV line, without the line terminator.
 */
export function toCsvRow(values: readonly CsvValue[], delimiter = ","): string {
	return values.map(v => escapeCell(stringifyValue(v), delimiter)).join(delimiter);
}

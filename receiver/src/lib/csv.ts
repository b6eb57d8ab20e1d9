// CSV formatting for the sample log.
//
// Notes:
// - Cells are quoted RFC4180-style only when they need it.
// - Dates are written as ISO-8601 UTC.
// - Non-finite numbers are written as empty cells.

export type CsvValue = string | number | boolean | null | undefined | Date;

export type CsvOptions = {
	/** Line ending. Default: "\n" */
	newline?: "\n" | "\r\n";
};

function stringifyValue(v: CsvValue): string {
	if (v === null || v === undefined) return "";
	if (v instanceof Date) return v.toISOString();
	if (typeof v === "boolean") return v ? "true" : "false";
	if (typeof v === "number") {
		if (!Number.isFinite(v)) return "";
		return String(v);
	}
	return v;
}

function escapeCell(raw: string): string {
	const needsQuotes = raw.includes(",") || raw.includes("\"") || raw.includes("\n") || raw.includes("\r");

	if (!needsQuotes) return raw;
	return `"${raw.replace(/"/g, "\"\"")}"`;
}

/**
 * One CSV line, terminated by the configured newline.
 */
export function toCsvLine(cells: readonly CsvValue[], opts?: CsvOptions): string {
	return cells.map(c => escapeCell(stringifyValue(c))).join(",") + (opts?.newline ?? "\n");
}

export function toCsv(rows: readonly (readonly CsvValue[])[], opts?: CsvOptions): string {
	return rows.map(r => toCsvLine(r, opts)).join("");
}

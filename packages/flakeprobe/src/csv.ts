// ============================================================================
// Flakeprobe - CSV
// RFC 4180 quoting. Rows end in \n; spreadsheet tools and csv readers accept
// both line endings.
// ============================================================================

export type CsvValue = string | number | null | undefined;

const NEEDS_QUOTES = /[",\r\n]|^\s|\s$/;

/** Format one field, quoting only when needed */
export function csvField(value: CsvValue): string {
	if (value === null || value === undefined) return '';
	const text = String(value);
	return NEEDS_QUOTES.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function csvRow(values: readonly CsvValue[]): string {
	return values.map(csvField).join(',');
}

/**
 * Render a table with a header row. An empty `rows` yields the header alone.
 */
export function toCsv(header: readonly string[], rows: ReadonlyArray<readonly CsvValue[]>): string {
	let out = `${csvRow(header)}\n`;
	for (const row of rows) {
		out += `${csvRow(row)}\n`;
	}
	return out;
}

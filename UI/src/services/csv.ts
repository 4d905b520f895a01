export function csvEscape(value: unknown): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (/[",\r\n]/.test(str)) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function csvLine(values: unknown[]): string {
  return values.map(csvEscape).join(',');
}

export function toCsv(columns: readonly string[], rows: Record<string, unknown>[]): string {
  const lines = rows.map((row) => csvLine(columns.map((column) => row[column])));
  return [csvLine([...columns]), ...lines].join('\n');
}

/**
 * Splits CSV text into rows of fields.
 *
 * Handles quoted fields containing commas, doubled quotes and line breaks.
 * Blank lines are skipped. Throws when the text ends inside a quoted field.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let rowHasContent = false;
  let line = 1;
  let quoteLine = 1;

  const endField = () => {
    row.push(field);
    field = '';
  };

  const endRow = () => {
    endField();
    if (rowHasContent || row.length > 1) {
      rows.push(row);
    }
    row = [];
    rowHasContent = false;
  };

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line += 1;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      quoteLine = line;
      rowHasContent = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n') {
      line += 1;
      endRow();
    } else if (ch === '\r') {
      if (text[i + 1] === '\n') i += 1;
      line += 1;
      endRow();
    } else {
      field += ch;
      rowHasContent = true;
    }
  }

  if (inQuotes) {
    throw new Error(`Unterminated quoted field starting on line ${quoteLine}`);
  }

  if (field !== '' || row.length > 0 || rowHasContent) {
    endRow();
  }

  return rows;
}

/** Maps each data row onto the header row; missing trailing fields become empty strings */
export function parseCsvRecords(text: string): Record<string, string>[] {
  const [header, ...rows] = parseCsv(text);
  if (!header) return [];

  return rows.map((fields) =>
    Object.fromEntries(header.map((column, index) => [column, fields[index] ?? '']))
  );
}

export type CsvRecord = Record<string, string>;

/**
 * Splits CSV text into rows of fields.
 * Handles quoted fields with embedded commas, doubled quotes and line breaks,
 * and both LF and CRLF row endings. A quote only opens a quoted field at the
 * start of the field; elsewhere it is kept as text. Blank lines are dropped.
 */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  const endRow = (): void => {
    row.push(field);
    if (row.length > 1 || row[0] !== '') {
      rows.push(row);
    }
    row = [];
    field = '';
  };

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"' && field === '') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (text[i + 1] === '\n') {
        i += 1;
      }
      endRow();
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    endRow();
  }

  return rows;
}

/**
 * Parses CSV text whose first row is a header into one record per data row.
 * Missing trailing cells become empty strings; a leading byte-order mark is ignored.
 */
export function parseCsv(text: string): CsvRecord[] {
  const [header, ...rows] = parseCsvRows(text.replace(/^\uFEFF/, ''));
  if (!header) {
    return [];
  }
  const columns = header.map((column) => column.trim());
  return rows.map((cells) => {
    const record: CsvRecord = {};
    columns.forEach((column, index) => {
      record[column] = cells[index] ?? '';
    });
    return record;
  });
}

export interface CsvOptions {
  delimiter?: string;
}

/**
 * Parses delimited text with RFC 4180 quoting (embedded delimiters, newlines
 * and doubled quotes inside quoted fields). Returns one record per data row
 * keyed by the header; short rows are padded with empty strings.
 */
export function parseCsv(raw: string, options: CsvOptions = {}): Record<string, string>[] {
  const delimiter = options.delimiter ?? ',';
  const text = raw.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (quoted) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i += 2;
        continue;
      }
      if (ch === '"') {
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field.trim() === '') {
      quoted = true;
      field = '';
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== '' || row.length) {
    row.push(field);
    rows.push(row);
  }

  const nonEmpty = rows.filter((cells) => cells.length > 1 || cells[0].trim() !== '');
  if (nonEmpty.length < 2) return [];

  const header = nonEmpty[0].map((name) => name.trim());
  return nonEmpty.slice(1).map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((name, index) => {
      record[name] = cells[index] ?? '';
    });
    return record;
  });
}

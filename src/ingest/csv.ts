import type { Table, TableRow } from '../types';

function splitRecords(input: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < input.length; i += 1) {
    const char = input[i];
    if (quoted) {
      if (char === '"' && input[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }
    if (char === '"' && field.trim() === '') {
      field = '';
      quoted = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && input[i + 1] === '\n') {
        i += 1;
      }
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field.length || record.length) {
    record.push(field);
    records.push(record);
  }

  return records.filter((cells) => cells.some((cell) => cell.trim().length));
}

/** Reads CSV text with a header row. Cells stay strings; blank lines are skipped. */
export function parseCsvTable(input: string): Table {
  const [header, ...body] = splitRecords(input.replace(/^\uFEFF/, ''));
  if (!header) {
    return { columns: [], rows: [] };
  }
  const columns = header.map((cell) => cell.trim());
  const rows = body.map((cells) =>
    columns.reduce<TableRow>((row, column, index) => {
      row[column] = (cells[index] ?? '').trim();
      return row;
    }, {}),
  );
  return { columns, rows };
}

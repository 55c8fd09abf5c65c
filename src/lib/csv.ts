export type CsvParseResult = {
  headers: string[];
  rows: string[][];
  delimiter: string;
  truncated: boolean;
};

export type CsvParseOptions = {
  maxRows?: number;
  /** Skips delimiter detection. */
  delimiter?: string;
};

export type CsvCell = string | number | boolean | null | undefined;

const DEFAULT_DELIMITERS = [',', '\t', ';'];

function detectDelimiter(line: string): string {
  let best = ',';
  let bestCount = -1;
  for (const delimiter of DEFAULT_DELIMITERS) {
    let count = 0;
    let inQuotes = false;
    for (let i = 0; i < line.length; i += 1) {
      const ch = line[i];
      if (ch === '"') {
        if (inQuotes && line[i + 1] === '"') {
          i += 1;
          continue;
        }
        inQuotes = !inQuotes;
        continue;
      }
      if (!inQuotes && ch === delimiter) {
        count += 1;
      }
    }
    if (count > bestCount) {
      bestCount = count;
      best = delimiter;
    }
  }
  return best;
}

function isBlankRow(row: string[]): boolean {
  return row.every((value) => value.trim() === '');
}

/**
 * Parses delimited text with a header row. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks; blank rows are dropped.
 */
export function parseCsv(text: string, options: CsvParseOptions = {}): CsvParseResult {
  const sanitized = text.replace(/^\uFEFF/, '');
  const firstLineEnd = sanitized.search(/\r?\n/);
  const firstLine = firstLineEnd >= 0 ? sanitized.slice(0, firstLineEnd) : sanitized;
  const delimiter = options.delimiter ?? detectDelimiter(firstLine);
  // The header row counts against the limit too.
  const rowLimit = options.maxRows ? options.maxRows + 1 : undefined;

  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let truncated = false;

  const finishRow = () => {
    row.push(field);
    field = '';
    if (!isBlankRow(row)) {
      rows.push(row);
    }
    row = [];
  };

  for (let i = 0; i < sanitized.length; i += 1) {
    const ch = sanitized[i];

    if (inQuotes) {
      if (ch !== '"') {
        field += ch;
      } else if (sanitized[i + 1] === '"') {
        field += '"';
        i += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = '';
    } else if (ch === '\n') {
      finishRow();
      if (rowLimit && rows.length >= rowLimit && sanitized.slice(i + 1).trim() !== '') {
        truncated = true;
        break;
      }
    } else if (ch !== '\r') {
      field += ch;
    }
  }

  if (!truncated && (field.length > 0 || row.length > 0)) {
    finishRow();
  }

  const [headerRow, ...dataRows] = rows;
  const headers = (headerRow ?? []).map((h) => h.trim());

  return { headers, rows: dataRows, delimiter, truncated };
}

export function normalizeHeader(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '')
    .replace(/[^a-z0-9]/g, '');
}

export function formatCsvCell(value: CsvCell): string {
  if (value === null || value === undefined) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Comma separated, header first, `\n` line ends, trailing newline. */
export function formatCsv(headers: readonly string[], rows: readonly CsvCell[][]): string {
  const lines = [headers.map(formatCsvCell).join(',')];
  for (const row of rows) {
    lines.push(row.map(formatCsvCell).join(','));
  }
  return `${lines.join('\n')}\n`;
}

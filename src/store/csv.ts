// ── CSV codec ────────────────────────────────────────────────
// RFC 4180: fields containing a comma, quote or line break are quoted and
// inner quotes doubled. Quoted fields may span lines.

export interface CsvRecord {
  /** 1-based line on which the record starts. */
  line: number;
  values: string[];
}

export class CsvSyntaxError extends Error {
  readonly line: number;

  constructor(line: number, reason: string) {
    super(`CSV syntax error on line ${String(line)}: ${reason}`);
    this.name = 'CsvSyntaxError';
    this.line = line;
  }
}

export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function stringifyCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(escapeCsvValue).join(',')).join('\n') + '\n';
}

/** Parse CSV text into records. Blank lines are skipped. */
export function parseCsv(text: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let values: string[] = [];
  let field = '';
  let inQuotes = false;
  let afterQuote = false;
  let line = 1;
  let recordLine = 1;
  let quoteLine = 1;

  const endField = (): void => {
    values.push(field);
    field = '';
    afterQuote = false;
  };

  const endRecord = (): void => {
    endField();
    const blank = values.length === 1 && values[0] === '';
    if (!blank) records.push({ line: recordLine, values });
    values = [];
  };

  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);

    if (inQuotes) {
      if (char === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          afterQuote = true;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (char === '"') {
      if (field.length > 0 || afterQuote) {
        throw new CsvSyntaxError(line, 'unexpected quote inside an unquoted field');
      }
      inQuotes = true;
      quoteLine = line;
    } else if (char === ',') {
      endField();
    } else if (char === '\r' || char === '\n') {
      if (char === '\r' && text.charAt(i + 1) === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      if (afterQuote) {
        throw new CsvSyntaxError(line, 'unexpected text after a closing quote');
      }
      field += char;
    }
  }

  if (inQuotes) {
    throw new CsvSyntaxError(quoteLine, 'unterminated quoted field');
  }
  if (field.length > 0 || afterQuote || values.length > 0) {
    endRecord();
  }

  return records;
}

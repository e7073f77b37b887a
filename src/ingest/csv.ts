// ---------------------------------------------------------------------------
// CSV parser
// ---------------------------------------------------------------------------
// Quote-aware splitter for platform exports: a doubled quote inside a quoted
// field is a literal quote, and quoted fields may span lines. Blank lines are
// skipped. Line numbers are 1-based positions in the source text. A quote
// that never closes is read as a literal and its record carries an error.
// ---------------------------------------------------------------------------

export interface CsvRow {
  line: number;
  cells: string[];
  /** Set when the record cannot be split reliably */
  error?: string;
}

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

export interface CsvOptions {
  delimiter?: string;
}

/**
 * Split text into records. Returns null when the text holds no header row.
 */
export function parseCsv(text: string, options: CsvOptions = {}): CsvTable | null {
  const delimiter = options.delimiter ?? ",";
  const records = splitRecords(text.replace(/^\uFEFF/, ""), delimiter);

  const nonBlank = records.filter(
    (r) => !(r.cells.length === 1 && r.cells[0].trim() === "")
  );
  if (nonBlank.length === 0) return null;

  const [first, ...rest] = nonBlank;
  return {
    header: first.cells.map((c) => c.trim()),
    rows: rest,
  };
}

function splitRecords(text: string, delimiter: string): CsvRow[] {
  const records: CsvRow[] = [];
  let cells: string[] = [];
  let field = "";
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let malformed = false;
  // State at the last opening quote, restored when that quote never closes
  let quoteStart: { index: number; line: number; cells: string[]; field: string } | null = null;
  let literalQuoteAt = -1;

  const endField = () => {
    cells.push(field);
    field = "";
  };
  const endRecord = () => {
    endField();
    records.push(
      malformed
        ? { line: recordLine, cells, error: "unterminated quoted field" }
        : { line: recordLine, cells }
    );
    cells = [];
    malformed = false;
  };

  for (let i = 0; i <= text.length; i++) {
    if (i === text.length) {
      if (!inQuotes || !quoteStart) break;
      // Unterminated quote: reread from it as a literal character
      i = quoteStart.index - 1;
      literalQuoteAt = quoteStart.index;
      line = quoteStart.line;
      cells = quoteStart.cells;
      field = quoteStart.field;
      inQuotes = false;
      quoteStart = null;
      malformed = true;
      continue;
    }

    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          quoteStart = null;
        }
      } else {
        if (char === "\n") line++;
        field += char;
      }
      continue;
    }

    if (char === '"' && field.trim() === "" && i !== literalQuoteAt) {
      quoteStart = { index: i, line, cells: [...cells], field };
      field = "";
      inQuotes = true;
    } else if (char === delimiter) {
      endField();
    } else if (char === "\r" && text[i + 1] === "\n") {
      // handled by the "\n" branch next iteration
    } else if (char === "\n" || char === "\r") {
      endRecord();
      line++;
      recordLine = line;
    } else {
      field += char;
    }
  }

  if (field !== "" || cells.length > 0) {
    endRecord();
  }

  return records;
}

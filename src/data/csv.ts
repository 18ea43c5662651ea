/**
 * @fileoverview CSV to tool-ready JSON records
 *
 * Converts a CSV document into the record shapes `runnetmeta` and
 * `pairwise_to_netmeta` accept. Header validation runs before any data
 * row is read; numeric failures are collected across the whole document
 * and reported together.
 */

import { Err, Ok, type Result } from '../core/result.js';

// ============================================================================
// FORMATS
// ============================================================================

export type DataFormat = 'pairwise' | 'arm_binary' | 'arm_continuous';

export const DATA_FORMATS: readonly DataFormat[] = ['pairwise', 'arm_binary', 'arm_continuous'];

type ColumnKind = 'string' | 'float' | 'integer';

interface ColumnSpec {
  name: string;
  kind: ColumnKind;
}

interface FormatSpec {
  columns: ColumnSpec[];
  nextStep: string;
}

const FORMAT_SPECS: Record<DataFormat, FormatSpec> = {
  pairwise: {
    columns: [
      { name: 'study', kind: 'string' },
      { name: 'treat1', kind: 'string' },
      { name: 'treat2', kind: 'string' },
      { name: 'TE', kind: 'float' },
      { name: 'seTE', kind: 'float' },
    ],
    nextStep: "Use runnetmeta(data=result['data'], sm='OR') to run network meta-analysis",
  },
  arm_binary: {
    columns: [
      { name: 'study', kind: 'string' },
      { name: 'treatment', kind: 'string' },
      { name: 'events', kind: 'integer' },
      { name: 'n', kind: 'integer' },
    ],
    nextStep: "Use pairwise_to_netmeta(data=result['data'], outcome_type='binary') to convert, then runnetmeta()",
  },
  arm_continuous: {
    columns: [
      { name: 'study', kind: 'string' },
      { name: 'treatment', kind: 'string' },
      { name: 'mean', kind: 'float' },
      { name: 'sd', kind: 'float' },
      { name: 'n', kind: 'integer' },
    ],
    nextStep: "Use pairwise_to_netmeta(data=result['data'], outcome_type='continuous') to convert, then runnetmeta()",
  },
};

export function isDataFormat(value: string): value is DataFormat {
  return Object.prototype.hasOwnProperty.call(FORMAT_SPECS, value);
}

export function requiredColumns(format: DataFormat): string[] {
  return FORMAT_SPECS[format].columns.map((column) => column.name);
}

// ============================================================================
// RESULT SHAPES
// ============================================================================

export type CsvRecord = Record<string, string | number>;

export interface CsvConversion {
  data: CsvRecord[];
  n_records: number;
  columns: string[];
  format: DataFormat;
  next_step: string;
}

export interface InvalidField {
  /** 1-based data row, header excluded */
  row: number;
  column: string;
  value: string;
}

export interface CsvMissingColumns {
  error: string;
  missing_columns: string[];
  found_columns: string[];
  required_columns: string[];
}

export interface CsvInvalidFields {
  error: string;
  invalid_fields: InvalidField[];
}

export interface CsvUnknownFormat {
  error: string;
  valid_formats: DataFormat[];
}

export type CsvConversionResult =
  | CsvConversion
  | CsvMissingColumns
  | CsvInvalidFields
  | CsvUnknownFormat
  | { error: string };

export const NO_DATA_MESSAGE = 'No data found in CSV';

// ============================================================================
// PARSING
// ============================================================================

/**
 * Split a CSV document into records (RFC 4180: quoted fields, doubled
 * quotes, CRLF or LF line ends). Whitespace around the whole document is
 * ignored, as are blank lines.
 */
export function parseCsv(text: string): string[][] {
  const source = text.replace(/^\uFEFF/, '').trim();
  const records: string[][] = [];
  if (source.length === 0) return records;

  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  const endRecord = (): void => {
    record.push(field);
    field = '';
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
  };

  while (i < source.length) {
    const ch = source[i];
    if (inQuotes) {
      if (ch === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\r' || ch === '\n') {
      endRecord();
      if (ch === '\r' && source[i + 1] === '\n') i += 1;
    } else {
      field += ch;
    }
    i += 1;
  }
  endRecord();

  return records;
}

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function parseNumber(raw: string, kind: 'float' | 'integer'): Result<number, string> {
  const value = raw.trim();
  const pattern = kind === 'integer' ? INTEGER_PATTERN : FLOAT_PATTERN;
  if (!pattern.test(value)) {
    return Err(raw);
  }
  return Ok(kind === 'integer' ? Number.parseInt(value, 10) : Number.parseFloat(value));
}

function describeInvalid(fields: InvalidField[]): string {
  const details = fields
    .map((field) => `row ${field.row}, column ${field.column}: ${JSON.stringify(field.value)}`)
    .join('; ');
  return `Invalid numeric value${fields.length > 1 ? 's' : ''}: ${details}`;
}

// ============================================================================
// CONVERSION
// ============================================================================

export function csvToJson(csvContent: string, dataFormat: string = 'pairwise'): CsvConversionResult {
  if (!isDataFormat(dataFormat)) {
    return {
      error: `Unknown data_format: ${dataFormat}`,
      valid_formats: [...DATA_FORMATS],
    };
  }

  const rows = parseCsv(csvContent);
  const [header, ...body] = rows;
  if (!header) {
    return { error: NO_DATA_MESSAGE };
  }

  const columns = header.map((name) => name.trim());
  const spec = FORMAT_SPECS[dataFormat];
  const required = spec.columns.map((column) => column.name);
  const missing = required.filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    return {
      error: `Missing required columns for ${dataFormat} format: ${missing.join(', ')}`,
      missing_columns: missing,
      found_columns: columns,
      required_columns: required,
    };
  }

  if (body.length === 0) {
    return { error: NO_DATA_MESSAGE };
  }

  const positions = new Map(spec.columns.map((column): [string, number] => [column.name, columns.indexOf(column.name)]));
  const invalid: InvalidField[] = [];
  const data: CsvRecord[] = body.map((row, rowIndex) => {
    const record: CsvRecord = {};
    for (const column of spec.columns) {
      const raw = row[positions.get(column.name) ?? -1] ?? '';
      if (column.kind === 'string') {
        record[column.name] = raw;
        continue;
      }
      const parsed = parseNumber(raw, column.kind);
      if (parsed.ok) {
        record[column.name] = parsed.value;
      } else {
        invalid.push({ row: rowIndex + 1, column: column.name, value: parsed.error });
      }
    }
    return record;
  });

  if (invalid.length > 0) {
    return { error: describeInvalid(invalid), invalid_fields: invalid };
  }

  return {
    data,
    n_records: data.length,
    columns,
    format: dataFormat,
    next_step: spec.nextStep,
  };
}

import Papa from 'papaparse';
import { z } from 'zod';
import type { RawCustomerRow } from '../types.js';
import { MalformedBatchError } from './errors.js';

type RowField = keyof RawCustomerRow;

// Header keys are compared lowercased with punctuation and spaces removed.
const HEADER_ALIASES: Record<RowField, string[]> = {
  name: ['customername', 'name'],
  ipAddress: ['customeripaddress', 'ipaddress', 'ip'],
  subnetMask: ['ipsubnetmask', 'subnetmask', 'mask', 'cidr'],
  serviceCode: ['servicecode', 'service', 'code'],
};

const REQUIRED_FIELDS: RowField[] = ['name', 'ipAddress', 'subnetMask', 'serviceCode'];

function headerKey(header: string): string {
  return header.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** "24" and "/24" become 24; anything else is kept so the validator can report it. */
export function toSubnetMaskValue(value: number | string): number | string {
  if (typeof value === 'number') return value;
  const trimmed = value.trim();
  if (/^\/?\d+$/.test(trimmed)) {
    return Number(trimmed.replace(/^\//, ''));
  }
  return trimmed;
}

function toRawRow(name: string, ipAddress: string, subnetMask: number | string, serviceCode: string): RawCustomerRow {
  return {
    name: name.trim(),
    ipAddress: ipAddress.trim(),
    subnetMask: toSubnetMaskValue(subnetMask),
    serviceCode: serviceCode.trim(),
  };
}

/**
 * Parses a CSV export (first line is the header) into raw rows. Column order
 * is free and unknown columns are ignored, but every record must have as many
 * fields as the header.
 */
export function parseCustomerCsv(text: string): RawCustomerRow[] {
  const results = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    skipEmptyLines: 'greedy',
  });

  const quoteErrors = results.errors.filter(error => error.type === 'Quotes');
  if (quoteErrors.length > 0) {
    throw new MalformedBatchError(
      'CSV input could not be parsed',
      quoteErrors.map(error => `record ${(error.row ?? 0) + 1}: ${error.message}`)
    );
  }

  const [header, ...records] = results.data;
  if (!header) {
    throw new MalformedBatchError('CSV input is empty');
  }

  const keys = header.map(headerKey);
  const columns = new Map<RowField, number>();
  const missing: string[] = [];
  REQUIRED_FIELDS.forEach(field => {
    const position = keys.findIndex(key => HEADER_ALIASES[field].includes(key));
    if (position === -1) {
      missing.push(field);
    } else {
      columns.set(field, position);
    }
  });
  if (missing.length > 0) {
    throw new MalformedBatchError(`CSV header is missing required columns: ${missing.join(', ')}`, [
      `found columns: ${header.join(', ')}`,
    ]);
  }

  const cell = (record: string[], field: RowField): string => record[columns.get(field) ?? -1] ?? '';

  return records.map((record, index) => {
    if (record.length !== header.length) {
      throw new MalformedBatchError(
        `CSV record ${index + 1} has ${record.length} fields, expected ${header.length}`
      );
    }
    return toRawRow(cell(record, 'name'), cell(record, 'ipAddress'), cell(record, 'subnetMask'), cell(record, 'serviceCode'));
  });
}

const maskSchema = z.union([z.number(), z.string()]);

const tupleRowSchema = z.tuple([z.string(), z.string(), maskSchema, z.string()]);

const objectRowSchema = z.object({
  CustomerName: z.string(),
  CustomerIPAddress: z.string(),
  IPSubnetMask: maskSchema,
  ServiceCode: z.string(),
});

const rowsSchema = z.array(z.union([tupleRowSchema, objectRowSchema]));

/**
 * Accepts JSON rows as `[name, ip, mask, code]` tuples or as objects keyed
 * like the output file plus `ServiceCode`.
 */
export function parseCustomerRows(value: unknown): RawCustomerRow[] {
  const parsed = rowsSchema.safeParse(value);
  if (!parsed.success) {
    throw new MalformedBatchError(
      'Rows must be [name, ip, mask, serviceCode] tuples or customer objects',
      parsed.error.issues.map(issue => {
        const [position, ...rest] = issue.path;
        const where = typeof position === 'number' ? `row ${position + 1}` : 'rows';
        return rest.length > 0 ? `${where} (${rest.join('.')}): ${issue.message}` : `${where}: ${issue.message}`;
      })
    );
  }

  return parsed.data.map(row =>
    Array.isArray(row)
      ? toRawRow(row[0], row[1], row[2], row[3])
      : toRawRow(row.CustomerName, row.CustomerIPAddress, row.IPSubnetMask, row.ServiceCode)
  );
}

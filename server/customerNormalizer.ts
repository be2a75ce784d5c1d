import type {
  CustomerRecord,
  RawCustomerRow,
  RejectedRow,
  RejectionReason,
  ServiceTagMap,
  ValidationResult,
  ValidationSummary,
} from '../types.js';
import { MalformedBatchError } from './errors.js';

const OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/;

export function isValidIpv4(ipAddress: string): boolean {
  const segments = ipAddress.split('.');
  if (segments.length !== 4) return false;
  return segments.every(segment => OCTET_PATTERN.test(segment) && Number(segment) <= 255);
}

export function isValidPrefixLength(subnetMask: number | string): subnetMask is number {
  return typeof subnetMask === 'number' && Number.isInteger(subnetMask) && subnetMask >= 0 && subnetMask <= 32;
}

export function normalizeCustomerName(name: string): string {
  return name.toLowerCase().replace(/[ ']/g, '');
}

export function deriveObjectName(name: string, ipAddress: string, subnetMask: number): string {
  return `${normalizeCustomerName(name)}_${ipAddress}_${subnetMask}`;
}

function assertRowShape(row: unknown, index: number): asserts row is RawCustomerRow {
  if (typeof row !== 'object' || row === null) {
    throw new MalformedBatchError(`Row ${index + 1} is not a customer row`);
  }
  const problems: string[] = [];
  const fields: Array<[string, string[]]> = [
    ['name', ['string']],
    ['ipAddress', ['string']],
    ['subnetMask', ['number', 'string']],
    ['serviceCode', ['string']],
  ];
  for (const [field, allowed] of fields) {
    const value: unknown = Reflect.get(row, field);
    if (!allowed.includes(typeof value)) {
      problems.push(`${field}: expected ${allowed.join(' or ')}, got ${typeof value}`);
    }
  }
  if (problems.length > 0) {
    throw new MalformedBatchError(`Row ${index + 1} has the wrong structure`, problems);
  }
}

function reject(index: number, row: RawCustomerRow, reason: RejectionReason, message: string): RejectedRow {
  return { index, row, reason, message };
}

/**
 * Validates one batch of raw rows and derives the address-object identity of
 * every accepted customer. Row-level problems go to `rejected`; only a row
 * that is not shaped like a RawCustomerRow aborts the batch.
 */
export function validateAndNormalize(rows: Iterable<RawCustomerRow>, serviceTags: ServiceTagMap): ValidationResult {
  const accepted: CustomerRecord[] = [];
  const rejected: RejectedRow[] = [];
  const seenObjectNames = new Set<string>();

  let index = 0;
  for (const row of rows) {
    assertRowShape(row, index);

    const ipAddress = row.ipAddress.trim();
    const name = row.name.trim();
    const serviceCode = row.serviceCode.trim().toUpperCase();

    if (!isValidIpv4(ipAddress)) {
      rejected.push(reject(index, row, 'invalid_ip', `"${row.ipAddress}" is not a dotted-quad IPv4 address`));
    } else if (!isValidPrefixLength(row.subnetMask)) {
      rejected.push(reject(index, row, 'invalid_mask', `"${row.subnetMask}" is not a prefix length between 0 and 32`));
    } else {
      const tags = serviceTags.get(serviceCode);
      const objectName = deriveObjectName(name, ipAddress, row.subnetMask);

      if (!tags || tags.length === 0) {
        rejected.push(reject(index, row, 'unknown_service_code', `Service code "${row.serviceCode}" is not recognized`));
      } else if (normalizeCustomerName(name) === '') {
        rejected.push(reject(index, row, 'invalid_name', 'Customer name is empty after normalization'));
      } else if (seenObjectNames.has(objectName)) {
        rejected.push(reject(index, row, 'duplicate_object_name', `Object name "${objectName}" already used earlier in this batch`));
      } else {
        seenObjectNames.add(objectName);
        accepted.push({
          name,
          ipAddress,
          subnetMask: row.subnetMask,
          serviceCode,
          tags: [...tags],
          objectName,
        });
      }
    }
    index++;
  }

  return { accepted, rejected };
}

export function summarizeValidation(result: ValidationResult): ValidationSummary {
  const byReason: ValidationSummary['byReason'] = {};
  result.rejected.forEach(entry => {
    byReason[entry.reason] = (byReason[entry.reason] ?? 0) + 1;
  });
  return {
    total: result.accepted.length + result.rejected.length,
    accepted: result.accepted.length,
    rejected: result.rejected.length,
    byReason,
  };
}

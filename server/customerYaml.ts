import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { CustomerConfigEntry, CustomerDocument, CustomerRecord } from '../types.js';
import { deriveObjectName, isValidIpv4, isValidPrefixLength } from './customerNormalizer.js';
import { MalformedBatchError } from './errors.js';
import { TAG_PATTERN } from './serviceCodes.js';

export function toConfigEntry(record: CustomerRecord): CustomerConfigEntry {
  return {
    CustomerName: record.name,
    CustomerIPAddress: record.ipAddress,
    IPSubnetMask: record.subnetMask,
    Tags: [...record.tags],
    ObjectName: record.objectName,
  };
}

export function toCustomerDocument(records: CustomerRecord[]): CustomerDocument {
  return { customers: records.map(toConfigEntry) };
}

/** Renders the file consumed by the Panorama playbooks. Keys keep insertion order. */
export function renderCustomersYaml(records: CustomerRecord[]): string {
  return yaml.dump(toCustomerDocument(records), {
    sortKeys: false,
    lineWidth: -1,
    noRefs: true,
  });
}

const configEntrySchema = z.object({
  CustomerName: z.string(),
  CustomerIPAddress: z.string(),
  IPSubnetMask: z.union([z.number().int(), z.string().regex(/^\/?\d+$/)]).transform(value =>
    typeof value === 'number' ? value : Number(value.replace(/^\//, ''))
  ),
  Tags: z.array(z.string().regex(TAG_PATTERN, 'tags may only contain letters, digits, "_" and "-"')).min(1),
  ObjectName: z.string().min(1),
});

const customerDocumentSchema = z.object({
  customers: z.array(configEntrySchema),
});

export function fromConfigEntry(entry: CustomerConfigEntry, serviceCode = ''): CustomerRecord {
  return {
    name: entry.CustomerName,
    ipAddress: entry.CustomerIPAddress,
    subnetMask: entry.IPSubnetMask,
    serviceCode,
    tags: [...entry.Tags],
    objectName: entry.ObjectName,
  };
}

/**
 * Reads a previously generated customers file back into records so it can be
 * applied again. Object names must match the name, address and mask they were
 * derived from. The service code is not part of the file and comes back empty.
 */
export function parseCustomersYaml(text: string): CustomerRecord[] {
  let document: unknown;
  try {
    document = yaml.load(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedBatchError('Customers file is not valid YAML', [reason]);
  }

  const parsed = customerDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new MalformedBatchError(
      'Customers file does not match the expected layout',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const problems: string[] = [];
  const objectNames = new Set<string>();
  parsed.data.customers.forEach((entry, index) => {
    if (!isValidIpv4(entry.CustomerIPAddress)) {
      problems.push(`customers.${index}.CustomerIPAddress: "${entry.CustomerIPAddress}" is not a valid IPv4 address`);
    }
    if (!isValidPrefixLength(entry.IPSubnetMask)) {
      problems.push(`customers.${index}.IPSubnetMask: ${entry.IPSubnetMask} is outside 0-32`);
    }
    const expectedName = deriveObjectName(entry.CustomerName, entry.CustomerIPAddress, entry.IPSubnetMask);
    if (entry.ObjectName !== expectedName) {
      problems.push(`customers.${index}.ObjectName: expected "${expectedName}", got "${entry.ObjectName}"`);
    }
    if (objectNames.has(entry.ObjectName)) {
      problems.push(`customers.${index}.ObjectName: "${entry.ObjectName}" is duplicated`);
    }
    objectNames.add(entry.ObjectName);
  });
  if (problems.length > 0) {
    throw new MalformedBatchError('Customers file contains invalid entries', problems);
  }

  return parsed.data.customers.map(entry => fromConfigEntry(entry));
}

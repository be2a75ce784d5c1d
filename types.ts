export type RejectionReason =
  | 'invalid_ip'
  | 'invalid_mask'
  | 'unknown_service_code'
  | 'invalid_name'
  | 'duplicate_object_name';

export interface RawCustomerRow {
  name: string;
  ipAddress: string;
  subnetMask: number | string; // non-numeric input is kept as typed
  serviceCode: string;
}

export interface DraftCustomerRow extends RawCustomerRow {
  id: string;
}

export interface CustomerRecord {
  name: string;
  ipAddress: string;
  subnetMask: number;
  serviceCode: string;
  tags: string[];
  objectName: string;
}

export interface RejectedRow {
  index: number;
  row: RawCustomerRow;
  reason: RejectionReason;
  message: string;
}

export interface ValidationResult {
  accepted: CustomerRecord[];
  rejected: RejectedRow[];
}

export interface ValidationSummary {
  total: number;
  accepted: number;
  rejected: number;
  byReason: Partial<Record<RejectionReason, number>>;
}

export interface ValidationResponse extends ValidationResult {
  summary: ValidationSummary;
}

export interface ApplyResponse {
  summary: ValidationSummary;
  rejected: RejectedRow[];
  result: ApplyResult;
}

export type ServiceTagMap = ReadonlyMap<string, readonly string[]>;

// Field names are fixed by the downstream playbook contract.
export interface CustomerConfigEntry {
  CustomerName: string;
  CustomerIPAddress: string;
  IPSubnetMask: number;
  Tags: string[];
  ObjectName: string;
}

export interface CustomerDocument {
  customers: CustomerConfigEntry[];
}

export interface PanoramaProvider {
  url: string;
  username?: string;
  password?: string;
  apiKey?: string;
}

export type ApplyStepName = 'address-objects' | 'commit' | 'push';

export type ApplyStepStatus = 'success' | 'failed' | 'skipped';

export interface ApplyStepResult {
  step: ApplyStepName;
  status: ApplyStepStatus;
  message?: string;
  jobId?: number;
}

export interface ApplyResult {
  objectsConfigured: number;
  steps: ApplyStepResult[];
}

export interface PanoramaConfig {
  url: string;
  username: string;
  password: string;
  deviceGroup: string;
}

export interface ServerInfo {
  panoramaUrl: string;
  deviceGroup: string;
  hasStoredCredentials: boolean;
  mockMode: boolean;
  serviceCodes: Record<string, string[]>;
}

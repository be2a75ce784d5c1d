import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import type { ApplyResult, ApplyStepName, ApplyStepResult, CustomerRecord, PanoramaProvider } from '../types.js';
import { PanoramaApiError } from './errors.js';

interface PanoramaJob {
  id?: number;
  status?: string;
  result?: string;
  details?: unknown;
}

interface PanoramaNamedEntry {
  name?: string | number;
}

interface PanoramaResult {
  key?: string | number;
  job?: number | string | PanoramaJob;
  msg?: unknown;
  tag?: { entry?: PanoramaNamedEntry | PanoramaNamedEntry[] } | string;
}

interface PanoramaXmlResponse {
  response?: {
    status?: string;
    code?: number;
    msg?: unknown;
    result?: PanoramaResult | string;
  };
}

export interface CustomerObjectApplier {
  apply(provider: PanoramaProvider, records: CustomerRecord[], deviceGroup: string): Promise<ApplyResult>;
}

export interface PanoramaServiceOptions {
  fetchImpl?: typeof fetch;
  jobPollIntervalMs?: number;
  maxJobPolls?: number;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: '_text',
  parseAttributeValue: true,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '_text',
  format: false,
});

const SHARED_TAG_XPATH = '/config/shared/tag';
const SHARED_ADDRESS_XPATH = '/config/shared/address';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function messageText(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  if (Array.isArray(value)) return value.map(messageText).filter(Boolean).join(' ');
  if (typeof value === 'object') {
    return ['line', 'member', '_text']
      .map(key => messageText(Reflect.get(value, key)))
      .filter(Boolean)
      .join(' ');
  }
  return '';
}

function resultOf(data: PanoramaXmlResponse): PanoramaResult {
  const result = data.response?.result;
  return typeof result === 'object' && result !== null ? result : {};
}

function asArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function addressObjectElement(record: CustomerRecord): string {
  return builder.build({
    entry: {
      '@_name': record.objectName,
      'ip-netmask': `${record.ipAddress}/${record.subnetMask}`,
      tag: { member: record.tags },
      description: `Customer Entry for ${record.name}`,
    },
  });
}

export function pushCommand(deviceGroup: string): string {
  return builder.build({
    'commit-all': {
      'shared-policy': {
        'device-group': {
          entry: { '@_name': deviceGroup },
        },
      },
    },
  });
}

/**
 * Applies customer address objects to Panorama over the XML API: configure the
 * objects, commit, then push to one device group. A failed step stops the
 * sequence and later steps are reported as skipped; nothing is retried.
 */
export function createPanoramaService(options: PanoramaServiceOptions = {}): CustomerObjectApplier {
  const fetchImpl = options.fetchImpl ?? fetch;
  const jobPollIntervalMs = options.jobPollIntervalMs ?? 2000;
  const maxJobPolls = options.maxJobPolls ?? 60;

  const request = async (apiUrl: string, description: string): Promise<PanoramaXmlResponse> => {
    let response: Response;
    try {
      response = await fetchImpl(apiUrl, {
        method: 'GET',
        headers: {
          'Accept': 'application/xml',
        },
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PanoramaApiError(`Cannot reach Panorama while trying to ${description}: ${reason}`);
    }

    if (!response.ok) {
      throw new PanoramaApiError(`Panorama API error: ${response.status} ${response.statusText}`, response.status);
    }

    const xmlText = await response.text();
    const data: PanoramaXmlResponse = parser.parse(xmlText);
    if (data.response?.status !== 'success') {
      const reason = messageText(data.response?.msg) || messageText(resultOf(data).msg) || xmlText.substring(0, 200);
      throw new PanoramaApiError(`Failed to ${description}: ${reason}`, data.response?.code);
    }
    return data;
  };

  const resolveApiKey = async (baseUrl: string, provider: PanoramaProvider): Promise<string> => {
    if (provider.apiKey) return provider.apiKey;
    if (!provider.username || !provider.password) {
      throw new PanoramaApiError('Panorama API key or username and password are required');
    }
    const keygenUrl = `${baseUrl}/api/?type=keygen&user=${encodeURIComponent(provider.username)}&password=${encodeURIComponent(provider.password)}`;
    const data = await request(keygenUrl, 'generate an API key');
    const key = resultOf(data).key;
    if (key === undefined || key === '') {
      throw new PanoramaApiError('Panorama did not return an API key');
    }
    return String(key);
  };

  const ensureTags = async (baseUrl: string, apiKey: string, tags: string[]): Promise<void> => {
    const listUrl = `${baseUrl}/api/?type=config&action=get&xpath=${encodeURIComponent(SHARED_TAG_XPATH)}&key=${encodeURIComponent(apiKey)}`;
    const data = await request(listUrl, 'list shared tags');
    const tagNode = resultOf(data).tag;
    const existing = new Set(
      typeof tagNode === 'object' ? asArray(tagNode.entry).map(entry => String(entry.name ?? '')) : []
    );

    for (const tag of tags) {
      if (existing.has(tag)) continue;
      console.log(`Tag "${tag}" does not exist, creating it...`);
      const tagXpath = `${SHARED_TAG_XPATH}/entry[@name='${tag}']`;
      const tagElement = '<comments>Customer service tag</comments>';
      const createUrl = `${baseUrl}/api/?type=config&action=set&xpath=${encodeURIComponent(tagXpath)}&element=${encodeURIComponent(tagElement)}&key=${encodeURIComponent(apiKey)}`;
      await request(createUrl, `create tag "${tag}"`);
      existing.add(tag);
    }
  };

  const waitForJob = async (baseUrl: string, apiKey: string, jobId: number, label: string): Promise<string> => {
    const cmd = `<show><jobs><id>${jobId}</id></jobs></show>`;
    const jobUrl = `${baseUrl}/api/?type=op&cmd=${encodeURIComponent(cmd)}&key=${encodeURIComponent(apiKey)}`;

    for (let attempt = 1; attempt <= maxJobPolls; attempt++) {
      const data = await request(jobUrl, `read ${label} job ${jobId}`);
      const job = resultOf(data).job;
      if (typeof job === 'object' && job.status === 'FIN') {
        const details = messageText(job.details);
        if (job.result !== 'OK') {
          throw new PanoramaApiError(
            `${label} job ${jobId} finished with result ${job.result ?? 'unknown'}${details ? `: ${details}` : ''}`,
            undefined,
            jobId
          );
        }
        return details;
      }
      if (attempt < maxJobPolls) {
        await sleep(jobPollIntervalMs);
      }
    }
    throw new PanoramaApiError(`${label} job ${jobId} did not finish after ${maxJobPolls} polls`, undefined, jobId);
  };

  const runCommit = async (baseUrl: string, apiKey: string, cmd: string, action: string, label: string) => {
    const commitUrl = `${baseUrl}/api/?type=commit${action}&cmd=${encodeURIComponent(cmd)}&key=${encodeURIComponent(apiKey)}`;
    const data = await request(commitUrl, label.toLowerCase());
    const result = resultOf(data);
    const jobId = Number(typeof result.job === 'object' ? result.job.id : result.job);
    if (!Number.isInteger(jobId) || jobId <= 0) {
      return { message: messageText(data.response?.msg) || messageText(result.msg) || 'Nothing to do' };
    }
    console.log(`${label} enqueued as job ${jobId}`);
    const details = await waitForJob(baseUrl, apiKey, jobId, label);
    return { jobId, message: details || `${label} job ${jobId} completed` };
  };

  const apply = async (provider: PanoramaProvider, records: CustomerRecord[], deviceGroup: string): Promise<ApplyResult> => {
    const baseUrl = provider.url.replace(/\/+$/, '');
    let apiKey = '';
    let objectsConfigured = 0;

    const actions: Array<[ApplyStepName, () => Promise<Omit<ApplyStepResult, 'step' | 'status'>>]> = [
      ['address-objects', async () => {
        apiKey = await resolveApiKey(baseUrl, provider);
        await ensureTags(baseUrl, apiKey, Array.from(new Set(records.flatMap(record => record.tags))));

        const errors: string[] = [];
        for (const record of records) {
          const xpath = `${SHARED_ADDRESS_XPATH}/entry[@name='${record.objectName}']`;
          const editUrl = `${baseUrl}/api/?type=config&action=edit&xpath=${encodeURIComponent(xpath)}&element=${encodeURIComponent(addressObjectElement(record))}&key=${encodeURIComponent(apiKey)}`;
          try {
            console.log(`Configuring address object "${record.objectName}"`);
            await request(editUrl, `configure address object "${record.objectName}"`);
            objectsConfigured++;
          } catch (error) {
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            errors.push(errorMsg);
            console.error(`Error configuring address object "${record.objectName}":`, error);
          }
        }
        if (errors.length > 0) {
          throw new PanoramaApiError(`${errors.length} of ${records.length} address objects failed: ${errors.join('; ')}`);
        }
        return { message: `Configured ${objectsConfigured} address objects` };
      }],
      ['commit', () => runCommit(baseUrl, apiKey, '<commit></commit>', '', 'Commit')],
      ['push', () => runCommit(baseUrl, apiKey, pushCommand(deviceGroup), '&action=all', 'Push')],
    ];

    const steps: ApplyStepResult[] = [];
    let failed = false;
    for (const [step, action] of actions) {
      if (failed) {
        steps.push({ step, status: 'skipped', message: 'Not attempted because an earlier step failed' });
        continue;
      }
      try {
        const outcome = await action();
        steps.push({ step, status: 'success', ...outcome });
        console.log(`Panorama step "${step}" succeeded`);
      } catch (error) {
        failed = true;
        console.error(`Panorama step "${step}" failed:`, error);
        const failure: ApplyStepResult = {
          step,
          status: 'failed',
          message: error instanceof Error ? error.message : 'Unknown error',
        };
        if (error instanceof PanoramaApiError && error.jobId !== undefined) {
          failure.jobId = error.jobId;
        }
        steps.push(failure);
      }
    }

    return { objectsConfigured, steps };
  };

  return { apply };
}

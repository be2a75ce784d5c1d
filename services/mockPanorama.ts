import { XMLParser } from 'fast-xml-parser';

export interface MockAddressObject {
  name: string;
  value: string;
  tags: string[];
  description: string;
}

type MockFailurePoint = 'keygen' | 'address' | 'commit' | 'push';
type MockJobType = 'commit' | 'push';

export interface MockPanoramaOptions {
  apiKey?: string;
  username?: string;
  password?: string;
  acceptAnyCredentials?: boolean;
  existingTags?: string[];
  /** Error message returned for every request of that kind. */
  failures?: Partial<Record<MockFailurePoint, string>>;
  failingObjects?: string[];
  jobResults?: Partial<Record<MockJobType, 'OK' | 'FAIL'>>;
  /** Number of job polls answered with ACT before the job reports FIN. */
  pendingPolls?: number;
  nothingToCommit?: boolean;
}

interface MockJob {
  id: number;
  type: MockJobType;
  polls: number;
}

export interface MockPanoramaState {
  tags: Set<string>;
  addressObjects: Map<string, MockAddressObject>;
  commits: number;
  pushes: string[];
  requests: URL[];
}

export interface MockPanorama {
  fetch: typeof fetch;
  state: MockPanoramaState;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: '_text',
  parseAttributeValue: true,
});

const xmlResponse = (body: string) =>
  new Response(`<?xml version="1.0"?>${body}`, {
    status: 200,
    headers: { 'Content-Type': 'application/xml' },
  });

const escapeXml = (text: string) =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const errorResponse = (message: string, code = 400) =>
  xmlResponse(`<response status="error" code="${code}"><msg><line>${escapeXml(message)}</line></msg></response>`);

const successResponse = (message = 'command succeeded') =>
  xmlResponse(`<response status="success" code="20"><msg>${escapeXml(message)}</msg></response>`);

function entryName(xpath: string): string | undefined {
  return /entry\[@name='([^']+)'\]$/.exec(xpath)?.[1];
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function toStringList(value: unknown): string[] {
  if (value === undefined || value === null || value === '') return [];
  return (Array.isArray(value) ? value : [value]).map(item => String(item));
}

/**
 * In-memory stand-in for the Panorama XML API, covering the calls made when
 * customer address objects are applied: keygen, shared tags, address objects,
 * commit, commit-all and job status.
 */
export const createMockPanorama = (options: MockPanoramaOptions = {}): MockPanorama => {
  const apiKey = options.apiKey ?? 'mock-api-key';
  const failures = options.failures ?? {};
  const pendingPolls = options.pendingPolls ?? 0;

  const state: MockPanoramaState = {
    tags: new Set(options.existingTags ?? []),
    addressObjects: new Map(),
    commits: 0,
    pushes: [],
    requests: [],
  };
  const jobs = new Map<number, MockJob>();
  let nextJobId = 1;

  const enqueue = (type: MockJobType) => {
    const job: MockJob = { id: nextJobId++, type, polls: 0 };
    jobs.set(job.id, job);
    return xmlResponse(
      `<response status="success" code="19"><result><msg><line>${type === 'commit' ? 'Commit' : 'CommitAll'} job enqueued with jobid ${job.id}</line></msg><job>${job.id}</job></result></response>`
    );
  };

  const handleConfig = (params: URLSearchParams): Response => {
    const action = params.get('action');
    const xpath = params.get('xpath') ?? '';

    if (action === 'get' && xpath === '/config/shared/tag') {
      if (state.tags.size === 0) {
        return xmlResponse('<response status="success" code="19"><result total-count="0" count="0"/></response>');
      }
      const entries = Array.from(state.tags).map(tag => `<entry name="${tag}"><comments>existing</comments></entry>`).join('');
      return xmlResponse(`<response status="success" code="19"><result total-count="1" count="1"><tag>${entries}</tag></result></response>`);
    }

    if (action === 'set' && xpath.startsWith('/config/shared/tag/entry')) {
      const name = entryName(xpath);
      if (!name) return errorResponse('Malformed tag xpath');
      state.tags.add(name);
      return successResponse();
    }

    if (action === 'edit' && xpath.startsWith('/config/shared/address/entry')) {
      const name = entryName(xpath);
      if (!name) return errorResponse('Malformed address xpath');
      if (failures.address) return errorResponse(failures.address);
      if (options.failingObjects?.includes(name)) return errorResponse(`${name} -> edit failed`);

      const entry = field(parser.parse(params.get('element') ?? ''), 'entry');
      if (String(field(entry, 'name')) !== name) {
        return errorResponse('edit breaks config validity');
      }
      const tags = toStringList(field(field(entry, 'tag'), 'member'));
      const unknownTag = tags.find(tag => !state.tags.has(tag));
      if (unknownTag) {
        return errorResponse(`${name} -> tag '${unknownTag}' is not a valid reference`);
      }
      state.addressObjects.set(name, {
        name,
        value: String(field(entry, 'ip-netmask') ?? ''),
        tags,
        description: String(field(entry, 'description') ?? ''),
      });
      return successResponse();
    }

    return errorResponse(`Unsupported config request: ${action} ${xpath}`);
  };

  const handleCommit = (params: URLSearchParams): Response => {
    const cmd = params.get('cmd') ?? '';
    if (params.get('action') === 'all') {
      if (failures.push) return errorResponse(failures.push);
      const target = field(field(field(parser.parse(cmd), 'commit-all'), 'shared-policy'), 'device-group');
      const deviceGroup = field(field(target, 'entry'), 'name');
      if (deviceGroup === undefined) return errorResponse('Device group is required');
      state.pushes.push(String(deviceGroup));
      return enqueue('push');
    }

    if (failures.commit) return errorResponse(failures.commit);
    if (options.nothingToCommit) {
      return xmlResponse('<response status="success" code="19"><msg>There are no changes to commit.</msg></response>');
    }
    state.commits++;
    return enqueue('commit');
  };

  const handleOp = (params: URLSearchParams): Response => {
    const match = /<show><jobs><id>(\d+)<\/id><\/jobs><\/show>/.exec(params.get('cmd') ?? '');
    const job = match ? jobs.get(Number(match[1])) : undefined;
    if (!job) return errorResponse('Job not found');

    job.polls++;
    if (job.polls <= pendingPolls) {
      return xmlResponse(`<response status="success"><result><job><id>${job.id}</id><status>ACT</status><result>PEND</result><progress>50</progress></job></result></response>`);
    }
    const result = options.jobResults?.[job.type] ?? 'OK';
    const details = result === 'OK' ? 'Configuration committed successfully' : 'Validation error';
    return xmlResponse(`<response status="success"><result><job><id>${job.id}</id><status>FIN</status><result>${result}</result><details><line>${details}</line></details></job></result></response>`);
  };

  const mockFetch = async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    state.requests.push(url);
    const params = url.searchParams;
    const type = params.get('type');

    if (type === 'keygen') {
      if (failures.keygen) return errorResponse(failures.keygen, 403);
      const validUser = params.get('user') === options.username && params.get('password') === options.password;
      if (!options.acceptAnyCredentials && !validUser) {
        return errorResponse('Invalid Credential', 403);
      }
      return xmlResponse(`<response status="success"><result><key>${apiKey}</key></result></response>`);
    }

    if (!options.acceptAnyCredentials && params.get('key') !== apiKey) {
      return errorResponse('Invalid Credential', 403);
    }

    switch (type) {
      case 'config':
        return handleConfig(params);
      case 'commit':
        return handleCommit(params);
      case 'op':
        return handleOp(params);
      default:
        return errorResponse(`Unsupported request type: ${type}`);
    }
  };

  return { fetch: mockFetch, state };
};

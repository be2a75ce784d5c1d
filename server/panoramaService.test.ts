import { describe, it, expect } from 'vitest';
import { createMockPanorama } from '../services/mockPanorama.js';
import type { CustomerRecord, PanoramaProvider } from '../types.js';
import { createPanoramaService } from './panoramaService.js';

const records: CustomerRecord[] = [
  {
    name: 'Family Mart',
    ipAddress: '192.168.1.1',
    subnetMask: 24,
    serviceCode: 'RETAIL',
    tags: ['Retail'],
    objectName: 'familymart_192.168.1.1_24',
  },
  {
    name: "Sam's Club",
    ipAddress: '10.0.0.1',
    subnetMask: 24,
    serviceCode: 'WHOLESALE',
    tags: ['Wholesale'],
    objectName: 'samsclub_10.0.0.1_24',
  },
];

const PANORAMA_URL = 'https://panorama.test/';
const passwordLogin: PanoramaProvider = { url: PANORAMA_URL, username: 'admin', password: 'test-secret' };
const keyLogin: PanoramaProvider = { url: PANORAMA_URL, apiKey: 'test-key' };

const SKIPPED = 'Not attempted because an earlier step failed';

describe('createPanoramaService', () => {
  it('configures objects, commits and pushes to the device group', async () => {
    const panorama = createMockPanorama({ username: 'admin', password: 'test-secret' });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply(passwordLogin, records, 'Customers');

    expect(result).toEqual({
      objectsConfigured: 2,
      steps: [
        { step: 'address-objects', status: 'success', message: 'Configured 2 address objects' },
        { step: 'commit', status: 'success', jobId: 1, message: 'Configuration committed successfully' },
        { step: 'push', status: 'success', jobId: 2, message: 'Configuration committed successfully' },
      ],
    });
    expect(panorama.state.addressObjects.get('familymart_192.168.1.1_24')).toEqual({
      name: 'familymart_192.168.1.1_24',
      value: '192.168.1.1/24',
      tags: ['Retail'],
      description: 'Customer Entry for Family Mart',
    });
    expect(panorama.state.addressObjects.get('samsclub_10.0.0.1_24')?.description).toBe(
      "Customer Entry for Sam's Club"
    );
    expect(Array.from(panorama.state.tags)).toEqual(['Retail', 'Wholesale']);
    expect(panorama.state.commits).toBe(1);
    expect(panorama.state.pushes).toEqual(['Customers']);
  });

  it('sends every tag of a record', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key' });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });
    const managed: CustomerRecord = {
      name: 'Ops Co',
      ipAddress: '172.16.0.0',
      subnetMask: 16,
      serviceCode: 'MANAGED',
      tags: ['Managed-Services', 'Priority'],
      objectName: 'opsco_172.16.0.0_16',
    };

    await service.apply(keyLogin, [managed], 'Customers');

    expect(panorama.state.addressObjects.get('opsco_172.16.0.0_16')?.tags).toEqual(['Managed-Services', 'Priority']);
  });

  it('uses a supplied API key without calling keygen', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key' });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    await service.apply(keyLogin, records, 'Customers');

    expect(panorama.state.requests.some(url => url.searchParams.get('type') === 'keygen')).toBe(false);
    expect(panorama.state.requests.every(url => url.searchParams.get('key') === 'test-key')).toBe(true);
  });

  it('only creates tags that do not exist yet', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', existingTags: ['Retail'] });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    await service.apply(keyLogin, records, 'Customers');

    const tagWrites = panorama.state.requests.filter(url => url.searchParams.get('action') === 'set');
    expect(tagWrites.map(url => url.searchParams.get('xpath'))).toEqual(["/config/shared/tag/entry[@name='Wholesale']"]);
  });

  it('skips commit and push when keygen is refused', async () => {
    const panorama = createMockPanorama({ username: 'admin', password: 'test-secret' });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply({ ...passwordLogin, password: 'wrong-secret' }, records, 'Customers');

    expect(result).toEqual({
      objectsConfigured: 0,
      steps: [
        { step: 'address-objects', status: 'failed', message: 'Failed to generate an API key: Invalid Credential' },
        { step: 'commit', status: 'skipped', message: SKIPPED },
        { step: 'push', status: 'skipped', message: SKIPPED },
      ],
    });
    expect(panorama.state.requests).toHaveLength(1);
  });

  it('configures the remaining objects when one fails, then stops', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', failingObjects: ['samsclub_10.0.0.1_24'] });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.objectsConfigured).toBe(1);
    expect(result.steps[0]).toEqual({
      step: 'address-objects',
      status: 'failed',
      message:
        '1 of 2 address objects failed: Failed to configure address object "samsclub_10.0.0.1_24": samsclub_10.0.0.1_24 -> edit failed',
    });
    expect(result.steps.slice(1).map(step => step.status)).toEqual(['skipped', 'skipped']);
    expect(panorama.state.commits).toBe(0);
  });

  it('reports the job id of a failed commit and skips the push', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', jobResults: { commit: 'FAIL' } });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps.slice(1)).toEqual([
      { step: 'commit', status: 'failed', jobId: 1, message: 'Commit job 1 finished with result FAIL: Validation error' },
      { step: 'push', status: 'skipped', message: SKIPPED },
    ]);
    expect(panorama.state.pushes).toEqual([]);
  });

  it('reports a push the API refuses', async () => {
    const panorama = createMockPanorama({
      apiKey: 'test-key',
      failures: { push: 'device group Customers not found' },
    });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps[2]).toEqual({
      step: 'push',
      status: 'failed',
      message: 'Failed to push: device group Customers not found',
    });
  });

  it('pushes even when there is nothing to commit', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', nothingToCommit: true });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps.slice(1)).toEqual([
      { step: 'commit', status: 'success', message: 'There are no changes to commit.' },
      { step: 'push', status: 'success', jobId: 1, message: 'Configuration committed successfully' },
    ]);
  });

  it('polls a job until it finishes', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', pendingPolls: 2 });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0, maxJobPolls: 5 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps.map(step => step.status)).toEqual(['success', 'success', 'success']);
    expect(panorama.state.requests.filter(url => url.searchParams.get('type') === 'op')).toHaveLength(6);
  });

  it('gives up on a job after the poll limit', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', pendingPolls: 10 });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0, maxJobPolls: 3 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps[1]).toEqual({
      step: 'commit',
      status: 'failed',
      jobId: 1,
      message: 'Commit job 1 did not finish after 3 polls',
    });
  });

  it('fails as soon as the last poll still reports a running job', async () => {
    const panorama = createMockPanorama({ apiKey: 'test-key', pendingPolls: 10 });
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 60_000, maxJobPolls: 1 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps[1]).toMatchObject({ status: 'failed', message: 'Commit job 1 did not finish after 1 polls' });
    expect(panorama.state.requests.filter(url => url.searchParams.get('type') === 'op')).toHaveLength(1);
  });

  it('reports an unreachable Panorama', async () => {
    const unreachable: typeof fetch = async () => {
      throw new Error('connect ECONNREFUSED');
    };
    const service = createPanoramaService({ fetchImpl: unreachable, jobPollIntervalMs: 0 });

    const result = await service.apply(passwordLogin, records, 'Customers');

    expect(result.steps[0]).toEqual({
      step: 'address-objects',
      status: 'failed',
      message: 'Cannot reach Panorama while trying to generate an API key: connect ECONNREFUSED',
    });
  });

  it('reports an HTTP error status', async () => {
    const failing: typeof fetch = async () =>
      new Response('unavailable', { status: 500, statusText: 'Internal Server Error' });
    const service = createPanoramaService({ fetchImpl: failing, jobPollIntervalMs: 0 });

    const result = await service.apply(keyLogin, records, 'Customers');

    expect(result.steps[0].message).toBe('Panorama API error: 500 Internal Server Error');
  });

  it('fails the first step without credentials', async () => {
    const panorama = createMockPanorama();
    const service = createPanoramaService({ fetchImpl: panorama.fetch, jobPollIntervalMs: 0 });

    const result = await service.apply({ url: PANORAMA_URL }, records, 'Customers');

    expect(result.steps[0].message).toBe('Panorama API key or username and password are required');
    expect(panorama.state.requests).toEqual([]);
  });
});

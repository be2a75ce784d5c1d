import express, { type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { PanoramaProvider, ServerInfo, ServiceTagMap, ValidationResult } from '../types.js';
import type { ServerConfig } from './config.js';
import { parseCustomerCsv, parseCustomerRows } from './customerImport.js';
import { summarizeValidation, validateAndNormalize } from './customerNormalizer.js';
import { parseCustomersYaml, renderCustomersYaml } from './customerYaml.js';
import { MalformedBatchError, PanoramaApiError } from './errors.js';
import type { CustomerObjectApplier } from './panoramaService.js';
import { serviceTagsToObject } from './serviceCodes.js';

export interface AppDependencies {
  config: ServerConfig;
  serviceTags: ServiceTagMap;
  applier: CustomerObjectApplier;
}

// Only the in-memory Panorama answers this address.
const MOCK_PANORAMA_URL = 'http://mock-panorama';

const batchSchema = z.object({
  rows: z.unknown().optional(),
  csv: z.string().optional(),
  yaml: z.string().optional(),
});

const applySchema = batchSchema.extend({
  url: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  apiKey: z.string().optional(),
  deviceGroup: z.string().optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new MalformedBatchError(
      'Request body is invalid',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof MalformedBatchError) {
    console.log(`${context}: rejected malformed batch - ${error.message}`);
    return res.status(400).json({ error: error.message, details: error.details });
  }
  if (error instanceof PanoramaApiError) {
    console.error(`${context}: Panorama error -`, error.message);
    return res.status(502).json({ error: error.message });
  }
  console.error(`${context} error:`, error);
  return res.status(500).json({
    error: error instanceof Error ? error.message : 'Unexpected error',
  });
}

export function createApp({ config, serviceTags, applier }: AppDependencies) {
  const app = express();

  app.use(cors({ exposedHeaders: ['Content-Disposition', 'X-Validation-Summary'] }));
  app.use(express.json({ limit: '5mb' }));

  const validateBatch = (body: z.infer<typeof batchSchema>, allowYaml = false): ValidationResult => {
    if (body.csv !== undefined) {
      return validateAndNormalize(parseCustomerCsv(body.csv), serviceTags);
    }
    if (body.rows !== undefined) {
      return validateAndNormalize(parseCustomerRows(body.rows), serviceTags);
    }
    if (allowYaml && body.yaml !== undefined) {
      return { accepted: parseCustomersYaml(body.yaml), rejected: [] };
    }
    throw new MalformedBatchError(allowYaml ? 'Provide rows, csv or yaml' : 'Provide rows or csv');
  };

  app.get('/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/api/config', (req, res) => {
    const info: ServerInfo = {
      panoramaUrl: config.panoramaUrl || (config.mockPanorama ? MOCK_PANORAMA_URL : ''),
      deviceGroup: config.deviceGroup,
      hasStoredCredentials: Boolean(config.panoramaApiKey || (config.panoramaUsername && config.panoramaPassword)),
      mockMode: config.mockPanorama,
      serviceCodes: serviceTagsToObject(serviceTags),
    };
    res.json(info);
  });

  app.post('/api/customers/validate', (req, res) => {
    try {
      const result = validateBatch(parseBody(batchSchema, req.body));
      const summary = summarizeValidation(result);
      console.log(`Validation completed: ${summary.accepted} accepted, ${summary.rejected} rejected`);
      res.json({ ...result, summary });
    } catch (error) {
      sendError(res, error, 'Validation');
    }
  });

  app.post('/api/customers/export', (req, res) => {
    try {
      const result = validateBatch(parseBody(batchSchema, req.body));
      const summary = summarizeValidation(result);
      if (result.accepted.length === 0) {
        return res.status(422).json({ error: 'No valid customer records to export', summary, rejected: result.rejected });
      }
      console.log(`Exporting ${summary.accepted} customers (${summary.rejected} rejected)`);
      res.setHeader('Content-Type', 'text/yaml; charset=utf-8');
      res.setHeader('Content-Disposition', 'attachment; filename="customers.yml"');
      res.setHeader('X-Validation-Summary', JSON.stringify(summary));
      res.send(renderCustomersYaml(result.accepted));
    } catch (error) {
      sendError(res, error, 'Export');
    }
  });

  app.post('/api/customers/apply', async (req, res) => {
    try {
      console.log('Received apply request');
      const body = parseBody(applySchema, req.body);
      const url = body.url || config.panoramaUrl || (config.mockPanorama ? MOCK_PANORAMA_URL : '');
      const deviceGroup = body.deviceGroup || config.deviceGroup;

      if (!url || !deviceGroup) {
        return res.status(400).json({ error: 'Panorama URL and device group are required' });
      }

      const hasRequestCredentials = Boolean(body.apiKey || body.username || body.password);
      const provider: PanoramaProvider = hasRequestCredentials
        ? { url, username: body.username, password: body.password, apiKey: body.apiKey }
        : {
            url,
            username: config.panoramaUsername || undefined,
            password: config.panoramaPassword || undefined,
            apiKey: config.panoramaApiKey || (config.mockPanorama ? 'mock-api-key' : undefined),
          };
      if (!provider.apiKey && !(provider.username && provider.password)) {
        return res.status(400).json({ error: 'Panorama API key or username and password are required' });
      }

      const validation = validateBatch(body, true);
      const summary = summarizeValidation(validation);
      if (validation.accepted.length === 0) {
        return res.status(422).json({ error: 'No valid customer records to apply', summary, rejected: validation.rejected });
      }

      console.log(`Applying ${summary.accepted} customers to device group "${deviceGroup}"`);
      const result = await applier.apply(provider, validation.accepted, deviceGroup);
      const failedStep = result.steps.find(step => step.status === 'failed');
      if (failedStep) {
        console.error(`Apply stopped at step "${failedStep.step}": ${failedStep.message}`);
      } else {
        console.log(`Apply completed: ${result.objectsConfigured} address objects pushed to "${deviceGroup}"`);
      }
      res.status(failedStep ? 502 : 200).json({ summary, rejected: validation.rejected, result });
    } catch (error) {
      sendError(res, error, 'Apply');
    }
  });

  return app;
}

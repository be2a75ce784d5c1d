console.log('Starting server...');
import { createMockPanorama } from '../services/mockPanorama.js';
import { createApp } from './app.js';
import { loadServerConfig } from './config.js';
import { createPanoramaService } from './panoramaService.js';
import { loadServiceTags } from './serviceCodes.js';

process.on('uncaughtException', (error) => {
  console.error('Uncaught Exception:', error);
  if (error instanceof Error) {
    console.error('Error stack:', error.stack);
  }
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  process.exit(1);
});

const config = loadServerConfig();
const serviceTags = loadServiceTags(config.serviceCodesFile);
console.log(`Loaded ${serviceTags.size} service codes from ${config.serviceCodesFile}`);

const fetchImpl = config.mockPanorama
  ? createMockPanorama({ acceptAnyCredentials: true }).fetch
  : fetch;
if (config.mockPanorama) {
  console.log('PANORAMA_MOCK is set: changes are applied to an in-memory Panorama');
}

const applier = createPanoramaService({
  fetchImpl,
  jobPollIntervalMs: config.jobPollIntervalMs,
  maxJobPolls: config.maxJobPolls,
});

const app = createApp({ config, serviceTags, applier });

const server = app.listen(config.port, '0.0.0.0', () => {
  console.log(`API server running on port ${config.port}`);
}).on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    console.error(`Port ${config.port} is already in use. Please stop the existing process or use a different port.`);
    console.error(`To find and kill the process: lsof -ti:${config.port} | xargs kill -9`);
    process.exit(1);
  } else {
    console.error('Server error:', err);
    throw err;
  }
});

process.on('SIGTERM', () => {
  console.log('SIGTERM signal received: closing HTTP server');
  server.close(() => {
    console.log('HTTP server closed');
  });
});

process.on('SIGINT', () => {
  console.log('SIGINT signal received: closing HTTP server');
  server.close(() => {
    console.log('HTTP server closed');
    process.exit(0);
  });
});

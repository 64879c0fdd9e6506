import path from 'node:path';
import { loadConfig } from './config';
import { createLogger } from './logging';
import { createAssistantRuntime } from './runtime';
import { createAssistantHttpServer } from './server';

const config = loadConfig({ rootDir: process.env.TRIPGUARD_ROOT_DIR ?? path.resolve(__dirname, '../../..') });
const logger = createLogger({ service: 'tripguard-assistant' }, { level: config.logLevel });
const runtime = createAssistantRuntime(config, logger);

const server = createAssistantHttpServer(runtime, logger);

server.listen(config.port, () => {
  logger.info('server.started', { port: config.port, baseUrl: `http://localhost:${config.port}` });
});

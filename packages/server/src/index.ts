#!/usr/bin/env node

import http from 'node:http';
import { getRequestListener } from '@hono/node-server';
import {
  ServiceDiscovery,
  createExec,
  createSystemdUnitSource,
  loadDiscoveryRules,
  logger as discoveryLogger,
} from '@homelab/discovery';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';

const config = loadConfig();
logger.level = config.logLevel;
discoveryLogger.level = config.logLevel;

const rules = loadDiscoveryRules(config.rulesPath);
const source = createSystemdUnitSource(createExec({ timeoutMs: config.systemctlTimeoutMs }), {
  unitTypes: config.unitTypes,
});
const discovery = new ServiceDiscovery(source, rules);
const app = createApp(discovery);

const server = http.createServer(getRequestListener(app.fetch));

server.listen(config.port, config.host, () => {
  logger.info(
    {
      url: `http://${config.host}:${config.port}`,
      unitTypes: config.unitTypes,
      rules: config.rulesPath ?? 'bundled defaults',
      criticalServices: rules.critical.length,
    },
    'Homelab service discovery listening',
  );
});

process.on('SIGINT', () => {
  logger.info('Shutting down');
  server.close();
  process.exit(0);
});

#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createFmpClient } from './client.js';
import { createFmpServer } from './server.js';

const server = createFmpServer(createFmpClient());

const transport = new StdioServerTransport();
await server.connect(transport);

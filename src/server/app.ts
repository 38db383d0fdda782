/**
 * HTTP surface
 *
 * POST /tools/:name     - run a tool with a JSON body
 * GET  /tools           - list tool declarations
 * GET  /resources/:name - read-only data
 * GET  /, GET /health   - liveness
 *
 * Tool outcomes, success or error envelope, are 200. Only routing, auth and
 * unexpected failures use other status codes.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { RiskSettings } from '../config/riskSettings';
import { errorMessage } from './errors';
import { bearerToken, type Authenticator } from './security/authenticator';
import { TOOL_DEFINITIONS, isToolName } from './tools/toolDefinitions';
import { executeTool, type TradingTools } from './tools/toolHandlers';
import { RESOURCE_DEFINITIONS, isResourceName, readResource } from './tools/resources';
import { createLogger } from './utils/logger';

const log = createLogger('Server');

export const SERVICE_NAME = 'Strategy Bridge';
export const SERVICE_VERSION = '0.1.0';

export interface AppDependencies {
  tools: TradingTools;
  riskSettings: RiskSettings;
  authenticator: Authenticator;
}

function failure(context: string, message: string) {
  return { status: 'error' as const, context, message, timestamp: new Date().toISOString() };
}

export function createApp({ tools, riskSettings, authenticator }: AppDependencies): Hono {
  const app = new Hono();

  app.use('*', cors());

  app.get('/', (c) => c.json({ message: `Welcome to ${SERVICE_NAME}`, version: SERVICE_VERSION }));

  app.get('/health', (c) => c.json({ status: 'healthy' }));

  app.get('/tools', (c) =>
    c.json({
      tools: Object.values(TOOL_DEFINITIONS).map(({ declaration, requireAuth }) => ({ ...declaration, requireAuth })),
      resources: RESOURCE_DEFINITIONS,
    })
  );

  app.post('/tools/:name', async (c) => {
    const name = c.req.param('name');
    if (!isToolName(name)) {
      return c.json(failure('Unknown tool', `No tool named '${name}'`), 404);
    }

    if (TOOL_DEFINITIONS[name].requireAuth) {
      const token = bearerToken(c.req.header('Authorization'));
      if (token === null) {
        return c.json(failure('Authentication required', 'Missing bearer token'), 401);
      }
      if (!authenticator.authenticate(token)) {
        return c.json(failure('Authentication failed', 'Invalid authentication token'), 401);
      }
      if (!authenticator.authorize(token, name)) {
        return c.json(failure('Not authorized', `Not authorized to use ${name}`), 403);
      }
    }

    // An unreadable body is treated as no arguments; the tool's schema reports what is missing
    let body: unknown = {};
    try {
      body = await c.req.json();
    } catch (error) {
      log.debug(`Request body for ${name} is not JSON: ${errorMessage(error)}`);
      body = {};
    }

    try {
      const response = await executeTool(tools, name, body);
      return c.json(response, 200);
    } catch (error) {
      log.error(`Unexpected error in ${name}:`, error);
      return c.json(failure('Tool execution failed', errorMessage(error)), 500);
    }
  });

  app.get('/resources/:name', (c) => {
    const name = c.req.param('name');
    if (!isResourceName(name)) {
      return c.json(failure('Unknown resource', `No resource named '${name}'`), 404);
    }
    return c.json(readResource(name, riskSettings));
  });

  app.notFound((c) => c.json(failure('Not found', `${c.req.method} ${c.req.path}`), 404));

  app.onError((error, c) => {
    log.error('Unhandled request error:', error);
    return c.json(failure('Request failed', error.message), 500);
  });

  return app;
}

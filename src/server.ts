import crypto from 'node:crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import { pinoHttp } from 'pino-http';
import { z } from 'zod';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import rateLimit from 'express-rate-limit';
import { ConfigManager, type ServerSettings } from './config.js';
import { logger } from './logger.js';
import { ImaService, createImaMcpServer } from './mcp.js';

const SSE_HEARTBEAT_MS = 25_000;

const toolCallSchema = z.object({
  method: z.literal('tools/call'),
  params: z.object({ name: z.string() }),
});

type Metrics = {
  totalRequests: number;
  toolCounts: Record<string, number>;
  latSumMs: number;
  latCount: number;
  errors: number;
  toolLatencies: Record<string, { sum: number; count: number }>;
};

// Optional API key auth for production
export function requireApiKey(settings: Pick<ServerSettings, 'apiKey' | 'requireKey'>) {
  const required = (settings.apiKey ?? '').trim();
  return (req: Request, res: Response, next: NextFunction) => {
    if (!required && !settings.requireKey) return next();
    const header = req.headers['x-api-key'];
    const provided = typeof header === 'string' ? header : '';
    if (provided && (!required || provided === required)) return next();
    res.status(401).json({ error: 'Unauthorized' });
  };
}

export function createApp(service: ImaService, settings: ServerSettings) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(
    pinoHttp({
      logger,
      genReqId: req => {
        const id = req.headers['x-request-id'];
        return typeof id === 'string' && id ? id : crypto.randomUUID();
      },
    }),
  );

  const guard = requireApiKey(settings);
  const limiter = rateLimit({
    windowMs: settings.rateLimit.windowMs,
    limit: settings.rateLimit.max,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
  });
  app.use(['/mcp', '/mcp/sse', '/mcp/messages'], limiter);

  const metrics: Metrics = { totalRequests: 0, toolCounts: {}, latSumMs: 0, latCount: 0, errors: 0, toolLatencies: {} };
  const sseTransports: Record<string, SSEServerTransport> = {};
  const sseHeartbeats: Record<string, NodeJS.Timeout> = {};

  app.get('/healthz', (_req: Request, res: Response) => {
    const avgLatencyMs = metrics.latCount ? Math.round(metrics.latSumMs / metrics.latCount) : 0;
    const toolLatencyAvg: Record<string, number> = {};
    for (const [name, stat] of Object.entries(metrics.toolLatencies)) {
      toolLatencyAvg[name] = stat.count ? Math.round(stat.sum / stat.count) : 0;
    }
    res.json({
      ok: true,
      uptime: process.uptime(),
      configured: service.configManager.validate().ok,
      clientInitialized: service.initialized,
      requests: metrics.totalRequests,
      avgLatencyMs,
      toolCounts: metrics.toolCounts,
      toolLatencyAvg,
      sseSessions: Object.keys(sseTransports).length,
      errors: metrics.errors,
    });
  });

  app.post('/mcp', guard, async (req: Request, res: Response) => {
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined, enableJsonResponse: true });
    const server = createImaMcpServer(service);
    res.on('close', () => {
      server.close().catch(err => logger.warn({ err }, 'MCP close error'));
    });
    try {
      const started = Date.now();
      await server.connect(transport);
      const call = toolCallSchema.safeParse(req.body);
      const toolName = call.success ? call.data.params.name : undefined;
      await transport.handleRequest(req, res, req.body);
      const ms = Date.now() - started;
      metrics.totalRequests++;
      metrics.latSumMs += ms;
      metrics.latCount++;
      if (toolName) {
        metrics.toolCounts[toolName] = (metrics.toolCounts[toolName] || 0) + 1;
        const stat = metrics.toolLatencies[toolName] || { sum: 0, count: 0 };
        stat.sum += ms;
        stat.count += 1;
        metrics.toolLatencies[toolName] = stat;
      }
    } catch (err) {
      logger.error({ err }, 'MCP error');
      metrics.errors++;
      if (!res.headersSent) res.status(500).json({ error: 'Server error' });
    }
  });

  app.get(['/mcp/sse', '/mcp/sse/'], guard, async (_req: Request, res: Response) => {
    let server: McpServer | undefined;
    try {
      const transport = new SSEServerTransport('/mcp/messages', res);
      const sid = transport.sessionId;
      const sessionServer = createImaMcpServer(service);
      server = sessionServer;
      sseTransports[sid] = transport;
      sseHeartbeats[sid] = setInterval(() => {
        sessionServer.sendLoggingMessage({ level: 'debug', data: 'ping' }, sid).catch(err => {
          logger.debug({ err, sid }, 'SSE heartbeat failed');
        });
      }, SSE_HEARTBEAT_MS);
      transport.onclose = () => {
        delete sseTransports[sid];
        const h = sseHeartbeats[sid];
        if (h) {
          clearInterval(h);
          delete sseHeartbeats[sid];
        }
      };
      await sessionServer.connect(transport);
    } catch (err) {
      logger.error({ err }, 'MCP SSE init error');
      if (server) await server.close().catch(closeErr => logger.warn({ err: closeErr }, 'MCP SSE close error'));
      if (!res.headersSent) res.status(500).send('Error establishing SSE stream');
    }
  });

  app.post('/mcp/messages', guard, async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    if (!sessionId) return res.status(400).send('Missing sessionId parameter');
    const transport = sseTransports[sessionId];
    if (!transport) return res.status(404).send('Session not found');
    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (err) {
      logger.error({ err }, 'MCP SSE message error');
      metrics.errors++;
      if (!res.headersSent) res.status(500).send('Error handling request');
    }
  });

  return app;
}

const configManager = new ConfigManager();
const settings = configManager.settings;
export const service = new ImaService(configManager, { askTimeoutMs: settings.askTimeoutMs });
export const app = createApp(service, settings);

if (!process.env.NO_LISTEN) {
  app.listen(settings.port, () => {
    logger.info(`IMA MCP running at http://localhost:${settings.port}/mcp`);
    logger.info(`IMA MCP SSE:`);
    logger.info(`  SSE:       http://localhost:${settings.port}/mcp/sse/`);
    logger.info(`  Messages:  http://localhost:${settings.port}/mcp/messages`);
    const validation = configManager.validate();
    logger.info(
      {
        event: 'ima_mcp_config',
        configured: validation.ok,
        knowledgeBaseId: validation.ok ? configManager.getCredentials().knowledgeBaseId : undefined,
        askTimeoutMs: settings.askTimeoutMs,
        rateLimit: settings.rateLimit,
        apiKeyRequired: settings.requireKey,
        env: configManager.envPresence(),
      },
      'Config',
    );
    if (!validation.ok) logger.warn(validation.error);
  });
}

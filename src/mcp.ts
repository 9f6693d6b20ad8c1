import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ConfigManager } from './config.js';
import { ImaClient, type AskBackend } from './ima/client.js';
import { errorMessage } from './ima/errors.js';
import { ImaToolExecutor } from './ima/format.js';
import type { ImaCredentials } from './ima/types.js';
import { logger as rootLogger, type Logger } from './logger.js';

export interface ImaBackend extends AskBackend {
  validateConfig(options?: { signal?: AbortSignal }): Promise<boolean>;
}

export type ImaServiceOptions = {
  createClient?: (creds: ImaCredentials) => ImaBackend;
  askTimeoutMs?: number;
  logger?: Logger;
};

export type AskReply = { ok: true; answer: string; knowledgeSources: number; references: Array<{ id: string; title: string }> } | { ok: false; message: string };

export const SERVER_NAME = 'ima-mcp-bridge';
export const SERVER_VERSION = '0.1.0';

export const HELP_TEXT = [
  '# IMA knowledge-base MCP server',
  '',
  '## Overview',
  'Answers questions from a Tencent IMA knowledge base over the Model Context Protocol.',
  '',
  '## Configuration',
  'Copy .env.example to .env and fill in the values captured from a signed-in browser session:',
  '- IMA_COOKIES: full cookie string',
  '- IMA_X_IMA_COOKIE: X-Ima-Cookie request header',
  '- IMA_X_IMA_BKN: X-Ima-Bkn request header',
  '',
  '## Tools',
  '- `ask`: ask the knowledge base a question',
  '- `ima_validate_config`: check the configuration',
  '- `ima_get_status`: show service status',
  '',
  '## Resources',
  '- `ima://config`: non-secret configuration',
  '- `ima://help`: this text',
  '- `ima://status`: service status',
  '',
  '## Endpoints',
  '- Streamable HTTP: POST /mcp',
  '- Legacy SSE: GET /mcp/sse, then POST /mcp/messages?sessionId=...',
].join('\n');

const TIMEOUT_MESSAGE = '[ERROR] Request timed out, please try again later';

/**
 * Process-wide state behind the MCP tools. The client is created on the
 * first question and reused; questions run one at a time because the client
 * holds a single session. The deadline of each call starts before it queues.
 */
export class ImaService {
  private readonly log: Logger;
  private readonly createClient: (creds: ImaCredentials) => ImaBackend;
  private backend: ImaBackend | undefined;
  private executor: ImaToolExecutor | undefined;
  private readonly deadlineMs: number;
  private running = false;
  private readonly waiters: Array<() => void> = [];

  constructor(
    readonly configManager: ConfigManager,
    options: ImaServiceOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ module: 'ima-service' });
    this.createClient =
      options.createClient ?? (creds => new ImaClient(creds, { baseUrl: configManager.settings.baseUrl }));
    this.deadlineMs = options.askTimeoutMs ?? configManager.settings.askTimeoutMs;
  }

  get initialized(): boolean {
    return this.backend !== undefined;
  }

  /** False when the signal aborts while waiting for the slot. */
  private async acquire(signal: AbortSignal): Promise<boolean> {
    while (this.running) {
      if (signal.aborted) return false;
      await new Promise<void>(resolve => {
        const wake = () => {
          signal.removeEventListener('abort', wake);
          const i = this.waiters.indexOf(wake);
          if (i >= 0) this.waiters.splice(i, 1);
          resolve();
        };
        this.waiters.push(wake);
        signal.addEventListener('abort', wake, { once: true });
      });
    }
    this.running = true;
    return true;
  }

  private release() {
    this.running = false;
    const next = this.waiters.shift();
    if (next) next();
  }

  private startDeadline() {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.deadlineMs);
    return { signal: controller.signal, clear: () => clearTimeout(timer) };
  }

  private ensureClient(): { backend: ImaBackend; executor: ImaToolExecutor } | string {
    if (this.backend && this.executor) return { backend: this.backend, executor: this.executor };
    if (!this.configManager.validate().ok) return 'Configuration incomplete, check the environment variables';
    try {
      const backend = this.createClient(this.configManager.getCredentials());
      const executor = new ImaToolExecutor(backend, {
        deadlineMs: this.deadlineMs,
        logger: this.log,
      });
      this.backend = backend;
      this.executor = executor;
      this.log.info('IMA client initialized');
      return { backend, executor };
    } catch (err) {
      this.log.error({ err }, 'Failed to initialize the IMA client');
      return `Failed to initialize the IMA client: ${errorMessage(err)}`;
    }
  }

  async ask(question: string, includeKnowledge = true): Promise<AskReply> {
    if (!question.trim()) return { ok: false, message: '[ERROR] Question cannot be empty' };
    const ready = this.ensureClient();
    if (typeof ready === 'string') return { ok: false, message: `[ERROR] ${ready}` };

    const deadline = this.startDeadline();
    try {
      if (!(await this.acquire(deadline.signal))) {
        this.log.warn({ deadlineMs: this.deadlineMs }, 'Question timed out waiting for its turn');
        return { ok: false, message: TIMEOUT_MESSAGE };
      }
      try {
        if (deadline.signal.aborted) return { ok: false, message: TIMEOUT_MESSAGE };
        this.log.info({ question: question.slice(0, 50) }, 'Question received');
        const result = await ready.executor.askQuestion(question, includeKnowledge, deadline.signal);
        if (result.metadata?.timedOut) return { ok: false, message: TIMEOUT_MESSAGE };
        if (!result.success) return { ok: false, message: `[ERROR] ${result.error ?? result.content}` };
        this.log.info({ length: result.content.length }, 'Answer returned');
        return {
          ok: true,
          answer: result.content,
          knowledgeSources: result.metadata?.knowledgeSources ?? 0,
          references: (result.metadata?.references ?? []).map(r => ({ id: r.id, title: r.title })),
        };
      } finally {
        this.release();
      }
    } finally {
      deadline.clear();
    }
  }

  async validate(live: boolean): Promise<{ valid: boolean; message: string }> {
    const result = this.configManager.validate();
    if (!result.ok) return { valid: false, message: `[ERROR] Configuration validation failed: ${result.error}` };
    if (!live) return { valid: true, message: '[OK] Configuration is valid' };

    const ready = this.ensureClient();
    if (typeof ready === 'string') return { valid: false, message: `[ERROR] ${ready}` };
    const timedOut = { valid: false, message: '[ERROR] IMA connection check timed out, please try again later' };
    const deadline = this.startDeadline();
    try {
      if (!(await this.acquire(deadline.signal))) return timedOut;
      try {
        const ok = await ready.backend.validateConfig({ signal: deadline.signal });
        if (deadline.signal.aborted) {
          this.log.warn({ deadlineMs: this.deadlineMs }, 'Live validation timed out');
          return timedOut;
        }
        return ok
          ? { valid: true, message: '[OK] Configuration is valid and the IMA credentials work' }
          : { valid: false, message: '[ERROR] IMA connection check failed, check the credentials' };
      } catch (err) {
        this.log.error({ err }, 'Live validation failed');
        return { valid: false, message: `[ERROR] IMA connection check failed: ${errorMessage(err)}` };
      } finally {
        this.release();
      }
    } finally {
      deadline.clear();
    }
  }

  statusText(): string {
    const status = this.configManager.getStatus();
    const lines = [
      'IMA service status:',
      `Configuration: ${status.isConfigured ? '[OK] configured' : '[ERROR] not configured'}`,
    ];
    if (status.errorMessage) lines.push(`Error: ${status.errorMessage}`);
    if (status.sessionInfo) {
      lines.push('Session:');
      lines.push(`  clientId: ${status.sessionInfo.clientId}`);
      lines.push(`  createdAt: ${status.sessionInfo.createdAt}`);
      lines.push(`  updatedAt: ${status.sessionInfo.updatedAt ?? 'never'}`);
    }
    lines.push('', 'Environment:');
    for (const [name, presence] of Object.entries(this.configManager.envPresence())) {
      const label = presence === 'set' ? '[OK] set' : presence === 'auto' ? '[AUTO] generated' : '[ERROR] missing';
      lines.push(`  ${name}: ${label}`);
    }
    return lines.join('\n');
  }

  configText(): string {
    if (!this.configManager.validate().ok) return 'Configuration not loaded';
    const creds = this.configManager.getCredentials();
    const lines = [
      'IMA configuration:',
      `Client id: ${creds.clientId}`,
      `Knowledge base: ${creds.knowledgeBaseId}`,
      `Request timeout: ${creds.timeoutSeconds}s`,
      `Retry count: ${creds.retryCount}`,
      `Proxy: ${creds.proxy ? 'configured' : 'not set'}`,
      `Raw capture: ${creds.rawLog.enabled ? creds.rawLog.dir : 'disabled'}`,
      `Created: ${creds.createdAt.toISOString()}`,
    ];
    if (creds.updatedAt) lines.push(`Updated: ${creds.updatedAt.toISOString()}`);
    return lines.join('\n');
  }
}

const text = (value: string) => ({ content: [{ type: 'text' as const, text: value }] });

/** One MCP server per transport; all of them share the service. */
export function createImaMcpServer(service: ImaService): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { logging: {} } });

  server.registerTool(
    'ask',
    {
      title: 'Ask IMA',
      description: 'Ask the Tencent IMA knowledge base a question and return its answer',
      inputSchema: {
        question: z.string(),
        include_knowledge: z.boolean().optional(),
      },
      outputSchema: {
        answer: z.string(),
        knowledgeSources: z.number().int(),
        references: z.array(z.object({ id: z.string(), title: z.string() })),
      },
    },
    async ({ question, include_knowledge = true }) => {
      const reply = await service.ask(question, include_knowledge);
      if (!reply.ok) return { ...text(reply.message), isError: true };
      const output = { answer: reply.answer, knowledgeSources: reply.knowledgeSources, references: reply.references };
      return { ...text(reply.answer), structuredContent: output };
    },
  );

  server.registerTool(
    'ima_validate_config',
    {
      title: 'Validate IMA configuration',
      description: 'Check that the IMA credentials are present; with live=true also send a test question',
      inputSchema: { live: z.boolean().optional() },
      outputSchema: { valid: z.boolean(), message: z.string() },
    },
    async ({ live = false }) => {
      const result = await service.validate(live);
      return { ...text(result.message), structuredContent: result };
    },
  );

  server.registerTool(
    'ima_get_status',
    {
      title: 'IMA status',
      description: 'Show configuration status and which environment variables are set',
      outputSchema: {
        isConfigured: z.boolean(),
        errorMessage: z.string().optional(),
        env: z.record(z.enum(['set', 'missing', 'auto'])),
      },
    },
    async () => {
      const status = service.configManager.getStatus();
      const output = {
        isConfigured: status.isConfigured,
        errorMessage: status.errorMessage,
        env: service.configManager.envPresence(),
      };
      return { ...text(service.statusText()), structuredContent: output };
    },
  );

  server.registerResource(
    'config',
    'ima://config',
    { title: 'IMA configuration', description: 'Current configuration without secrets', mimeType: 'text/plain' },
    async uri => ({ contents: [{ uri: uri.href, mimeType: 'text/plain', text: service.configText() }] }),
  );

  server.registerResource(
    'help',
    'ima://help',
    { title: 'IMA help', description: 'Usage notes', mimeType: 'text/markdown' },
    async uri => ({ contents: [{ uri: uri.href, mimeType: 'text/markdown', text: HELP_TEXT }] }),
  );

  server.registerResource(
    'status',
    'ima://status',
    { title: 'IMA status', description: 'Service status', mimeType: 'text/plain' },
    async uri => ({ contents: [{ uri: uri.href, mimeType: 'text/plain', text: service.statusText() }] }),
  );

  return server;
}

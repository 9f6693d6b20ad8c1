import { describe, expect, it, vi } from 'vitest';
import type { AskBackend, AskOptions } from '../src/ima/client.js';
import {
  NO_RESPONSE_TEXT,
  ImaToolExecutor,
  cleanResponseContent,
  extractKnowledgeInfo,
  extractTextContent,
} from '../src/ima/format.js';
import type { ImaMessage } from '../src/ima/types.js';
import { silentLogger } from './helpers.js';

const knowledge: ImaMessage = {
  type: 'knowledgeBase',
  content: 'Searching',
  medias: [
    { id: 'm1', title: 'Doc', introduction: 'Intro', knowledge_base_info: { name: 'Team KB' }, timestamp: 1700000000 },
  ],
};

function backend(messages: ImaMessage[] | (() => Promise<ImaMessage[]>)): AskBackend {
  return {
    askComplete: vi.fn(async (_question: string, _options?: AskOptions) =>
      typeof messages === 'function' ? messages() : messages,
    ),
  };
}

describe('cleanResponseContent', () => {
  it('trims lines and collapses blank runs', () => {
    expect(cleanResponseContent('  a  \n\n\n  b \n')).toBe('a\n\nb\n');
    expect(cleanResponseContent('')).toBe('');
  });

  it('is idempotent', () => {
    const once = cleanResponseContent(' x \n \n \n y\n\n\nz ');
    expect(cleanResponseContent(once)).toBe(once);
  });
});

describe('extractTextContent', () => {
  it('joins answer text and leaves out knowledge events', () => {
    const messages: ImaMessage[] = [{ type: 'text', content: 'Hello ' }, knowledge, { type: 'text', content: 'world\n\n\n' }];
    expect(extractTextContent(messages)).toBe('Hello world');
  });

  it('reports an empty list', () => {
    expect(extractTextContent([])).toBe(NO_RESPONSE_TEXT);
  });
});

describe('extractKnowledgeInfo', () => {
  it('flattens the referenced documents', () => {
    expect(extractKnowledgeInfo([{ type: 'text', content: 'x' }, knowledge])).toEqual([
      {
        id: 'm1',
        title: 'Doc',
        subtitle: undefined,
        introduction: 'Intro',
        timestamp: 1700000000,
        knowledgeBase: 'Team KB',
      },
    ]);
  });
});

describe('ImaToolExecutor', () => {
  it('returns the answer with references', async () => {
    const executor = new ImaToolExecutor(backend([{ type: 'text', content: 'Answer' }, knowledge]), { logger: silentLogger });
    const result = await executor.askQuestion('q');
    expect(result.success).toBe(true);
    expect(result.content).toBe('Answer\n\n**References**:\n1. Doc\n   Intro...');
    expect(result.metadata).toMatchObject({ messageCount: 2, knowledgeSources: 1 });
    expect(result.metadata?.references?.map(r => r.id)).toEqual(['m1']);
  });

  it('leaves references out on request', async () => {
    const executor = new ImaToolExecutor(backend([{ type: 'text', content: 'Answer' }, knowledge]), { logger: silentLogger });
    const result = await executor.askQuestion('q', false);
    expect(result.content).toBe('Answer');
    expect(result.metadata?.references).toBeUndefined();
  });

  it('fails when only system messages came back', async () => {
    const executor = new ImaToolExecutor(
      backend([{ type: 'system', content: 'Failed to get an answer: all 3 attempts failed' }]),
      { logger: silentLogger },
    );
    const result = await executor.askQuestion('q');
    expect(result).toMatchObject({ success: false, error: 'Failed to get an answer: all 3 attempts failed' });
  });

  it('gives up at the deadline', async () => {
    const client: AskBackend = {
      askComplete: (_question, options) =>
        new Promise(resolve => {
          options?.signal?.addEventListener('abort', () => resolve([{ type: 'system', content: 'cancelled' }]));
        }),
    };
    const executor = new ImaToolExecutor(client, { deadlineMs: 20, logger: silentLogger });
    const result = await executor.askQuestion('q');
    expect(result.success).toBe(false);
    expect(result.error).toBe('Request timed out after 0s');
    expect(result.metadata?.timedOut).toBe(true);
  });

  it('stops when the caller signal aborts', async () => {
    const client: AskBackend = {
      askComplete: (_question, options) =>
        new Promise(resolve => {
          options?.signal?.addEventListener('abort', () => resolve([{ type: 'system', content: 'cancelled' }]));
        }),
    };
    const executor = new ImaToolExecutor(client, { deadlineMs: 5000, logger: silentLogger });
    const controller = new AbortController();
    const pending = executor.askQuestion('q', true, controller.signal);
    controller.abort();
    const result = await pending;
    expect(result.error).toBe('Request timed out after 5s');
    expect(result.metadata?.timedOut).toBe(true);
  });

  it('reports a failing backend', async () => {
    const executor = new ImaToolExecutor(
      backend(async () => {
        throw new Error('boom');
      }),
      { logger: silentLogger },
    );
    expect(await executor.askQuestion('q')).toEqual({ success: false, content: '', error: 'Ask failed: boom' });
  });
});

import type { Logger } from 'pino';
import { logger as rootLogger } from '../logger.js';
import type { AskBackend } from './client.js';
import { errorMessage } from './errors.js';
import type { ImaMessage, KnowledgeItem, ToolResult } from './types.js';

export const NO_RESPONSE_TEXT = 'No response received';
export const DEFAULT_ASK_DEADLINE_MS = 55_000;

// Trims every line and collapses runs of blank lines into one.
export function cleanResponseContent(content: string): string {
  if (!content) return content;
  const out: string[] = [];
  let prevEmpty = false;
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (line) {
      out.push(line);
      prevEmpty = false;
    } else if (!prevEmpty) {
      out.push('');
      prevEmpty = true;
    }
  }
  return out.join('\n');
}

/**
 * Joins the text of answer-bearing messages (`text` and `system`).
 * Knowledge-base progress events are left out; see `extractKnowledgeInfo`.
 */
export function extractTextContent(messages: ImaMessage[]): string {
  if (messages.length === 0) return NO_RESPONSE_TEXT;
  const joined = messages
    .filter(m => m.type !== 'knowledgeBase')
    .map(m => m.content)
    .join('')
    .trim();
  return cleanResponseContent(joined);
}

export function extractKnowledgeInfo(messages: ImaMessage[]): KnowledgeItem[] {
  const items: KnowledgeItem[] = [];
  for (const message of messages) {
    if (message.type !== 'knowledgeBase' || !message.medias) continue;
    for (const media of message.medias) {
      items.push({
        id: media.id,
        title: media.title,
        subtitle: media.subtitle ?? undefined,
        introduction: media.introduction ?? undefined,
        timestamp: media.timestamp ?? undefined,
        knowledgeBase: media.knowledge_base_info?.name ?? undefined,
      });
    }
  }
  return items;
}

function formatKnowledge(items: KnowledgeItem[]): string {
  const lines = ['', '', '**References**:'];
  items.slice(0, 5).forEach((item, i) => {
    lines.push(`${i + 1}. ${item.title}`);
    if (item.introduction) lines.push(`   ${item.introduction.slice(0, 100)}...`);
  });
  return lines.join('\n');
}

/**
 * Runs a question through the client under a wall-clock deadline. A caller
 * signal, such as one started before queueing, ends the question early too.
 */
export class ImaToolExecutor {
  private readonly log: Logger;
  private readonly deadlineMs: number;

  constructor(
    private readonly client: AskBackend,
    options: { deadlineMs?: number; logger?: Logger } = {},
  ) {
    this.deadlineMs = options.deadlineMs ?? DEFAULT_ASK_DEADLINE_MS;
    this.log = (options.logger ?? rootLogger).child({ module: 'ima-executor' });
  }

  async askQuestion(question: string, includeKnowledge = true, signal?: AbortSignal): Promise<ToolResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.deadlineMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    else signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const messages = await this.client.askComplete(question, { signal: controller.signal });
      if (controller.signal.aborted) {
        this.log.warn({ deadlineMs: this.deadlineMs }, 'Question timed out');
        return {
          success: false,
          content: '',
          error: `Request timed out after ${Math.round(this.deadlineMs / 1000)}s`,
          metadata: { messageCount: messages.length, knowledgeSources: 0, timedOut: true },
        };
      }

      const answer = extractTextContent(messages);
      const knowledge = extractKnowledgeInfo(messages);
      const success = messages.some(m => m.type !== 'system');
      let content = answer;
      if (includeKnowledge && knowledge.length > 0) content += formatKnowledge(knowledge);

      return {
        success,
        content,
        error: success ? undefined : answer,
        metadata: {
          messageCount: messages.length,
          knowledgeSources: knowledge.length,
          references: includeKnowledge ? knowledge : undefined,
        },
      };
    } catch (err) {
      this.log.error({ err }, 'Question failed');
      return { success: false, content: '', error: `Ask failed: ${errorMessage(err)}` };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

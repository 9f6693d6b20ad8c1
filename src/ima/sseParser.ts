import { ImaError } from './errors.js';
import { knowledgeBasePayloadSchema, type ImaMessage } from './types.js';

const DEFAULT_PROCESSING_CAPTION = 'Searching the knowledge base...';
const REFERENCES_HEADER = '\n\nReferences:\n';
const MAX_REFERENCES = 5;
const MAX_INTRO_CHARS = 150;

type Payload = Record<string, unknown>;

const isRecord = (value: unknown): value is Payload =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const tryParseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

const nonEmptyString = (value: unknown): value is string => typeof value === 'string' && value !== '';

// A recognizer returns undefined when the shape does not apply, null when it
// applies but carries nothing to emit, and a message otherwise.
type Recognizer = (payload: Payload, raw: string) => ImaMessage | null | undefined;

const fromMessageList: Recognizer = (payload, raw) => {
  if (!Array.isArray(payload.msgs)) return undefined;
  for (const msg of payload.msgs) {
    if (isRecord(msg) && nonEmptyString(msg.content)) return { type: 'text', content: msg.content, raw };
  }
  return null;
};

const fromContent: Recognizer = (payload, raw) =>
  nonEmptyString(payload.content) ? { type: 'text', content: payload.content, raw } : undefined;

const fromText: Recognizer = (payload, raw) =>
  typeof payload.Text === 'string' ? { type: 'text', content: payload.Text, raw } : undefined;

const fromKnowledgeBase: Recognizer = (payload, raw) => {
  if (payload.type !== 'knowledgeBase') return undefined;
  const parsed = knowledgeBasePayloadSchema.safeParse(payload);
  if (!parsed.success) throw new ImaError('upstream', `Malformed knowledgeBase event: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  const kb = parsed.data;
  return {
    type: 'knowledgeBase',
    content: kb.content ?? kb.processing ?? DEFAULT_PROCESSING_CAPTION,
    processing: kb.processing ?? undefined,
    stage: kb.stage ?? undefined,
    medias: kb.medias ?? undefined,
    raw,
  };
};

const fromQuestionAnswer: Recognizer = (payload, raw) => {
  if (!('question' in payload) || !('answer' in payload)) return undefined;
  return nonEmptyString(payload.answer) ? { type: 'text', content: payload.answer, raw } : undefined;
};

const RECOGNIZERS: Recognizer[] = [fromMessageList, fromContent, fromText, fromKnowledgeBase, fromQuestionAnswer];

/**
 * Parses one event-stream line into at most one message.
 * Control lines, blank data and the `[DONE]` sentinel yield null.
 * Throws on undecodable JSON or on a payload that is not an object so the
 * caller can count the failure.
 */
export function parseSseLine(line: string): ImaMessage | null {
  let data: string;
  if (line.startsWith('data:')) data = line.slice(5).replace(/^ /, '');
  else if (line.startsWith('event:') || line.startsWith('id:')) return null;
  else data = line;

  if (!data.trim() || data.trim() === '[DONE]') return null;

  const json: unknown = JSON.parse(data);
  if (!isRecord(json)) throw new ImaError('upstream', 'Event payload is not a JSON object');

  for (const recognize of RECOGNIZERS) {
    const result = recognize(json, data);
    if (result !== undefined) return result;
  }
  return { type: 'system', content: JSON.stringify(json), raw: data };
}

function formatReferences(contextRefs: string): string | undefined {
  const parsed = tryParseJson(contextRefs);
  if (parsed === undefined) return `${REFERENCES_HEADER}${contextRefs}`;
  if (!isRecord(parsed) || !Array.isArray(parsed.medias) || parsed.medias.length === 0) return undefined;

  let out = REFERENCES_HEADER;
  parsed.medias.slice(0, MAX_REFERENCES).forEach((media, i) => {
    const n = i + 1;
    const record: Payload = isRecord(media) ? media : {};
    const title = nonEmptyString(record.title) ? record.title : `Reference ${n}`;
    let intro = nonEmptyString(record.introduction) ? record.introduction : '';
    if (intro.length > MAX_INTRO_CHARS) intro = `${intro.slice(0, MAX_INTRO_CHARS)}...`;
    out += intro ? `${n}. ${title}\n   ${intro}\n` : `${n}. ${title}\n`;
  });
  return out;
}

/**
 * Pulls the final answer out of a response that arrived as one JSON
 * document instead of an event stream: the last `msgs` entry of type 3
 * carries `content.answer` (possibly JSON with a `Text` field) and
 * optional `content.context_refs`.
 */
export function extractMessagesFromDocument(doc: unknown): ImaMessage[] {
  if (!isRecord(doc) || !Array.isArray(doc.msgs) || doc.msgs.length === 0) return [];
  const last: unknown = doc.msgs[doc.msgs.length - 1];
  if (!isRecord(last) || last.type !== 3 || !isRecord(last.content)) return [];

  const raw = JSON.stringify(last);
  const messages: ImaMessage[] = [];
  const { answer, context_refs: contextRefs } = last.content;

  if (nonEmptyString(answer)) {
    const decoded = tryParseJson(answer);
    const text = isRecord(decoded) && typeof decoded.Text === 'string' ? decoded.Text : answer;
    messages.push({ type: 'text', content: text, raw });
  }

  if (nonEmptyString(contextRefs)) {
    const refs = formatReferences(contextRefs);
    if (refs) messages.push({ type: 'text', content: refs, raw });
  }
  return messages;
}

/**
 * Decodes stream bytes as UTF-8, keeping split multi-byte sequences across
 * chunks. Chunks that are not valid UTF-8 are retried as GBK, then decoded
 * lossily.
 */
export class ChunkDecoder {
  private utf8 = new TextDecoder('utf-8', { fatal: true });
  failures = 0;

  decode(chunk: Uint8Array): string {
    try {
      return this.utf8.decode(chunk, { stream: true });
    } catch {
      this.utf8 = new TextDecoder('utf-8', { fatal: true });
    }
    this.failures++;
    try {
      return new TextDecoder('gbk', { fatal: true }).decode(chunk);
    } catch {
      return new TextDecoder('utf-8').decode(chunk);
    }
  }

  flush(): string {
    try {
      return this.utf8.decode();
    } catch {
      this.failures++;
      return '';
    }
  }
}

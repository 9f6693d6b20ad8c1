import { z } from 'zod';

export type RawLogSettings = {
  enabled: boolean;
  dir: string;
  maxBytes: number;
  onSuccess: boolean;
};

/**
 * Credential and tuning bundle handed to the client by the config loader.
 * The client refreshes the token fields in place; everything else is read-only.
 */
export interface ImaCredentials {
  /** Full browser cookie string, sent as the Cookie header when present. */
  cookies?: string;
  /** Value of the X-Ima-Cookie header. Required. */
  xImaCookie: string;
  /** Value of the X-Ima-Bkn signing header. Required. */
  xImaBkn: string;
  knowledgeBaseId: string;
  clientId: string;
  userId?: string;
  refreshToken?: string;
  currentToken?: string;
  tokenValidSeconds?: number;
  /** Epoch milliseconds of the last successful refresh. */
  tokenIssuedAt?: number;
  timeoutSeconds: number;
  /** Extra attempts after the first one when asking a question. */
  retryCount: number;
  proxy?: string;
  robotType: number;
  sceneType: number;
  modelType: number;
  rawLog: RawLogSettings;
  createdAt: Date;
  updatedAt?: Date;
}

export type ImaSession = { id: string; initialized: boolean };

// Upstream payloads. Fields the service sometimes sends as null are nullish.
export const mediaInfoSchema = z.object({
  id: z.string(),
  type: z.number().nullish(),
  title: z.string(),
  subtitle: z.string().nullish(),
  introduction: z.string().nullish(),
  logo: z.string().nullish(),
  cover: z.string().nullish(),
  jump_url: z.string().nullish(),
  timestamp: z.number().nullish(),
  index: z.number().nullish(),
  publisher: z.string().nullish(),
  knowledge_base_info: z
    .object({ id: z.string().nullish(), name: z.string().nullish() })
    .nullish(),
});
export type MediaInfo = z.infer<typeof mediaInfoSchema>;

export const knowledgeBasePayloadSchema = z.object({
  type: z.literal('knowledgeBase'),
  content: z.string().optional(),
  processing: z.string().nullish(),
  stage: z.number().nullish(),
  medias: z.array(mediaInfoSchema).nullish(),
});

export const tokenRefreshResponseSchema = z.object({
  code: z.coerce.number(),
  msg: z.string().nullish(),
  token: z.string().nullish(),
  token_valid_time: z.union([z.string(), z.number()]).nullish(),
  user_id: z.string().nullish(),
  type: z.unknown().optional(),
  caused_by: z.unknown().optional(),
});

export const initSessionResponseSchema = z.object({
  code: z.coerce.number(),
  msg: z.string().nullish(),
  session_id: z.string().nullish(),
  session_info: z.object({ id: z.string() }).nullish(),
});

export const upstreamErrorSchema = z.object({
  code: z.union([z.number(), z.string()]).optional(),
  msg: z.string().optional(),
});

export type TextMessage = { type: 'text'; content: string; raw?: string };
export type KnowledgeBaseMessage = {
  type: 'knowledgeBase';
  content: string;
  processing?: string;
  stage?: number;
  medias?: MediaInfo[];
  raw?: string;
};
export type SystemMessage = { type: 'system'; content: string; raw?: string };

export type ImaMessage = TextMessage | KnowledgeBaseMessage | SystemMessage;

export type QaRequestBody = {
  session_id: string;
  robot_type: number;
  question: string;
  question_type: number;
  client_id: string;
  command_info: {
    type: number;
    knowledge_qa_info: { tags: string[]; knowledge_ids: string[] };
  };
  model_info: { model_type: number; enable_enhancement: boolean };
  history_info: Record<string, never>;
  device_info: { uskey: string; uskey_bus_infos_input: string };
};

export type KnowledgeItem = {
  id: string;
  title: string;
  subtitle?: string;
  introduction?: string;
  timestamp?: number;
  knowledgeBase?: string;
};

export type ToolResult = {
  success: boolean;
  content: string;
  error?: string;
  metadata?: {
    messageCount: number;
    knowledgeSources: number;
    references?: KnowledgeItem[];
    timedOut?: boolean;
  };
};

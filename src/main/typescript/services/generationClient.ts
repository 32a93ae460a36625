/**
 * INPUT: prompt text (+ optional image), Anthropic credential and model
 * OUTPUT: generated answer text, or a classified GenerationError
 * POS: service layer, the only module that talks to the generation provider
 *
 * Failure taxonomy:
 *   UnconfiguredError   no usable credential at call time
 *   QuotaExceededError  provider reports rate / quota exhaustion (429)
 *   ServiceError        everything else (auth, transport, timeout, empty reply)
 */

import Anthropic from '@anthropic-ai/sdk';
import { ImageInput } from '../models/assistant';

// ─── Errors ────────────────────────────────────────────────────

export type GenerationErrorCode =
  | 'GENERATION_UNCONFIGURED'
  | 'GENERATION_QUOTA_EXCEEDED'
  | 'GENERATION_SERVICE_ERROR';

export class GenerationError extends Error {
  constructor(
    readonly code: GenerationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnconfiguredError extends GenerationError {
  constructor(message = 'Generation API key is not configured') {
    super('GENERATION_UNCONFIGURED', message);
  }
}

export class QuotaExceededError extends GenerationError {
  constructor(message = 'Generation API quota exceeded', options?: { cause?: unknown }) {
    super('GENERATION_QUOTA_EXCEEDED', message, options);
  }
}

export class ServiceError extends GenerationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('GENERATION_SERVICE_ERROR', message, options);
  }
}

const QUOTA_MARKERS = ['429', 'quota', 'rate limit', 'rate_limit'];

function errorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err) {
    const { status } = err;
    if (typeof status === 'number') return status;
  }
  return undefined;
}

/** Maps any provider failure onto the taxonomy */
export function classifyGenerationError(err: unknown): GenerationError {
  if (err instanceof GenerationError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = errorStatus(err);
  // Message markers only count when no HTTP status came with the failure
  const quota =
    status === undefined ? QUOTA_MARKERS.some((m) => message.toLowerCase().includes(m)) : status === 429;

  if (quota) {
    return new QuotaExceededError(message || undefined, { cause: err });
  }
  return new ServiceError(message || 'Generation service failed', { cause: err });
}

// ─── Client contract ───────────────────────────────────────────

export interface GenerationOptions {
  maxTokens?: number;
}

export interface GenerationClient {
  readonly modelName: string;
  isConfigured(): boolean;
  generateText(prompt: string, options?: GenerationOptions): Promise<string>;
  generateFromImage(prompt: string, image: ImageInput, options?: GenerationOptions): Promise<string>;
}

// ─── Anthropic implementation ─────────────────────────────────

/** Narrow view of a Messages API reply; enough to pull the text out */
export interface GenerationReply {
  content: ReadonlyArray<{ type: string; text?: string }>;
}

type ContentBlocks = Exclude<Anthropic.MessageParam['content'], string>;

export type MessageSender = (
  params: Anthropic.MessageCreateParamsNonStreaming,
) => Promise<GenerationReply>;

export interface AnthropicClientOptions {
  apiKey: string | null;
  modelName: string;
  timeoutMs: number;
  /** Replaces the SDK call; used by tests */
  send?: MessageSender;
}

const DEFAULT_MAX_TOKENS = 1024;

export class AnthropicGenerationClient implements GenerationClient {
  readonly modelName: string;
  private readonly apiKey: string | null;
  private readonly timeoutMs: number;
  private readonly sendOverride: MessageSender | undefined;
  private sdk: Anthropic | null = null;

  constructor(options: AnthropicClientOptions) {
    this.apiKey = options.apiKey;
    this.modelName = options.modelName;
    this.timeoutMs = options.timeoutMs;
    this.sendOverride = options.send;
  }

  isConfigured(): boolean {
    return this.apiKey !== null;
  }

  async generateText(prompt: string, options: GenerationOptions = {}): Promise<string> {
    return this.complete([{ type: 'text', text: prompt }], options);
  }

  async generateFromImage(
    prompt: string,
    image: ImageInput,
    options: GenerationOptions = {},
  ): Promise<string> {
    return this.complete(
      [
        {
          type: 'image',
          source: { type: 'base64', media_type: image.mediaType, data: image.data.toString('base64') },
        },
        { type: 'text', text: prompt },
      ],
      options,
    );
  }

  private async complete(
    content: ContentBlocks,
    options: GenerationOptions,
  ): Promise<string> {
    const send = this.resolveSender();

    let reply: GenerationReply;
    try {
      reply = await send({
        model: this.modelName,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        messages: [{ role: 'user', content }],
      });
    } catch (err) {
      throw classifyGenerationError(err);
    }

    const text = reply.content
      .map((block) => (block.type === 'text' && block.text ? block.text : ''))
      .join('')
      .trim();

    if (!text) {
      throw new ServiceError('Generation service returned an empty response');
    }
    return text;
  }

  private resolveSender(): MessageSender {
    if (!this.apiKey) throw new UnconfiguredError();
    if (this.sendOverride) return this.sendOverride;

    if (!this.sdk) {
      // Single attempt per user request: SDK retries off
      this.sdk = new Anthropic({ apiKey: this.apiKey, timeout: this.timeoutMs, maxRetries: 0 });
    }
    const sdk = this.sdk;
    return (params) => sdk.messages.create(params);
  }
}

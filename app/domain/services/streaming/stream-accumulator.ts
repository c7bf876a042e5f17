export interface StreamUsage {
  readonly prompt_tokens: number;
  readonly completion_tokens: number;
  readonly total_tokens: number;
}

interface ChoiceState {
  content: string;
  finishReason: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readUsage(value: unknown): StreamUsage | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const prompt = readNumber(value, 'prompt_tokens') ?? 0;
  const completion = readNumber(value, 'completion_tokens') ?? 0;
  const total = readNumber(value, 'total_tokens') ?? prompt + completion;
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: total };
}

/**
 * Rebuilds the non-streaming response body from OpenAI streaming events.
 * Chat deltas and text completions are both understood; payloads that are
 * not JSON are counted but otherwise ignored.
 */
export class StreamAccumulator {
  private readonly choices = new Map<number, ChoiceState>();
  private id?: string;
  private model?: string;
  private created?: number;
  private chat = false;
  private usage?: StreamUsage;
  private chunks = 0;
  private contentChunks = 0;

  constructor(private readonly fallbackModel: string) {}

  add(payload: string): void {
    this.chunks += 1;

    let event: unknown;
    try {
      event = JSON.parse(payload);
    } catch {
      return;
    }
    if (!isRecord(event)) {
      return;
    }

    if (typeof event.id === 'string') this.id ??= event.id;
    if (typeof event.model === 'string') this.model ??= event.model;
    if (typeof event.created === 'number') this.created ??= event.created;
    if (event.object === 'chat.completion.chunk') this.chat = true;

    const usage = readUsage(event.usage);
    if (usage) {
      this.usage = usage;
    }

    if (!Array.isArray(event.choices)) {
      return;
    }

    let hasContent = false;
    for (const [position, choice] of event.choices.entries()) {
      if (!isRecord(choice)) continue;

      const index = typeof choice.index === 'number' ? choice.index : position;
      const state = this.choices.get(index) ?? { content: '', finishReason: null };

      const delta = isRecord(choice.delta) ? choice.delta : undefined;
      if (delta) {
        this.chat = true;
      }
      const text = delta && typeof delta.content === 'string' ? delta.content : typeof choice.text === 'string' ? choice.text : '';

      if (text.length > 0) {
        state.content += text;
        hasContent = true;
      }
      if (typeof choice.finish_reason === 'string') {
        state.finishReason = choice.finish_reason;
      }

      this.choices.set(index, state);
    }

    if (hasContent) {
      this.contentChunks += 1;
    }
  }

  chunkCount(): number {
    return this.chunks;
  }

  /** Backend-reported usage when present, otherwise one token per content chunk. */
  resolveUsage(): StreamUsage {
    return this.usage ?? { prompt_tokens: 0, completion_tokens: this.contentChunks, total_tokens: this.contentChunks };
  }

  hasReportedUsage(): boolean {
    return this.usage !== undefined;
  }

  buildResponse(): Record<string, unknown> {
    const choices = [...this.choices.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, state]) =>
        this.chat
          ? { index, message: { role: 'assistant', content: state.content }, finish_reason: state.finishReason }
          : { index, text: state.content, finish_reason: state.finishReason }
      );

    return {
      id: this.id,
      object: this.chat ? 'chat.completion' : 'text_completion',
      created: this.created ?? Math.floor(Date.now() / 1000),
      model: this.model ?? this.fallbackModel,
      choices,
      usage: this.resolveUsage()
    };
  }
}

// src/services/provider/provider.types.ts

import { ProviderError } from '../../errors';
import { Turn } from '../../models/project.model';
import { CatalogEntry, ToolInputSchema } from '../tool/tool.types';

/** Everything the model sees for one call. */
export interface ModelContext {
    systemPrompt: string;
    /** Oldest first; already windowed. */
    turns: Turn[];
}

export interface ModelToolCall {
    id: string;
    name: string;
    /** `null` when the model emitted something that is not a JSON object. */
    arguments: Record<string, unknown> | null;
    rawArguments: string;
}

export type ModelResponse =
    | { kind: 'text'; text: string }
    | { kind: 'tool_calls'; text?: string; calls: ModelToolCall[] };

export type CompletionResult = { ok: true; response: ModelResponse } | { ok: false; error: ProviderError };

export interface ModelClient {
    complete(context: ModelContext, catalog: CatalogEntry[], signal?: AbortSignal): Promise<CompletionResult>;
}

/** One model request and what came back, as written to the project's call log. */
export interface ModelCallRecord {
    callId: string;
    profile: string;
    purpose: 'turn' | 'summary';
    startedAt: string;
    durationMs: number;
    systemPrompt: string;
    turns: Turn[];
    /** Names of the tools offered to the model. */
    tools: string[];
    outcome: { ok: true; response: ModelResponse } | { ok: false; code: string; message: string };
}

export interface ModelCallLog {
    recordModelCall(projectId: string, record: ModelCallRecord): Promise<string>;
}

// OpenAI-compatible chat wire format, shared by every backend.
export interface WireToolCall {
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
}

export type WireMessage =
    | { role: 'system'; content: string }
    | { role: 'user'; content: string }
    | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
    | { role: 'tool'; tool_call_id: string; content: string };

export interface WireTool {
    type: 'function';
    function: { name: string; description: string; parameters: ToolInputSchema };
}

export interface ChatRequestBody {
    model: string;
    messages: WireMessage[];
    tools?: WireTool[];
    max_tokens: number;
    temperature: number;
}

/** The slice of a chat completion the adapter reads. */
export interface ChatCompletionLike {
    choices: Array<{
        message: {
            content: string | null;
            tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
        };
    }>;
}

export type ChatCreateFn = (body: ChatRequestBody, options: { signal?: AbortSignal }) => Promise<ChatCompletionLike>;

export interface ChatBackend {
    readonly name: string;
    create: ChatCreateFn;
}

// src/services/provider/messageMapper.ts

import { v4 as uuidv4 } from 'uuid';
import { Turn, TurnContent } from '../../models/project.model';
import { CatalogEntry } from '../tool/tool.types';
import { ChatCompletionLike, ModelContext, ModelResponse, ModelToolCall, WireMessage, WireTool } from './provider.types';

type ToolResultContent = Extract<TurnContent, { kind: 'tool_result' }>;

export function formatToolResult(content: ToolResultContent): string {
    const lines = [`status: ${content.status}${content.failureKind ? ` (${content.failureKind})` : ''}`];
    if (content.summary) lines.push(content.summary);
    if (content.artifacts.length > 0) {
        lines.push(`artifacts: ${content.artifacts.map((a) => `${a.name} v${a.version}`).join(', ')}`);
    }
    return lines.join('\n');
}

function toWire(turn: Turn): WireMessage {
    const { content } = turn;
    switch (content.kind) {
        case 'text':
            return turn.role === 'user'
                ? { role: 'user', content: content.text }
                : { role: 'assistant', content: content.text };
        case 'tool_calls':
            return {
                role: 'assistant',
                content: content.text ?? null,
                tool_calls: content.calls.map((call) => ({
                    id: call.invocationId,
                    type: 'function',
                    function: { name: call.toolName, arguments: JSON.stringify(call.arguments ?? {}) },
                })),
            };
        case 'tool_result':
            return { role: 'tool', tool_call_id: content.invocationId, content: formatToolResult(content) };
        case 'failure':
            return { role: 'assistant', content: `[${content.reason}] ${content.message}` };
    }
}

/**
 * Translates the windowed conversation into chat messages. Every assistant
 * tool call is answered by exactly one tool message; calls left without a
 * recorded result get a placeholder so the sequence stays well-formed.
 */
export function toChatMessages(context: ModelContext): WireMessage[] {
    const messages: WireMessage[] = [{ role: 'system', content: context.systemPrompt }];
    let pending: string[] = [];

    const flushPending = () => {
        for (const id of pending) {
            messages.push({ role: 'tool', tool_call_id: id, content: 'status: Failed\nNo result was recorded for this call.' });
        }
        pending = [];
    };

    for (const turn of context.turns) {
        const message = toWire(turn);
        if (message.role === 'tool') {
            if (!pending.includes(message.tool_call_id)) continue;
            pending = pending.filter((id) => id !== message.tool_call_id);
            messages.push(message);
            continue;
        }
        flushPending();
        messages.push(message);
        if (message.role === 'assistant' && message.tool_calls) {
            pending = message.tool_calls.map((c) => c.id);
        }
    }
    flushPending();
    return messages;
}

export function toWireTools(catalog: CatalogEntry[]): WireTool[] {
    return catalog.map((entry) => ({
        type: 'function',
        function: { name: entry.name, description: entry.description, parameters: entry.parameters },
    }));
}

function parseArguments(raw: string): Record<string, unknown> | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw.trim() === '' ? '{}' : raw);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
    return Object.fromEntries(Object.entries(parsed));
}

export function fromChatCompletion(completion: ChatCompletionLike): ModelResponse {
    const message = completion.choices[0]?.message;
    const text = message?.content ?? '';
    const toolCalls = message?.tool_calls ?? [];

    if (toolCalls.length === 0) {
        return { kind: 'text', text };
    }

    const calls: ModelToolCall[] = toolCalls.map((call) => ({
        id: call.id || uuidv4(),
        name: call.function.name,
        arguments: parseArguments(call.function.arguments),
        rawArguments: call.function.arguments,
    }));
    return text ? { kind: 'tool_calls', text, calls } : { kind: 'tool_calls', calls };
}

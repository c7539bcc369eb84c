// src/cliFormat.ts

import { Turn } from './models/project.model';
import { StreamChunk } from './services/stream/types';

/** One printable block per turn; the user's own turns print nothing. */
export function formatTurn(turn: Turn): string | null {
    const content = turn.content;
    switch (content.kind) {
        case 'text':
            return turn.role === 'user' ? null : `ASSISTANT> ${content.text}`;
        case 'tool_calls': {
            const calls = content.calls.map(
                (call) => `  -> ${call.toolName} ${call.arguments ? JSON.stringify(call.arguments) : '(unparseable arguments)'}`,
            );
            return [content.text ? `ASSISTANT> ${content.text}` : null, ...calls].filter((l) => l !== null).join('\n');
        }
        case 'tool_result': {
            const status = content.failureKind ? `${content.status} (${content.failureKind})` : content.status;
            const artifacts = content.artifacts.map((a) => `${a.name} v${a.version}`).join(', ');
            const lines = [`  <- ${content.toolName}: ${status}`, ...content.summary.split('\n').map((l) => `     ${l}`)];
            if (artifacts) lines.push(`     artifacts: ${artifacts}`);
            return lines.join('\n');
        }
        case 'failure':
            return `[${content.reason}] ${content.message}`;
    }
}

export function formatChunk(chunk: StreamChunk): string | null {
    switch (chunk.type) {
        case 'turn':
            return formatTurn(chunk.content);
        case 'state':
            return chunk.content.to === 'ToolDispatch' ? '[running tools...]' : null;
        case 'connection_ack':
            return `[connected to ${chunk.projectId}, ${chunk.content.state}]`;
        case 'error':
            return `[error: ${chunk.content.code}] ${chunk.content.message}`;
        case 'stream_end':
            return null;
    }
}

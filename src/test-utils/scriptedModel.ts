// src/test-utils/scriptedModel.ts

import { ProviderError } from '../errors';
import { CompletionResult, ModelClient, ModelContext } from '../services/provider/provider.types';
import { ExecutionResult, SandboxRequest, ToolExecutor } from '../services/sandbox/sandbox.types';
import { CatalogEntry } from '../services/tool/tool.types';
import { FailureKind } from '../models/project.model';

export type ScriptStep =
    | CompletionResult
    | ((context: ModelContext, signal?: AbortSignal) => CompletionResult | Promise<CompletionResult>);

/** Model client that replays a fixed list of responses and records what it was sent. */
export class ScriptedModel implements ModelClient {
    readonly contexts: ModelContext[] = [];
    readonly catalogs: CatalogEntry[][] = [];

    constructor(private readonly steps: ScriptStep[]) {}

    async complete(context: ModelContext, catalog: CatalogEntry[], signal?: AbortSignal): Promise<CompletionResult> {
        this.contexts.push(context);
        this.catalogs.push(catalog);
        const step = this.steps.shift();
        if (!step) throw new Error(`scripted model exhausted after ${this.contexts.length - 1} calls`);
        return typeof step === 'function' ? step(context, signal) : step;
    }
}

export const textReply = (text: string): CompletionResult => ({ ok: true, response: { kind: 'text', text } });

export const toolReply = (...calls: Array<{ name: string; args: Record<string, unknown> | null }>): CompletionResult => ({
    ok: true,
    response: {
        kind: 'tool_calls',
        calls: calls.map((c, i) => ({
            id: `call-${i + 1}`,
            name: c.name,
            arguments: c.args,
            rawArguments: JSON.stringify(c.args),
        })),
    },
});

export const providerFailure = (message: string): CompletionResult => ({
    ok: false,
    error: new ProviderError(message, { profile: 'groq-default', attempts: 5, transient: true, status: 503 }),
});

export function failedExecution(request: SandboxRequest, kind: FailureKind, summary: string): ExecutionResult {
    return {
        invocationId: request.invocationId,
        toolName: request.descriptor.name,
        stdoutExcerpt: '',
        stderrExcerpt: '',
        durationMs: 1,
        attempts: 1,
        status: 'Failed',
        failure: { kind, summary, detailExcerpt: '' },
    };
}

export function succeededExecution(request: SandboxRequest, summary = ''): ExecutionResult {
    return {
        invocationId: request.invocationId,
        toolName: request.descriptor.name,
        stdoutExcerpt: '',
        stderrExcerpt: '',
        durationMs: 1,
        attempts: 1,
        status: 'Succeeded',
        summary,
        artifacts: [],
    };
}

/** Executor driven by a per-call handler; records every request. */
export class FakeExecutor implements ToolExecutor {
    readonly requests: SandboxRequest[] = [];

    constructor(
        private readonly handler: (request: SandboxRequest, signal?: AbortSignal) => Promise<ExecutionResult>,
    ) {}

    async execute(request: SandboxRequest, signal?: AbortSignal): Promise<ExecutionResult> {
        this.requests.push(request);
        return this.handler(request, signal);
    }
}

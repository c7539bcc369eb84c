// src/services/orchestration/OrchestrationLoop.ts

import { EventEmitter } from 'events';
import winston from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { LoopSettings } from '../../config';
import { errorMessage, SchemaValidationError, UnknownToolError } from '../../errors';
import { toArtifactRef } from '../../models/artifact.model';
import { FailureReason, RequestedCall, Turn, TurnDraft } from '../../models/project.model';
import { SessionStateManager, TurnHold } from '../project/SessionStateManager';
import {
    CompletionResult,
    ModelCallLog,
    ModelCallRecord,
    ModelClient,
    ModelContext,
    ModelResponse,
    ModelToolCall,
} from '../provider/provider.types';
import { ToolExecutor } from '../sandbox/sandbox.types';
import { tail } from '../sandbox/failureClassifier';
import { CatalogEntry } from '../tool/tool.types';
import { ToolRegistry } from '../tool/ToolRegistry';
import { buildModelContext } from './ContextBuilder';

export type LoopState = 'AwaitingUser' | 'ModelThinking' | 'ToolDispatch' | 'Responding' | 'Recovering';

export interface StateChange {
    projectId: string;
    from: LoopState;
    to: LoopState;
}

export interface OrchestrationLoopConfig {
    logger: winston.Logger;
    sessions: SessionStateManager;
    registry: ToolRegistry;
    executor: ToolExecutor;
    /** Model client for a project's provider profile. */
    providerFor: (profile: string) => ModelClient;
    settings: LoopSettings;
    /** Receives every model request and its outcome when set. */
    modelCallLog?: ModelCallLog;
}

interface ActiveTurn {
    projectId: string;
    profile: string;
    signal: AbortSignal;
    hold: TurnHold;
    appended: Turn[];
}

type CheckedCall =
    | { ok: true; call: ModelToolCall; invocationId: string; arguments: Record<string, unknown> }
    | { ok: false; call: ModelToolCall; invocationId: string; problem: string };

type DispatchOutcome = 'succeeded' | 'failed' | 'cancelled';

const SKIPPED_AFTER_FAILURE = 'Skipped because an earlier call in the same response failed.';
const SKIPPED_AFTER_CANCEL = 'Skipped because the request was cancelled.';
const NOT_EXECUTED = 'Not executed because another call in the same response was invalid.';

/**
 * Per-project conversational state machine:
 * AwaitingUser → ModelThinking → (ToolDispatch → Recovering?) → Responding → AwaitingUser.
 *
 * Emits `state` ({@link StateChange}) on every transition and `turn` for
 * every appended turn.
 */
export class OrchestrationLoop extends EventEmitter {
    private readonly logger: winston.Logger;
    private readonly sessions: SessionStateManager;
    private readonly registry: ToolRegistry;
    private readonly executor: ToolExecutor;
    private readonly providerFor: (profile: string) => ModelClient;
    private readonly settings: LoopSettings;
    private readonly modelCallLog?: ModelCallLog;
    private readonly states = new Map<string, LoopState>();
    private readonly controllers = new Map<string, AbortController>();

    constructor(config: OrchestrationLoopConfig) {
        super();
        this.logger = config.logger.child({ component: 'OrchestrationLoop' });
        this.sessions = config.sessions;
        this.registry = config.registry;
        this.executor = config.executor;
        this.providerFor = config.providerFor;
        this.settings = config.settings;
        this.modelCallLog = config.modelCallLog;
    }

    public stateOf(projectId: string): LoopState {
        return this.states.get(projectId) ?? 'AwaitingUser';
    }

    /**
     * Processes one user turn to completion and returns every turn it
     * appended. Model and tool failures end up as turns; only persistence
     * and lookup errors are thrown. The project is held for the whole turn,
     * so a second turn or an import fails with ConcurrentModificationError.
     */
    public async handleUserTurn(projectId: string, text: string): Promise<Turn[]> {
        const { profile } = await this.sessions.snapshot(projectId);
        const hold = this.sessions.openTurn(projectId);
        const controller = new AbortController();
        this.controllers.set(projectId, controller);
        const active: ActiveTurn = { projectId, profile, signal: controller.signal, hold, appended: [] };
        this.transition(projectId, 'ModelThinking');

        try {
            await this.append(active, { role: 'user', content: { kind: 'text', text } });
            await this.converse(active);
            return active.appended;
        } catch (error) {
            this.logger.error('User turn aborted', { projectId, error: errorMessage(error) });
            throw error;
        } finally {
            hold.release();
            this.controllers.delete(projectId);
            this.transition(projectId, 'AwaitingUser');
        }
    }

    /** Aborts the in-flight model call or tool run. Returns false when idle. */
    public cancel(projectId: string): boolean {
        const controller = this.controllers.get(projectId);
        if (!controller || controller.signal.aborted) return false;
        this.logger.info('Cancelling turn', { projectId, state: this.stateOf(projectId) });
        controller.abort();
        return true;
    }

    private async converse(active: ActiveTurn): Promise<void> {
        const { projectId, signal } = active;
        const provider = this.providerFor(active.profile);
        let corrections = 0;
        let rounds = 0;

        for (;;) {
            if (signal.aborted) {
                await this.fail(active, 'cancelled', 'The request was cancelled.');
                return;
            }
            if (rounds >= this.settings.maxModelRounds) {
                await this.fail(
                    active,
                    'round_limit',
                    `Stopped after ${rounds} model calls without finishing the request.`,
                );
                return;
            }
            rounds += 1;
            this.transition(projectId, 'ModelThinking');

            const response = await this.callModel(active, provider, false);
            if (!response) return;

            if (response.kind === 'text') {
                this.transition(projectId, 'Responding');
                await this.append(active, { role: 'assistant', content: { kind: 'text', text: response.text } });
                return;
            }

            const checked = response.calls.map((call) => this.check(call));
            if (checked.some((c) => !c.ok)) {
                corrections += 1;
                await this.recordInvalidResponse(active, response.text, checked);
                if (corrections > this.settings.maxCorrectiveRetries) {
                    await this.fail(
                        active,
                        'correction_limit',
                        `The model could not produce valid tool arguments after ${this.settings.maxCorrectiveRetries} corrections.`,
                    );
                    return;
                }
                continue;
            }

            const outcome = await this.dispatch(active, response.text, checked);
            if (outcome === 'cancelled') {
                await this.fail(active, 'cancelled', 'The request was cancelled while a tool was running.');
                return;
            }
            if (outcome === 'failed') {
                continue;
            }

            this.transition(projectId, 'Responding');
            if (this.settings.followUpSummary) {
                const summary = await this.callModel(active, provider, true);
                const text = summary?.kind === 'text' ? summary.text : summary?.text;
                if (text) {
                    await this.append(active, { role: 'assistant', content: { kind: 'text', text } });
                }
            }
            return;
        }
    }

    /**
     * Returns the model's response, or null once a failure turn has been
     * appended. A failed follow-up summary is logged and dropped.
     */
    private async callModel(active: ActiveTurn, provider: ModelClient, summaryRequest: boolean): Promise<ModelResponse | null> {
        const { projectId, signal } = active;
        const project = await this.sessions.snapshot(projectId);
        const artifacts = await this.sessions.artifacts(projectId);
        const context = buildModelContext(project, artifacts, {
            windowTurns: this.settings.contextWindowTurns,
            summaryRequest,
        });

        const catalog = summaryRequest ? [] : this.registry.catalog();
        const startedAt = new Date();
        const result = await provider.complete(context, catalog, signal);
        await this.logModelCall(active, summaryRequest, startedAt, context, catalog, result);
        if (result.ok) return result.response;

        if (result.error.details.cancelled) {
            await this.fail(active, 'cancelled', 'The request was cancelled.');
            return null;
        }
        if (summaryRequest) {
            this.logger.warn('Follow-up summary failed', { projectId, error: result.error.message });
            return null;
        }
        await this.fail(active, 'provider_error', `The model provider is unavailable: ${result.error.message}`);
        return null;
    }

    private async logModelCall(
        active: ActiveTurn,
        summaryRequest: boolean,
        startedAt: Date,
        context: ModelContext,
        catalog: CatalogEntry[],
        result: CompletionResult,
    ): Promise<void> {
        if (!this.modelCallLog) return;
        const record: ModelCallRecord = {
            callId: uuidv4(),
            profile: active.profile,
            purpose: summaryRequest ? 'summary' : 'turn',
            startedAt: startedAt.toISOString(),
            durationMs: Date.now() - startedAt.getTime(),
            systemPrompt: context.systemPrompt,
            turns: context.turns,
            tools: catalog.map((entry) => entry.name),
            outcome: result.ok
                ? { ok: true, response: result.response }
                : { ok: false, code: result.error.code, message: result.error.message },
        };
        try {
            await this.modelCallLog.recordModelCall(active.projectId, record);
        } catch (error) {
            this.logger.warn('Could not write model call log', { projectId: active.projectId, error: errorMessage(error) });
        }
    }

    private check(call: ModelToolCall): CheckedCall {
        const invocationId = uuidv4();
        try {
            return { ok: true, call, invocationId, arguments: this.registry.validate(call.name, call.arguments) };
        } catch (error) {
            if (error instanceof SchemaValidationError) {
                const problem = error.violations.map((v) => `- ${v.path}: ${v.message}`).join('\n');
                return { ok: false, call, invocationId, problem: `Invalid arguments for ${call.name}:\n${problem}` };
            }
            if (error instanceof UnknownToolError) {
                return { ok: false, call, invocationId, problem: `'${call.name}' is not an available tool.` };
            }
            throw error;
        }
    }

    private async recordInvalidResponse(active: ActiveTurn, text: string | undefined, checked: CheckedCall[]): Promise<void> {
        const { projectId } = active;
        const requested = await this.appendCalls(
            active,
            text,
            checked.map((c) => ({ invocationId: c.invocationId, toolName: c.call.name, arguments: c.call.arguments })),
            'Failed',
        );

        this.logger.warn('Model produced invalid tool calls', {
            projectId,
            turnSequence: requested.sequence,
            invalid: checked.filter((c) => !c.ok).map((c) => c.call.name),
        });

        for (const c of checked) {
            await this.append(active, {
                role: 'tool',
                content: {
                    kind: 'tool_result',
                    invocationId: c.invocationId,
                    toolName: c.call.name,
                    status: 'Failed',
                    failureKind: 'SchemaValidation',
                    summary: c.ok ? NOT_EXECUTED : c.problem,
                    artifacts: [],
                },
            });
        }
    }

    private async appendCalls(
        active: ActiveTurn,
        text: string | undefined,
        calls: RequestedCall[],
        status: 'Pending' | 'Failed',
    ): Promise<Turn> {
        const turn = await this.append(active, {
            role: 'assistant',
            content: text ? { kind: 'tool_calls', text, calls } : { kind: 'tool_calls', calls },
        });
        for (const call of calls) {
            await this.sessions.recordInvocation(
                active.projectId,
                {
                    id: call.invocationId,
                    toolName: call.toolName,
                    arguments: call.arguments ?? {},
                    turnSequence: turn.sequence,
                    status,
                },
                active.hold,
            );
        }
        return turn;
    }

    private async dispatch(active: ActiveTurn, text: string | undefined, checked: CheckedCall[]): Promise<DispatchOutcome> {
        const { projectId, signal, hold } = active;
        const calls: RequestedCall[] = [];
        for (const c of checked) {
            if (c.ok) calls.push({ invocationId: c.invocationId, toolName: c.call.name, arguments: c.arguments });
        }
        await this.appendCalls(active, text, calls, 'Pending');
        this.transition(projectId, 'ToolDispatch');

        for (let i = 0; i < calls.length; i++) {
            const call = calls[i];
            if (signal.aborted) {
                await this.skip(active, calls.slice(i), SKIPPED_AFTER_CANCEL);
                return 'cancelled';
            }

            const descriptor = this.registry.resolve(call.toolName);
            await this.sessions.updateInvocation(
                projectId,
                call.invocationId,
                { status: 'Running', startedAt: new Date().toISOString() },
                hold,
            );

            const { artifactIndex } = await this.sessions.snapshot(projectId);
            const result = await this.executor.execute(
                {
                    projectId,
                    invocationId: call.invocationId,
                    descriptor,
                    arguments: call.arguments ?? {},
                    committed: artifactIndex,
                },
                signal,
            );

            if (result.status === 'Succeeded') {
                await this.sessions.recordArtifacts(projectId, result.artifacts, hold);
                await this.sessions.updateInvocation(
                    projectId,
                    call.invocationId,
                    { status: 'Succeeded', finishedAt: new Date().toISOString() },
                    hold,
                );
                await this.append(active, {
                    role: 'tool',
                    content: {
                        kind: 'tool_result',
                        invocationId: call.invocationId,
                        toolName: call.toolName,
                        status: 'Succeeded',
                        summary: bounded(result.summary || `${call.toolName} finished.`, this.settings.errorExcerptChars),
                        artifacts: result.artifacts.map(toArtifactRef),
                    },
                });
                await this.sessions.advanceStage(projectId, descriptor.stage, hold);
                continue;
            }

            this.transition(projectId, 'Recovering');
            const { failure } = result;
            await this.sessions.updateInvocation(
                projectId,
                call.invocationId,
                { status: 'Failed', failureKind: failure.kind, finishedAt: new Date().toISOString() },
                hold,
            );
            const detail = failure.detailExcerpt ? `\n${tail(failure.detailExcerpt, this.settings.errorExcerptChars)}` : '';
            await this.append(active, {
                role: 'tool',
                content: {
                    kind: 'tool_result',
                    invocationId: call.invocationId,
                    toolName: call.toolName,
                    status: 'Failed',
                    failureKind: failure.kind,
                    summary: `${failure.summary}${detail}`,
                    artifacts: [],
                },
            });

            const cancelled = failure.kind === 'Cancelled' || signal.aborted;
            await this.skip(active, calls.slice(i + 1), cancelled ? SKIPPED_AFTER_CANCEL : SKIPPED_AFTER_FAILURE);
            return cancelled ? 'cancelled' : 'failed';
        }
        return 'succeeded';
    }

    private async skip(active: ActiveTurn, calls: RequestedCall[], reason: string): Promise<void> {
        for (const call of calls) {
            await this.sessions.updateInvocation(
                active.projectId,
                call.invocationId,
                { status: 'Failed', failureKind: 'Cancelled', finishedAt: new Date().toISOString() },
                active.hold,
            );
            await this.append(active, {
                role: 'tool',
                content: {
                    kind: 'tool_result',
                    invocationId: call.invocationId,
                    toolName: call.toolName,
                    status: 'Failed',
                    failureKind: 'Cancelled',
                    summary: reason,
                    artifacts: [],
                },
            });
        }
    }

    private async fail(active: ActiveTurn, reason: FailureReason, message: string): Promise<void> {
        this.logger.warn('Turn ended with a failure', { projectId: active.projectId, reason, message });
        await this.append(active, { role: 'assistant', content: { kind: 'failure', reason, message } });
    }

    private async append(active: ActiveTurn, draft: TurnDraft): Promise<Turn> {
        const turn = await this.sessions.append(active.projectId, draft, active.hold);
        active.appended.push(turn);
        this.emit('turn', turn);
        return turn;
    }

    private transition(projectId: string, to: LoopState): void {
        const from = this.stateOf(projectId);
        if (from === to) return;
        if (to === 'AwaitingUser') {
            this.states.delete(projectId);
        } else {
            this.states.set(projectId, to);
        }
        this.logger.debug('Loop state changed', { projectId, from, to });
        const change: StateChange = { projectId, from, to };
        this.emit('state', change);
    }
}

function bounded(text: string, maxChars: number): string {
    return text.length <= maxChars ? text : `${text.slice(0, maxChars - 1)}…`;
}

import { describe, expect, it } from 'vitest';
import { Turn, TurnContent } from '../../models/project.model';
import { formatToolResult, fromChatCompletion, toChatMessages } from './messageMapper';

let sequence = 0;
const turn = (role: Turn['role'], content: TurnContent): Turn => ({
    sequence: ++sequence,
    projectId: 'p1',
    role,
    content,
    timestamp: '2026-01-01T00:00:00.000Z',
});

describe('toChatMessages', () => {
    it('maps every turn kind onto chat messages', () => {
        const messages = toChatMessages({
            systemPrompt: 'system',
            turns: [
                turn('user', { kind: 'text', text: 'impute' }),
                turn('assistant', {
                    kind: 'tool_calls',
                    calls: [{ invocationId: 'inv-1', toolName: 'HyperImputeImputation', arguments: { dataset: 'latest' } }],
                }),
                turn('tool', {
                    kind: 'tool_result',
                    invocationId: 'inv-1',
                    toolName: 'HyperImputeImputation',
                    status: 'Succeeded',
                    summary: 'Imputed 3 values.',
                    artifacts: [{ name: 'dataset', version: 2, contentHash: 'abc' }],
                }),
                turn('assistant', { kind: 'failure', reason: 'provider_error', message: 'The model is unavailable.' }),
            ],
        });

        expect(messages).toEqual([
            { role: 'system', content: 'system' },
            { role: 'user', content: 'impute' },
            {
                role: 'assistant',
                content: null,
                tool_calls: [
                    {
                        id: 'inv-1',
                        type: 'function',
                        function: { name: 'HyperImputeImputation', arguments: '{"dataset":"latest"}' },
                    },
                ],
            },
            { role: 'tool', tool_call_id: 'inv-1', content: 'status: Succeeded\nImputed 3 values.\nartifacts: dataset v2' },
            { role: 'assistant', content: '[provider_error] The model is unavailable.' },
        ]);
    });

    it('answers calls that have no recorded result', () => {
        const messages = toChatMessages({
            systemPrompt: 'system',
            turns: [
                turn('assistant', {
                    kind: 'tool_calls',
                    calls: [{ invocationId: 'inv-9', toolName: 'FeatureSelection', arguments: null }],
                }),
                turn('user', { kind: 'text', text: 'hello?' }),
            ],
        });

        expect(messages.slice(1)).toEqual([
            {
                role: 'assistant',
                content: null,
                tool_calls: [{ id: 'inv-9', type: 'function', function: { name: 'FeatureSelection', arguments: '{}' } }],
            },
            { role: 'tool', tool_call_id: 'inv-9', content: 'status: Failed\nNo result was recorded for this call.' },
            { role: 'user', content: 'hello?' },
        ]);
    });

    it('drops tool results whose call is outside the window', () => {
        const messages = toChatMessages({
            systemPrompt: 'system',
            turns: [
                turn('tool', {
                    kind: 'tool_result',
                    invocationId: 'inv-0',
                    toolName: 'UploadDataFile',
                    status: 'Succeeded',
                    summary: '',
                    artifacts: [],
                }),
                turn('user', { kind: 'text', text: 'next' }),
            ],
        });

        expect(messages).toEqual([
            { role: 'system', content: 'system' },
            { role: 'user', content: 'next' },
        ]);
    });
});

describe('formatToolResult', () => {
    it('includes the failure kind', () => {
        expect(
            formatToolResult({
                kind: 'tool_result',
                invocationId: 'inv-1',
                toolName: 'AutoMLSurvival',
                status: 'Failed',
                failureKind: 'Timeout',
                summary: 'The tool exceeded its time limit and was stopped.',
                artifacts: [],
            }),
        ).toBe('status: Failed (Timeout)\nThe tool exceeded its time limit and was stopped.');
    });
});

describe('fromChatCompletion', () => {
    it('keeps text alongside tool calls', () => {
        expect(
            fromChatCompletion({
                choices: [
                    {
                        message: {
                            content: 'Running imputation.',
                            tool_calls: [{ id: 'c1', function: { name: 'HyperImputeImputation', arguments: '' } }],
                        },
                    },
                ],
            }),
        ).toEqual({
            kind: 'tool_calls',
            text: 'Running imputation.',
            calls: [{ id: 'c1', name: 'HyperImputeImputation', arguments: {}, rawArguments: '' }],
        });
    });

    it('treats array arguments as unparseable', () => {
        const response = fromChatCompletion({
            choices: [{ message: { content: null, tool_calls: [{ id: 'c1', function: { name: 'X', arguments: '[1]' } }] } }],
        });
        expect(response.kind === 'tool_calls' && response.calls[0].arguments).toBeNull();
    });

    it('returns empty text for an empty choice list', () => {
        expect(fromChatCompletion({ choices: [] })).toEqual({ kind: 'text', text: '' });
    });
});

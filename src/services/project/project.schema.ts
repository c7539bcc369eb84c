// src/services/project/project.schema.ts

import { z } from 'zod';
import { PIPELINE_STAGES, PRIVACY_MODES, Project } from '../../models/project.model';

const failureKind = z.enum(['DependencyMissing', 'RuntimeError', 'Timeout', 'ResourceExhausted', 'Cancelled']);

const artifactRef = z.object({
    name: z.string(),
    version: z.number().int().positive(),
    contentHash: z.string(),
});

const turnContent = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('text'), text: z.string() }),
    z.object({
        kind: z.literal('tool_calls'),
        text: z.string().optional(),
        calls: z.array(
            z.object({
                invocationId: z.string(),
                toolName: z.string(),
                arguments: z.record(z.unknown()).nullable(),
            }),
        ),
    }),
    z.object({
        kind: z.literal('tool_result'),
        invocationId: z.string(),
        toolName: z.string(),
        status: z.enum(['Succeeded', 'Failed']),
        failureKind: z.union([failureKind, z.literal('SchemaValidation')]).optional(),
        summary: z.string(),
        artifacts: z.array(artifactRef),
    }),
    z.object({
        kind: z.literal('failure'),
        reason: z.enum(['provider_error', 'correction_limit', 'cancelled', 'round_limit']),
        message: z.string(),
    }),
]);

const turn = z.object({
    sequence: z.number().int().positive(),
    projectId: z.string(),
    role: z.enum(['user', 'assistant', 'tool']),
    content: turnContent,
    timestamp: z.string(),
});

const invocation = z.object({
    id: z.string(),
    toolName: z.string(),
    arguments: z.record(z.unknown()),
    turnSequence: z.number().int().positive(),
    status: z.enum(['Pending', 'Running', 'Succeeded', 'Failed']),
    failureKind: failureKind.optional(),
    startedAt: z.string().optional(),
    finishedAt: z.string().optional(),
});

/** Validates persisted project records on the way back in. Records written before privacy modes existed load as `default`. */
export const projectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z
    .object({
        id: z.string().min(1),
        title: z.string(),
        profile: z.string(),
        privacyMode: z.enum(PRIVACY_MODES).default('default'),
        stage: z.enum(PIPELINE_STAGES),
        createdAt: z.string(),
        updatedAt: z.string(),
        nextSequence: z.number().int().positive(),
        turns: z.array(turn),
        invocations: z.record(invocation),
        artifactIndex: z.record(z.number().int().positive()),
    })
    .superRefine((project, ctx) => {
        project.turns.forEach((t, index) => {
            if (t.sequence !== index + 1) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['turns', index, 'sequence'],
                    message: `expected sequence ${index + 1}, found ${t.sequence}`,
                });
            }
        });
        if (project.nextSequence !== project.turns.length + 1) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['nextSequence'],
                message: `expected ${project.turns.length + 1}`,
            });
        }
    });

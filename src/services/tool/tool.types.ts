// src/services/tool/tool.types.ts

import { z } from 'zod';
import { ArtifactKind } from '../../models/artifact.model';
import { PIPELINE_STAGES, PipelineStage } from '../../models/project.model';

export type ToolParameterProperty = {
    type: string | string[];
    description?: string;
    enum?: Array<string | number>;
    minimum?: number;
    maximum?: number;
    default?: unknown;
    items?: ToolParameterProperty;
    properties?: Record<string, ToolParameterProperty>;
};

// Type aliases rather than interfaces so Ajv accepts them as schema objects.
export type ToolInputSchema = {
    type: 'object';
    properties: Record<string, ToolParameterProperty>;
    required?: string[];
    additionalProperties?: boolean;
};

export interface ArtifactWrite {
    name: string;
    kind: ArtifactKind;
}

export interface ToolSideEffects {
    /** Artifact names copied into the sandbox before the run. */
    reads: string[];
    /** Artifact names that receive exactly one new version per successful run. */
    writes: ArtifactWrite[];
    network: boolean;
    requiresModel: boolean;
}

/** Handle the sandbox runner resolves inside its own environment. */
export interface ToolImplementation {
    entry: string;
    packages: string[];
    timeoutMs?: number;
}

export interface ToolDescriptor {
    name: string;
    displayName: string;
    description: string;
    /** Pipeline stage a successful run advances the project to. */
    stage: PipelineStage;
    inputSchema: ToolInputSchema;
    sideEffects: ToolSideEffects;
    implementation: ToolImplementation;
}

/** Function metadata handed to the model. */
export interface CatalogEntry {
    name: string;
    description: string;
    parameters: ToolInputSchema;
}

const parameterPropertySchema: z.ZodType<ToolParameterProperty> = z.lazy(() =>
    z.object({
        type: z.union([z.string(), z.array(z.string())]),
        description: z.string().optional(),
        enum: z.array(z.union([z.string(), z.number()])).optional(),
        minimum: z.number().optional(),
        maximum: z.number().optional(),
        default: z.unknown().optional(),
        items: parameterPropertySchema.optional(),
        properties: z.record(parameterPropertySchema).optional(),
    }),
);

export const toolDescriptorSchema = z.object({
    name: z.string().regex(/^[A-Za-z][A-Za-z0-9_]{0,63}$/),
    displayName: z.string().optional(),
    description: z.string().min(1),
    stage: z.enum(PIPELINE_STAGES),
    parameters: z.object({
        type: z.literal('object'),
        properties: z.record(parameterPropertySchema),
        required: z.array(z.string()).optional(),
        additionalProperties: z.boolean().optional(),
    }),
    sideEffects: z
        .object({
            reads: z.array(z.string()).default([]),
            writes: z
                .array(
                    z.object({
                        name: z.string(),
                        kind: z.enum(['dataset', 'model', 'figure', 'report', 'file']),
                    }),
                )
                .default([]),
            network: z.boolean().default(false),
            requiresModel: z.boolean().default(false),
        })
        .default({}),
    implementation: z.object({
        entry: z.string().min(1),
        packages: z.array(z.string()).default([]),
        timeoutMs: z.number().int().positive().optional(),
    }),
});

export const toolCatalogFileSchema = z.object({
    tools: z.array(toolDescriptorSchema),
});

export type ToolDescriptorInput = z.input<typeof toolDescriptorSchema>;

export function toToolDescriptor(entry: z.output<typeof toolDescriptorSchema>): ToolDescriptor {
    const reads = [...entry.sideEffects.reads];
    if (entry.sideEffects.requiresModel && !reads.includes('model')) {
        reads.push('model');
    }
    return {
        name: entry.name,
        displayName: entry.displayName ?? entry.name,
        description: entry.description,
        stage: entry.stage,
        inputSchema: entry.parameters,
        sideEffects: { ...entry.sideEffects, reads },
        implementation: entry.implementation,
    };
}

// src/test-utils/fixtures.ts

import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { ToolDescriptor, ToolImplementation, ToolSideEffects } from '../services/tool/tool.types';

export async function makeTempDir(prefix = 'pipeline-test-'): Promise<{ dir: string; cleanup: () => Promise<void> }> {
    const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
    return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function imputeDescriptor(
    overrides: { sideEffects?: Partial<ToolSideEffects>; implementation?: Partial<ToolImplementation> } = {},
): ToolDescriptor {
    return {
        name: 'HyperImputeImputation',
        displayName: 'HyperImpute imputation',
        description: 'Fills missing values in a dataset.',
        stage: 'Engineer',
        inputSchema: {
            type: 'object',
            properties: {
                dataset: { type: 'string', default: 'latest' },
                method: { type: 'string', enum: ['auto', 'mean', 'median', 'missforest'], default: 'auto' },
            },
            required: ['dataset'],
            additionalProperties: false,
        },
        sideEffects: {
            reads: ['dataset'],
            writes: [{ name: 'dataset', kind: 'dataset' }],
            network: false,
            requiresModel: false,
            ...overrides.sideEffects,
        },
        implementation: {
            entry: 'pipeline_tools.engineer.impute',
            packages: ['hyperimpute'],
            ...overrides.implementation,
        },
    };
}

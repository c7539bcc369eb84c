import path from 'path';
import { describe, expect, it } from 'vitest';
import { CONFIG_DIR } from '../../config';
import {
    DuplicateToolError,
    RegistryFrozenError,
    SchemaValidationError,
    UnknownToolError,
} from '../../errors';
import { createNullLogger } from '../../utils/logger';
import { imputeDescriptor } from '../../test-utils/fixtures';
import { ToolRegistry } from './ToolRegistry';

const logger = createNullLogger();

function registryWithImpute(): ToolRegistry {
    const registry = new ToolRegistry({ logger });
    registry.register(imputeDescriptor());
    return registry;
}

function violationsOf(fn: () => unknown): Array<{ path: string; keyword: string; message: string }> {
    try {
        fn();
    } catch (error) {
        if (error instanceof SchemaValidationError) return error.violations;
        throw error;
    }
    throw new Error('expected a SchemaValidationError');
}

describe('ToolRegistry', () => {
    it('resolves registered tools and rejects unknown names', () => {
        const registry = registryWithImpute();

        expect(registry.resolve('HyperImputeImputation').stage).toBe('Engineer');
        expect(() => registry.resolve('Nope')).toThrow(UnknownToolError);
        expect(registry.has('HyperImputeImputation')).toBe(true);
    });

    it('rejects duplicate names', () => {
        const registry = registryWithImpute();
        expect(() => registry.register(imputeDescriptor())).toThrow(DuplicateToolError);
    });

    it('is read-only once frozen', () => {
        const registry = new ToolRegistry({ logger });
        registry.freeze();
        expect(registry.isFrozen()).toBe(true);
        expect(() => registry.register(imputeDescriptor())).toThrow(RegistryFrozenError);
    });

    it('applies defaults without mutating the caller object', () => {
        const registry = registryWithImpute();
        const args = { dataset: 'v1' };

        expect(registry.validate('HyperImputeImputation', args)).toEqual({ dataset: 'v1', method: 'auto' });
        expect(args).toEqual({ dataset: 'v1' });
    });

    it('reports every violation at once', () => {
        const registry = registryWithImpute();

        const violations = violationsOf(() =>
            registry.validate('HyperImputeImputation', { dataset: 'latest', method: 'knn', strategy: 'x' }),
        );

        expect(violations).toHaveLength(2);
        expect(violations).toContainEqual({
            path: '/strategy',
            keyword: 'additionalProperties',
            message: 'is not a parameter of this tool',
        });
        expect(violations).toContainEqual({
            path: '/method',
            keyword: 'enum',
            message: 'must be one of: auto, mean, median, missforest',
        });
    });

    it('treats unparseable arguments as one violation at the root', () => {
        const registry = registryWithImpute();

        expect(violationsOf(() => registry.validate('HyperImputeImputation', null))).toEqual([
            { path: '/', keyword: 'type', message: 'arguments must be a JSON object' },
        ]);
    });

    it('exposes the model-facing catalog', () => {
        const registry = registryWithImpute();

        expect(registry.catalog()).toEqual([
            {
                name: 'HyperImputeImputation',
                description: 'Fills missing values in a dataset.',
                parameters: imputeDescriptor().inputSchema,
            },
        ]);
    });

    it('loads and freezes the bundled catalog', () => {
        const registry = ToolRegistry.fromCatalogFile({ logger }, path.join(CONFIG_DIR, 'tools.json'));

        expect(registry.isFrozen()).toBe(true);
        const stages = new Set(registry.list().map((t) => t.stage));
        expect([...stages].sort()).toEqual(['Done', 'Engineer', 'Explain', 'Explore', 'Ingest', 'Model']);
        expect(registry.resolve('ShapExplainer').sideEffects.reads).toContain('model');
        expect(registry.resolve('HyperImputeImputation').implementation.packages).toEqual(['hyperimpute']);
    });

    it('takes the upload to register as a version of the imported upload artifact', () => {
        const registry = ToolRegistry.fromCatalogFile({ logger }, path.join(CONFIG_DIR, 'tools.json'));
        const upload = registry.resolve('UploadDataFile');

        expect(upload.sideEffects.reads).toEqual(['upload']);
        expect(registry.validate('UploadDataFile', {})).toEqual({ upload: 'latest', format: 'csv' });
        expect(registry.validate('UploadDataFile', { upload: 'v2' })).toEqual({ upload: 'v2', format: 'csv' });
    });
});

import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
    ArtifactNotFoundError,
    ConcurrentModificationError,
    ConfigError,
    ProjectNotFoundError,
    ProviderError,
} from '../errors';
import { toHttpError } from './httpError';

describe('toHttpError', () => {
    it.each([
        [new ProjectNotFoundError('p1'), 404, 'project_not_found'],
        [new ArtifactNotFoundError('p1', 'dataset', 2), 404, 'artifact_not_found'],
        [new ConcurrentModificationError('p1', 'a turn is already being processed'), 409, 'concurrent_modification'],
        [new ConfigError(["unknown provider profile 'x'"]), 400, 'config_error'],
        [new ProviderError('down', { profile: 'groq-default', attempts: 5, transient: true }), 502, 'provider_error'],
    ])('maps %s', (error, status, code) => {
        const mapped = toHttpError(error);
        expect(mapped.status).toBe(status);
        expect(mapped.body).toEqual({ error: error.message, code });
    });

    it('lists request body problems', () => {
        const parsed = z.object({ text: z.string() }).safeParse({});
        if (parsed.success) throw new Error('expected a parse failure');

        const mapped = toHttpError(parsed.error);
        expect(mapped.status).toBe(400);
        expect(mapped.body.code).toBe('invalid_request');
        expect(mapped.body.details).toEqual(['text: Required']);
    });

    it('reports unexpected errors as internal', () => {
        expect(toHttpError(new Error('disk full'))).toEqual({
            status: 500,
            body: { error: 'disk full', code: 'internal_error' },
        });
    });
});

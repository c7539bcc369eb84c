// src/routes/httpError.ts

import { ZodError } from 'zod';
import { errorMessage, OrchestratorError } from '../errors';

export interface HttpError {
    status: number;
    body: { error: string; code: string; details?: unknown };
}

const STATUS_BY_CODE: Record<OrchestratorError['code'], number> = {
    project_not_found: 404,
    artifact_not_found: 404,
    unknown_tool: 404,
    concurrent_modification: 409,
    schema_validation: 400,
    config_error: 400,
    provider_error: 502,
    persistence_error: 500,
    duplicate_tool: 500,
    registry_frozen: 500,
};

export function toHttpError(error: unknown): HttpError {
    if (error instanceof ZodError) {
        return {
            status: 400,
            body: {
                error: 'Invalid request body',
                code: 'invalid_request',
                details: error.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
            },
        };
    }
    if (error instanceof OrchestratorError) {
        return { status: STATUS_BY_CODE[error.code], body: { error: error.message, code: error.code } };
    }
    return { status: 500, body: { error: errorMessage(error), code: 'internal_error' } };
}

// src/routes/projects.ts

import express, { Request, Response } from 'express';
import winston from 'winston';
import { z } from 'zod';
import { PRIVACY_MODES } from '../models/project.model';
import { OrchestrationLoop } from '../services/orchestration/OrchestrationLoop';
import { SessionStateManager } from '../services/project/SessionStateManager';
import { ArtifactStore } from '../services/artifact/ArtifactStore';
import { toHttpError } from './httpError';

export interface ProjectsRouterDeps {
    logger: winston.Logger;
    sessions: SessionStateManager;
    loop: OrchestrationLoop;
    artifactStore: ArtifactStore;
}

const SEGMENT = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

const createProjectBody = z.object({
    title: z.string().max(200).optional(),
    profile: z.string().min(1).optional(),
    privacyMode: z.enum(PRIVACY_MODES).optional(),
});

const userTurnBody = z.object({
    text: z.string().trim().min(1),
});

// Uploads land under `upload`, the name UploadDataFile reads.
const importBody = z.object({
    name: z.string().regex(SEGMENT, 'must be a plain name').default('upload'),
    kind: z.enum(['dataset', 'model', 'figure', 'report', 'file']).optional(),
    fileName: z.string().regex(SEGMENT, 'must be a plain file name'),
    contentBase64: z.string().min(1),
});

const versionParam = z.coerce.number().int().positive();

export function createProjectsRouter({ logger, sessions, loop, artifactStore }: ProjectsRouterDeps): express.Router {
    const router = express.Router();

    const fail = (res: Response, req: Request, error: unknown) => {
        const { status, body } = toHttpError(error);
        if (status >= 500) {
            logger.error('Request failed', { method: req.method, path: req.originalUrl, error: body.error });
        }
        res.status(status).json(body);
    };

    router.post('/', async (req: Request, res: Response) => {
        try {
            const input = createProjectBody.parse(req.body ?? {});
            const project = await sessions.createProject(input);
            res.status(201).json(project);
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.get('/', async (req: Request, res: Response) => {
        try {
            res.json(await sessions.listProjects());
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.get('/:projectId', async (req: Request, res: Response) => {
        try {
            const project = await sessions.snapshot(req.params.projectId);
            res.json({ ...project, state: loop.stateOf(project.id) });
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.delete('/:projectId', async (req: Request, res: Response) => {
        try {
            await sessions.deleteProject(req.params.projectId);
            res.json({ success: true });
        } catch (error) {
            fail(res, req, error);
        }
    });

    // Runs the whole turn before answering; WebSocket clients see it live.
    router.post('/:projectId/turns', async (req: Request, res: Response) => {
        try {
            const { text } = userTurnBody.parse(req.body);
            const turns = await loop.handleUserTurn(req.params.projectId, text);
            res.json({ turns });
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.post('/:projectId/cancel', (req: Request, res: Response) => {
        res.json({ cancelled: loop.cancel(req.params.projectId) });
    });

    router.get('/:projectId/artifacts', async (req: Request, res: Response) => {
        try {
            const name = typeof req.query.name === 'string' ? req.query.name : undefined;
            res.json(await sessions.artifacts(req.params.projectId, name));
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.get('/:projectId/artifacts/:name/versions/:version', async (req: Request, res: Response) => {
        try {
            const version = versionParam.parse(req.params.version);
            const [artifact] = await sessions.artifacts(req.params.projectId, req.params.name, version);
            res.json(artifact);
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.get('/:projectId/artifacts/:name/versions/:version/content', async (req: Request, res: Response) => {
        try {
            const version = versionParam.parse(req.params.version);
            const [artifact] = await sessions.artifacts(req.params.projectId, req.params.name, version);
            res.type('application/octet-stream').send(await artifactStore.read(artifact));
        } catch (error) {
            fail(res, req, error);
        }
    });

    router.post('/:projectId/artifacts/import', async (req: Request, res: Response) => {
        try {
            const input = importBody.parse(req.body);
            const artifact = await sessions.importArtifact(req.params.projectId, {
                name: input.name,
                kind: input.kind,
                fileName: input.fileName,
                content: Buffer.from(input.contentBase64, 'base64'),
            });
            res.status(201).json(artifact);
        } catch (error) {
            fail(res, req, error);
        }
    });

    return router;
}

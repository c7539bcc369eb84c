// src/app.ts

import express from 'express';
import cors from 'cors';
import winston from 'winston';
import { createProjectsRouter } from './routes/projects';
import { createToolsRouter } from './routes/tools';
import { ArtifactStore } from './services/artifact/ArtifactStore';
import { OrchestrationLoop } from './services/orchestration/OrchestrationLoop';
import { SessionStateManager } from './services/project/SessionStateManager';
import { ToolRegistry } from './services/tool/ToolRegistry';

export interface AppDeps {
    logger: winston.Logger;
    sessions: SessionStateManager;
    loop: OrchestrationLoop;
    artifactStore: ArtifactStore;
    registry: ToolRegistry;
}

export function createApp({ logger, sessions, loop, artifactStore, registry }: AppDeps): express.Express {
    const app = express();
    app.use(cors());
    app.use(express.json({ limit: '50mb' }));

    app.use('/api/projects', createProjectsRouter({ logger, sessions, loop, artifactStore }));
    app.use('/api/tools', createToolsRouter(registry));

    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    return app;
}

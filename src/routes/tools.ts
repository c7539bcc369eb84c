// src/routes/tools.ts

import express, { Request, Response } from 'express';
import { ToolRegistry } from '../services/tool/ToolRegistry';

export function createToolsRouter(registry: ToolRegistry): express.Router {
    const router = express.Router();

    router.get('/', (_req: Request, res: Response) => {
        res.json(
            registry.list().map((tool) => ({
                name: tool.name,
                displayName: tool.displayName,
                description: tool.description,
                stage: tool.stage,
                parameters: tool.inputSchema,
                reads: tool.sideEffects.reads,
                writes: tool.sideEffects.writes,
            })),
        );
    });

    return router;
}

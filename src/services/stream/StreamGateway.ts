// src/services/stream/StreamGateway.ts
import { toHttpError } from '../../routes/httpError';
import { BaseService } from '../base/BaseService';
import type { OrchestrationLoop } from '../orchestration/OrchestrationLoop';
import type { SessionStateManager } from '../project/SessionStateManager';
import { StreamManager } from './StreamManager';
import { ClientSocket, clientMessageSchema, StreamChunk, StreamConfig } from './types';

export interface StreamGatewayConfig extends StreamConfig {
  sessions: SessionStateManager;
  loop: OrchestrationLoop;
  streams: StreamManager;
}

/** Close code for a connection to a project that does not exist. */
export const UNKNOWN_PROJECT_CLOSE_CODE = 1008;

/** `/<projectId>?...` to the project id. */
export function projectIdFromUrl(url: string | undefined): string {
  return decodeURIComponent((url ?? '/').slice(1).split('?')[0]);
}

/**
 * WebSocket side of the API: admits clients to a project's stream and turns
 * their messages into loop calls.
 */
export class StreamGateway extends BaseService {
  private readonly sessions: SessionStateManager;
  private readonly loop: OrchestrationLoop;
  private readonly streams: StreamManager;

  constructor(config: StreamGatewayConfig) {
    super(config);
    this.sessions = config.sessions;
    this.loop = config.loop;
    this.streams = config.streams;
  }

  /** Returns false, after telling the client why and closing it, for an unknown project. */
  async accept(projectId: string, ws: ClientSocket): Promise<boolean> {
    try {
      await this.sessions.snapshot(projectId);
    } catch (error) {
      ws.send(JSON.stringify(errorChunk(projectId, error)));
      ws.close(UNKNOWN_PROJECT_CLOSE_CODE, 'unknown project');
      return false;
    }

    this.streams.addConnection(projectId, ws);
    const ack: StreamChunk = { type: 'connection_ack', projectId, content: { state: this.loop.stateOf(projectId) } };
    ws.send(JSON.stringify(ack));
    return true;
  }

  disconnect(projectId: string, ws: ClientSocket): void {
    this.streams.removeConnection(projectId, ws);
  }

  /** Failures go back to the project's clients as `error` chunks. */
  async handleMessage(projectId: string, raw: string): Promise<void> {
    try {
      const message = clientMessageSchema.parse(JSON.parse(raw));
      if (message.type === 'cancel') {
        this.loop.cancel(projectId);
        return;
      }
      const appended = await this.loop.handleUserTurn(projectId, message.text);
      this.streams.sendChunk(projectId, { type: 'stream_end', projectId, content: { appended: appended.length } });
    } catch (error) {
      const chunk = errorChunk(projectId, error);
      this.logger.warn('WebSocket message failed', { projectId, error: chunk.content.message });
      this.streams.sendChunk(projectId, chunk);
    }
  }
}

function errorChunk(projectId: string, error: unknown): Extract<StreamChunk, { type: 'error' }> {
  const { body } = toHttpError(error);
  return { type: 'error', projectId, content: { code: body.code, message: body.error } };
}

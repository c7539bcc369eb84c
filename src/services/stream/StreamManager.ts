// src/services/stream/StreamManager.ts
import { EventEmitter } from 'events';
import { WebSocket } from 'ws';
import { BaseService } from '../base/BaseService';
import { Turn } from '../../models/project.model';
import type { StateChange } from '../orchestration/OrchestrationLoop';
import { StreamChunk, StreamConfig, StreamSocket } from './types';

/**
 * Fans loop events out to every WebSocket client watching a project. A
 * project may have several clients; each client watches one project.
 */
export class StreamManager extends BaseService {
  private readonly connections = new Map<string, Set<StreamSocket>>();

  constructor(config: StreamConfig) {
    super(config);
  }

  addConnection(projectId: string, ws: StreamSocket): void {
    let clients = this.connections.get(projectId);
    if (!clients) {
      clients = new Set();
      this.connections.set(projectId, clients);
    }
    clients.add(ws);
    this.logger.info('WebSocket connection added', { projectId, clients: clients.size });
  }

  /** Returns false when the socket was not registered for the project. */
  removeConnection(projectId: string, ws: StreamSocket): boolean {
    const clients = this.connections.get(projectId);
    if (!clients || !clients.delete(ws)) {
      this.logger.debug('Attempted to remove non-existent connection', { projectId });
      return false;
    }
    if (clients.size === 0) this.connections.delete(projectId);
    this.logger.info('WebSocket connection removed', { projectId });
    return true;
  }

  connectionCount(projectId: string): number {
    return this.connections.get(projectId)?.size ?? 0;
  }

  sendChunk(projectId: string, chunk: StreamChunk): void {
    const clients = this.connections.get(projectId);
    if (!clients) return;

    const payload = JSON.stringify(chunk);
    for (const ws of clients) {
      if (ws.readyState !== WebSocket.OPEN) continue;
      try {
        ws.send(payload);
      } catch (error) {
        this.logger.error('Failed to send chunk, dropping client', {
          projectId,
          type: chunk.type,
          error: error instanceof Error ? error.message : String(error),
        });
        ws.terminate();
        this.removeConnection(projectId, ws);
      }
    }
    this.logger.debug('Sent chunk', { projectId, type: chunk.type });
  }

  /** Forwards the loop's `state` and `turn` events to subscribed clients. */
  attach(loop: EventEmitter): void {
    loop.on('state', (change: StateChange) => {
      this.sendChunk(change.projectId, { type: 'state', projectId: change.projectId, content: change });
    });
    loop.on('turn', (turn: Turn) => {
      this.sendChunk(turn.projectId, { type: 'turn', projectId: turn.projectId, content: turn });
    });
  }

  closeAll(): void {
    for (const clients of this.connections.values()) {
      for (const ws of clients) ws.terminate();
    }
    this.connections.clear();
  }
}

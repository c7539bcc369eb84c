import { z } from 'zod';
import { ServiceConfig } from '../base/types';
import { Turn } from '../../models/project.model';
import type { LoopState, StateChange } from '../orchestration/OrchestrationLoop';

export type StreamConfig = ServiceConfig;

/** The part of a WebSocket the manager writes to. */
export interface StreamSocket {
  readonly readyState: number;
  send(data: string): void;
  terminate(): void;
}

/** A connecting client, which the gateway may turn away. */
export interface ClientSocket extends StreamSocket {
  close(code?: number, reason?: string): void;
}

// Messages sent to clients subscribed to a project.
export type StreamChunk =
  | { type: 'connection_ack'; projectId: string; content: { state: LoopState } }
  | { type: 'state'; projectId: string; content: StateChange }
  | { type: 'turn'; projectId: string; content: Turn }
  | { type: 'stream_end'; projectId: string; content: { appended: number } }
  | { type: 'error'; projectId: string; content: { code: string; message: string } };

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('user_turn'), text: z.string().trim().min(1) }),
  z.object({ type: z.literal('cancel') }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

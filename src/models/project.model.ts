// src/models/project.model.ts

import { ArtifactRef } from './artifact.model';

export const PIPELINE_STAGES = ['Ingest', 'Explore', 'Engineer', 'Model', 'Explain', 'Done'] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export function stageRank(stage: PipelineStage): number {
    return PIPELINE_STAGES.indexOf(stage);
}

/** `guardrail` tells the model not to look at raw data values. */
export const PRIVACY_MODES = ['default', 'guardrail'] as const;
export type PrivacyMode = (typeof PRIVACY_MODES)[number];

export type TurnRole = 'user' | 'assistant' | 'tool';

export type InvocationStatus = 'Pending' | 'Running' | 'Succeeded' | 'Failed';

export type FailureKind = 'DependencyMissing' | 'RuntimeError' | 'Timeout' | 'ResourceExhausted' | 'Cancelled';

export interface ToolInvocation {
    id: string;
    toolName: string;
    arguments: Record<string, unknown>;
    /** Sequence number of the assistant turn that requested it. */
    turnSequence: number;
    status: InvocationStatus;
    failureKind?: FailureKind;
    startedAt?: string;
    finishedAt?: string;
}

export interface RequestedCall {
    invocationId: string;
    toolName: string;
    arguments: Record<string, unknown> | null;
}

export type FailureReason = 'provider_error' | 'correction_limit' | 'cancelled' | 'round_limit';

export type TurnContent =
    | { kind: 'text'; text: string }
    | { kind: 'tool_calls'; text?: string; calls: RequestedCall[] }
    | {
          kind: 'tool_result';
          invocationId: string;
          toolName: string;
          status: 'Succeeded' | 'Failed';
          failureKind?: FailureKind | 'SchemaValidation';
          summary: string;
          artifacts: ArtifactRef[];
      }
    | { kind: 'failure'; reason: FailureReason; message: string };

export interface Turn {
    sequence: number;
    projectId: string;
    role: TurnRole;
    content: TurnContent;
    timestamp: string;
}

export type TurnDraft = Pick<Turn, 'role' | 'content'>;

export interface Project {
    id: string;
    title: string;
    /** Provider profile used for this project's model calls. */
    profile: string;
    privacyMode: PrivacyMode;
    stage: PipelineStage;
    createdAt: string;
    updatedAt: string;
    nextSequence: number;
    turns: Turn[];
    invocations: Record<string, ToolInvocation>;
    /** Latest committed version per artifact name; the only versions tools and the model see. */
    artifactIndex: Record<string, number>;
}

// src/models/artifact.model.ts

export type ArtifactKind = 'dataset' | 'model' | 'figure' | 'report' | 'file';

export interface Artifact {
    projectId: string;
    name: string;
    /** Monotonic per (projectId, name), starting at 1. */
    version: number;
    kind: ArtifactKind;
    /** Invocation id, or `upload` for imported files. */
    producedBy: string;
    /** Absolute path of the stored content. */
    location: string;
    /** sha256 of the content, hex encoded. */
    contentHash: string;
    size: number;
    createdAt: string;
}

export interface ArtifactRef {
    name: string;
    version: number;
    contentHash: string;
}

export function toArtifactRef(artifact: Artifact): ArtifactRef {
    return { name: artifact.name, version: artifact.version, contentHash: artifact.contentHash };
}

// src/errors.ts

export type ErrorCode =
  | 'schema_validation'
  | 'unknown_tool'
  | 'duplicate_tool'
  | 'registry_frozen'
  | 'provider_error'
  | 'concurrent_modification'
  | 'persistence_error'
  | 'project_not_found'
  | 'artifact_not_found'
  | 'config_error';

export abstract class OrchestratorError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface SchemaViolation {
  /** JSON pointer into the arguments object, `/` for the object itself. */
  path: string;
  keyword: string;
  message: string;
}

export class SchemaValidationError extends OrchestratorError {
  readonly code = 'schema_validation';

  constructor(
    public readonly toolName: string,
    public readonly violations: SchemaViolation[],
  ) {
    super(
      `Arguments for '${toolName}' violate its schema: ` +
        violations.map((v) => `${v.path} ${v.message}`).join('; '),
    );
  }
}

export class UnknownToolError extends OrchestratorError {
  readonly code = 'unknown_tool';

  constructor(public readonly toolName: string) {
    super(`Unknown tool: '${toolName}'`);
  }
}

export class DuplicateToolError extends OrchestratorError {
  readonly code = 'duplicate_tool';

  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' is already registered`);
  }
}

export class RegistryFrozenError extends OrchestratorError {
  readonly code = 'registry_frozen';

  constructor(toolName: string) {
    super(`Cannot register '${toolName}': the tool registry is read-only after startup`);
  }
}

export interface ProviderErrorDetails {
  profile: string;
  attempts: number;
  transient: boolean;
  cancelled?: boolean;
  status?: number;
}

export class ProviderError extends OrchestratorError {
  readonly code = 'provider_error';

  constructor(
    message: string,
    public readonly details: ProviderErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConcurrentModificationError extends OrchestratorError {
  readonly code = 'concurrent_modification';

  constructor(public readonly projectId: string, reason: string) {
    super(`Project ${projectId} is being modified concurrently: ${reason}`);
  }
}

export class PersistenceError extends OrchestratorError {
  readonly code = 'persistence_error';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ProjectNotFoundError extends OrchestratorError {
  readonly code = 'project_not_found';

  constructor(public readonly projectId: string) {
    super(`Project not found: ${projectId}`);
  }
}

export class ArtifactNotFoundError extends OrchestratorError {
  readonly code = 'artifact_not_found';

  constructor(
    public readonly projectId: string,
    public readonly artifactName: string,
    public readonly version?: number,
  ) {
    super(
      version === undefined
        ? `Artifact '${artifactName}' not found in project ${projectId}`
        : `Artifact '${artifactName}' version ${version} not found in project ${projectId}`,
    );
  }
}

export class ConfigError extends OrchestratorError {
  readonly code = 'config_error';

  constructor(public readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

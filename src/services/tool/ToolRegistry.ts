// src/services/tool/ToolRegistry.ts

import fs from 'fs';
import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import {
    DuplicateToolError,
    RegistryFrozenError,
    SchemaValidationError,
    SchemaViolation,
    UnknownToolError,
} from '../../errors';
import { CatalogEntry, ToolDescriptor, toolCatalogFileSchema, toToolDescriptor } from './tool.types';

interface RegisteredTool {
    descriptor: ToolDescriptor;
    validate: ValidateFunction;
}

/**
 * Process-wide catalog of analysis tools. Populated once at startup, then
 * frozen; lookups and validation are safe from any number of project loops.
 */
export class ToolRegistry extends BaseService {
    private readonly tools = new Map<string, RegisteredTool>();
    private readonly ajv: Ajv;
    private frozen = false;

    constructor(config: ServiceConfig) {
        super(config);
        this.ajv = new Ajv({ allErrors: true, coerceTypes: true, useDefaults: true, allowUnionTypes: true });
    }

    /**
     * Builds a frozen registry from a `{ "tools": [...] }` catalog file.
     */
    static fromCatalogFile(config: ServiceConfig, catalogPath: string): ToolRegistry {
        const raw: unknown = JSON.parse(fs.readFileSync(catalogPath, 'utf-8'));
        const parsed = toolCatalogFileSchema.parse(raw);

        const registry = new ToolRegistry(config);
        for (const entry of parsed.tools) {
            registry.register(toToolDescriptor(entry));
        }
        registry.freeze();

        registry.logger.info('Tool catalog loaded', {
            path: catalogPath,
            totalTools: registry.tools.size,
            toolsByStage: registry.describeStages(),
        });
        return registry;
    }

    public register(descriptor: ToolDescriptor): void {
        if (this.frozen) {
            throw new RegistryFrozenError(descriptor.name);
        }
        if (this.tools.has(descriptor.name)) {
            throw new DuplicateToolError(descriptor.name);
        }

        const validate = this.ajv.compile(descriptor.inputSchema);
        this.tools.set(descriptor.name, { descriptor: Object.freeze(descriptor), validate });
        this.logger.debug('Tool registered', { toolName: descriptor.name, stage: descriptor.stage });
    }

    public freeze(): void {
        this.frozen = true;
    }

    public isFrozen(): boolean {
        return this.frozen;
    }

    public resolve(name: string): ToolDescriptor {
        const tool = this.tools.get(name);
        if (!tool) throw new UnknownToolError(name);
        return tool.descriptor;
    }

    public has(name: string): boolean {
        return this.tools.has(name);
    }

    /**
     * Coerces and checks arguments against the tool's input schema.
     * Reports every violation at once, never just the first.
     */
    public validate(name: string, args: Record<string, unknown> | null): Record<string, unknown> {
        const tool = this.tools.get(name);
        if (!tool) throw new UnknownToolError(name);

        if (args === null || typeof args !== 'object' || Array.isArray(args)) {
            throw new SchemaValidationError(name, [
                { path: '/', keyword: 'type', message: 'arguments must be a JSON object' },
            ]);
        }

        const candidate = structuredClone(args);
        if (tool.validate(candidate)) {
            return candidate;
        }

        const violations = (tool.validate.errors ?? []).map(toViolation);
        this.logger.warn('Tool arguments failed validation', { toolName: name, violations });
        throw new SchemaValidationError(name, violations);
    }

    public list(): ToolDescriptor[] {
        return Array.from(this.tools.values(), (t) => t.descriptor);
    }

    public catalog(): CatalogEntry[] {
        return this.list().map((d) => ({
            name: d.name,
            description: d.description,
            parameters: d.inputSchema,
        }));
    }

    private describeStages(): Record<string, string[]> {
        const byStage: Record<string, string[]> = {};
        for (const { descriptor } of this.tools.values()) {
            (byStage[descriptor.stage] ??= []).push(descriptor.name);
        }
        return byStage;
    }
}

function toViolation(error: ErrorObject): SchemaViolation {
    const base = error.instancePath;
    switch (error.keyword) {
        case 'required': {
            const missing = String(error.params.missingProperty);
            return { path: `${base}/${missing}`, keyword: 'required', message: 'is required' };
        }
        case 'additionalProperties': {
            const extra = String(error.params.additionalProperty);
            return {
                path: `${base}/${extra}`,
                keyword: 'additionalProperties',
                message: 'is not a parameter of this tool',
            };
        }
        case 'enum': {
            const allowed = Array.isArray(error.params.allowedValues)
                ? error.params.allowedValues.map(String).join(', ')
                : '';
            return { path: base || '/', keyword: 'enum', message: `must be one of: ${allowed}` };
        }
        default:
            return { path: base || '/', keyword: error.keyword, message: error.message ?? 'is invalid' };
    }
}

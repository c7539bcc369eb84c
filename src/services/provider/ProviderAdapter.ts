// src/services/provider/ProviderAdapter.ts

import winston from 'winston';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { AppConfig, ProviderProfile, RetrySettings } from '../../config';
import { ConfigError, errorMessage, ProviderError } from '../../errors';
import { CatalogEntry } from '../tool/tool.types';
import { createChatBackend } from './backends';
import { fromChatCompletion, toChatMessages, toWireTools } from './messageMapper';
import { ChatBackend, ChatRequestBody, CompletionResult, ModelClient, ModelContext } from './provider.types';
import { backoffDelay, classifyProviderFailure, sleep, SleepFn } from './retry';

export interface ProviderAdapterConfig extends ServiceConfig {
    profileName: string;
    profile: ProviderProfile;
    backend: ChatBackend;
    retry: RetrySettings;
    sleep?: SleepFn;
}

/**
 * Uniform model-completion interface over the configured chat backend.
 * Never throws: failures come back as `{ ok: false, error }`.
 */
export class ProviderAdapter extends BaseService implements ModelClient {
    public readonly profileName: string;
    private readonly profile: ProviderProfile;
    private readonly backend: ChatBackend;
    private readonly retry: RetrySettings;
    private readonly wait: SleepFn;

    constructor(config: ProviderAdapterConfig) {
        super(config);
        this.profileName = config.profileName;
        this.profile = config.profile;
        this.backend = config.backend;
        this.retry = config.retry;
        this.wait = config.sleep ?? sleep;
    }

    public async complete(context: ModelContext, catalog: CatalogEntry[], signal?: AbortSignal): Promise<CompletionResult> {
        const body: ChatRequestBody = {
            model: this.profile.model,
            messages: toChatMessages(context),
            max_tokens: this.profile.maxTokens,
            temperature: this.profile.temperature,
        };
        if (catalog.length > 0) {
            body.tools = toWireTools(catalog);
        }

        for (let attempt = 1; ; attempt++) {
            if (signal?.aborted) {
                return this.cancelled(attempt - 1);
            }

            try {
                const completion = await this.backend.create(body, { signal });
                const response = fromChatCompletion(completion);
                this.logger.info('Model response received', {
                    profile: this.profileName,
                    backend: this.backend.name,
                    kind: response.kind,
                    toolCalls: response.kind === 'tool_calls' ? response.calls.map((c) => c.name) : [],
                    attempt,
                });
                return { ok: true, response };
            } catch (error) {
                if (signal?.aborted) {
                    return this.cancelled(attempt);
                }

                const { transient, status } = classifyProviderFailure(error);
                const retriesUsed = attempt - 1;
                if (!transient || retriesUsed >= this.retry.maxRetries) {
                    this.logger.error('Model call failed', {
                        profile: this.profileName,
                        backend: this.backend.name,
                        attempts: attempt,
                        transient,
                        status,
                        error: errorMessage(error),
                    });
                    const reason = transient ? `gave up after ${attempt} attempts` : 'request rejected';
                    return {
                        ok: false,
                        error: new ProviderError(
                            `Model provider '${this.profileName}' ${reason}: ${errorMessage(error)}`,
                            { profile: this.profileName, attempts: attempt, transient, status },
                            { cause: error },
                        ),
                    };
                }

                const delay = backoffDelay(retriesUsed, this.retry);
                this.logger.warn('Transient model failure, retrying', {
                    profile: this.profileName,
                    attempt,
                    status,
                    delayMs: delay,
                    error: errorMessage(error),
                });
                await this.wait(delay, signal);
            }
        }
    }

    private cancelled(attempts: number): CompletionResult {
        return {
            ok: false,
            error: new ProviderError(`Model call to '${this.profileName}' was cancelled`, {
                profile: this.profileName,
                attempts,
                transient: false,
                cancelled: true,
            }),
        };
    }
}

/**
 * Builds the adapter for a named profile, resolving its credential from the
 * configured environment.
 */
export function createProviderAdapter(config: AppConfig, profileName: string, logger: winston.Logger): ProviderAdapter {
    const profile = config.providers[profileName];
    if (!profile) {
        throw new ConfigError([`unknown provider profile '${profileName}'`]);
    }
    const backend = createChatBackend(profile, config.credentials[profile.apiKeyEnv]);
    return new ProviderAdapter({ logger, profileName, profile, backend, retry: config.providerRetry });
}

// src/services/provider/backends.ts

import Groq from 'groq-sdk';
import OpenAI, { AzureOpenAI } from 'openai';
import { ProviderProfile } from '../../config';
import { ConfigError } from '../../errors';
import { ChatBackend } from './provider.types';

/**
 * Builds the SDK client for a profile. Retries are handled by the adapter,
 * so every SDK client runs with `maxRetries: 0`.
 */
export function createChatBackend(profile: ProviderProfile, apiKey: string | undefined): ChatBackend {
    if (!apiKey) {
        throw new ConfigError([`${profile.apiKeyEnv} is required for the '${profile.backend}' backend`]);
    }

    switch (profile.backend) {
        case 'groq': {
            const client = new Groq({ apiKey, baseURL: profile.baseURL, maxRetries: 0 });
            return {
                name: 'groq',
                create: (body, options) => client.chat.completions.create({ ...body, stream: false }, options),
            };
        }
        case 'openai': {
            const client = new OpenAI({ apiKey, baseURL: profile.baseURL, maxRetries: 0 });
            return {
                name: 'openai',
                create: (body, options) => client.chat.completions.create({ ...body, stream: false }, options),
            };
        }
        case 'azure-openai': {
            const client = new AzureOpenAI({
                apiKey,
                endpoint: profile.endpoint,
                deployment: profile.deployment,
                apiVersion: profile.apiVersion,
                maxRetries: 0,
            });
            return {
                name: 'azure-openai',
                create: (body, options) => client.chat.completions.create({ ...body, stream: false }, options),
            };
        }
    }
}

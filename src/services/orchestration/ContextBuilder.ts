// src/services/orchestration/ContextBuilder.ts

import { Artifact } from '../../models/artifact.model';
import { Project, Turn } from '../../models/project.model';
import { ModelContext } from '../provider/provider.types';
import {
    FOLLOW_UP_SUMMARY_INSTRUCTION,
    PIPELINE_SYSTEM_PROMPT_TEMPLATE,
    PRIVACY_GUARDRAIL_INSTRUCTION,
} from './prompts/pipelinePrompt';

export interface ContextOptions {
    windowTurns: number;
    /** Appends the follow-up summary instruction to the system prompt. */
    summaryRequest?: boolean;
}

/**
 * Last `windowTurns` turns, with the start moved past tool results whose
 * requesting assistant turn fell outside the window. The window always
 * reaches back to the latest user turn, even if that makes it longer.
 */
export function selectWindow(turns: Turn[], windowTurns: number): { window: Turn[]; elided: Turn[] } {
    let start = Math.max(0, turns.length - windowTurns);
    while (start < turns.length && turns[start].role === 'tool') {
        start += 1;
    }
    const lastUser = turns.map((t) => t.role).lastIndexOf('user');
    if (lastUser !== -1 && lastUser < start) {
        start = lastUser;
    }
    return { window: turns.slice(start), elided: turns.slice(0, start) };
}

export function summariseElided(elided: Turn[]): string {
    if (elided.length === 0) return 'nothing omitted.';

    const userRequests = elided.filter((t) => t.role === 'user' && t.content.kind === 'text').length;
    const succeeded = new Set<string>();
    const failed = new Set<string>();
    for (const turn of elided) {
        if (turn.content.kind !== 'tool_result') continue;
        (turn.content.status === 'Succeeded' ? succeeded : failed).add(turn.content.toolName);
    }

    const parts = [`${elided.length} earlier turns omitted (${userRequests} user requests)`];
    if (succeeded.size > 0) parts.push(`tools that succeeded: ${[...succeeded].join(', ')}`);
    if (failed.size > 0) parts.push(`tools that failed: ${[...failed].join(', ')}`);
    return `${parts.join('; ')}.`;
}

export function formatArtifacts(artifacts: Artifact[]): string {
    if (artifacts.length === 0) return '  (none yet)';
    return artifacts.map((a) => `  - ${a.name} v${a.version} (${a.kind}, produced by ${a.producedBy})`).join('\n');
}

export function buildModelContext(project: Project, artifacts: Artifact[], options: ContextOptions): ModelContext {
    const { window, elided } = selectWindow(project.turns, options.windowTurns);

    let systemPrompt = PIPELINE_SYSTEM_PROMPT_TEMPLATE.replace('{{CURRENT_STAGE}}', project.stage)
        .replace('{{ARTIFACTS}}', formatArtifacts(artifacts))
        .replace('{{WORKING_SUMMARY}}', summariseElided(elided))
        .trim();
    if (project.privacyMode === 'guardrail') {
        systemPrompt += `\n\n---\n${PRIVACY_GUARDRAIL_INSTRUCTION.trim()}`;
    }
    if (options.summaryRequest) {
        systemPrompt += `\n\n---\n${FOLLOW_UP_SUMMARY_INSTRUCTION.trim()}`;
    }

    return { systemPrompt, turns: window };
}

import { z } from 'zod';
import type { CredentialProvider } from '../lib/credentials.js';
import { type GenerationRequest, VertexApiClient } from '../lib/vertexClient.js';

export interface ModelTarget {
    projectId: string;
    locationId: string;
    modelId: string;
}

export interface GenerationDeps {
    defaults: ModelTarget;
    credentials: CredentialProvider;
    fetch?: typeof fetch;
}

// Per-request overrides of the configured project, location and model.
export const TargetOverrideSchema = z.object({
    projectId: z.string().trim().min(1).optional(),
    locationId: z.string().trim().min(1).optional(),
    modelId: z.string().trim().min(1).optional(),
});

export type TargetOverride = z.infer<typeof TargetOverrideSchema>;

export function resolveTarget(defaults: ModelTarget, override: TargetOverride = {}): ModelTarget {
    return {
        projectId: override.projectId ?? defaults.projectId,
        locationId: override.locationId ?? defaults.locationId,
        modelId: override.modelId ?? defaults.modelId,
    };
}

export async function generateText(deps: GenerationDeps, request: GenerationRequest, override?: TargetOverride): Promise<string> {
    const target = resolveTarget(deps.defaults, override);
    const client = new VertexApiClient({
        projectId: target.projectId,
        locationId: target.locationId,
        credentials: deps.credentials,
        fetch: deps.fetch,
    });

    console.log(`[vertex] generateContent ${target.modelId} in ${target.projectId}/${target.locationId}`);
    return client.generateContent(target.modelId, request);
}

import type { Schema } from '@google/genai';
import type { CredentialProvider } from './credentials.js';
import { ApiError } from './errors.js';
import { extractResponseText } from './responseText.js';

export interface TextPart {
    text: string;
}

export interface FileDataPart {
    fileData: {
        mimeType: string;
        fileUri: string;
    };
}

export type ContentPart = TextPart | FileDataPart;

export interface ContentEntry {
    role: 'user' | 'model';
    parts: [ContentPart, ...ContentPart[]];
}

export interface GenerationConfig {
    temperature?: number;
    maxOutputTokens?: number;
    topP?: number;
    responseMimeType?: string;
    responseSchema?: Schema;
}

export interface GenerationRequest {
    contents: ContentEntry[];
    generationConfig?: GenerationConfig;
}

export interface VertexApiClientOptions {
    projectId: string;
    locationId: string;
    credentials: CredentialProvider;
    /** Overrides the regional endpoint derived from the location. */
    apiEndpoint?: string;
    fetch?: typeof fetch;
}

export function defaultApiEndpoint(locationId: string): string {
    return locationId === 'global'
        ? 'https://aiplatform.googleapis.com'
        : `https://${locationId}-aiplatform.googleapis.com`;
}

/**
 * Thin REST adapter for the Vertex AI `generateContent` method.
 * One attempt per call: no retry and no timeout beyond the runtime's own.
 */
export class VertexApiClient {
    readonly projectId: string;
    readonly locationId: string;
    readonly apiEndpoint: string;
    private readonly credentials: CredentialProvider;
    private readonly fetchImpl: typeof fetch;

    constructor(options: VertexApiClientOptions) {
        this.projectId = options.projectId;
        this.locationId = options.locationId;
        this.apiEndpoint = options.apiEndpoint ?? defaultApiEndpoint(options.locationId);
        this.credentials = options.credentials;
        this.fetchImpl = options.fetch ?? fetch;
    }

    modelUrl(modelId: string): string {
        return `${this.apiEndpoint}/v1/projects/${this.projectId}/locations/${this.locationId}/publishers/google/models/${modelId}:generateContent`;
    }

    /**
     * Sends the request and returns the first candidate's text.
     * A 200 whose body is not JSON comes back as the raw body.
     * @throws ApiError for any other status.
     */
    async generateContent(modelId: string, request: GenerationRequest): Promise<string> {
        const token = await this.credentials.getAccessToken();

        const response = await this.fetchImpl(this.modelUrl(modelId), {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Authorization': `Bearer ${token}`,
            },
            body: JSON.stringify(request),
        });

        const body = await response.text();
        if (response.status !== 200) {
            throw new ApiError(response.status, body);
        }

        let json: unknown;
        try {
            json = JSON.parse(body);
        } catch (error) {
            console.warn(`[vertex] Error parsing response from ${modelId}:`, error);
            return body;
        }
        return extractResponseText(json);
    }
}

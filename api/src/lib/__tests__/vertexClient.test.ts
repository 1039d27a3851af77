import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { VertexApiClient, defaultApiEndpoint, type GenerationRequest } from '../vertexClient.js';
import { ApiError } from '../errors.js';
import type { CredentialProvider } from '../credentials.js';

const request: GenerationRequest = {
    contents: [{ role: 'user', parts: [{ text: 'What is 6 x 7?' }] }],
};

function jsonResponse(body: unknown, status = 200) {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('VertexApiClient', () => {
    let credentials: CredentialProvider;
    let fetchMock: Mock<typeof fetch>;
    let client: VertexApiClient;

    beforeEach(() => {
        credentials = { getAccessToken: vi.fn().mockResolvedValue('test-token') };
        fetchMock = vi.fn<typeof fetch>();
        client = new VertexApiClient({
            projectId: 'test-project',
            locationId: 'us-central1',
            credentials,
            fetch: fetchMock,
        });
    });

    it('derives the regional endpoint from the location', () => {
        expect(defaultApiEndpoint('europe-west4')).toBe('https://europe-west4-aiplatform.googleapis.com');
        expect(defaultApiEndpoint('global')).toBe('https://aiplatform.googleapis.com');
    });

    it('builds the model URL', () => {
        expect(client.modelUrl('gemini-1.5-flash-002')).toBe(
            'https://us-central1-aiplatform.googleapis.com/v1/projects/test-project/locations/us-central1/publishers/google/models/gemini-1.5-flash-002:generateContent',
        );
    });

    it('honours an explicit endpoint', () => {
        const local = new VertexApiClient({
            projectId: 'p',
            locationId: 'l',
            credentials,
            apiEndpoint: 'http://localhost:8080',
        });
        expect(local.modelUrl('m')).toBe('http://localhost:8080/v1/projects/p/locations/l/publishers/google/models/m:generateContent');
    });

    it('posts the request with the bearer token and returns the text', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ candidates: [{ content: { parts: [{ text: '42' }] } }] }));

        const text = await client.generateContent('gemini-1.5-flash-002', request);

        expect(text).toBe('42');
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe(client.modelUrl('gemini-1.5-flash-002'));
        expect(init).toEqual({
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Authorization': 'Bearer test-token',
            },
            body: JSON.stringify(request),
        });
    });

    it('returns the fallback when the response has no text', async () => {
        fetchMock.mockResolvedValue(jsonResponse({}));
        await expect(client.generateContent('m', request)).resolves.toBe('No response generated');
    });

    it('returns the raw body when a 200 response is not JSON', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        fetchMock.mockResolvedValue(new Response('plain text answer', { status: 200 }));

        await expect(client.generateContent('m', request)).resolves.toBe('plain text answer');
        expect(warn).toHaveBeenCalledTimes(1);
        warn.mockRestore();
    });

    it.each([400, 403, 429, 500, 201])('throws an ApiError with the body verbatim for status %i', async (status) => {
        const body = '{"error":{"code":' + status + ',"message":"denied"}}';
        fetchMock.mockResolvedValue(new Response(body, { status }));

        const failure = client.generateContent('m', request);

        await expect(failure).rejects.toBeInstanceOf(ApiError);
        await expect(failure).rejects.toMatchObject({ status, body });
        await expect(failure).rejects.toThrow(`API request failed with status ${status}: ${body}`);
    });

    it('does not call the endpoint when the token cannot be obtained', async () => {
        credentials.getAccessToken = vi.fn().mockRejectedValue(new Error('no token'));
        await expect(client.generateContent('m', request)).rejects.toThrow('no token');
        expect(fetchMock).not.toHaveBeenCalled();
    });
});

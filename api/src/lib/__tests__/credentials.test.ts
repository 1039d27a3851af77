import { describe, it, expect, vi, beforeEach } from 'vitest';

const { authorizeMock, jwtOptions } = vi.hoisted(() => ({
    authorizeMock: vi.fn(),
    jwtOptions: [] as unknown[],
}));

vi.mock('google-auth-library', () => ({
    JWT: class {
        credentials: { access_token?: string | null; expiry_date?: number | null } = {};

        constructor(options: unknown) {
            jwtOptions.push(options);
        }

        async authorize() {
            this.credentials = await authorizeMock();
            return this.credentials;
        }
    },
}));

import {
    CLOUD_PLATFORM_SCOPE,
    ServiceAccountCredentialProvider,
    parseServiceAccount,
} from '../credentials.js';
import { CredentialError } from '../errors.js';

const account = {
    type: 'service_account',
    project_id: 'test-project',
    client_email: 'tester@test-project.iam.gserviceaccount.com',
    private_key: 'test-private-key',
};

describe('parseServiceAccount', () => {
    it('reads the descriptor fields', () => {
        expect(parseServiceAccount(JSON.stringify({ ...account, client_id: '123' }))).toEqual(account);
    });

    it('rejects text that is not JSON', () => {
        expect(() => parseServiceAccount('{not json')).toThrow(CredentialError);
        expect(() => parseServiceAccount('{not json')).toThrow(/^Invalid service account JSON: /);
    });

    it('names the missing fields', () => {
        expect(() => parseServiceAccount(JSON.stringify({ project_id: 'p', client_email: 'a@b' })))
            .toThrow('Service account JSON is missing or has invalid fields: private_key');
    });
});

describe('ServiceAccountCredentialProvider', () => {
    beforeEach(() => {
        authorizeMock.mockReset();
        jwtOptions.length = 0;
    });

    it('creates a JWT client for the cloud-platform scope', () => {
        new ServiceAccountCredentialProvider(account);
        expect(jwtOptions).toEqual([{
            email: account.client_email,
            key: account.private_key,
            scopes: [CLOUD_PLATFORM_SCOPE],
        }]);
    });

    it('refreshes on first use and reuses a valid token', async () => {
        authorizeMock.mockResolvedValue({ access_token: 'test-token', expiry_date: Date.now() + 3_600_000 });
        const provider = new ServiceAccountCredentialProvider(account);

        expect(provider.valid).toBe(false);
        await expect(provider.getAccessToken()).resolves.toBe('test-token');
        expect(provider.valid).toBe(true);
        await expect(provider.getAccessToken()).resolves.toBe('test-token');
        expect(authorizeMock).toHaveBeenCalledTimes(1);
    });

    it('refreshes a token that is about to expire', async () => {
        authorizeMock
            .mockResolvedValueOnce({ access_token: 'old-token', expiry_date: Date.now() + 30_000 })
            .mockResolvedValueOnce({ access_token: 'new-token', expiry_date: Date.now() + 3_600_000 });
        const provider = new ServiceAccountCredentialProvider(account);

        await expect(provider.getAccessToken()).resolves.toBe('old-token');
        expect(provider.valid).toBe(false);
        await expect(provider.getAccessToken()).resolves.toBe('new-token');
        expect(authorizeMock).toHaveBeenCalledTimes(2);
    });

    it('shares one refresh between concurrent callers', async () => {
        let finishRefresh: () => void = () => {};
        authorizeMock.mockImplementation(() => new Promise(resolve => {
            finishRefresh = () => resolve({ access_token: 'test-token', expiry_date: Date.now() + 3_600_000 });
        }));
        const provider = new ServiceAccountCredentialProvider(account);

        const first = provider.getAccessToken();
        const second = provider.getAccessToken();
        await vi.waitFor(() => expect(authorizeMock).toHaveBeenCalledTimes(1));
        finishRefresh();

        await expect(Promise.all([first, second])).resolves.toEqual(['test-token', 'test-token']);
        expect(authorizeMock).toHaveBeenCalledTimes(1);
    });

    it('refreshes again after a failed refresh', async () => {
        authorizeMock
            .mockRejectedValueOnce(new Error('network down'))
            .mockResolvedValueOnce({ access_token: 'test-token', expiry_date: Date.now() + 3_600_000 });
        const provider = new ServiceAccountCredentialProvider(account);

        await expect(provider.getAccessToken()).rejects.toThrow('Failed to refresh service account token: network down');
        await expect(provider.getAccessToken()).resolves.toBe('test-token');
        expect(authorizeMock).toHaveBeenCalledTimes(2);
    });

    it('wraps refresh failures', async () => {
        authorizeMock.mockRejectedValue(new Error('invalid_grant'));
        const provider = new ServiceAccountCredentialProvider(account);

        const failure = provider.getAccessToken();
        await expect(failure).rejects.toBeInstanceOf(CredentialError);
        await expect(failure).rejects.toThrow('Failed to refresh service account token: invalid_grant');
    });

    it('fails when the refresh yields no token', async () => {
        authorizeMock.mockResolvedValue({ access_token: null });
        const provider = new ServiceAccountCredentialProvider(account);

        await expect(provider.getAccessToken()).rejects.toThrow('Token refresh returned no access token.');
    });
});

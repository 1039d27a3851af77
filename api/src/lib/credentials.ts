import { JWT } from 'google-auth-library';
import { z } from 'zod';
import { CredentialError, errorMessage } from './errors.js';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

// Treat a token this close to expiry as already expired.
const EXPIRY_MARGIN_MS = 60_000;

const ServiceAccountSchema = z.object({
    type: z.string().optional(),
    project_id: z.string().optional(),
    client_email: z.string().min(1),
    private_key: z.string().min(1),
});

export type ServiceAccount = z.infer<typeof ServiceAccountSchema>;

export interface CredentialProvider {
    getAccessToken(): Promise<string>;
}

/**
 * Parses a service-account descriptor (the JSON key file downloaded from the
 * cloud console).
 */
export function parseServiceAccount(json: string): ServiceAccount {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new CredentialError(`Invalid service account JSON: ${errorMessage(error)}`);
    }

    const parsed = ServiceAccountSchema.safeParse(raw);
    if (!parsed.success) {
        const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
        throw new CredentialError(`Service account JSON is missing or has invalid fields: ${fields}`);
    }
    return parsed.data;
}

/**
 * Holds one bearer token for a service account and refreshes it when it is
 * missing or about to expire.
 */
export class ServiceAccountCredentialProvider implements CredentialProvider {
    private readonly client: JWT;
    private pendingRefresh: Promise<void> | undefined;

    constructor(account: ServiceAccount, scopes: string[] = [CLOUD_PLATFORM_SCOPE]) {
        this.client = new JWT({
            email: account.client_email,
            key: account.private_key,
            scopes,
        });
    }

    get valid(): boolean {
        const { access_token, expiry_date } = this.client.credentials;
        if (!access_token) return false;
        return expiry_date == null || expiry_date - EXPIRY_MARGIN_MS > Date.now();
    }

    /** Concurrent callers share one in-flight refresh. */
    refresh(): Promise<void> {
        if (!this.pendingRefresh) {
            this.pendingRefresh = this.authorize().finally(() => {
                this.pendingRefresh = undefined;
            });
        }
        return this.pendingRefresh;
    }

    private async authorize(): Promise<void> {
        try {
            await this.client.authorize();
        } catch (error) {
            throw new CredentialError(`Failed to refresh service account token: ${errorMessage(error)}`);
        }
    }

    async getAccessToken(): Promise<string> {
        if (!this.valid) {
            await this.refresh();
        }
        const token = this.client.credentials.access_token;
        if (!token) {
            throw new CredentialError('Token refresh returned no access token.');
        }
        return token;
    }
}

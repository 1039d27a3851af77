import fs from 'fs';
import { z } from 'zod';
import { type ServiceAccount, parseServiceAccount } from './credentials.js';
import { ConfigError, CredentialError, errorMessage } from './errors.js';

const EnvSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3001),
    SERVICE_ACCOUNT_JSON: z.string().optional(),
    SERVICE_ACCOUNT_FILE: z.string().optional(),
    PROJECT_ID: z.string().optional(),
    LOCATION_ID: z.string().min(1).default('us-central1'),
    MODEL_ID: z.string().min(1).default('gemini-1.5-flash-002'),
    BUCKET_NAME: z.string().optional(),
    UPLOAD_DIR: z.string().optional(),
});

export interface AppConfig {
    port: number;
    projectId: string;
    locationId: string;
    modelId: string;
    bucketName?: string;
    uploadDir?: string;
    serviceAccount: ServiceAccount;
}

function readServiceAccountJson(inline: string | undefined, path: string | undefined): string {
    if (inline) return inline;
    if (path) {
        try {
            return fs.readFileSync(path, 'utf8');
        } catch (error) {
            throw new CredentialError(`Could not read service account file ${path}: ${errorMessage(error)}`);
        }
    }
    throw new CredentialError('Service account credentials not configured. Set SERVICE_ACCOUNT_JSON or SERVICE_ACCOUNT_FILE.');
}

/**
 * Reads the service configuration from environment variables.
 * The project defaults to the service account's own project.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
        throw new ConfigError(`Invalid environment variables: ${fields}`);
    }
    const vars = parsed.data;

    const serviceAccount = parseServiceAccount(
        readServiceAccountJson(vars.SERVICE_ACCOUNT_JSON, vars.SERVICE_ACCOUNT_FILE),
    );

    const projectId = vars.PROJECT_ID || serviceAccount.project_id;
    if (!projectId) {
        throw new ConfigError('PROJECT_ID is not set and the service account has no project_id.');
    }

    return {
        port: vars.PORT,
        projectId,
        locationId: vars.LOCATION_ID,
        modelId: vars.MODEL_ID,
        bucketName: vars.BUCKET_NAME || undefined,
        uploadDir: vars.UPLOAD_DIR || undefined,
        serviceAccount,
    };
}

import type { Response } from 'express';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class CredentialError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CredentialError';
    }
}

/**
 * A non-200 answer from the generation endpoint. The raw body is kept verbatim
 * so the caller can show it.
 */
export class ApiError extends Error {
    readonly status: number;
    readonly body: string;

    constructor(status: number, body: string) {
        super(`API request failed with status ${status}: ${body}`);
        this.name = 'ApiError';
        this.status = status;
        this.body = body;
    }
}

export class StorageUploadError extends Error {
    constructor(message: string) {
        super(`Error uploading to bucket: ${message}`);
        this.name = 'StorageUploadError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Maps a failure from the generation flow onto an HTTP response.
 * Unknown errors get the route's fixed message.
 */
export function sendError(res: Response, error: unknown, fallbackMessage: string) {
    if (error instanceof ApiError) {
        return res.status(502).json({ message: error.message, status: error.status, body: error.body });
    }
    if (error instanceof StorageUploadError) {
        return res.status(502).json({ message: error.message });
    }
    if (error instanceof CredentialError) {
        return res.status(500).json({ message: error.message });
    }
    return res.status(500).json({ message: fallbackMessage });
}

import type { RequestHandler } from 'express';
import type { ClientConfig } from '../../../types.js';
import { DIFFICULTIES, SUBJECT_TOPICS } from '../services/payloadBuilder.js';
import type { ModelTarget } from '../services/generationService.js';

// Only the defaults a form needs; the service account never leaves the server.
export const createConfigHandler = (defaults: ModelTarget, bucketName?: string): RequestHandler => (req, res) => {
    const config: ClientConfig = {
        ...defaults,
        imageAnalysisEnabled: Boolean(bucketName),
        subjects: SUBJECT_TOPICS,
        difficulties: [...DIFFICULTIES],
    };
    res.status(200).json(config);
};

import express from 'express';
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import type { CredentialProvider } from './lib/credentials.js';
import type { ObjectUploader } from './lib/storage.js';
import type { ModelTarget } from './services/generationService.js';
import { createConfigHandler } from './handlers/configHandler.js';
import { createTutorHandler } from './handlers/tutorHandler.js';
import { createQuizHandler, handleGradeQuiz } from './handlers/quizHandler.js';
import { createImageAnalysisHandler } from './handlers/imageAnalysisHandler.js';

export interface AppDeps {
    defaults: ModelTarget;
    credentials: CredentialProvider;
    uploadObject: ObjectUploader;
    bucketName?: string;
    uploadDir?: string;
    fetch?: typeof fetch;
}

const asyncHandler = (fn: RequestHandler): RequestHandler => (
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    Promise.resolve(fn(req, res, next)).catch(next);
};

interface BodyParserError {
    type: string;
    status: number;
    message: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return error instanceof Error
        && 'type' in error && typeof error.type === 'string' && error.type.startsWith('entity.')
        && 'status' in error && typeof error.status === 'number';
}

// Malformed or oversized bodies get the same JSON shape as a failed zod parse.
const handleErrors: ErrorRequestHandler = (error, req, res, next) => {
    if (res.headersSent) {
        return next(error);
    }
    if (isBodyParserError(error)) {
        return res.status(error.status).json({
            message: 'Invalid request',
            details: { formErrors: [error.message], fieldErrors: {} },
        });
    }
    console.error(`Unhandled error on ${req.method} ${req.path}:`, error);
    res.status(500).json({ message: 'Internal server error.' });
};

export function createApp(deps: AppDeps) {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // API Routes
    app.get('/api/config', createConfigHandler(deps.defaults, deps.bucketName));

    app.post('/api/tutor', asyncHandler(createTutorHandler(deps)));
    app.post('/api/quiz', asyncHandler(createQuizHandler(deps)));
    app.post('/api/quiz/grade', handleGradeQuiz);
    app.post('/api/image-analysis', asyncHandler(createImageAnalysisHandler(deps)));

    app.use(handleErrors);

    return app;
}

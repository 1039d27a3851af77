import type { RequestHandler } from 'express';
import { z } from 'zod';
import { sendError } from '../lib/errors.js';
import { buildTutorRequest } from '../services/payloadBuilder.js';
import { type GenerationDeps, TargetOverrideSchema, generateText } from '../services/generationService.js';

const TutorSchema = TargetOverrideSchema.extend({
    query: z.string().trim().min(1),
});

export const createTutorHandler = (deps: GenerationDeps): RequestHandler => async (req, res) => {
    const parse = TutorSchema.safeParse(req.body);
    if (!parse.success) {
        return res.status(400).json({ message: 'Invalid request', details: parse.error.flatten() });
    }
    const { query, ...override } = parse.data;

    try {
        const text = await generateText(deps, buildTutorRequest(query), override);
        res.status(200).json({ text });
    } catch (error) {
        console.error('[tutor] Error answering question:', error);
        sendError(res, error, 'Failed to get an answer.');
    }
};

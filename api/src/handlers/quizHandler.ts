import type { RequestHandler } from 'express';
import { z } from 'zod';
import { sendError } from '../lib/errors.js';
import { DIFFICULTIES, SUBJECTS, buildQuizRequest, isTopicOf } from '../services/payloadBuilder.js';
import { type GenerationDeps, TargetOverrideSchema, generateText } from '../services/generationService.js';
import { gradeQuiz, parseQuiz } from '../services/quizService.js';

const QuizSchema = TargetOverrideSchema.extend({
    subject: z.enum(SUBJECTS),
    topic: z.string(),
    difficulty: z.enum(DIFFICULTIES),
    questionCount: z.number().int().min(1).max(20).optional(),
    strictSchema: z.boolean().default(true),
}).refine(body => isTopicOf(body.subject, body.topic), {
    message: 'Topic does not belong to the selected subject.',
    path: ['topic'],
});

const QuizItemSchema = z.object({
    question: z.string(),
    options: z.array(z.string()),
    correctAnswer: z.string(),
    explanation: z.string(),
});

const GradeSchema = z.object({
    questions: z.array(QuizItemSchema).min(1),
    answers: z.array(z.string().nullable()).default([]),
});

export const createQuizHandler = (deps: GenerationDeps): RequestHandler => async (req, res) => {
    const parse = QuizSchema.safeParse(req.body);
    if (!parse.success) {
        return res.status(400).json({ message: 'Invalid request', details: parse.error.flatten() });
    }
    const { subject, topic, difficulty, questionCount, strictSchema, ...override } = parse.data;

    try {
        const request = buildQuizRequest({ subject, topic, difficulty, questionCount }, { strictSchema });
        const quizText = await generateText(deps, request, override);

        const { questions, error } = parseQuiz(quizText);
        if (error) {
            console.error(`[quiz] ${error}`);
        }
        if (questions.length === 0) {
            return res.status(502).json({ message: 'Failed to generate quiz. Please try again.', error });
        }

        res.status(200).json({ questions });
    } catch (error) {
        console.error('[quiz] Error generating quiz:', error);
        sendError(res, error, 'Failed to generate quiz.');
    }
};

export const handleGradeQuiz: RequestHandler = (req, res) => {
    const parse = GradeSchema.safeParse(req.body);
    if (!parse.success) {
        return res.status(400).json({ message: 'Invalid request', details: parse.error.flatten() });
    }
    const { questions, answers } = parse.data;

    res.status(200).json(gradeQuiz(questions, answers));
};

import { type Schema, Type } from '@google/genai';
import type { Difficulty, Subject } from '../../../types.js';
import type { GenerationRequest } from '../lib/vertexClient.js';

export const SUBJECT_TOPICS: Record<Subject, string[]> = {
    'Mathematics': ['Algebra', 'Geometry', 'Arithmetic'],
    'Science': ['Physics', 'Chemistry', 'Biology'],
    'Social Studies': ['History', 'Geography', 'Civics'],
};

export const SUBJECTS = ['Mathematics', 'Science', 'Social Studies'] as const satisfies readonly Subject[];
export const DIFFICULTIES = ['Beginner', 'Intermediate', 'Advanced'] as const satisfies readonly Difficulty[];

export const DEFAULT_QUESTION_COUNT = 5;

export const quizResponseSchema: Schema = {
    type: Type.OBJECT,
    properties: {
        questions: {
            type: Type.ARRAY,
            items: {
                type: Type.OBJECT,
                properties: {
                    question: { type: Type.STRING },
                    options: { type: Type.ARRAY, items: { type: Type.STRING } },
                    correctAnswer: { type: Type.STRING },
                    explanation: { type: Type.STRING }
                }
            }
        }
    }
};

export interface QuizSelection {
    subject: Subject;
    topic: string;
    difficulty: Difficulty;
    questionCount?: number;
}

export interface QuizRequestOptions {
    /** Constrain the model output with `quizResponseSchema`. */
    strictSchema?: boolean;
}

export function isTopicOf(subject: Subject, topic: string): boolean {
    return SUBJECT_TOPICS[subject].includes(topic);
}

export function buildTutorRequest(query: string): GenerationRequest {
    return {
        contents: [{ role: 'user', parts: [{ text: query }] }]
    };
}

export function buildQuizPrompt({ subject, topic, difficulty, questionCount = DEFAULT_QUESTION_COUNT }: QuizSelection): string {
    return `Generate a quiz with ${questionCount} multiple-choice questions on ${subject}, focusing on ${topic} at ${difficulty} level. Include options, the correct answer, and an explanation.`;
}

export function buildQuizRequest(selection: QuizSelection, { strictSchema = true }: QuizRequestOptions = {}): GenerationRequest {
    const baseConfig = {
        temperature: 1,
        maxOutputTokens: 8192,
        topP: 0.95,
    };

    if (strictSchema) {
        return {
            contents: [{ role: 'user', parts: [{ text: buildQuizPrompt(selection) }] }],
            generationConfig: {
                ...baseConfig,
                responseMimeType: 'application/json',
                responseSchema: quizResponseSchema,
            },
        };
    }

    const prompt = `${buildQuizPrompt(selection)}
Return only a JSON object with a "questions" array whose items have the fields "question", "options", "correctAnswer" and "explanation".`;

    return {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: baseConfig,
    };
}

export function buildImageAnalysisRequest(query: string, file: { mimeType: string; fileUri: string }): GenerationRequest {
    return {
        contents: [
            {
                role: 'user',
                parts: [
                    { text: query },
                    { fileData: { mimeType: file.mimeType, fileUri: file.fileUri } }
                ]
            }
        ]
    };
}

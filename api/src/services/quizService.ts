import type { QuizGrade, QuizItem, QuizParseResult } from '../../../types.js';
import { errorMessage } from '../lib/errors.js';

const MISSING_QUESTION = 'No question found';
const MISSING_ANSWER = 'No correct answer provided';
const MISSING_EXPLANATION = 'No explanation provided';
const NO_ANSWER = 'No answer';

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

function stripCodeFence(text: string): string {
    const trimmed = text.trim();
    const match = CODE_FENCE.exec(trimmed);
    return match ? match[1] : trimmed;
}

export function toQuizItem(raw: unknown): QuizItem {
    const item = isObject(raw) ? raw : {};
    const options = Array.isArray(item.options)
        ? item.options.filter((option): option is string => typeof option === 'string')
        : [];

    return {
        question: stringOr(item.question, MISSING_QUESTION),
        options,
        correctAnswer: stringOr(item.correctAnswer, MISSING_ANSWER),
        explanation: stringOr(item.explanation, MISSING_EXPLANATION),
    };
}

/**
 * Parses the model's quiz answer. Malformed JSON never throws: it yields an
 * empty quiz and the parse error.
 */
export function parseQuiz(text: string): QuizParseResult {
    let json: unknown;
    try {
        json = JSON.parse(stripCodeFence(text));
    } catch (error) {
        return { questions: [], error: `Error parsing quiz data: ${errorMessage(error)}` };
    }

    if (!isObject(json)) {
        return { questions: [], error: 'Error parsing quiz data: expected a JSON object' };
    }
    if (!Array.isArray(json.questions)) {
        return { questions: [] };
    }
    return { questions: json.questions.map(toQuizItem) };
}

export function gradeQuiz(questions: QuizItem[], answers: ReadonlyArray<string | null | undefined>): QuizGrade {
    const results = questions.map((item, index) => {
        const answer = answers[index];
        const yourAnswer = answer ?? NO_ANSWER;
        return {
            index,
            question: item.question,
            yourAnswer,
            correctAnswer: item.correctAnswer,
            explanation: item.explanation,
            isCorrect: answer != null && answer.trim() === item.correctAnswer.trim(),
        };
    });

    return {
        results,
        score: results.filter(result => result.isCorrect).length,
        total: questions.length,
    };
}

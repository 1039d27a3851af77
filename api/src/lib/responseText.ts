export const NO_RESPONSE_TEXT = 'No response generated';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
    return isObject(value) ? value[key] : undefined;
}

function firstElement(value: unknown): unknown {
    return Array.isArray(value) ? value[0] : undefined;
}

/**
 * Reads `candidates[0].content.parts[0].text` from a generateContent response.
 * A missing key, an empty array or a value of the wrong shape anywhere along the
 * path yields `fallback`.
 */
export function extractResponseText(response: unknown, fallback: string = NO_RESPONSE_TEXT): string {
    const candidate = firstElement(field(response, 'candidates'));
    const content = field(candidate, 'content');
    const part = firstElement(field(content, 'parts'));
    const text = field(part, 'text');

    return typeof text === 'string' ? text : fallback;
}

/**
 * Query Processor Service
 *
 * Validates user messages before they enter the pipeline. Rejecting empty
 * input here avoids spending a rewrite and a retrieval on nothing.
 */

export interface ValidationResult {
    valid: boolean;
    error?: string;
}

/**
 * Validates a user query before processing.
 *
 * @param query - The user's input; anything but a string is rejected
 */
export function validateQuery(query: unknown): ValidationResult {
    if (typeof query !== 'string') {
        return {
            valid: false,
            error: 'Query is required',
        };
    }

    // trim() covers spaces, tabs, newlines and other whitespace
    if (query.trim().length === 0) {
        return {
            valid: false,
            error: 'Query cannot be empty or contain only whitespace',
        };
    }

    return {
        valid: true,
    };
}

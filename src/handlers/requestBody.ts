import { ClientInputError } from '../utils/errors';

/**
 * Reads a required, non-empty string field from a parsed JSON body.
 */
export function requireStringField(body: unknown, field: string): string {
    if (body === null || typeof body !== 'object' || Array.isArray(body)) {
        throw new ClientInputError('Request body must be a JSON object');
    }
    const value: unknown = Reflect.get(body, field);
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ClientInputError(`Missing ${field} in request body`);
    }
    return value;
}

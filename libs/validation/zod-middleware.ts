import { ZodSchema } from 'zod';
import { logger } from '../logging/logger.js';
import { ValidationError } from '../errors/accessErrors.js';

/**
 * Fail-closed input validation.
 * Returns the parsed value or throws a ValidationError listing every issue.
 */
export function validate<T>(schema: ZodSchema<T>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new ValidationError(context, errorDetails);
    }

    return result.data;
}


import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Infrastructure error wrapper.
 * Replaces raw storage/driver errors with a generic message and an
 * IncidentID for log correlation.
 */

export class RolegateError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly sqlState?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; sqlState?: string }
    ) {
        super(publicMessage);
        this.name = 'RolegateError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.sqlState = options?.sqlState;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function readStringField(value: object, field: 'message' | 'stack' | 'code'): string | undefined {
    const candidate: unknown = Reflect.get(value, field);
    return typeof candidate === 'string' ? candidate : undefined;
}

export const ErrorSanitizer = {
    /**
     * Wraps any error into a RolegateError. Existing RolegateErrors pass through.
     */
    sanitize: (err: unknown, contextLabel: string): RolegateError => {
        if (err instanceof RolegateError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;
        let sqlState: string | undefined;

        if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object') {
            originalErrorMessage = readStringField(err, 'message') ?? String(err);
            originalErrorStack = readStringField(err, 'stack');
            sqlState = readStringField(err, 'code');
        } else {
            originalErrorMessage = String(err);
        }

        return new RolegateError(
            `An internal system error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel, sqlState }
        );
    }
};

import { logger } from '../logging/logger.js';

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: () => boolean; message: string }
    | { type: 'assert'; check: () => boolean; message: string };

/**
 * Collect every violation of the given rules against the current environment.
 */
export function collectViolations(rules: readonly GuardRule[]): string[] {
    const errors: string[] = [];

    for (const rule of rules) {
        try {
            switch (rule.type) {
                case 'required': {
                    const value = process.env[rule.name];
                    if (!value || value.trim() === '') {
                        errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                    }
                    break;
                }

                case 'forbidIf': {
                    if (rule.when()) {
                        errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                    }
                    break;
                }

                case 'assert': {
                    if (!rule.check()) {
                        errors.push(`FATAL CONFIG: ${rule.message}`);
                    }
                    break;
                }
            }
        } catch (err: unknown) {
            errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
        }
    }

    return errors;
}

/**
 * Fail-closed configuration guard.
 * No defaults. No missing values. No unsafe patterns.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[]) {
        const errors = collectViolations(rules);

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables. No defaults allowed."
            }, "Configuration Guard Violation");

            process.exit(1);
        }

        logger.info("Configuration guard passed.");
    }
}

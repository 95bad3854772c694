import { logger } from '../logging/logger.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean; when?: (env: Env) => boolean }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

export class ConfigGuardViolation extends Error {
    readonly code = 'CONFIG_GUARD_VIOLATION' as const;

    constructor(public readonly violations: readonly string[]) {
        super(`Configuration guard violation:\n${violations.join('\n')}`);
        this.name = 'ConfigGuardViolation';
        Object.setPrototypeOf(this, ConfigGuardViolation.prototype);
    }
}

/**
 * Fail-closed configuration check. Collects every violation before failing so
 * one restart shows the operator the full list.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: Env = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        if (rule.when && !rule.when(env)) break;
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            // Log structure for machine parsing + human readability
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            throw new ConfigGuardViolation(errors);
        }

        logger.info("Configuration guard passed.");
    }
}

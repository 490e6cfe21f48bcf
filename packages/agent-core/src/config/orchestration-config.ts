/**
 * Orchestration Configuration
 *
 * Limits of the research loop. Values come from runtime overrides,
 * then ORCHESTRATOR_* environment variables, then defaults, and are
 * validated as a whole.
 */

import { z } from 'zod';
import _ from 'lodash';
import { CONFIDENCE_THRESHOLD, MAX_ATTEMPTS } from '../router';

export const OrchestrationConfigSchema = z
    .object({
        /** Validator -> researcher retries allowed per turn */
        maxAttempts: z.number().int().min(1).max(10),
        /** Inclusive score at which research skips validation */
        confidenceThreshold: z.number().min(0).max(10),
        /** Graph super-steps allowed in one pass */
        stepLimit: z.number().int().min(4).max(200),
    })
    .superRefine((config, ctx) => {
        const longest = longestPass(config.maxAttempts);
        if (config.stepLimit < longest) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['stepLimit'],
                message: `must be at least ${longest} for maxAttempts=${config.maxAttempts}`,
            });
        }
    });

export type OrchestrationConfig = z.infer<typeof OrchestrationConfigSchema>;

export const DEFAULT_ORCHESTRATION_CONFIG: OrchestrationConfig = {
    maxAttempts: MAX_ATTEMPTS,
    confidenceThreshold: CONFIDENCE_THRESHOLD,
    stepLimit: 25,
};

/**
 * Steps in a pass that uses every retry: clarifier, researcher and
 * validator, one researcher/validator pair per retry, then synthesizer
 */
export function longestPass(maxAttempts: number): number {
    return 2 * maxAttempts + 4;
}

const ORCHESTRATION_ENV: Record<keyof OrchestrationConfig, string> = {
    maxAttempts: 'ORCHESTRATOR_MAX_ATTEMPTS',
    confidenceThreshold: 'ORCHESTRATOR_CONFIDENCE_THRESHOLD',
    stepLimit: 'ORCHESTRATOR_STEP_LIMIT',
};

function envNumber(key: string): number | undefined {
    const raw = process.env[key];
    if (raw === undefined || raw.trim() === '') return undefined;
    return Number(raw);
}

/**
 * Load and validate orchestration limits
 *
 * @throws Error naming every invalid field
 */
export function loadOrchestrationConfig(
    overrides?: Partial<OrchestrationConfig>
): OrchestrationConfig {
    const envConfig: Partial<OrchestrationConfig> = {
        maxAttempts: envNumber(ORCHESTRATION_ENV.maxAttempts),
        confidenceThreshold: envNumber(ORCHESTRATION_ENV.confidenceThreshold),
        stepLimit: envNumber(ORCHESTRATION_ENV.stepLimit),
    };

    const candidate = {
        ...DEFAULT_ORCHESTRATION_CONFIG,
        ..._.omitBy(envConfig, _.isNil),
        ..._.omitBy(overrides ?? {}, _.isNil),
    };

    const parsed = OrchestrationConfigSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid orchestration config: ${issues}`);
    }
    return parsed.data;
}

/**
 * Failure classification at the orchestrator boundary.
 * Rules are evaluated in order; the first match wins.
 */
import {
    DeliveryError,
    FetchError,
    SizeExceededError,
    StageTimeoutError,
    TranscodeError,
} from './errors.js';
import type { FailureReason } from './types.js';

// Phrases the extractor surfaces when the site demands a human check
export const BOT_CHECK_PATTERNS: readonly RegExp[] = [
    /confirm you['’]?re not a bot/i,
    /not a robot/i,
    /captcha/i,
];

export interface FailureRule {
    reason: FailureReason;
    matches(error: unknown, text: string): boolean;
}

export const FAILURE_RULES: readonly FailureRule[] = [
    {
        reason: 'timeout',
        matches: (error) => error instanceof StageTimeoutError,
    },
    {
        reason: 'bot_check',
        matches: (error, text) =>
            error instanceof FetchError && BOT_CHECK_PATTERNS.some((pattern) => pattern.test(text)),
    },
    {
        reason: 'fetch_failed',
        matches: (error) => error instanceof FetchError,
    },
    {
        reason: 'transcode_failed',
        matches: (error) => error instanceof TranscodeError,
    },
    {
        reason: 'size_exceeded',
        matches: (error) => error instanceof SizeExceededError,
    },
    {
        reason: 'delivery_failed',
        matches: (error) => error instanceof DeliveryError,
    },
];

/**
 * Raw text of an error and its cause chain
 */
export function errorText(error: unknown): string {
    const parts: string[] = [];
    let current: unknown = error;

    for (let depth = 0; current !== undefined && current !== null && depth < 5; depth++) {
        if (current instanceof Error) {
            parts.push(current.message);
            if ('stderr' in current && typeof current.stderr === 'string') {
                parts.push(current.stderr);
            }
            current = current.cause;
        } else {
            parts.push(String(current));
            break;
        }
    }

    return parts.join('\n');
}

export function classifyFailure(error: unknown, rules: readonly FailureRule[] = FAILURE_RULES): FailureReason {
    const text = errorText(error);
    const rule = rules.find((candidate) => candidate.matches(error, text));
    return rule ? rule.reason : 'internal';
}

export const GENERIC_FAILURE_MESSAGE = 'Something went wrong while downloading or processing the media.';

function formatMegabytes(bytes: number): string {
    return `${Math.round(bytes / (1024 * 1024))} MB`;
}

/**
 * Short, user-safe message for a failure reason
 */
export function userMessageFor(reason: FailureReason, capBytes: number): string {
    switch (reason) {
        case 'bot_check':
            return 'The site asked to confirm that this is not a bot, so the download was blocked. '
                + 'This usually means the server IP has a poor reputation with the site. '
                + 'Try again later or send a link from another service.';
        case 'size_exceeded':
            return `Could not prepare the file: it is larger than ${formatMegabytes(capBytes)} even after compression.`;
        case 'timeout':
            return 'Processing took too long and was stopped. Please try again later.';
        case 'fetch_failed':
        case 'transcode_failed':
        case 'delivery_failed':
        case 'internal':
            return GENERIC_FAILURE_MESSAGE;
    }
}

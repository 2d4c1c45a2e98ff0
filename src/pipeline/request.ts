/**
 * Inbound request validation
 */
import type { MediaRequest } from './types.js';

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Accept a message only when the whole text is an absolute http(s) URL.
 * Anything else is ordinary conversation and yields null.
 */
export function parseMediaRequest(text: string): MediaRequest | null {
    const trimmed = text.trim();

    if (!/^https?:\/\//i.test(trimmed) || /\s/.test(trimmed)) {
        return null;
    }

    try {
        const url = new URL(trimmed);
        if (!ALLOWED_PROTOCOLS.has(url.protocol) || !url.hostname) {
            return null;
        }
    } catch {
        return null;
    }

    return { sourceUrl: trimmed };
}

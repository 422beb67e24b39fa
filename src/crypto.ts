import { randomBytes } from 'crypto';

/**
 * Generates a cryptographically secure random ID.
 * @returns A 32-character hex string.
 */
export function cryptoRandomId(): string {
    return randomBytes(16).toString('hex');
}

/**
 * Generates a bearer token for a newly registered player.
 * The token is the player's only credential and never rotates.
 */
export function createPlayerToken(): string {
    return `tok_` + randomBytes(24).toString('base64url');
}

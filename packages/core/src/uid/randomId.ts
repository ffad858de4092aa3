import { randomBytes } from "node:crypto";

/**
 * Source of candidate uids.
 */
export type RandomSource = (config: { length: number }) => string;

/**
 * Default uid length. At 6 bits per character, collisions are not a practical concern.
 */
export const DEFAULT_UID_LENGTH = 99;

// 64 symbols, all valid in a cookie value without escaping
const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_";

export const randomId: RandomSource = ({ length }) => {
    const bytes = randomBytes(length);
    let out = "";
    for (const b of bytes) {
        out += ALPHABET.charAt(b & 63);
    }
    return out;
};

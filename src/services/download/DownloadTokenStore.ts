import { randomBytes } from 'crypto';
import type { Clock } from '../recording/types';

interface TokenEntry {
    filePath: string;
    expiresAt: number;
}

export type TokenLookup =
    | { status: 'valid'; filePath: string }
    | { status: 'expired' }
    | { status: 'unknown' };

/** 32 random bytes, base64url encoded. */
export function generateToken(): string {
    return randomBytes(32).toString('base64url');
}

/**
 * In-memory map of download tokens. A token stays redeemable until its
 * expiry instant passes; expired entries are removed when looked up or
 * during a sweep.
 */
export class DownloadTokenStore {
    private readonly tokens = new Map<string, TokenEntry>();

    constructor(
        private readonly ttlMs: number,
        private readonly now: Clock = Date.now,
        private readonly generate: () => string = generateToken
    ) {}

    public issue(filePath: string): string {
        let token = this.generate();
        while (this.tokens.has(token)) {
            token = this.generate();
        }

        this.tokens.set(token, { filePath, expiresAt: this.now() + this.ttlMs });
        this.sweep();
        return token;
    }

    public lookup(token: string): TokenLookup {
        const entry = this.tokens.get(token);
        if (!entry) return { status: 'unknown' };

        if (this.now() > entry.expiresAt) {
            this.tokens.delete(token);
            return { status: 'expired' };
        }
        return { status: 'valid', filePath: entry.filePath };
    }

    public revoke(token: string): boolean {
        return this.tokens.delete(token);
    }

    /** Removes every expired token and returns how many were dropped. */
    public sweep(): number {
        const now = this.now();
        let removed = 0;
        for (const [token, entry] of this.tokens) {
            if (now > entry.expiresAt) {
                this.tokens.delete(token);
                removed++;
            }
        }
        return removed;
    }

    public size(): number {
        return this.tokens.size;
    }
}

/**
 * Allocates ids for tokens originated by `originateMint`.
 *
 * Both chains must agree on the numbering, so a deployment usually gives each
 * originating chain its own starting offset.
 */
export interface TokenIdSequence {
    next(): Promise<bigint>;
    /** Give back an id whose mint request was aborted. */
    release(tokenId: bigint): Promise<void>;
}

export class CounterTokenIdSequence implements TokenIdSequence {
    private nextId: bigint;
    private released: bigint[] = [];

    constructor(start: bigint = BigInt(0)) {
        this.nextId = start;
    }

    async next(): Promise<bigint> {
        const reused = this.released.shift();
        if (reused !== undefined) return reused;

        const id = this.nextId;
        this.nextId++;
        return id;
    }

    async release(tokenId: bigint): Promise<void> {
        // ids never handed out, or already queued, are ignored
        if (tokenId >= this.nextId || this.released.includes(tokenId)) return;
        if (tokenId === this.nextId - BigInt(1)) {
            this.nextId = tokenId;
            return;
        }
        this.released.push(tokenId);
        this.released.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    }

    peek(): bigint {
        return this.released[0] ?? this.nextId;
    }
}

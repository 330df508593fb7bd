import type { Hex } from '../types/bridge';

/**
 * Remembers which relay message ids have already been applied on this chain.
 */
export interface ProcessedMessageStore {
    has(messageId: Hex): Promise<boolean>;
    add(messageId: Hex): Promise<void>;
    delete(messageId: Hex): Promise<void>;
}

export class InMemoryProcessedMessageStore implements ProcessedMessageStore {
    private processed: Set<string> = new Set();

    async has(messageId: Hex): Promise<boolean> {
        return this.processed.has(messageId.toLowerCase());
    }

    async add(messageId: Hex): Promise<void> {
        this.processed.add(messageId.toLowerCase());
    }

    async delete(messageId: Hex): Promise<void> {
        this.processed.delete(messageId.toLowerCase());
    }
}

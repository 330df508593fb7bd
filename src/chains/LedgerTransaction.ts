/**
 * @packageDocumentation
 * @module LedgerTransaction
 * @description
 * All-or-nothing execution of one bridge entry point.
 *
 * Collaborator writes (token transfers, burns, fee approvals) are journaled together
 * with the write that undoes them. If the entry point fails, the journal is replayed
 * in reverse so that no partial state survives. Once the relay has accepted a message
 * the transaction is committed and nothing can be undone any more.
 */
import { BridgeError } from '../types/errors';

export type TransactionState = 'open' | 'committed' | 'rolledBack';

interface JournalEntry {
    label: string;
    compensate: () => Promise<unknown>;
}

export class LedgerTransaction {
    private journal: JournalEntry[] = [];
    private _state: TransactionState = 'open';

    constructor(public readonly label: string) { }

    get state(): TransactionState {
        return this._state;
    }

    /**
     * Journal a completed write together with the write that reverts it.
     */
    record(label: string, compensate: () => Promise<unknown>): void {
        if (this._state !== 'open') {
            throw new Error(`[LedgerTransaction] Cannot record "${label}" on a ${this._state} transaction`);
        }
        this.journal.push({ label, compensate });
    }

    commit(): void {
        if (this._state === 'rolledBack') {
            throw new Error(`[LedgerTransaction] ${this.label} was already rolled back`);
        }
        this._state = 'committed';
        this.journal = [];
    }

    /**
     * Undo journaled writes, newest first. Returns the errors of compensations that
     * failed; the remaining entries are still attempted.
     */
    async rollback(): Promise<unknown[]> {
        if (this._state !== 'open') return [];

        const failures: unknown[] = [];
        for (const entry of [...this.journal].reverse()) {
            try {
                await entry.compensate();
            } catch (error) {
                console.error(`[LedgerTransaction] ${this.label}: failed to undo ${entry.label}`, error);
                failures.push(error);
            }
        }
        this.journal = [];
        this._state = 'rolledBack';
        return failures;
    }

    /**
     * Run `body` inside a fresh transaction. Commits on success; on failure rolls back
     * and rethrows the original error (wrapped in ROLLBACK_FAILED if undo failed).
     */
    static async run<T>(label: string, body: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
        const tx = new LedgerTransaction(label);
        try {
            const result = await body(tx);
            tx.commit();
            return result;
        } catch (error) {
            const failures = await tx.rollback();
            if (failures.length > 0) {
                throw BridgeError.rollbackFailed(
                    error instanceof Error ? error : new Error(String(error)),
                    failures
                );
            }
            throw error;
        }
    }
}

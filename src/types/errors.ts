/**
 * @packageDocumentation
 * @module BridgeErrors
 * @description
 * Standardized error handling for the NFT bridge.
 *
 * Every failure that aborts an entry point is a {@link BridgeError} carrying a typed
 * code, remediation steps for off-chain tooling, and the diagnostic values involved
 * (e.g., current vs required fee balance).
 */
export enum BridgeErrorCode {
    // Payload and input errors (1xxx)
    MALFORMED_PAYLOAD = 1001,
    INVALID_ARGUMENT = 1002,

    // Custody errors (2xxx)
    NOT_TOKEN_OWNER = 2001,
    CUSTODY_TRANSITION_FAILED = 2002,
    UNAUTHORIZED_CALLER = 2003,

    // Fee errors (3xxx)
    INSUFFICIENT_FEE = 3001,

    // Relay errors (4xxx)
    RELAY_UNAVAILABLE = 4001,
    UNSUPPORTED_DESTINATION = 4002,

    // Inbound errors (5xxx)
    UNAUTHORIZED_SENDER = 5001,
    DUPLICATE_TOKEN_ID = 5002,
    DUPLICATE_MESSAGE = 5003,

    // Transaction errors (6xxx)
    ROLLBACK_FAILED = 6001,
}

export type ErrorContext = Record<string, unknown>;

export class BridgeError extends Error {
    public code: BridgeErrorCode;
    public remediation: string;
    public retryable: boolean;
    public context?: ErrorContext;
    public override cause?: unknown;

    constructor(
        code: BridgeErrorCode,
        message: string,
        remediation: string,
        retryable: boolean = false,
        context?: ErrorContext,
        cause?: unknown
    ) {
        super(message);
        this.name = 'BridgeError';
        this.code = code;
        this.remediation = remediation;
        this.retryable = retryable;
        this.context = context;
        this.cause = cause;

        Object.setPrototypeOf(this, BridgeError.prototype);
    }

    static malformedPayload(reason: string, context?: ErrorContext, cause?: unknown): BridgeError {
        return new BridgeError(
            BridgeErrorCode.MALFORMED_PAYLOAD,
            `Malformed payload: ${reason}`,
            'The payload must be the ABI encoding of (uint256 tokenId, address newOwner). Reject the message.',
            false,
            context,
            cause
        );
    }

    static invalidArgument(reason: string, context?: ErrorContext): BridgeError {
        return new BridgeError(
            BridgeErrorCode.INVALID_ARGUMENT,
            `Invalid argument: ${reason}`,
            'Fix the argument and call again.',
            false,
            context
        );
    }

    static notTokenOwner(tokenId: bigint, requester: string, owner?: string): BridgeError {
        return new BridgeError(
            BridgeErrorCode.NOT_TOKEN_OWNER,
            `${requester} is not the owner of token ${tokenId}`,
            'Only the current holder can bridge a token. Check ownership on the source chain.',
            false,
            { tokenId, requester, owner }
        );
    }

    static custodyTransitionFailed(tokenId: bigint, step: 'transfer' | 'burn', cause: unknown): BridgeError {
        return new BridgeError(
            BridgeErrorCode.CUSTODY_TRANSITION_FAILED,
            `Custody transition failed at ${step} for token ${tokenId}: ${describeCause(cause)}`,
            'Make sure the bridge is approved to transfer the token, then resubmit.',
            false,
            { tokenId, step },
            cause
        );
    }

    static unauthorizedCaller(caller: string, operation: string): BridgeError {
        return new BridgeError(
            BridgeErrorCode.UNAUTHORIZED_CALLER,
            `${caller} is not authorized to call ${operation}`,
            'Call this operation from the bridge owner account.',
            false,
            { caller, operation }
        );
    }

    static insufficientFee(current: bigint, required: bigint, feeToken: string): BridgeError {
        return new BridgeError(
            BridgeErrorCode.INSUFFICIENT_FEE,
            `Insufficient fee balance: have ${current}, need ${required}`,
            `Top up the bridge with at least ${required - current} units of ${feeToken} and resubmit.`,
            false,
            { current, required, feeToken }
        );
    }

    static relayUnavailable(reason: string, context?: ErrorContext, cause?: unknown): BridgeError {
        return new BridgeError(
            BridgeErrorCode.RELAY_UNAVAILABLE,
            `Relay unavailable: ${reason}`,
            'Check the relay router endpoint and try again.',
            true,
            context,
            cause
        );
    }

    static unsupportedDestination(destinationSelector: bigint): BridgeError {
        return new BridgeError(
            BridgeErrorCode.UNSUPPORTED_DESTINATION,
            `Destination chain ${destinationSelector} is not supported by the relay`,
            'Use a destination selector the relay router lists as supported.',
            false,
            { destinationSelector }
        );
    }

    static unauthorizedSender(caller: string, router: string): BridgeError {
        return new BridgeError(
            BridgeErrorCode.UNAUTHORIZED_SENDER,
            `Inbound message delivered by ${caller}, expected router ${router}`,
            'Only the configured relay router may deliver messages.',
            false,
            { caller, router }
        );
    }

    static duplicateTokenId(tokenId: bigint, owner?: string): BridgeError {
        return new BridgeError(
            BridgeErrorCode.DUPLICATE_TOKEN_ID,
            `Token ${tokenId} already exists on this chain`,
            'The delivery is a duplicate or replay; no action is needed.',
            false,
            { tokenId, owner }
        );
    }

    static duplicateMessage(messageId: string): BridgeError {
        return new BridgeError(
            BridgeErrorCode.DUPLICATE_MESSAGE,
            `Message ${messageId} has already been processed`,
            'The delivery is a replay; no action is needed.',
            false,
            { messageId }
        );
    }

    static rollbackFailed(original: BridgeError | Error, failures: unknown[]): BridgeError {
        return new BridgeError(
            BridgeErrorCode.ROLLBACK_FAILED,
            `Rollback failed after: ${original.message}`,
            'Local state may be partially applied. Reconcile token custody and fee allowance manually.',
            false,
            { failures: failures.map(describeCause) },
            original
        );
    }

    static isBridgeError(error: unknown): error is BridgeError {
        return error instanceof BridgeError;
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            remediation: this.remediation,
            retryable: this.retryable,
            context: this.context === undefined ? undefined : stringifyBigints(this.context),
        };
    }
}

/**
 * Outcome of a component call. Components report failures as values; the bridge
 * entry points turn a failed result into a thrown {@link BridgeError}.
 */
export type BridgeResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: BridgeError };

export function ok<T>(value: T): BridgeResult<T> {
    return { ok: true, value };
}

export function fail<T>(error: BridgeError): BridgeResult<T> {
    return { ok: false, error };
}

/**
 * Returns the value of a successful result, throws the carried error otherwise.
 */
export function unwrap<T>(result: BridgeResult<T>): T {
    if (!result.ok) {
        throw result.error;
    }
    return result.value;
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}

function stringifyBigints(context: ErrorContext): ErrorContext {
    return Object.fromEntries(
        Object.entries(context).map(([key, value]) => [key, typeof value === 'bigint' ? value.toString() : value])
    );
}

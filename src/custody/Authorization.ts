/**
 * Authorization capabilities for bridge entry points.
 *
 * A policy is handed to the bridge at construction and checked per call, so who may
 * originate mints is configuration rather than an ownership base class.
 */
import { ethers } from 'ethers';
import { BridgeError, type BridgeResult, fail, ok } from '../types/errors';

export type BridgeOperation = 'originateMint';

export interface AuthorizationPolicy {
    readonly name: string;
    isAuthorized(caller: string, operation: BridgeOperation): boolean;
}

/**
 * Only `owner` may call guarded operations.
 */
export function ownerOnly(owner: string): AuthorizationPolicy {
    const normalized = ethers.getAddress(owner);
    return {
        name: `ownerOnly(${normalized})`,
        isAuthorized: (caller) => ethers.isAddress(caller) && ethers.getAddress(caller) === normalized,
    };
}

export function openAccess(): AuthorizationPolicy {
    return {
        name: 'open',
        isAuthorized: () => true,
    };
}

export function checkAuthorization(
    policy: AuthorizationPolicy,
    caller: string,
    operation: BridgeOperation
): BridgeResult<void> {
    if (!policy.isAuthorized(caller, operation)) {
        return fail(BridgeError.unauthorizedCaller(caller, operation));
    }
    return ok(undefined);
}

/**
 * @packageDocumentation
 * @module CustodyManager
 * @description
 * Local custody transitions that must complete before a token may leave the chain.
 *
 * Lifecycle of a bridged token on the source chain:
 * 1. **Held**: owned by the requester.
 * 2. **Bridge-held**: transferred into the bridge's custody.
 * 3. **Burned**: destroyed, to be re-minted on the destination under the same id.
 *
 * Steps 2 and 3 happen inside one {@link LedgerTransaction}; if either fails, the
 * journal restores the token to the requester.
 */
import { ethers } from 'ethers';
import type { WrappedTokenClient } from '../chains/WrappedTokenClient';
import type { LedgerTransaction } from '../chains/LedgerTransaction';
import { BridgeError, type BridgeResult, fail, ok } from '../types/errors';

export class CustodyManager {
    constructor(
        private readonly token: WrappedTokenClient,
        private readonly bridgeAddress: string
    ) { }

    async lockAndBurn(tokenId: bigint, requester: string, tx: LedgerTransaction): Promise<BridgeResult<void>> {
        let owner: string;
        try {
            owner = await this.token.ownerOf(tokenId);
        } catch (error) {
            console.warn(`[CustodyManager] ownerOf(${tokenId}) failed, treating as not owned`, error);
            return fail(BridgeError.notTokenOwner(tokenId, requester));
        }

        if (!sameAddress(owner, requester)) {
            return fail(BridgeError.notTokenOwner(tokenId, requester, owner));
        }

        try {
            await this.token.transferFrom(requester, this.bridgeAddress, tokenId);
        } catch (error) {
            return fail(BridgeError.custodyTransitionFailed(tokenId, 'transfer', error));
        }
        tx.record(`transferFrom(${requester}, bridge, ${tokenId})`, () =>
            this.token.transferFrom(this.bridgeAddress, requester, tokenId)
        );

        try {
            await this.token.burn(tokenId);
        } catch (error) {
            return fail(BridgeError.custodyTransitionFailed(tokenId, 'burn', error));
        }
        tx.record(`burn(${tokenId})`, () => this.token.mintWithSpecificId(this.bridgeAddress, tokenId));

        return ok(undefined);
    }
}

export function sameAddress(a: string, b: string): boolean {
    return ethers.isAddress(a) && ethers.isAddress(b) && ethers.getAddress(a) === ethers.getAddress(b);
}

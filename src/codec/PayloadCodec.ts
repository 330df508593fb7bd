/**
 * @packageDocumentation
 * @module PayloadCodec
 * @description
 * Encodes the `{tokenId, newOwner}` transfer intent carried by a relay message.
 *
 * Wire format is the ABI encoding of `(uint256 tokenId, address newOwner)`: two
 * 32-byte words. Decoding treats its input as attacker-controlled and validates
 * length and word layout before handing anything to the ABI decoder.
 */
import { ethers } from 'ethers';
import type { Hex, TransferIntent } from '../types/bridge';
import { BridgeError, type BridgeResult, fail, ok } from '../types/errors';

const PAYLOAD_TYPES = ['uint256', 'address'] as const;
const WORD_BYTES = 32;
export const PAYLOAD_BYTES = PAYLOAD_TYPES.length * WORD_BYTES;

const MAX_UINT256 = ethers.MaxUint256;
// upper 12 bytes of an ABI-encoded address word must be zero
const ADDRESS_PADDING_BYTES = 12;

export function createTransferIntent(tokenId: bigint, newOwner: string): BridgeResult<TransferIntent> {
    if (tokenId < 0n || tokenId > MAX_UINT256) {
        return fail(BridgeError.malformedPayload(`tokenId ${tokenId} is outside the uint256 range`, { tokenId }));
    }
    if (!ethers.isAddress(newOwner)) {
        return fail(BridgeError.malformedPayload(`newOwner ${newOwner} is not an address`, { newOwner }));
    }
    return ok(Object.freeze({ tokenId, newOwner: ethers.getAddress(newOwner) }));
}

export class PayloadCodec {
    private readonly coder = ethers.AbiCoder.defaultAbiCoder();

    encode(intent: TransferIntent): BridgeResult<Hex> {
        const checked = createTransferIntent(intent.tokenId, intent.newOwner);
        if (!checked.ok) return checked;

        return ok(this.coder.encode(PAYLOAD_TYPES, [checked.value.tokenId, checked.value.newOwner]));
    }

    decode(payload: ethers.BytesLike): BridgeResult<TransferIntent> {
        let bytes: Uint8Array;
        try {
            bytes = ethers.getBytes(payload);
        } catch (error) {
            return fail(BridgeError.malformedPayload('payload is not valid hex bytes', undefined, error));
        }

        if (bytes.length !== PAYLOAD_BYTES) {
            return fail(BridgeError.malformedPayload(
                `expected ${PAYLOAD_BYTES} bytes, got ${bytes.length}`,
                { length: bytes.length }
            ));
        }

        const addressWord = bytes.subarray(WORD_BYTES, WORD_BYTES + ADDRESS_PADDING_BYTES);
        if (addressWord.some((b) => b !== 0)) {
            return fail(BridgeError.malformedPayload('newOwner word has dirty upper bytes'));
        }

        let decoded: ethers.Result;
        try {
            decoded = this.coder.decode(PAYLOAD_TYPES, bytes);
        } catch (error) {
            return fail(BridgeError.malformedPayload('ABI decoding failed', undefined, error));
        }

        const [tokenId, newOwner] = [decoded[0], decoded[1]];
        if (typeof tokenId !== 'bigint' || typeof newOwner !== 'string') {
            return fail(BridgeError.malformedPayload('decoded fields have unexpected types'));
        }

        return createTransferIntent(tokenId, newOwner);
    }
}

/**
 * @packageDocumentation
 * @module MessageBuilder
 * @description
 * Assembles outbound relay messages and quotes their delivery fee.
 *
 * The destination-side gas budget is a fixed, auditable policy value
 * ({@link DEFAULT_GAS_LIMIT}) unless the deployment overrides it. Quotes are never
 * cached: a fee is only valid for the exact message it was requested for.
 */
import { ethers } from 'ethers';
import type { RelayClient } from '../chains/RelayClient';
import type { FeeQuote, Hex, OutboundMessage } from '../types/bridge';
import { BridgeError, type BridgeResult, describeCause, fail, ok } from '../types/errors';

export const DEFAULT_GAS_LIMIT = BigInt(200_000);

// bytes4(keccak256("CCIP EVMExtraArgsV1"))
export const EVM_EXTRA_ARGS_V1_TAG = '0x97a657c9';

const MAX_UINT64 = (BigInt(1) << BigInt(64)) - BigInt(1);

export function encodeExtraArgs(gasLimit: bigint): Hex {
    return ethers.concat([
        EVM_EXTRA_ARGS_V1_TAG,
        ethers.AbiCoder.defaultAbiCoder().encode(['uint256'], [gasLimit]),
    ]);
}

export class MessageBuilder {
    constructor(
        private readonly relay: RelayClient,
        private readonly defaultGasLimit: bigint = DEFAULT_GAS_LIMIT
    ) {
        if (defaultGasLimit <= BigInt(0)) {
            throw BridgeError.invalidArgument(`gas limit must be positive, got ${defaultGasLimit}`, {
                gasLimit: defaultGasLimit,
            });
        }
    }

    get gasLimit(): bigint {
        return this.defaultGasLimit;
    }

    build(
        destinationSelector: bigint,
        receiver: string,
        payload: Hex,
        feeToken: string,
        gasLimit: bigint = this.defaultGasLimit
    ): OutboundMessage {
        if (destinationSelector < BigInt(0) || destinationSelector > MAX_UINT64) {
            throw BridgeError.invalidArgument(`destination selector ${destinationSelector} is not a uint64`, {
                destinationSelector,
            });
        }
        if (gasLimit <= BigInt(0)) {
            throw BridgeError.invalidArgument(`gas limit must be positive, got ${gasLimit}`, { gasLimit });
        }
        if (!ethers.isAddress(receiver)) {
            throw BridgeError.invalidArgument(`receiver ${receiver} is not an address`, { receiver });
        }
        if (!ethers.isAddress(feeToken)) {
            throw BridgeError.invalidArgument(`fee token ${feeToken} is not an address`, { feeToken });
        }

        return {
            destinationSelector,
            receiver: ethers.getAddress(receiver),
            payload: ethers.hexlify(payload),
            feeToken: ethers.getAddress(feeToken),
            gasLimit,
            extraArgs: encodeExtraArgs(gasLimit),
        };
    }

    async quote(message: OutboundMessage): Promise<BridgeResult<FeeQuote>> {
        let supported: boolean;
        try {
            supported = await this.relay.isChainSupported(message.destinationSelector);
        } catch (error) {
            return fail(relayFailure('isChainSupported', message, error));
        }
        if (!supported) {
            return fail(BridgeError.unsupportedDestination(message.destinationSelector));
        }

        try {
            const amount = await this.relay.getFee(message.destinationSelector, message);
            return ok({ amount });
        } catch (error) {
            return fail(relayFailure('getFee', message, error));
        }
    }
}

export function relayFailure(call: string, message: OutboundMessage, error: unknown): BridgeError {
    if (BridgeError.isBridgeError(error)) return error;
    return BridgeError.relayUnavailable(
        `${call} failed: ${describeCause(error)}`,
        { destinationSelector: message.destinationSelector },
        error
    );
}

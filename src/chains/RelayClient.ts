/**
 * @packageDocumentation
 * @module RelayClient
 * @description
 * Defines the interface the bridge consumes from the cross-chain message relay.
 *
 * The relay quotes a fee per message, accepts a message for delivery (pulling the
 * approved fee from the sender), and later invokes the destination bridge's inbound
 * handler from its router address.
 */
import type { Hex, OutboundMessage } from '../types/bridge';

export interface RelayClient {
    /** Address the relay delivers inbound messages from, and the fee spender. */
    readonly routerAddress: string;

    isChainSupported(destinationSelector: bigint): Promise<boolean>;

    /**
     * Fee, in units of `message.feeToken`, required to deliver `message`.
     */
    getFee(destinationSelector: bigint, message: OutboundMessage): Promise<bigint>;

    /**
     * Submit `message`; returns the relay's 32-byte message id.
     */
    send(destinationSelector: bigint, message: OutboundMessage): Promise<Hex>;
}

/**
 * @packageDocumentation
 * @module InboundReceiver
 * @description
 * Applies relay-delivered messages on the destination chain.
 *
 * Admission control is a single check: the delivery must come from the configured
 * relay router, which has already verified the origin chain and sender upstream.
 *
 * Double-mint guards, in order:
 * 1. An id that already exists on this chain is refused with `DUPLICATE_TOKEN_ID`.
 * 2. A message id that was already applied (replay protection on) is refused with
 *    `DUPLICATE_MESSAGE`. This catches a replay after the token has left the chain again.
 *
 * The receipt log and the `MessageReceived` listeners run after the mint; a failure
 * there is reported and does not undo the delivery.
 */
import type { EventEmitter } from 'events';
import type { RelayClient } from '../chains/RelayClient';
import type { WrappedTokenClient } from '../chains/WrappedTokenClient';
import type { LedgerTransaction } from '../chains/LedgerTransaction';
import type { PayloadCodec } from '../codec/PayloadCodec';
import { sameAddress } from '../custody/CustodyManager';
import { type MessageLog, notify } from '../monitoring/MessageLog';
import type { InboundMessage, MessageReceivedEvent, TransferIntent } from '../types/bridge';
import { BridgeError, type BridgeResult, fail, ok } from '../types/errors';
import type { ProcessedMessageStore } from './ProcessedMessageStore';

export class InboundReceiver {
    constructor(
        private readonly relay: RelayClient,
        private readonly token: WrappedTokenClient,
        private readonly codec: PayloadCodec,
        private readonly log: MessageLog,
        private readonly events: EventEmitter,
        private readonly processed?: ProcessedMessageStore
    ) { }

    async receive(
        message: InboundMessage,
        caller: string,
        tx: LedgerTransaction
    ): Promise<BridgeResult<TransferIntent>> {
        if (!sameAddress(caller, this.relay.routerAddress)) {
            return fail(BridgeError.unauthorizedSender(caller, this.relay.routerAddress));
        }

        const decoded = this.codec.decode(message.payload);
        if (!decoded.ok) return decoded;
        const { tokenId, newOwner } = decoded.value;

        if (await this.token.exists(tokenId)) {
            return fail(BridgeError.duplicateTokenId(tokenId, await this.token.ownerOf(tokenId)));
        }

        if (this.processed && await this.processed.has(message.messageId)) {
            return fail(BridgeError.duplicateMessage(message.messageId));
        }

        await this.token.mintWithSpecificId(newOwner, tokenId);
        tx.record(`mintWithSpecificId(${newOwner}, ${tokenId})`, () => this.token.burn(tokenId));

        if (this.processed) {
            const store = this.processed;
            await store.add(message.messageId);
            tx.record(`markProcessed(${message.messageId})`, () => store.delete(message.messageId));
        }

        // the mint stands from here on
        tx.commit();

        const event: MessageReceivedEvent = {
            messageId: message.messageId,
            sourceChainSelector: message.sourceChainSelector,
            sourceSender: message.sourceSender,
            tokenId,
            newOwner,
        };
        await notify('InboundReceiver', this.log, this.events, 'MessageReceived', event, {
            direction: 'inbound',
            messageId: message.messageId,
            chainSelector: message.sourceChainSelector,
            counterparty: message.sourceSender,
            tokenId,
        });

        return ok(decoded.value);
    }
}

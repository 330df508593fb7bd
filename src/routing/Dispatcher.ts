/**
 * @packageDocumentation
 * @module Dispatcher
 * @description
 * Pays for and submits outbound messages to the relay.
 *
 * Steps, each a precondition for the next:
 * 1. Quote the fee for the exact message.
 * 2. Check the bridge's fee-token balance covers it (no write before this passes).
 * 3. Approve the relay router for exactly the quoted fee.
 * 4. Submit the message and obtain its id. From here on the send is final.
 * 5. Record the receipt and emit `MessageSent`. Failures here are logged, never thrown:
 *    the message is already on its way.
 *
 * Nothing is retried here; a failure aborts the surrounding ledger transaction.
 */
import type { EventEmitter } from 'events';
import { ethers } from 'ethers';
import type { FeeTokenClient } from '../chains/FeeTokenClient';
import type { RelayClient } from '../chains/RelayClient';
import type { LedgerTransaction } from '../chains/LedgerTransaction';
import { type MessageLog, notify } from '../monitoring/MessageLog';
import type { Hex, MessageReceipt, MessageSentEvent, OutboundMessage } from '../types/bridge';
import { BridgeError, type BridgeResult, describeCause, fail, ok } from '../types/errors';
import { type MessageBuilder, relayFailure } from './MessageBuilder';

const ZERO_MESSAGE_ID = ethers.ZeroHash;

export class Dispatcher {
    constructor(
        private readonly bridgeAddress: string,
        private readonly relay: RelayClient,
        private readonly feeToken: FeeTokenClient,
        private readonly builder: MessageBuilder,
        private readonly log: MessageLog,
        private readonly events: EventEmitter
    ) { }

    /**
     * Quote the message and check the bridge's fee balance covers it. Read-only.
     *
     * @returns the quoted fee
     */
    async checkFee(message: OutboundMessage): Promise<BridgeResult<bigint>> {
        const quote = await this.builder.quote(message);
        if (!quote.ok) return quote;
        const fee = quote.value.amount;

        let balance: bigint;
        try {
            balance = await this.feeToken.balanceOf(this.bridgeAddress);
        } catch (error) {
            return fail(BridgeError.relayUnavailable(
                `fee token balanceOf failed: ${describeCause(error)}`,
                { feeToken: this.feeToken.address },
                error
            ));
        }
        if (balance < fee) {
            return fail(BridgeError.insufficientFee(balance, fee, this.feeToken.address));
        }
        return ok(fee);
    }

    async send(message: OutboundMessage, tx: LedgerTransaction): Promise<BridgeResult<MessageReceipt>> {
        // 1-2. Quote and balance check
        const checked = await this.checkFee(message);
        if (!checked.ok) return checked;
        const fee = checked.value;

        // 3. Bounded approval
        const approved = await this.approveExactly(fee, tx);
        if (!approved.ok) return approved;

        // 4. Submit
        let messageId: Hex;
        try {
            messageId = await this.relay.send(message.destinationSelector, message);
        } catch (error) {
            return fail(relayFailure('send', message, error));
        }
        if (!ethers.isHexString(messageId, 32) || messageId === ZERO_MESSAGE_ID) {
            return fail(BridgeError.relayUnavailable(
                `relay returned an invalid message id ${messageId}`,
                { destinationSelector: message.destinationSelector }
            ));
        }
        // the relay owns the message now
        tx.commit();

        // 5. Receipt
        const receipt: MessageReceipt = {
            messageId,
            destinationSelector: message.destinationSelector,
            receiver: message.receiver,
            feeToken: message.feeToken,
            feePaid: fee,
        };

        const event: MessageSentEvent = {
            messageId,
            destinationSelector: message.destinationSelector,
            receiver: message.receiver,
            feeToken: message.feeToken,
            fee,
        };
        await notify('Dispatcher', this.log, this.events, 'MessageSent', event, {
            direction: 'outbound',
            messageId,
            chainSelector: message.destinationSelector,
            counterparty: message.receiver,
            feeToken: message.feeToken,
            fee,
        });

        return ok(receipt);
    }

    private async approveExactly(fee: bigint, tx: LedgerTransaction): Promise<BridgeResult<void>> {
        const spender = this.relay.routerAddress;
        try {
            const previous = await this.feeToken.allowance(this.bridgeAddress, spender);
            const approved = await this.feeToken.approve(spender, fee);
            if (!approved) {
                return fail(BridgeError.relayUnavailable(
                    `fee token refused approval of ${fee} to ${spender}`,
                    { feeToken: this.feeToken.address, fee }
                ));
            }
            tx.record(`approve(${spender}, ${fee})`, () => this.feeToken.approve(spender, previous));
            return ok(undefined);
        } catch (error) {
            return fail(BridgeError.relayUnavailable(
                `fee approval failed: ${describeCause(error)}`,
                { feeToken: this.feeToken.address, fee },
                error
            ));
        }
    }
}

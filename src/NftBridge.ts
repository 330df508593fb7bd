/**
 * @packageDocumentation
 * @module NftBridge
 * @description
 * The bridge instance deployed on one chain.
 *
 * Exposes the public entry points:
 * - **bridgeOut**: lock and burn a held token, then send it to the destination chain.
 * - **originateMint**: request a brand-new token on the destination chain.
 * - **ccipReceive**: apply a message delivered by the relay router.
 *
 * Each entry point runs as one serialized, all-or-nothing ledger transaction: calls are
 * queued one after another, and a failure rolls back every collaborator write made by
 * that call before the error is surfaced.
 */
import { EventEmitter } from 'events';
import { ethers } from 'ethers';
import { LedgerTransaction } from './chains/LedgerTransaction';
import { PayloadCodec } from './codec/PayloadCodec';
import { type AuthorizationPolicy, checkAuthorization, openAccess, ownerOnly } from './custody/Authorization';
import { CustodyManager } from './custody/CustodyManager';
import { CounterTokenIdSequence, type TokenIdSequence } from './custody/TokenIdSequence';
import { MessageLog, type MessageRecord } from './monitoring/MessageLog';
import { Dispatcher } from './routing/Dispatcher';
import { InboundReceiver } from './routing/InboundReceiver';
import { DEFAULT_GAS_LIMIT, MessageBuilder } from './routing/MessageBuilder';
import { InMemoryProcessedMessageStore } from './routing/ProcessedMessageStore';
import type {
  FeeQuote,
  HistoryOptions,
  Hex,
  InboundMessage,
  MessageReceipt,
  NftBridgeConfig,
  OutboundMessage,
  TransferIntent,
} from './types/bridge';
import { unwrap } from './types/errors';

export const DEFAULT_CONFIG = {
  gasLimit: DEFAULT_GAS_LIMIT,
  replayProtection: true,
  silent: false,
} satisfies Partial<NftBridgeConfig>;

export class NftBridge extends EventEmitter {
  public readonly address: string;
  public readonly authorization: AuthorizationPolicy;

  private readonly config: NftBridgeConfig;
  private readonly codec = new PayloadCodec();
  private readonly builder: MessageBuilder;
  private readonly custody: CustodyManager;
  private readonly dispatcher: Dispatcher;
  private readonly receiver: InboundReceiver;
  private readonly tokenIds: TokenIdSequence;
  private readonly messageLog: MessageLog;

  // tail of the serialized entry-point chain
  private pending: Promise<unknown> = Promise.resolve();

  constructor(config: NftBridgeConfig) {
    super();
    config = { ...DEFAULT_CONFIG, ...config };
    this.config = config;
    this.address = ethers.getAddress(config.address);
    this.authorization = config.authorization
      ?? (config.owner !== undefined ? ownerOnly(config.owner) : openAccess());
    this.tokenIds = config.tokenIds ?? new CounterTokenIdSequence();
    this.messageLog = config.messageLog ?? new MessageLog({ silent: config.silent });

    const processed = config.replayProtection === false
      ? undefined
      : config.processedMessages ?? new InMemoryProcessedMessageStore();

    this.builder = new MessageBuilder(config.relay, config.gasLimit);
    this.custody = new CustodyManager(config.wrappedToken, this.address);
    this.dispatcher = new Dispatcher(
      this.address,
      config.relay,
      config.feeToken,
      this.builder,
      this.messageLog,
      this
    );
    this.receiver = new InboundReceiver(
      config.relay,
      config.wrappedToken,
      this.codec,
      this.messageLog,
      this,
      processed
    );
  }

  get gasLimit(): bigint {
    return this.builder.gasLimit;
  }

  /**
   * Lock and burn `tokenId` held by `caller`, then send it to `destReceiver` on the
   * destination chain, where it is minted to `newOwner`.
   *
   * @returns the relay message id
   */
  async bridgeOut(
    tokenId: bigint,
    newOwner: string,
    destinationSelector: bigint,
    destReceiver: string,
    caller: string
  ): Promise<Hex> {
    return this.serialize(`bridgeOut(${tokenId})`, async (tx) => {
      const message = this.buildMessage({ tokenId, newOwner }, destinationSelector, destReceiver);

      // read-only; a short fee balance must not cost any custody writes
      unwrap(await this.dispatcher.checkFee(message));
      unwrap(await this.custody.lockAndBurn(tokenId, caller, tx));

      const receipt = unwrap(await this.dispatcher.send(message, tx));
      this.info(`Bridged token ${tokenId} to chain ${destinationSelector}`, receipt);
      return receipt.messageId;
    });
  }

  /**
   * Request a fresh token on the destination chain, owned there by `caller`.
   *
   * @returns the relay message id
   */
  async originateMint(destinationSelector: bigint, receiver: string, caller: string): Promise<Hex> {
    return this.serialize('originateMint', async (tx) => {
      unwrap(checkAuthorization(this.authorization, caller, 'originateMint'));

      const tokenId = await this.tokenIds.next();
      tx.record(`allocate(${tokenId})`, () => this.tokenIds.release(tokenId));

      const message = this.buildMessage({ tokenId, newOwner: caller }, destinationSelector, receiver);
      const receipt = unwrap(await this.dispatcher.send(message, tx));
      this.info(`Requested mint of token ${tokenId} on chain ${destinationSelector}`, receipt);
      return receipt.messageId;
    });
  }

  /**
   * Inbound handler. Only the relay router may call it.
   */
  async ccipReceive(message: InboundMessage, caller: string): Promise<TransferIntent> {
    return this.serialize(`ccipReceive(${message.messageId})`, async (tx) => {
      const intent = unwrap(await this.receiver.receive(message, caller, tx));
      this.info(`Minted token ${intent.tokenId} to ${intent.newOwner} from chain ${message.sourceChainSelector}`);
      return intent;
    });
  }

  /**
   * Fee the relay would currently charge to bridge `tokenId` out. Read-only.
   */
  async quoteBridgeOut(
    tokenId: bigint,
    newOwner: string,
    destinationSelector: bigint,
    destReceiver: string
  ): Promise<FeeQuote> {
    const message = this.buildMessage({ tokenId, newOwner }, destinationSelector, destReceiver);
    return unwrap(await this.builder.quote(message));
  }

  /**
   * Fee the relay would currently charge for an `originateMint` by `caller`. Read-only;
   * no token id is allocated.
   */
  async quoteMint(destinationSelector: bigint, receiver: string, caller: string): Promise<FeeQuote> {
    const message = this.buildMessage({ tokenId: BigInt(0), newOwner: caller }, destinationSelector, receiver);
    return unwrap(await this.builder.quote(message));
  }

  async getMessageHistory(options: HistoryOptions = {}): Promise<MessageRecord[]> {
    return this.messageLog.getLogs(options);
  }

  private buildMessage(intent: TransferIntent, destinationSelector: bigint, receiver: string): OutboundMessage {
    const payload = unwrap(this.codec.encode(intent));
    return this.builder.build(destinationSelector, receiver, payload, this.config.feeToken.address);
  }

  private serialize<T>(label: string, body: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const run = this.pending.then(() => LedgerTransaction.run(label, body));
    // keep the chain alive after a failed call; the caller still sees the rejection
    this.pending = run.catch(() => undefined);
    return run;
  }

  private info(message: string, receipt?: MessageReceipt): void {
    if (this.config.silent) return;
    if (receipt) {
      console.log(`[NftBridge] ${message}`, {
        messageId: receipt.messageId,
        feeToken: receipt.feeToken,
        feePaid: receipt.feePaid.toString(),
      });
    } else {
      console.log(`[NftBridge] ${message}`);
    }
  }
}

/**
 * @packageDocumentation
 * @module BridgeTypes
 * @description
 * Core type definitions for the NFT bridge.
 *
 * Includes interfaces for:
 * - {@link TransferIntent}: the `{tokenId, newOwner}` record carried across chains.
 * - {@link OutboundMessage}: a message ready to be quoted and submitted to the relay.
 * - {@link MessageReceipt}: the audit record of an accepted send.
 * - {@link NftBridgeConfig}: construction-time configuration of the bridge.
 */
import type { RelayClient } from '../chains/RelayClient';
import type { WrappedTokenClient } from '../chains/WrappedTokenClient';
import type { FeeTokenClient } from '../chains/FeeTokenClient';
import type { AuthorizationPolicy } from '../custody/Authorization';
import type { TokenIdSequence } from '../custody/TokenIdSequence';
import type { ProcessedMessageStore } from '../routing/ProcessedMessageStore';
import type { MessageLog } from '../monitoring/MessageLog';

/** 0x-prefixed hex string. */
export type Hex = string;

export interface TransferIntent {
  readonly tokenId: bigint;
  readonly newOwner: string;
}

export interface OutboundMessage {
  destinationSelector: bigint;
  receiver: string;
  payload: Hex;
  feeToken: string;
  gasLimit: bigint;
  // Relay-specific encoding of the gas budget
  extraArgs: Hex;
}

export interface FeeQuote {
  amount: bigint;
}

export interface MessageReceipt {
  messageId: Hex;
  destinationSelector: bigint;
  receiver: string;
  feeToken: string;
  feePaid: bigint;
}

export interface InboundMessage {
  messageId: Hex;
  sourceChainSelector: bigint;
  sourceSender: string;
  payload: Hex;
}

export interface MessageSentEvent {
  messageId: Hex;
  destinationSelector: bigint;
  receiver: string;
  feeToken: string;
  fee: bigint;
}

export interface MessageReceivedEvent {
  messageId: Hex;
  sourceChainSelector: bigint;
  sourceSender: string;
  tokenId: bigint;
  newOwner: string;
}

export interface BridgeEvents {
  MessageSent: (event: MessageSentEvent) => void;
  MessageReceived: (event: MessageReceivedEvent) => void;
}

export interface NftBridgeConfig {
  /** Address of this bridge on its host chain; holds fee tokens and custody. */
  address: string;

  relay: RelayClient;
  wrappedToken: WrappedTokenClient;
  feeToken: FeeTokenClient;

  /** Gas budget for destination execution (default: {@link DEFAULT_GAS_LIMIT}). */
  gasLimit?: bigint;

  /**
   * Who may call `originateMint`. Defaults to owner-only when `owner` is set,
   * open otherwise.
   */
  authorization?: AuthorizationPolicy;
  owner?: string;

  /** Allocates ids for freshly originated tokens (default: counter from 0). */
  tokenIds?: TokenIdSequence;

  /**
   * Reject inbound messages whose id was already processed (default: true).
   * Disable to rely purely on the relay's exactly-once delivery.
   */
  replayProtection?: boolean;
  processedMessages?: ProcessedMessageStore;

  messageLog?: MessageLog;

  /** Mute informational log lines (default: false). */
  silent?: boolean;
}

export interface HistoryOptions {
  limit?: number;
  offset?: number;
  direction?: 'outbound' | 'inbound';
  chainSelector?: bigint;
  startTime?: number;
  endTime?: number;
}

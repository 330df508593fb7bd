/**
 * @packageDocumentation
 * @module NftBridgeSDK
 * @description
 * The main entry point for the cross-chain NFT bridge SDK.
 *
 * This package moves a non-fungible token between two chains over a fee-charging
 * message relay: the token is locked and burned on the source chain and minted under
 * the same id on the destination chain when the relay delivers the message.
 *
 * Exports:
 * - **createNftBridge**: Factory function to initialize a bridge.
 * - **NftBridge**: The bridge entry points (`bridgeOut`, `originateMint`, `ccipReceive`).
 * - **Collaborators**: Relay, wrapped-token and fee-token interfaces plus ethers/HTTP adapters.
 * - **Types**: Messages, receipts, events and the error taxonomy.
 */
import { NftBridge } from './NftBridge';
import type { NftBridgeConfig } from './types/bridge';

export function createNftBridge(config: NftBridgeConfig): NftBridge {
  return new NftBridge(config);
}

export * from './NftBridge';
export * from './types/bridge';
export * from './types/errors';

export * from './codec/PayloadCodec';

export * from './custody/Authorization';
export * from './custody/CustodyManager';
export * from './custody/TokenIdSequence';

export * from './routing/MessageBuilder';
export * from './routing/Dispatcher';
export * from './routing/InboundReceiver';
export * from './routing/ProcessedMessageStore';

export * from './chains/RelayClient';
export * from './chains/WrappedTokenClient';
export * from './chains/FeeTokenClient';
export * from './chains/LedgerTransaction';
export * from './chains/EVMRelayClient';
export * from './chains/EVMTokenClients';
export * from './chains/HttpRelayClient';

export * from './monitoring/MessageLog';

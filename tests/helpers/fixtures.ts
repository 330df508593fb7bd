import { NftBridge } from '../../src/NftBridge';
import type { NftBridgeConfig } from '../../src/types/bridge';
import {
    BRIDGE_X,
    BRIDGE_Y,
    FEE_TOKEN_X,
    FEE_TOKEN_Y,
    InMemoryFeeToken,
    InMemoryWrappedToken,
    LocalRelay,
    ROUTER_X,
    ROUTER_Y,
    SELECTOR_X,
    SELECTOR_Y,
} from './chain';

export interface TwoChainSetup {
    bridgeX: NftBridge;
    bridgeY: NftBridge;
    tokenX: InMemoryWrappedToken;
    tokenY: InMemoryWrappedToken;
    feeX: InMemoryFeeToken;
    feeY: InMemoryFeeToken;
    relayX: LocalRelay;
    relayY: LocalRelay;
}

export interface SetupOptions {
    baseFee?: bigint;
    feePerGas?: bigint;
    feeBalanceX?: bigint;
    bridgeX?: Partial<NftBridgeConfig>;
    bridgeY?: Partial<NftBridgeConfig>;
}

/**
 * Chain X and chain Y, each with its own bridge, wrapped token, fee token and relay
 * router, connected to each other.
 */
export function createTwoChainSetup(options: SetupOptions = {}): TwoChainSetup {
    const tokenX = new InMemoryWrappedToken();
    const tokenY = new InMemoryWrappedToken();
    const feeX = new InMemoryFeeToken(FEE_TOKEN_X, BRIDGE_X);
    const feeY = new InMemoryFeeToken(FEE_TOKEN_Y, BRIDGE_Y);

    const relayX = new LocalRelay({
        routerAddress: ROUTER_X,
        chainSelector: SELECTOR_X,
        sender: BRIDGE_X,
        feeToken: feeX,
        baseFee: options.baseFee,
        feePerGas: options.feePerGas,
    });
    const relayY = new LocalRelay({
        routerAddress: ROUTER_Y,
        chainSelector: SELECTOR_Y,
        sender: BRIDGE_Y,
        feeToken: feeY,
        baseFee: options.baseFee,
        feePerGas: options.feePerGas,
    });

    const bridgeX = new NftBridge({
        address: BRIDGE_X,
        relay: relayX,
        wrappedToken: tokenX,
        feeToken: feeX,
        silent: true,
        ...options.bridgeX,
    });
    const bridgeY = new NftBridge({
        address: BRIDGE_Y,
        relay: relayY,
        wrappedToken: tokenY,
        feeToken: feeY,
        silent: true,
        ...options.bridgeY,
    });

    relayX.connect(SELECTOR_Y, bridgeY, ROUTER_Y);
    relayY.connect(SELECTOR_X, bridgeX, ROUTER_X);

    if (options.feeBalanceX !== undefined) {
        feeX.mint(BRIDGE_X, options.feeBalanceX);
    }

    return { bridgeX, bridgeY, tokenX, tokenY, feeX, feeY, relayX, relayY };
}

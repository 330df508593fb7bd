import { ethers } from 'ethers';
import type { Hex, OutboundMessage } from '../types/bridge';
import type { RelayClient } from './RelayClient';

export const ROUTER_ABI = [
    'function isChainSupported(uint64 chainSelector) view returns (bool supported)',
    'function getFee(uint64 destinationChainSelector, tuple(bytes receiver, bytes data, tuple(address token, uint256 amount)[] tokenAmounts, address feeToken, bytes extraArgs) message) view returns (uint256 fee)',
    'function ccipSend(uint64 destinationChainSelector, tuple(bytes receiver, bytes data, tuple(address token, uint256 amount)[] tokenAmounts, address feeToken, bytes extraArgs) message) payable returns (bytes32)',
];

/**
 * Event the router (or its on-ramp) emits for every accepted message. The message id
 * is read from its `messageId` argument.
 */
export const MESSAGE_SENT_EVENT =
    'event MessageSent(bytes32 indexed messageId, uint64 indexed destinationChainSelector, address receiver, address feeToken, uint256 fees)';

export interface EVMRelayClientConfig {
    routerAddress: string;
    /** Signer for `ccipSend`; a provider is enough for quotes. */
    runner: ethers.ContractRunner;
    confirmations?: number;
    /** Event fragment carrying a `messageId` argument, for routers that log it differently. */
    messageEvent?: string;
}

/**
 * Relay client backed by an on-chain CCIP-style router contract.
 */
export class EVMRelayClient implements RelayClient {
    public readonly routerAddress: string;
    private router: ethers.Contract;
    private confirmations: number;
    private messageEvent: ethers.EventFragment;

    constructor(config: EVMRelayClientConfig) {
        this.routerAddress = ethers.getAddress(config.routerAddress);
        this.messageEvent = ethers.EventFragment.from(config.messageEvent ?? MESSAGE_SENT_EVENT);
        this.router = new ethers.Contract(
            this.routerAddress,
            [...ROUTER_ABI, this.messageEvent],
            config.runner
        );
        this.confirmations = config.confirmations ?? 1;
    }

    async isChainSupported(destinationSelector: bigint): Promise<boolean> {
        const supported: boolean = await this.router.getFunction('isChainSupported').staticCall(destinationSelector);
        return supported;
    }

    async getFee(destinationSelector: bigint, message: OutboundMessage): Promise<bigint> {
        const fee: bigint = await this.router.getFunction('getFee').staticCall(
            destinationSelector,
            toRouterMessage(message)
        );
        return fee;
    }

    async send(destinationSelector: bigint, message: OutboundMessage): Promise<Hex> {
        const ccipSend = this.router.getFunction('ccipSend');
        const tx: ethers.ContractTransactionResponse = await ccipSend.send(
            destinationSelector,
            toRouterMessage(message)
        );
        const receipt = await tx.wait(this.confirmations);
        if (!receipt || receipt.status !== 1) {
            throw new Error(`ccipSend transaction ${tx.hash} failed`);
        }

        // the id is assigned at inclusion; read it from the mined log
        const topic = this.messageEvent.topicHash;
        const log = receipt.logs.find((l) => l.topics[0] === topic);
        const parsed = log ? this.router.interface.parseLog(log) : null;
        const messageId: unknown = parsed?.args.getValue('messageId');
        if (typeof messageId !== 'string' || !ethers.isHexString(messageId, 32)) {
            throw new Error(`ccipSend transaction ${tx.hash} emitted no ${this.messageEvent.name} event`);
        }
        return messageId;
    }
}

/**
 * Router wire shape: receiver ABI-encoded as bytes, no token amounts.
 */
export function toRouterMessage(message: OutboundMessage) {
    return {
        receiver: ethers.AbiCoder.defaultAbiCoder().encode(['address'], [message.receiver]),
        data: message.payload,
        tokenAmounts: [],
        feeToken: message.feeToken,
        extraArgs: message.extraArgs,
    };
}

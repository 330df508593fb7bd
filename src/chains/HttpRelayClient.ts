/**
 * @packageDocumentation
 * @module HttpRelayClient
 * @description
 * Relay client for relayer services that expose a REST API instead of an on-chain router.
 *
 * Endpoints:
 * - `GET  /chains/:selector` → `{ supported: boolean }`
 * - `POST /fee`               → `{ fee: string }`
 * - `POST /messages`          → `{ messageId: string }`
 *
 * Amounts and selectors travel as decimal strings.
 */
import axios, { type AxiosInstance } from 'axios';
import type { Hex, OutboundMessage } from '../types/bridge';
import type { RelayClient } from './RelayClient';

export interface HttpRelayClientConfig {
    baseUrl: string;
    routerAddress: string;
    apiKey?: string;
    timeoutMs?: number;
}

interface ChainSupportResponse {
    supported: boolean;
}

interface FeeResponse {
    fee: string;
}

interface SendResponse {
    messageId: string;
}

export class HttpRelayClient implements RelayClient {
    public readonly routerAddress: string;
    private http: AxiosInstance;

    constructor(config: HttpRelayClientConfig) {
        this.routerAddress = config.routerAddress;
        this.http = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs ?? 10000,
            headers: config.apiKey ? { 'x-api-key': config.apiKey } : undefined,
        });
    }

    async isChainSupported(destinationSelector: bigint): Promise<boolean> {
        const response = await this.http.get<ChainSupportResponse>(`/chains/${destinationSelector.toString()}`);
        return response.data.supported === true;
    }

    async getFee(destinationSelector: bigint, message: OutboundMessage): Promise<bigint> {
        const response = await this.http.post<FeeResponse>('/fee', {
            destinationSelector: destinationSelector.toString(),
            message: serializeMessage(message),
        });
        return parseAmount(response.data.fee);
    }

    async send(destinationSelector: bigint, message: OutboundMessage): Promise<Hex> {
        const response = await this.http.post<SendResponse>('/messages', {
            destinationSelector: destinationSelector.toString(),
            message: serializeMessage(message),
        });
        return response.data.messageId;
    }
}

export function serializeMessage(message: OutboundMessage) {
    return {
        destinationSelector: message.destinationSelector.toString(),
        receiver: message.receiver,
        payload: message.payload,
        feeToken: message.feeToken,
        gasLimit: message.gasLimit.toString(),
        extraArgs: message.extraArgs,
    };
}

function parseAmount(value: unknown): bigint {
    if (typeof value !== 'string' || !/^\d+$/.test(value)) {
        throw new Error(`Relayer returned a malformed fee: ${String(value)}`);
    }
    return BigInt(value);
}
